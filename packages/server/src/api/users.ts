/**
 * Users API: the records the profile lookup reads from.
 * Writes to profilePictureUrl are pushed into the cache right away; deleting a user drops
 * their cache entry.
 */
import { Hono } from "hono";
import { z } from "zod";
import type { createUserRepository } from "../db/repositories/users";
import type { ProfilePictureService } from "../profile-pictures/service";

type UserRepo = ReturnType<typeof createUserRepository>;

const profilePictureUrlSchema = z.string().url("Profile picture must be a valid URL").nullable();

const createUserSchema = z.object({
	name: z.string().min(1, "Name is required"),
	profilePictureUrl: profilePictureUrlSchema.optional(),
});

const updateUserSchema = z.object({
	name: z.string().min(1, "Name is required").optional(),
	profilePictureUrl: profilePictureUrlSchema.optional(),
});

export function userRoutes(users: UserRepo, profilePictures: ProfilePictureService) {
	const routes = new Hono();

	routes.get("/", async (c) => {
		const list = await users.list();
		return c.json({ users: list });
	});

	routes.post("/", async (c) => {
		const body = await c.req.json();
		const parsed = createUserSchema.safeParse(body);
		if (!parsed.success) {
			const message = parsed.error.issues[0]?.message ?? "Invalid request";
			return c.json({ error: { code: "VALIDATION_ERROR", message } }, 400);
		}

		const user = await users.create(parsed.data);
		profilePictures.updateProfilePictureGlobally(user.id, user.profile_picture_url);
		return c.json({ user }, 201);
	});

	routes.patch("/:id", async (c) => {
		const id = c.req.param("id");
		const existing = await users.findById(id);
		if (!existing) {
			return c.json({ error: { code: "NOT_FOUND", message: "User not found" } }, 404);
		}

		const body = await c.req.json();
		const parsed = updateUserSchema.safeParse(body);
		if (!parsed.success) {
			const message = parsed.error.issues[0]?.message ?? "Invalid request";
			return c.json({ error: { code: "VALIDATION_ERROR", message } }, 400);
		}

		const user = await users.update(id, parsed.data);
		if (parsed.data.profilePictureUrl !== undefined) {
			profilePictures.updateProfilePictureGlobally(id, user.profile_picture_url);
		}
		return c.json({ user });
	});

	routes.delete("/:id", async (c) => {
		const id = c.req.param("id");
		const existing = await users.findById(id);
		if (!existing) {
			return c.json({ error: { code: "NOT_FOUND", message: "User not found" } }, 404);
		}
		await users.remove(id);
		profilePictures.clearCacheForUser(id);
		return c.json({ success: true });
	});

	return routes;
}
