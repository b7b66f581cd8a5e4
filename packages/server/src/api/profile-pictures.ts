/**
 * Profile picture cache routes.
 *
 * GET    /                                cached snapshot
 * GET    /stats                           cache statistics
 * GET    /updates                         SSE stream, one "snapshot" event per mutation
 * POST   /refresh                         drain the refresh queue now
 * PUT    /settings/background-refresh     { enabled }
 * GET    /:userId                         read-through resolve (?refresh=true forces a lookup)
 * PUT    /:userId                         { profilePictureUrl } authoritative write
 * POST   /:userId/invalidate              mark stale, queue refresh
 * DELETE /:userId                         drop one entry
 * DELETE /                                drop everything
 */
import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import { z } from "zod";
import type { ProfilePictureService } from "../profile-pictures/service";

const writeSchema = z.object({
	profilePictureUrl: z.string().url("Profile picture must be a valid URL").nullable(),
});

const backgroundRefreshSchema = z.object({
	enabled: z.boolean(),
});

export function profilePictureRoutes(profilePictures: ProfilePictureService) {
	const routes = new Hono();

	routes.get("/", (c) => {
		return c.json({ profilePictures: profilePictures.getCachedProfilePictures() });
	});

	routes.get("/stats", (c) => {
		return c.json(profilePictures.getCacheStatistics());
	});

	routes.get("/updates", (c) => {
		return streamSSE(c, async (stream) => {
			const unsubscribe = profilePictures.profilePictureUpdates.subscribe(async (snapshot) => {
				await stream.writeSSE({ event: "snapshot", data: JSON.stringify(snapshot) });
			});
			await new Promise<void>((resolve) => {
				stream.onAbort(() => resolve());
			});
			unsubscribe();
		});
	});

	routes.post("/refresh", async (c) => {
		const outcomes = await profilePictures.refreshNow();
		return c.json({
			outcomes: outcomes.map((outcome) =>
				outcome.status === "failed"
					? { userId: outcome.userId, status: outcome.status, message: outcome.error.message }
					: outcome,
			),
		});
	});

	routes.put("/settings/background-refresh", async (c) => {
		const body = await c.req.json();
		const parsed = backgroundRefreshSchema.safeParse(body);
		if (!parsed.success) {
			const message = parsed.error.issues[0]?.message ?? "Invalid request";
			return c.json({ error: { code: "VALIDATION_ERROR", message } }, 400);
		}
		profilePictures.setBackgroundRefreshEnabled(parsed.data.enabled);
		return c.json({ backgroundRefreshEnabled: parsed.data.enabled });
	});

	routes.get("/:userId", async (c) => {
		const userId = c.req.param("userId");
		const forceRefresh = c.req.query("refresh") === "true";
		const profilePictureUrl = await profilePictures.resolveProfilePicture(userId, { forceRefresh });
		return c.json({ userId, profilePictureUrl });
	});

	routes.put("/:userId", async (c) => {
		const userId = c.req.param("userId");
		const body = await c.req.json();
		const parsed = writeSchema.safeParse(body);
		if (!parsed.success) {
			const message = parsed.error.issues[0]?.message ?? "Invalid request";
			return c.json({ error: { code: "VALIDATION_ERROR", message } }, 400);
		}
		profilePictures.updateProfilePictureGlobally(userId, parsed.data.profilePictureUrl);
		return c.json({ userId, profilePictureUrl: parsed.data.profilePictureUrl });
	});

	routes.post("/:userId/invalidate", (c) => {
		profilePictures.invalidateCacheForUser(c.req.param("userId"));
		return c.json({ success: true });
	});

	routes.delete("/:userId", (c) => {
		profilePictures.clearCacheForUser(c.req.param("userId"));
		return c.json({ success: true });
	});

	routes.delete("/", (c) => {
		profilePictures.clearAllCache();
		return c.json({ success: true });
	});

	return routes;
}
