/**
 * HTTP app factory: health, users and profile picture cache routes.
 */
import { Hono } from "hono";
import type { Kysely } from "kysely";
import { healthRoutes } from "./api/health";
import { profilePictureRoutes } from "./api/profile-pictures";
import { userRoutes } from "./api/users";
import { createUserRepository } from "./db/repositories/users";
import type { DB } from "./db/schema";
import type { ProfilePictureService } from "./profile-pictures/service";

interface AppDeps {
	profilePictures: ProfilePictureService;
}

export function createApp(db: Kysely<DB>, deps: AppDeps) {
	const app = new Hono();
	const users = createUserRepository(db);

	app.route("/api/health", healthRoutes(db, deps.profilePictures));
	app.route("/api/users", userRoutes(users, deps.profilePictures));
	app.route("/api/profile-pictures", profilePictureRoutes(deps.profilePictures));

	app.notFound((c) => c.json({ error: { code: "NOT_FOUND", message: "Not found" } }, 404));

	return app;
}
