import { Hono } from "hono";
import type { Kysely } from "kysely";
import type { DB } from "../db/schema";
import type { ProfilePictureService } from "../profile-pictures/service";

export function healthRoutes(db: Kysely<DB>, profilePictures: ProfilePictureService) {
	const routes = new Hono();

	routes.get("/", async (c) => {
		const cache = profilePictures.getCacheStatistics();
		try {
			await db.selectFrom("users").select("id").limit(1).execute();
			return c.json({ status: "ok", db: "ok", cacheEntries: cache.totalEntries, uptime: process.uptime() });
		} catch {
			return c.json({ status: "error", db: "error", cacheEntries: cache.totalEntries }, 500);
		}
	});

	return routes;
}
