import { serve } from "@hono/node-server";
import { loadConfig } from "./config";
import { createDatabase } from "./db/index";
import { runMigrations } from "./db/migrate";
import { createUserRepository } from "./db/repositories/users";
import { createApp } from "./http";
import { createLogger } from "./logger";
import { createUserProfileLookup } from "./profile-pictures/lookup";
import { createProfilePictureService } from "./profile-pictures/service";

// 1. Config
const config = loadConfig();

// 2. Logger
const logger = createLogger(config);

// 3. Database
const db = createDatabase(config);
await runMigrations(db, logger);
logger.info("Database ready");

// 4. Profile lookup backed by the users table
const users = createUserRepository(db);
const lookup = createUserProfileLookup(users);

// 5. Profile picture cache: the single shared instance for this process
const profilePictures = createProfilePictureService(config, { logger, lookup });
profilePictures.profilePictureUpdates.subscribe((snapshot) => {
	logger.debug({ entries: Object.keys(snapshot).length }, "Profile picture cache changed");
});
logger.info(
	{
		maxEntries: config.PROFILE_PICTURE_CACHE_MAX_ENTRIES,
		ttlMs: config.PROFILE_PICTURE_CACHE_TTL_MS,
		backgroundRefresh: config.PROFILE_PICTURE_BACKGROUND_REFRESH,
	},
	"Profile picture cache ready",
);

// 6. HTTP server
const app = createApp(db, { profilePictures });
const server = serve({ fetch: app.fetch, port: config.PORT });
logger.info({ port: config.PORT }, "HTTP server started");

// 7. Graceful shutdown
async function shutdown() {
	logger.info("Shutting down...");
	profilePictures.stop();
	server.close();
	await db.destroy();
	process.exit(0);
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
