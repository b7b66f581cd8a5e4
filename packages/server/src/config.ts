/**
 * Validates and exports typed configuration from environment variables.
 * Uses zod for schema validation and dotenv for .env file loading.
 * Fails fast on startup with all errors printed at once.
 */
import { dirname, isAbsolute, resolve } from "node:path";
import { z } from "zod";
import "dotenv/config";

const booleanFlag = z
	.enum(["true", "false"])
	.default("true")
	.transform((value) => value === "true");

export const configSchema = z.object({
	// Database
	SQLITE_PATH: z.string().default("./data/avatars.db"),

	// Profile picture cache
	PROFILE_PICTURE_CACHE_TTL_MS: z.coerce.number().int().positive().default(300_000),
	PROFILE_PICTURE_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(100),
	PROFILE_PICTURE_CACHE_PROTECTED_RATIO: z.coerce.number().min(0).max(1).default(0.8),
	PROFILE_PICTURE_REFRESH_DELAY_MS: z.coerce.number().int().nonnegative().default(250),
	PROFILE_PICTURE_BACKGROUND_REFRESH: booleanFlag,

	// Server
	PORT: z.coerce.number().default(3000),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(): Config {
	const result = configSchema.safeParse(process.env);
	if (!result.success) {
		console.error("Invalid configuration:");
		for (const issue of result.error.issues) {
			console.error(`  ${issue.path.join(".")}: ${issue.message}`);
		}
		process.exit(1);
	}
	const config = result.data;

	// Resolve relative paths against the project root (dirname of .env file)
	// so they work regardless of cwd.
	const projectRoot = process.env.DOTENV_CONFIG_PATH ? dirname(process.env.DOTENV_CONFIG_PATH) : process.cwd();
	if (config.SQLITE_PATH !== ":memory:" && !isAbsolute(config.SQLITE_PATH)) {
		config.SQLITE_PATH = resolve(projectRoot, config.SQLITE_PATH);
	}

	return config;
}
