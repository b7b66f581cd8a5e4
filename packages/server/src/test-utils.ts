import Database from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";
import pino from "pino";
import type { Config } from "./config";
import { runMigrations } from "./db/migrate";
import type { DB } from "./db/schema";
import type { ProfileLookup } from "./profile-pictures/lookup";

/** Silent logger for tests: no output noise. */
export function createTestLogger() {
	return pino({ level: "silent" });
}

/**
 * Creates an in-memory SQLite database with all migrations applied.
 * Each call returns a fresh, isolated database.
 */
export async function createTestDb(): Promise<Kysely<DB>> {
	const db = new Kysely<DB>({
		dialect: new SqliteDialect({
			database: new Database(":memory:"),
		}),
	});
	await runMigrations(db, createTestLogger());
	return db;
}

/** Full config with test-friendly values; background refresh drains only when asked. */
export function createTestConfig(overrides: Partial<Config> = {}): Config {
	return {
		SQLITE_PATH: ":memory:",
		PROFILE_PICTURE_CACHE_TTL_MS: 300_000,
		PROFILE_PICTURE_CACHE_MAX_ENTRIES: 100,
		PROFILE_PICTURE_CACHE_PROTECTED_RATIO: 0.8,
		PROFILE_PICTURE_REFRESH_DELAY_MS: 250,
		PROFILE_PICTURE_BACKGROUND_REFRESH: true,
		PORT: 3000,
		LOG_LEVEL: "info",
		...overrides,
	};
}

/** Lookup over a plain map; ids mapped to an Error reject with it. */
export function createMapLookup(values: Record<string, string | null | Error>): ProfileLookup & { calls: string[] } {
	const calls: string[] = [];
	return {
		calls,
		async fetch(userId) {
			calls.push(userId);
			const value = values[userId];
			if (value instanceof Error) throw value;
			if (value === undefined) throw new Error(`no profile for ${userId}`);
			return value;
		},
	};
}

/** Lookup whose promises the test settles by hand. */
export function createDeferredLookup() {
	const pending = new Map<string, { resolve: (v: string | null) => void; reject: (e: Error) => void }>();
	const lookup: ProfileLookup = {
		fetch(userId) {
			return new Promise((resolve, reject) => {
				pending.set(userId, { resolve, reject });
			});
		},
	};
	return { lookup, pending };
}

/** Clock whose time only moves when the test says so. */
export function createManualClock(start = 1_700_000_000_000) {
	let now = start;
	return {
		now: () => now,
		advance(ms: number) {
			now += ms;
		},
	};
}

export function flushDeliveries(ms = 10): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
