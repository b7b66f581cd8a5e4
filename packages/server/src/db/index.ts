import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";
import type { Config } from "../config";
import type { DB } from "./schema";

export function createDatabase(config: Pick<Config, "SQLITE_PATH">): Kysely<DB> {
	const inMemory = config.SQLITE_PATH === ":memory:";
	if (!inMemory) {
		mkdirSync(dirname(config.SQLITE_PATH), { recursive: true });
	}
	const sqlite = new Database(config.SQLITE_PATH);
	if (!inMemory) {
		sqlite.pragma("journal_mode = WAL");
	}

	return new Kysely<DB>({
		dialect: new SqliteDialect({ database: sqlite }),
	});
}
