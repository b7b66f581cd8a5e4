/**
 * Programmatic migration runner using static imports.
 * Static imports instead of FileMigrationProvider so it works when bundled.
 */
import { Migrator } from "kysely";
import type { Kysely } from "kysely";
import type { Logger } from "../logger";
import * as m001 from "./migrations/001-initial";
import type { DB } from "./schema";

export async function runMigrations(db: Kysely<DB>, logger: Logger): Promise<void> {
	const migrator = new Migrator({
		db,
		provider: {
			async getMigrations() {
				return {
					"001-initial": m001,
				};
			},
		},
	});

	const { error, results } = await migrator.migrateToLatest();

	for (const result of results ?? []) {
		if (result.status === "Success") {
			logger.info({ migration: result.migrationName }, "Migration applied");
		} else if (result.status === "Error") {
			logger.error({ migration: result.migrationName }, "Migration failed");
		}
	}

	if (error) {
		logger.error({ err: error }, "Migration run failed");
		process.exit(1);
	}
}
