import { randomUUID } from "node:crypto";
import type { Kysely } from "kysely";
import type { DB } from "../schema";

export function createUserRepository(db: Kysely<DB>) {
	return {
		async list() {
			return db.selectFrom("users").selectAll().orderBy("created_at", "desc").execute();
		},

		async findById(id: string) {
			return db.selectFrom("users").selectAll().where("id", "=", id).executeTakeFirst();
		},

		async create(data: { name: string; profilePictureUrl?: string | null }) {
			const id = randomUUID();
			await db
				.insertInto("users")
				.values({
					id,
					name: data.name,
					profile_picture_url: data.profilePictureUrl ?? null,
				})
				.execute();

			return db.selectFrom("users").selectAll().where("id", "=", id).executeTakeFirstOrThrow();
		},

		async update(id: string, data: { name?: string; profilePictureUrl?: string | null }) {
			const values: { name?: string; profile_picture_url?: string | null } = {};
			if (data.name !== undefined) values.name = data.name;
			if (data.profilePictureUrl !== undefined) values.profile_picture_url = data.profilePictureUrl;

			if (Object.keys(values).length > 0) {
				await db.updateTable("users").set(values).where("id", "=", id).execute();
			}

			return db.selectFrom("users").selectAll().where("id", "=", id).executeTakeFirstOrThrow();
		},

		async remove(id: string) {
			return db.deleteFrom("users").where("id", "=", id).execute();
		},
	};
}
