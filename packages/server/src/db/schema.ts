import type { Generated } from "kysely";

export interface UsersTable {
	id: string;
	name: string;
	profile_picture_url: string | null;
	created_at: Generated<string>;
}

export interface DB {
	users: UsersTable;
}
