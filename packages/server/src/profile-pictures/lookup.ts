/**
 * Profile Lookup: the authoritative source the cache refreshes from.
 *
 * fetchProfilePicture folds any rejection into a LookupResult carrying a LookupError.
 */
import type { createUserRepository } from "../db/repositories/users";

type UserRepo = ReturnType<typeof createUserRepository>;

export interface ProfileLookup {
	fetch(userId: string): Promise<string | null>;
}

export class LookupError extends Error {
	readonly userId: string;

	constructor(userId: string, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "LookupError";
		this.userId = userId;
	}
}

export type LookupResult = { ok: true; value: string | null } | { ok: false; error: LookupError };

export async function fetchProfilePicture(lookup: ProfileLookup, userId: string): Promise<LookupResult> {
	try {
		return { ok: true, value: await lookup.fetch(userId) };
	} catch (err) {
		if (err instanceof LookupError) return { ok: false, error: err };
		const message = err instanceof Error ? err.message : String(err);
		return { ok: false, error: new LookupError(userId, `Profile lookup failed: ${message}`, { cause: err }) };
	}
}

export function createUserProfileLookup(users: UserRepo): ProfileLookup {
	return {
		async fetch(userId) {
			const user = await users.findById(userId);
			if (!user) {
				throw new LookupError(userId, `User not found: ${userId}`);
			}
			return user.profile_picture_url;
		},
	};
}
