/**
 * Segmented LRU victim selection.
 *
 * Entries that were read at least once are protected, up to protectedRatio × maxEntries of
 * them (most recently accessed win). Everything else is probationary and goes first, oldest
 * lastAccessed first, ties in insertion order.
 */

export interface EvictionCandidate {
	lastAccessed: number;
	referenced: boolean;
}

export interface EvictionOptions {
	maxEntries: number;
	protectedRatio: number;
	/** Key that must survive this pass (the entry whose write triggered it). */
	pinned?: string;
}

export type EvictionPolicy = (
	entries: ReadonlyMap<string, EvictionCandidate>,
	options: EvictionOptions,
) => string[];

export const selectEvictionVictims: EvictionPolicy = (entries, options) => {
	const excess = entries.size - options.maxEntries;
	if (excess <= 0) return [];

	// Array#sort is stable, so equal timestamps keep Map insertion order.
	const byRecency = [...entries]
		.filter(([userId]) => userId !== options.pinned)
		.map(([userId, entry]) => ({ userId, lastAccessed: entry.lastAccessed, referenced: entry.referenced }))
		.sort((a, b) => a.lastAccessed - b.lastAccessed);

	const protectedLimit = Math.floor(options.maxEntries * options.protectedRatio);
	const referenced = byRecency.filter((c) => c.referenced);
	const shielded = new Set(referenced.slice(Math.max(0, referenced.length - protectedLimit)).map((c) => c.userId));

	const ordered = [
		...byRecency.filter((c) => !shielded.has(c.userId)),
		...byRecency.filter((c) => shielded.has(c.userId)),
	];

	return ordered.slice(0, excess).map((c) => c.userId);
};
