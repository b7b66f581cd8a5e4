/**
 * Bounded map of user id → avatar entry with read-time staleness.
 *
 * Owns no side effects beyond its own map: the service layers refresh scheduling and change
 * notification on top. All methods are synchronous, so each call is atomic on the event loop
 * and eviction runs inside the put that triggered it.
 */
import { type EvictionPolicy, selectEvictionVictims } from "./eviction";
import type { CacheEntry, CacheHit, Clock, ProfilePictureSnapshot } from "./types";

export interface CacheStoreOptions {
	maxEntries: number;
	ttlMs: number;
	protectedRatio?: number;
	now?: Clock;
	eviction?: EvictionPolicy;
}

export interface StoreStatistics {
	totalEntries: number;
	expiredEntries: number;
	totalAccessCount: number;
}

export class CacheStore {
	private entries = new Map<string, CacheEntry>();
	private nextRevision = 1;
	private readonly maxEntries: number;
	private readonly ttlMs: number;
	private readonly protectedRatio: number;
	private readonly now: Clock;
	private readonly eviction: EvictionPolicy;

	constructor(options: CacheStoreOptions) {
		this.maxEntries = options.maxEntries;
		this.ttlMs = options.ttlMs;
		this.protectedRatio = options.protectedRatio ?? 0.8;
		this.now = options.now ?? Date.now;
		this.eviction = options.eviction ?? selectEvictionVictims;
	}

	get size(): number {
		return this.entries.size;
	}

	has(userId: string): boolean {
		return this.entries.has(userId);
	}

	/** Returns the value even when stale; every hit counts as an access. */
	get(userId: string): CacheHit | undefined {
		const entry = this.entries.get(userId);
		if (!entry) return undefined;
		const now = this.now();
		entry.accessCount++;
		entry.lastAccessed = now;
		entry.referenced = true;
		return { value: entry.value, stale: this.entryIsStale(entry, now) };
	}

	/** Current value without counting an access. */
	peek(userId: string): string | null | undefined {
		return this.entries.get(userId)?.value;
	}

	/** Writes an authoritative value. Returns the ids evicted to stay within capacity. */
	put(userId: string, value: string | null): string[] {
		const now = this.now();
		const existing = this.entries.get(userId);
		this.entries.set(userId, {
			value,
			lastUpdated: now,
			lastAccessed: now,
			accessCount: existing?.accessCount ?? 0,
			invalidated: false,
			referenced: existing?.referenced ?? false,
			revision: this.nextRevision++,
		});

		if (this.entries.size <= this.maxEntries) return [];

		const victims = this.eviction(this.entries, {
			maxEntries: this.maxEntries,
			protectedRatio: this.protectedRatio,
			pinned: userId,
		});
		for (const victim of victims) {
			this.entries.delete(victim);
		}
		return victims;
	}

	/** Marks the entry stale without touching its value. False when there is no entry. */
	invalidate(userId: string): boolean {
		const entry = this.entries.get(userId);
		if (!entry) return false;
		entry.invalidated = true;
		return true;
	}

	remove(userId: string): boolean {
		return this.entries.delete(userId);
	}

	clear(): void {
		this.entries.clear();
	}

	isStale(userId: string): boolean {
		const entry = this.entries.get(userId);
		return entry ? this.entryIsStale(entry, this.now()) : false;
	}

	/** Write sequence number of the current entry, undefined when absent. */
	revisionOf(userId: string): number | undefined {
		return this.entries.get(userId)?.revision;
	}

	snapshot(): ProfilePictureSnapshot {
		return Object.fromEntries([...this.entries].map(([userId, entry]) => [userId, entry.value]));
	}

	statistics(): StoreStatistics {
		const now = this.now();
		let expiredEntries = 0;
		let totalAccessCount = 0;
		for (const entry of this.entries.values()) {
			if (this.entryIsStale(entry, now)) expiredEntries++;
			totalAccessCount += entry.accessCount;
		}
		return { totalEntries: this.entries.size, expiredEntries, totalAccessCount };
	}

	private entryIsStale(entry: CacheEntry, now: number): boolean {
		return entry.invalidated || now - entry.lastUpdated > this.ttlMs;
	}
}
