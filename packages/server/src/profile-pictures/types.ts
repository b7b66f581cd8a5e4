/** Milliseconds since epoch. Injectable so TTL behaviour can be tested without timers. */
export type Clock = () => number;

export interface CacheEntry {
	/** Avatar URL, or null when the user is known to have no avatar. */
	value: string | null;
	lastUpdated: number;
	lastAccessed: number;
	accessCount: number;
	invalidated: boolean;
	/** Read at least once since insertion. Protected entries are evicted last. */
	referenced: boolean;
	revision: number;
}

export interface CacheHit {
	value: string | null;
	stale: boolean;
}

export type ProfilePictureSnapshot = Record<string, string | null>;

export interface CacheStatistics {
	totalEntries: number;
	expiredEntries: number;
	totalAccessCount: number;
	refreshQueueSize: number;
	backgroundRefreshEnabled: boolean;
}
