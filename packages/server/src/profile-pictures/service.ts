/**
 * Profile picture cache: the one entry point the rest of the server uses.
 *
 * Composes the store, the refresh scheduler and the change notifier. Every mutation emits a
 * frozen snapshot on profilePictureUpdates. Nothing here throws for any user id: unknown ids
 * read as null and lookup failures only ever reach the logger.
 */
import type { Config } from "../config";
import type { Logger } from "../logger";
import { CacheStore } from "./cache-store";
import { ChangeNotifier } from "./change-notifier";
import { type ProfileLookup, fetchProfilePicture } from "./lookup";
import { type RefreshOutcome, RefreshScheduler } from "./refresh-scheduler";
import type { CacheStatistics, Clock, ProfilePictureSnapshot } from "./types";

export const DEFAULT_MAX_ENTRIES = 100;
export const DEFAULT_TTL_MS = 5 * 60_000;

export interface ProfilePictureServiceOptions {
	logger: Logger;
	lookup?: ProfileLookup;
	maxEntries?: number;
	ttlMs?: number;
	protectedRatio?: number;
	backgroundRefreshEnabled?: boolean;
	refreshDelayMs?: number;
	now?: Clock;
}

export class ProfilePictureService {
	readonly profilePictureUpdates: ChangeNotifier<ProfilePictureSnapshot>;
	private readonly store: CacheStore;
	private readonly scheduler: RefreshScheduler;
	private readonly logger: Logger;
	private readonly lookup?: ProfileLookup;
	private readonly defaultRefreshEnabled: boolean;

	constructor(options: ProfilePictureServiceOptions) {
		this.logger = options.logger;
		this.lookup = options.lookup;
		this.defaultRefreshEnabled = options.backgroundRefreshEnabled ?? true;
		this.profilePictureUpdates = new ChangeNotifier(options.logger);
		this.store = new CacheStore({
			maxEntries: options.maxEntries ?? DEFAULT_MAX_ENTRIES,
			ttlMs: options.ttlMs ?? DEFAULT_TTL_MS,
			protectedRatio: options.protectedRatio,
			now: options.now,
		});
		this.scheduler = new RefreshScheduler({
			store: this.store,
			logger: options.logger,
			lookup: options.lookup,
			enabled: this.defaultRefreshEnabled,
			delayMs: options.refreshDelayMs,
			apply: (userId, value) => this.updateProfilePictureGlobally(userId, value),
		});
	}

	/** Null for unknown users and for users without an avatar. Stale hits queue a refresh. */
	getProfilePictureFromCache(userId: string): string | null {
		const hit = this.store.get(userId);
		if (!hit) return null;
		if (hit.stale) this.scheduler.enqueue(userId);
		return hit.value;
	}

	updateProfilePictureGlobally(userId: string, value: string | null): void {
		const evicted = this.store.put(userId, value);
		this.scheduler.forget(userId);
		for (const victim of evicted) {
			this.scheduler.forget(victim);
		}
		if (evicted.length > 0) {
			this.logger.debug({ evicted: evicted.length, size: this.store.size }, "Evicted profile pictures");
		}
		this.notify();
	}

	invalidateCacheForUser(userId: string): void {
		if (!this.store.invalidate(userId)) return;
		this.scheduler.enqueue(userId);
		this.notify();
	}

	clearCacheForUser(userId: string): void {
		this.store.remove(userId);
		this.scheduler.forget(userId);
		this.notify();
	}

	clearAllCache(): void {
		this.store.clear();
		this.scheduler.clear();
		this.notify();
	}

	getCachedProfilePictures(): ProfilePictureSnapshot {
		return this.store.snapshot();
	}

	getCacheStatistics(): CacheStatistics {
		return {
			...this.store.statistics(),
			refreshQueueSize: this.scheduler.size,
			backgroundRefreshEnabled: this.scheduler.enabled,
		};
	}

	setBackgroundRefreshEnabled(enabled: boolean): void {
		this.scheduler.setEnabled(enabled);
		this.logger.info({ enabled }, "Background profile picture refresh toggled");
	}

	/**
	 * Read-through lookup. A fresh cached value is returned as-is; otherwise the lookup is
	 * awaited and its result written globally. If the lookup fails the cached value (or null)
	 * is returned instead. A write or clear that lands while the lookup runs wins over its
	 * result, and the current cached value is returned.
	 */
	async resolveProfilePicture(userId: string, options: { forceRefresh?: boolean } = {}): Promise<string | null> {
		const hit = this.store.get(userId);
		if (hit && !hit.stale && !options.forceRefresh) return hit.value;
		if (!this.lookup) return hit?.value ?? null;

		const revision = this.store.revisionOf(userId);
		const result = await fetchProfilePicture(this.lookup, userId);
		if (this.store.revisionOf(userId) !== revision) {
			this.logger.debug({ userId }, "Entry changed during lookup, keeping cached value");
			return this.store.peek(userId) ?? null;
		}
		if (!result.ok) {
			this.logger.warn({ err: result.error, userId }, "Profile picture lookup failed, serving cached value");
			return hit?.value ?? null;
		}
		this.updateProfilePictureGlobally(userId, result.value);
		return result.value;
	}

	refreshNow(): Promise<RefreshOutcome[]> {
		return this.scheduler.drain();
	}

	/** Empties the cache and restores the configured refresh flag. */
	reset(): void {
		this.clearAllCache();
		this.scheduler.setEnabled(this.defaultRefreshEnabled);
	}

	stop(): void {
		this.scheduler.stop();
		this.profilePictureUpdates.close();
	}

	private notify(): void {
		this.profilePictureUpdates.emit(Object.freeze(this.store.snapshot()));
	}
}

export function createProfilePictureService(
	config: Config,
	deps: { logger: Logger; lookup?: ProfileLookup; now?: Clock },
): ProfilePictureService {
	return new ProfilePictureService({
		logger: deps.logger,
		lookup: deps.lookup,
		now: deps.now,
		maxEntries: config.PROFILE_PICTURE_CACHE_MAX_ENTRIES,
		ttlMs: config.PROFILE_PICTURE_CACHE_TTL_MS,
		protectedRatio: config.PROFILE_PICTURE_CACHE_PROTECTED_RATIO,
		backgroundRefreshEnabled: config.PROFILE_PICTURE_BACKGROUND_REFRESH,
		refreshDelayMs: config.PROFILE_PICTURE_REFRESH_DELAY_MS,
	});
}
