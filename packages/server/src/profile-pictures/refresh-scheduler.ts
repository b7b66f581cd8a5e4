/**
 * Deduplicated background refresh of stale profile pictures.
 *
 * There is at most one pending refresh intent per user, each tagged with a ticket. An id
 * stays pending while its lookup is in flight, which keeps repeated stale reads from queueing
 * it again. When the lookup settles it clears only its own ticket: an intent queued after a
 * write or clear during the lookup stays pending for the next drain. A failed lookup leaves
 * the cached value alone; the next stale read queues the user again.
 */
import type { Logger } from "../logger";
import type { CacheStore } from "./cache-store";
import { type LookupError, type ProfileLookup, fetchProfilePicture } from "./lookup";

export type RefreshOutcome =
	| { userId: string; status: "refreshed"; value: string | null }
	| { userId: string; status: "discarded" }
	| { userId: string; status: "failed"; error: LookupError };

export interface RefreshSchedulerOptions {
	store: CacheStore;
	logger: Logger;
	/** Write path for fresh values. */
	apply: (userId: string, value: string | null) => void;
	lookup?: ProfileLookup;
	enabled?: boolean;
	/** Drain automatically this many ms after an enqueue. Manual draining only when unset. */
	delayMs?: number;
}

export class RefreshScheduler {
	private pending = new Map<string, number>();
	private nextTicket = 1;
	private inFlight = new Set<string>();
	private timer: ReturnType<typeof setTimeout> | null = null;
	private _enabled: boolean;
	private readonly store: CacheStore;
	private readonly logger: Logger;
	private readonly apply: (userId: string, value: string | null) => void;
	private readonly lookup?: ProfileLookup;
	private readonly delayMs?: number;

	constructor(options: RefreshSchedulerOptions) {
		this.store = options.store;
		this.logger = options.logger;
		this.apply = options.apply;
		this.lookup = options.lookup;
		this._enabled = options.enabled ?? true;
		this.delayMs = options.delayMs;
	}

	get enabled(): boolean {
		return this._enabled;
	}

	get size(): number {
		return this.pending.size;
	}

	has(userId: string): boolean {
		return this.pending.has(userId);
	}

	/** Already queued ids stay queued when disabling. */
	setEnabled(enabled: boolean): void {
		this._enabled = enabled;
		if (enabled && this.pending.size > 0) this.scheduleDrain();
	}

	/** Returns true only when the id was newly queued. */
	enqueue(userId: string): boolean {
		if (!this._enabled || this.pending.has(userId) || !this.store.has(userId)) return false;
		this.pending.set(userId, this.nextTicket++);
		this.scheduleDrain();
		return true;
	}

	forget(userId: string): void {
		this.pending.delete(userId);
	}

	clear(): void {
		this.pending.clear();
	}

	stop(): void {
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}

	async drain(): Promise<RefreshOutcome[]> {
		const lookup = this.lookup;
		if (!this._enabled || !lookup) return [];

		const batch: Array<{ userId: string; revision: number; ticket: number }> = [];
		for (const [userId, ticket] of this.pending) {
			if (this.inFlight.has(userId)) continue;
			const revision = this.store.revisionOf(userId);
			if (revision === undefined) {
				this.pending.delete(userId);
				continue;
			}
			this.inFlight.add(userId);
			batch.push({ userId, revision, ticket });
		}
		if (batch.length === 0) return [];

		this.logger.debug({ count: batch.length }, "Refreshing stale profile pictures");
		return Promise.all(
			batch.map(({ userId, revision, ticket }) => this.refresh(lookup, userId, revision, ticket)),
		);
	}

	private async refresh(
		lookup: ProfileLookup,
		userId: string,
		revision: number,
		ticket: number,
	): Promise<RefreshOutcome> {
		const result = await fetchProfilePicture(lookup, userId);
		this.inFlight.delete(userId);
		if (this.pending.get(userId) === ticket) {
			this.pending.delete(userId);
		} else if (this.pending.has(userId)) {
			this.scheduleDrain();
		}

		if (!result.ok) {
			this.logger.warn({ err: result.error, userId }, "Profile picture refresh failed, keeping stale value");
			return { userId, status: "failed", error: result.error };
		}

		// Removed or rewritten while the lookup was running: the newer state wins.
		if (this.store.revisionOf(userId) !== revision) {
			this.logger.debug({ userId }, "Discarding refresh result for changed entry");
			return { userId, status: "discarded" };
		}

		this.apply(userId, result.value);
		return { userId, status: "refreshed", value: result.value };
	}

	private scheduleDrain(): void {
		if (this.delayMs === undefined || !this.lookup || this.timer) return;
		this.timer = setTimeout(() => {
			this.timer = null;
			this.drain().catch((err: unknown) => {
				this.logger.error({ err }, "Background refresh drain failed");
			});
		}, this.delayMs);
		this.timer.unref();
	}
}
