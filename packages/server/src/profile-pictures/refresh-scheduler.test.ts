import { afterEach, describe, expect, it, vi } from "vitest";
import { createDeferredLookup, createMapLookup, createTestLogger } from "../test-utils";
import { CacheStore } from "./cache-store";
import { LookupError, type ProfileLookup } from "./lookup";
import { RefreshScheduler } from "./refresh-scheduler";

function setup(options: { lookup?: ProfileLookup; enabled?: boolean; delayMs?: number } = {}) {
	const store = new CacheStore({ maxEntries: 100, ttlMs: 60_000 });
	const scheduler = new RefreshScheduler({
		store,
		logger: createTestLogger(),
		lookup: options.lookup,
		enabled: options.enabled,
		delayMs: options.delayMs,
		apply: (userId, value) => {
			store.put(userId, value);
			scheduler.forget(userId);
		},
	});
	return { store, scheduler };
}

describe("RefreshScheduler", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	describe("enqueue()", () => {
		it("queues an id that has a cache entry", () => {
			const { store, scheduler } = setup();
			store.put("u1", "https://x/a.jpg");
			expect(scheduler.enqueue("u1")).toBe(true);
			expect(scheduler.size).toBe(1);
		});

		it("ignores duplicates", () => {
			const { store, scheduler } = setup();
			store.put("u1", "https://x/a.jpg");
			scheduler.enqueue("u1");
			expect(scheduler.enqueue("u1")).toBe(false);
			expect(scheduler.size).toBe(1);
		});

		it("ignores ids without an entry", () => {
			const { scheduler } = setup();
			expect(scheduler.enqueue("ghost")).toBe(false);
			expect(scheduler.size).toBe(0);
		});

		it("ignores everything while disabled", () => {
			const { store, scheduler } = setup({ enabled: false });
			store.put("u1", "https://x/a.jpg");
			expect(scheduler.enqueue("u1")).toBe(false);
			expect(scheduler.size).toBe(0);
		});

		it("keeps already queued ids when disabled", () => {
			const { store, scheduler } = setup();
			store.put("u1", "https://x/a.jpg");
			scheduler.enqueue("u1");
			scheduler.setEnabled(false);
			expect(scheduler.has("u1")).toBe(true);
			expect(scheduler.enabled).toBe(false);
		});
	});

	describe("drain()", () => {
		it("writes fresh values and empties the queue", async () => {
			const lookup = createMapLookup({ u1: "https://x/new.jpg", u2: null });
			const { store, scheduler } = setup({ lookup });
			store.put("u1", "https://x/old.jpg");
			store.put("u2", "https://x/old2.jpg");
			store.invalidate("u1");
			store.invalidate("u2");
			scheduler.enqueue("u1");
			scheduler.enqueue("u2");

			const outcomes = await scheduler.drain();

			expect(outcomes).toEqual([
				{ userId: "u1", status: "refreshed", value: "https://x/new.jpg" },
				{ userId: "u2", status: "refreshed", value: null },
			]);
			expect(store.snapshot()).toEqual({ u1: "https://x/new.jpg", u2: null });
			expect(store.isStale("u1")).toBe(false);
			expect(scheduler.size).toBe(0);
		});

		it("keeps the stale value when the lookup fails", async () => {
			const lookup = createMapLookup({ u1: new Error("backend down") });
			const { store, scheduler } = setup({ lookup });
			store.put("u1", "https://x/old.jpg");
			store.invalidate("u1");
			scheduler.enqueue("u1");

			const [outcome] = await scheduler.drain();

			expect(outcome?.status).toBe("failed");
			if (outcome?.status === "failed") {
				expect(outcome.error).toBeInstanceOf(LookupError);
				expect(outcome.error.message).toBe("Profile lookup failed: backend down");
			}
			expect(store.get("u1")).toEqual({ value: "https://x/old.jpg", stale: true });
			expect(scheduler.size).toBe(0);
			expect(scheduler.enqueue("u1")).toBe(true);
		});

		it("does nothing without a lookup", async () => {
			const { store, scheduler } = setup();
			store.put("u1", "https://x/a.jpg");
			scheduler.enqueue("u1");
			expect(await scheduler.drain()).toEqual([]);
			expect(scheduler.size).toBe(1);
		});

		it("does nothing while disabled", async () => {
			const lookup = createMapLookup({ u1: "https://x/new.jpg" });
			const { store, scheduler } = setup({ lookup });
			store.put("u1", "https://x/a.jpg");
			scheduler.enqueue("u1");
			scheduler.setEnabled(false);
			expect(await scheduler.drain()).toEqual([]);
			expect(lookup.calls).toEqual([]);
		});

		it("keeps an in-flight id queued and never fetches it twice", async () => {
			const { lookup, pending } = createDeferredLookup();
			const { store, scheduler } = setup({ lookup });
			store.put("u1", "https://x/old.jpg");
			scheduler.enqueue("u1");

			const first = scheduler.drain();
			expect(scheduler.enqueue("u1")).toBe(false);
			expect(await scheduler.drain()).toEqual([]);
			expect(scheduler.size).toBe(1);

			pending.get("u1")?.resolve("https://x/new.jpg");
			expect(await first).toEqual([{ userId: "u1", status: "refreshed", value: "https://x/new.jpg" }]);
			expect(scheduler.size).toBe(0);
		});

		it("discards the result when the entry is removed mid-flight", async () => {
			const { lookup, pending } = createDeferredLookup();
			const { store, scheduler } = setup({ lookup });
			store.put("u1", "https://x/old.jpg");
			scheduler.enqueue("u1");

			const drained = scheduler.drain();
			store.remove("u1");
			scheduler.forget("u1");
			pending.get("u1")?.resolve("https://x/new.jpg");

			expect(await drained).toEqual([{ userId: "u1", status: "discarded" }]);
			expect(store.has("u1")).toBe(false);
		});

		it("discards the result when a newer write lands mid-flight", async () => {
			const { lookup, pending } = createDeferredLookup();
			const { store, scheduler } = setup({ lookup });
			store.put("u1", "https://x/old.jpg");
			scheduler.enqueue("u1");

			const drained = scheduler.drain();
			store.put("u1", "https://x/newest.jpg");
			pending.get("u1")?.resolve("https://x/from-lookup.jpg");

			expect(await drained).toEqual([{ userId: "u1", status: "discarded" }]);
			expect(store.get("u1")?.value).toBe("https://x/newest.jpg");
		});

		it("keeps an intent queued after a write during the lookup", async () => {
			const { lookup, pending } = createDeferredLookup();
			const { store, scheduler } = setup({ lookup });
			store.put("u1", "https://x/a.jpg");
			scheduler.enqueue("u1");

			const first = scheduler.drain();
			store.put("u1", "https://x/b.jpg");
			scheduler.forget("u1");
			store.invalidate("u1");
			expect(scheduler.enqueue("u1")).toBe(true);
			pending.get("u1")?.resolve("https://x/old-lookup.jpg");

			expect(await first).toEqual([{ userId: "u1", status: "discarded" }]);
			expect(scheduler.has("u1")).toBe(true);
			expect(scheduler.size).toBe(1);

			const second = scheduler.drain();
			pending.get("u1")?.resolve("https://x/c.jpg");
			expect(await second).toEqual([{ userId: "u1", status: "refreshed", value: "https://x/c.jpg" }]);
			expect(store.get("u1")?.value).toBe("https://x/c.jpg");
			expect(scheduler.size).toBe(0);
		});

		it("drops queued ids whose entry has gone before draining", async () => {
			const lookup = createMapLookup({ u1: "https://x/new.jpg" });
			const { store, scheduler } = setup({ lookup });
			store.put("u1", "https://x/old.jpg");
			scheduler.enqueue("u1");
			store.remove("u1");

			expect(await scheduler.drain()).toEqual([]);
			expect(lookup.calls).toEqual([]);
			expect(scheduler.size).toBe(0);
		});
	});

	describe("automatic draining", () => {
		it("drains after the configured delay", async () => {
			vi.useFakeTimers();
			const lookup = createMapLookup({ u1: "https://x/new.jpg" });
			const { store, scheduler } = setup({ lookup, delayMs: 100 });
			store.put("u1", "https://x/old.jpg");
			scheduler.enqueue("u1");

			await vi.advanceTimersByTimeAsync(99);
			expect(lookup.calls).toEqual([]);

			await vi.advanceTimersByTimeAsync(1);
			expect(lookup.calls).toEqual(["u1"]);
			await vi.waitFor(() => expect(scheduler.size).toBe(0));
			expect(store.get("u1")?.value).toBe("https://x/new.jpg");
		});

		it("schedules a drain when re-enabled with ids still queued", async () => {
			vi.useFakeTimers();
			const lookup = createMapLookup({ u1: "https://x/new.jpg" });
			const { store, scheduler } = setup({ lookup, delayMs: 50 });
			store.put("u1", "https://x/old.jpg");
			scheduler.enqueue("u1");
			scheduler.setEnabled(false);

			await vi.advanceTimersByTimeAsync(50);
			expect(lookup.calls).toEqual([]);

			scheduler.setEnabled(true);
			await vi.advanceTimersByTimeAsync(50);
			expect(lookup.calls).toEqual(["u1"]);
		});

		it("stop() cancels a scheduled drain", async () => {
			vi.useFakeTimers();
			const lookup = createMapLookup({ u1: "https://x/new.jpg" });
			const { store, scheduler } = setup({ lookup, delayMs: 50 });
			store.put("u1", "https://x/old.jpg");
			scheduler.enqueue("u1");
			scheduler.stop();

			await vi.advanceTimersByTimeAsync(100);
			expect(lookup.calls).toEqual([]);
			expect(scheduler.size).toBe(1);
		});
	});
});
