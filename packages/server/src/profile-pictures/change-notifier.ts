/**
 * Multicast change notifications.
 *
 * Each subscriber gets its own delivery queue: emit() returns immediately, a slow async
 * listener only delays its own later deliveries, and a listener that throws is logged and
 * keeps its subscription. No history is kept; late subscribers only see later emissions.
 */
import type { Logger } from "../logger";
import { DeliveryQueue } from "../queue";

export type Listener<T> = (payload: T) => void | Promise<void>;

interface Subscriber<T> {
	listener: Listener<T>;
	queue: DeliveryQueue;
	active: boolean;
}

export class ChangeNotifier<T> {
	private subscribers = new Set<Subscriber<T>>();

	constructor(private readonly logger?: Logger) {}

	get listenerCount(): number {
		return this.subscribers.size;
	}

	/** Returns the unsubscribe function. */
	subscribe(listener: Listener<T>): () => void {
		const subscriber: Subscriber<T> = {
			listener,
			active: true,
			queue: new DeliveryQueue((err) => {
				this.logger?.warn({ err }, "Profile picture listener failed");
			}),
		};
		this.subscribers.add(subscriber);

		return () => {
			subscriber.active = false;
			subscriber.queue.clear();
			this.subscribers.delete(subscriber);
		};
	}

	/** Resolves with the first payload emitted after this call. */
	next(): Promise<T> {
		return new Promise((resolve) => {
			const unsubscribe = this.subscribe((payload) => {
				unsubscribe();
				resolve(payload);
			});
		});
	}

	emit(payload: T): void {
		for (const subscriber of this.subscribers) {
			subscriber.queue.enqueue(async () => {
				if (!subscriber.active) return;
				await subscriber.listener(payload);
			});
		}
	}

	close(): void {
		for (const subscriber of this.subscribers) {
			subscriber.active = false;
			subscriber.queue.clear();
		}
		this.subscribers.clear();
	}
}
