/**
 * Sequential in-memory work queue.
 * Work starts on a microtask, never inside enqueue(), and runs one item at a time.
 * Failures are handed to onError so one bad item never stalls the rest.
 */

export type Work = () => void | Promise<void>;

export class DeliveryQueue {
	private queue: Work[] = [];
	private processing = false;

	constructor(private readonly onError: (err: unknown) => void) {}

	get pending(): number {
		return this.queue.length;
	}

	enqueue(work: Work): void {
		this.queue.push(work);
		if (this.processing) return;
		this.processing = true;
		queueMicrotask(() => {
			void this.processNext();
		});
	}

	/** Drops work that has not started yet. */
	clear(): void {
		this.queue.length = 0;
	}

	private async processNext(): Promise<void> {
		const work = this.queue.shift();
		if (!work) {
			this.processing = false;
			return;
		}
		try {
			await work();
		} catch (err) {
			this.onError(err);
		}
		await this.processNext();
	}
}
