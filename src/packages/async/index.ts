export type QueueResult<T> = { kind: "item"; value: T } | { kind: "timeout" } | { kind: "closed" };

/**
 * Single-consumer FIFO hand-off between a producer callback (stream events)
 * and an async consumer loop. Items pushed after close are dropped; items already
 * queued are still delivered before the consumer sees `closed`.
 */
export class AsyncQueue<T> {
	private items: T[] = [];
	private waiter: (() => void) | null = null;
	private closed = false;

	push(item: T): void {
		if (this.closed) return;
		this.items.push(item);
		this.wake();
	}

	close(): void {
		this.closed = true;
		this.wake();
	}

	get isClosed(): boolean {
		return this.closed;
	}

	get size(): number {
		return this.items.length;
	}

	/**
	 * Waits for the next item. With a timeout, resolves `{ kind: "timeout" }` when
	 * nothing arrives in time so the caller can do periodic work.
	 */
	async next(timeoutMs?: number): Promise<QueueResult<T>> {
		const first = this.items.shift();
		if (first !== undefined) return { kind: "item", value: first };
		if (this.closed) return { kind: "closed" };

		const woke = await new Promise<boolean>((resolve) => {
			let timer: NodeJS.Timeout | undefined;
			this.waiter = () => {
				if (timer) clearTimeout(timer);
				resolve(true);
			};
			if (timeoutMs !== undefined) {
				timer = setTimeout(() => {
					this.waiter = null;
					resolve(false);
				}, timeoutMs);
			}
		});

		if (!woke) return { kind: "timeout" };
		const value = this.items.shift();
		if (value !== undefined) return { kind: "item", value };
		return { kind: "closed" };
	}

	async *[Symbol.asyncIterator](): AsyncGenerator<T> {
		while (true) {
			const result = await this.next();
			if (result.kind !== "item") return;
			yield result.value;
		}
	}

	private wake(): void {
		const waiter = this.waiter;
		this.waiter = null;
		waiter?.();
	}
}

/**
 * Runs tasks one at a time per key. Tasks for different keys run concurrently.
 */
export class KeyedSerializer {
	private tails = new Map<string, Promise<void>>();

	run<R>(key: string | number, task: () => Promise<R>): Promise<R> {
		const id = String(key);
		const previous = this.tails.get(id) ?? Promise.resolve();
		const result = previous.then(task);
		const tail = result.then(
			() => undefined,
			() => undefined,
		);
		this.tails.set(id, tail);
		void tail.then(() => {
			if (this.tails.get(id) === tail) this.tails.delete(id);
		});
		return result;
	}

	isBusy(key: string | number): boolean {
		return this.tails.has(String(key));
	}
}

export const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
