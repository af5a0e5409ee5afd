type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

type ChannelState = 'open' | 'closed' | 'aborted';

/**
 * Bounded FIFO queue with a single async consumer.
 *
 * Producers never wait: `offer` returns false when the queue is full or no longer open,
 * and the caller decides what a refused offer means. `close` lets the consumer read
 * what is left; `abort` discards it.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
    private readonly items: T[] = [];
    private readonly waiters: Waiter<T>[] = [];
    private state: ChannelState = 'open';
    private drainListeners: Array<() => void> = [];

    constructor(
        readonly capacity: number,
        private readonly onTake?: (item: T) => void
    ) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
        }
    }

    get size(): number {
        return this.items.length;
    }

    get isOpen(): boolean {
        return this.state === 'open';
    }

    get isAborted(): boolean {
        return this.state === 'aborted';
    }

    /**
     * Enqueue without waiting
     * @returns false when the channel is full or not open
     */
    offer(item: T): boolean {
        if (this.state !== 'open') return false;

        const waiter = this.waiters.shift();
        if (waiter) {
            this.onTake?.(item);
            waiter({ value: item, done: false });
            return true;
        }

        if (this.items.length >= this.capacity) return false;
        this.items.push(item);
        return true;
    }

    /**
     * Take the next item, waiting while the channel is open and empty
     */
    take(): Promise<IteratorResult<T, undefined>> {
        if (this.items.length > 0) {
            const [item] = this.items.splice(0, 1);
            this.onTake?.(item);
            if (this.items.length === 0 && this.state !== 'open') this.settleDrained();
            return Promise.resolve({ value: item, done: false });
        }
        if (this.state !== 'open') {
            this.settleDrained();
            return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise(resolve => this.waiters.push(resolve));
    }

    /**
     * Stop accepting items; the consumer still receives what is queued
     */
    close(): void {
        if (this.state !== 'open') return;
        this.state = 'closed';
        if (this.items.length === 0) {
            this.releaseWaiters();
            this.settleDrained();
        }
    }

    /**
     * Stop immediately and discard anything queued
     */
    abort(): void {
        if (this.state === 'aborted') return;
        this.state = 'aborted';
        this.items.length = 0;
        this.releaseWaiters();
        this.settleDrained();
    }

    /**
     * Resolves once the channel is closed and the consumer has taken every item
     */
    whenDrained(): Promise<void> {
        if (this.state !== 'open' && this.items.length === 0) return Promise.resolve();
        return new Promise(resolve => this.drainListeners.push(resolve));
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return {
            next: () => this.take(),
            return: async () => {
                this.abort();
                return { value: undefined, done: true };
            },
        };
    }

    private releaseWaiters(): void {
        for (const waiter of this.waiters.splice(0)) {
            waiter({ value: undefined, done: true });
        }
    }

    private settleDrained(): void {
        for (const listener of this.drainListeners.splice(0)) listener();
    }
}
