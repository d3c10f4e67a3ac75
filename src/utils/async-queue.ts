/**
 * Asterisk WS Kit — Async Queue
 *
 * Single-consumer channel between a callback-driven producer (socket
 * events) and an `for await` consumer. Items pushed before anyone reads
 * are buffered; `end()` lets the consumer drain what is buffered and
 * then finish, or fail with the given error.
 */

interface Waiter<T> {
    resolve: (result: IteratorResult<T>) => void;
    reject: (error: Error) => void;
}

export class AsyncQueue<T> implements AsyncIterable<T>, AsyncIterator<T> {
    private readonly items: T[] = [];
    private readonly waiters: Waiter<T>[] = [];
    private ended = false;
    private failure: Error | null = null;

    /**
     * @param onReturn - called once when the consumer stops early (`break`)
     */
    constructor(private readonly onReturn?: () => void) {}

    /** Number of buffered items not yet read */
    get size(): number {
        return this.items.length;
    }

    get isEnded(): boolean {
        return this.ended;
    }

    /** Returns false once the queue has ended; the item is then discarded */
    push(item: T): boolean {
        if (this.ended) return false;

        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.resolve({ value: item, done: false });
        } else {
            this.items.push(item);
        }
        return true;
    }

    /** Take the oldest buffered item without waiting */
    shift(): T | undefined {
        return this.items.shift();
    }

    end(error?: Error): void {
        if (this.ended) return;
        this.ended = true;
        this.failure = error ?? null;

        for (const waiter of this.waiters.splice(0)) {
            if (this.failure) {
                waiter.reject(this.failure);
            } else {
                waiter.resolve({ value: undefined, done: true });
            }
        }
    }

    next(): Promise<IteratorResult<T>> {
        if (this.items.length > 0) {
            const value = this.items.shift();
            if (value !== undefined) {
                return Promise.resolve({ value, done: false });
            }
        }
        if (this.ended) {
            return this.failure
                ? Promise.reject(this.failure)
                : Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve, reject) => {
            this.waiters.push({ resolve, reject });
        });
    }

    return(): Promise<IteratorResult<T>> {
        if (!this.ended) {
            this.items.length = 0;
            this.end();
            this.onReturn?.();
        }
        return Promise.resolve({ value: undefined, done: true });
    }

    [Symbol.asyncIterator](): AsyncIterator<T> {
        return this;
    }
}
