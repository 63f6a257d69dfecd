/**
 * Single-consumer async queue between a producer (poller, stream handler)
 * and a continuous strategy loop. `next()` waits for an item and returns
 * null once the channel is closed and empty, or when the signal aborts.
 */
export class SignalChannel<T> {
    private readonly items: T[] = [];
    private waiter: (() => void) | null = null;
    private closed = false;

    push(item: T): boolean {
        if (this.closed) return false;
        this.items.push(item);
        this.wake();
        return true;
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

    /** Everything queued right now, without waiting. */
    drain(): T[] {
        return this.items.splice(0, this.items.length);
    }

    async next(signal?: AbortSignal): Promise<T | null> {
        for (;;) {
            const item = this.items.shift();
            if (item !== undefined) return item;
            if (this.closed || signal?.aborted) return null;
            await this.wait(signal);
        }
    }

    private wait(signal?: AbortSignal): Promise<void> {
        return new Promise((resolve) => {
            const done = () => {
                signal?.removeEventListener('abort', done);
                if (this.waiter === done) this.waiter = null;
                resolve();
            };
            this.waiter = done;
            signal?.addEventListener('abort', done, { once: true });
        });
    }

    private wake(): void {
        const waiter = this.waiter;
        this.waiter = null;
        waiter?.();
    }
}
