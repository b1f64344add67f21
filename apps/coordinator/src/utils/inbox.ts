/**
 * Buffers pushed messages for a single async consumer. `next` resolves with
 * the oldest buffered message, or null once `timeoutMs` passes with none.
 */
export class Inbox<T> {
    private readonly buffered: T[] = [];
    private waiter: ((value: T | null) => void) | null = null;
    private closed = false;

    push(message: T): void {
        if (this.closed) return;
        if (this.waiter) {
            const wake = this.waiter;
            this.waiter = null;
            wake(message);
            return;
        }
        this.buffered.push(message);
    }

    /** Wakes a pending `next` with null; later calls resolve null at once. */
    close(): void {
        this.closed = true;
        this.buffered.length = 0;
        const wake = this.waiter;
        this.waiter = null;
        wake?.(null);
    }

    next(timeoutMs: number): Promise<T | null> {
        if (this.buffered.length > 0) {
            return Promise.resolve(this.buffered.shift() ?? null);
        }
        if (this.closed || timeoutMs <= 0) return Promise.resolve(null);

        return new Promise(resolve => {
            const timer = setTimeout(() => {
                this.waiter = null;
                resolve(null);
            }, timeoutMs);
            this.waiter = (value) => {
                clearTimeout(timer);
                resolve(value);
            };
        });
    }
}
