/**
 * Notify — Broadcast Wake-Up for Async Waiters
 *
 * A waiter calls `notified()` and suspends until the next
 * `notifyWaiters()`. Only waiters present at the moment of the
 * broadcast are woken; a broadcast with nobody waiting is lost. Readers
 * that need the latest value therefore re-read shared state after waking
 * (last value wins, nothing is replayed).
 *
 * @example
 * ```typescript
 * const changed = new Notify();
 * let tick = 0;
 *
 * setInterval(() => { tick++; changed.notifyWaiters(); }, 1000);
 *
 * while (await changed.notified()) {
 *     console.log(tick);
 * }
 * ```
 *
 * @module
 */

export class Notify {
    private _waiters: Array<(woken: boolean) => void> = [];
    private _closed = false;

    /** `true` once {@link close} was called. */
    get closed(): boolean {
        return this._closed;
    }

    /** Number of waiters currently suspended. */
    get waiting(): number {
        return this._waiters.length;
    }

    /**
     * Wait for the next broadcast.
     *
     * @returns `true` when woken by {@link notifyWaiters}, `false` when closed
     */
    notified(): Promise<boolean> {
        if (this._closed) return Promise.resolve(false);
        return new Promise<boolean>((resolve) => {
            this._waiters.push(resolve);
        });
    }

    /** Wake every current waiter. */
    notifyWaiters(): void {
        const waiters = this._waiters;
        this._waiters = [];
        for (const wake of waiters) wake(true);
    }

    /** Release every waiter with `false`; later waits return `false` at once. */
    close(): void {
        if (this._closed) return;
        this._closed = true;
        const waiters = this._waiters;
        this._waiters = [];
        for (const wake of waiters) wake(false);
    }
}
