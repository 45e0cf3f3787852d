/**
 * PeriodicTask — a callback on a fixed interval, owned by whoever starts it.
 *
 * The timer is unref'd: a running task never keeps the process alive on
 * its own. A callback that throws stops the task and reports through
 * `onError` (default: `console.warn`).
 *
 * @module
 */

/** Options for {@link PeriodicTask}. */
export interface PeriodicTaskOptions {
    /** Milliseconds between runs. @minimum 1 */
    readonly intervalMs: number;
    /** Receives a callback failure; the task is stopped before it is called. */
    readonly onError?: ((error: unknown) => void) | undefined;
}

export class PeriodicTask {
    private _timer: ReturnType<typeof setInterval> | undefined;
    private _runs = 0;

    constructor(
        private readonly _callback: () => void,
        private readonly _options: PeriodicTaskOptions,
    ) {}

    /** `true` between {@link start} and {@link stop}. */
    get running(): boolean {
        return this._timer !== undefined;
    }

    /** Completed runs since construction. */
    get runs(): number {
        return this._runs;
    }

    /** Start ticking. A second call while running is a no-op. */
    start(): this {
        if (this._timer) return this;
        const interval = Math.max(1, Math.floor(this._options.intervalMs));
        this._timer = setInterval(() => this._run(), interval);
        this._timer.unref();
        return this;
    }

    /** Stop ticking. Idempotent. */
    stop(): void {
        if (!this._timer) return;
        clearInterval(this._timer);
        this._timer = undefined;
    }

    private _run(): void {
        try {
            this._callback();
            this._runs++;
        } catch (err) {
            this.stop();
            const report = this._options.onError ?? ((error: unknown) => {
                console.warn('[strand-rpc] periodic task stopped:', error);
            });
            report(err);
        }
    }
}
