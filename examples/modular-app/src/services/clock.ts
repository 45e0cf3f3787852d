/**
 * Clock — a shared tick counter streamed to every subscriber.
 *
 * A periodic task owned by the handler increments the counter and wakes
 * all current subscribers. Each subscriber sends the value it reads at
 * that moment, so a slow one skips ticks but never sees the counter go
 * backwards.
 */
import {
    Notify,
    PeriodicTask,
    type RequestOf,
    type ResponseStream,
    type RpcChannel,
    type RpcClient,
    type ServerStreaming,
} from '@strand-rpc/core';

// ── Messages ─────────────────────────────────────────────

export type TickRequest = Record<string, never>;

export interface TickResponse {
    readonly tick: number;
}

export type ClockService = {
    tick: ServerStreaming<TickRequest, TickResponse>;
};

// ── Server ───────────────────────────────────────────────

export interface ClockOptions {
    /** Milliseconds between ticks. */
    readonly intervalMs: number;
}

export class ClockHandler {
    private _tick = 0;
    private readonly _changed = new Notify();
    private readonly _task: PeriodicTask;

    constructor(options: ClockOptions) {
        this._task = new PeriodicTask(() => {
            this._tick++;
            this._changed.notifyWaiters();
        }, { intervalMs: options.intervalMs }).start();
    }

    /** The counter as it is now. */
    get current(): number {
        return this._tick;
    }

    handle(request: RequestOf<ClockService>, channel: RpcChannel<ClockService>): Promise<void> {
        // `tick` is the only variant
        return channel.serverStreaming(request, this, ClockHandler.tick);
    }

    static async *tick(self: ClockHandler): AsyncGenerator<TickResponse> {
        for (;;) {
            yield { tick: self._tick };
            if (!(await self._changed.notified())) return;
        }
    }

    /** Stop ticking and end every subscription. */
    close(): void {
        this._task.stop();
        this._changed.close();
    }
}

// ── Client ───────────────────────────────────────────────

export class ClockClient {
    constructor(private readonly _client: RpcClient<ClockService>) {}

    tick(): Promise<ResponseStream<TickResponse>> {
        return this._client.serverStreaming('tick', {});
    }
}
