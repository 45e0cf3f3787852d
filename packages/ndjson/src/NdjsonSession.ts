/**
 * NdjsonSession — channel multiplexer over one pair of Node streams.
 *
 *   input  ──readline──► decodeFrame ──► channel table ──► inbound pipes
 *   output ◄──write/drain── encodeFrame ◄── NdjsonSendSink ◄── credit ◄── ack
 *
 * Each channel direction runs on credit: a sender starts with
 * `CHANNEL_WINDOW` and spends one per message; the receiver returns
 * credit with `ack` frames once its reader has consumed the messages.
 * A reader that stops reading therefore stalls only its own channel's
 * producer, and an inbound pipe never holds more than a window.
 *
 * @module
 * @internal
 */
import { once } from 'node:events';
import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { z } from 'zod';
import {
    ConnectionClosedError,
    RpcError,
    SerializationError,
    TransportError,
    pipe,
    type Channel,
    type DebugObserverFn,
    type PipeReceiver,
    type PipeSender,
    type RecvStream,
    type RpcErrorPayload,
    type SendSink,
} from '@strand-rpc/core';
import { ACK_BATCH, CHANNEL_WINDOW, decodeFrame, encodeFrame, type Frame } from './frames.js';

// ── Configuration ────────────────────────────────────────

/**
 * Options of an NDJSON connection or endpoint.
 *
 * @typeParam TIn - The messages this side receives
 */
export interface NdjsonOptions<TIn> {
    /** Where frames are read from (socket, child stdout, `process.stdin`). */
    readonly input: Readable;

    /** Where frames are written to. */
    readonly output: Writable;

    /**
     * Validates every inbound message. A message that fails terminates
     * its channel with `SerializationError` and drops it at the peer.
     * Without a schema the peer is trusted.
     */
    readonly schema?: z.ZodType<TIn, z.ZodTypeDef, unknown> | undefined;

    /** Receives `decode` errors for lines that are skipped. */
    readonly debug?: DebugObserverFn | undefined;
}

export type Role = 'connection' | 'endpoint';

// ── Per-Channel State ────────────────────────────────────

export interface ChannelState<TIn> {
    readonly inbound: PipeSender<TIn>;
    /** The peer dropped its receiving half: our sends must fail. */
    remoteDropped: boolean;
    sendDone: boolean;
    recvDone: boolean;
    /** Messages we may send before the peer acknowledges more. */
    credit: number;
    /** Sends waiting for credit; woken to re-check the state. */
    readonly waiters: Array<() => void>;
    /** Messages our reader took since the last `ack`. */
    consumed: number;
}

/** Sending half of one NDJSON channel. */
class NdjsonSendSink<TIn, TOut> implements SendSink<TOut> {
    constructor(
        private readonly _session: NdjsonSession<TIn, TOut>,
        private readonly _ch: number,
    ) {}

    async send(message: TOut): Promise<void> {
        await this._session.acquire(this._ch);
        await this._session.write({ op: 'msg', ch: this._ch, data: message });
    }

    async close(): Promise<void> {
        await this._finish({ op: 'end', ch: this._ch });
    }

    async error(reason: RpcErrorPayload): Promise<void> {
        await this._finish({ op: 'error', ch: this._ch, error: reason });
    }

    private async _finish(frame: Frame): Promise<void> {
        const state = this._session.state(this._ch);
        if (!state || state.sendDone) return;
        state.sendDone = true;
        try {
            await this._session.write(frame);
        } finally {
            this._session.release(this._ch);
        }
    }
}

/** Receiving half of one NDJSON channel. Dropping it tells the peer. */
class NdjsonRecvStream<TIn, TOut> implements RecvStream<TIn> {
    constructor(
        private readonly _session: NdjsonSession<TIn, TOut>,
        private readonly _ch: number,
        private readonly _inbound: PipeReceiver<TIn>,
    ) {}

    async recv(): Promise<IteratorResult<TIn, undefined>> {
        const next = await this._inbound.recv();
        if (!next.done) this._session.consumed(this._ch);
        return next;
    }

    close(): void {
        this._inbound.close();
        this._session.drop(this._ch);
    }

    async *[Symbol.asyncIterator](): AsyncIterator<TIn> {
        try {
            for (;;) {
                const next = await this.recv();
                if (next.done) return;
                yield next.value;
            }
        } finally {
            this.close();
        }
    }
}

// ── Session ──────────────────────────────────────────────

export class NdjsonSession<TIn, TOut> {
    private readonly _channels = new Map<number, ChannelState<TIn>>();
    private readonly _lines: Interface;
    private readonly _accepts: readonly [PipeSender<Channel<TIn, TOut>>, PipeReceiver<Channel<TIn, TOut>>];
    private _nextId = 0;
    /** Every channel id below this one was already seen by the endpoint. */
    private _seenBelow = 0;
    /** Ids at or above `_seenBelow` that arrived ahead of a lower one. */
    private readonly _seenAhead = new Set<number>();
    private _ended = false;

    constructor(
        private readonly _role: Role,
        private readonly _options: NdjsonOptions<TIn>,
    ) {
        this._accepts = pipe<Channel<TIn, TOut>>(Infinity);
        this._lines = createInterface({ input: _options.input, crlfDelay: Infinity });
        this._lines.on('line', (line) => this._onLine(line));
        this._lines.on('close', () => this._onEnd());
    }

    get ended(): boolean {
        return this._ended;
    }

    // ── Connection Side ──────────────────────────────────

    open(): Channel<TIn, TOut> {
        if (this._ended) throw new ConnectionClosedError('NDJSON input has ended.');
        const ch = this._nextId++;
        return this._register(ch);
    }

    // ── Endpoint Side ────────────────────────────────────

    async accept(): Promise<Channel<TIn, TOut> | undefined> {
        const next = await this._accepts[1].recv();
        return next.done ? undefined : next.value;
    }

    /** Stop reading: every open channel fails, `accept()` finishes. */
    close(): void {
        this._lines.close();
    }

    // ── Shared ───────────────────────────────────────────

    /** @internal */
    state(ch: number): ChannelState<TIn> | undefined {
        return this._channels.get(ch);
    }

    /** @internal */
    async write(frame: Frame): Promise<void> {
        const { output } = this._options;
        if (output.destroyed || output.writableEnded) {
            throw new TransportError('NDJSON output is closed.');
        }
        const line = encodeFrame(frame);
        if (!output.write(line)) {
            try {
                await once(output, 'drain');
            } catch (err) {
                throw new TransportError('NDJSON output failed while draining.', { cause: err });
            }
        }
    }

    /**
     * Take one unit of send credit on `ch`, waiting for an `ack` when
     * the window is spent.
     *
     * @throws {ConnectionClosedError} The peer dropped the channel, also while waiting
     * @throws {TransportError} Our sending half is already closed
     * @internal
     */
    async acquire(ch: number): Promise<void> {
        for (;;) {
            const state = this._channels.get(ch);
            if (!state || state.remoteDropped) {
                throw new ConnectionClosedError(`Peer dropped channel ${ch}.`);
            }
            if (state.sendDone) {
                throw new TransportError(`Channel ${ch} is already closed for sending.`);
            }
            if (state.credit > 0) {
                state.credit--;
                return;
            }
            await new Promise<void>((resolve) => state.waiters.push(resolve));
        }
    }

    /** Our reader took one message of `ch`: return credit in batches. @internal */
    consumed(ch: number): void {
        const state = this._channels.get(ch);
        // After the peer's end nothing more arrives, so no credit is owed
        if (!state || state.recvDone) return;
        state.consumed++;
        if (state.consumed < ACK_BATCH || this._ended) return;
        const n = state.consumed;
        state.consumed = 0;
        void this.write({ op: 'ack', ch, n }).catch((err: unknown) => {
            this._report(`ack for channel ${ch} not written: ${RpcError.from(err).message}`);
        });
    }

    /** Our receiving half was dropped: tell the peer unless the channel already ended. @internal */
    drop(ch: number): void {
        const state = this._channels.get(ch);
        if (!state || state.recvDone) return;
        state.recvDone = true;
        this.release(ch);
        if (this._ended) return;
        void this.write({ op: 'drop', ch }).catch((err: unknown) => {
            this._report(`drop frame for channel ${ch} not written: ${RpcError.from(err).message}`);
        });
    }

    /** Forget a channel once both directions are done. @internal */
    release(ch: number): void {
        const state = this._channels.get(ch);
        if (state && state.sendDone && state.recvDone) {
            this._channels.delete(ch);
        }
    }

    // ── Private ──────────────────────────────────────────

    private _register(ch: number): Channel<TIn, TOut> {
        // Credit bounds what a well-behaved peer can queue here
        const [inboundTx, inboundRx] = pipe<TIn>(Infinity);
        this._channels.set(ch, {
            inbound: inboundTx,
            remoteDropped: false,
            sendDone: false,
            recvDone: false,
            credit: CHANNEL_WINDOW,
            waiters: [],
            consumed: 0,
        });
        return [new NdjsonSendSink(this, ch), new NdjsonRecvStream(this, ch, inboundRx)];
    }

    private _onLine(line: string): void {
        if (line.trim() === '') return;
        const decoded = decodeFrame(line);
        if (!decoded.ok) {
            this._report(decoded.reason);
            return;
        }
        const frame = decoded.value;

        let state = this._channels.get(frame.ch);
        if (!state && frame.op === 'msg' && this._role === 'endpoint' && this._isUnseen(frame.ch)) {
            this._markSeen(frame.ch);
            const channel = this._register(frame.ch);
            if (!this._accepts[0].offer(channel)) {
                this._refuse(frame.ch);
                return;
            }
            state = this._channels.get(frame.ch);
        }
        // Frames for channels that are gone (or never were) are ignored
        if (!state) return;

        switch (frame.op) {
            case 'msg':
                this._deliver(frame.ch, state, frame.data);
                break;
            case 'end':
                state.inbound.end();
                state.recvDone = true;
                this.release(frame.ch);
                break;
            case 'error':
                state.inbound.fail(RpcError.fromPayload(frame.error));
                state.recvDone = true;
                this.release(frame.ch);
                break;
            case 'drop':
                state.remoteDropped = true;
                state.sendDone = true;
                this._wake(state);
                this.release(frame.ch);
                break;
            case 'ack':
                state.credit += frame.n;
                this._wake(state);
                break;
        }
    }

    private _isUnseen(ch: number): boolean {
        return ch >= this._seenBelow && !this._seenAhead.has(ch);
    }

    private _markSeen(ch: number): void {
        this._seenAhead.add(ch);
        while (this._seenAhead.delete(this._seenBelow)) this._seenBelow++;
    }

    private _wake(state: ChannelState<TIn>): void {
        for (const wake of state.waiters.splice(0)) wake();
    }

    private _deliver(ch: number, state: ChannelState<TIn>, data: unknown): void {
        const { schema } = this._options;
        let message: TIn;
        if (schema) {
            const parsed = schema.safeParse(data);
            if (!parsed.success) {
                state.inbound.fail(new SerializationError(
                    `Channel ${ch}: invalid message: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
                ));
                this.drop(ch);
                return;
            }
            message = parsed.data;
        } else {
            // Trusted peer: the schema is the only runtime check
            message = data as TIn;
        }
        // A locally dropped channel discards late messages
        state.inbound.offer(message);
    }

    /** The endpoint no longer accepts: tell the peer its channel is gone. */
    private _refuse(ch: number): void {
        const error = new ConnectionClosedError('NDJSON endpoint is closed.');
        this._channels.delete(ch);
        void this.write({ op: 'error', ch, error: error.toPayload() }).catch((err: unknown) => {
            this._report(`refusal for channel ${ch} not written: ${RpcError.from(err).message}`);
        });
    }

    private _onEnd(): void {
        if (this._ended) return;
        this._ended = true;
        const closed = new ConnectionClosedError('NDJSON input ended.');
        for (const state of this._channels.values()) {
            state.remoteDropped = true;
            state.inbound.fail(closed);
            this._wake(state);
        }
        this._channels.clear();
        this._accepts[0].end();
    }

    private _report(reason: string): void {
        const event = {
            type: 'error',
            method: 'ndjson',
            error: reason,
            step: 'decode',
            timestamp: Date.now(),
        } as const;
        if (this._options.debug) {
            this._options.debug(event);
        } else {
            console.warn(`[strand-rpc] ndjson: ${reason}`);
        }
    }
}
