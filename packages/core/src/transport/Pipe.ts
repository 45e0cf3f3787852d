/**
 * Pipe — Bounded In-Process Message Pipe
 *
 * An ordered single-consumer queue with backpressure, half-close,
 * terminal errors and receiver drop. The building block of the memory
 * transport, and handy anywhere a producer must be throttled by its
 * consumer.
 *
 *   ┌──────────┐  send()   ┌──────────────┐  recv()   ┌────────────┐
 *   │  sender  ├──────────►│ buffer (cap) ├──────────►│  receiver  │
 *   └──────────┘  waits    └──────────────┘           └────────────┘
 *                 when full
 *
 * - `capacity: 0` is a rendezvous: `send` resolves when a reader takes
 *   the message.
 * - `capacity: Infinity` never blocks the sender.
 * - Dropping the receiver rejects pending and future sends with
 *   `ConnectionClosedError`; this is how cancellation propagates.
 *
 * @module
 */
import {
    ConnectionClosedError,
    RpcError,
    TransportError,
    type RpcErrorPayload,
} from '../errors/RpcError.js';
import type { RecvStream, SendSink } from './types.js';

// ── Internal State ───────────────────────────────────────

interface PendingSend<T> {
    readonly message: T;
    readonly resolve: () => void;
    readonly reject: (reason: Error) => void;
}

interface PendingRecv<T> {
    readonly resolve: (result: IteratorResult<T, undefined>) => void;
    readonly reject: (reason: Error) => void;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

class PipeCore<T> {
    private readonly _buffer: Array<{ readonly message: T }> = [];
    private readonly _senders: Array<PendingSend<T>> = [];
    private readonly _receivers: Array<PendingRecv<T>> = [];
    private _senderClosed = false;
    private _receiverClosed = false;
    private _failure: RpcError | undefined;

    constructor(private readonly _capacity: number) {}

    get senderClosed(): boolean {
        return this._senderClosed;
    }

    get receiverClosed(): boolean {
        return this._receiverClosed;
    }

    send(message: T): Promise<void> {
        if (this._receiverClosed) {
            return Promise.reject(new ConnectionClosedError('Receiver dropped the channel.'));
        }
        if (this._senderClosed) {
            return Promise.reject(new TransportError('Channel is already closed for sending.'));
        }

        const reader = this._receivers.shift();
        if (reader) {
            reader.resolve({ done: false, value: message });
            return Promise.resolve();
        }

        if (this._buffer.length < this._capacity) {
            this._buffer.push({ message });
            return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
            this._senders.push({ message, resolve, reject });
        });
    }

    offer(message: T): boolean {
        if (this._receiverClosed || this._senderClosed) return false;
        const reader = this._receivers.shift();
        if (reader) {
            reader.resolve({ done: false, value: message });
            return true;
        }
        if (this._buffer.length < this._capacity) {
            this._buffer.push({ message });
            return true;
        }
        return false;
    }

    recv(): Promise<IteratorResult<T, undefined>> {
        if (this._receiverClosed) return Promise.resolve(DONE);

        const buffered = this._buffer.shift();
        if (buffered) {
            this._admitPendingSender();
            return Promise.resolve({ done: false, value: buffered.message });
        }

        // Rendezvous / overfull: take straight from a waiting sender
        const sender = this._senders.shift();
        if (sender) {
            sender.resolve();
            return Promise.resolve({ done: false, value: sender.message });
        }

        if (this._failure) return Promise.reject(this._failure);
        if (this._senderClosed) return Promise.resolve(DONE);

        return new Promise((resolve, reject) => {
            this._receivers.push({ resolve, reject });
        });
    }

    closeSender(): void {
        if (this._senderClosed) return;
        this._senderClosed = true;
        // Readers only wait on an empty buffer, so they all see the end
        for (const reader of this._receivers.splice(0)) {
            reader.resolve(DONE);
        }
    }

    fail(error: RpcError): void {
        if (this._senderClosed) return;
        this._senderClosed = true;
        this._failure = error;
        for (const reader of this._receivers.splice(0)) {
            reader.reject(error);
        }
    }

    closeReceiver(discard?: (message: T) => void): void {
        if (this._receiverClosed) return;
        this._receiverClosed = true;
        for (const entry of this._buffer.splice(0)) {
            discard?.(entry.message);
        }
        const dropped = new ConnectionClosedError('Receiver dropped the channel.');
        for (const sender of this._senders.splice(0)) {
            sender.reject(dropped);
        }
        for (const reader of this._receivers.splice(0)) {
            reader.resolve(DONE);
        }
    }

    private _admitPendingSender(): void {
        const sender = this._senders.shift();
        if (!sender) return;
        this._buffer.push({ message: sender.message });
        sender.resolve();
    }
}

// ── Public Halves ────────────────────────────────────────

/** Sending half of a {@link pipe}. */
export class PipeSender<T> implements SendSink<T> {
    /** @internal */
    constructor(private readonly _core: PipeCore<T>) {}

    /** `true` once the receiving half was dropped. */
    get isDropped(): boolean {
        return this._core.receiverClosed;
    }

    send(message: T): Promise<void> {
        return this._core.send(message);
    }

    /**
     * Send without waiting.
     *
     * @returns `false` when the pipe is full or either half is closed
     */
    offer(message: T): boolean {
        return this._core.offer(message);
    }

    async close(): Promise<void> {
        this.end();
    }

    /** Half-close without waiting (in-process shortcut for {@link close}). */
    end(): void {
        this._core.closeSender();
    }

    async error(reason: RpcErrorPayload): Promise<void> {
        this._core.fail(RpcError.fromPayload(reason));
    }

    /** Terminate with an already constructed error (in-process shortcut). */
    fail(error: RpcError): void {
        this._core.fail(error);
    }
}

/** Receiving half of a {@link pipe}. */
export class PipeReceiver<T> implements RecvStream<T> {
    /** @internal */
    constructor(private readonly _core: PipeCore<T>) {}

    recv(): Promise<IteratorResult<T, undefined>> {
        return this._core.recv();
    }

    /**
     * Drop the receiving half.
     *
     * @param discard - Called with every buffered message that will never be read
     */
    close(discard?: (message: T) => void): void {
        this._core.closeReceiver(discard);
    }

    async *[Symbol.asyncIterator](): AsyncIterator<T> {
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

// ── Factory ──────────────────────────────────────────────

/**
 * Create a pipe and return its two halves.
 *
 * @param capacity - Messages buffered before `send` waits (default `1`)
 *
 * @example
 * ```typescript
 * const [tx, rx] = pipe<number>(2);
 * await tx.send(1);
 * await tx.close();
 * for await (const n of rx) console.log(n); // 1
 * ```
 */
export function pipe<T>(capacity = 1): [PipeSender<T>, PipeReceiver<T>] {
    const core = new PipeCore<T>(Math.max(0, capacity));
    return [new PipeSender(core), new PipeReceiver(core)];
}
