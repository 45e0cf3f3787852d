/**
 * Mapped adapters — view an outer connection through inner types.
 *
 * Used by composition: a parent's connection carries the parent's
 * unions, the child's code only knows the child's. Outgoing messages
 * are widened (total), incoming ones are narrowed (partial). Adapters own
 * no resources and nest without limit: a mapped connection over a mapped
 * connection is just another mapped connection.
 *
 *   child client ── widen ──►  parent connection  ──► wire
 *   child client ◄─ narrow ──  parent connection  ◄── wire
 *
 * @module
 */
import { MappingError, type RpcErrorPayload } from '../errors/RpcError.js';
import type { Result } from '../service/result.js';
import type { Channel, Connection, RecvStream, SendSink } from './types.js';

/** Total conversion into the outer type. */
export type Widen<TInner, TOuter> = (value: TInner) => TOuter;

/** Partial conversion out of the outer type. */
export type Narrow<TOuter, TInner> = (value: TOuter) => Result<TInner>;

// ── Halves ───────────────────────────────────────────────

/** Sends inner messages by widening them into the wrapped sink. */
export class MappedSendSink<TInner, TOuter> implements SendSink<TInner> {
    constructor(
        private readonly _inner: SendSink<TOuter>,
        private readonly _widen: Widen<TInner, TOuter>,
    ) {}

    send(message: TInner): Promise<void> {
        return this._inner.send(this._widen(message));
    }

    close(): Promise<void> {
        return this._inner.close();
    }

    error(reason: RpcErrorPayload): Promise<void> {
        return this._inner.error(reason);
    }
}

/**
 * Receives outer messages and narrows them.
 *
 * A message that does not narrow rejects `recv()` with `MappingError`;
 * it means the composition routed a foreign variant here.
 */
export class MappedRecvStream<TOuter, TInner> implements RecvStream<TInner> {
    constructor(
        private readonly _inner: RecvStream<TOuter>,
        private readonly _narrow: Narrow<TOuter, TInner>,
        private readonly _label = 'mapped stream',
    ) {}

    async recv(): Promise<IteratorResult<TInner, undefined>> {
        const next = await this._inner.recv();
        if (next.done) return next;
        const narrowed = this._narrow(next.value);
        if (!narrowed.ok) {
            throw new MappingError(`${this._label}: ${narrowed.reason}`);
        }
        return { done: false, value: narrowed.value };
    }

    close(): void {
        this._inner.close();
    }

    async *[Symbol.asyncIterator](): AsyncIterator<TInner> {
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

// ── Connection ───────────────────────────────────────────

/**
 * A connection speaking `TInnerIn`/`TInnerOut` over one that speaks
 * `TOuterIn`/`TOuterOut`.
 *
 * @example
 * ```typescript
 * const calc = new MappedConnection(
 *     platformConnection,
 *     (req) => wrapRequest<PlatformService, 'calc'>('calc', req),
 *     (res) => unwrapResponse<PlatformService, 'calc'>('calc', res),
 *     'calc',
 * );
 * ```
 */
export class MappedConnection<TOuterIn, TOuterOut, TInnerIn, TInnerOut>
    implements Connection<TInnerIn, TInnerOut> {
    readonly kind: string;

    constructor(
        private readonly _inner: Connection<TOuterIn, TOuterOut>,
        private readonly _widen: Widen<TInnerOut, TOuterOut>,
        private readonly _narrow: Narrow<TOuterIn, TInnerIn>,
        private readonly _label = 'mapped',
    ) {
        this.kind = _inner.kind;
    }

    async open(): Promise<Channel<TInnerIn, TInnerOut>> {
        const [sink, stream] = await this._inner.open();
        return [
            new MappedSendSink(sink, this._widen),
            new MappedRecvStream(stream, this._narrow, this._label),
        ];
    }
}
