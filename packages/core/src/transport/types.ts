/**
 * Transport contracts — the boundary every substrate implements.
 *
 * A **connection** (client side) opens logical channels; an **endpoint**
 * (server side) accepts them. A channel is a pair of independent halves:
 * a {@link SendSink} and a {@link RecvStream}. Channels carry no
 * user-visible id and never share state with one another.
 *
 * Implementations must preserve message order and boundaries within one
 * channel, and support half-close: ending one direction leaves the other
 * open.
 *
 * Implementations:
 *   - Memory transport: in-process pipes (`createMemoryTransport`)
 *   - NDJSON transport: frames over a Node byte stream (`@strand-rpc/ndjson`)
 *   - Adapters: `BoxedConnection`, `MappedConnection` (own no resources)
 *
 * @module
 */
import type { RpcErrorPayload } from '../errors/RpcError.js';
import type { RequestOf, ResponseOf, Service } from '../service/Service.js';

/**
 * Sending half of a channel.
 */
export interface SendSink<T> {
    /**
     * Send one message. Resolves once the transport has taken it;
     * a slow peer therefore throttles the sender.
     *
     * @throws {ConnectionClosedError} The peer dropped its receiving half
     */
    send(message: T): Promise<void>;

    /** Half-close: no more messages in this direction. Idempotent. */
    close(): Promise<void>;

    /**
     * Half-close with a terminal error. The peer's receive stream throws
     * the reconstituted error after any messages already sent.
     */
    error(reason: RpcErrorPayload): Promise<void>;
}

/**
 * Receiving half of a channel.
 *
 * Iterating with `for await` closes the stream when the loop exits,
 * including on `break`.
 */
export interface RecvStream<T> extends AsyncIterable<T> {
    /**
     * Next message, or `{ done: true }` once the peer half-closed.
     * Rejects with the terminal error if the peer sent one.
     */
    recv(): Promise<IteratorResult<T, undefined>>;

    /**
     * Drop the receiving half. The peer's next `send` fails with
     * `ConnectionClosedError`. Idempotent.
     */
    close(): void;
}

/** A logical channel: what this side sends, what this side receives. */
export type Channel<TIn, TOut> = readonly [SendSink<TOut>, RecvStream<TIn>];

/**
 * Client-side capability to open logical channels to a peer.
 *
 * @typeParam TIn - What the client receives (responses)
 * @typeParam TOut - What the client sends (requests)
 */
export interface Connection<TIn, TOut> {
    /** Transport family, e.g. `'memory'` or `'ndjson'`. */
    readonly kind: string;

    /** Open a fresh logical channel. */
    open(): Promise<Channel<TIn, TOut>>;
}

/**
 * Server-side capability to accept logical channels.
 *
 * @typeParam TIn - What the server receives (requests)
 * @typeParam TOut - What the server sends (responses)
 */
export interface Endpoint<TIn, TOut> {
    readonly kind: string;

    /**
     * Wait for the next inbound channel. Resolves `undefined` once the
     * endpoint can produce no more channels.
     */
    accept(): Promise<Channel<TIn, TOut> | undefined>;
}

/** A connection speaking the wire types of service `S`. */
export type ServiceConnection<S extends Service> = Connection<ResponseOf<S>, RequestOf<S>>;

/** An endpoint speaking the wire types of service `S`. */
export type ServiceEndpoint<S extends Service> = Endpoint<RequestOf<S>, ResponseOf<S>>;
