/**
 * NDJSON transport — many logical channels over one Node byte stream.
 *
 * Works over anything that is a `Readable` + `Writable` pair: a TCP
 * socket (`input = output = socket`), a child process's stdio, or the
 * current process's stdin/stdout.
 *
 * @example
 * ```typescript
 * import { connect } from 'node:net';
 * import { RpcClient } from '@strand-rpc/core';
 * import { createNdjsonConnection } from '@strand-rpc/ndjson';
 *
 * const socket = connect(4000);
 * const connection = createNdjsonConnection<AppService>({ input: socket, output: socket });
 * const app = new RpcClient(connection);
 * ```
 *
 * @module
 */
import type {
    Channel,
    Connection,
    Endpoint,
    RequestOf,
    ResponseOf,
    Service,
} from '@strand-rpc/core';
import { NdjsonSession, type NdjsonOptions } from './NdjsonSession.js';

/** Client side of an NDJSON transport. */
export interface NdjsonConnection<TIn, TOut> extends Connection<TIn, TOut> {
    /** Stop reading input; open channels fail with `ConnectionClosedError`. */
    close(): void;
}

/** Server side of an NDJSON transport. */
export interface NdjsonEndpoint<TIn, TOut> extends Endpoint<TIn, TOut> {
    /** Stop reading input; `accept()` resolves `undefined` from then on. */
    close(): void;
}

class NdjsonConnectionImpl<TIn, TOut> implements NdjsonConnection<TIn, TOut> {
    readonly kind = 'ndjson';
    private readonly _session: NdjsonSession<TIn, TOut>;

    constructor(options: NdjsonOptions<TIn>) {
        this._session = new NdjsonSession<TIn, TOut>('connection', options);
    }

    async open(): Promise<Channel<TIn, TOut>> {
        return this._session.open();
    }

    close(): void {
        this._session.close();
    }
}

class NdjsonEndpointImpl<TIn, TOut> implements NdjsonEndpoint<TIn, TOut> {
    readonly kind = 'ndjson';
    private readonly _session: NdjsonSession<TIn, TOut>;

    constructor(options: NdjsonOptions<TIn>) {
        this._session = new NdjsonSession<TIn, TOut>('endpoint', options);
    }

    accept(): Promise<Channel<TIn, TOut> | undefined> {
        return this._session.accept();
    }

    close(): void {
        this._session.close();
    }
}

/**
 * Connect to a peer speaking service `S` over NDJSON.
 *
 * `schema`, when given, validates every response the peer sends.
 */
export function createNdjsonConnection<S extends Service>(
    options: NdjsonOptions<ResponseOf<S>>,
): NdjsonConnection<ResponseOf<S>, RequestOf<S>> {
    return new NdjsonConnectionImpl<ResponseOf<S>, RequestOf<S>>(options);
}

/**
 * Serve service `S` over NDJSON.
 *
 * `schema`, when given, validates every request the peer sends.
 */
export function createNdjsonEndpoint<S extends Service>(
    options: NdjsonOptions<RequestOf<S>>,
): NdjsonEndpoint<RequestOf<S>, ResponseOf<S>> {
    return new NdjsonEndpointImpl<RequestOf<S>, ResponseOf<S>>(options);
}
