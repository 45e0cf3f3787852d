/**
 * Boxed adapters — one concrete class for any connection or endpoint.
 *
 * Code that stores connections of different transports side by side
 * (a memory transport in tests, NDJSON in production) can hold a
 * `BoxedConnection<In, Out>` regardless of what sits underneath.
 * Boxing is idempotent and owns nothing.
 *
 * @module
 */
import type { Channel, Connection, Endpoint } from './types.js';

export class BoxedConnection<TIn, TOut> implements Connection<TIn, TOut> {
    private constructor(private readonly _inner: Connection<TIn, TOut>) {}

    /** Box `connection`; an already boxed connection is returned as is. */
    static of<TIn, TOut>(connection: Connection<TIn, TOut>): BoxedConnection<TIn, TOut> {
        return connection instanceof BoxedConnection ? connection : new BoxedConnection(connection);
    }

    get kind(): string {
        return this._inner.kind;
    }

    open(): Promise<Channel<TIn, TOut>> {
        return this._inner.open();
    }
}

export class BoxedEndpoint<TIn, TOut> implements Endpoint<TIn, TOut> {
    private constructor(private readonly _inner: Endpoint<TIn, TOut>) {}

    /** Box `endpoint`; an already boxed endpoint is returned as is. */
    static of<TIn, TOut>(endpoint: Endpoint<TIn, TOut>): BoxedEndpoint<TIn, TOut> {
        return endpoint instanceof BoxedEndpoint ? endpoint : new BoxedEndpoint(endpoint);
    }

    get kind(): string {
        return this._inner.kind;
    }

    accept(): Promise<Channel<TIn, TOut> | undefined> {
        return this._inner.accept();
    }
}
