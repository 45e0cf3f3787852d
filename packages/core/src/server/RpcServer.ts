/**
 * RpcServer — Accepting Typed Channels
 *
 * Wraps a `ServiceEndpoint<S>`. Each `accept()` waits for a channel,
 * reads its first message and returns it together with an
 * {@link RpcChannel} for the rest of the exchange.
 *
 * @example
 * ```typescript
 * const server = new RpcServer<AppService>(transport.endpoint, {
 *     debug: createDebugObserver(),
 * });
 *
 * for (;;) {
 *     const accepted = await server.accept();
 *     if (!accepted) break;
 *     const [request, channel] = accepted;
 *     void handler.handle(request, channel);
 * }
 * ```
 *
 * Most applications use {@link serve} instead of writing this loop.
 *
 * @module
 */
import { ConnectionClosedError, RpcError } from '../errors/RpcError.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import type { RpcTracer } from '../observability/Tracing.js';
import type { RequestOf, Service } from '../service/Service.js';
import { BoxedEndpoint } from '../transport/boxed.js';
import type { ServiceEndpoint } from '../transport/types.js';
import { RpcChannel } from './RpcChannel.js';

/**
 * Server configuration.
 */
export interface RpcServerOptions {
    /**
     * Debug observer receiving `accept`, `dispatch`, `complete` and
     * `error` events. Disabled when omitted.
     *
     * @see {@link createDebugObserver}
     */
    readonly debug?: DebugObserverFn | undefined;

    /**
     * OpenTelemetry-compatible tracer; one span per dispatch.
     *
     * @see {@link RpcTracer}
     */
    readonly tracer?: RpcTracer | undefined;
}

/** A first message and the channel it arrived on. */
export type Accepted<S extends Service> = readonly [RequestOf<S>, RpcChannel<S>];

export class RpcServer<S extends Service> {
    constructor(
        private readonly _endpoint: ServiceEndpoint<S>,
        private readonly _options: RpcServerOptions = {},
    ) {}

    /** The underlying endpoint. */
    get endpoint(): ServiceEndpoint<S> {
        return this._endpoint;
    }

    /** The options this server was created with. */
    get options(): RpcServerOptions {
        return this._options;
    }

    /**
     * Accept the next channel and read its first message.
     *
     * @returns The request and its channel, or `undefined` once the endpoint is finished
     * @throws {ConnectionClosedError} The channel ended before its first message;
     *   only this accept fails, the endpoint stays usable
     */
    async accept(): Promise<Accepted<S> | undefined> {
        const channel = await this._endpoint.accept();
        if (!channel) return undefined;
        const [sink, stream] = channel;

        let first: IteratorResult<RequestOf<S>, undefined>;
        try {
            first = await stream.recv();
        } catch (err) {
            stream.close();
            throw RpcError.from(err);
        }
        if (first.done) {
            stream.close();
            await sink.close();
            throw new ConnectionClosedError('Channel closed before its first message.');
        }

        this._options.debug?.({
            type: 'accept',
            transport: this._endpoint.kind,
            tag: first.value.tag,
            timestamp: Date.now(),
        });

        return [first.value, new RpcChannel<S>(sink, stream, {
            debug: this._options.debug,
            tracer: this._options.tracer,
        })];
    }

    /** The same server over a boxed endpoint. */
    boxed(): RpcServer<S> {
        return new RpcServer<S>(BoxedEndpoint.of(this._endpoint), this._options);
    }
}
