/**
 * RpcClient — Typed Client Handle
 *
 * Turns a `ServiceConnection<S>` into typed calls. Each call opens its
 * own logical channel, so one client may be shared freely between
 * concurrent callers; the handle itself holds no state beyond the
 * connection.
 *
 * Methods are filtered by pattern at compile time: `rpc('sum', …)` does
 * not type-check when `sum` is declared `ClientStreaming`.
 *
 * @example
 * ```typescript
 * const app = new RpcClient<AppService>(transport.connection);
 * const calc = app.map('platform').map('calc');
 *
 * const { sum } = await calc.rpc('add', { a: 2, b: 3 });        // 5
 *
 * const ticks = await app.map('platform').map('clock').serverStreaming('tick', {});
 * for await (const { tick } of ticks) {
 *     if (tick > 3) break;  // drops the stream: the server stops producing
 * }
 * ```
 *
 * @module
 */
import { ConnectionClosedError, MappingError, RpcError } from '../errors/RpcError.js';
import type {
    ChildService,
    MethodName,
    MethodsOf,
    RequestOf,
    RequestPayload,
    ResponseOf,
    ResponsePayload,
    Service,
    UpdatePayload,
} from '../service/Service.js';
import {
    unwrapChildResponse,
    unwrapResponse,
    wrapChildRequest,
    wrapRequest,
    wrapUpdate,
} from '../service/variant.js';
import { BoxedConnection } from '../transport/boxed.js';
import { MappedConnection, MappedRecvStream, MappedSendSink } from '../transport/mapped.js';
import type { RecvStream, SendSink, ServiceConnection } from '../transport/types.js';

// ============================================================================
// Call Handles
// ============================================================================

/**
 * Responses of a streaming call, in order.
 *
 * Ends when the server closes its half; a server-side failure is thrown
 * from the iterator after the last item. Leaving a `for await` loop
 * early, or calling `close()`, cancels the call.
 */
export type ResponseStream<TResponse> = RecvStream<TResponse>;

/** Where a streaming client writes its updates. `close()` ends the updates. */
export type UpdateSink<TUpdate> = SendSink<TUpdate>;

/** An in-flight client-streaming call. */
export interface ClientStreamingCall<TUpdate, TResponse> {
    readonly updates: UpdateSink<TUpdate>;
    /** The single final response; sent by the server once it is done reading. */
    response(): Promise<TResponse>;
}

/** An in-flight bidirectional call. */
export interface BidiStreamingCall<TUpdate, TResponse> {
    readonly updates: UpdateSink<TUpdate>;
    readonly responses: ResponseStream<TResponse>;
}

// ============================================================================
// Client
// ============================================================================

/**
 * Typed client for service `S`.
 *
 * @typeParam S - The service descriptor type
 */
export class RpcClient<S extends Service> {
    constructor(private readonly _connection: ServiceConnection<S>) {}

    /** The underlying connection. */
    get connection(): ServiceConnection<S> {
        return this._connection;
    }

    // ── Patterns ─────────────────────────────────────────

    /**
     * Unary call: one request, one response.
     *
     * @throws {ConnectionClosedError} The server ended the channel without answering
     * @throws {MappingError} The response belongs to another method
     * @throws {HandlerError} The server's handler failed
     */
    async rpc<K extends MethodsOf<S, 'rpc'>>(
        method: K,
        request: RequestPayload<S[K]>,
    ): Promise<ResponsePayload<S[K]>> {
        const [sink, stream] = await this._connection.open();
        try {
            await sink.send(wrapRequest<S, K>(method, request));
            await sink.close();
            return await this._single(method, stream);
        } catch (err) {
            throw RpcError.from(err);
        } finally {
            stream.close();
        }
    }

    /**
     * Server-streaming call: one request, a stream of responses.
     *
     * The request direction is closed right after the request is sent.
     */
    async serverStreaming<K extends MethodsOf<S, 'server-streaming'>>(
        method: K,
        request: RequestPayload<S[K]>,
    ): Promise<ResponseStream<ResponsePayload<S[K]>>> {
        const [sink, stream] = await this._connection.open();
        try {
            await sink.send(wrapRequest<S, K>(method, request));
            await sink.close();
        } catch (err) {
            stream.close();
            throw RpcError.from(err);
        }
        return this._responses(method, stream);
    }

    /**
     * Client-streaming call: one request, then updates, then one response.
     *
     * @example
     * ```typescript
     * const call = await calc.clientStreaming('sum', {});
     * for (const n of [1, 2, 3]) await call.updates.send(n);
     * await call.updates.close();
     * await call.response();  // { total: 6 }
     * ```
     */
    async clientStreaming<K extends MethodsOf<S, 'client-streaming'>>(
        method: K,
        request: RequestPayload<S[K]>,
    ): Promise<ClientStreamingCall<UpdatePayload<S[K]>, ResponsePayload<S[K]>>> {
        const [sink, stream] = await this._connection.open();
        try {
            await sink.send(wrapRequest<S, K>(method, request));
        } catch (err) {
            stream.close();
            throw RpcError.from(err);
        }

        let pending: Promise<ResponsePayload<S[K]>> | undefined;
        const read = async (): Promise<ResponsePayload<S[K]>> => {
            try {
                return await this._single(method, stream);
            } catch (err) {
                throw RpcError.from(err);
            } finally {
                stream.close();
            }
        };

        return {
            updates: this._updates(method, sink),
            response: () => (pending ??= read()),
        };
    }

    /**
     * Bidirectional call: one request, then updates and responses
     * interleaved. Each direction closes independently.
     */
    async bidiStreaming<K extends MethodsOf<S, 'bidi-streaming'>>(
        method: K,
        request: RequestPayload<S[K]>,
    ): Promise<BidiStreamingCall<UpdatePayload<S[K]>, ResponsePayload<S[K]>>> {
        const [sink, stream] = await this._connection.open();
        try {
            await sink.send(wrapRequest<S, K>(method, request));
        } catch (err) {
            stream.close();
            throw RpcError.from(err);
        }
        return {
            updates: this._updates(method, sink),
            responses: this._responses(method, stream),
        };
    }

    // ── Composition ──────────────────────────────────────

    /**
     * Client for the child service nested under `method`.
     *
     * Child requests are widened into this service's request union and
     * responses narrowed back; a response for another child surfaces as
     * `MappingError`.
     */
    map<K extends MethodsOf<S, 'nested'>>(method: K): RpcClient<ChildService<S[K]>> {
        const connection = new MappedConnection<
            ResponseOf<S>, RequestOf<S>,
            ResponseOf<ChildService<S[K]>>, RequestOf<ChildService<S[K]>>
        >(
            this._connection,
            (request) => wrapChildRequest<S, K>(method, request),
            (response) => unwrapChildResponse<S, K>(method, response),
            method,
        );
        return new RpcClient<ChildService<S[K]>>(connection);
    }

    /** The same client over a boxed connection. */
    boxed(): RpcClient<S> {
        return new RpcClient<S>(BoxedConnection.of(this._connection));
    }

    // ── Private ──────────────────────────────────────────

    private async _single<K extends MethodName<S>>(
        method: K,
        stream: RecvStream<ResponseOf<S>>,
    ): Promise<ResponsePayload<S[K]>> {
        const next = await stream.recv();
        if (next.done) {
            throw new ConnectionClosedError(`${method}: channel closed before a response arrived.`);
        }
        const response = unwrapResponse<S, K>(method, next.value);
        if (!response.ok) throw new MappingError(`${method}: ${response.reason}`);
        return response.value;
    }

    private _responses<K extends MethodName<S>>(
        method: K,
        stream: RecvStream<ResponseOf<S>>,
    ): ResponseStream<ResponsePayload<S[K]>> {
        return new MappedRecvStream(stream, (message: ResponseOf<S>) => unwrapResponse<S, K>(method, message), method);
    }

    private _updates<K extends MethodName<S>>(
        method: K,
        sink: SendSink<RequestOf<S>>,
    ): UpdateSink<UpdatePayload<S[K]>> {
        return new MappedSendSink(sink, (update: UpdatePayload<S[K]>) => wrapUpdate<S, K>(method, update));
    }
}
