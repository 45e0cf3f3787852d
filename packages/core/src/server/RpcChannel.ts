/**
 * RpcChannel — Server-Side Dispatch of One Accepted Channel
 *
 * The server reads the first message of a channel and hands the rest of
 * it over as an `RpcChannel`. The application's handler switches on the
 * message's `tag` and resolves it with exactly one of the pattern
 * methods, or delegates a nested variant to a child with `map()`:
 *
 * ```typescript
 * handle(request: RequestOf<CalcService>, channel: RpcChannel<CalcService>) {
 *     switch (request.tag) {
 *         case 'add': return channel.rpc(request, this, CalcHandler.add);
 *         case 'sum': return channel.clientStreaming(request, this, CalcHandler.sum);
 *         default:    return channel.reject(request);
 *     }
 * }
 * ```
 *
 * A channel is consumed exactly once; a second dispatch throws.
 *
 * Failure model:
 * - Handler throws → `HandlerError` sent to the client as the stream's
 *   terminal error, and the returned promise rejects with it (an
 *   `RpcError` the handler throws travels with its own code)
 * - Client dropped its half → dispatch ends quietly (`cancelled`)
 * - Transport fails while sending → the returned promise rejects with it
 *
 * @module
 */
import {
    ConnectionClosedError,
    HandlerError,
    MappingError,
    RpcError,
    messageOf,
} from '../errors/RpcError.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import { SpanStatusCode, type RpcSpan, type RpcTracer } from '../observability/Tracing.js';
import type {
    AnyVariant,
    ChildService,
    MethodName,
    MethodsOf,
    Pattern,
    RequestOf,
    RequestPayload,
    ResponseOf,
    ResponsePayload,
    Service,
    UpdatePayload,
    Variant,
} from '../service/Service.js';
import {
    unwrapChildRequest,
    unwrapUpdate,
    wrapChildResponse,
    wrapResponse,
} from '../service/variant.js';
import { MappedRecvStream, MappedSendSink } from '../transport/mapped.js';
import type { RecvStream, SendSink } from '../transport/types.js';

// ============================================================================
// Handler Types
// ============================================================================

/** Anything a streaming handler may produce responses from. */
export type Producer<T> = AsyncIterable<T> | Iterable<T>;

/** Handler of a unary method. */
export type RpcHandler<TState, TRequest, TResponse> =
    (state: TState, request: TRequest) => TResponse | Promise<TResponse>;

/** Handler of a server-streaming method. */
export type ServerStreamingHandler<TState, TRequest, TResponse> =
    (state: TState, request: TRequest) => Producer<TResponse>;

/** Handler of a client-streaming method. */
export type ClientStreamingHandler<TState, TRequest, TUpdate, TResponse> =
    (state: TState, request: TRequest, updates: AsyncIterable<TUpdate>) => TResponse | Promise<TResponse>;

/** Handler of a bidirectional method. */
export type BidiStreamingHandler<TState, TRequest, TUpdate, TResponse> =
    (state: TState, request: TRequest, updates: AsyncIterable<TUpdate>) => Producer<TResponse>;

/** Observability hooks carried from the server into every channel. */
export interface ChannelHooks {
    readonly debug?: DebugObserverFn | undefined;
    readonly tracer?: RpcTracer | undefined;
    /** Tags of the `Nested` methods this channel was mapped through. */
    readonly path?: readonly string[] | undefined;
}

type LeafPattern = Exclude<Pattern, 'nested'>;

// ============================================================================
// Dispatch Scope (debug + tracing for one dispatch)
// ============================================================================

class DispatchScope {
    items = 0;
    cancelled = false;
    private readonly _span: RpcSpan | undefined;
    private readonly _startTime = performance.now();
    private _ended = false;

    constructor(
        private readonly _hooks: ChannelHooks,
        readonly method: string,
        readonly pattern: LeafPattern,
    ) {
        _hooks.debug?.({ type: 'dispatch', method, pattern, timestamp: Date.now() });
        this._span = _hooks.tracer?.startSpan(`rpc.${pattern}`, {
            attributes: { 'rpc.method': method, 'rpc.pattern': pattern },
        });
    }

    complete(): void {
        if (this._ended) return;
        this._ended = true;
        this._hooks.debug?.({
            type: 'complete',
            method: this.method,
            pattern: this.pattern,
            items: this.items,
            cancelled: this.cancelled,
            durationMs: performance.now() - this._startTime,
            timestamp: Date.now(),
        });
        this._endSpan(SpanStatusCode.OK);
    }

    fail(step: 'handler' | 'send', error: RpcError): void {
        if (this._ended) return;
        this._ended = true;
        this._hooks.debug?.({
            type: 'error',
            method: this.method,
            error: error.message,
            step,
            timestamp: Date.now(),
        });
        this._span?.recordException(error);
        this._endSpan(SpanStatusCode.ERROR, error.message);
    }

    private _endSpan(code: number, message?: string): void {
        const span = this._span;
        if (!span) return;
        span.setAttribute('rpc.items', this.items);
        span.setAttribute('rpc.cancelled', this.cancelled);
        span.setStatus(message !== undefined ? { code, message } : { code });
        span.end();
    }
}

/** Outcome of one send: delivered, refused because the client dropped its half, or failed. */
type SendOutcome = 'sent' | 'dropped' | RpcError;

// ============================================================================
// RpcChannel
// ============================================================================

/**
 * The remainder of an accepted channel, typed for service `S`.
 *
 * @typeParam S - The service this layer of the handler tree implements
 */
export class RpcChannel<S extends Service> {
    private _consumedBy: string | undefined;

    constructor(
        private readonly _sink: SendSink<ResponseOf<S>>,
        private readonly _stream: RecvStream<RequestOf<S>>,
        private readonly _hooks: ChannelHooks = {},
    ) {}

    /** Dispatch path of this channel, e.g. `['platform', 'calc']`. */
    get path(): readonly string[] {
        return this._hooks.path ?? [];
    }

    /** `true` once a pattern method, `map()` or `reject()` took the channel. */
    get consumed(): boolean {
        return this._consumedBy !== undefined;
    }

    // ── Patterns ─────────────────────────────────────────

    /**
     * Resolve a unary request: run the handler and send its result.
     *
     * @throws {HandlerError} The handler threw; the client received the same error
     */
    async rpc<K extends MethodsOf<S, 'rpc'>, TState>(
        request: Variant<K, RequestPayload<S[K]>>,
        state: TState,
        handler: RpcHandler<TState, RequestPayload<S[K]>, ResponsePayload<S[K]>>,
    ): Promise<void> {
        const scope = this._begin(request.tag, 'rpc');
        let response: ResponsePayload<S[K]>;
        try {
            response = await handler(state, request.value);
        } catch (err) {
            return this._fault(scope, err);
        }
        return this._respond(scope, wrapResponse<S, K>(request.tag, response));
    }

    /**
     * Resolve a server-streaming request: forward every item the handler
     * produces. Each send completes before the next item is pulled, so a
     * slow client throttles the producer. When the client drops its half
     * the producer is closed (`return()`) and dispatch ends quietly.
     */
    async serverStreaming<K extends MethodsOf<S, 'server-streaming'>, TState>(
        request: Variant<K, RequestPayload<S[K]>>,
        state: TState,
        handler: ServerStreamingHandler<TState, RequestPayload<S[K]>, ResponsePayload<S[K]>>,
    ): Promise<void> {
        const scope = this._begin(request.tag, 'server-streaming');
        return this._forward(scope, request.tag, () => handler(state, request.value));
    }

    /**
     * Resolve a client-streaming request: the handler reads the updates
     * and returns the single response.
     */
    async clientStreaming<K extends MethodsOf<S, 'client-streaming'>, TState>(
        request: Variant<K, RequestPayload<S[K]>>,
        state: TState,
        handler: ClientStreamingHandler<TState, RequestPayload<S[K]>, UpdatePayload<S[K]>, ResponsePayload<S[K]>>,
    ): Promise<void> {
        const scope = this._begin(request.tag, 'client-streaming');
        let response: ResponsePayload<S[K]>;
        try {
            response = await handler(state, request.value, this._updates(request.tag));
        } catch (err) {
            return this._fault(scope, err);
        }
        return this._respond(scope, wrapResponse<S, K>(request.tag, response));
    }

    /**
     * Resolve a bidirectional request: updates flow in while produced
     * items flow out.
     */
    async bidiStreaming<K extends MethodsOf<S, 'bidi-streaming'>, TState>(
        request: Variant<K, RequestPayload<S[K]>>,
        state: TState,
        handler: BidiStreamingHandler<TState, RequestPayload<S[K]>, UpdatePayload<S[K]>, ResponsePayload<S[K]>>,
    ): Promise<void> {
        const scope = this._begin(request.tag, 'bidi-streaming');
        const updates = this._updates(request.tag);
        return this._forward(scope, request.tag, () => handler(state, request.value, updates));
    }

    // ── Composition ──────────────────────────────────────

    /**
     * Channel for the child service nested under `method`.
     *
     * Child responses are widened into this service's response union,
     * incoming requests are narrowed into the child's request union.
     */
    map<K extends MethodsOf<S, 'nested'>>(method: K): RpcChannel<ChildService<S[K]>> {
        this._consume(method);
        const sink = new MappedSendSink(
            this._sink,
            (response: ResponseOf<ChildService<S[K]>>) => wrapChildResponse<S, K>(method, response),
        );
        const stream = new MappedRecvStream(
            this._stream,
            (request: RequestOf<S>) => unwrapChildRequest<S, K>(method, request),
            this._pathOf(method),
        );
        return new RpcChannel<ChildService<S[K]>>(sink, stream, {
            ...this._hooks,
            path: [...this.path, method],
        });
    }

    /**
     * Refuse a first message no pattern applies to, e.g. a stray update
     * variant. The client sees a `MappingError`.
     */
    async reject(request: AnyVariant): Promise<void> {
        this._consume(request.tag);
        const error = new MappingError(`${this._pathOf(request.tag)}: no handler for variant "${request.tag}".`);
        this._hooks.debug?.({
            type: 'error',
            method: this._pathOf(request.tag),
            error: error.message,
            step: 'dispatch',
            timestamp: Date.now(),
        });
        try {
            await this._sink.error(error.toPayload());
        } finally {
            this._stream.close();
        }
    }

    // ── Private ──────────────────────────────────────────

    private _consume(label: string): void {
        if (this._consumedBy !== undefined) {
            throw new Error(
                `RpcChannel at "${this.path.join('.') || '<root>'}" was already consumed by "${this._consumedBy}"; ` +
                `attempted "${label}".`,
            );
        }
        this._consumedBy = label;
    }

    private _pathOf(method: string): string {
        return [...this.path, method].join('.');
    }

    private _begin(method: string, pattern: LeafPattern): DispatchScope {
        this._consume(method);
        return new DispatchScope(this._hooks, this._pathOf(method), pattern);
    }

    private _updates<K extends MethodName<S>>(
        method: K,
    ): AsyncIterable<UpdatePayload<S[K]>> {
        return new MappedRecvStream(
            this._stream,
            (request: RequestOf<S>) => unwrapUpdate<S, K>(method, request),
            this._pathOf(method),
        );
    }

    private async _send(message: ResponseOf<S>): Promise<SendOutcome> {
        try {
            await this._sink.send(message);
            return 'sent';
        } catch (err) {
            if (err instanceof ConnectionClosedError) return 'dropped';
            return RpcError.from(err);
        }
    }

    /** Send a single response, then close the channel. */
    private async _respond(scope: DispatchScope, message: ResponseOf<S>): Promise<void> {
        const outcome = await this._send(message);
        if (outcome === 'sent') scope.items++;
        if (outcome === 'dropped') scope.cancelled = true;
        return this._finish(scope, outcome);
    }

    /** Forward a producer item by item, then close the channel. */
    private async _forward<K extends MethodName<S>>(
        scope: DispatchScope,
        method: K,
        produce: () => Producer<ResponsePayload<S[K]>>,
    ): Promise<void> {
        let outcome: SendOutcome = 'sent';
        try {
            for await (const item of produce()) {
                outcome = await this._send(wrapResponse<S, K>(method, item));
                if (outcome !== 'sent') break;
                scope.items++;
            }
        } catch (err) {
            return this._fault(scope, err);
        }
        if (outcome === 'dropped') scope.cancelled = true;
        return this._finish(scope, outcome);
    }

    private async _finish(scope: DispatchScope, outcome: SendOutcome): Promise<void> {
        this._stream.close();
        if (outcome instanceof RpcError) {
            scope.fail('send', outcome);
            throw outcome;
        }
        if (outcome === 'sent') {
            try {
                await this._sink.close();
            } catch (err) {
                const error = RpcError.from(err);
                scope.fail('send', error);
                throw error;
            }
        }
        scope.complete();
    }

    /** Report a handler failure to the client, then reject with it. */
    private async _fault(scope: DispatchScope, err: unknown): Promise<never> {
        const error = HandlerError.wrap(err, scope.method);
        scope.fail('handler', error);
        try {
            await this._sink.error(error.toPayload());
        } catch (reportErr) {
            const report = this._hooks.debug;
            if (report) {
                report({
                    type: 'error',
                    method: scope.method,
                    error: messageOf(reportErr),
                    step: 'report',
                    timestamp: Date.now(),
                });
            } else {
                console.warn(`[strand-rpc] could not report failure of ${scope.method}:`, reportErr);
            }
        } finally {
            this._stream.close();
        }
        throw error;
    }
}
