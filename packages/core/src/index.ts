/**
 * strand-rpc — Root Barrel Export
 *
 * Public API entry point. Aggregates all bounded-context modules
 * into a single flat namespace for consumers.
 *
 * Architecture:
 *   src/
 *   ├── service/       ← Pattern contracts, aggregate unions, variants, Result
 *   ├── transport/     ← Connection/Endpoint contracts, pipes, memory transport, adapters
 *   ├── client/        ← Typed RpcClient
 *   ├── server/        ← RpcServer, RpcChannel dispatch, serve() loop
 *   ├── sync/          ← Notify, PeriodicTask
 *   ├── errors/        ← RpcError hierarchy
 *   └── observability/ ← Debug Observer, Tracing
 */

// ── Service Contracts ────────────────────────────────────
/** @category Service */
export type {
    Pattern,
    Rpc, ServerStreaming, ClientStreaming, BidiStreaming, Nested,
    Method, Service,
    Variant, AnyVariant, UpdateTag,
    MethodName, MethodsOf,
    RequestPayload, UpdatePayload, ResponsePayload, ChildService,
    RequestOf, ResponseOf,
} from './service/Service.js';
/** @category Service */
export {
    updateTag,
    wrapRequest, wrapUpdate, wrapResponse,
    unwrapRequest, unwrapUpdate, unwrapResponse,
    wrapChildRequest, wrapChildResponse,
    unwrapChildRequest, unwrapChildResponse,
} from './service/variant.js';
/** @category Service */
export { succeed, fail } from './service/result.js';
export type { Result, Success, Failure } from './service/result.js';

// ── Transport ────────────────────────────────────────────
/** @category Transport */
export {
    pipe, PipeSender, PipeReceiver,
    createMemoryTransport,
    BoxedConnection, BoxedEndpoint,
    MappedConnection, MappedSendSink, MappedRecvStream,
} from './transport/index.js';
export type {
    SendSink, RecvStream, Channel,
    Connection, Endpoint,
    ServiceConnection, ServiceEndpoint,
    MemoryTransport, MemoryTransportOptions,
    Widen, Narrow,
} from './transport/index.js';

// ── Client ───────────────────────────────────────────────
/** @category Client */
export { RpcClient } from './client/index.js';
export type {
    ResponseStream, UpdateSink,
    ClientStreamingCall, BidiStreamingCall,
} from './client/index.js';

// ── Server ───────────────────────────────────────────────
/** @category Server */
export { RpcServer, RpcChannel, serve } from './server/index.js';
export type {
    RpcServerOptions, Accepted,
    ChannelHooks, Producer,
    RpcHandler, ServerStreamingHandler, ClientStreamingHandler, BidiStreamingHandler,
    ServeHandler, ServeOptions, ServeStep,
} from './server/index.js';

// ── Sync Primitives ──────────────────────────────────────
/** @category Sync */
export { Notify } from './sync/Notify.js';
/** @category Sync */
export { PeriodicTask, type PeriodicTaskOptions } from './sync/PeriodicTask.js';

// ── Errors ───────────────────────────────────────────────
/** @category Errors */
export {
    RpcError,
    TransportError,
    SerializationError,
    ConnectionClosedError,
    MappingError,
    HandlerError,
    RPC_ERROR_CODES,
    RpcErrorPayloadSchema,
} from './errors/RpcError.js';
export type { RpcErrorCode, RpcErrorPayload, RpcErrorOptions } from './errors/RpcError.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export { createDebugObserver, SpanStatusCode } from './observability/index.js';
export type {
    DebugEvent, DebugObserverFn,
    AcceptEvent, DispatchEvent, CompleteEvent, ErrorEvent,
    RpcSpan, RpcTracer, RpcAttributeValue,
} from './observability/index.js';
