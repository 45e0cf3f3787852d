/**
 * Observability — Barrel Export
 *
 * Public API for debug observers and OpenTelemetry-compatible tracing.
 */

// ── Debug Observer ───────────────────────────────────────
export { createDebugObserver } from './DebugObserver.js';
export type {
    DebugEvent, DebugObserverFn,
    AcceptEvent, DispatchEvent, CompleteEvent, ErrorEvent,
} from './DebugObserver.js';

// ── Tracing (OpenTelemetry-compatible) ───────────────────
export { SpanStatusCode } from './Tracing.js';
export type { RpcSpan, RpcTracer, RpcAttributeValue } from './Tracing.js';
