/**
 * Tracing — OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces that are structurally compatible with
 * OpenTelemetry's `Tracer` and `Span`, so a real tracer can be passed
 * straight in without an adapter and without a runtime dependency on
 * `@opentelemetry/*`.
 *
 * Every dispatch opens one span named `rpc.<pattern>` carrying
 * `rpc.method` and `rpc.pattern`; `rpc.items` and `rpc.cancelled` are
 * set when it ends.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const server = new RpcServer(endpoint, {
 *     tracer: trace.getTracer('strand-rpc'),
 * });
 * ```
 *
 * @module
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Span status codes matching OpenTelemetry's `SpanStatusCode` values.
 *
 * - `OK` (1) — The handler finished, including when the client cancelled.
 * - `ERROR` (2) — The handler threw.
 */
export const SpanStatusCode = { OK: 1, ERROR: 2 } as const;

// ============================================================================
// Types
// ============================================================================

/**
 * Attribute value type matching OpenTelemetry's `SpanAttributeValue`.
 *
 * Using `unknown` here would break assignment of an OTel `Tracer`
 * under `strict` (parameter contravariance).
 */
export type RpcAttributeValue =
    | string
    | number
    | boolean
    | ReadonlyArray<string>
    | ReadonlyArray<number>
    | ReadonlyArray<boolean>;

/**
 * Minimal span interface — structural subtype of OTel's `Span`.
 */
export interface RpcSpan {
    setAttribute(key: string, value: RpcAttributeValue): void;

    setStatus(status: { code: number; message?: string }): void;

    /** End this span. Called exactly once, from a `finally` block. */
    end(): void;

    /** Called before `setStatus(ERROR)` when a handler throws. */
    recordException(exception: Error | string): void;
}

/**
 * Minimal tracer interface — structural subtype of OTel's `Tracer`.
 *
 * Only the first two parameters of OTel's `startSpan(name, options, context)`
 * are used; spans are therefore not linked to an active context.
 */
export interface RpcTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, RpcAttributeValue>;
    }): RpcSpan;
}
