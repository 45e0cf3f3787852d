/**
 * DebugObserver — Zero-Overhead Observability for strand-rpc
 *
 * Provides structured, typed debug events emitted as the server accepts
 * channels and dispatches requests. When no observer is configured (the
 * default) nothing is allocated and nothing is printed.
 *
 * Design principles:
 * - Pure function observer (no class hierarchy)
 * - Discriminated union events (exhaustive switch possible)
 * - Immutable event payloads (readonly)
 * - Opt-in: only active when explicitly enabled
 *
 * @example
 * ```typescript
 * import { createDebugObserver, RpcServer } from '@strand-rpc/core';
 *
 * // Default: compact console.debug output
 * const debug = createDebugObserver();
 *
 * // Custom handler (e.g. forward to a metrics pipeline)
 * const debug = createDebugObserver((event) => {
 *     metrics.increment(`rpc.${event.type}`);
 * });
 *
 * const server = new RpcServer(endpoint, { debug });
 * ```
 *
 * @module
 */
import type { Pattern } from '../service/Service.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/**
 * Emitted when the server accepted a channel and read its first message.
 * `tag` is the top-level variant tag of that message.
 */
export interface AcceptEvent {
    readonly type: 'accept';
    readonly transport: string;
    readonly tag: string;
    readonly timestamp: number;
}

/**
 * Emitted when a channel is dispatched to a handler.
 * `method` is the full dispatch path, e.g. `platform.calc.add`.
 */
export interface DispatchEvent {
    readonly type: 'dispatch';
    readonly method: string;
    readonly pattern: Exclude<Pattern, 'nested'>;
    readonly timestamp: number;
}

/**
 * Emitted when a dispatch finished without a handler fault.
 */
export interface CompleteEvent {
    readonly type: 'complete';
    readonly method: string;
    readonly pattern: Exclude<Pattern, 'nested'>;
    /** Responses sent on the channel */
    readonly items: number;
    /** `true` when the client dropped its half before the producer finished */
    readonly cancelled: boolean;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Emitted for every failure the server observes.
 */
export interface ErrorEvent {
    readonly type: 'error';
    /** Dispatch path, or the transport kind for accept failures */
    readonly method: string;
    readonly error: string;
    /** Where the failure happened */
    readonly step: 'accept' | 'decode' | 'dispatch' | 'handler' | 'send' | 'report';
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * Use a `switch` on `event.type` for exhaustive handling:
 * ```typescript
 * function handle(event: DebugEvent) {
 *     switch (event.type) {
 *         case 'accept':   // AcceptEvent
 *         case 'dispatch': // DispatchEvent
 *         case 'complete': // CompleteEvent
 *         case 'error':    // ErrorEvent
 *     }
 * }
 * ```
 */
export type DebugEvent =
    | AcceptEvent
    | DispatchEvent
    | CompleteEvent
    | ErrorEvent;

/**
 * Observer function that receives debug events.
 *
 * Pass it as `debug` to `RpcServer`, `serve()` or an NDJSON transport.
 */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 * The default handler prints:
 *
 * ```
 * [strand-rpc] accept    memory platform
 * [strand-rpc] dispatch  platform.calc.add (rpc)
 * [strand-rpc] complete  platform.calc.add ✓ 1 item 0.4ms
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[strand-rpc]';

        switch (event.type) {
            case 'accept':
                console.debug(`${prefix} accept    ${event.transport} ${event.tag}`);
                break;

            case 'dispatch':
                console.debug(`${prefix} dispatch  ${event.method} (${event.pattern})`);
                break;

            case 'complete': {
                const icon = event.cancelled ? '⊘' : '✓';
                const items = event.items === 1 ? '1 item' : `${event.items} items`;
                console.debug(`${prefix} complete  ${event.method} ${icon} ${items} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'error':
                console.debug(`${prefix} ERROR     ${event.method} [${event.step}] ${event.error}`);
                break;
        }
    };
}
