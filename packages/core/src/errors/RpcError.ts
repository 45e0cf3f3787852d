/**
 * RpcError — Typed Failure Kinds
 *
 * Every failure the framework produces is an {@link RpcError} subclass
 * carrying a stable `code`. Errors cross the wire as an
 * {@link RpcErrorPayload} and are reconstituted on the other side into
 * the matching subclass, so `instanceof` works across a transport.
 *
 * | Class                   | Code                  |
 * |-------------------------|-----------------------|
 * | `TransportError`        | `TRANSPORT_ERROR`     |
 * | `SerializationError`    | `SERIALIZATION_ERROR` |
 * | `ConnectionClosedError` | `CONNECTION_CLOSED`   |
 * | `MappingError`          | `MAPPING_ERROR`       |
 * | `HandlerError`          | `HANDLER_ERROR`       |
 *
 * @module
 */
import { z } from 'zod';

// ============================================================================
// Codes & Payload
// ============================================================================

export const RPC_ERROR_CODES = [
    'TRANSPORT_ERROR',
    'SERIALIZATION_ERROR',
    'CONNECTION_CLOSED',
    'MAPPING_ERROR',
    'HANDLER_ERROR',
] as const;

/** Stable error code carried by every {@link RpcError}. */
export type RpcErrorCode = typeof RPC_ERROR_CODES[number];

/**
 * Wire representation of an error.
 *
 * Validated with {@link RpcErrorPayloadSchema} wherever it arrives from
 * an untrusted peer.
 */
export const RpcErrorPayloadSchema = z.object({
    code: z.enum(RPC_ERROR_CODES),
    message: z.string(),
    details: z.record(z.string()).optional(),
});

export type RpcErrorPayload = z.infer<typeof RpcErrorPayloadSchema>;

/** Options accepted by every {@link RpcError} constructor. */
export interface RpcErrorOptions {
    /** The underlying error, if any. */
    readonly cause?: unknown;
    /** Structured context, e.g. `{ method: 'calc.add' }`. */
    readonly details?: Readonly<Record<string, string>> | undefined;
}

// ============================================================================
// Base Class
// ============================================================================

/**
 * Base class of every framework error.
 */
export class RpcError extends Error {
    readonly code: RpcErrorCode;
    readonly details: Readonly<Record<string, string>>;

    constructor(code: RpcErrorCode, message: string, options: RpcErrorOptions = {}) {
        super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = 'RpcError';
        this.code = code;
        this.details = Object.freeze({ ...options.details });
    }

    /** Serializable form for sending to a peer. */
    toPayload(): RpcErrorPayload {
        const payload: RpcErrorPayload = { code: this.code, message: this.message };
        if (Object.keys(this.details).length > 0) {
            payload.details = { ...this.details };
        }
        return payload;
    }

    /**
     * Rebuild the matching subclass from a wire payload.
     *
     * @example
     * ```typescript
     * const err = RpcError.fromPayload({ code: 'HANDLER_ERROR', message: 'boom' });
     * err instanceof HandlerError; // true
     * ```
     */
    static fromPayload(payload: RpcErrorPayload): RpcError {
        const options: RpcErrorOptions = { details: payload.details };
        switch (payload.code) {
            case 'TRANSPORT_ERROR':
                return new TransportError(payload.message, options);
            case 'SERIALIZATION_ERROR':
                return new SerializationError(payload.message, options);
            case 'CONNECTION_CLOSED':
                return new ConnectionClosedError(payload.message, options);
            case 'MAPPING_ERROR':
                return new MappingError(payload.message, options);
            case 'HANDLER_ERROR':
                return new HandlerError(payload.message, options);
        }
    }

    /**
     * Normalise anything thrown into an {@link RpcError}.
     *
     * `RpcError` instances pass through; anything else becomes a
     * `TransportError` with the original as `cause`.
     */
    static from(err: unknown): RpcError {
        if (err instanceof RpcError) return err;
        return new TransportError(messageOf(err), { cause: err });
    }
}

// ============================================================================
// Kinds
// ============================================================================

/** Sending or receiving failed at the substrate. */
export class TransportError extends RpcError {
    constructor(message: string, options?: RpcErrorOptions) {
        super('TRANSPORT_ERROR', message, options);
        this.name = 'TransportError';
    }
}

/** A value could not be encoded or decoded by the transport. */
export class SerializationError extends RpcError {
    constructor(message: string, options?: RpcErrorOptions) {
        super('SERIALIZATION_ERROR', message, options);
        this.name = 'SerializationError';
    }
}

/** The peer ended the channel before the protocol completed. */
export class ConnectionClosedError extends RpcError {
    constructor(message: string, options?: RpcErrorOptions) {
        super('CONNECTION_CLOSED', message, options);
        this.name = 'ConnectionClosedError';
    }
}

/**
 * A mapped adapter received a variant it cannot convert.
 * Indicates a composition misconfiguration.
 */
export class MappingError extends RpcError {
    constructor(message: string, options?: RpcErrorOptions) {
        super('MAPPING_ERROR', message, options);
        this.name = 'MappingError';
    }
}

/** Application handler logic failed. */
export class HandlerError extends RpcError {
    constructor(message: string, options?: RpcErrorOptions) {
        super('HANDLER_ERROR', message, options);
        this.name = 'HandlerError';
    }

    /**
     * Wrap whatever a handler threw. An `RpcError` keeps its own code,
     * so a `MappingError` raised while reading updates stays one.
     *
     * @param err - The thrown value
     * @param method - Dispatch path of the failing method, e.g. `'platform.calc.add'`
     */
    static wrap(err: unknown, method: string): RpcError {
        if (err instanceof RpcError) return err;
        return new HandlerError(messageOf(err), { cause: err, details: { method } });
    }
}

// ── Internal ─────────────────────────────────────────────

/** @internal */
export function messageOf(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
