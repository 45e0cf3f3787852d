/**
 * Result\<T\> — Fallible Narrowing Without Exceptions
 *
 * A lightweight discriminated union for conversions that may not apply,
 * such as narrowing a parent service's message into one child's union.
 * Each step returns `Result<T>`: either `Success<T>` or `Failure`.
 *
 * @example
 * ```typescript
 * import { succeed, fail, type Result } from '@strand-rpc/core';
 *
 * function parsePort(input: string): Result<number> {
 *     const port = Number(input);
 *     return Number.isInteger(port) ? succeed(port) : fail(`not a port: ${input}`);
 * }
 *
 * const result = parsePort('8080');
 * if (!result.ok) throw new Error(result.reason);
 * const port = result.value;  // Narrowed to number
 * ```
 *
 * @module
 */

// ── Discriminated Union ──────────────────────────────────

/**
 * Successful result containing a typed value.
 *
 * @typeParam T - The success value type
 */
export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/**
 * Failed result with a human-readable reason.
 */
export interface Failure {
    readonly ok: false;
    readonly reason: string;
}

/**
 * Discriminated union: either `Success<T>` or `Failure`.
 *
 * Check `result.ok` to narrow the type.
 */
export type Result<T> = Success<T> | Failure;

// ── Constructors ─────────────────────────────────────────

/**
 * Create a successful result.
 *
 * @example
 * ```typescript
 * return succeed(42);
 * ```
 */
export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

/**
 * Create a failed result.
 *
 * @param reason - Why the conversion did not apply
 */
export function fail(reason: string): Failure {
    return { ok: false, reason };
}
