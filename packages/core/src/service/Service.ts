/**
 * Service — Compile-Time Message Pattern Contracts
 *
 * A service is described by a *type*, never by a runtime value: an object
 * type whose keys are method names and whose values declare the
 * interaction pattern and the payload types of that method.
 *
 * ```typescript
 * type CalcService = {
 *     add: Rpc<AddRequest, AddResponse>;
 *     sum: ClientStreaming<SumRequest, SumUpdate, SumResponse>;
 * };
 *
 * type PlatformService = {
 *     calc: Nested<CalcService>;
 *     clock: Nested<ClockService>;
 * };
 * ```
 *
 * The aggregate request and response unions that travel on the wire are
 * derived from that declaration ({@link RequestOf}, {@link ResponseOf}).
 * Each method name becomes the `tag` of one variant; a `Nested` method
 * wraps the child's entire union under a single tag. Since tags are object
 * keys, two children of one parent can never collide.
 *
 * Services must be declared with `type` aliases (not `interface`) so
 * that they satisfy the {@link Service} index signature.
 *
 * @module
 */

// ============================================================================
// Interaction Patterns
// ============================================================================

/** The interaction shapes a method can declare. */
export type Pattern =
    | 'rpc'
    | 'server-streaming'
    | 'client-streaming'
    | 'bidi-streaming'
    | 'nested';

/** One request, exactly one response. */
export interface Rpc<TRequest, TResponse> {
    readonly pattern: 'rpc';
    readonly request: TRequest;
    readonly response: TResponse;
}

/**
 * One request, a lazily produced and possibly unbounded sequence of
 * responses, terminated by the producer closing or failing.
 */
export interface ServerStreaming<TRequest, TResponse> {
    readonly pattern: 'server-streaming';
    readonly request: TRequest;
    readonly response: TResponse;
}

/** One request followed by many updates, collapsing to one response. */
export interface ClientStreaming<TRequest, TUpdate, TResponse> {
    readonly pattern: 'client-streaming';
    readonly request: TRequest;
    readonly update: TUpdate;
    readonly response: TResponse;
}

/** One request, then interleaved updates and streamed responses. */
export interface BidiStreaming<TRequest, TUpdate, TResponse> {
    readonly pattern: 'bidi-streaming';
    readonly request: TRequest;
    readonly update: TUpdate;
    readonly response: TResponse;
}

/** The whole request/response union of a child service, under one tag. */
export interface Nested<TService extends Service> {
    readonly pattern: 'nested';
    readonly service: TService;
}

/** Any method declaration. */
export type Method =
    | Rpc<unknown, unknown>
    | ServerStreaming<unknown, unknown>
    | ClientStreaming<unknown, unknown, unknown>
    | BidiStreaming<unknown, unknown, unknown>
    | Nested<Service>;

/** A service descriptor: method names mapped to method declarations. */
export type Service = { readonly [method: string]: Method };

// ============================================================================
// Variants
// ============================================================================

/** One member of an aggregate union. */
export interface Variant<TTag extends string, TValue> {
    readonly tag: TTag;
    readonly value: TValue;
}

/** A variant with its payload type erased. Every aggregate union member is one. */
export type AnyVariant = Variant<string, unknown>;

/** Tag of the update variants that belong to an update-bearing method. */
export type UpdateTag<TMethod extends string> = `${TMethod}:update`;

// ============================================================================
// Method Selection
// ============================================================================

/** All method names of a service. */
export type MethodName<S extends Service> = keyof S & string;

/**
 * Method names of a service that declare pattern `P`.
 *
 * @example
 * ```typescript
 * type Unary = MethodsOf<CalcService, 'rpc'>;  // 'add'
 * ```
 */
export type MethodsOf<S extends Service, P extends Pattern> = MethodName<S> & {
    [K in MethodName<S>]: S[K]['pattern'] extends P ? K : never;
}[MethodName<S>];

// ============================================================================
// Payload Extraction
// ============================================================================

/** Request payload of a method (the child's request union for `Nested`). */
export type RequestPayload<M> =
    M extends Nested<infer C extends Service> ? RequestOf<C>
    : M extends { readonly request: infer Q } ? Q
    : never;

/** Update payload of an update-bearing method. */
export type UpdatePayload<M> =
    M extends { readonly update: infer U } ? U : never;

/** Response payload of a method (the child's response union for `Nested`). */
export type ResponsePayload<M> =
    M extends Nested<infer C extends Service> ? ResponseOf<C>
    : M extends { readonly response: infer R } ? R
    : never;

/** The child service of a `Nested` method. */
export type ChildService<M> =
    M extends Nested<infer C extends Service> ? C : never;

// ============================================================================
// Aggregate Unions
// ============================================================================

type RequestVariants<K extends string, M> =
    M extends ClientStreaming<unknown, unknown, unknown> | BidiStreaming<unknown, unknown, unknown>
        ? Variant<K, RequestPayload<M>> | Variant<UpdateTag<K>, UpdatePayload<M>>
        : Variant<K, RequestPayload<M>>;

/**
 * The aggregate request union of a service: everything a client may send.
 *
 * Intersected with {@link AnyVariant} so that generic code can always
 * read `tag` and `value` without knowing the concrete service.
 */
export type RequestOf<S extends Service> = AnyVariant & {
    [K in MethodName<S>]: RequestVariants<K, S[K]>;
}[MethodName<S>];

/** The aggregate response union of a service: everything a server may send. */
export type ResponseOf<S extends Service> = AnyVariant & {
    [K in MethodName<S>]: Variant<K, ResponsePayload<S[K]>>;
}[MethodName<S>];
