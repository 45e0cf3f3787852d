/**
 * Variant helpers — widening into and narrowing out of aggregate unions.
 *
 * Widening (`wrap*`) is total: any payload of method `K` becomes a
 * member of the service's union. Narrowing (`unwrap*`) is partial: it
 * succeeds only for the variant tagged `K` and fails for every other
 * method or child.
 *
 * Law: `unwrapRequest(k, wrapRequest(k, v))` is `succeed(v)` for every
 * method `k` and payload `v`.
 *
 * The compiler cannot correlate a generic method name with the member
 * of a mapped union it selects, so the aggregate types are asserted
 * here, once, behind signatures that are fully typed for callers.
 *
 * @module
 */
import type {
    AnyVariant,
    ChildService,
    MethodName,
    RequestOf,
    RequestPayload,
    ResponseOf,
    ResponsePayload,
    Service,
    UpdatePayload,
    UpdateTag,
} from './Service.js';
import { fail, succeed, type Result } from './result.js';

/** Tag under which the updates of method `method` travel. */
export function updateTag<K extends string>(method: K): UpdateTag<K> {
    return `${method}:update`;
}

// ── Widening ─────────────────────────────────────────────

/** Wrap a request payload of `method` into the service's request union. */
export function wrapRequest<S extends Service, K extends MethodName<S>>(
    method: K,
    value: RequestPayload<S[K]>,
): RequestOf<S> {
    const message: AnyVariant = { tag: method, value };
    return message as RequestOf<S>;
}

/** Wrap an update payload of `method` into the service's request union. */
export function wrapUpdate<S extends Service, K extends MethodName<S>>(
    method: K,
    value: UpdatePayload<S[K]>,
): RequestOf<S> {
    const message: AnyVariant = { tag: updateTag(method), value };
    return message as RequestOf<S>;
}

/** Wrap a response payload of `method` into the service's response union. */
export function wrapResponse<S extends Service, K extends MethodName<S>>(
    method: K,
    value: ResponsePayload<S[K]>,
): ResponseOf<S> {
    const message: AnyVariant = { tag: method, value };
    return message as ResponseOf<S>;
}

// ── Narrowing ────────────────────────────────────────────

function narrow<T>(tag: string, message: AnyVariant): Result<T> {
    if (message.tag !== tag) {
        return fail(`expected variant "${tag}", received "${message.tag}"`);
    }
    return succeed(message.value as T);
}

/** Extract the request payload of `method`, failing for any other variant. */
export function unwrapRequest<S extends Service, K extends MethodName<S>>(
    method: K,
    message: RequestOf<S>,
): Result<RequestPayload<S[K]>> {
    return narrow<RequestPayload<S[K]>>(method, message);
}

/** Extract an update payload of `method`, failing for any other variant. */
export function unwrapUpdate<S extends Service, K extends MethodName<S>>(
    method: K,
    message: RequestOf<S>,
): Result<UpdatePayload<S[K]>> {
    return narrow<UpdatePayload<S[K]>>(updateTag(method), message);
}

/** Extract the response payload of `method`, failing for any other variant. */
export function unwrapResponse<S extends Service, K extends MethodName<S>>(
    method: K,
    message: ResponseOf<S>,
): Result<ResponsePayload<S[K]>> {
    return narrow<ResponsePayload<S[K]>>(method, message);
}

// ── Nested Children ──────────────────────────────────────

/** Wrap a child's request union under the parent's `method` tag. */
export function wrapChildRequest<S extends Service, K extends MethodName<S>>(
    method: K,
    value: RequestOf<ChildService<S[K]>>,
): RequestOf<S> {
    const message: AnyVariant = { tag: method, value };
    return message as RequestOf<S>;
}

/** Wrap a child's response union under the parent's `method` tag. */
export function wrapChildResponse<S extends Service, K extends MethodName<S>>(
    method: K,
    value: ResponseOf<ChildService<S[K]>>,
): ResponseOf<S> {
    const message: AnyVariant = { tag: method, value };
    return message as ResponseOf<S>;
}

/** Extract the child's request union carried under `method`. */
export function unwrapChildRequest<S extends Service, K extends MethodName<S>>(
    method: K,
    message: RequestOf<S>,
): Result<RequestOf<ChildService<S[K]>>> {
    return narrow<RequestOf<ChildService<S[K]>>>(method, message);
}

/** Extract the child's response union carried under `method`. */
export function unwrapChildResponse<S extends Service, K extends MethodName<S>>(
    method: K,
    message: ResponseOf<S>,
): Result<ResponseOf<ChildService<S[K]>>> {
    return narrow<ResponseOf<ChildService<S[K]>>>(method, message);
}
