/**
 * serve — The Accept Loop
 *
 * Accepts channels until the endpoint is finished and runs the handler
 * for each one as an independent task. A failing accept or a failing
 * handler is reported and the loop carries on; one request can never
 * stop the server or disturb another channel.
 *
 * Reporting: failures the channel already emitted to the debug observer
 * (handler faults, send failures) are not repeated. Everything else goes
 * to `onError`, else the debug observer, else `console.warn`.
 *
 * @module
 */
import { RpcError } from '../errors/RpcError.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';
import type { RequestOf, Service } from '../service/Service.js';
import type { RpcChannel } from './RpcChannel.js';
import type { RpcServer } from './RpcServer.js';

/** Handles one accepted request; resolves once the channel is resolved. */
export type ServeHandler<S extends Service> =
    (request: RequestOf<S>, channel: RpcChannel<S>) => Promise<void> | void;

/** Where a failure happened inside the loop. */
export type ServeStep = 'accept' | 'handler';

/**
 * Accept loop configuration.
 */
export interface ServeOptions {
    /**
     * Receives every failure the loop observes, instead of the debug
     * observer or `console.warn`.
     */
    readonly onError?: ((error: RpcError, step: ServeStep) => void) | undefined;

    /** Debug observer. Defaults to the server's. */
    readonly debug?: DebugObserverFn | undefined;
}

/**
 * Run the accept loop.
 *
 * @returns Resolves once the endpoint is finished and every in-flight
 *   handler has settled
 *
 * @example
 * ```typescript
 * const handler = new AppHandler(config);
 * await serve(server, (request, channel) => handler.handle(request, channel));
 * ```
 */
export async function serve<S extends Service>(
    server: RpcServer<S>,
    handler: ServeHandler<S>,
    options: ServeOptions = {},
): Promise<void> {
    const debug = options.debug ?? server.options.debug;
    const inFlight = new Set<Promise<void>>();

    const report = (err: unknown, step: ServeStep, method: string): void => {
        const error = RpcError.from(err);
        if (options.onError) {
            options.onError(error, step);
            return;
        }
        // Handler faults were emitted by the channel already
        if (debug && step === 'handler' && err instanceof RpcError && server.options.debug === debug) return;
        if (debug) {
            debug({ type: 'error', method, error: error.message, step, timestamp: Date.now() });
            return;
        }
        console.warn(`[strand-rpc] ${step} failed (${method}):`, error);
    };

    const run = async (request: RequestOf<S>, channel: RpcChannel<S>): Promise<void> => {
        try {
            await handler(request, channel);
        } catch (err) {
            report(err, 'handler', request.tag);
        }
    };

    for (;;) {
        let accepted: Awaited<ReturnType<RpcServer<S>['accept']>>;
        try {
            accepted = await server.accept();
        } catch (err) {
            report(err, 'accept', server.endpoint.kind);
            continue;
        }
        if (!accepted) break;

        const [request, channel] = accepted;
        const task = run(request, channel);
        inFlight.add(task);
        void task.then(() => inFlight.delete(task));
    }

    await Promise.all(inFlight);
}
