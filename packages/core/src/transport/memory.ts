/**
 * Memory transport — connection/endpoint pair inside one process.
 *
 * Every `open()` creates two pipes (one per direction) and queues the
 * server's halves for `accept()`. Nothing is serialized: messages are
 * handed over by reference.
 *
 * @example
 * ```typescript
 * const transport = createMemoryTransport<AppService>();
 * const server = new RpcServer(transport.endpoint);
 * const client = new RpcClient(transport.connection);
 * ```
 *
 * @module
 */
import { ConnectionClosedError } from '../errors/RpcError.js';
import type { RequestOf, ResponseOf, Service } from '../service/Service.js';
import { pipe, type PipeReceiver, type PipeSender } from './Pipe.js';
import type { Channel, Connection, Endpoint, ServiceConnection, ServiceEndpoint } from './types.js';

// ── Configuration ────────────────────────────────────────

/**
 * Sizing of the memory transport.
 */
export interface MemoryTransportOptions {
    /**
     * Messages buffered per channel direction before `send` waits.
     * `0` makes every send a rendezvous with the reader.
     *
     * @default 1
     */
    readonly capacity?: number | undefined;

    /**
     * Channels opened but not yet accepted before `open()` waits.
     *
     * @default 16
     */
    readonly backlog?: number | undefined;
}

/** Both sides of an in-process transport for service `S`. */
export interface MemoryTransport<S extends Service> {
    readonly connection: ServiceConnection<S>;
    readonly endpoint: ServiceEndpoint<S>;
    /** Stop accepting: pending and later `accept()` resolve `undefined`, `open()` rejects. */
    close(): void;
}

// ── Implementation ───────────────────────────────────────

type Pending<TReq, TRes> = readonly [PipeSender<TRes>, PipeReceiver<TReq>];

class MemoryConnection<TReq, TRes> implements Connection<TRes, TReq> {
    readonly kind = 'memory';

    constructor(
        private readonly _accepts: PipeSender<Pending<TReq, TRes>>,
        private readonly _capacity: number,
    ) {}

    async open(): Promise<Channel<TRes, TReq>> {
        if (this._accepts.isDropped) {
            throw new ConnectionClosedError('Memory endpoint is closed.');
        }
        const [requestTx, requestRx] = pipe<TReq>(this._capacity);
        const [responseTx, responseRx] = pipe<TRes>(this._capacity);
        await this._accepts.send([responseTx, requestRx]);
        return [requestTx, responseRx];
    }
}

class MemoryEndpoint<TReq, TRes> implements Endpoint<TReq, TRes> {
    readonly kind = 'memory';

    constructor(private readonly _accepts: PipeReceiver<Pending<TReq, TRes>>) {}

    async accept(): Promise<Channel<TReq, TRes> | undefined> {
        const next = await this._accepts.recv();
        return next.done ? undefined : next.value;
    }
}

/**
 * Create an in-process connection/endpoint pair for service `S`.
 */
export function createMemoryTransport<S extends Service>(
    options: MemoryTransportOptions = {},
): MemoryTransport<S> {
    const capacity = options.capacity ?? 1;
    const backlog = options.backlog ?? 16;
    const [acceptTx, acceptRx] = pipe<Pending<RequestOf<S>, ResponseOf<S>>>(backlog);

    return {
        connection: new MemoryConnection<RequestOf<S>, ResponseOf<S>>(acceptTx, capacity),
        endpoint: new MemoryEndpoint<RequestOf<S>, ResponseOf<S>>(acceptRx),
        close(): void {
            // Dropping the queue rejects waiting opens and ends accept();
            // channels that were opened but never accepted fail at the client
            acceptRx.close(([responseTx, requestRx]) => {
                requestRx.close();
                responseTx.fail(new ConnectionClosedError('Memory endpoint closed before accepting the channel.'));
            });
        },
    };
}
