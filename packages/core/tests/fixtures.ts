/**
 * Shared test fixtures — a small service tree and an in-memory harness.
 */
import type {
    BidiStreaming,
    ClientStreaming,
    Nested,
    RequestOf,
    Rpc,
    ServerStreaming,
} from '../src/service/Service.js';
import { RpcClient } from '../src/client/RpcClient.js';
import type { RpcChannel } from '../src/server/RpcChannel.js';
import { RpcServer, type RpcServerOptions } from '../src/server/RpcServer.js';
import { serve, type ServeOptions } from '../src/server/serve.js';
import { createMemoryTransport, type MemoryTransport, type MemoryTransportOptions } from '../src/transport/memory.js';

// ============================================================================
// Services
// ============================================================================

export type EchoService = {
    echo: Rpc<{ text: string }, { text: string }>;
    explode: Rpc<{ reason: string }, { text: string }>;
    count: ServerStreaming<{ to: number }, number>;
    join: ClientStreaming<{ separator: string }, string, string>;
    shout: BidiStreaming<{ suffix: string }, string, string>;
};

export type RootService = {
    echo: Nested<EchoService>;
    ping: Rpc<{ id: number }, { id: number; pong: true }>;
};

// ============================================================================
// Handlers
// ============================================================================

export class EchoHandler {
    /** Values handed to the stream of the last `count` call. */
    readonly produced: number[] = [];
    /** `true` once the last `count` producer was closed. */
    countClosed = false;

    handle(request: RequestOf<EchoService>, channel: RpcChannel<EchoService>): Promise<void> {
        switch (request.tag) {
            case 'echo':
                return channel.rpc(request, this, (_self, req) => ({ text: req.text }));
            case 'explode':
                return channel.rpc(request, this, (_self, req) => {
                    throw new Error(req.reason);
                });
            case 'count':
                return channel.serverStreaming(request, this, EchoHandler.count);
            case 'join':
                return channel.clientStreaming(request, this, async (_self, req, updates) => {
                    const parts: string[] = [];
                    for await (const part of updates) parts.push(part);
                    return parts.join(req.separator);
                });
            case 'shout':
                return channel.bidiStreaming(request, this, async function* (_self, req, updates) {
                    for await (const word of updates) yield `${word.toUpperCase()}${req.suffix}`;
                });
            default:
                return channel.reject(request);
        }
    }

    static async *count(self: EchoHandler, request: { to: number }): AsyncGenerator<number> {
        self.countClosed = false;
        try {
            for (let i = 1; i <= request.to; i++) {
                self.produced.push(i);
                yield i;
            }
        } finally {
            self.countClosed = true;
        }
    }
}

export class RootHandler {
    readonly echo = new EchoHandler();

    handle(request: RequestOf<RootService>, channel: RpcChannel<RootService>): Promise<void> {
        switch (request.tag) {
            case 'echo':
                return this.echo.handle(request.value, channel.map(request.tag));
            case 'ping':
                return channel.rpc(request, this, (_self, req) => ({ id: req.id, pong: true as const }));
        }
    }
}

// ============================================================================
// Harness
// ============================================================================

export interface Harness {
    readonly transport: MemoryTransport<RootService>;
    readonly server: RpcServer<RootService>;
    readonly client: RpcClient<RootService>;
    readonly handler: RootHandler;
    /** Close the transport and wait for the accept loop to finish. */
    stop(): Promise<void>;
}

export interface HarnessOptions {
    readonly transport?: MemoryTransportOptions;
    readonly server?: RpcServerOptions;
    readonly serve?: ServeOptions;
}

/** Root service served over a memory transport. */
export function startHarness(options: HarnessOptions = {}): Harness {
    const transport = createMemoryTransport<RootService>(options.transport);
    const server = new RpcServer<RootService>(transport.endpoint, options.server);
    const handler = new RootHandler();
    const serving = serve(server, (request, channel) => handler.handle(request, channel), {
        onError: () => undefined,
        ...options.serve,
    });
    return {
        transport,
        server,
        client: new RpcClient<RootService>(transport.connection),
        handler,
        async stop() {
            transport.close();
            await serving;
        },
    };
}

/** Let pending promise callbacks run. */
export async function flush(rounds = 10): Promise<void> {
    for (let i = 0; i < rounds; i++) await Promise.resolve();
}
