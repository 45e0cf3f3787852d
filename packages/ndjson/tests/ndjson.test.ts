import { describe, it, expect, vi, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { z } from 'zod';
import {
    ConnectionClosedError,
    HandlerError,
    RpcClient,
    RpcServer,
    SerializationError,
    serve,
    type DebugEvent,
    type RequestOf,
    type Rpc,
    type RpcChannel,
    type ServerStreaming,
} from '@strand-rpc/core';
import { ACK_BATCH } from '../src/frames.js';
import { CHANNEL_WINDOW, createNdjsonConnection, createNdjsonEndpoint } from '../src/index.js';

// ============================================================================
// Fixtures
// ============================================================================

type MathService = {
    add: Rpc<{ a: number; b: number }, { sum: number }>;
    fail: Rpc<{ reason: string }, { sum: number }>;
    count: ServerStreaming<{ to: number }, number>;
};

class MathHandler {
    produced = 0;
    countClosed = false;

    handle(request: RequestOf<MathService>, channel: RpcChannel<MathService>): Promise<void> {
        switch (request.tag) {
            case 'add':
                return channel.rpc(request, this, (_self, { a, b }) => ({ sum: a + b }));
            case 'fail':
                return channel.rpc(request, this, (_self, { reason }) => {
                    throw new Error(reason);
                });
            case 'count':
                return channel.serverStreaming(request, this, MathHandler.count);
        }
    }

    static async *count(self: MathHandler, { to }: { to: number }): AsyncGenerator<number> {
        try {
            for (let i = 1; i <= to; i++) {
                self.produced = i;
                yield i;
            }
        } finally {
            self.countClosed = true;
        }
    }
}

interface Wire {
    /** Client → server bytes. */
    readonly toServer: PassThrough;
    /** Server → client bytes. */
    readonly toClient: PassThrough;
}

const cleanups: Array<() => Promise<void> | void> = [];

afterEach(async () => {
    for (const cleanup of cleanups.splice(0).reverse()) await cleanup();
});

function wire(): Wire {
    const toServer = new PassThrough();
    const toClient = new PassThrough();
    cleanups.push(() => {
        if (!toServer.writableEnded) toServer.end();
        if (!toClient.writableEnded) toClient.end();
    });
    return { toServer, toClient };
}

function clientOf({ toServer, toClient }: Wire) {
    const connection = createNdjsonConnection<MathService>({ input: toClient, output: toServer });
    cleanups.push(() => connection.close());
    return { connection, client: new RpcClient<MathService>(connection) };
}

function serverOf({ toServer, toClient }: Wire, debug?: (event: DebugEvent) => void) {
    const endpoint = createNdjsonEndpoint<MathService>({ input: toServer, output: toClient, debug });
    const handler = new MathHandler();
    const server = new RpcServer<MathService>(endpoint);
    const serving = serve(server, (request, channel) => handler.handle(request, channel), {
        onError: () => undefined,
    });
    cleanups.push(async () => {
        endpoint.close();
        await serving;
    });
    return { endpoint, handler, serving };
}

/** Everything written to `stream` so far, as text. */
function capture(stream: PassThrough): () => string {
    let text = '';
    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => {
        text += chunk;
    });
    return () => text;
}

// ============================================================================
// Round Trips
// ============================================================================

describe('NDJSON transport', () => {
    it('should carry a unary call', async () => {
        const link = wire();
        serverOf(link);
        const { client } = clientOf(link);

        expect(await client.rpc('add', { a: 2, b: 3 })).toEqual({ sum: 5 });
    });

    it('should multiplex concurrent calls over one stream pair', async () => {
        const link = wire();
        serverOf(link);
        const { client } = clientOf(link);

        const sums = await Promise.all([1, 2, 3].map((n) => client.rpc('add', { a: n, b: 10 })));
        expect(sums).toEqual([{ sum: 11 }, { sum: 12 }, { sum: 13 }]);
    });

    it('should stream responses in order', async () => {
        const link = wire();
        serverOf(link);
        const { client } = clientOf(link);

        const seen: number[] = [];
        for await (const n of await client.serverStreaming('count', { to: 4 })) seen.push(n);
        expect(seen).toEqual([1, 2, 3, 4]);
    });

    it('should rebuild HandlerError on the client', async () => {
        const link = wire();
        serverOf(link);
        const { client } = clientOf(link);

        const call = client.rpc('fail', { reason: 'boom' });
        await expect(call).rejects.toBeInstanceOf(HandlerError);
        await expect(call).rejects.toMatchObject({ message: 'boom', details: { method: 'fail' } });
    });

    it('should stop the producer once the client drops the stream', async () => {
        const link = wire();
        const { handler } = serverOf(link);
        const { client } = clientOf(link);

        const stream = await client.serverStreaming('count', { to: 100_000 });
        const seen: number[] = [];
        for await (const n of stream) {
            seen.push(n);
            if (seen.length === 2) break;
        }

        expect(seen).toEqual([1, 2]);
        await vi.waitFor(() => expect(handler.countClosed).toBe(true), { timeout: 5_000 });
        expect(handler.produced).toBeLessThan(100_000);
    });

    it('should accept channels whose first messages arrive out of order', async () => {
        const link = wire();
        serverOf(link);
        const { connection } = clientOf(link);

        const [firstSink, firstStream] = await connection.open();
        const [secondSink, secondStream] = await connection.open();

        await secondSink.send({ tag: 'add', value: { a: 1, b: 1 } });
        await secondSink.close();
        expect(await secondStream.recv()).toEqual({ done: false, value: { tag: 'add', value: { sum: 2 } } });

        await firstSink.send({ tag: 'add', value: { a: 2, b: 2 } });
        await firstSink.close();
        expect(await firstStream.recv()).toEqual({ done: false, value: { tag: 'add', value: { sum: 4 } } });
    });

    // ============================================================================
    // Flow Control
    // ============================================================================

    it('should stall the producer while the client is not reading', async () => {
        const link = wire();
        const { handler } = serverOf(link);
        const { client } = clientOf(link);

        const stream = await client.serverStreaming('count', { to: 1_000 });
        expect(await stream.recv()).toEqual({ done: false, value: 1 });

        // A full window is in flight and the next item waits for credit
        await vi.waitFor(() => expect(handler.produced).toBe(CHANNEL_WINDOW + 1));
        await new Promise((resolve) => setTimeout(resolve, 50));
        expect(handler.produced).toBe(CHANNEL_WINDOW + 1);

        for (let i = 2; i <= ACK_BATCH; i++) await stream.recv();
        await vi.waitFor(() => expect(handler.produced).toBe(CHANNEL_WINDOW + ACK_BATCH + 1));
        stream.close();
    });

    it('should acknowledge consumed messages in batches', async () => {
        const link = wire();
        const written = capture(link.toServer);
        const { client } = clientOf(link);

        const stream = await client.serverStreaming('count', { to: ACK_BATCH });
        for (let n = 1; n <= ACK_BATCH; n++) {
            link.toClient.write(`{"op":"msg","ch":0,"data":{"tag":"count","value":${n}}}\n`);
        }
        for (let n = 1; n <= ACK_BATCH; n++) expect(await stream.recv()).toEqual({ done: false, value: n });

        await vi.waitFor(() => expect(written()).toContain('"op":"ack"'));
        expect(written().split('\n').slice(0, 3)).toEqual([
            `{"op":"msg","ch":0,"data":{"tag":"count","value":{"to":${ACK_BATCH}}}}`,
            '{"op":"end","ch":0}',
            `{"op":"ack","ch":0,"n":${ACK_BATCH}}`,
        ]);
        stream.close();
    });

    // ============================================================================
    // Wire Format
    // ============================================================================

    it('should write one frame per line', async () => {
        const link = wire();
        const written = capture(link.toServer);
        const { client } = clientOf(link);

        const call = client.rpc('add', { a: 1, b: 2 });
        await vi.waitFor(() => expect(written()).toContain('"op":"end"'));
        expect(written().split('\n').slice(0, 2)).toEqual([
            '{"op":"msg","ch":0,"data":{"tag":"add","value":{"a":1,"b":2}}}',
            '{"op":"end","ch":0}',
        ]);

        link.toClient.write('{"op":"msg","ch":0,"data":{"tag":"add","value":{"sum":3}}}\n');
        link.toClient.write('{"op":"end","ch":0}\n');
        expect(await call).toEqual({ sum: 3 });
    });

    it('should skip lines that are not frames and keep serving', async () => {
        const events: DebugEvent[] = [];
        const link = wire();
        serverOf(link, (event) => events.push(event));
        const { client } = clientOf(link);

        link.toServer.write('\n');
        link.toServer.write('not json\n');
        link.toServer.write('{"op":"end","ch":99}\n');

        expect(await client.rpc('add', { a: 1, b: 1 })).toEqual({ sum: 2 });
        expect(events).toHaveLength(1);
        const [event] = events;
        expect(event).toMatchObject({ type: 'error', method: 'ndjson', step: 'decode' });
        if (event?.type === 'error') expect(event.error).toMatch(/^invalid JSON: /);
    });

    // ============================================================================
    // Validation & Shutdown
    // ============================================================================

    it('should refuse messages the schema rejects and drop the channel', async () => {
        const link = wire();
        const written = capture(link.toClient);
        const endpoint = createNdjsonEndpoint<MathService>({
            input: link.toServer,
            output: link.toClient,
            schema: z.object({
                tag: z.literal('add'),
                value: z.object({ a: z.number(), b: z.number() }),
            }),
        });
        cleanups.push(() => endpoint.close());
        const server = new RpcServer<MathService>(endpoint);

        link.toServer.write('{"op":"msg","ch":0,"data":{"tag":"add","value":{"a":"x","b":2}}}\n');

        const accepted = server.accept();
        await expect(accepted).rejects.toBeInstanceOf(SerializationError);
        await expect(accepted).rejects.toThrow(/^Channel 0: invalid message: /);
        await vi.waitFor(() => expect(written()).toBe('{"op":"drop","ch":0}\n'));
    });

    it('should finish accept() when the input ends', async () => {
        const link = wire();
        const endpoint = createNdjsonEndpoint<MathService>({ input: link.toServer, output: link.toClient });

        link.toServer.end();
        expect(await endpoint.accept()).toBeUndefined();
    });

    it('should fail open channels and later opens when the input ends', async () => {
        const link = wire();
        const { connection } = clientOf(link);

        const [, stream] = await connection.open();
        link.toClient.end();

        await expect(stream.recv()).rejects.toBeInstanceOf(ConnectionClosedError);
        await expect(connection.open()).rejects.toThrow('NDJSON input has ended.');
    });

    it('should report ndjson as the transport kind', () => {
        const link = wire();
        const { connection } = clientOf(link);
        const endpoint = createNdjsonEndpoint<MathService>({ input: link.toServer, output: link.toClient });
        cleanups.push(() => endpoint.close());

        expect(connection.kind).toBe('ndjson');
        expect(endpoint.kind).toBe('ndjson');
    });
});
