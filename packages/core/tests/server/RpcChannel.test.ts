import { describe, it, expect, afterEach } from 'vitest';
import { RpcChannel, type ChannelHooks } from '../../src/server/RpcChannel.js';
import { MappingError } from '../../src/errors/RpcError.js';
import type { CompleteEvent, DebugEvent } from '../../src/observability/DebugObserver.js';
import type { RpcAttributeValue, RpcSpan, RpcTracer } from '../../src/observability/Tracing.js';
import type { RequestOf, ResponseOf, Service } from '../../src/service/Service.js';
import { wrapChildRequest, wrapRequest, wrapUpdate } from '../../src/service/variant.js';
import { pipe } from '../../src/transport/Pipe.js';
import type { EchoService, Harness, RootService } from '../fixtures.js';
import { startHarness } from '../fixtures.js';

// ============================================================================
// Helpers
// ============================================================================

function channelOf<S extends Service>(hooks?: ChannelHooks) {
    const [responseTx, responseRx] = pipe<ResponseOf<S>>(8);
    const [requestTx, requestRx] = pipe<RequestOf<S>>(8);
    return { channel: new RpcChannel<S>(responseTx, requestRx, hooks), requestTx, responseRx };
}

class FakeSpan implements RpcSpan {
    readonly attributes: Record<string, RpcAttributeValue> = {};
    readonly exceptions: Array<Error | string> = [];
    status: { code: number; message?: string } | undefined;
    ended = 0;

    constructor(readonly name: string, initial: Record<string, RpcAttributeValue> = {}) {
        Object.assign(this.attributes, initial);
    }

    setAttribute(key: string, value: RpcAttributeValue): void {
        this.attributes[key] = value;
    }

    setStatus(status: { code: number; message?: string }): void {
        this.status = status;
    }

    end(): void {
        this.ended++;
    }

    recordException(exception: Error | string): void {
        this.exceptions.push(exception);
    }
}

class FakeTracer implements RpcTracer {
    readonly spans: FakeSpan[] = [];

    startSpan(name: string, options?: { attributes?: Record<string, RpcAttributeValue> }): RpcSpan {
        const span = new FakeSpan(name, options?.attributes);
        this.spans.push(span);
        return span;
    }
}

let harness: Harness | undefined;

afterEach(async () => {
    await harness?.stop();
    harness = undefined;
});

// ============================================================================
// Consumption
// ============================================================================

describe('RpcChannel', () => {
    describe('consumption', () => {
        it('should refuse a second dispatch', async () => {
            const { channel } = channelOf<EchoService>();
            const request = wrapRequest<EchoService, 'echo'>('echo', { text: 'a' });
            if (request.tag !== 'echo') throw new Error('unreachable');

            await channel.rpc(request, undefined, (_state, req) => req);
            expect(channel.consumed).toBe(true);
            await expect(channel.rpc(request, undefined, (_state, req) => req)).rejects.toThrow(
                'RpcChannel at "<root>" was already consumed by "echo"; attempted "echo".',
            );
        });

        it('should count map() as consumption and extend the path', () => {
            const { channel } = channelOf<RootService>();
            const child = channel.map('echo');

            expect(child.path).toEqual(['echo']);
            expect(child.consumed).toBe(false);
            expect(() => channel.map('echo')).toThrow(
                'RpcChannel at "<root>" was already consumed by "echo"; attempted "echo".',
            );
        });

        it('should send a unary response and close the channel', async () => {
            const { channel, responseRx } = channelOf<EchoService>();
            const request = wrapRequest<EchoService, 'echo'>('echo', { text: 'a' });
            if (request.tag !== 'echo') throw new Error('unreachable');

            await channel.rpc(request, { prefix: '>' }, (state, req) => ({ text: state.prefix + req.text }));

            expect(await responseRx.recv()).toEqual({ done: false, value: { tag: 'echo', value: { text: '>a' } } });
            expect(await responseRx.recv()).toEqual({ done: true, value: undefined });
        });
    });

    // ============================================================================
    // Cancellation
    // ============================================================================

    describe('cancellation', () => {
        it('should stop the producer when the client drops its half', async () => {
            let resolveComplete: (event: CompleteEvent) => void = () => undefined;
            const completed = new Promise<CompleteEvent>((resolve) => {
                resolveComplete = resolve;
            });
            harness = startHarness({
                server: {
                    debug: (event) => {
                        if (event.type === 'complete') resolveComplete(event);
                    },
                },
            });

            const stream = await harness.client.map('echo').serverStreaming('count', { to: 100 });
            const seen: number[] = [];
            for await (const n of stream) {
                seen.push(n);
                if (seen.length === 2) break;
            }

            const event = await completed;
            expect(seen).toEqual([1, 2]);
            expect(event).toMatchObject({ method: 'echo.count', pattern: 'server-streaming', cancelled: true });
            expect(harness.handler.echo.countClosed).toBe(true);
            expect(harness.handler.echo.produced.length).toBeLessThan(10);
        });

        it('should leave other channels running', async () => {
            harness = startHarness();
            const echo = harness.client.map('echo');

            const stream = await echo.serverStreaming('count', { to: 100 });
            await stream.recv();
            stream.close();

            expect(await echo.rpc('echo', { text: 'still here' })).toEqual({ text: 'still here' });
        });
    });

    // ============================================================================
    // Observability
    // ============================================================================

    describe('debug events', () => {
        it('should emit accept, dispatch and complete with the full path', async () => {
            const events: DebugEvent[] = [];
            harness = startHarness({ server: { debug: (event) => events.push(event) } });

            await harness.client.map('echo').rpc('echo', { text: 'x' });
            await harness.stop();

            expect(events.map((event) => event.type)).toEqual(['accept', 'dispatch', 'complete']);
            expect(events[0]).toMatchObject({ type: 'accept', transport: 'memory', tag: 'echo' });
            expect(events[1]).toMatchObject({ type: 'dispatch', method: 'echo.echo', pattern: 'rpc' });
            expect(events[2]).toMatchObject({ type: 'complete', method: 'echo.echo', items: 1, cancelled: false });
        });

        it('should emit one error event for a handler fault', async () => {
            const events: DebugEvent[] = [];
            harness = startHarness({
                server: { debug: (event) => events.push(event) },
                serve: { onError: undefined },
            });

            await expect(harness.client.map('echo').rpc('explode', { reason: 'boom' })).rejects.toThrow('boom');
            await harness.stop();

            const errors = events.filter((event) => event.type === 'error');
            expect(errors).toHaveLength(1);
            expect(errors[0]).toMatchObject({ method: 'echo.explode', step: 'handler', error: 'boom' });
            expect(events.some((event) => event.type === 'complete')).toBe(false);
        });
    });

    describe('tracing', () => {
        it('should open one span per dispatch', async () => {
            const tracer = new FakeTracer();
            harness = startHarness({ server: { tracer } });

            const stream = await harness.client.map('echo').serverStreaming('count', { to: 2 });
            for await (const n of stream) expect(n).toBeGreaterThan(0);
            await harness.stop();

            expect(tracer.spans).toHaveLength(1);
            const [span] = tracer.spans;
            expect(span?.name).toBe('rpc.server-streaming');
            expect(span?.attributes).toEqual({
                'rpc.method': 'echo.count',
                'rpc.pattern': 'server-streaming',
                'rpc.items': 2,
                'rpc.cancelled': false,
            });
            expect(span?.status).toEqual({ code: 1 });
            expect(span?.ended).toBe(1);
        });

        it('should record the exception of a failing handler', async () => {
            const tracer = new FakeTracer();
            harness = startHarness({ server: { tracer } });

            await expect(harness.client.map('echo').rpc('explode', { reason: 'boom' })).rejects.toThrow('boom');
            await harness.stop();

            const [span] = tracer.spans;
            expect(span?.exceptions).toHaveLength(1);
            expect(span?.status).toEqual({ code: 2, message: 'boom' });
            expect(span?.ended).toBe(1);
        });
    });

    // ============================================================================
    // Rejection
    // ============================================================================

    describe('reject', () => {
        it('should answer a stray update with MappingError', async () => {
            const events: DebugEvent[] = [];
            harness = startHarness({ server: { debug: (event) => events.push(event) } });

            const [sink, stream] = await harness.transport.connection.open();
            await sink.send(wrapChildRequest<RootService, 'echo'>('echo', wrapUpdate<EchoService, 'join'>('join', 'x')));

            const received = stream.recv();
            await expect(received).rejects.toBeInstanceOf(MappingError);
            await expect(received).rejects.toThrow('echo.join:update: no handler for variant "join:update".');

            await harness.stop();
            expect(events.at(-1)).toMatchObject({ type: 'error', step: 'dispatch', method: 'echo.join:update' });
        });

        it('should answer an update of the wrong variant with MappingError', async () => {
            harness = startHarness();

            const [sink, stream] = await harness.transport.connection.open();
            await sink.send(wrapChildRequest<RootService, 'echo'>('echo', wrapRequest<EchoService, 'join'>('join', { separator: ',' })));
            await sink.send(wrapChildRequest<RootService, 'echo'>('echo', wrapRequest<EchoService, 'echo'>('echo', { text: 'stray' })));

            const received = stream.recv();
            await expect(received).rejects.toBeInstanceOf(MappingError);
            await expect(received).rejects.toMatchObject({
                code: 'MAPPING_ERROR',
                message: 'echo.join: expected variant "join:update", received "echo"',
            });
        });
    });
});
