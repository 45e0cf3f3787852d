import { describe, it, expect, vi, afterEach } from 'vitest';
import { CalcHandler } from '../src/services/calc.js';
import { ClockHandler } from '../src/services/clock.js';
import { PlatformHandler } from '../src/services/platform.js';
import { INTERVAL_MS, startApp } from './harness.js';

const stops: Array<() => Promise<void>> = [];

afterEach(async () => {
    for (const stop of stops.splice(0)) await stop();
    vi.useRealTimers();
    vi.restoreAllMocks();
});

function start(version?: string) {
    const running = startApp(version);
    stops.push(() => running.stop());
    return running;
}

describe('composed app', () => {
    describe('calc through the platform', () => {
        it('should add', async () => {
            const { app } = start();
            expect(await app.platform.calc.add(40, 2)).toBe(42);
        });

        it('should answer exactly like the standalone handler', async () => {
            const { app } = start();
            const direct = CalcHandler.add(new CalcHandler(), { a: 40, b: 2 });
            expect({ sum: await app.platform.calc.add(40, 2) }).toEqual(direct);
        });

        it('should sum streamed values', async () => {
            const { app } = start();
            expect(await app.platform.calc.sum([1, 2, 3, 4])).toBe(10);
            expect(await app.platform.calc.sum([], 5)).toBe(5);
        });

        it('should answer every value with the running total', async () => {
            const { app } = start();
            expect(await app.platform.calc.accumulate([1, 2, 3], 10)).toEqual([11, 13, 16]);
        });
    });

    describe('clock through the platform', () => {
        it('should stream the current tick and never go backwards', async () => {
            vi.useFakeTimers();
            const { app, handler } = start();

            await vi.advanceTimersByTimeAsync(3 * INTERVAL_MS);
            expect(handler.platform.clock.current).toBe(3);

            const stream = await app.platform.clock.tick();
            const ticks: number[] = [];
            const first = await stream.recv();
            if (!first.done) ticks.push(first.value.tick);

            for (let i = 0; i < 3; i++) {
                await vi.advanceTimersByTimeAsync(INTERVAL_MS);
                const next = await stream.recv();
                if (!next.done) ticks.push(next.value.tick);
            }
            stream.close();

            expect(ticks).toHaveLength(4);
            expect(ticks[0]).toBeGreaterThanOrEqual(3);
            for (let i = 1; i < ticks.length; i++) {
                expect(ticks[i]).toBeGreaterThanOrEqual(ticks[i - 1] ?? 0);
            }
        });

        it('should end subscriptions when the handler closes', async () => {
            const { app, handler } = start();
            const stream = await app.platform.clock.tick();
            expect(await stream.recv()).toEqual({ done: false, value: { tick: 0 } });

            handler.close();
            expect(await stream.recv()).toEqual({ done: true, value: undefined });
        });
    });

    describe('app-level method', () => {
        it('should answer without touching the platform', async () => {
            const platform = vi.spyOn(PlatformHandler.prototype, 'handle');
            const calc = vi.spyOn(CalcHandler.prototype, 'handle');
            const clock = vi.spyOn(ClockHandler.prototype, 'handle');
            const { app } = start('2.0.0');

            expect(await app.version()).toBe('2.0.0');
            expect(platform).not.toHaveBeenCalled();
            expect(calc).not.toHaveBeenCalled();
            expect(clock).not.toHaveBeenCalled();
        });

        it('should reach the platform only for platform variants', async () => {
            const platform = vi.spyOn(PlatformHandler.prototype, 'handle');
            const { app } = start();

            await app.platform.calc.add(1, 1);
            expect(platform).toHaveBeenCalledTimes(1);
        });
    });
});
