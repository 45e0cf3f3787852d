/**
 * Platform — composes calc and clock under one service.
 *
 * Holds no methods of its own: every variant is a child's whole union,
 * delegated through a mapped channel.
 */
import type { Nested, RequestOf, RpcChannel, RpcClient } from '@strand-rpc/core';
import { CalcClient, CalcHandler, type CalcService } from './calc.js';
import { ClockClient, ClockHandler, type ClockOptions, type ClockService } from './clock.js';

export type PlatformService = {
    calc: Nested<CalcService>;
    clock: Nested<ClockService>;
};

export class PlatformHandler {
    constructor(
        readonly calc: CalcHandler,
        readonly clock: ClockHandler,
    ) {}

    static create(clock: ClockOptions): PlatformHandler {
        return new PlatformHandler(new CalcHandler(), new ClockHandler(clock));
    }

    handle(request: RequestOf<PlatformService>, channel: RpcChannel<PlatformService>): Promise<void> {
        switch (request.tag) {
            case 'calc':
                return this.calc.handle(request.value, channel.map(request.tag));
            case 'clock':
                return this.clock.handle(request.value, channel.map(request.tag));
        }
    }

    close(): void {
        this.clock.close();
    }
}

export class PlatformClient {
    readonly calc: CalcClient;
    readonly clock: ClockClient;

    constructor(client: RpcClient<PlatformService>) {
        this.calc = new CalcClient(client.map('calc'));
        this.clock = new ClockClient(client.map('clock'));
    }
}
