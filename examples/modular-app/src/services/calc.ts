/**
 * Calc — arithmetic service.
 *
 * Knows nothing about the app it is composed into: its handler and client
 * take a channel and a client typed for `CalcService` only, whatever
 * parent they were mapped out of.
 */
import type {
    BidiStreaming,
    ClientStreaming,
    RequestOf,
    Rpc,
    RpcChannel,
    RpcClient,
} from '@strand-rpc/core';

// ── Messages ─────────────────────────────────────────────

export interface AddRequest {
    readonly a: number;
    readonly b: number;
}

export interface AddResponse {
    readonly sum: number;
}

export interface TotalRequest {
    /** Value the running total starts from. */
    readonly start: number;
}

export interface TotalResponse {
    readonly total: number;
}

export type CalcService = {
    add: Rpc<AddRequest, AddResponse>;
    /** Updates are summed; the total is returned once they end. */
    sum: ClientStreaming<TotalRequest, number, TotalResponse>;
    /** Every update is answered with the running total. */
    accumulate: BidiStreaming<TotalRequest, number, TotalResponse>;
};

// ── Server ───────────────────────────────────────────────

export class CalcHandler {
    handle(request: RequestOf<CalcService>, channel: RpcChannel<CalcService>): Promise<void> {
        switch (request.tag) {
            case 'add':
                return channel.rpc(request, this, CalcHandler.add);
            case 'sum':
                return channel.clientStreaming(request, this, CalcHandler.sum);
            case 'accumulate':
                return channel.bidiStreaming(request, this, CalcHandler.accumulate);
            default:
                return channel.reject(request);
        }
    }

    static add(_self: CalcHandler, request: AddRequest): AddResponse {
        return { sum: request.a + request.b };
    }

    static async sum(
        _self: CalcHandler,
        request: TotalRequest,
        updates: AsyncIterable<number>,
    ): Promise<TotalResponse> {
        let total = request.start;
        for await (const value of updates) total += value;
        return { total };
    }

    static async *accumulate(
        _self: CalcHandler,
        request: TotalRequest,
        updates: AsyncIterable<number>,
    ): AsyncGenerator<TotalResponse> {
        let total = request.start;
        for await (const value of updates) {
            total += value;
            yield { total };
        }
    }
}

// ── Client ───────────────────────────────────────────────

export class CalcClient {
    constructor(private readonly _client: RpcClient<CalcService>) {}

    async add(a: number, b: number): Promise<number> {
        const { sum } = await this._client.rpc('add', { a, b });
        return sum;
    }

    async sum(values: Iterable<number>, start = 0): Promise<number> {
        const call = await this._client.clientStreaming('sum', { start });
        for (const value of values) await call.updates.send(value);
        await call.updates.close();
        const { total } = await call.response();
        return total;
    }

    /** Running totals, one per value sent. */
    async accumulate(values: Iterable<number>, start = 0): Promise<number[]> {
        const call = await this._client.bidiStreaming('accumulate', { start });
        const totals: number[] = [];
        for (const value of values) {
            await call.updates.send(value);
            const next = await call.responses.recv();
            if (next.done) break;
            totals.push(next.value.total);
        }
        await call.updates.close();
        call.responses.close();
        return totals;
    }
}
