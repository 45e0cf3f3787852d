/**
 * App — the outermost service: the platform plus an app-level method.
 */
import type { Nested, RequestOf, Rpc, RpcChannel, RpcClient } from '@strand-rpc/core';
import type { ClockOptions } from './clock.js';
import { PlatformClient, PlatformHandler, type PlatformService } from './platform.js';

export type VersionRequest = Record<string, never>;

export interface VersionResponse {
    readonly version: string;
}

export type AppService = {
    platform: Nested<PlatformService>;
    version: Rpc<VersionRequest, VersionResponse>;
};

export interface AppHandlerOptions {
    readonly version: string;
    readonly clock: ClockOptions;
}

export class AppHandler {
    constructor(
        readonly platform: PlatformHandler,
        private readonly _version: string,
    ) {}

    static create(options: AppHandlerOptions): AppHandler {
        return new AppHandler(PlatformHandler.create(options.clock), options.version);
    }

    handle(request: RequestOf<AppService>, channel: RpcChannel<AppService>): Promise<void> {
        switch (request.tag) {
            case 'platform':
                return this.platform.handle(request.value, channel.map(request.tag));
            case 'version':
                return channel.rpc(request, this, AppHandler.version);
        }
    }

    static version(self: AppHandler): VersionResponse {
        return { version: self._version };
    }

    close(): void {
        this.platform.close();
    }
}

export class AppClient {
    readonly platform: PlatformClient;

    constructor(private readonly _client: RpcClient<AppService>) {
        this.platform = new PlatformClient(_client.map('platform'));
    }

    async version(): Promise<string> {
        const { version } = await this._client.rpc('version', {});
        return version;
    }
}
