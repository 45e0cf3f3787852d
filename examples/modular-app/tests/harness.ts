/**
 * The composed app served over a memory transport, as `main` wires it.
 */
import { RpcClient, RpcServer, createMemoryTransport, serve } from '@strand-rpc/core';
import { AppClient, AppHandler, type AppService } from '../src/services/app.js';

export const INTERVAL_MS = 100;

export function startApp(version = '1.2.3') {
    const transport = createMemoryTransport<AppService>();
    const handler = AppHandler.create({ version, clock: { intervalMs: INTERVAL_MS } });
    const server = new RpcServer<AppService>(transport.endpoint);
    const serving = serve(server, (request, channel) => handler.handle(request, channel), {
        onError: () => undefined,
    });
    return {
        app: new AppClient(new RpcClient<AppService>(transport.connection)),
        handler,
        async stop(): Promise<void> {
            transport.close();
            handler.close();
            await serving;
        },
    };
}
