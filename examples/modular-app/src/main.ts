/**
 * Demo — the composed app over an in-memory transport.
 *
 * Starts the accept loop, then calls every layer through one client:
 * the app's own `version`, `platform.calc.add` and a few ticks of
 * `platform.clock.tick`.
 */
import { pathToFileURL } from 'node:url';
import {
    RpcClient,
    RpcServer,
    createDebugObserver,
    createMemoryTransport,
    serve,
} from '@strand-rpc/core';
import { loadConfig, type AppConfig } from './config.js';
import { AppClient, AppHandler, type AppService } from './services/app.js';

/** Calls made by the demo, printed through `log`. */
export async function runDemo(
    app: AppClient,
    config: AppConfig,
    log: (line: string) => void,
): Promise<void> {
    log(`app: version ${await app.version()}`);
    log(`calc: add(40, 2) = ${await app.platform.calc.add(40, 2)}`);

    if (config.demoTicks === 0) return;
    let seen = 0;
    for await (const { tick } of await app.platform.clock.tick()) {
        log(`clock: tick ${tick}`);
        if (++seen >= config.demoTicks) break;
    }
}

/** Wire server and client together, run the demo, shut down. */
export async function main(
    env: Readonly<Record<string, string | undefined>> = process.env,
    log: (line: string) => void = console.log,
): Promise<void> {
    const config = loadConfig(env);
    const transport = createMemoryTransport<AppService>();
    const handler = AppHandler.create({
        version: config.version,
        clock: { intervalMs: config.clockIntervalMs },
    });
    const server = new RpcServer<AppService>(transport.endpoint, {
        debug: config.debug ? createDebugObserver() : undefined,
    });
    const serving = serve(server, (request, channel) => handler.handle(request, channel));

    try {
        await runDemo(new AppClient(new RpcClient<AppService>(transport.connection)), config, log);
    } finally {
        transport.close();
        handler.close();
        await serving;
    }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
    await main();
}
