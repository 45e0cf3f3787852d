/** Server Dispatch — Barrel Export */
export { RpcServer } from './RpcServer.js';
export type { RpcServerOptions, Accepted } from './RpcServer.js';

// ── Channel Dispatch ─────────────────────────────────────
export { RpcChannel } from './RpcChannel.js';
export type {
    ChannelHooks,
    Producer,
    RpcHandler,
    ServerStreamingHandler,
    ClientStreamingHandler,
    BidiStreamingHandler,
} from './RpcChannel.js';

// ── Accept Loop ──────────────────────────────────────────
export { serve } from './serve.js';
export type { ServeHandler, ServeOptions, ServeStep } from './serve.js';
