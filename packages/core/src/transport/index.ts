/** Transport Contracts & Adapters — Barrel Export */
export type {
    SendSink, RecvStream, Channel,
    Connection, Endpoint,
    ServiceConnection, ServiceEndpoint,
} from './types.js';

// ── In-Process ───────────────────────────────────────────
export { pipe, PipeSender, PipeReceiver } from './Pipe.js';
export { createMemoryTransport } from './memory.js';
export type { MemoryTransport, MemoryTransportOptions } from './memory.js';

// ── Adapters ─────────────────────────────────────────────
export { BoxedConnection, BoxedEndpoint } from './boxed.js';
export { MappedConnection, MappedSendSink, MappedRecvStream } from './mapped.js';
export type { Widen, Narrow } from './mapped.js';
