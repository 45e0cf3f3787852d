/** NDJSON Transport — Barrel Export */
export { createNdjsonConnection, createNdjsonEndpoint } from './ndjson.js';
export type { NdjsonConnection, NdjsonEndpoint } from './ndjson.js';
export type { NdjsonOptions } from './NdjsonSession.js';
export { CHANNEL_WINDOW, FrameSchema, encodeFrame, decodeFrame, type Frame } from './frames.js';
