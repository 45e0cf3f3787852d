/**
 * NDJSON frames — one JSON object per line.
 *
 * ```
 * {"op":"msg","ch":0,"data":{"tag":"add","value":{"a":2,"b":3}}}
 * {"op":"end","ch":0}
 * {"op":"error","ch":0,"error":{"code":"HANDLER_ERROR","message":"boom"}}
 * {"op":"drop","ch":0}
 * {"op":"ack","ch":0,"n":8}
 * ```
 *
 * | Op      | Meaning                                             |
 * |---------|-----------------------------------------------------|
 * | `msg`   | one message on channel `ch`                         |
 * | `end`   | the sender half-closed channel `ch`                 |
 * | `error` | the sender half-closed channel `ch` with an error   |
 * | `drop`  | the receiver dropped channel `ch`; stop sending     |
 * | `ack`   | the receiver consumed `n` messages of channel `ch`  |
 *
 * Channel ids are allocated by the connecting side; the first `msg` on
 * an id the endpoint has not seen creates the channel there, whatever
 * order the ids arrive in.
 *
 * Flow control is per channel and direction: at most
 * {@link CHANNEL_WINDOW} messages may be unacknowledged, and a receiver
 * acknowledges in batches of half a window as its reader consumes them.
 *
 * @module
 */
import { z } from 'zod';
import {
    RpcErrorPayloadSchema,
    SerializationError,
    fail,
    succeed,
    type Result,
} from '@strand-rpc/core';

/** Messages a sender may have in flight on one channel before it waits for an `ack`. */
export const CHANNEL_WINDOW = 16;

/** Consumed messages a receiver batches into one `ack`. */
export const ACK_BATCH = CHANNEL_WINDOW / 2;

const ChannelIdSchema = z.number().int().nonnegative();

export const FrameSchema = z.discriminatedUnion('op', [
    z.object({ op: z.literal('msg'), ch: ChannelIdSchema, data: z.unknown() }),
    z.object({ op: z.literal('end'), ch: ChannelIdSchema }),
    z.object({ op: z.literal('error'), ch: ChannelIdSchema, error: RpcErrorPayloadSchema }),
    z.object({ op: z.literal('drop'), ch: ChannelIdSchema }),
    z.object({ op: z.literal('ack'), ch: ChannelIdSchema, n: z.number().int().positive() }),
]);

export type Frame = z.infer<typeof FrameSchema>;

/**
 * Encode a frame as one line, newline included.
 *
 * @throws {SerializationError} The payload is not JSON-serializable
 */
export function encodeFrame(frame: Frame): string {
    try {
        return `${JSON.stringify(frame)}\n`;
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new SerializationError(`Cannot encode frame for channel ${frame.ch}: ${reason}`, { cause: err });
    }
}

/** Decode one line into a frame. */
export function decodeFrame(line: string): Result<Frame> {
    let raw: unknown;
    try {
        raw = JSON.parse(line);
    } catch (err) {
        return fail(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = FrameSchema.safeParse(raw);
    if (!parsed.success) {
        return fail(`invalid frame: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    }
    return succeed(parsed.data);
}
