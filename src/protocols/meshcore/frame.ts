/**
 * MeshCore serial framing: `[marker:1] [length:2LE] [payload]`.
 * @module meshcore/frame
 */
import {MESHCORE_FRAME_HEADER_SIZE, MESHCORE_FRAME_MARKER_OUT, MESHCORE_MAX_FRAME_SIZE} from './constants';

export type FrameDecodeResult =
    | {status: 'complete'; payload: Buffer}
    | {status: 'incomplete'}
    | {status: 'too_large'; size: number};

/**
 * Frame a single payload for transmission to the device.
 */
export const encodeFrame = (payload: Buffer | Uint8Array): Buffer => {
    if (payload.length > MESHCORE_MAX_FRAME_SIZE) {
        throw new RangeError(`MeshCore payload too large: ${payload.length} bytes (max ${MESHCORE_MAX_FRAME_SIZE})`);
    }
    const frame = Buffer.alloc(MESHCORE_FRAME_HEADER_SIZE + payload.length);
    frame.writeUInt8(MESHCORE_FRAME_MARKER_OUT, 0);
    frame.writeUInt16LE(payload.length, 1);
    frame.set(payload, MESHCORE_FRAME_HEADER_SIZE);
    return frame;
};

/**
 * Incremental frame decoder. Bytes are appended with {@link FrameDecoder.feed}
 * and whole payloads pulled out with {@link FrameDecoder.tryDecode}; partial
 * frames stay buffered across calls. The marker byte is never validated.
 */
export class FrameDecoder {
    private buffer: Buffer = Buffer.alloc(0);

    constructor(private readonly maxFrameSize = MESHCORE_MAX_FRAME_SIZE) {}

    /** Number of bytes currently buffered. */
    public get buffered(): number {
        return this.buffer.length;
    }

    public feed(chunk: Buffer | Uint8Array): void {
        if (chunk.length === 0) return;
        this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
    }

    public tryDecode(): FrameDecodeResult {
        if (this.buffer.length < MESHCORE_FRAME_HEADER_SIZE) return {status: 'incomplete'};

        const size = this.buffer.readUInt16LE(1);
        if (size > this.maxFrameSize) return {status: 'too_large', size};

        const total = MESHCORE_FRAME_HEADER_SIZE + size;
        if (this.buffer.length < total) return {status: 'incomplete'};

        const payload = Buffer.from(this.buffer.subarray(MESHCORE_FRAME_HEADER_SIZE, total));
        this.buffer = this.buffer.subarray(total);
        return {status: 'complete', payload};
    }

    public clear(): void {
        this.buffer = Buffer.alloc(0);
    }
}
