import {ChunkQueue, MESHCORE_FRAME_MARKER_IN, type Transport} from '../src';

/** Device-to-host frame around `payload`. */
export const inboundFrame = (payload: Buffer): Buffer => {
    const header = Buffer.alloc(3);
    header.writeUInt8(MESHCORE_FRAME_MARKER_IN, 0);
    header.writeUInt16LE(payload.length, 1);
    return Buffer.concat([header, payload]);
};

/** Returns the payloads the simulated device answers with, if any. */
export type Responder = (payload: Buffer) => Buffer[] | void;

/**
 * In-process device stand-in. Outbound frames are recorded; the responder's
 * answers are pushed back as a single inbound chunk during `send`.
 */
export class FakeTransport implements Transport {
    public readonly frames: Buffer[] = [];
    public respond: Responder | null = null;
    public connectError: Error | null = null;
    public sendError: Error | null = null;
    /** Fails `disconnect` and leaves reads pending until `lose` is called. */
    public disconnectError: Error | null = null;
    public inFlight = 0;
    public maxInFlight = 0;
    public connectCalls = 0;
    private connected = false;
    private readonly queue = new ChunkQueue();

    /** Outbound payloads with the 3-byte frame header removed. */
    public get payloads(): Buffer[] {
        return this.frames.map((frame) => frame.subarray(3));
    }

    public async connect(): Promise<void> {
        this.connectCalls += 1;
        if (this.connectError) throw this.connectError;
        this.queue.reset();
        this.connected = true;
    }

    public async disconnect(): Promise<void> {
        this.connected = false;
        if (this.disconnectError) throw this.disconnectError;
        this.queue.end();
    }

    public isConnected(): boolean {
        return this.connected;
    }

    public async send(data: Buffer): Promise<void> {
        this.inFlight += 1;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            await Promise.resolve();
            if (this.sendError) throw this.sendError;
            this.frames.push(Buffer.from(data));
            const answers = this.respond?.(data.subarray(3));
            if (answers && answers.length > 0) this.inject(...answers);
        } finally {
            this.inFlight -= 1;
        }
    }

    public read(): Promise<Buffer | null> {
        return this.queue.read();
    }

    /** Deliver payloads from the device in one chunk. */
    public inject(...payloads: Buffer[]): void {
        this.queue.push(Buffer.concat(payloads.map(inboundFrame)));
    }

    /** Deliver raw bytes from the device. */
    public injectBytes(chunk: Buffer): void {
        this.queue.push(chunk);
    }

    /** Drop the link as the device would, with or without an I/O error. */
    public lose(error?: Error): void {
        this.connected = false;
        if (error) this.queue.fail(error);
        else this.queue.end();
    }
}
