/**
 * Byte-stream transport contract consumed by the client.
 * @module transport/types
 */

/**
 * Duplex byte channel to the device.
 *
 * `read()` is used only by the frame pump: it resolves with the next chunk,
 * with `null` once the channel is closed, and rejects on an I/O failure.
 */
export interface Transport {
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    /** Resolves once every byte is written. */
    send(data: Buffer): Promise<void>;
    isConnected(): boolean;
    read(): Promise<Buffer | null>;
}

type PendingRead = {
    resolve: (chunk: Buffer | null) => void;
    reject: (error: Error) => void;
};

/**
 * Pull-side buffer bridging event-style `data` callbacks to `read()` calls.
 */
export class ChunkQueue {
    private chunks: Buffer[] = [];
    private readers: PendingRead[] = [];
    private ended = false;
    private failure: Error | null = null;

    public push(chunk: Buffer): void {
        if (this.ended || chunk.length === 0) return;
        const reader = this.readers.shift();
        if (reader) {
            reader.resolve(chunk);
            return;
        }
        this.chunks.push(chunk);
    }

    /** Mark the stream closed. Buffered chunks are still delivered first. */
    public end(): void {
        if (this.ended) return;
        this.ended = true;
        for (const reader of this.readers.splice(0, this.readers.length)) reader.resolve(null);
    }

    /** Fail every pending and future read with `error`. */
    public fail(error: Error): void {
        if (this.ended) return;
        this.ended = true;
        this.failure = error;
        for (const reader of this.readers.splice(0, this.readers.length)) reader.reject(error);
    }

    /** Reopen after a previous `end()`/`fail()`, discarding buffered data. */
    public reset(): void {
        this.chunks = [];
        this.ended = false;
        this.failure = null;
    }

    public read(): Promise<Buffer | null> {
        const chunk = this.chunks.shift();
        if (chunk) return Promise.resolve(chunk);
        if (this.failure) return Promise.reject(this.failure);
        if (this.ended) return Promise.resolve(null);
        return new Promise<Buffer | null>((resolve, reject) => {
            this.readers.push({resolve, reject});
        });
    }
}
