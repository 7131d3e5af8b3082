import type { Readable } from 'node:stream';

/**
 * Polled byte transport. `available()` is checked every tick; the caller
 * then reads exactly that many bytes.
 */
export interface ByteSource {
    available(): number;
    read(): number;
}

/**
 * In-memory transport, the equivalent of a UART receive buffer.
 * `available()` counts every queued byte, so fragments of one transmission
 * that arrived between two ticks are read back as one buffer.
 */
export class QueuedByteSource implements ByteSource {
    private chunks: Uint8Array[] = [];
    private offset = 0;
    private size = 0;

    push(chunk: Uint8Array | ArrayLike<number>): void {
        const bytes = chunk instanceof Uint8Array ? new Uint8Array(chunk) : Uint8Array.from(chunk);
        if (bytes.length === 0) return;
        this.chunks.push(bytes);
        this.size += bytes.length;
    }

    available(): number {
        return this.size;
    }

    /** Next queued byte, or -1 when nothing is buffered. */
    read(): number {
        const head = this.chunks[0];
        if (!head) return -1;
        const byte = head[this.offset++];
        this.size--;
        if (this.offset >= head.length) {
            this.chunks.shift();
            this.offset = 0;
        }
        return byte;
    }

    get pendingChunks(): number {
        return this.chunks.length;
    }

    clear(): void {
        this.chunks = [];
        this.offset = 0;
        this.size = 0;
    }
}

/**
 * Feeds every `data` chunk of a stream (a serial device, a socket, a replay
 * file) into the queue. Returns a function that detaches the listeners.
 */
export function attachReadable(
    readable: Readable,
    source: QueuedByteSource,
    onError?: (error: Error) => void
): () => void {
    const handleData = (chunk: Buffer | string) => {
        source.push(typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk);
    };
    readable.on('data', handleData);
    if (onError) readable.on('error', onError);

    return () => {
        readable.off('data', handleData);
        if (onError) readable.off('error', onError);
    };
}
