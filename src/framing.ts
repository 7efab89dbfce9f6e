import { type Message, encodeMessage } from "./message.js";
import { FrameTooLargeError } from "./errors.js";

/** Maximum frame body size: 1 MiB */
export const MAX_FRAME_SIZE = 1024 * 1024;

const HEADER_SIZE = 4;

/**
 * Prefix a payload with its length.
 *
 * Wire format: [4 bytes: uint32 BE payload length][N bytes: payload]
 */
export function encodeFrame(payload: Uint8Array): Buffer {
    if (payload.length > MAX_FRAME_SIZE) {
        throw new FrameTooLargeError(payload.length, MAX_FRAME_SIZE);
    }
    const frame = Buffer.alloc(HEADER_SIZE + payload.length);
    frame.writeUInt32BE(payload.length, 0);
    frame.set(payload, HEADER_SIZE);
    return frame;
}

/** Encode a Message and frame it for a stream transport. */
export function frameMessage(msg: Message): Buffer {
    return encodeFrame(encodeMessage(msg));
}

export type FrameDecoderState = "awaiting-length" | "awaiting-body";

/**
 * Stateful frame decoder that handles partial reads and multi-frame chunks.
 *
 * Feed chunks from a socket `data` event into `push()`. It returns the
 * payloads of every frame completed by the chunk (possibly none). Payloads
 * are returned undecoded so that one bad payload can be dropped without
 * losing the stream.
 *
 * Throws FrameTooLargeError when a header announces a body over the limit.
 * The buffer is cleared first; the connection should be dropped since the
 * stream position can no longer be trusted.
 */
export class FrameDecoder {
    private buffer: Buffer = Buffer.alloc(0);
    private readonly maxFrameSize: number;

    constructor(maxFrameSize: number = MAX_FRAME_SIZE) {
        this.maxFrameSize = maxFrameSize;
    }

    /**
     * Push a chunk of data and return any complete payloads decoded from it.
     */
    push(chunk: Uint8Array): Buffer[] {
        if (chunk.length > 0) {
            this.buffer = this.buffer.length === 0
                ? Buffer.from(chunk)
                : Buffer.concat([this.buffer, chunk]);
        }
        const payloads: Buffer[] = [];

        while (this.buffer.length >= HEADER_SIZE) {
            const len = this.buffer.readUInt32BE(0);

            if (len > this.maxFrameSize) {
                this.buffer = Buffer.alloc(0);
                throw new FrameTooLargeError(len, this.maxFrameSize);
            }

            if (this.buffer.length < HEADER_SIZE + len) {
                break;
            }

            payloads.push(Buffer.from(this.buffer.subarray(HEADER_SIZE, HEADER_SIZE + len)));
            this.buffer = this.buffer.subarray(HEADER_SIZE + len);
        }

        return payloads;
    }

    /** Where the decoder is within the current frame. */
    get state(): FrameDecoderState {
        if (this.buffer.length < HEADER_SIZE) return "awaiting-length";
        return "awaiting-body";
    }

    /** Bytes held back waiting for the rest of a frame. */
    get buffered(): number {
        return this.buffer.length;
    }

    /**
     * Signal that the peer closed the stream. Returns the number of bytes of
     * an incomplete trailing frame that were discarded (0 on a clean close).
     */
    finish(): number {
        const discarded = this.buffer.length;
        this.reset();
        return discarded;
    }

    /** Reset internal buffer state. */
    reset(): void {
        this.buffer = Buffer.alloc(0);
    }
}
