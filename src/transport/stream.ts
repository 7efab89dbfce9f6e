/**
 * Stream Transport
 *
 * Glue between a net.Socket and the frame codec, shared by the stream server
 * and the stream client.
 */

import type * as net from "node:net";
import { FrameDecoder, encodeFrame, MAX_FRAME_SIZE } from "../framing.js";
import { type ChatError, TransportResetError, classifySocketError } from "../errors.js";
import type { PeerLink } from "../session.js";

/**
 * Wraps an optional socket decorator, e.g. a TLS wrapper:
 *   (socket) => new tls.TLSSocket(socket, { isServer: true, secureContext })
 */
export type SocketDecorator = (socket: net.Socket) => net.Socket;

/** Writes length-prefixed payloads to a socket. */
export class StreamLink implements PeerLink {
    private readonly socket: net.Socket;

    constructor(socket: net.Socket) {
        this.socket = socket;
    }

    write(payload: Buffer): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (this.socket.destroyed || !this.socket.writable) {
                reject(new TransportResetError("Socket is closed"));
                return;
            }
            let frame: Buffer;
            try {
                frame = encodeFrame(payload);
            } catch (err) {
                reject(err);
                return;
            }
            this.socket.write(frame, (err) => {
                if (err) reject(classifySocketError(err));
                else resolve();
            });
        });
    }

    close(): void {
        if (!this.socket.destroyed) {
            this.socket.destroy();
        }
    }
}

export interface FrameReaderHandlers {
    /** One complete frame body. */
    onPayload(payload: Buffer): void;
    /**
     * The peer closed its side. `discarded` is the size of an incomplete
     * trailing frame that was dropped (0 on a clean close).
     */
    onEnd(discarded: number): void;
    /** Oversized frame or socket failure; the connection is unusable. */
    onError(err: ChatError): void;
    /** Socket fully closed, for whatever reason. */
    onClose(): void;
}

/**
 * Attach a frame decoder to a socket's events. A frame claiming more than
 * `maxFrameSize` bytes reports FrameTooLargeError and stops reading.
 */
export function readFrames(
    socket: net.Socket,
    handlers: FrameReaderHandlers,
    maxFrameSize: number = MAX_FRAME_SIZE,
): FrameDecoder {
    const decoder = new FrameDecoder(maxFrameSize);
    let failed = false;

    socket.on("data", (chunk: Buffer) => {
        if (failed) return;
        let payloads: Buffer[];
        try {
            payloads = decoder.push(chunk);
        } catch (err) {
            failed = true;
            handlers.onError(classifySocketError(err));
            return;
        }

        for (const payload of payloads) {
            if (socket.destroyed) break;
            handlers.onPayload(payload);
        }
    });

    socket.on("end", () => {
        handlers.onEnd(decoder.finish());
    });

    socket.on("error", (err) => {
        handlers.onError(classifySocketError(err));
    });

    socket.on("close", () => {
        decoder.reset();
        handlers.onClose();
    });

    return decoder;
}
