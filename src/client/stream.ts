import { EventEmitter } from "node:events";
import * as net from "node:net";
import { createConnectMessage } from "../message.js";
import { type ChatError, NotConnectedError, PeerUnreachableError, toError } from "../errors.js";
import { MAX_FRAME_SIZE } from "../framing.js";
import { type Logger, silentLogger } from "../logger.js";
import { type ChatCallbacks, Session } from "../session.js";
import { type SocketDecorator, StreamLink, readFrames } from "../transport/stream.js";
import type { ChatClientOptions } from "./types.js";

export interface StreamChatClientOptions extends ChatClientOptions {
    /** Applied to the socket once connected (e.g. TLS). */
    socketDecorator?: SocketDecorator;
    /** Largest frame body accepted. Default: 1 MiB. */
    maxFrameSize?: number;
}

/**
 * TCP chat client.
 *
 * Events:
 * - "connect" — connected and announced
 * - "disconnect" (reason: ChatError | null) — the connection ended
 */
export class StreamChatClient extends EventEmitter {
    private readonly host: string;
    private readonly port: number;
    private readonly username: string;
    private readonly connectTimeoutMs: number;
    private readonly socketDecorator: SocketDecorator | null;
    private readonly maxFrameSize: number;
    private readonly callbacks: ChatCallbacks;
    private readonly logger: Logger;

    private session: Session | null = null;
    /** In-flight connect attempt, so disconnect() can abort it. */
    private pendingSocket: net.Socket | null = null;

    constructor(options: StreamChatClientOptions) {
        super();
        this.host = options.host;
        this.port = options.port;
        this.username = options.username;
        this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
        this.socketDecorator = options.socketDecorator ?? null;
        this.maxFrameSize = options.maxFrameSize ?? MAX_FRAME_SIZE;
        this.callbacks = options.callbacks ?? {};
        this.logger = options.logger ?? silentLogger;
    }

    /** Whether a connection is up. */
    get connected(): boolean {
        return this.session?.isActive ?? false;
    }

    /**
     * Connect and announce ourselves. Rejects with PeerUnreachableError if
     * the server cannot be reached within the connect timeout.
     */
    async connect(): Promise<void> {
        if (this.session || this.pendingSocket) {
            throw new Error("Already connected");
        }

        const raw = await this.open();
        const socket = this.socketDecorator ? this.socketDecorator(raw) : raw;
        const identifier = `${this.host}:${this.port}`;

        const session = new Session({
            identifier,
            address: raw.remoteAddress ?? this.host,
            port: this.port,
            protocol: "tcp",
            link: new StreamLink(socket),
            identity: this.username,
            role: "initiator",
            name: identifier,
            callbacks: this.callbacks,
            logger: this.logger,
        });
        this.session = session;

        session.once("closed", (reason: ChatError | null) => {
            if (this.session === session) this.session = null;
            this.emit("disconnect", reason);
        });

        readFrames(socket, {
            onPayload: (payload) => session.handlePayload(payload),
            onEnd: (discarded) => session.peerClosed(discarded),
            onError: (err) => session.fail(err),
            onClose: () => session.close(null),
        }, this.maxFrameSize);

        await session.send(createConnectMessage(this.username));
        this.logger.info(`Connected to ${identifier} as ${this.username}`);
        this.notify(`Connected to ${identifier}`);
        this.emit("connect");
    }

    /** Send a chat. */
    async send(text: string): Promise<void> {
        const session = this.session;
        if (!session || !session.isActive) {
            throw new NotConnectedError();
        }
        await session.sendChat(text);
    }

    /** Round-trip a test message; resolves with the latency in ms. */
    probe(timeoutMs?: number): Promise<number> {
        if (!this.session) {
            return Promise.reject(new NotConnectedError());
        }
        return this.session.probe(timeoutMs);
    }

    /**
     * Say goodbye and release the socket. The goodbye is best-effort; the
     * socket is released either way.
     */
    async disconnect(): Promise<void> {
        if (this.pendingSocket) {
            this.pendingSocket.destroy();
            this.pendingSocket = null;
        }
        const session = this.session;
        this.session = null;
        if (session) {
            await session.stop();
        }
    }

    private open(): Promise<net.Socket> {
        return new Promise<net.Socket>((resolve, reject) => {
            let settled = false;
            const target = `${this.host}:${this.port}`;
            const socket = net.connect(this.port, this.host);
            this.pendingSocket = socket;

            const settle = (err: Error | null) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                socket.removeListener("error", onError);
                socket.removeListener("close", onClose);
                this.pendingSocket = null;
                if (err) {
                    socket.destroy();
                    reject(err);
                } else {
                    resolve(socket);
                }
            };

            const timer = setTimeout(() => {
                settle(new PeerUnreachableError(
                    `Could not connect to ${target} within ${this.connectTimeoutMs}ms`,
                ));
            }, this.connectTimeoutMs);

            const onError = (err: Error) => {
                settle(new PeerUnreachableError(
                    `Could not connect to ${target}: ${err.message}`,
                    { cause: err },
                ));
            };
            const onClose = () => {
                settle(new PeerUnreachableError(`Connection to ${target} aborted`));
            };

            socket.once("error", onError);
            socket.once("close", onClose);
            socket.once("connect", () => settle(null));
        });
    }

    private notify(text: string): void {
        try {
            this.callbacks.onStatus?.(text, false);
        } catch (err) {
            this.logger.error(`onStatus callback threw: ${toError(err).message}`);
        }
    }
}
