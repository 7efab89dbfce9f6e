import * as net from "node:net";
import { MAX_FRAME_SIZE } from "../framing.js";
import { Session } from "../session.js";
import { type SocketDecorator, StreamLink, readFrames } from "../transport/stream.js";
import type { PeerAddress } from "../transport/types.js";
import { BaseChatServer } from "./base.js";
import type { ChatServerOptions } from "./types.js";

export interface StreamChatServerOptions extends ChatServerOptions {
    /** Applied to each accepted socket before any byte is read (e.g. TLS). */
    socketDecorator?: SocketDecorator;
    /** Largest frame body accepted. Default: 1 MiB. */
    maxFrameSize?: number;
    /** How long stop() waits for farewells and the listener to close, in ms. Default: 2000. */
    closeTimeoutMs?: number;
}

/**
 * TCP chat server. One Session per accepted socket; frames are
 * length-prefixed JSON messages.
 */
export class StreamChatServer extends BaseChatServer {
    protected readonly label = "TCP";

    private readonly socketDecorator: SocketDecorator | null;
    private readonly maxFrameSize: number;
    private readonly closeTimeoutMs: number;
    private server: net.Server | null = null;

    constructor(options: StreamChatServerOptions) {
        super(options);
        this.socketDecorator = options.socketDecorator ?? null;
        this.maxFrameSize = options.maxFrameSize ?? MAX_FRAME_SIZE;
        this.closeTimeoutMs = options.closeTimeoutMs ?? 2_000;
    }

    async start(): Promise<void> {
        if (this._status === "running") {
            throw new Error("Server already running");
        }

        await new Promise<void>((resolve, reject) => {
            const server = net.createServer((socket) => {
                this.handleConnection(socket);
            });

            const onStartError = (err: Error) => {
                this._status = "error";
                reject(err);
            };
            server.once("error", onStartError);

            server.listen(this.port, this.host, () => {
                server.removeListener("error", onStartError);
                server.on("error", (err) => {
                    this._status = "error";
                    this.logger.error(`Server error: ${err.message}`);
                    this.notify(`Server error: ${err.message}`, true);
                });
                this.server = server;
                resolve();
            });
        });

        this._status = "running";
        this.logger.info(this.describe());
        this.notify(`Server started on ${this.host}:${this.port}`, false);
    }

    async stop(): Promise<void> {
        const server = this.server;
        this.server = null;
        this._status = "stopped";

        await this.closeAll(this.closeTimeoutMs);

        if (server) {
            await new Promise<void>((resolve) => {
                const timer = setTimeout(() => {
                    this.logger.warn("Listener did not close in time");
                    resolve();
                }, this.closeTimeoutMs);
                server.close(() => {
                    clearTimeout(timer);
                    resolve();
                });
            });
            this.logger.info("Server stopped");
            this.notify("Server stopped", false);
        }
    }

    get address(): PeerAddress | null {
        const info = this.server?.address();
        if (!info || typeof info === "string") return null;
        return { address: info.address, port: info.port };
    }

    private handleConnection(raw: net.Socket): void {
        const address = raw.remoteAddress;
        const port = raw.remotePort;
        if (this._status !== "running" || address === undefined || port === undefined) {
            raw.destroy();
            return;
        }

        const socket = this.socketDecorator ? this.socketDecorator(raw) : raw;
        const identifier = `${address}:${port}`;
        const session = new Session({
            identifier,
            address,
            port,
            protocol: "tcp",
            link: new StreamLink(socket),
            identity: this.identity,
            role: "acceptor",
            callbacks: this.callbacks,
            logger: this.logger.child(identifier),
        });
        this.register(session);

        readFrames(socket, {
            onPayload: (payload) => session.handlePayload(payload),
            onEnd: (discarded) => session.peerClosed(discarded),
            onError: (err) => session.fail(err),
            onClose: () => session.close(null),
        }, this.maxFrameSize);
    }
}
