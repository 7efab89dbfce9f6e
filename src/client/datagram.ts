import { EventEmitter } from "node:events";
import { createConnectMessage, encodeMessage } from "../message.js";
import { type ChatError, NotConnectedError, PeerUnreachableError, toError } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import type { RetryOptions } from "../reliable.js";
import { type ChatCallbacks, Session } from "../session.js";
import { type DatagramEndpoint, type PeerAddress, addressKey } from "../transport/types.js";
import { UdpEndpoint } from "../transport/udp.js";
import type { ChatClientOptions } from "./types.js";

export interface DatagramChatClientOptions extends ChatClientOptions {
    /** Local socket. Default: a fresh UDP socket on an ephemeral port. */
    endpoint?: DatagramEndpoint;
    /** Reliable-layer timings for our chats. */
    retry?: RetryOptions;
    now?: () => number;
}

interface AwaitingReply {
    resolve: (data: Buffer) => void;
    reject: (err: Error) => void;
    /** Stop the timer without settling. */
    cancel: () => void;
}

/**
 * UDP chat client.
 *
 * There is no connection to establish, so connect() sends a `connect`
 * message and waits for any reply from the server before reporting success.
 * Chats go through the reliable layer and are retried until acknowledged.
 *
 * The client owns its endpoint: once disconnected it cannot connect again.
 *
 * Events:
 * - "connect"
 * - "disconnect" (reason: ChatError | null)
 */
export class DatagramChatClient extends EventEmitter {
    private readonly host: string;
    private readonly port: number;
    private readonly username: string;
    private readonly connectTimeoutMs: number;
    private readonly endpoint: DatagramEndpoint;
    private readonly retry: RetryOptions;
    private readonly callbacks: ChatCallbacks;
    private readonly logger: Logger;
    private readonly now: () => number;

    private server: PeerAddress | null = null;
    private session: Session | null = null;
    private awaiting: AwaitingReply | null = null;
    private attached = false;
    private closed = false;

    constructor(options: DatagramChatClientOptions) {
        super();
        this.host = options.host;
        this.port = options.port;
        this.username = options.username;
        this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
        this.endpoint = options.endpoint ?? new UdpEndpoint();
        this.retry = options.retry ?? {};
        this.callbacks = options.callbacks ?? {};
        this.logger = options.logger ?? silentLogger;
        this.now = options.now ?? Date.now;
    }

    get connected(): boolean {
        return this.session?.isActive ?? false;
    }

    /** Chats sent but not yet acknowledged. */
    get pendingCount(): number {
        return this.session?.reliability?.pendingCount ?? 0;
    }

    /** Whether a retransmission is outstanding. */
    get inRecovery(): boolean {
        return this.session?.reliability?.inRecovery ?? false;
    }

    /**
     * Announce ourselves and wait up to the connect timeout for the server
     * to answer. Rejects with PeerUnreachableError if it stays silent.
     */
    async connect(): Promise<void> {
        if (this.closed) {
            throw new Error("Client is closed");
        }
        if (this.session || this.awaiting) {
            throw new Error("Already connected");
        }
        if (!this.attached) {
            this.attached = true;
            this.endpoint.onMessage((data, from) => this.handleDatagram(data, from));
            this.endpoint.onError((err) => this.logger.warn(`Socket error: ${err.message}`));
        }

        const target = `${this.host}:${this.port}`;
        let server: PeerAddress;
        let first: Buffer;
        try {
            server = { address: await this.endpoint.resolve(this.host), port: this.port };
            this.server = server;
            if (!this.endpoint.local) {
                await this.endpoint.bind(0);
            }
            const reply = this.awaitReply();
            await this.endpoint.send(encodeMessage(createConnectMessage(this.username)), server);
            first = await reply;
        } catch (err) {
            this.awaiting?.cancel();
            this.awaiting = null;
            await this.release();
            throw err instanceof PeerUnreachableError
                ? err
                : new PeerUnreachableError(`Could not reach ${target}: ${toError(err).message}`, { cause: err });
        }

        const peer = server;
        const session = new Session({
            identifier: addressKey(peer),
            address: peer.address,
            port: peer.port,
            protocol: "udp",
            link: {
                write: (payload) => this.endpoint.send(payload, peer),
                close: () => {},
            },
            identity: this.username,
            role: "initiator",
            name: target,
            reliable: this.retry,
            callbacks: this.callbacks,
            logger: this.logger,
            now: this.now,
        });
        this.session = session;

        session.once("closed", (reason: ChatError | null) => {
            if (this.session === session) this.session = null;
            this.emit("disconnect", reason);
        });

        this.logger.info(`Connected to ${target} as ${this.username}`);
        this.notify(`Connected to ${target}`);
        this.emit("connect");
        session.handlePayload(first);
    }

    /** Send a chat through the reliable layer. */
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
     * Send a best-effort `disconnect`, stop retrying and close the socket.
     * The socket is closed even if the goodbye cannot be sent.
     */
    async disconnect(): Promise<void> {
        if (this.awaiting) {
            this.awaiting.reject(new NotConnectedError("Disconnected while connecting"));
            this.awaiting = null;
        }
        const session = this.session;
        this.session = null;
        try {
            if (session) await session.stop();
        } finally {
            await this.release();
        }
    }

    private awaitReply(): Promise<Buffer> {
        return new Promise<Buffer>((resolve, reject) => {
            const timer = setTimeout(() => {
                this.awaiting = null;
                reject(new PeerUnreachableError(
                    `No reply from ${this.host}:${this.port} within ${this.connectTimeoutMs}ms`,
                ));
            }, this.connectTimeoutMs);
            this.awaiting = {
                resolve: (data) => {
                    clearTimeout(timer);
                    resolve(data);
                },
                reject: (err) => {
                    clearTimeout(timer);
                    reject(err);
                },
                cancel: () => clearTimeout(timer),
            };
        });
    }

    private handleDatagram(data: Buffer, from: PeerAddress): void {
        if (!this.server || addressKey(from) !== addressKey(this.server)) {
            this.logger.debug(`Ignoring datagram from ${addressKey(from)}`);
            return;
        }
        if (this.awaiting) {
            const awaiting = this.awaiting;
            this.awaiting = null;
            awaiting.resolve(data);
            return;
        }
        this.session?.handlePayload(data);
    }

    private async release(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        await this.endpoint.close();
    }

    private notify(text: string): void {
        try {
            this.callbacks.onStatus?.(text, false);
        } catch (err) {
            this.logger.error(`onStatus callback threw: ${toError(err).message}`);
        }
    }
}
