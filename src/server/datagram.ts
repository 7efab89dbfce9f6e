import { decodeMessage } from "../message.js";
import { PeerUnreachableError } from "../errors.js";
import type { RetryOptions } from "../reliable.js";
import { type PeerLink, Session } from "../session.js";
import { type DatagramEndpoint, type PeerAddress, addressKey } from "../transport/types.js";
import { UdpEndpoint } from "../transport/udp.js";
import { BaseChatServer } from "./base.js";
import type { ChatServerOptions } from "./types.js";

export interface DatagramChatServerOptions extends ChatServerOptions {
    /** Socket to serve on. Default: a fresh UDP socket. */
    endpoint?: DatagramEndpoint;
    /** Reliable-layer timings for every peer. */
    retry?: RetryOptions;
    /** Idle time after which a peer is dropped, in ms. Default: 30000. */
    peerTimeoutMs?: number;
    /** How often idle peers are swept, in ms. Default: 5000. */
    reapIntervalMs?: number;
    /** How long stop() waits for farewells, in ms. Default: 2000. */
    closeTimeoutMs?: number;
    now?: () => number;
}

/**
 * UDP chat server.
 *
 * One receive handler classifies every datagram by source address. A
 * session is created on the first well-formed datagram from a new source;
 * chats to and from each peer run through that peer's reliable channel.
 * Datagram peers never say goodbye reliably, so a reaper drops those that
 * have been silent for `peerTimeoutMs`.
 */
export class DatagramChatServer extends BaseChatServer {
    protected readonly label = "UDP";

    private readonly endpoint: DatagramEndpoint;
    private readonly retry: RetryOptions;
    private readonly peerTimeoutMs: number;
    private readonly reapIntervalMs: number;
    private readonly closeTimeoutMs: number;
    private readonly now: () => number;
    private reaper: ReturnType<typeof setInterval> | null = null;
    private attached = false;

    constructor(options: DatagramChatServerOptions) {
        super(options);
        this.endpoint = options.endpoint ?? new UdpEndpoint();
        this.retry = options.retry ?? {};
        this.peerTimeoutMs = options.peerTimeoutMs ?? 30_000;
        this.reapIntervalMs = options.reapIntervalMs ?? 5_000;
        this.closeTimeoutMs = options.closeTimeoutMs ?? 2_000;
        this.now = options.now ?? Date.now;
    }

    async start(): Promise<void> {
        if (this._status === "running") {
            throw new Error("Server already running");
        }
        if (this.attached) {
            throw new Error("Datagram server cannot be restarted");
        }
        this.attached = true;

        this.endpoint.onMessage((data, from) => this.handleDatagram(data, from));
        this.endpoint.onError((err) => {
            this.logger.warn(`Socket error: ${err.message}`);
        });

        try {
            await this.endpoint.bind(this.port, this.host);
        } catch (err) {
            this._status = "error";
            throw err;
        }

        this.reaper = setInterval(() => this.reap(), this.reapIntervalMs);
        this._status = "running";
        this.logger.info(this.describe());
        this.notify(`Server started on ${this.host}:${this.port}`, false);
    }

    async stop(): Promise<void> {
        if (this.reaper) {
            clearInterval(this.reaper);
            this.reaper = null;
        }
        const wasRunning = this._status === "running";
        this._status = "stopped";

        await this.closeAll(this.closeTimeoutMs);
        await this.endpoint.close();

        if (wasRunning) {
            this.logger.info("Server stopped");
            this.notify("Server stopped", false);
        }
    }

    get address(): PeerAddress | null {
        return this.endpoint.local;
    }

    /**
     * Drop peers idle for longer than the peer timeout, telling each one it
     * has been dropped. Runs on the reaper interval; returns how many were
     * dropped.
     */
    reap(at: number = this.now()): number {
        const idle = this.registry.idle(at, this.peerTimeoutMs);
        for (const session of idle) {
            session.abandon(new PeerUnreachableError(
                `No traffic from ${session.identifier} for ${this.peerTimeoutMs}ms`,
            ));
        }
        return idle.length;
    }

    private handleDatagram(data: Buffer, from: PeerAddress): void {
        if (this._status !== "running") return;

        const identifier = addressKey(from);
        const existing = this.registry.get(identifier);
        if (existing) {
            existing.handlePayload(data);
            return;
        }

        const decoded = decodeMessage(data);
        if (!decoded.ok) {
            this.logger.warn(`Dropped datagram from ${identifier}: ${decoded.error.message}`);
            return;
        }
        const { message } = decoded;
        if (message.kind === "ack" || message.kind === "disconnect") {
            // Leftovers from a peer we already dropped
            this.logger.debug(`Ignoring ${message.kind} from unknown peer ${identifier}`);
            return;
        }

        const session = new Session({
            identifier,
            address: from.address,
            port: from.port,
            protocol: "udp",
            link: this.linkTo(from),
            identity: this.identity,
            role: "acceptor",
            reliable: this.retry,
            callbacks: this.callbacks,
            logger: this.logger.child(identifier),
            now: this.now,
        });
        this.register(session);
        session.handleMessage(message);
    }

    private linkTo(peer: PeerAddress): PeerLink {
        const to = { ...peer };
        return {
            write: (payload) => this.endpoint.send(payload, to),
            close: () => {},
        };
    }
}
