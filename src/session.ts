import { EventEmitter } from "node:events";
import { randomUUID } from "node:crypto";
import {
    type Message,
    createChatMessage,
    createDisconnectMessage,
    createStatusMessage,
    createTestMessage,
    decodeMessage,
    echoTestMessage,
    encodeMessage,
} from "./message.js";
import {
    ChatError,
    NotConnectedError,
    PeerUnreachableError,
    SendFailureError,
    TransportResetError,
    toError,
} from "./errors.js";
import { type Inbound, ReliableChannel, type RetryOptions } from "./reliable.js";
import { RecentSet } from "./recent-set.js";
import { type Logger, silentLogger } from "./logger.js";

export type SessionState = "handshaking" | "active" | "closing" | "closed";

export type TransportProtocol = "tcp" | "udp";

/** Snapshot of a peer, handed to callbacks and returned by `peers`. */
export interface PeerInfo {
    /** "ip:port" */
    identifier: string;
    name: string;
    protocol: TransportProtocol;
    address: string;
    port: number;
    /** Epoch ms */
    connectedAt: number;
    /** Epoch ms */
    lastActivity: number;
}

/**
 * Collaborator callbacks. They run on whichever event observed the message;
 * an exception thrown by a callback is logged and swallowed so it cannot
 * break the read loop.
 */
export interface ChatCallbacks {
    /** `sender` is the name the chat carried; relayed chats name their author there. */
    onMessage?(peer: PeerInfo, text: string, sender: string | null): void;
    onStatus?(text: string, isError: boolean): void;
    onPeerConnected?(peer: PeerInfo): void;
    onPeerDisconnected?(peer: PeerInfo): void;
}

/** How a session writes to its peer. */
export interface PeerLink {
    /** Write one encoded message payload. Rejects if the link is broken. */
    write(payload: Buffer): Promise<void>;
    /** Release the link. Called exactly once, from teardown. */
    close(): void;
}

export type SessionRole = "acceptor" | "initiator";

/** Start of the status an acceptor sends when a session becomes active. */
export const WELCOME_PREFIX = "Welcome! Your username: ";

export interface SessionOptions {
    identifier: string;
    address: string;
    port: number;
    protocol: TransportProtocol;
    link: PeerLink;
    /** Sender name for messages this side produces. */
    identity: string;
    /**
     * "acceptor" (server side) starts handshaking and sends a welcome on
     * activation; "initiator" (client side) starts active.
     * Default: "acceptor".
     */
    role?: SessionRole;
    /** Display name until the peer announces one. */
    name?: string;
    /** Wrap chats in the reliable datagram layer with these settings. */
    reliable?: RetryOptions;
    callbacks?: ChatCallbacks;
    logger?: Logger;
    /** Consecutive undecodable frames tolerated. Default: 3. */
    maxDecodeFailures?: number;
    now?: () => number;
}

interface PendingProbe {
    resolve: (latencyMs: number) => void;
    reject: (err: Error) => void;
    timer: ReturnType<typeof setTimeout>;
}

/**
 * One logical peer: decodes its frames, dispatches by kind and owns its
 * lifecycle (handshaking → active → closing → closed).
 *
 * Teardown happens exactly once whichever path triggers it (disconnect
 * message, EOF, socket error, send failure, retry exhaustion, stop request).
 *
 * Events:
 * - "state" (state: SessionState)
 * - "chat" (text: string, session: Session) — a chat was delivered
 * - "closed" (reason: ChatError | null, session: Session) — torn down;
 *   `reason` is null for an orderly close
 */
export class Session extends EventEmitter {
    readonly identifier: string;
    readonly address: string;
    readonly port: number;
    readonly protocol: TransportProtocol;

    private readonly link: PeerLink;
    private readonly identity: string;
    private readonly role: SessionRole;
    private readonly callbacks: ChatCallbacks;
    private readonly logger: Logger;
    private readonly maxDecodeFailures: number;
    private readonly now: () => number;
    private readonly reliable: ReliableChannel | null;

    private _state: SessionState = "handshaking";
    private _name: string;
    private activated = false;
    private decodeFailures = 0;
    private readonly connectedAt: number;
    private lastActivity: number;
    private readonly probes: Map<string, PendingProbe> = new Map();
    private readonly expiredProbes = new RecentSet<string>(64);

    constructor(options: SessionOptions) {
        super();
        this.identifier = options.identifier;
        this.address = options.address;
        this.port = options.port;
        this.protocol = options.protocol;
        this.link = options.link;
        this.identity = options.identity;
        this.role = options.role ?? "acceptor";
        this.callbacks = options.callbacks ?? {};
        this.logger = options.logger ?? silentLogger;
        this.maxDecodeFailures = options.maxDecodeFailures ?? 3;
        this.now = options.now ?? Date.now;
        this._name = options.name ?? defaultPeerName(options.identifier);
        this.connectedAt = this.now();
        this.lastActivity = this.connectedAt;
        if (this.role === "initiator") {
            this._state = "active";
            this.activated = true;
        }

        if (options.reliable) {
            const reliable = new ReliableChannel({
                ...options.reliable,
                identity: this.identity,
                transmit: (payload) => this.link.write(payload),
                now: this.now,
                logger: this.logger,
            });
            reliable.on("failed", (err: SendFailureError) => this.close(err));
            reliable.on("recovery", (active: boolean) => {
                this.logger.debug(active
                    ? `Recovery mode entered for ${this.identifier}`
                    : `Recovery mode cleared for ${this.identifier}`);
            });
            this.reliable = reliable;
        } else {
            this.reliable = null;
        }
    }

    get state(): SessionState {
        return this._state;
    }

    get name(): string {
        return this._name;
    }

    /** Whether the session can carry chat traffic. */
    get isActive(): boolean {
        return this._state === "active";
    }

    get info(): PeerInfo {
        return {
            identifier: this.identifier,
            name: this._name,
            protocol: this.protocol,
            address: this.address,
            port: this.port,
            connectedAt: this.connectedAt,
            lastActivity: this.lastActivity,
        };
    }

    /** Milliseconds since the last inbound traffic. */
    idleFor(at: number = this.now()): number {
        return at - this.lastActivity;
    }

    /** Reliable datagram state, when this session uses it. */
    get reliability(): ReliableChannel | null {
        return this.reliable;
    }

    // ─── Inbound ────────────────────────────────────────────────────

    /**
     * Handle one raw payload (a frame body or a datagram).
     *
     * An undecodable payload is logged and dropped; `maxDecodeFailures` of
     * them in a row end the session.
     */
    handlePayload(payload: Uint8Array): void {
        if (this.isFinished()) return;
        this.touch();

        const decoded = decodeMessage(payload);
        if (!decoded.ok) {
            this.decodeFailures++;
            this.logger.warn(
                `Dropped frame from ${this.identifier} (${this.decodeFailures}/${this.maxDecodeFailures}): ${decoded.error.message}`,
            );
            if (this.decodeFailures >= this.maxDecodeFailures) {
                this.close(decoded.error);
            }
            return;
        }

        this.decodeFailures = 0;
        this.handleMessage(decoded.message);
    }

    /** Handle one decoded message. */
    handleMessage(msg: Message): void {
        if (this.isFinished()) return;
        this.touch();

        if (!this.reliable) {
            this.dispatch(msg);
            return;
        }

        const inbound: Inbound = this.reliable.receive(msg);
        switch (inbound.type) {
            case "deliver":
            case "pass":
                this.dispatch(inbound.message);
                return;
            case "duplicate":
            case "ack":
                return;
        }
    }

    private dispatch(msg: Message): void {
        switch (msg.kind) {
            case "connect": {
                const announced = msg.content.trim() || msg.sender?.trim() || "";
                if (announced) this.rename(announced);
                if (this._state === "handshaking") this.activate();
                return;
            }
            case "disconnect":
                this.logger.info(`Disconnect requested by ${this.identifier}`);
                this._state = "closing";
                this.emit("state", this._state);
                this.close(null);
                return;
            case "chat":
                if (this._state === "handshaking") {
                    if (msg.sender?.trim()) this.rename(msg.sender.trim());
                    this.activate();
                }
                this.safely("onMessage", () => this.callbacks.onMessage?.(this.info, msg.content, msg.sender));
                this.emit("chat", msg.content, this);
                return;
            case "status": {
                if (this.role === "initiator" && msg.content.startsWith(WELCOME_PREFIX)) {
                    // The server opened a new session for us; its chats count from 0 again
                    this.reliable?.resetInbound();
                }
                const text = msg.sender ? `${msg.sender}: ${msg.content}` : msg.content;
                this.notify(text, false);
                return;
            }
            case "error": {
                const text = msg.sender ? `${msg.sender}: ${msg.content}` : msg.content;
                this.notify(text, true);
                return;
            }
            case "test":
                this.handleTest(msg);
                return;
            case "ack":
                // Acks only mean something to the reliable layer
                this.logger.debug(`Ignoring ack from ${this.identifier} on a stream session`);
                return;
            default: {
                const unhandled: never = msg.kind;
                throw new Error(`Unhandled message kind: ${String(unhandled)}`);
            }
        }
    }

    private handleTest(msg: Message): void {
        const probe = this.probes.get(msg.content);
        if (probe) {
            this.probes.delete(msg.content);
            clearTimeout(probe.timer);
            probe.resolve(Math.max(0, this.now() - msg.timestamp * 1000));
            return;
        }
        if (this.expiredProbes.has(msg.content)) {
            this.logger.debug(`Late echo for expired probe ${msg.content}`);
            return;
        }
        this.post(echoTestMessage(msg, this.identity));
    }

    // ─── Outbound ───────────────────────────────────────────────────

    /** Write a message as-is. A failed write tears the session down. */
    async send(msg: Message): Promise<void> {
        if (this.isFinished()) {
            throw new NotConnectedError(`Session ${this.identifier} is ${this._state}`);
        }
        try {
            await this.link.write(encodeMessage(msg));
        } catch (err) {
            const failure = new SendFailureError(
                `Send to ${this.identifier} failed: ${toError(err).message}`,
                { cause: err },
            );
            this.close(failure);
            throw failure;
        }
    }

    /**
     * Send a chat. Over the reliable layer it is sequenced and retried until
     * acknowledged; otherwise it is written once.
     */
    async sendChat(text: string, sender: string = this.identity): Promise<void> {
        if (this.isFinished()) {
            throw new NotConnectedError(`Session ${this.identifier} is ${this._state}`);
        }
        if (!this.reliable) {
            await this.send(createChatMessage(text, sender));
            return;
        }
        try {
            await this.reliable.send(text, sender);
        } catch (err) {
            const failure = err instanceof SendFailureError
                ? err
                : new SendFailureError(toError(err).message, { cause: err });
            this.close(failure);
            throw failure;
        }
    }

    /**
     * Measure latency to the peer with a test message. Resolves with
     * milliseconds between the probe's timestamp and the arrival of its echo.
     */
    probe(timeoutMs = 5_000): Promise<number> {
        if (this.isFinished()) {
            return Promise.reject(new NotConnectedError(`Session ${this.identifier} is ${this._state}`));
        }
        const id = randomUUID();
        return new Promise<number>((resolve, reject) => {
            const timer = setTimeout(() => {
                this.probes.delete(id);
                this.expiredProbes.add(id);
                reject(new PeerUnreachableError(`No echo from ${this.identifier} within ${timeoutMs}ms`));
            }, timeoutMs);
            this.probes.set(id, { resolve, reject, timer });
            this.send(createTestMessage(id, this.identity, this.now() / 1000)).catch((err: unknown) => {
                clearTimeout(timer);
                this.probes.delete(id);
                reject(toError(err));
            });
        });
    }

    // ─── Lifecycle ──────────────────────────────────────────────────

    /** Leave handshaking. Runs on `connect`, or on a chat from a peer that skipped it. */
    activate(): void {
        if (this._state !== "handshaking") return;
        this._state = "active";
        this.activated = true;
        this.emit("state", this._state);
        this.logger.info(`${this._name} (${this.identifier}) connected`);
        this.safely("onPeerConnected", () => this.callbacks.onPeerConnected?.(this.info));
        if (this.role === "acceptor") {
            this.notify(`Client connected: ${this._name} (${this.identifier})`, false);
            this.post(createStatusMessage(`${WELCOME_PREFIX}${this._name}`, this.identity));
        }
    }

    /**
     * Orderly shutdown: tell the peer we are leaving, then tear down. The
     * disconnect is best-effort; teardown happens even if it fails.
     */
    async stop(): Promise<void> {
        if (this.isFinished()) return;
        this._state = "closing";
        this.emit("state", this._state);
        try {
            await this.link.write(encodeMessage(createDisconnectMessage(this.identity)));
        } catch (err) {
            this.logger.debug(`Disconnect to ${this.identifier} not sent: ${toError(err).message}`);
        }
        this.close(null);
    }

    /**
     * Tear down with `reason` after a goodbye that is sent but not waited
     * for, so the peer learns it has been dropped.
     */
    abandon(reason: ChatError): void {
        if (this.isFinished()) return;
        this.link.write(encodeMessage(createDisconnectMessage(this.identity))).catch((err: unknown) => {
            this.logger.debug(`Disconnect to ${this.identifier} not sent: ${toError(err).message}`);
        });
        this.close(reason);
    }

    /**
     * Tear the session down. Idempotent: only the first call has any effect.
     * `reason` is null for an orderly close and the fatal error otherwise.
     */
    close(reason: ChatError | null = null): void {
        if (this._state === "closed") return;
        this._state = "closed";

        this.reliable?.close();
        this.link.close();

        for (const [id, probe] of this.probes) {
            clearTimeout(probe.timer);
            probe.reject(new NotConnectedError(`Session ${this.identifier} closed`));
            this.probes.delete(id);
        }

        if (reason) {
            this.logger.warn(`Connection lost with ${this.identifier}: ${reason.message}`);
        } else {
            this.logger.info(`${this._name} (${this.identifier}) disconnected`);
        }

        this.emit("state", this._state);
        this.emit("closed", reason, this);

        if (this.activated) {
            const who = this.role === "acceptor" ? `${this._name} (${this.identifier})` : this.identifier;
            if (reason) {
                this.notify(`Connection lost: ${who}: ${reason.message}`, true);
            } else if (this.role === "acceptor") {
                this.notify(`Client disconnected: ${who}`, false);
            } else {
                this.notify(`Disconnected from ${who}`, false);
            }
            this.safely("onPeerDisconnected", () => this.callbacks.onPeerDisconnected?.(this.info));
        }
    }

    /** The peer closed the stream (EOF). */
    peerClosed(discardedBytes = 0): void {
        if (discardedBytes > 0) {
            this.logger.warn(`${this.identifier} closed mid-frame; ${discardedBytes} bytes discarded`);
        }
        this.close(null);
    }

    /**
     * The transport reported an error. A ChatError that is not fatal (one bad
     * frame) is logged and the session carries on.
     */
    fail(err: unknown): void {
        if (err instanceof ChatError && !err.fatal) {
            this.logger.warn(`Recoverable error from ${this.identifier}: ${err.message}`);
            return;
        }
        this.close(err instanceof ChatError
            ? err
            : new TransportResetError(toError(err).message, { cause: err }));
    }

    // ─── Internals ──────────────────────────────────────────────────

    private rename(name: string): void {
        if (name === this._name) return;
        this.logger.info(`${this.identifier} is now known as ${name}`);
        this._name = name;
    }

    private touch(): void {
        this.lastActivity = this.now();
    }

    private isFinished(): boolean {
        return this._state === "closing" || this._state === "closed";
    }

    /** Fire-and-forget send; failures already tear the session down. */
    private post(msg: Message): void {
        this.send(msg).catch((err: unknown) => {
            this.logger.debug(`Dropped ${msg.kind} to ${this.identifier}: ${toError(err).message}`);
        });
    }

    private notify(text: string, isError: boolean): void {
        this.safely("onStatus", () => this.callbacks.onStatus?.(text, isError));
    }

    private safely(name: string, fn: () => void): void {
        try {
            fn();
        } catch (err) {
            this.logger.error(`${name} callback threw: ${toError(err).message}`);
        }
    }
}

/** Stable placeholder name derived from the peer's identifier. */
export function defaultPeerName(identifier: string): string {
    let hash = 0x811c9dc5;
    for (let i = 0; i < identifier.length; i++) {
        hash ^= identifier.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return `User_${(hash >>> 0) % 10000}`;
}
