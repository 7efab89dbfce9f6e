import { EventEmitter } from "node:events";
import { SERVER_SENDER } from "../message.js";
import { NotConnectedError, type ChatError, toError } from "../errors.js";
import { type Logger, silentLogger } from "../logger.js";
import type { ChatCallbacks, PeerInfo, Session } from "../session.js";
import type { PeerAddress } from "../transport/types.js";
import { PeerRegistry } from "./registry.js";
import type { ChatServer, ChatServerOptions, ServerStatus } from "./types.js";

/**
 * Registry, relay and fan-out shared by the stream and datagram listeners.
 *
 * Events:
 * - "peer-connect" (peer: PeerInfo) — a session became active
 * - "peer-disconnect" (peer: PeerInfo, reason: ChatError | null) — a session was torn down
 */
export abstract class BaseChatServer extends EventEmitter implements ChatServer {
    protected readonly host: string;
    protected readonly port: number;
    protected readonly callbacks: ChatCallbacks;
    protected readonly logger: Logger;
    protected readonly relay: boolean;
    protected readonly identity: string;
    protected readonly registry = new PeerRegistry();
    protected _status: ServerStatus = "stopped";

    /** "TCP" or "UDP", for status text. */
    protected abstract readonly label: string;

    constructor(options: ChatServerOptions) {
        super();
        this.host = options.host ?? "localhost";
        this.port = options.port;
        this.callbacks = options.callbacks ?? {};
        this.logger = options.logger ?? silentLogger;
        this.relay = options.relay ?? true;
        this.identity = options.identity ?? SERVER_SENDER;
    }

    abstract start(): Promise<void>;
    abstract stop(): Promise<void>;
    abstract get address(): PeerAddress | null;

    get status(): ServerStatus {
        return this._status;
    }

    get peers(): PeerInfo[] {
        return this.registry.snapshot();
    }

    async sendTo(identifier: string, text: string): Promise<void> {
        const session = this.registry.get(identifier);
        if (!session || !session.isActive) {
            throw new NotConnectedError(`No active peer ${identifier}`);
        }
        await session.sendChat(text, this.identity);
    }

    async broadcast(text: string): Promise<number> {
        const targets = this.registry.active();
        const results = await Promise.allSettled(
            targets.map((session) => session.sendChat(text, this.identity)),
        );
        return results.filter((result) => result.status === "fulfilled").length;
    }

    describe(): string {
        const address = this.address;
        if (this._status !== "running" || !address) {
            return `${this.label} server ${this._status}`;
        }
        const count = this.registry.size;
        return `${this.label} server running on ${address.address}:${address.port} with ${count} peer${count === 1 ? "" : "s"}`;
    }

    /** Track a new session until its teardown. */
    protected register(session: Session): void {
        this.registry.add(session);

        session.on("state", (state: string) => {
            if (state === "active") this.emit("peer-connect", session.info);
        });

        session.on("chat", (text: string, from: Session) => {
            this.relayChat(text, from);
        });

        session.once("closed", (reason: ChatError | null, closed: Session) => {
            this.registry.remove(closed);
            this.emit("peer-disconnect", closed.info, reason);
        });
    }

    /** Stop every session, waiting at most `timeoutMs` for the farewells to go out. */
    protected async closeAll(timeoutMs: number): Promise<void> {
        const sessions = this.registry.drain();
        if (sessions.length === 0) return;

        let timer: ReturnType<typeof setTimeout> | undefined;
        const deadline = new Promise<void>((resolve) => {
            timer = setTimeout(resolve, timeoutMs);
        });
        await Promise.race([
            Promise.allSettled(sessions.map((session) => session.stop())),
            deadline,
        ]);
        clearTimeout(timer);

        for (const session of sessions) {
            session.close(null);
        }
    }

    protected notify(text: string, isError: boolean): void {
        try {
            this.callbacks.onStatus?.(text, isError);
        } catch (err) {
            this.logger.error(`onStatus callback threw: ${toError(err).message}`);
        }
    }

    private relayChat(text: string, from: Session): void {
        if (!this.relay) return;
        for (const other of this.registry.active(from)) {
            other.sendChat(text, from.name).catch((err: unknown) => {
                this.logger.debug(`Relay to ${other.identifier} failed: ${toError(err).message}`);
            });
        }
    }
}
