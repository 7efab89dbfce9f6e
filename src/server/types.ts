import type { ChatCallbacks, PeerInfo } from "../session.js";
import type { PeerAddress } from "../transport/types.js";
import type { Logger } from "../logger.js";

export type ServerStatus = "running" | "stopped" | "error";

export interface ChatServerOptions {
    /** Listen host. Default: "localhost". */
    host?: string;
    /** Listen port; 0 picks a free one. */
    port: number;
    callbacks?: ChatCallbacks;
    logger?: Logger;
    /** Forward each delivered chat to every other active peer. Default: true. */
    relay?: boolean;
    /** Sender name for server-origin messages. Default: "server". */
    identity?: string;
}

/**
 * A chat listener. Both the stream and the datagram server implement it.
 */
export interface ChatServer {
    /** Bind and begin accepting peers. */
    start(): Promise<void>;

    /** Tear down every peer and release the socket. */
    stop(): Promise<void>;

    /** Send a chat to one peer by its "ip:port" identifier. */
    sendTo(identifier: string, text: string): Promise<void>;

    /** Send a chat to every active peer. Resolves with the number reached. */
    broadcast(text: string): Promise<number>;

    /** Snapshot of the registered peers. */
    get peers(): PeerInfo[];

    get status(): ServerStatus;

    /** Bound address while running. */
    get address(): PeerAddress | null;

    /** One-line human-readable status. */
    describe(): string;
}
