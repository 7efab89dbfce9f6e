/**
 * Transport Layer Types
 *
 * The datagram server and client talk to a DatagramEndpoint instead of a
 * dgram.Socket directly. Implemented by UdpEndpoint (production) and
 * MemoryDatagramEndpoint (tests).
 */

/** Where a datagram came from or is going to. */
export interface PeerAddress {
    address: string;
    port: number;
}

/** "ip:port" key identifying a peer. */
export function addressKey(peer: PeerAddress): string {
    return `${peer.address}:${peer.port}`;
}

/** A connectionless socket: whole datagrams in, whole datagrams out. */
export interface DatagramEndpoint {
    /** Bind to a local port (0 picks a free one). Resolves with the bound address. */
    bind(port?: number, host?: string): Promise<PeerAddress>;
    /** Send one datagram. Resolves once it has been handed to the network. */
    send(data: Uint8Array, to: PeerAddress): Promise<void>;
    /** Resolve a host name to the address datagrams from it will carry. */
    resolve(host: string): Promise<string>;
    /** Register a datagram handler */
    onMessage(handler: (data: Buffer, from: PeerAddress) => void): void;
    /** Register an error handler */
    onError(handler: (err: Error) => void): void;
    /** Close the endpoint. Safe to call more than once. */
    close(): Promise<void>;
    /** The bound local address, or null before bind / after close. */
    readonly local: PeerAddress | null;
}
