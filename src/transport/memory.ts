/**
 * In-Memory Datagram Network
 *
 * Endpoints attached to the same MemoryDatagramNetwork exchange datagrams
 * without touching the OS. The network can drop a share of datagrams to
 * stand in for a lossy link.
 *
 * Delivery is asynchronous (on a later event-loop turn), like a real socket,
 * so code that only works when a reply lands inside send() fails here too.
 *
 * Usage:
 *   const network = new MemoryDatagramNetwork({ dropRate: 0.3, random: seededRandom(7) });
 *   const a = network.createEndpoint();
 *   await a.bind(5051);
 */

import type { DatagramEndpoint, PeerAddress } from "./types.js";
import { addressKey } from "./types.js";

export interface MemoryNetworkOptions {
    /** Probability in [0, 1] that a datagram is silently dropped. Default: 0. */
    dropRate?: number;
    /** Random source for drop decisions. Default: Math.random. */
    random?: () => number;
}

export interface NetworkStats {
    sent: number;
    dropped: number;
    delivered: number;
}

export class MemoryDatagramNetwork {
    private readonly endpoints: Map<string, MemoryDatagramEndpoint> = new Map();
    private readonly random: () => number;
    private nextPort = 40000;
    private _stats: NetworkStats = { sent: 0, dropped: 0, delivered: 0 };

    /** Probability that a datagram is dropped. Can be changed mid-test. */
    dropRate: number;

    constructor(options: MemoryNetworkOptions = {}) {
        this.dropRate = options.dropRate ?? 0;
        this.random = options.random ?? Math.random;
    }

    createEndpoint(address = "127.0.0.1"): MemoryDatagramEndpoint {
        return new MemoryDatagramEndpoint(this, address);
    }

    get stats(): NetworkStats {
        return { ...this._stats };
    }

    /** Register an endpoint under its address (internal use). */
    _attach(endpoint: MemoryDatagramEndpoint, address: string, port: number): PeerAddress {
        const chosen = port === 0 ? this.allocatePort(address) : port;
        const local = { address, port: chosen };
        const key = addressKey(local);
        if (this.endpoints.has(key)) {
            throw new Error(`Address in use: ${key}`);
        }
        this.endpoints.set(key, endpoint);
        return local;
    }

    /** Remove an endpoint (internal use). */
    _detach(local: PeerAddress): void {
        this.endpoints.delete(addressKey(local));
    }

    /** Carry one datagram across the network (internal use). */
    _transfer(data: Uint8Array, from: PeerAddress, to: PeerAddress): void {
        this._stats.sent++;
        if (this.dropRate > 0 && this.random() < this.dropRate) {
            this._stats.dropped++;
            return;
        }
        const copy = Buffer.from(data);
        setImmediate(() => {
            const target = this.endpoints.get(addressKey(to));
            if (!target) {
                this._stats.dropped++;
                return;
            }
            this._stats.delivered++;
            target._deliver(copy, { ...from });
        });
    }

    private allocatePort(address: string): number {
        while (this.endpoints.has(addressKey({ address, port: this.nextPort }))) {
            this.nextPort++;
        }
        return this.nextPort++;
    }
}

export class MemoryDatagramEndpoint implements DatagramEndpoint {
    private readonly network: MemoryDatagramNetwork;
    private readonly address: string;
    private _local: PeerAddress | null = null;
    private closed = false;
    private messageHandlers: ((data: Buffer, from: PeerAddress) => void)[] = [];
    private errorHandlers: ((err: Error) => void)[] = [];

    constructor(network: MemoryDatagramNetwork, address: string) {
        this.network = network;
        this.address = address;
    }

    get local(): PeerAddress | null {
        return this._local;
    }

    async bind(port = 0): Promise<PeerAddress> {
        if (this.closed) throw new Error("Endpoint closed");
        if (this._local) throw new Error("Endpoint already bound");
        this._local = this.network._attach(this, this.address, port);
        return { ...this._local };
    }

    async send(data: Uint8Array, to: PeerAddress): Promise<void> {
        if (this.closed) throw new Error("Endpoint closed");
        if (!this._local) {
            // An unbound sender gets an ephemeral port, like an OS socket
            await this.bind(0);
        }
        if (this._local) {
            this.network._transfer(data, this._local, to);
        }
    }

    async resolve(host: string): Promise<string> {
        return host === "localhost" ? "127.0.0.1" : host;
    }

    onMessage(handler: (data: Buffer, from: PeerAddress) => void): void {
        this.messageHandlers.push(handler);
    }

    onError(handler: (err: Error) => void): void {
        this.errorHandlers.push(handler);
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        if (this._local) {
            this.network._detach(this._local);
            this._local = null;
        }
    }

    /** Hand a datagram to this endpoint's handlers (internal use). */
    _deliver(data: Buffer, from: PeerAddress): void {
        if (this.closed) return;
        for (const handler of this.messageHandlers) {
            handler(data, from);
        }
    }

    /** Inject an error (for testing error handling). */
    _injectError(err: Error): void {
        for (const handler of this.errorHandlers) {
            handler(err);
        }
    }
}

/**
 * Deterministic random source (mulberry32) so lossy-network tests drop the
 * same datagrams on every run.
 */
export function seededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}
