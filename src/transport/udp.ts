/**
 * UDP Transport
 *
 * Wraps a dgram.Socket as a DatagramEndpoint.
 */

import * as dgram from "node:dgram";
import { lookup } from "node:dns/promises";
import { isIP } from "node:net";
import type { DatagramEndpoint, PeerAddress } from "./types.js";

export interface UdpEndpointOptions {
    /** Socket family. Default: "udp4". */
    type?: dgram.SocketType;
    /**
     * Share the port with other sockets that set it too. Off by default, so
     * binding a port already in use fails with EADDRINUSE.
     */
    reuseAddr?: boolean;
}

export class UdpEndpoint implements DatagramEndpoint {
    private readonly socket: dgram.Socket;
    private readonly family: 4 | 6;
    private bound = false;
    private closed = false;

    constructor(options: UdpEndpointOptions = {}) {
        const type = options.type ?? "udp4";
        this.family = type === "udp6" ? 6 : 4;
        this.socket = dgram.createSocket({ type, reuseAddr: options.reuseAddr ?? false });
    }

    get local(): PeerAddress | null {
        if (!this.bound || this.closed) return null;
        const info = this.socket.address();
        return { address: info.address, port: info.port };
    }

    bind(port = 0, host?: string): Promise<PeerAddress> {
        return new Promise((resolve, reject) => {
            const onError = (err: Error) => reject(err);
            this.socket.once("error", onError);
            this.socket.bind(port, host, () => {
                this.socket.removeListener("error", onError);
                this.bound = true;
                const info = this.socket.address();
                resolve({ address: info.address, port: info.port });
            });
        });
    }

    send(data: Uint8Array, to: PeerAddress): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this.closed) {
                reject(new Error("UDP endpoint is closed"));
                return;
            }
            this.socket.send(data, to.port, to.address, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }

    async resolve(host: string): Promise<string> {
        if (isIP(host) !== 0) return host;
        const result = await lookup(host, { family: this.family });
        return result.address;
    }

    onMessage(handler: (data: Buffer, from: PeerAddress) => void): void {
        this.socket.on("message", (msg: Buffer, rinfo: dgram.RemoteInfo) => {
            handler(msg, { address: rinfo.address, port: rinfo.port });
        });
    }

    onError(handler: (err: Error) => void): void {
        this.socket.on("error", handler);
    }

    close(): Promise<void> {
        if (this.closed) return Promise.resolve();
        this.closed = true;
        return new Promise((resolve) => {
            try {
                this.socket.close(() => resolve());
            } catch {
                // Never bound: the socket has nothing to release
                resolve();
            }
        });
    }
}
