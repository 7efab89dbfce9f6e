/**
 * Shared test infrastructure.
 */

import type { ChatCallbacks, PeerInfo } from "../src/session.js";
import type { PeerLink } from "../src/session.js";
import { decodeMessage, type Message } from "../src/message.js";

export function wait(ms: number): Promise<void> {
    return new Promise((r) => setTimeout(r, ms));
}

/** Poll until `condition` holds, failing after `timeoutMs`. */
export async function waitFor(condition: () => boolean, timeoutMs = 2_000, label = "condition"): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!condition()) {
        if (Date.now() > deadline) {
            throw new Error(`Timed out waiting for ${label}`);
        }
        await wait(10);
    }
}

/** Callbacks that record everything they are given. */
export class Recorder implements ChatCallbacks {
    readonly messages: { peer: PeerInfo; text: string; sender: string | null }[] = [];
    readonly statuses: { text: string; isError: boolean }[] = [];
    readonly connected: PeerInfo[] = [];
    readonly disconnected: PeerInfo[] = [];

    onMessage(peer: PeerInfo, text: string, sender: string | null): void {
        this.messages.push({ peer, text, sender });
    }

    onStatus(text: string, isError: boolean): void {
        this.statuses.push({ text, isError });
    }

    onPeerConnected(peer: PeerInfo): void {
        this.connected.push(peer);
    }

    onPeerDisconnected(peer: PeerInfo): void {
        this.disconnected.push(peer);
    }
}

/** A PeerLink that keeps what is written to it. */
export class CapturingLink implements PeerLink {
    readonly written: Buffer[] = [];
    closed = 0;
    /** When set, writes reject with this error. */
    failWith: Error | null = null;

    async write(payload: Buffer): Promise<void> {
        if (this.failWith) throw this.failWith;
        this.written.push(payload);
    }

    close(): void {
        this.closed++;
    }

    /** Everything written so far, decoded. */
    get messages(): Message[] {
        const out: Message[] = [];
        for (const payload of this.written) {
            const decoded = decodeMessage(payload);
            if (decoded.ok) out.push(decoded.message);
        }
        return out;
    }
}
