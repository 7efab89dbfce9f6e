import { EventEmitter } from "node:events";
import {
    type Message,
    createMessage,
    decodeAck,
    decodeEnvelope,
    encodeAck,
    encodeEnvelope,
    encodeMessage,
} from "./message.js";
import { SendFailureError } from "./errors.js";
import { SequenceWindow } from "./sequence-window.js";
import { type Logger, silentLogger } from "./logger.js";

/** Bookkeeping for one unacknowledged reliable send. */
export interface PendingSend {
    sequence: number;
    payload: Buffer;
    /** Milliseconds, from the channel's clock. */
    sentAt: number;
    retries: number;
    testId: string | null;
}

export interface RetryOptions {
    /** How often pending sends are swept, in ms. Default: 500. */
    retryIntervalMs?: number;
    /** Age after which a pending send is retransmitted, in ms. Default: 2000. */
    retryTimeoutMs?: number;
    /** Retransmissions allowed per message before giving up. Default: 20. */
    maxRetries?: number;
}

export interface ReliableChannelOptions extends RetryOptions {
    /** Write one encoded datagram to the peer. */
    transmit: (payload: Buffer) => Promise<void>;
    /** Sender name stamped on acknowledgements. */
    identity: string;
    /** Out-of-order sequence numbers held before the oldest gap is given up on. Default: 1024. */
    dedupeWindow?: number;
    now?: () => number;
    logger?: Logger;
}

/** What the application should do with an inbound message. */
export type Inbound =
    | { type: "deliver"; message: Message; sequence: number | null }
    | { type: "duplicate"; sequence: number }
    | { type: "ack"; sequence: number; matched: boolean }
    | { type: "pass"; message: Message };

export const DEFAULT_RETRY_INTERVAL_MS = 500;
export const DEFAULT_RETRY_TIMEOUT_MS = 2_000;
export const DEFAULT_MAX_RETRIES = 20;

/**
 * At-least-once delivery for chat messages over an unreliable datagram link,
 * one instance per peer.
 *
 * Sending: each chat gets the next sequence number, is wrapped in a
 * `{sequence, data, test_id}` envelope and kept as a PendingSend until the
 * peer acknowledges it. A timer sweeps pending sends every `retryIntervalMs`
 * and retransmits the identical bytes of those older than `retryTimeoutMs`.
 * The timer only runs while something is pending.
 *
 * Receiving: a sequenced chat is acknowledged immediately and delivered once
 * per distinct sequence number, however late a retransmission lands. Acks
 * are consumed here and never surface as deliverable messages. Delivery is
 * not ordered: a retransmitted early sequence can arrive after a later one.
 *
 * Events:
 * - "recovery" (active: boolean) — retransmission started, or every pending
 *   send has been acknowledged since. Advisory only.
 * - "retransmit" (pending: PendingSend)
 * - "failed" (err: SendFailureError) — a transmit failed or a message ran out
 *   of retries. The owner should tear the peer down.
 */
export class ReliableChannel extends EventEmitter {
    private readonly transmit: (payload: Buffer) => Promise<void>;
    private readonly identity: string;
    private readonly retryIntervalMs: number;
    private readonly retryTimeoutMs: number;
    private readonly maxRetries: number;
    private readonly now: () => number;
    private readonly logger: Logger;

    private readonly pending: Map<number, PendingSend> = new Map();
    private readonly delivered: SequenceWindow;
    private sequence = 0;
    private timer: ReturnType<typeof setInterval> | null = null;
    private recovering = false;
    private closed = false;

    constructor(options: ReliableChannelOptions) {
        super();
        this.transmit = options.transmit;
        this.identity = options.identity;
        this.retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
        this.retryTimeoutMs = options.retryTimeoutMs ?? DEFAULT_RETRY_TIMEOUT_MS;
        this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
        this.now = options.now ?? Date.now;
        this.logger = options.logger ?? silentLogger;
        this.delivered = new SequenceWindow(options.dedupeWindow ?? 1024);
    }

    /**
     * Send `data` as a sequenced chat. Resolves with the sequence number once
     * the first transmission is written; acknowledgement happens later.
     */
    async send(data: string, sender: string | null, testId: string | null = null): Promise<number> {
        if (this.closed) {
            throw new SendFailureError("Reliable channel is closed");
        }

        const sequence = this.sequence++;
        const content = encodeEnvelope({ sequence, data, testId });
        const payload = encodeMessage(createMessage("chat", content, sender));

        this.pending.set(sequence, { sequence, payload, sentAt: this.now(), retries: 0, testId });
        this.ensureTimer();

        try {
            await this.transmit(payload);
        } catch (err) {
            throw new SendFailureError(`Failed to send message ${sequence}`, { cause: err });
        }
        return sequence;
    }

    /**
     * Run an inbound message through the reliability layer.
     *
     * Sequenced chats are acknowledged and deduplicated, acks retire their
     * pending send, everything else passes through untouched. A chat whose
     * content is not an envelope is delivered as-is without an ack.
     */
    receive(msg: Message): Inbound {
        if (msg.kind === "ack") {
            const ack = decodeAck(msg.content);
            if (!ack) {
                this.logger.warn(`Ignoring ack with unreadable content: ${msg.content.slice(0, 100)}`);
                return { type: "ack", sequence: -1, matched: false };
            }
            return { type: "ack", sequence: ack.sequence, matched: this.acknowledge(ack.sequence) };
        }

        if (msg.kind !== "chat") {
            return { type: "pass", message: msg };
        }

        const envelope = decodeEnvelope(msg.content);
        if (!envelope) {
            return { type: "deliver", message: msg, sequence: null };
        }

        this.sendAck(envelope.sequence, envelope.testId);

        if (!this.delivered.add(envelope.sequence)) {
            this.logger.debug(`Duplicate sequence ${envelope.sequence} suppressed`);
            return { type: "duplicate", sequence: envelope.sequence };
        }
        return { type: "deliver", message: { ...msg, content: envelope.data }, sequence: envelope.sequence };
    }

    /** Retire a pending send. Returns false if nothing was pending under that sequence. */
    acknowledge(sequence: number): boolean {
        const removed = this.pending.delete(sequence);
        if (removed) {
            this.logger.debug(`Sequence ${sequence} acknowledged`);
        }
        this.settle();
        return removed;
    }

    /**
     * Retransmit every pending send older than the retry timeout. Called by
     * the internal timer; exposed so the schedule can be driven directly.
     */
    sweep(): void {
        if (this.closed) return;
        const now = this.now();

        for (const entry of Array.from(this.pending.values())) {
            if (now - entry.sentAt < this.retryTimeoutMs) continue;

            if (entry.retries >= this.maxRetries) {
                this.pending.delete(entry.sequence);
                this.fail(new SendFailureError(
                    `Message ${entry.sequence} unacknowledged after ${entry.retries} retries`,
                ));
                continue;
            }

            entry.retries++;
            entry.sentAt = now;
            this.setRecovering(true);
            this.logger.debug(`Retransmitting sequence ${entry.sequence} (retry ${entry.retries})`);
            this.emit("retransmit", entry);
            this.transmit(entry.payload).catch((err: unknown) => {
                this.fail(new SendFailureError(`Failed to retransmit message ${entry.sequence}`, { cause: err }));
            });
        }

        this.settle();
    }

    /** Stop the retry timer and discard every pending send. Idempotent. */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.pending.clear();
        this.stopTimer();
        this.setRecovering(false);
    }

    /**
     * Forget which inbound sequences were delivered. For a peer that has
     * started a new session and numbers its chats from 0 again.
     */
    resetInbound(): void {
        this.delivered.reset();
    }

    /** Number of sends awaiting acknowledgement. */
    get pendingCount(): number {
        return this.pending.size;
    }

    /** Snapshot of the pending sends, oldest sequence first. */
    get pendingSends(): PendingSend[] {
        return Array.from(this.pending.values(), (entry) => ({ ...entry }));
    }

    /** Whether a retransmission has happened since the pending set was last empty. */
    get inRecovery(): boolean {
        return this.recovering;
    }

    /** The sequence number the next send will use. */
    get nextSequence(): number {
        return this.sequence;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    private sendAck(sequence: number, testId: string | null): void {
        if (this.closed) return;
        const payload = encodeMessage(createMessage("ack", encodeAck({ sequence, testId }), this.identity));
        this.transmit(payload).catch((err: unknown) => {
            this.fail(new SendFailureError(`Failed to acknowledge message ${sequence}`, { cause: err }));
        });
    }

    private ensureTimer(): void {
        if (this.timer || this.closed) return;
        this.timer = setInterval(() => this.sweep(), this.retryIntervalMs);
    }

    private stopTimer(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
    }

    /** Stop the timer and leave recovery once nothing is pending. */
    private settle(): void {
        if (this.pending.size > 0) return;
        this.stopTimer();
        this.setRecovering(false);
    }

    private setRecovering(active: boolean): void {
        if (this.recovering === active) return;
        this.recovering = active;
        this.emit("recovery", active);
    }

    private fail(err: SendFailureError): void {
        if (this.closed) return;
        this.logger.warn(err.message);
        this.emit("failed", err);
    }
}
