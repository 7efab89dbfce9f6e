import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { MalformedMessageError, UnknownMessageKindError } from "./errors.js";

/**
 * Message format for chat communication.
 *
 * - `kind` — closed set of message kinds. On the wire `chat` is spelled
 *   `"message"`; every other kind is spelled as its name.
 * - `content` — text payload. For chats sent through the reliable datagram
 *   layer this is itself a JSON envelope (see {@link encodeEnvelope}).
 * - `sender` — display name of the originating peer, `null` if unset.
 * - `timestamp` — seconds since the epoch, assigned by the producer.
 * - `version` — protocol version tag, carried but never branched on.
 */
export interface Message {
    kind: MessageKind;
    content: string;
    sender: string | null;
    timestamp: number;
    version: string;
}

export const MESSAGE_KINDS = [
    "connect",
    "disconnect",
    "chat",
    "status",
    "error",
    "test",
    "ack",
] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

export const PROTOCOL_VERSION = "1.0";

/** Sender identity used for messages that originate at the server. */
export const SERVER_SENDER = "server";

const WIRE_TYPES: Record<MessageKind, string> = {
    connect: "connect",
    disconnect: "disconnect",
    chat: "message",
    status: "status",
    error: "error",
    test: "test",
    ack: "ack",
};

const KIND_BY_WIRE_TYPE: ReadonlyMap<string, MessageKind> = new Map(
    MESSAGE_KINDS.map((kind) => [WIRE_TYPES[kind], kind]),
);

export const WireMessage = Type.Object({
    type: Type.String(),
    content: Type.String(),
    username: Type.Optional(Type.Union([Type.String(), Type.Null()])),
    timestamp: Type.Number(),
    version: Type.Optional(Type.String()),
});

export type WireMessage = Static<typeof WireMessage>;

/** Wire spelling of a kind. */
export function wireType(kind: MessageKind): string {
    return WIRE_TYPES[kind];
}

/**
 * Encode a Message as its UTF-8 JSON payload.
 *
 * Field order is fixed (type, content, username, timestamp, version) so the
 * same message always produces the same bytes.
 */
export function encodeMessage(msg: Message): Buffer {
    const wire: Required<WireMessage> = {
        type: WIRE_TYPES[msg.kind],
        content: msg.content,
        username: msg.sender,
        timestamp: msg.timestamp,
        version: msg.version,
    };
    return Buffer.from(JSON.stringify(wire), "utf-8");
}

export type DecodeResult =
    | { ok: true; message: Message }
    | { ok: false; error: MalformedMessageError | UnknownMessageKindError };

const OPEN_BRACE = 0x7b;

/**
 * Decode a payload into a Message.
 *
 * Leading bytes before the first `{` are skipped. A payload that is not JSON,
 * or lacks `type`, `content` or `timestamp`, is malformed. A `type` we do not
 * know is rejected rather than mapped to a default kind.
 */
export function decodeMessage(payload: Uint8Array): DecodeResult {
    const bytes = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength);
    const start = bytes.indexOf(OPEN_BRACE);
    if (start < 0) {
        return malformed("No JSON object in payload");
    }

    const json = bytes.subarray(start).toString("utf-8");
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch {
        return malformed(`Invalid JSON in message payload: ${json.slice(0, 100)}`);
    }

    if (!Value.Check(WireMessage, parsed)) {
        const first = Value.Errors(WireMessage, parsed).First();
        const detail = first ? `${first.path || "/"} ${first.message}` : "schema mismatch";
        return malformed(`Invalid message format: ${detail}`);
    }

    const kind = KIND_BY_WIRE_TYPE.get(parsed.type);
    if (kind === undefined) {
        return { ok: false, error: new UnknownMessageKindError(parsed.type) };
    }

    return {
        ok: true,
        message: {
            kind,
            content: parsed.content,
            sender: parsed.username ?? null,
            timestamp: parsed.timestamp,
            version: parsed.version ?? PROTOCOL_VERSION,
        },
    };
}

function malformed(reason: string): DecodeResult {
    return { ok: false, error: new MalformedMessageError(reason) };
}

// ─── Factories ──────────────────────────────────────────────────────

/** Current time in seconds since the epoch, the wire's timestamp unit. */
export function nowSeconds(): number {
    return Date.now() / 1000;
}

export function createMessage(
    kind: MessageKind,
    content: string,
    sender: string | null = null,
    timestamp: number = nowSeconds(),
): Message {
    return { kind, content, sender, timestamp, version: PROTOCOL_VERSION };
}

export function createChatMessage(content: string, sender: string | null): Message {
    return createMessage("chat", content, sender);
}

export function createConnectMessage(username: string): Message {
    return createMessage("connect", username, username);
}

export function createDisconnectMessage(sender: string | null): Message {
    return createMessage("disconnect", "", sender);
}

export function createStatusMessage(content: string, sender: string | null = SERVER_SENDER): Message {
    return createMessage("status", content, sender);
}

export function createErrorMessage(content: string, sender: string | null = SERVER_SENDER): Message {
    return createMessage("error", content, sender);
}

/** A latency test; `timestamp` is in seconds and defaults to now. */
export function createTestMessage(testId: string, sender: string | null, timestamp?: number): Message {
    return createMessage("test", testId, sender, timestamp);
}

/**
 * Build the echo of a test message: everything is kept as received except
 * the sender, which becomes the responder.
 */
export function echoTestMessage(msg: Message, responder: string): Message {
    return { ...msg, sender: responder };
}

// ─── Reliable datagram envelope ─────────────────────────────────────

export const EnvelopeSchema = Type.Object({
    sequence: Type.Integer({ minimum: 0 }),
    data: Type.String(),
    test_id: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export const AckSchema = Type.Object({
    sequence: Type.Integer({ minimum: 0 }),
    test_id: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

/** Sequenced chat payload carried inside a chat message's content. */
export interface Envelope {
    sequence: number;
    data: string;
    testId: string | null;
}

export interface Ack {
    sequence: number;
    testId: string | null;
}

export function encodeEnvelope(envelope: Envelope): string {
    return JSON.stringify({
        sequence: envelope.sequence,
        data: envelope.data,
        test_id: envelope.testId,
    });
}

/** Parse chat content as an envelope. Returns null when it is not one. */
export function decodeEnvelope(content: string): Envelope | null {
    const parsed = parseJson(content);
    if (!Value.Check(EnvelopeSchema, parsed)) return null;
    return { sequence: parsed.sequence, data: parsed.data, testId: parsed.test_id ?? null };
}

export function encodeAck(ack: Ack): string {
    return JSON.stringify({ sequence: ack.sequence, test_id: ack.testId });
}

export function decodeAck(content: string): Ack | null {
    const parsed = parseJson(content);
    if (!Value.Check(AckSchema, parsed)) return null;
    return { sequence: parsed.sequence, testId: parsed.test_id ?? null };
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}
