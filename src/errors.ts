/**
 * Error taxonomy for the chat transport.
 *
 * Every error raised by the library is a ChatError with a `code`, so callers
 * can branch on the kind of failure without string matching.
 */

export type ChatErrorCode =
    | "malformed-message"
    | "unknown-kind"
    | "frame-too-large"
    | "peer-unreachable"
    | "transport-reset"
    | "send-failure"
    | "not-connected"
    | "invalid-config";

export class ChatError extends Error {
    readonly code: ChatErrorCode;

    constructor(code: ChatErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ChatError";
        this.code = code;
    }

    /**
     * Whether this error ends the session it was raised on. Protocol errors
     * on a single frame do not; transport errors always do.
     */
    get fatal(): boolean {
        return this.code !== "malformed-message" && this.code !== "unknown-kind";
    }
}

/** Bad JSON, or a payload missing a required field. */
export class MalformedMessageError extends ChatError {
    constructor(message: string) {
        super("malformed-message", message);
        this.name = "MalformedMessageError";
    }
}

/** A well-formed payload whose `type` is not one we know. */
export class UnknownMessageKindError extends ChatError {
    readonly kind: string;

    constructor(kind: string) {
        super("unknown-kind", `Unknown message kind: ${JSON.stringify(kind)}`);
        this.name = "UnknownMessageKindError";
        this.kind = kind;
    }
}

export class FrameTooLargeError extends ChatError {
    readonly size: number;
    readonly limit: number;

    constructor(size: number, limit: number) {
        super("frame-too-large", `Frame size ${size} exceeds maximum ${limit}`);
        this.name = "FrameTooLargeError";
        this.size = size;
        this.limit = limit;
    }
}

export class PeerUnreachableError extends ChatError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("peer-unreachable", message, options);
        this.name = "PeerUnreachableError";
    }
}

export class TransportResetError extends ChatError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("transport-reset", message, options);
        this.name = "TransportResetError";
    }
}

export class SendFailureError extends ChatError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("send-failure", message, options);
        this.name = "SendFailureError";
    }
}

export class NotConnectedError extends ChatError {
    constructor(message = "Not connected") {
        super("not-connected", message);
        this.name = "NotConnectedError";
    }
}

export class ConfigError extends ChatError {
    readonly field: string;

    constructor(field: string, message: string) {
        super("invalid-config", `Invalid config ${field}: ${message}`);
        this.name = "ConfigError";
        this.field = field;
    }
}

/** Normalise anything thrown into an Error. */
export function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}

const RESET_CODES = new Set(["ECONNRESET", "EPIPE", "ECONNABORTED", "ERR_STREAM_DESTROYED"]);

/**
 * Map a socket-level error to the taxonomy. Resets and broken pipes become
 * TransportResetError; ChatErrors pass through; anything else is wrapped.
 */
export function classifySocketError(err: unknown): ChatError {
    if (err instanceof ChatError) return err;
    const error = toError(err);
    const code = (error as NodeJS.ErrnoException).code;
    if (code !== undefined && RESET_CODES.has(code)) {
        return new TransportResetError(`Connection reset (${code})`, { cause: error });
    }
    return new TransportResetError(error.message, { cause: error });
}
