/**
 * Configuration
 *
 * Defaults are TCP 5050 and UDP 5051 on localhost. Every setting
 * can be overridden through an environment variable. Values are converted
 * and validated against a TypeBox schema; an invalid value fails loudly
 * instead of falling back to the default.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";
import type { RetryOptions } from "./reliable.js";

const Port = Type.Integer({ minimum: 0, maximum: 65535 });
const Millis = Type.Integer({ minimum: 1 });

export const ChatConfigSchema = Type.Object({
    host: Type.String({ minLength: 1 }),
    tcpPort: Port,
    udpPort: Port,
    connectTimeoutMs: Millis,
    retryIntervalMs: Millis,
    retryTimeoutMs: Millis,
    /** `null` retries forever. */
    maxRetries: Type.Union([Type.Integer({ minimum: 1 }), Type.Null()]),
    peerTimeoutMs: Millis,
    reapIntervalMs: Millis,
    logLevel: Type.Union(LOG_LEVELS.map((level) => Type.Literal(level))),
});

export type ChatConfig = Static<typeof ChatConfigSchema>;

export const DEFAULT_CONFIG: ChatConfig = {
    host: "localhost",
    tcpPort: 5050,
    udpPort: 5051,
    connectTimeoutMs: 10_000,
    retryIntervalMs: 500,
    retryTimeoutMs: 2_000,
    maxRetries: 20,
    peerTimeoutMs: 30_000,
    reapIntervalMs: 5_000,
    logLevel: "info",
};

/** Environment variable for each setting. */
export const CONFIG_ENV: Record<keyof ChatConfig, string> = {
    host: "CHAT_SERVER_HOST",
    tcpPort: "CHAT_SERVER_TCP_PORT",
    udpPort: "CHAT_SERVER_UDP_PORT",
    connectTimeoutMs: "CHAT_CONNECT_TIMEOUT_MS",
    retryIntervalMs: "CHAT_RETRY_INTERVAL_MS",
    retryTimeoutMs: "CHAT_RETRY_TIMEOUT_MS",
    maxRetries: "CHAT_MAX_RETRIES",
    peerTimeoutMs: "CHAT_PEER_TIMEOUT_MS",
    reapIntervalMs: "CHAT_REAP_INTERVAL_MS",
    logLevel: "CHAT_LOG_LEVEL",
};

/**
 * Build the configuration from defaults and environment overrides.
 *
 * `CHAT_MAX_RETRIES=unbounded` disables the retry ceiling.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ChatConfig {
    const raw: Record<string, unknown> = { ...DEFAULT_CONFIG };

    for (const [key, name] of Object.entries(CONFIG_ENV)) {
        const value = env[name];
        if (value === undefined || value.trim() === "") continue;
        raw[key] = key === "maxRetries" && value.trim().toLowerCase() === "unbounded"
            ? null
            : value.trim();
    }

    const converted = Value.Convert(ChatConfigSchema, raw);
    if (!Value.Check(ChatConfigSchema, converted)) {
        const first = Value.Errors(ChatConfigSchema, converted).First();
        const key = first ? first.path.replace(/^\//, "") : "";
        const field = isConfigKey(key) ? CONFIG_ENV[key] : key || "config";
        throw new ConfigError(field, first ? first.message : "schema mismatch");
    }
    return converted;
}

/** The retry ceiling as a number, with `null` mapped to Infinity. */
export function retryCeiling(config: Pick<ChatConfig, "maxRetries">): number {
    return config.maxRetries ?? Infinity;
}

/** Reliable-layer timings from the configuration. */
export function retryOptions(config: ChatConfig): RetryOptions {
    return {
        retryIntervalMs: config.retryIntervalMs,
        retryTimeoutMs: config.retryTimeoutMs,
        maxRetries: retryCeiling(config),
    };
}

function isConfigKey(key: string): key is keyof ChatConfig {
    return Object.prototype.hasOwnProperty.call(CONFIG_ENV, key);
}
