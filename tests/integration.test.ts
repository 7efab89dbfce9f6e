import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import { loadConfig, retryOptions } from "../src/config.js";
import { createLogger, type LogSink } from "../src/logger.js";
import { StreamChatServer } from "../src/server/stream.js";
import { DatagramChatServer } from "../src/server/datagram.js";
import { StreamChatClient } from "../src/client/stream.js";
import { DatagramChatClient } from "../src/client/datagram.js";
import { MemoryDatagramNetwork, seededRandom } from "../src/transport/memory.js";
import { Recorder, waitFor } from "./helpers.js";

function captureSink(lines: string[]): LogSink {
    const push = (line: string) => {
        lines.push(line);
    };
    return { debug: push, info: push, warn: push, error: push };
}

const stops: (() => Promise<void>)[] = [];

afterEach(async () => {
    for (const stop of stops.splice(0).reverse()) await stop();
});

describe("Integration", () => {
    it("runs a stream chat room configured from the environment", async () => {
        const config = loadConfig({ CHAT_SERVER_HOST: "127.0.0.1", CHAT_SERVER_TCP_PORT: "0" });
        const lines: string[] = [];
        const serverEvents = new Recorder();
        const server = new StreamChatServer({
            host: config.host,
            port: config.tcpPort,
            callbacks: serverEvents,
            logger: createLogger("tcp", config.logLevel, captureSink(lines)),
        });
        await server.start();
        stops.push(() => server.stop());
        const address = server.address;
        assert.ok(address);
        assert.equal(lines[0], `[tcp] TCP server running on 127.0.0.1:${address.port} with 0 peers`);

        const room = new Map<string, { client: StreamChatClient; events: Recorder }>();
        for (const name of ["alice", "bob", "carol"]) {
            const events = new Recorder();
            const client = new StreamChatClient({
                host: config.host,
                port: address.port,
                username: name,
                connectTimeoutMs: config.connectTimeoutMs,
                callbacks: events,
            });
            await client.connect();
            stops.push(() => client.disconnect());
            room.set(name, { client, events });
        }
        await waitFor(() => serverEvents.connected.length === 3);

        const alice = room.get("alice");
        const bob = room.get("bob");
        const carol = room.get("carol");
        assert.ok(alice && bob && carol);

        await alice.client.send("morning all");
        await bob.client.send("hi alice");
        await waitFor(() => carol.events.messages.length === 2
            && alice.events.messages.length === 1 && bob.events.messages.length === 1);

        assert.deepEqual(
            carol.events.messages.map((m) => [m.sender, m.text]).sort(),
            [["alice", "morning all"], ["bob", "hi alice"]],
        );
        assert.deepEqual(alice.events.messages.map((m) => [m.sender, m.text]), [["bob", "hi alice"]]);
        assert.deepEqual(bob.events.messages.map((m) => [m.sender, m.text]), [["alice", "morning all"]]);

        assert.equal(await server.broadcast("closing soon"), 3);
        await waitFor(() => carol.events.messages.length === 3);
        assert.equal(carol.events.messages.at(-1)?.text, "closing soon");
        assert.equal(carol.events.messages.at(-1)?.sender, "server");

        // Test echo end to end: the server answers with the same timestamp
        const latency = await carol.client.probe(2_000);
        assert.ok(latency >= 0 && latency < 2_000);

        await bob.client.disconnect();
        await waitFor(() => server.peers.length === 2);
        assert.deepEqual(server.peers.map((p) => p.name).sort(), ["alice", "carol"]);
        assert.equal(serverEvents.disconnected[0]?.name, "bob");
    });

    it("runs a datagram chat room over a lossy link", async () => {
        const config = loadConfig({
            CHAT_RETRY_INTERVAL_MS: "10",
            CHAT_RETRY_TIMEOUT_MS: "25",
            CHAT_MAX_RETRIES: "unbounded",
        });
        const retry = retryOptions(config);
        assert.deepEqual(retry, { retryIntervalMs: 10, retryTimeoutMs: 25, maxRetries: Infinity });

        const network = new MemoryDatagramNetwork({ random: seededRandom(3) });
        const serverEvents = new Recorder();
        const server = new DatagramChatServer({
            host: config.host,
            port: config.udpPort,
            endpoint: network.createEndpoint(),
            callbacks: serverEvents,
            retry,
            peerTimeoutMs: config.peerTimeoutMs,
            reapIntervalMs: config.reapIntervalMs,
        });
        await server.start();
        stops.push(() => server.stop());

        const join = async (username: string) => {
            const events = new Recorder();
            const client = new DatagramChatClient({
                host: config.host,
                port: config.udpPort,
                username,
                endpoint: network.createEndpoint(),
                connectTimeoutMs: 1_000,
                callbacks: events,
                retry,
            });
            await client.connect();
            stops.push(() => client.disconnect());
            return { client, events };
        };
        const alice = await join("alice");
        const bob = await join("bob");
        assert.deepEqual(server.peers.map((p) => p.name).sort(), ["alice", "bob"]);

        network.dropRate = 0.25;
        for (let i = 0; i < 10; i++) {
            await alice.client.send(`a${i}`);
            await bob.client.send(`b${i}`);
        }
        await waitFor(
            () => alice.events.messages.length === 10 && bob.events.messages.length === 10
                && alice.client.pendingCount === 0 && bob.client.pendingCount === 0,
            10_000,
            "relayed chats and their acks",
        );
        network.dropRate = 0;

        assert.equal(serverEvents.messages.length, 20);
        assert.deepEqual(
            bob.events.messages.map((m) => m.text).sort(),
            Array.from({ length: 10 }, (_, i) => `a${i}`).sort(),
        );
        assert.ok(alice.events.messages.every((m) => m.sender === "bob"));

        const latency = await alice.client.probe(1_000);
        assert.ok(latency >= 0 && latency < 1_000);
    });
});
