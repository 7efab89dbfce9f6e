import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import { DatagramChatServer, type DatagramChatServerOptions } from "../../src/server/datagram.js";
import { MemoryDatagramNetwork, type MemoryDatagramEndpoint } from "../../src/transport/memory.js";
import { type PeerAddress, addressKey } from "../../src/transport/types.js";
import {
    type Message,
    createConnectMessage,
    createMessage,
    decodeEnvelope,
    decodeMessage,
    encodeAck,
    encodeEnvelope,
    encodeMessage,
} from "../../src/message.js";
import { createLogger } from "../../src/logger.js";
import { Recorder, waitFor } from "../helpers.js";

const SERVER: PeerAddress = { address: "127.0.0.1", port: 5051 };

interface RawPeer {
    endpoint: MemoryDatagramEndpoint;
    received: Message[];
    identifier: string;
    send: (msg: Message) => Promise<void>;
}

async function rawPeer(network: MemoryDatagramNetwork): Promise<RawPeer> {
    const endpoint = network.createEndpoint();
    const local = await endpoint.bind();
    const received: Message[] = [];
    endpoint.onMessage((data) => {
        const result = decodeMessage(data);
        if (result.ok) received.push(result.message);
    });
    return {
        endpoint,
        received,
        identifier: addressKey(local),
        send: (msg) => endpoint.send(encodeMessage(msg), SERVER),
    };
}

function sequencedChat(sequence: number, data: string, sender: string): Message {
    return createMessage("chat", encodeEnvelope({ sequence, data, testId: null }), sender);
}

describe("DatagramChatServer", () => {
    let network: MemoryDatagramNetwork;
    let server: DatagramChatServer;
    let recorder: Recorder;
    const clock = { now: 0 };

    async function start(options: Partial<DatagramChatServerOptions> = {}): Promise<void> {
        network = new MemoryDatagramNetwork();
        recorder = new Recorder();
        clock.now = Date.now();
        server = new DatagramChatServer({
            host: "127.0.0.1",
            port: SERVER.port,
            endpoint: network.createEndpoint(),
            callbacks: recorder,
            now: () => clock.now,
            ...options,
        });
        await server.start();
    }

    afterEach(async () => {
        await server.stop();
    });

    it("binds and describes itself", async () => {
        await start();
        assert.equal(server.status, "running");
        assert.deepEqual(server.address, SERVER);
        assert.equal(server.describe(), "UDP server running on 127.0.0.1:5051 with 0 peers");
    });

    it("cannot be restarted", async () => {
        await start();
        await server.stop();
        await assert.rejects(server.start(), /cannot be restarted/);
    });

    it("delivers a sequenced chat and acknowledges it", async () => {
        await start();
        const alice = await rawPeer(network);
        await alice.send(sequencedChat(0, "hello", "alice"));

        await waitFor(() => alice.received.some((m) => m.kind === "ack"));
        assert.equal(recorder.messages.length, 1);
        assert.equal(recorder.messages[0]?.peer.name, "alice");
        assert.equal(recorder.messages[0]?.text, "hello");

        const ack = alice.received.find((m) => m.kind === "ack");
        assert.equal(ack?.content, '{"sequence":0,"test_id":null}');
        assert.equal(ack?.sender, "server");
    });

    it("echoes a test message", async () => {
        await start();
        const alice = await rawPeer(network);
        await alice.send(createMessage("test", "probe-7", "alice", 1000.0));

        await waitFor(() => alice.received.length > 0);
        assert.deepEqual(alice.received[0], {
            kind: "test",
            content: "probe-7",
            sender: "server",
            timestamp: 1000.0,
            version: "1.0",
        });
    });

    it("answers connect with a welcome", async () => {
        await start();
        const alice = await rawPeer(network);
        await alice.send(createConnectMessage("alice"));

        await waitFor(() => alice.received.length > 0);
        assert.equal(alice.received[0]?.kind, "status");
        assert.equal(alice.received[0]?.content, "Welcome! Your username: alice");
        assert.deepEqual(server.peers.map((p) => [p.identifier, p.name, p.protocol]), [
            [alice.identifier, "alice", "udp"],
        ]);
    });

    it("creates no session for a malformed first datagram", async () => {
        await start();
        const alice = await rawPeer(network);
        await alice.endpoint.send(Buffer.from("garbage"), SERVER);
        await alice.endpoint.send(Buffer.from('{"type":"bogus","content":"","timestamp":1}'), SERVER);
        await waitFor(() => network.stats.delivered === 2);
        assert.equal(server.peers.length, 0);
    });

    it("creates no session for a stray ack or disconnect", async () => {
        await start();
        const alice = await rawPeer(network);
        await alice.send(createMessage("ack", encodeAck({ sequence: 3, testId: null }), "alice"));
        await alice.send(createMessage("disconnect", "", "alice"));
        await waitFor(() => network.stats.delivered === 2);
        assert.equal(server.peers.length, 0);
    });

    it("relays chats through each peer's reliable channel", async () => {
        await start();
        const alice = await rawPeer(network);
        const bob = await rawPeer(network);
        await alice.send(createConnectMessage("alice"));
        await bob.send(createConnectMessage("bob"));
        await waitFor(() => server.peers.length === 2 && bob.received.length > 0);

        await alice.send(sequencedChat(0, "hi bob", "alice"));
        await waitFor(() => bob.received.some((m) => m.kind === "chat"));

        const relayed = bob.received.find((m) => m.kind === "chat");
        assert.ok(relayed);
        assert.equal(relayed.sender, "alice");
        const envelope = decodeEnvelope(relayed.content);
        assert.deepEqual(envelope, { sequence: 0, data: "hi bob", testId: null });
        assert.equal(alice.received.some((m) => m.kind === "chat"), false);
    });

    it("removes a peer that says goodbye", async () => {
        await start();
        const alice = await rawPeer(network);
        await alice.send(createConnectMessage("alice"));
        await waitFor(() => server.peers.length === 1);

        await alice.send(createMessage("disconnect", "", "alice"));
        await waitFor(() => server.peers.length === 0);
        assert.equal(recorder.disconnected.length, 1);
    });

    it("reaps peers that go quiet", async () => {
        await start({ peerTimeoutMs: 30_000 });
        const alice = await rawPeer(network);
        const bob = await rawPeer(network);
        await alice.send(createConnectMessage("alice"));
        await waitFor(() => server.peers.length === 1);

        clock.now += 20_000;
        await bob.send(createConnectMessage("bob"));
        await waitFor(() => server.peers.length === 2);

        clock.now += 15_000;
        assert.equal(server.reap(), 1);
        assert.deepEqual(server.peers.map((p) => p.name), ["bob"]);
        await waitFor(() => alice.received.some((m) => m.kind === "disconnect"), 2_000, "goodbye to alice");
        assert.equal(bob.received.some((m) => m.kind === "disconnect"), false);
        assert.equal(recorder.disconnected[0]?.name, "alice");
        assert.deepEqual(recorder.statuses.at(-1), {
            text: `Connection lost: alice (${alice.identifier}): No traffic from ${alice.identifier} for 30000ms`,
            isError: true,
        });
    });

    it("drops a peer that never acknowledges", async () => {
        await start({ retry: { retryIntervalMs: 10, retryTimeoutMs: 20, maxRetries: 2 } });
        const alice = await rawPeer(network);
        await alice.send(createConnectMessage("alice"));
        await waitFor(() => server.peers.length === 1);

        const chats = () => alice.received.filter((m) => m.kind === "chat").length;

        // The send itself succeeds; the clock drives the retries
        await server.sendTo(alice.identifier, "are you there?");
        for (let sent = 1; sent < 3; sent++) {
            clock.now += 20;
            await waitFor(() => chats() === sent + 1);
        }
        clock.now += 20;
        await waitFor(() => server.peers.length === 0);

        assert.equal(chats(), 3);
        assert.equal(recorder.disconnected.length, 1);
    });

    it("logs socket errors and keeps serving", async () => {
        const lines: string[] = [];
        const push = (line: string) => {
            lines.push(line);
        };
        network = new MemoryDatagramNetwork();
        const endpoint = network.createEndpoint();
        recorder = new Recorder();
        server = new DatagramChatServer({
            host: "127.0.0.1",
            port: SERVER.port,
            endpoint,
            callbacks: recorder,
            logger: createLogger("udp", "warn", { debug: push, info: push, warn: push, error: push }),
        });
        await server.start();

        endpoint._injectError(new Error("ICMP port unreachable"));
        assert.deepEqual(lines, ["[udp] Socket error: ICMP port unreachable"]);
        assert.equal(server.status, "running");

        const alice = await rawPeer(network);
        await alice.send(createConnectMessage("alice"));
        await waitFor(() => server.peers.length === 1);
    });

    it("says goodbye to every peer on stop", async () => {
        await start();
        const alice = await rawPeer(network);
        await alice.send(createConnectMessage("alice"));
        await waitFor(() => server.peers.length === 1);

        await server.stop();
        await waitFor(() => alice.received.some((m) => m.kind === "disconnect"));
        assert.equal(server.status, "stopped");
        assert.equal(server.address, null);
    });
});
