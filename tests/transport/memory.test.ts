import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { MemoryDatagramNetwork, seededRandom } from "../../src/transport/memory.js";
import type { PeerAddress } from "../../src/transport/types.js";
import { waitFor } from "../helpers.js";

describe("MemoryDatagramNetwork", () => {
    it("delivers datagrams with the sender's address", async () => {
        const network = new MemoryDatagramNetwork();
        const a = network.createEndpoint();
        const b = network.createEndpoint();
        const aAddr = await a.bind(6000);
        const bAddr = await b.bind(6001);

        const received: { text: string; from: PeerAddress }[] = [];
        b.onMessage((data, from) => received.push({ text: data.toString("utf-8"), from }));

        await a.send(Buffer.from("hello"), bAddr);
        await waitFor(() => received.length === 1);

        assert.deepEqual(received, [{ text: "hello", from: aAddr }]);
        assert.deepEqual(aAddr, { address: "127.0.0.1", port: 6000 });
        assert.deepEqual(network.stats, { sent: 1, dropped: 0, delivered: 1 });
    });

    it("delivers on a later turn, not inside send()", async () => {
        const network = new MemoryDatagramNetwork();
        const a = network.createEndpoint();
        const b = network.createEndpoint();
        const bAddr = await b.bind();
        let delivered = false;
        b.onMessage(() => {
            delivered = true;
        });
        await a.send(Buffer.from("x"), bAddr);
        assert.equal(delivered, false);
        await waitFor(() => delivered);
    });

    it("binds an unbound sender to an ephemeral port", async () => {
        const network = new MemoryDatagramNetwork();
        const a = network.createEndpoint();
        const b = network.createEndpoint();
        const bAddr = await b.bind(7000);
        assert.equal(a.local, null);
        await a.send(Buffer.from("x"), bAddr);
        assert.equal(a.local?.port, 40000);
    });

    it("refuses a taken address", async () => {
        const network = new MemoryDatagramNetwork();
        await network.createEndpoint().bind(6000);
        await assert.rejects(network.createEndpoint().bind(6000), /Address in use: 127.0.0.1:6000/);
    });

    it("counts datagrams to nobody as dropped", async () => {
        const network = new MemoryDatagramNetwork();
        const a = network.createEndpoint();
        await a.send(Buffer.from("x"), { address: "127.0.0.1", port: 9999 });
        await waitFor(() => network.stats.dropped === 1);
        assert.equal(network.stats.delivered, 0);
    });

    it("drops everything at a drop rate of 1", async () => {
        const network = new MemoryDatagramNetwork({ dropRate: 1 });
        const a = network.createEndpoint();
        const b = network.createEndpoint();
        const bAddr = await b.bind();
        await a.send(Buffer.from("x"), bAddr);
        await a.send(Buffer.from("y"), bAddr);
        assert.deepEqual(network.stats, { sent: 2, dropped: 2, delivered: 0 });
    });

    it("stops delivering to a closed endpoint and frees its address", async () => {
        const network = new MemoryDatagramNetwork();
        const b = network.createEndpoint();
        await b.bind(6000);
        await b.close();
        await b.close();
        assert.equal(b.local, null);
        await network.createEndpoint().bind(6000);
    });

    it("resolves localhost to the loopback address", async () => {
        const network = new MemoryDatagramNetwork();
        const a = network.createEndpoint();
        assert.equal(await a.resolve("localhost"), "127.0.0.1");
        assert.equal(await a.resolve("10.1.1.1"), "10.1.1.1");
    });
});

describe("seededRandom", () => {
    it("repeats its sequence for the same seed", () => {
        const a = seededRandom(42);
        const b = seededRandom(42);
        const first = [a(), a(), a()];
        assert.deepEqual([b(), b(), b()], first);
        for (const value of first) {
            assert.ok(value >= 0 && value < 1);
        }
    });
});
