import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { SequenceWindow } from "../src/sequence-window.js";

describe("SequenceWindow", () => {
    it("advances the low-water mark over consecutive sequences", () => {
        const window = new SequenceWindow();
        assert.equal(window.add(0), true);
        assert.equal(window.add(1), true);
        assert.equal(window.add(2), true);
        assert.equal(window.lowWaterMark, 3);
        assert.equal(window.outOfOrder, 0);
        assert.equal(window.add(1), false);
    });

    it("holds sequences above a gap until it closes", () => {
        const window = new SequenceWindow();
        window.add(2);
        assert.equal(window.lowWaterMark, 0);
        assert.equal(window.outOfOrder, 1);

        window.add(0);
        assert.equal(window.lowWaterMark, 1);
        window.add(1);
        assert.equal(window.lowWaterMark, 3);
        assert.equal(window.outOfOrder, 0);
        assert.equal(window.add(2), false);
    });

    it("recognises an old sequence after thousands of later ones", () => {
        const window = new SequenceWindow(16);
        for (let sequence = 0; sequence < 5_000; sequence++) window.add(sequence);
        assert.equal(window.add(3), false);
        assert.equal(window.has(4_999), true);
        assert.equal(window.has(5_000), false);
    });

    it("gives up on the oldest gap once too many sequences wait above it", () => {
        const window = new SequenceWindow(2);
        window.add(1);
        window.add(2);
        assert.equal(window.lowWaterMark, 0);

        window.add(3);
        assert.equal(window.lowWaterMark, 4);
        assert.equal(window.outOfOrder, 0);
        assert.equal(window.add(0), false);
    });

    it("starts over after reset", () => {
        const window = new SequenceWindow();
        window.add(0);
        window.add(1);
        window.reset();
        assert.equal(window.lowWaterMark, 0);
        assert.equal(window.add(0), true);
    });

    it("rejects a non-positive limit", () => {
        assert.throws(() => new SequenceWindow(0), RangeError);
    });
});
