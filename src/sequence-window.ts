/**
 * Sequence numbers already delivered from one sender.
 *
 * Everything below the low-water mark has been seen. Numbers above it are
 * kept one by one until the gap beneath them closes, so a late retransmission
 * is recognised however many later sequences arrived first.
 */
export class SequenceWindow {
    private floor = 0;
    private readonly above = new Set<number>();
    private readonly limit: number;

    /**
     * @param limit - sequence numbers held above the mark before the oldest
     *   gap is given up on
     */
    constructor(limit = 1024) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new RangeError(`SequenceWindow limit must be a positive integer, got ${limit}`);
        }
        this.limit = limit;
    }

    /** Record a sequence number. Returns false if it was already seen. */
    add(sequence: number): boolean {
        if (this.has(sequence)) return false;
        this.above.add(sequence);
        this.advance();
        if (this.above.size > this.limit) {
            // A sender that ran out of retries never fills its gap
            this.floor = Math.min(...this.above);
            this.advance();
        }
        return true;
    }

    has(sequence: number): boolean {
        return sequence < this.floor || this.above.has(sequence);
    }

    /** Lowest sequence number not yet seen. */
    get lowWaterMark(): number {
        return this.floor;
    }

    /** Sequence numbers held above the mark. */
    get outOfOrder(): number {
        return this.above.size;
    }

    /** Forget everything, for a sender that starts counting from 0 again. */
    reset(): void {
        this.floor = 0;
        this.above.clear();
    }

    private advance(): void {
        while (this.above.delete(this.floor)) {
            this.floor++;
        }
    }
}
