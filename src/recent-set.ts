/**
 * A set that remembers only its most recent `capacity` entries.
 * Adding past capacity evicts the oldest entry.
 */
export class RecentSet<T> {
    private readonly items = new Set<T>();
    private readonly capacity: number;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`RecentSet capacity must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
    }

    /** Add a value. Returns false if it was already present. */
    add(value: T): boolean {
        if (this.items.has(value)) return false;
        this.items.add(value);
        if (this.items.size > this.capacity) {
            const oldest = this.items.values().next();
            if (!oldest.done) this.items.delete(oldest.value);
        }
        return true;
    }

    has(value: T): boolean {
        return this.items.has(value);
    }

    get size(): number {
        return this.items.size;
    }

    clear(): void {
        this.items.clear();
    }
}
