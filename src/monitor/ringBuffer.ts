/**
 * Fixed-capacity FIFO ring buffer (array + head index + count).
 * Pushing onto a full buffer overwrites the oldest entry.
 */
export class RingBuffer<T extends NonNullable<unknown>> {
    private readonly slots: Array<T | undefined>;
    private head = 0; // next write index
    private count = 0;

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
        }
        this.slots = new Array<T | undefined>(capacity).fill(undefined);
    }

    push(value: T): void {
        this.slots[this.head] = value;
        this.head = (this.head + 1) % this.capacity;
        if (this.count < this.capacity) this.count++;
    }

    get length(): number {
        return this.count;
    }

    /** Most recent value, or undefined when empty */
    last(): T | undefined {
        if (this.count === 0) return undefined;
        return this.slots[(this.head - 1 + this.capacity) % this.capacity];
    }

    /** Copy of the retained values, oldest first */
    toArray(): T[] {
        const result: T[] = [];
        const start = (this.head - this.count + this.capacity) % this.capacity;
        for (let i = 0; i < this.count; i++) {
            const value = this.slots[(start + i) % this.capacity];
            if (value !== undefined) {
                result.push(value);
            }
        }
        return result;
    }
}
