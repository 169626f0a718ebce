/**
 * Fixed-capacity circular buffer. Pushing into a full buffer evicts the oldest entry.
 */
export class RingBuffer<T> {
    private readonly slots: (T | undefined)[];
    private head = 0;
    private count = 0;

    constructor(public readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new RangeError(`RingBuffer capacity must be a positive integer (got ${capacity})`);
        }
        this.slots = new Array<T | undefined>(capacity);
    }

    get size(): number {
        return this.count;
    }

    push(item: T): void {
        this.slots[(this.head + this.count) % this.capacity] = item;
        if (this.count < this.capacity) {
            this.count++;
        } else {
            this.head = (this.head + 1) % this.capacity;
        }
    }

    last(): T | undefined {
        if (this.count === 0) return undefined;
        return this.slots[(this.head + this.count - 1) % this.capacity];
    }

    /** Oldest first. */
    toArray(): T[] {
        const out: T[] = [];
        for (let i = 0; i < this.count; i++) {
            const item = this.slots[(this.head + i) % this.capacity];
            if (item !== undefined) out.push(item);
        }
        return out;
    }

    clear(): void {
        this.slots.fill(undefined);
        this.head = 0;
        this.count = 0;
    }
}
