/**
 * Fixed-capacity FIFO that evicts its oldest entry when full.
 *
 * Backed by a ring buffer so push and shift are O(1).
 */
export class BoundedQueue<T> {
	private readonly slots: Array<T | undefined>;
	private head = 0;
	private _size = 0;
	private _dropped = 0;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`BoundedQueue capacity must be a positive integer, got: ${capacity}`);
		}
		this.slots = new Array<T | undefined>(capacity);
	}

	get size(): number {
		return this._size;
	}

	/** Entries evicted because the queue was full */
	get dropped(): number {
		return this._dropped;
	}

	isEmpty(): boolean {
		return this._size === 0;
	}

	/** Enqueue; returns the evicted entry when the queue was full. */
	push(item: T): T | undefined {
		let evicted: T | undefined;
		if (this._size === this.capacity) {
			evicted = this.slots[this.head];
			this.slots[this.head] = undefined;
			this.head = (this.head + 1) % this.capacity;
			this._size--;
			this._dropped++;
		}
		this.slots[(this.head + this._size) % this.capacity] = item;
		this._size++;
		return evicted;
	}

	shift(): T | undefined {
		if (this._size === 0) return undefined;
		const item = this.slots[this.head];
		this.slots[this.head] = undefined;
		this.head = (this.head + 1) % this.capacity;
		this._size--;
		return item;
	}

	/** Current entries, oldest first, without removing them. */
	toArray(): T[] {
		const out: T[] = [];
		for (let i = 0; i < this._size; i++) {
			const item = this.slots[(this.head + i) % this.capacity];
			if (item !== undefined) out.push(item);
		}
		return out;
	}

	clear(): void {
		this.slots.fill(undefined);
		this.head = 0;
		this._size = 0;
	}
}
