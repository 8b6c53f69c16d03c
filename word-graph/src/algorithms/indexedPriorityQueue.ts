/** Reads the current priority of an index from storage owned by the caller. */
export type PriorityLookup = (index: number) => number;

const ABSENT = -1;

/**
 * Binary min-heap over the fixed universe of indices `0..capacity-1`.
 *
 * The heap stores indices only. Priorities are read through `priorityOf`
 * every time two entries are compared, so the caller keeps ownership of the
 * key table (a distance array during Dijkstra) and only has to call
 * {@link decreaseKey} after lowering a key. A position map from index to heap
 * slot keeps that call logarithmic.
 */
export class IndexedPriorityQueue {
  private readonly heap: number[] = [];
  private readonly positions: Int32Array;

  constructor(
    readonly capacity: number,
    private readonly priorityOf: PriorityLookup,
  ) {
    if (!Number.isSafeInteger(capacity) || capacity < 0) {
      throw new RangeError(`priority queue capacity must be a non-negative integer (received ${capacity})`);
    }
    this.positions = new Int32Array(capacity).fill(ABSENT);
  }

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  contains(index: number): boolean {
    this.assertIndex(index);
    return this.positions[index] !== ABSENT;
  }

  insert(index: number): void {
    if (this.contains(index)) {
      throw new Error(`index ${index} is already queued`);
    }
    const slot = this.heap.length;
    this.heap.push(index);
    this.positions[index] = slot;
    this.siftUp(slot);
  }

  /** Restores heap order after the caller lowered the priority of `index`. */
  decreaseKey(index: number): void {
    if (!this.contains(index)) {
      throw new Error(`index ${index} is not queued`);
    }
    this.siftUp(this.positions[index]);
  }

  /** Removes and returns the index with the smallest priority. Ties are broken arbitrarily. */
  extractMin(): number | undefined {
    const last = this.heap.pop();
    if (last === undefined) {
      return undefined;
    }
    if (this.heap.length === 0) {
      this.positions[last] = ABSENT;
      return last;
    }
    const min = this.heap[0];
    this.positions[min] = ABSENT;
    this.heap[0] = last;
    this.positions[last] = 0;
    this.siftDown(0);
    return min;
  }

  private siftUp(start: number): void {
    let slot = start;
    while (slot > 0) {
      const parent = (slot - 1) >> 1;
      if (!this.less(slot, parent)) {
        break;
      }
      this.swap(slot, parent);
      slot = parent;
    }
  }

  private siftDown(start: number): void {
    const length = this.heap.length;
    let slot = start;
    while (true) {
      let smallest = slot;
      const left = 2 * slot + 1;
      const right = left + 1;
      if (left < length && this.less(left, smallest)) {
        smallest = left;
      }
      if (right < length && this.less(right, smallest)) {
        smallest = right;
      }
      if (smallest === slot) {
        break;
      }
      this.swap(slot, smallest);
      slot = smallest;
    }
  }

  // Infinity < Infinity is false, so unreached entries never climb above each other.
  private less(a: number, b: number): boolean {
    return this.priorityOf(this.heap[a]) < this.priorityOf(this.heap[b]);
  }

  private swap(a: number, b: number): void {
    const first = this.heap[a];
    const second = this.heap[b];
    this.heap[a] = second;
    this.heap[b] = first;
    this.positions[second] = a;
    this.positions[first] = b;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.capacity) {
      throw new RangeError(`index ${index} is outside the queue universe [0, ${this.capacity})`);
    }
  }
}
