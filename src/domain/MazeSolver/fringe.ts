export type FringeCompare<TEntry> = (left: TEntry, right: TEntry) => number;

/** Binary min-heap. */
export class Fringe<TEntry> {
  private readonly entries: TEntry[] = [];

  constructor(private readonly compare: FringeCompare<TEntry>) {}

  get size(): number {
    return this.entries.length;
  }

  push(entry: TEntry): void {
    this.entries.push(entry);
    this.siftUp(this.entries.length - 1);
  }

  pop(): TEntry | undefined {
    const best = this.entries[0];
    const tail = this.entries.pop();

    if (best === undefined || tail === undefined || this.entries.length === 0) {
      return best;
    }

    this.entries[0] = tail;
    this.siftDown(0);
    return best;
  }

  /** Keeps only entries matching `predicate`, then restores heap order. */
  retain(predicate: (entry: TEntry) => boolean): void {
    const kept = this.entries.filter(predicate);

    if (kept.length === this.entries.length) {
      return;
    }

    this.entries.length = 0;
    this.entries.push(...kept);

    for (let index = (this.entries.length >> 1) - 1; index >= 0; index -= 1) {
      this.siftDown(index);
    }
  }

  clear(): void {
    this.entries.length = 0;
  }

  private siftUp(startIndex: number): void {
    let index = startIndex;
    const entry = this.entries[index];
    if (entry === undefined) {
      return;
    }

    while (index > 0) {
      const parentIndex = (index - 1) >> 1;
      const parent = this.entries[parentIndex];
      if (parent === undefined || this.compare(parent, entry) <= 0) {
        break;
      }

      this.entries[index] = parent;
      index = parentIndex;
    }

    this.entries[index] = entry;
  }

  private siftDown(startIndex: number): void {
    let index = startIndex;
    const entry = this.entries[index];
    if (entry === undefined) {
      return;
    }

    for (;;) {
      const leftIndex = index * 2 + 1;
      const rightIndex = leftIndex + 1;
      const left = this.entries[leftIndex];
      if (left === undefined) {
        break;
      }

      let childIndex = leftIndex;
      let child = left;
      const right = this.entries[rightIndex];

      if (right !== undefined && this.compare(right, left) < 0) {
        childIndex = rightIndex;
        child = right;
      }

      if (this.compare(entry, child) <= 0) {
        break;
      }

      this.entries[index] = child;
      index = childIndex;
    }

    this.entries[index] = entry;
  }
}
