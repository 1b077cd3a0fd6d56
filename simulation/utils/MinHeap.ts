interface HeapEntry<T> {
  priority: number;
  value: T;
}

// Binary min-heap keyed by a numeric priority. Equal priorities pop in no particular order.
export class MinHeap<T> {
  private readonly entries: HeapEntry<T>[] = [];

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  push(priority: number, value: T): void {
    this.entries.push({ priority, value });
    this.siftUp(this.entries.length - 1);
  }

  pop(): HeapEntry<T> | undefined {
    const top = this.entries[0];
    const last = this.entries.pop();
    if (!top || !last) {
      return undefined;
    }
    if (this.entries.length > 0) {
      this.entries[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (this.priorityAt(parent) <= this.priorityAt(child)) {
        return;
      }
      this.swap(parent, child);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    const size = this.entries.length;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < size && this.priorityAt(left) < this.priorityAt(smallest)) {
        smallest = left;
      }
      if (right < size && this.priorityAt(right) < this.priorityAt(smallest)) {
        smallest = right;
      }
      if (smallest === parent) {
        return;
      }
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private priorityAt(index: number): number {
    return this.entries[index]?.priority ?? Number.POSITIVE_INFINITY;
  }

  private swap(a: number, b: number): void {
    const first = this.entries[a];
    const second = this.entries[b];
    if (!first || !second) {
      return;
    }
    this.entries[a] = second;
    this.entries[b] = first;
  }
}
