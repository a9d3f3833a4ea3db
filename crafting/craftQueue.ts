/**
 * Min-priority queue used to schedule demand resolution by depth.
 *
 * - `push` only ever raises a key's priority; pushing at an equal or lower
 *   priority than the queued one is a no-op.
 * - Equal priorities pop in insertion order. A raised key counts as inserted
 *   at the moment it was raised.
 * - `compact` re-ranks priorities densely so callers can keep incrementing
 *   under a bounded range.
 */

export interface QueueEntry<K> {
  key: K;
  priority: number;
}

interface HeapEntry<K> extends QueueEntry<K> {
  seq: number;
}

function before<K>(a: HeapEntry<K>, b: HeapEntry<K>): boolean {
  return a.priority < b.priority || (a.priority === b.priority && a.seq < b.seq);
}

export class CraftQueue<K> {
  private heap: HeapEntry<K>[] = [];
  // Live entry per key; heap slots whose entry is not live are stale
  private live = new Map<K, HeapEntry<K>>();
  private nextSeq = 0;

  get size(): number {
    return this.live.size;
  }

  priorityOf(key: K): number | undefined {
    return this.live.get(key)?.priority;
  }

  /**
   * Queues `key` at `priority`, or raises it if already queued lower.
   *
   * @returns true when the queue changed
   */
  push(key: K, priority: number): boolean {
    const current = this.live.get(key);
    if (current && current.priority >= priority) return false;
    const entry: HeapEntry<K> = { key, priority, seq: this.nextSeq++ };
    this.live.set(key, entry);
    this.siftUp(this.heap.push(entry) - 1);
    return true;
  }

  popMin(): QueueEntry<K> | undefined {
    while (this.heap.length > 0) {
      const top = this.removeTop();
      if (this.live.get(top.key) !== top) continue;
      this.live.delete(top.key);
      return { key: top.key, priority: top.priority };
    }
    return undefined;
  }

  /**
   * Replaces every queued priority, together with `anchor`, by its dense rank
   * in ascending order.
   *
   * @param anchor - A priority outside the queue whose new rank the caller needs
   *   (typically the priority of the entry just popped)
   * @returns The rank assigned to `anchor`
   */
  compact(anchor: number): number {
    const distinct = new Set<number>([anchor]);
    for (const entry of this.live.values()) distinct.add(entry.priority);
    const ranks = new Map<number, number>();
    Array.from(distinct)
      .sort((a, b) => a - b)
      .forEach((priority, rank) => ranks.set(priority, rank));

    const entries = Array.from(this.live.values()).sort((a, b) => a.seq - b.seq);
    this.heap = [];
    this.live.clear();
    for (const entry of entries) {
      const compacted: HeapEntry<K> = { ...entry, priority: ranks.get(entry.priority) ?? 0 };
      this.live.set(compacted.key, compacted);
      this.siftUp(this.heap.push(compacted) - 1);
    }
    return ranks.get(anchor) ?? 0;
  }

  private removeTop(): HeapEntry<K> {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!before(this.heap[i], this.heap[parent])) break;
      [this.heap[i], this.heap[parent]] = [this.heap[parent], this.heap[i]];
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < this.heap.length && before(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < this.heap.length && before(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === i) return;
      [this.heap[i], this.heap[smallest]] = [this.heap[smallest], this.heap[i]];
      i = smallest;
    }
  }
}
