import type { FireKind } from "./types.js";

export type FireEntry = {
  reminderId: string;
  kind: FireKind;
  atMs: number;
};

function keyOf(reminderId: string, kind: FireKind): string {
  return `${kind}:${reminderId}`;
}

function compare(a: FireEntry, b: FireEntry): number {
  if (a.atMs !== b.atMs) return a.atMs - b.atMs;
  if (a.reminderId !== b.reminderId) return a.reminderId < b.reminderId ? -1 : 1;
  if (a.kind === b.kind) return 0;
  return a.kind === "occurrence" ? -1 : 1;
}

/**
 * Binary min-heap of pending fire events ordered by instant, then reminder id.
 * Each (reminder, kind) pair is present at most once; an index of heap
 * positions allows updates and removals in O(log n).
 */
export class FireQueue {
  private readonly heap: FireEntry[] = [];
  private readonly index = new Map<string, number>();

  get size(): number {
    return this.heap.length;
  }

  peek(): FireEntry | undefined {
    const top = this.heap[0];
    return top ? { ...top } : undefined;
  }

  get(reminderId: string, kind: FireKind): FireEntry | undefined {
    const i = this.index.get(keyOf(reminderId, kind));
    return i === undefined ? undefined : { ...this.heap[i] };
  }

  upsert(entry: FireEntry): void {
    const key = keyOf(entry.reminderId, entry.kind);
    const existing = this.index.get(key);
    if (existing !== undefined) {
      this.heap[existing] = { ...entry };
      this.siftUp(existing);
      this.siftDown(this.index.get(key) ?? existing);
      return;
    }
    this.heap.push({ ...entry });
    this.index.set(key, this.heap.length - 1);
    this.siftUp(this.heap.length - 1);
  }

  /** Removes one kind of entry for a reminder, or both when kind is omitted. */
  remove(reminderId: string, kind?: FireKind): boolean {
    if (!kind) {
      const a = this.remove(reminderId, "occurrence");
      const b = this.remove(reminderId, "alarm");
      return a || b;
    }
    const i = this.index.get(keyOf(reminderId, kind));
    if (i === undefined) return false;
    this.removeAt(i);
    return true;
  }

  /** Pops every entry due at or before `nowMs`, in order. */
  popDue(nowMs: number): FireEntry[] {
    const out: FireEntry[] = [];
    while (this.heap.length && this.heap[0].atMs <= nowMs) {
      out.push(this.removeAt(0));
    }
    return out;
  }

  entries(): FireEntry[] {
    return [...this.heap].sort(compare).map((e) => ({ ...e }));
  }

  clear(): void {
    this.heap.length = 0;
    this.index.clear();
  }

  private removeAt(i: number): FireEntry {
    const removed = this.heap[i];
    const last = this.heap.pop();
    this.index.delete(keyOf(removed.reminderId, removed.kind));
    if (last && i < this.heap.length) {
      this.heap[i] = last;
      this.index.set(keyOf(last.reminderId, last.kind), i);
      this.siftUp(i);
      this.siftDown(this.index.get(keyOf(last.reminderId, last.kind)) ?? i);
    }
    return removed;
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    this.heap[i] = b;
    this.heap[j] = a;
    this.index.set(keyOf(b.reminderId, b.kind), i);
    this.index.set(keyOf(a.reminderId, a.kind), j);
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (compare(this.heap[i], this.heap[parent]) >= 0) return;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(i: number): void {
    const n = this.heap.length;
    for (;;) {
      const l = 2 * i + 1;
      const r = l + 1;
      let min = i;
      if (l < n && compare(this.heap[l], this.heap[min]) < 0) min = l;
      if (r < n && compare(this.heap[r], this.heap[min]) < 0) min = r;
      if (min === i) return;
      this.swap(i, min);
      i = min;
    }
  }
}
