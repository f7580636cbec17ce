import type { HistoryEntry } from "@lantern/schemas";

export const DEFAULT_HISTORY_CAPACITY = 50;

/**
 * Bounded record of `(action, result)` pairs. Backed by a ring buffer: once
 * full, each append drops the oldest entry.
 */
export class HistoryLog {
  private buf: Array<HistoryEntry | undefined>;
  private head = 0;
  private count = 0;
  private capacity: number;

  constructor(capacity = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Invalid history capacity: ${capacity}`);
    }
    this.capacity = capacity;
    this.buf = new Array<HistoryEntry | undefined>(capacity);
  }

  get length(): number {
    return this.count;
  }

  append(action: string, result: string): void {
    const tail = (this.head + this.count) % this.capacity;
    this.buf[tail] = { action, result };
    if (this.count === this.capacity) {
      this.head = (this.head + 1) % this.capacity;
    } else {
      this.count++;
    }
  }

  /** Entries oldest → newest. */
  toArray(): HistoryEntry[] {
    const out: HistoryEntry[] = [];
    for (let i = 0; i < this.count; i++) {
      const entry = this.buf[(this.head + i) % this.capacity];
      if (entry) out.push(entry);
    }
    return out;
  }

  /** The `n` most recent entries, oldest first. */
  recent(n: number): HistoryEntry[] {
    if (n <= 0) return [];
    const all = this.toArray();
    return all.slice(Math.max(0, all.length - n));
  }
}
