import type { OutboundQueueEntry } from "./types";

export class OutboundQueue {
  private entries: OutboundQueueEntry[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Appends the entry. When the queue is already at capacity the oldest
   * entry is evicted and returned; `inFlight`, whose write has already
   * started, is never chosen. With nothing else to evict the new entry is
   * the one turned away.
   */
  enqueue(entry: OutboundQueueEntry, inFlight: OutboundQueueEntry | null = null): OutboundQueueEntry | null {
    if (this.entries.length < this.capacity) {
      this.entries.push(entry);
      return null;
    }
    const index = this.entries.findIndex((candidate) => candidate !== inFlight);
    if (index === -1) {
      return entry;
    }
    const [dropped] = this.entries.splice(index, 1);
    this.entries.push(entry);
    return dropped;
  }

  peek(): OutboundQueueEntry | null {
    return this.entries[0] ?? null;
  }

  // Removes by identity: the head may already have been evicted while its
  // write was in flight.
  remove(entry: OutboundQueueEntry): boolean {
    const index = this.entries.indexOf(entry);
    if (index === -1) {
      return false;
    }
    this.entries.splice(index, 1);
    return true;
  }

  size(): number {
    return this.entries.length;
  }

  snapshot(): OutboundQueueEntry[] {
    return [...this.entries];
  }
}
