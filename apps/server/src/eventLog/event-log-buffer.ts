import type { EventLogEntry } from "@arena/shared";

export interface EventLogRange<T extends EventLogEntry> {
  fromSeq: number;
  toSeq: number;
  entries: T[];
}

/**
 * Fixed-size ring buffer of event log entries.
 * Holds the contiguous sequence range [oldestSeq, latestSeq]; sequences start at 1.
 */
export class EventLogBuffer<T extends EventLogEntry> {
  private readonly slots: (T | undefined)[];
  private head = 0;
  private size = 0;
  private nextSeq = 1;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error("EventLogBuffer capacity must be a positive integer.");
    }
    this.slots = Array.from({ length: capacity });
  }

  get length(): number {
    return this.size;
  }

  get oldestSeq(): number | undefined {
    return this.size === 0 ? undefined : this.nextSeq - this.size;
  }

  get latestSeq(): number | undefined {
    return this.size === 0 ? undefined : this.nextSeq - 1;
  }

  /**
   * Stamps the entry with the next sequence number and stores it,
   * evicting the oldest entry when full.
   */
  append(entry: T): number {
    const seq = this.nextSeq;
    this.nextSeq += 1;

    if (this.size < this.capacity) {
      this.slots[(this.head + this.size) % this.capacity] = entry;
      this.size += 1;
    } else {
      this.slots[this.head] = entry;
      this.head = (this.head + 1) % this.capacity;
    }

    entry.eventId = seq;
    return seq;
  }

  /**
   * Return all entries with seq in (afterSeq, latestSeq].
   * Returns undefined if part of the requested range was already evicted.
   */
  getSince(afterSeq: number): EventLogRange<T> | undefined {
    const oldest = this.oldestSeq;
    const latest = this.latestSeq;
    if (oldest === undefined || latest === undefined) {
      return afterSeq < this.nextSeq - 1
        ? undefined
        : { fromSeq: afterSeq + 1, toSeq: afterSeq, entries: [] };
    }

    if (afterSeq < oldest - 1) {
      return undefined;
    }

    const fromSeq = Math.max(afterSeq + 1, oldest);
    return { fromSeq, toSeq: latest, entries: this.collect(fromSeq, latest) };
  }

  // -- Private Interface

  private collect(fromSeq: number, toSeq: number): T[] {
    const oldest = this.oldestSeq ?? fromSeq;
    const results: T[] = [];
    for (let seq = fromSeq; seq <= toSeq; seq += 1) {
      const entry = this.slots[(this.head + seq - oldest) % this.capacity];
      if (entry) {
        results.push(entry);
      }
    }
    return results;
  }
}
