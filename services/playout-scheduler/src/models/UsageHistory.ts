import { MediaItem } from './MediaItem';

/**
 * When an item was last put on air. `sequence` orders picks that share a
 * timestamp; seeded timestamps from the scanner carry sequence 0.
 */
export interface UsageRecord {
  lastUsedAt: number;
  sequence: number;
}

export type UsageSnapshot = Record<string, UsageRecord>;

/**
 * Usage History
 *
 * Rotation state for one generation run. Each run gets its own instance;
 * only the selection policy writes to it.
 */
export class UsageHistory {
  private readonly records = new Map<string, UsageRecord>();
  private sequence = 0;

  constructor(snapshot: UsageSnapshot = {}) {
    for (const [itemId, record] of Object.entries(snapshot)) {
      this.records.set(itemId, { ...record });
      this.sequence = Math.max(this.sequence, record.sequence);
    }
  }

  /**
   * Last use of an item: the newer of its recorded use and the timestamp it was scanned with
   */
  lastUseOf(item: MediaItem): UsageRecord | undefined {
    const recorded = this.records.get(item.id);
    const scanned: UsageRecord | undefined =
      item.lastUsedTimestamp !== undefined ? { lastUsedAt: item.lastUsedTimestamp, sequence: 0 } : undefined;

    if (recorded && scanned) {
      return compareUsage(recorded, scanned) >= 0 ? recorded : scanned;
    }
    return recorded ?? scanned;
  }

  recordUse(itemId: string, usedAt: number): UsageRecord {
    this.sequence += 1;
    const record: UsageRecord = { lastUsedAt: usedAt, sequence: this.sequence };
    this.records.set(itemId, record);
    return record;
  }

  /**
   * Forget items that are no longer on storage; returns how many were dropped
   */
  retainOnly(itemIds: ReadonlySet<string>): number {
    let dropped = 0;
    for (const itemId of [...this.records.keys()]) {
      if (!itemIds.has(itemId)) {
        this.records.delete(itemId);
        dropped += 1;
      }
    }
    return dropped;
  }

  has(itemId: string): boolean {
    return this.records.has(itemId);
  }

  get size(): number {
    return this.records.size;
  }

  snapshot(): UsageSnapshot {
    const snapshot: UsageSnapshot = {};
    for (const [itemId, record] of this.records) {
      snapshot[itemId] = { ...record };
    }
    return snapshot;
  }

  clone(): UsageHistory {
    return new UsageHistory(this.snapshot());
  }
}

/**
 * Orders two usage records, least recently used first; never used sorts before everything
 */
export function compareUsage(a: UsageRecord | undefined, b: UsageRecord | undefined): number {
  if (!a || !b) {
    return (a ? 1 : 0) - (b ? 1 : 0);
  }
  if (a.lastUsedAt !== b.lastUsedAt) {
    return a.lastUsedAt - b.lastUsedAt;
  }
  return a.sequence - b.sequence;
}
