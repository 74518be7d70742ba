import { MediaItem } from './MediaItem';
import { ScheduleSlot } from './ScheduleTemplate';
import { formatTimeOfDay } from '../utils/time';

/**
 * Playlist Document Domain Model
 *
 * Result of one generation run: one entry per filled slot, one record per
 * slot that could not be filled. Field names of the serialized form are
 * read by the downstream player.
 */

export const NO_CANDIDATE_REASON = 'no candidate in category';

export enum UnfillableReasonCode {
  CATEGORY_NOT_FOUND = 'CATEGORY_NOT_FOUND',
  NO_CANDIDATE = 'NO_CANDIDATE'
}

export enum EntryWarningCode {
  DURATION_MISMATCH = 'DURATION_MISMATCH'
}

export interface EntryWarning {
  code: EntryWarningCode;
  message: string;
}

export interface PlaylistEntry {
  slotIndex: number;
  mediaItem: MediaItem;
  actualDurationSeconds: number;
  startTime: number;
  warnings: EntryWarning[];
}

export interface UnfillableSlot {
  slotIndex: number;
  startTime: number;
  category: string;
  code: UnfillableReasonCode;
  reason: string;
}

export interface PlaylistValidationResult {
  valid: boolean;
  violations: string[];
}

export interface SerializedPlaylistEntry {
  slotIndex: number;
  startTime: string;
  filePath: string;
  category: string;
  durationSeconds: number;
  warnings?: EntryWarning[];
}

export interface SerializedUnfillableSlot {
  slotIndex: number;
  startTime: string;
  category: string;
  reason: string;
}

export interface SerializedPlaylistDocument {
  channel: string;
  date: string;
  template: string;
  generatedAt: string;
  entries: SerializedPlaylistEntry[];
  unfillable: SerializedUnfillableSlot[];
}

export interface PlaylistDocumentData {
  channel: string;
  date: string;
  templateName: string;
  generatedAt: Date;
  slots: readonly ScheduleSlot[];
  entries: PlaylistEntry[];
  unfillable: UnfillableSlot[];
}

export class PlaylistDocument {
  public readonly channel: string;
  public readonly date: string;
  public readonly templateName: string;
  public readonly generatedAt: Date;
  public readonly slots: readonly ScheduleSlot[];
  public readonly entries: readonly PlaylistEntry[];
  public readonly unfillable: readonly UnfillableSlot[];

  constructor(data: PlaylistDocumentData) {
    this.channel = data.channel;
    this.date = data.date;
    this.templateName = data.templateName;
    this.generatedAt = data.generatedAt;
    this.slots = data.slots;
    this.entries = data.entries;
    this.unfillable = data.unfillable;
  }

  /**
   * Check ordering, slot windows, categories and that every slot is
   * accounted for exactly once
   */
  validate(): PlaylistValidationResult {
    const violations: string[] = [];
    const accounted = new Map<number, number>();

    let previous: PlaylistEntry | undefined;
    for (const entry of this.entries) {
      accounted.set(entry.slotIndex, (accounted.get(entry.slotIndex) ?? 0) + 1);

      const slot = this.slots[entry.slotIndex];
      if (!slot) {
        violations.push(`Entry references unknown slot ${entry.slotIndex}`);
        continue;
      }

      if (entry.startTime !== slot.startTime) {
        violations.push(
          `Entry for slot ${slot.index} starts at ${formatTimeOfDay(entry.startTime)} instead of ${formatTimeOfDay(slot.startTime)}`
        );
      }

      if (entry.mediaItem.category !== slot.requiredCategory) {
        violations.push(
          `Entry for slot ${slot.index} has category "${entry.mediaItem.category}" but the slot requires "${slot.requiredCategory}"`
        );
      }

      if (previous) {
        if (entry.slotIndex <= previous.slotIndex || entry.startTime <= previous.startTime) {
          violations.push(`Entry for slot ${entry.slotIndex} is out of order after slot ${previous.slotIndex}`);
        } else {
          const previousSlot = this.slots[previous.slotIndex];
          if (previousSlot && previousSlot.endTime > entry.startTime) {
            violations.push(`Entry for slot ${entry.slotIndex} overlaps slot ${previous.slotIndex}`);
          }
        }
      }
      previous = entry;
    }

    let previousGap: UnfillableSlot | undefined;
    for (const gap of this.unfillable) {
      accounted.set(gap.slotIndex, (accounted.get(gap.slotIndex) ?? 0) + 1);
      if (previousGap && gap.slotIndex <= previousGap.slotIndex) {
        violations.push(`Unfillable slot ${gap.slotIndex} is out of order after slot ${previousGap.slotIndex}`);
      }
      previousGap = gap;
    }

    for (const slot of this.slots) {
      const count = accounted.get(slot.index) ?? 0;
      if (count === 0) {
        violations.push(`Slot ${slot.index} is neither filled nor reported as unfillable`);
      } else if (count > 1) {
        violations.push(`Slot ${slot.index} is accounted for ${count} times`);
      }
    }

    return { valid: violations.length === 0, violations };
  }

  isComplete(): boolean {
    return this.unfillable.length === 0;
  }

  warningCount(): number {
    return this.entries.reduce((sum, entry) => sum + entry.warnings.length, 0);
  }

  toJSON(): SerializedPlaylistDocument {
    return {
      channel: this.channel,
      date: this.date,
      template: this.templateName,
      generatedAt: this.generatedAt.toISOString(),
      entries: this.entries.map(entry => ({
        slotIndex: entry.slotIndex,
        startTime: formatTimeOfDay(entry.startTime),
        filePath: entry.mediaItem.filePath,
        category: entry.mediaItem.category,
        durationSeconds: entry.actualDurationSeconds,
        ...(entry.warnings.length > 0 && { warnings: entry.warnings }),
      })),
      unfillable: this.unfillable.map(gap => ({
        slotIndex: gap.slotIndex,
        startTime: formatTimeOfDay(gap.startTime),
        category: gap.category,
        reason: gap.reason,
      })),
    };
  }
}
