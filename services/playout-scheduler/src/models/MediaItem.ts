import { v5 as uuidv5 } from 'uuid';

/**
 * Media Item Domain Model
 *
 * One playable file as discovered by the scanner. Frozen on creation; the
 * catalog owns it for the duration of a generation run.
 */

// Namespace for path-derived ids, so a rescan yields the same id per file
const MEDIA_ID_NAMESPACE = '0f6c5a3e-4b1d-4c8e-9a57-2d3f1e6b7c90';

export interface MediaItem {
  readonly id: string;
  readonly filePath: string;
  readonly category: string;
  readonly durationSeconds: number;
  readonly lastUsedTimestamp?: number;
}

/**
 * Record handed over by the scanner (or any other catalog source)
 */
export interface ScannedMediaRecord {
  filePath: string;
  category: string;
  durationSeconds: number;
  id?: string;
  lastUsedTimestamp?: number;
}

export function mediaIdForPath(filePath: string): string {
  return uuidv5(filePath, MEDIA_ID_NAMESPACE);
}

/**
 * Check a record against the media item invariants.
 * Returns one message per problem; empty when the record is usable.
 */
export function validateMediaRecord(record: ScannedMediaRecord): string[] {
  const errors: string[] = [];

  if (!record.filePath || record.filePath.trim().length === 0) {
    errors.push('filePath is required');
  }

  if (!record.category || record.category.trim().length === 0) {
    errors.push(`category is required for ${record.filePath || '<unknown file>'}`);
  }

  if (!Number.isFinite(record.durationSeconds) || record.durationSeconds <= 0) {
    errors.push(`durationSeconds must be a positive number for ${record.filePath || '<unknown file>'}`);
  }

  if (record.lastUsedTimestamp !== undefined && !Number.isFinite(record.lastUsedTimestamp)) {
    errors.push(`lastUsedTimestamp must be a finite number for ${record.filePath}`);
  }

  return errors;
}

export function createMediaItem(record: ScannedMediaRecord): MediaItem {
  const item: MediaItem = {
    id: record.id ?? mediaIdForPath(record.filePath),
    filePath: record.filePath,
    category: record.category.trim(),
    durationSeconds: record.durationSeconds,
    ...(record.lastUsedTimestamp !== undefined && { lastUsedTimestamp: record.lastUsedTimestamp }),
  };
  return Object.freeze(item);
}
