import { MediaCatalog } from '../../models/MediaCatalog';
import { MediaItem, createMediaItem } from '../../models/MediaItem';
import { ScheduleTemplate } from '../../models/ScheduleTemplate';

/**
 * Shared builders for scheduler tests
 */

export function mediaItem(
  filePath: string,
  category: string,
  durationSeconds: number,
  lastUsedTimestamp?: number
): MediaItem {
  return createMediaItem({
    filePath,
    category,
    durationSeconds,
    ...(lastUsedTimestamp !== undefined && { lastUsedTimestamp }),
  });
}

export function catalogOf(...items: MediaItem[]): MediaCatalog {
  return MediaCatalog.fromItems(items);
}

/**
 * Slots as [startTime, category, targetDurationSeconds]
 */
export function templateOf(slots: Array<[string, string, number]>, name = 'test'): ScheduleTemplate {
  return ScheduleTemplate.fromDefinition({
    name,
    slots: slots.map(([startTime, category, targetDurationSeconds]) => ({
      startTime,
      category,
      targetDurationSeconds,
    })),
  });
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

export async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}
