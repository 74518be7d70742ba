import { MediaItem, ScannedMediaRecord, createMediaItem, validateMediaRecord } from './MediaItem';
import { ValidationError } from '../utils/errors';

export interface CategorySummary {
  category: string;
  itemCount: number;
  totalDurationSeconds: number;
  items: Array<{ id: string; filePath: string; durationSeconds: number }>;
}

/**
 * Media Catalog
 *
 * Category -> items in scan order. Built once per generation run and only
 * read afterwards.
 */
export class MediaCatalog {
  private readonly buckets: ReadonlyMap<string, readonly MediaItem[]>;

  private constructor(buckets: Map<string, MediaItem[]>) {
    this.buckets = buckets;
  }

  /**
   * Build a catalog from scanner records, rejecting malformed ones.
   * `declaredCategories` are kept as empty buckets when no record falls into them.
   */
  static fromRecords(records: ScannedMediaRecord[], declaredCategories: readonly string[] = []): MediaCatalog {
    const errors = records.flatMap(record => validateMediaRecord(record));
    if (errors.length > 0) {
      throw new ValidationError('Invalid media records', errors);
    }

    return MediaCatalog.fromItems(records.map(record => createMediaItem(record)), declaredCategories);
  }

  static fromItems(items: MediaItem[], declaredCategories: readonly string[] = []): MediaCatalog {
    const buckets = new Map<string, MediaItem[]>();
    const seenIds = new Set<string>();
    const duplicates: string[] = [];

    for (const item of items) {
      if (seenIds.has(item.id)) {
        duplicates.push(`Duplicate media id ${item.id} (${item.filePath})`);
        continue;
      }
      seenIds.add(item.id);

      const bucket = buckets.get(item.category);
      if (bucket) {
        bucket.push(item);
      } else {
        buckets.set(item.category, [item]);
      }
    }

    if (duplicates.length > 0) {
      throw new ValidationError('Invalid media records', duplicates);
    }

    for (const category of declaredCategories) {
      if (!buckets.has(category)) {
        buckets.set(category, []);
      }
    }

    return new MediaCatalog(buckets);
  }

  static empty(): MediaCatalog {
    return new MediaCatalog(new Map());
  }

  itemsFor(category: string): readonly MediaItem[] {
    return this.buckets.get(category) ?? [];
  }

  hasCategory(category: string): boolean {
    return this.buckets.has(category);
  }

  isEmpty(category: string): boolean {
    return this.itemsFor(category).length === 0;
  }

  itemIds(): Set<string> {
    const ids = new Set<string>();
    for (const bucket of this.buckets.values()) {
      bucket.forEach(item => ids.add(item.id));
    }
    return ids;
  }

  categories(): string[] {
    return [...this.buckets.keys()];
  }

  get size(): number {
    let total = 0;
    for (const bucket of this.buckets.values()) {
      total += bucket.length;
    }
    return total;
  }

  summarize(): CategorySummary[] {
    return this.categories().map(category => {
      const items = this.itemsFor(category);
      return {
        category,
        itemCount: items.length,
        totalDurationSeconds: items.reduce((sum, item) => sum + item.durationSeconds, 0),
        items: items.map(item => ({
          id: item.id,
          filePath: item.filePath,
          durationSeconds: item.durationSeconds,
        })),
      };
    });
  }
}
