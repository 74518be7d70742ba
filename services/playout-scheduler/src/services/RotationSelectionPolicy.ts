import { ISelectionPolicy, SelectionRequest, SelectionResult } from '../interfaces/ISelectionPolicy';
import { MediaCatalog } from '../models/MediaCatalog';
import { MediaItem } from '../models/MediaItem';
import { NO_CANDIDATE_REASON, UnfillableReasonCode } from '../models/PlaylistDocument';
import { UsageHistory, UsageRecord, compareUsage } from '../models/UsageHistory';
import { ValidationError } from '../utils/errors';

interface RankedCandidate {
  item: MediaItem;
  position: number;
  usage?: UsageRecord;
}

/**
 * Rotation Selection Policy
 *
 * Least recently used first, so every item in a category airs before any
 * repeats. Among equally recent items the closest duration fit wins, then
 * scan order.
 */
export class RotationSelectionPolicy implements ISelectionPolicy {
  public static readonly DEFAULT_TOLERANCE = 0.05;

  public readonly tolerance: number;

  constructor(tolerance: number = RotationSelectionPolicy.DEFAULT_TOLERANCE) {
    if (!Number.isFinite(tolerance) || tolerance < 0) {
      throw new ValidationError('Duration tolerance must be a non-negative number', [
        `tolerance: ${tolerance}`,
      ]);
    }
    this.tolerance = tolerance;
  }

  select(catalog: MediaCatalog, request: SelectionRequest, history: UsageHistory): SelectionResult {
    if (!catalog.hasCategory(request.category)) {
      return this.notFound(UnfillableReasonCode.CATEGORY_NOT_FOUND);
    }

    const ranked: RankedCandidate[] = catalog.itemsFor(request.category).map((item, position) => ({
      item,
      position,
      usage: history.lastUseOf(item),
    }));

    ranked.sort((a, b) => compareUsage(a.usage, b.usage) || a.position - b.position);

    const [leastRecent] = ranked;
    if (!leastRecent) {
      return this.notFound(UnfillableReasonCode.NO_CANDIDATE);
    }

    const tied = ranked.filter(candidate => compareUsage(candidate.usage, leastRecent.usage) === 0);
    const chosen = this.closestFit(tied, request.targetDurationSeconds);

    // Never record a pick as older than a use already known in this category
    const newest = ranked.reduce(
      (latest, candidate) => Math.max(latest, candidate.usage?.lastUsedAt ?? latest),
      request.usedAt
    );
    history.recordUse(chosen.id, newest);

    return {
      found: true,
      item: chosen,
      withinTolerance: this.isWithinTolerance(chosen.durationSeconds, request.targetDurationSeconds),
    };
  }

  /**
   * Items that do not overrun the target by more than the tolerance are
   * preferred; without any, the closest absolute duration wins
   */
  private closestFit(candidates: RankedCandidate[], targetDurationSeconds: number): MediaItem {
    const fitting = candidates.filter(candidate =>
      candidate.item.durationSeconds <= targetDurationSeconds * (1 + this.tolerance)
    );
    const pool = fitting.length > 0 ? fitting : candidates;

    let best = pool[0].item;
    for (const candidate of pool.slice(1)) {
      const distance = Math.abs(candidate.item.durationSeconds - targetDurationSeconds);
      if (distance < Math.abs(best.durationSeconds - targetDurationSeconds)) {
        best = candidate.item;
      }
    }
    return best;
  }

  private isWithinTolerance(durationSeconds: number, targetDurationSeconds: number): boolean {
    return Math.abs(durationSeconds - targetDurationSeconds) <= targetDurationSeconds * this.tolerance;
  }

  private notFound(code: UnfillableReasonCode): SelectionResult {
    return { found: false, code, reason: NO_CANDIDATE_REASON };
  }
}
