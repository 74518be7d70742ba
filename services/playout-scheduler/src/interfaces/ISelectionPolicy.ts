import { MediaItem } from '../models/MediaItem';
import { MediaCatalog } from '../models/MediaCatalog';
import { UsageHistory } from '../models/UsageHistory';
import { UnfillableReasonCode } from '../models/PlaylistDocument';

/**
 * Selection Policy Interface
 *
 * Single Responsibility: Choose the catalog item that fills one slot
 */

export interface SelectionRequest {
  category: string;
  targetDurationSeconds: number;
  /** Recorded as the pick's last-use time, epoch milliseconds */
  usedAt: number;
}

/**
 * `withinTolerance` is false when the pick's duration differs from the
 * target by more than the configured tolerance in either direction
 */
export type SelectionResult =
  | { found: true; item: MediaItem; withinTolerance: boolean }
  | { found: false; code: UnfillableReasonCode; reason: string };

export interface ISelectionPolicy {
  readonly tolerance: number;

  /**
   * Pick an item for the request and record the pick in the history.
   * The history is written at most once per call.
   */
  select(catalog: MediaCatalog, request: SelectionRequest, history: UsageHistory): SelectionResult;
}
