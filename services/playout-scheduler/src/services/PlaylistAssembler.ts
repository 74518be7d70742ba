import { AssemblyOptions, IPlaylistAssembler } from '../interfaces/IPlaylistAssembler';
import { ISelectionPolicy } from '../interfaces/ISelectionPolicy';
import { MediaCatalog } from '../models/MediaCatalog';
import {
  EntryWarning,
  EntryWarningCode,
  PlaylistDocument,
  PlaylistEntry,
  UnfillableSlot,
} from '../models/PlaylistDocument';
import { ScheduleSlot, ScheduleTemplate } from '../models/ScheduleTemplate';
import { UsageHistory } from '../models/UsageHistory';
import { AssemblyInvariantViolationError, InvalidTemplateError } from '../utils/errors';
import { Logger } from '../utils/Logger';

/**
 * Playlist Assembler
 *
 * Walks the template slot by slot in airtime order. Rotation depends on
 * each pick being recorded before the next slot is looked at, so slots are
 * never processed out of order or in parallel.
 */
export class PlaylistAssembler implements IPlaylistAssembler {
  private readonly logger = new Logger('PlaylistAssembler');

  constructor(private readonly selectionPolicy: ISelectionPolicy) {}

  assemble(template: ScheduleTemplate, catalog: MediaCatalog, options: AssemblyOptions): PlaylistDocument {
    const templateErrors = ScheduleTemplate.checkSlots(template.slots);
    if (templateErrors.length > 0) {
      throw new InvalidTemplateError(`Template "${template.name}" is invalid`, templateErrors);
    }

    const generatedAt = options.generatedAt ?? new Date();
    const history = options.history ?? new UsageHistory();
    const entries: PlaylistEntry[] = [];
    const unfillable: UnfillableSlot[] = [];

    for (const slot of template.slots) {
      const result = this.selectionPolicy.select(
        catalog,
        {
          category: slot.requiredCategory,
          targetDurationSeconds: slot.targetDurationSeconds,
          usedAt: generatedAt.getTime(),
        },
        history
      );

      if (!result.found) {
        this.logger.warn(`Slot ${slot.index} (${slot.requiredCategory}) left unfilled: ${result.reason}`);
        unfillable.push({
          slotIndex: slot.index,
          startTime: slot.startTime,
          category: slot.requiredCategory,
          code: result.code,
          reason: result.reason,
        });
        continue;
      }

      const warnings: EntryWarning[] = result.withinTolerance
        ? []
        : [this.durationWarning(slot, result.item.durationSeconds)];

      entries.push({
        slotIndex: slot.index,
        mediaItem: result.item,
        actualDurationSeconds: result.item.durationSeconds,
        startTime: slot.startTime,
        warnings,
      });
    }

    const document = new PlaylistDocument({
      channel: options.channel,
      date: options.date,
      templateName: template.name,
      generatedAt,
      slots: template.slots,
      entries,
      unfillable,
    });

    const { valid, violations } = document.validate();
    if (!valid) {
      this.logger.error(`Assembled playlist for "${template.name}" breaks its invariants`, violations);
      throw new AssemblyInvariantViolationError('Assembled playlist violates ordering invariants', violations);
    }

    this.logger.info(
      `Assembled "${template.name}" for ${options.date}: ${entries.length} entries, ${unfillable.length} unfillable`
    );

    return document;
  }

  private durationWarning(slot: ScheduleSlot, actualDurationSeconds: number): EntryWarning {
    return {
      code: EntryWarningCode.DURATION_MISMATCH,
      message: `Duration ${actualDurationSeconds}s differs from the ${slot.targetDurationSeconds}s target by more than ${
        this.selectionPolicy.tolerance * 100
      }%`,
    };
  }
}
