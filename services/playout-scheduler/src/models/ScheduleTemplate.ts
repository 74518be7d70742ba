import { InvalidTemplateError } from '../utils/errors';
import { SECONDS_PER_DAY, formatTimeOfDay, parseTimeOfDay } from '../utils/time';

/**
 * Schedule Template Domain Model
 *
 * A day's programming: ordered, non-overlapping slots each asking for one
 * item of a category. Times are seconds since the start of the broadcast day.
 */

export interface ScheduleSlot {
  readonly index: number;
  readonly startTime: number;
  readonly endTime: number;
  readonly requiredCategory: string;
  readonly targetDurationSeconds: number;
}

/**
 * Slot as written in template configuration
 */
export interface SlotDefinition {
  startTime: string;
  category: string;
  targetDurationSeconds: number;
}

export interface TemplateDefinition {
  name: string;
  description?: string;
  slots: SlotDefinition[];
}

export class ScheduleTemplate {
  public readonly name: string;
  public readonly description?: string;
  public readonly slots: readonly ScheduleSlot[];

  private constructor(name: string, slots: ScheduleSlot[], description?: string) {
    this.name = name;
    this.description = description;
    this.slots = Object.freeze(slots.map(slot => Object.freeze(slot)));
  }

  /**
   * Parse a template definition, rejecting unordered or overlapping slots
   */
  static fromDefinition(definition: TemplateDefinition): ScheduleTemplate {
    const errors: string[] = [];
    const slots: ScheduleSlot[] = [];

    definition.slots.forEach((slot, index) => {
      const startTime = parseTimeOfDay(slot.startTime);
      if (startTime === null) {
        errors.push(`Slot ${index}: invalid start time "${slot.startTime}", expected HH:mm or HH:mm:ss`);
        return;
      }

      slots.push({
        index,
        startTime,
        endTime: startTime + slot.targetDurationSeconds,
        requiredCategory: slot.category.trim(),
        targetDurationSeconds: slot.targetDurationSeconds,
      });
    });

    errors.push(...ScheduleTemplate.checkSlots(slots));

    if (errors.length > 0) {
      throw new InvalidTemplateError(`Template "${definition.name}" is invalid`, errors);
    }

    return new ScheduleTemplate(definition.name, slots, definition.description);
  }

  /**
   * Structural checks shared by parsing and the assembler's pre-flight
   */
  static checkSlots(slots: readonly ScheduleSlot[]): string[] {
    const errors: string[] = [];

    if (slots.length === 0) {
      errors.push('Template must contain at least one slot');
    }

    slots.forEach((slot, position) => {
      if (slot.index !== position) {
        errors.push(`Slot at position ${position} carries index ${slot.index}`);
      }

      if (slot.requiredCategory.length === 0) {
        errors.push(`Slot ${position}: category is required`);
      }

      if (!Number.isFinite(slot.targetDurationSeconds) || slot.targetDurationSeconds <= 0) {
        errors.push(`Slot ${position}: targetDurationSeconds must be a positive number`);
      } else if (slot.endTime !== slot.startTime + slot.targetDurationSeconds) {
        errors.push(`Slot ${position}: end time does not match start time plus target duration`);
      } else if (slot.endTime > SECONDS_PER_DAY) {
        errors.push(`Slot ${position}: ends after 24:00:00`);
      }

      const previous = position > 0 ? slots[position - 1] : undefined;
      if (previous) {
        if (slot.startTime <= previous.startTime) {
          errors.push(
            `Slot ${position}: start ${formatTimeOfDay(slot.startTime)} is not after slot ${position - 1} start ${formatTimeOfDay(previous.startTime)}`
          );
        } else if (previous.endTime > slot.startTime) {
          errors.push(
            `Slot ${position}: starts at ${formatTimeOfDay(slot.startTime)} before slot ${position - 1} ends at ${formatTimeOfDay(previous.endTime)}`
          );
        }
      }
    });

    return errors;
  }

  get length(): number {
    return this.slots.length;
  }

  requiredCategories(): string[] {
    return [...new Set(this.slots.map(slot => slot.requiredCategory))];
  }

  toJSON(): TemplateDefinition {
    return {
      name: this.name,
      ...(this.description !== undefined && { description: this.description }),
      slots: this.slots.map(slot => ({
        startTime: formatTimeOfDay(slot.startTime),
        category: slot.requiredCategory,
        targetDurationSeconds: slot.targetDurationSeconds,
      })),
    };
  }
}
