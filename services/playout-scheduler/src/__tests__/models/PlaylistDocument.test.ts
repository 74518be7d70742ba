import { MediaItem } from '../../models/MediaItem';
import {
  EntryWarning,
  EntryWarningCode,
  NO_CANDIDATE_REASON,
  PlaylistDocument,
  PlaylistEntry,
  UnfillableReasonCode,
  UnfillableSlot,
} from '../../models/PlaylistDocument';
import { ScheduleSlot } from '../../models/ScheduleTemplate';
import { mediaItem, templateOf } from '../helpers/fixtures';

describe('PlaylistDocument', () => {
  const newsA = mediaItem('/media/news/a.mp4', 'news', 300);
  const newsB = mediaItem('/media/news/b.mp4', 'news', 280);
  const sportsA = mediaItem('/media/sports/a.mp4', 'sports', 600);
  const slots = templateOf([
    ['00:00', 'news', 300],
    ['00:05', 'news', 300],
  ]).slots;

  function entry(slot: ScheduleSlot, item: MediaItem, warnings: EntryWarning[] = []): PlaylistEntry {
    return {
      slotIndex: slot.index,
      mediaItem: item,
      actualDurationSeconds: item.durationSeconds,
      startTime: slot.startTime,
      warnings,
    };
  }

  function gap(slot: ScheduleSlot): UnfillableSlot {
    return {
      slotIndex: slot.index,
      startTime: slot.startTime,
      category: slot.requiredCategory,
      code: UnfillableReasonCode.CATEGORY_NOT_FOUND,
      reason: NO_CANDIDATE_REASON,
    };
  }

  function documentOf(
    entries: PlaylistEntry[],
    unfillable: UnfillableSlot[] = [],
    documentSlots: readonly ScheduleSlot[] = slots
  ): PlaylistDocument {
    return new PlaylistDocument({
      channel: 'Test Channel',
      date: '2026-06-01',
      templateName: 'test',
      generatedAt: new Date('2026-05-31T22:00:00.000Z'),
      slots: documentSlots,
      entries,
      unfillable,
    });
  }

  describe('validate', () => {
    it('should accept entries in slot order covering every slot', () => {
      const document = documentOf([entry(slots[0], newsA), entry(slots[1], newsB)]);

      expect(document.validate()).toEqual({ valid: true, violations: [] });
      expect(document.isComplete()).toBe(true);
    });

    it('should accept a slot reported as unfillable instead of filled', () => {
      const document = documentOf([entry(slots[0], newsA)], [gap(slots[1])]);

      expect(document.validate().valid).toBe(true);
      expect(document.isComplete()).toBe(false);
    });

    it('should flag entries out of slot order', () => {
      const document = documentOf([entry(slots[1], newsB), entry(slots[0], newsA)]);

      expect(document.validate()).toEqual({
        valid: false,
        violations: ['Entry for slot 0 is out of order after slot 1'],
      });
    });

    it('should flag an entry whose category differs from its slot', () => {
      const document = documentOf([entry(slots[0], sportsA), entry(slots[1], newsB)]);

      expect(document.validate().violations).toEqual([
        'Entry for slot 0 has category "sports" but the slot requires "news"',
      ]);
    });

    it('should flag an entry that does not start with its slot', () => {
      const shifted: PlaylistEntry = { ...entry(slots[0], newsA), startTime: 10 };
      const document = documentOf([shifted, entry(slots[1], newsB)]);

      expect(document.validate().violations).toEqual(['Entry for slot 0 starts at 00:00:10 instead of 00:00:00']);
    });

    it('should flag entries whose slot windows overlap', () => {
      const overlapping: ScheduleSlot[] = [
        { index: 0, startTime: 0, endTime: 600, requiredCategory: 'news', targetDurationSeconds: 600 },
        { index: 1, startTime: 300, endTime: 600, requiredCategory: 'news', targetDurationSeconds: 300 },
      ];
      const document = documentOf(
        [entry(overlapping[0], newsA), entry(overlapping[1], newsB)],
        [],
        overlapping
      );

      expect(document.validate().violations).toEqual(['Entry for slot 1 overlaps slot 0']);
    });

    it('should flag slots that are not accounted for', () => {
      const document = documentOf([entry(slots[0], newsA)]);

      expect(document.validate().violations).toEqual(['Slot 1 is neither filled nor reported as unfillable']);
    });

    it('should flag slots that are both filled and unfillable', () => {
      const document = documentOf([entry(slots[0], newsA), entry(slots[1], newsB)], [gap(slots[1])]);

      expect(document.validate().violations).toEqual(['Slot 1 is accounted for 2 times']);
    });

    it('should flag entries pointing at unknown slots', () => {
      const stray: PlaylistEntry = { ...entry(slots[1], newsB), slotIndex: 5 };
      const document = documentOf([entry(slots[0], newsA), entry(slots[1], newsB), stray]);

      expect(document.validate().violations).toEqual(['Entry references unknown slot 5']);
    });

    it('should flag unfillable slots out of order', () => {
      const threeSlots = templateOf([
        ['00:00', 'news', 60],
        ['00:01', 'news', 60],
        ['00:02', 'news', 60],
      ]).slots;
      const document = documentOf(
        [entry(threeSlots[1], newsA)],
        [gap(threeSlots[2]), gap(threeSlots[0])],
        threeSlots
      );

      expect(document.validate().violations).toEqual(['Unfillable slot 0 is out of order after slot 2']);
    });
  });

  describe('toJSON', () => {
    it('should serialize entries and unfillable slots for the player', () => {
      const warning: EntryWarning = {
        code: EntryWarningCode.DURATION_MISMATCH,
        message: 'Duration 280s differs from the 300s target by more than 5%',
      };
      const document = documentOf([entry(slots[0], newsA), entry(slots[1], newsB, [warning])]);

      expect(document.toJSON()).toEqual({
        channel: 'Test Channel',
        date: '2026-06-01',
        template: 'test',
        generatedAt: '2026-05-31T22:00:00.000Z',
        entries: [
          { slotIndex: 0, startTime: '00:00:00', filePath: '/media/news/a.mp4', category: 'news', durationSeconds: 300 },
          {
            slotIndex: 1,
            startTime: '00:05:00',
            filePath: '/media/news/b.mp4',
            category: 'news',
            durationSeconds: 280,
            warnings: [warning],
          },
        ],
        unfillable: [],
      });
      expect(document.warningCount()).toBe(1);
    });

    it('should leave out the warnings key on entries without warnings', () => {
      const document = documentOf([entry(slots[0], newsA)], [gap(slots[1])]);
      const serialized = document.toJSON();

      expect(Object.keys(serialized.entries[0])).not.toContain('warnings');
      expect(serialized.unfillable).toEqual([
        { slotIndex: 1, startTime: '00:05:00', category: 'news', reason: 'no candidate in category' },
      ]);
    });
  });
});
