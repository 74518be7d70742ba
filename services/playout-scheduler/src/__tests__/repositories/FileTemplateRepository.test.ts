import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileTemplateRepository } from '../../repositories/FileTemplateRepository';
import { InvalidTemplateError, NotFoundError, ValidationError } from '../../utils/errors';
import { captureRejection } from '../helpers/fixtures';

describe('FileTemplateRepository', () => {
  let templateDirectory: string;
  let repository: FileTemplateRepository;

  async function writeTemplate(fileName: string, content: unknown): Promise<void> {
    const data = typeof content === 'string' ? content : JSON.stringify(content);
    await fs.writeFile(path.join(templateDirectory, fileName), data, 'utf8');
  }

  beforeEach(async () => {
    templateDirectory = await fs.mkdtemp(path.join(os.tmpdir(), 'playout-templates-'));
    repository = new FileTemplateRepository(templateDirectory);
  });

  afterEach(async () => {
    await fs.rm(templateDirectory, { recursive: true, force: true });
  });

  describe('list', () => {
    it('should list JSON templates by name', async () => {
      const template = { slots: [{ startTime: '06:00', category: 'news', targetDurationSeconds: 60 }] };
      await writeTemplate('weekend.json', template);
      await writeTemplate('default.json', template);
      await writeTemplate('notes.txt', 'not a template');
      await writeTemplate('bad name.json', template);

      await expect(repository.list()).resolves.toEqual(['default', 'weekend']);
    });

    it('should list nothing when the directory does not exist', async () => {
      const missing = new FileTemplateRepository(path.join(templateDirectory, 'missing'));

      await expect(missing.list()).resolves.toEqual([]);
    });
  });

  describe('findByName', () => {
    it('should load a template and name it after its file', async () => {
      await writeTemplate('weekday.json', {
        description: 'Weekday programming',
        slots: [
          { startTime: '06:00', category: 'psaltir', targetDurationSeconds: 3600 },
          { startTime: '07:14', category: 'molitve', targetDurationSeconds: 900 },
        ],
      });

      const template = await repository.findByName('weekday');

      expect(template.name).toBe('weekday');
      expect(template.description).toBe('Weekday programming');
      expect(template.slots.map(slot => slot.startTime)).toEqual([21600, 26040]);
    });

    it('should keep the name written in the file', async () => {
      await writeTemplate('sunday.json', {
        name: 'sunday-special',
        slots: [{ startTime: '10:00', category: 'molitve', targetDurationSeconds: 900 }],
      });

      const template = await repository.findByName('sunday');

      expect(template.name).toBe('sunday-special');
    });

    it('should report unknown templates as not found', async () => {
      const error = await captureRejection(repository.findByName('weekday'));

      expect(error).toBeInstanceOf(NotFoundError);
      if (error instanceof NotFoundError) {
        expect(error.message).toBe('Template not found: weekday');
      }
    });

    it('should refuse names that could leave the template directory', async () => {
      await expect(repository.findByName('../secrets')).rejects.toThrow(ValidationError);
    });

    it('should reject files that are not JSON', async () => {
      await writeTemplate('broken.json', '{ "slots": [');

      const error = await captureRejection(repository.findByName('broken'));

      expect(error).toBeInstanceOf(InvalidTemplateError);
      if (error instanceof InvalidTemplateError) {
        expect(error.message).toBe('Template "broken" is not valid JSON');
      }
    });

    it('should reject templates without slots', async () => {
      await writeTemplate('empty.json', { slots: [] });

      const error = await captureRejection(repository.findByName('empty'));

      expect(error).toBeInstanceOf(InvalidTemplateError);
      if (error instanceof InvalidTemplateError) {
        expect(error.details).toEqual(['Template must contain at least one slot']);
      }
    });

    it('should reject malformed start times', async () => {
      await writeTemplate('sloppy.json', {
        slots: [{ startTime: '7:00', category: 'news', targetDurationSeconds: 60 }],
      });

      const error = await captureRejection(repository.findByName('sloppy'));

      expect(error).toBeInstanceOf(InvalidTemplateError);
      if (error instanceof InvalidTemplateError) {
        expect(error.details).toEqual(['startTime must be formatted HH:mm or HH:mm:ss']);
      }
    });

    it('should reject overlapping slots', async () => {
      await writeTemplate('overlap.json', {
        slots: [
          { startTime: '06:00', category: 'psaltir', targetDurationSeconds: 3600 },
          { startTime: '06:30', category: 'molitve', targetDurationSeconds: 900 },
        ],
      });

      const error = await captureRejection(repository.findByName('overlap'));

      expect(error).toBeInstanceOf(InvalidTemplateError);
      if (error instanceof InvalidTemplateError) {
        expect(error.message).toBe('Template "overlap" is invalid');
        expect(error.details).toEqual(['Slot 1: starts at 06:30:00 before slot 0 ends at 07:00:00']);
      }
    });
  });

  describe('bundled templates', () => {
    it('should load the default daily template', async () => {
      const bundled = new FileTemplateRepository(path.resolve(__dirname, '../../../templates'));

      const template = await bundled.findByName('default');

      expect(template.length).toBe(8);
      expect(template.requiredCategories()).toEqual(['psaltir', 'molitve', 'serije', 'deciji']);
    });
  });
});
