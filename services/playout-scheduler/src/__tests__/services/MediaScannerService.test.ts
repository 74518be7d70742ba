import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { IMediaProbe } from '../../interfaces/IMediaScanner';
import { MediaScannerService, MediaScannerOptions } from '../../services/MediaScannerService';

class FakeMediaProbe implements IMediaProbe {
  probeDurationSeconds = jest.fn(async (filePath: string): Promise<number> => {
    if (path.basename(filePath) === 'b.mp4') {
      throw new Error('corrupt');
    }
    return 120;
  });
}

describe('MediaScannerService', () => {
  let videoDirectory: string;
  let probe: FakeMediaProbe;

  const categoryMap = { molitv: 'molitve', serij: 'serije', spica: 'spica' };

  function createScanner(overrides: Partial<MediaScannerOptions> = {}): MediaScannerService {
    return new MediaScannerService(
      {
        videoDirectory,
        videoExtensions: ['.mp4', '.mkv'],
        categoryMap,
        defaultDurationSeconds: 900,
        identFile: 'SPICA_BlagovestiTV.mp4',
        ...overrides,
      },
      probe
    );
  }

  async function touch(...segments: string[]): Promise<void> {
    const filePath = path.join(videoDirectory, ...segments);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '');
  }

  beforeEach(async () => {
    videoDirectory = await fs.mkdtemp(path.join(os.tmpdir(), 'playout-scan-'));
    probe = new FakeMediaProbe();
  });

  afterEach(async () => {
    await fs.rm(videoDirectory, { recursive: true, force: true });
  });

  describe('scan', () => {
    beforeEach(async () => {
      await touch('Molitve', 'b.mp4');
      await touch('Molitve', 'a.mp4');
      await touch('Serije', 's1.mkv');
      await touch('Serije', 'notes.txt');
      await touch('Serije', 'Sezona 1', 'e1.mp4');
      await touch('Nova Emisija', 'x.MP4');
      await touch('SPICA_BlagovestiTV.mp4');
      await touch('loose.mp4');
    });

    it('should describe every video file in path order', async () => {
      const result = await createScanner().scan();

      expect(result.videoDirectory).toBe(path.resolve(videoDirectory));
      expect(result.records).toEqual([
        { filePath: path.join(videoDirectory, 'Molitve', 'a.mp4'), category: 'molitve', durationSeconds: 120 },
        { filePath: path.join(videoDirectory, 'Molitve', 'b.mp4'), category: 'molitve', durationSeconds: 900 },
        { filePath: path.join(videoDirectory, 'Nova Emisija', 'x.MP4'), category: 'nova_emisija', durationSeconds: 120 },
        { filePath: path.join(videoDirectory, 'Serije', 'Sezona 1', 'e1.mp4'), category: 'sezona_1', durationSeconds: 120 },
        { filePath: path.join(videoDirectory, 'Serije', 's1.mkv'), category: 'serije', durationSeconds: 120 },
      ]);
    });

    it('should declare the category of every leaf folder, empty or not', async () => {
      await fs.mkdir(path.join(videoDirectory, 'Sport'));

      const result = await createScanner().scan();

      expect(result.categories).toEqual(['molitve', 'nova_emisija', 'sezona_1', 'sport']);
    });

    it('should pick out the station ident instead of cataloguing it', async () => {
      const result = await createScanner().scan();

      expect(result.identPath).toBe(path.join(videoDirectory, 'SPICA_BlagovestiTV.mp4'));
      expect(probe.probeDurationSeconds).not.toHaveBeenCalledWith(result.identPath);
    });

    it('should only probe files inside category folders', async () => {
      await createScanner().scan();

      expect(probe.probeDurationSeconds).toHaveBeenCalledTimes(5);
      expect(probe.probeDurationSeconds).not.toHaveBeenCalledWith(path.join(videoDirectory, 'loose.mp4'));
    });

    it('should fall back to the default duration when probing fails', async () => {
      const result = await createScanner({ defaultDurationSeconds: 600 }).scan();
      const failed = result.records.find(record => record.filePath.endsWith('b.mp4'));

      expect(failed?.durationSeconds).toBe(600);
    });

    it('should catalogue the ident file like any other file when no ident is configured', async () => {
      await touch('Spica', 'SPICA_BlagovestiTV.mp4');

      const result = await createScanner({ identFile: undefined }).scan();

      expect(result.identPath).toBeUndefined();
      expect(result.records.map(record => record.category)).toContain('spica');
    });
  });

  it('should return an empty result for a missing directory', async () => {
    const missing = path.join(videoDirectory, 'does-not-exist');

    const result = await createScanner({ videoDirectory: missing }).scan();

    expect(result).toEqual({ videoDirectory: missing, records: [] });
    expect(probe.probeDurationSeconds).not.toHaveBeenCalled();
  });

  describe('categoryFor', () => {
    it('should map folder names containing a known fragment', () => {
      const scanner = createScanner({ categoryMap: { psaltir: 'psaltir', decij: 'deciji' } });

      expect(scanner.categoryFor('Psaltir Davidov')).toBe('psaltir');
      expect(scanner.categoryFor('DECIJI PROGRAM')).toBe('deciji');
    });

    it('should use the first matching fragment', () => {
      const scanner = createScanner({ categoryMap: { serij: 'serije', dokument: 'dokumentarni' } });

      expect(scanner.categoryFor('Dokumentarne serije')).toBe('serije');
    });

    it('should fall back to the normalized folder name', () => {
      expect(createScanner().categoryFor('Nova  Emisija')).toBe('nova_emisija');
    });
  });
});
