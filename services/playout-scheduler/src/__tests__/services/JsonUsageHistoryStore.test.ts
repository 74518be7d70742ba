import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { UsageHistory } from '../../models/UsageHistory';
import { JsonUsageHistoryStore, USAGE_STATE_FILE } from '../../services/JsonUsageHistoryStore';

describe('JsonUsageHistoryStore', () => {
  let outputDirectory: string;
  let store: JsonUsageHistoryStore;

  beforeEach(async () => {
    outputDirectory = await fs.mkdtemp(path.join(os.tmpdir(), 'playout-state-'));
    store = new JsonUsageHistoryStore(outputDirectory);
  });

  afterEach(async () => {
    await fs.rm(outputDirectory, { recursive: true, force: true });
  });

  it('should start with an empty history when no state was saved', async () => {
    const history = await store.load();

    expect(history.size).toBe(0);
  });

  it('should write the state next to the playlists', async () => {
    const history = new UsageHistory();
    history.recordUse('news-a', Date.parse('2026-05-31T22:00:00.000Z'));

    await store.save(history);
    const raw = await fs.readFile(path.join(outputDirectory, USAGE_STATE_FILE), 'utf8');

    expect(JSON.parse(raw)).toEqual({
      version: 1,
      items: {
        'news-a': { lastUsedAt: '2026-05-31T22:00:00.000Z', sequence: 1 },
      },
    });
  });

  it('should restore what it saved', async () => {
    const history = new UsageHistory();
    history.recordUse('news-a', Date.parse('2026-05-31T22:00:00.000Z'));
    history.recordUse('news-b', Date.parse('2026-05-31T22:00:00.000Z'));

    await store.save(history);
    const restored = await store.load();

    expect(restored.snapshot()).toEqual(history.snapshot());
  });

  it('should create the output directory when saving', async () => {
    const nested = new JsonUsageHistoryStore(path.join(outputDirectory, 'nested', 'playlists'));

    await nested.save(new UsageHistory());

    await expect(
      fs.readFile(path.join(outputDirectory, 'nested', 'playlists', USAGE_STATE_FILE), 'utf8')
    ).resolves.toBe(JSON.stringify({ version: 1, items: {} }, null, 2));
  });

  it('should ignore a state file that is not JSON', async () => {
    await fs.writeFile(path.join(outputDirectory, USAGE_STATE_FILE), '{not json', 'utf8');

    const history = await store.load();

    expect(history.size).toBe(0);
  });

  it('should ignore a state file with an unexpected shape', async () => {
    await fs.writeFile(
      path.join(outputDirectory, USAGE_STATE_FILE),
      JSON.stringify({ version: 1, items: { 'news-a': { lastUsedAt: 'yesterday', sequence: 1 } } }),
      'utf8'
    );

    const history = await store.load();

    expect(history.size).toBe(0);
  });
});
