import fs from 'fs/promises';
import path from 'path';
import Joi from 'joi';
import { IUsageHistoryStore } from '../interfaces/IPlaylistStorage';
import { UsageHistory, UsageSnapshot } from '../models/UsageHistory';
import { InternalServerError, errorMessage, isFileNotFound } from '../utils/errors';
import { Logger } from '../utils/Logger';

export const USAGE_STATE_FILE = '.playlist_state.json';

interface StoredUsageState {
  version: 1;
  items: Record<string, { lastUsedAt: string; sequence: number }>;
}

const stateSchema = Joi.object<StoredUsageState>({
  version: Joi.number().valid(1).required(),
  items: Joi.object()
    .pattern(
      Joi.string(),
      Joi.object({
        lastUsedAt: Joi.string().isoDate().required(),
        sequence: Joi.number().integer().min(0).required(),
      })
    )
    .required(),
});

/**
 * JSON Usage History Store
 *
 * Rotation state lives next to the playlists so consecutive days keep
 * rotating instead of starting over. A missing or corrupt file means an
 * empty history.
 */
export class JsonUsageHistoryStore implements IUsageHistoryStore {
  private readonly logger = new Logger('JsonUsageHistoryStore');
  private readonly filePath: string;

  constructor(outputDirectory: string) {
    this.filePath = path.join(outputDirectory, USAGE_STATE_FILE);
  }

  async load(): Promise<UsageHistory> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return new UsageHistory();
      }
      throw new InternalServerError(`Failed to read rotation state: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn(`Ignoring unreadable rotation state ${this.filePath}: ${errorMessage(error)}`);
      return new UsageHistory();
    }

    const { error, value } = stateSchema.validate(parsed);
    if (error || !value) {
      this.logger.warn(`Ignoring malformed rotation state ${this.filePath}: ${error?.message ?? 'empty'}`);
      return new UsageHistory();
    }

    const snapshot: UsageSnapshot = {};
    for (const [itemId, record] of Object.entries(value.items)) {
      snapshot[itemId] = { lastUsedAt: Date.parse(record.lastUsedAt), sequence: record.sequence };
    }
    return new UsageHistory(snapshot);
  }

  async save(history: UsageHistory): Promise<void> {
    const state: StoredUsageState = { version: 1, items: {} };
    for (const [itemId, record] of Object.entries(history.snapshot())) {
      state.items[itemId] = {
        lastUsedAt: new Date(record.lastUsedAt).toISOString(),
        sequence: record.sequence,
      };
    }

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(state, null, 2), 'utf8');
    } catch (error) {
      throw new InternalServerError(`Failed to write rotation state: ${errorMessage(error)}`);
    }
  }
}
