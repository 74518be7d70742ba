import fs from 'fs/promises';
import path from 'path';
import Joi from 'joi';
import { IPlaylistStorage, StoredPlaylist } from '../interfaces/IPlaylistStorage';
import { EntryWarningCode } from '../models/PlaylistDocument';
import { InternalServerError, ValidationError, errorMessage, isFileNotFound } from '../utils/errors';
import { datePathSegments, isValidDate } from '../utils/time';

const timeOfDay = Joi.string().pattern(/^\d{2}:\d{2}:\d{2}$/);

const documentSchema = Joi.object({
  channel: Joi.string().required(),
  date: Joi.string().required(),
  template: Joi.string().required(),
  generatedAt: Joi.string().isoDate().required(),
  entries: Joi.array()
    .items(
      Joi.object({
        slotIndex: Joi.number().integer().min(0).required(),
        startTime: timeOfDay.required(),
        filePath: Joi.string().required(),
        category: Joi.string().required(),
        durationSeconds: Joi.number().positive().required(),
        warnings: Joi.array().items(
          Joi.object({
            code: Joi.string().valid(...Object.values(EntryWarningCode)).required(),
            message: Joi.string().required(),
          })
        ),
      })
    )
    .required(),
  unfillable: Joi.array()
    .items(
      Joi.object({
        slotIndex: Joi.number().integer().min(0).required(),
        startTime: timeOfDay.required(),
        category: Joi.string().required(),
        reason: Joi.string().required(),
      })
    )
    .required(),
});

const programSchema = Joi.object({
  channel: Joi.string().required(),
  date: Joi.string().required(),
  program: Joi.array()
    .items(
      Joi.object({
        in: Joi.number().min(0).required(),
        out: Joi.number().min(0).required(),
        duration: Joi.number().min(0).required(),
        source: Joi.string().required(),
      })
    )
    .required(),
});

const storedPlaylistSchema = Joi.alternatives<StoredPlaylist>().try(documentSchema, programSchema);

/**
 * Local File System Playlist Storage
 *
 * Layout expected by the player: <outputDirectory>/YYYY/MM/YYYY-MM-DD.json
 */
export class LocalPlaylistStorageService implements IPlaylistStorage {
  constructor(private readonly outputDirectory: string) {}

  async writePlaylist(date: string, playlist: StoredPlaylist): Promise<string> {
    const fullPath = this.pathFor(date);

    try {
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, JSON.stringify(playlist, null, 2), 'utf8');
    } catch (error) {
      throw new InternalServerError(`Failed to write playlist for ${date}: ${errorMessage(error)}`);
    }

    return fullPath;
  }

  async readPlaylist(date: string): Promise<StoredPlaylist | null> {
    const fullPath = this.pathFor(date);

    let raw: string;
    try {
      raw = await fs.readFile(fullPath, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return null;
      }
      throw new InternalServerError(`Failed to read playlist for ${date}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new InternalServerError(`Stored playlist for ${date} is not valid JSON: ${errorMessage(error)}`);
    }

    const { error, value } = storedPlaylistSchema.validate(parsed, { convert: false });
    if (error || !value) {
      throw new InternalServerError(`Stored playlist for ${date} is malformed: ${error?.message ?? 'empty'}`);
    }
    return value;
  }

  pathFor(date: string): string {
    if (!isValidDate(date)) {
      throw new ValidationError('Invalid playlist date', [`date must be formatted YYYY-MM-DD, got "${date}"`]);
    }
    return path.join(this.outputDirectory, ...datePathSegments(date));
  }
}
