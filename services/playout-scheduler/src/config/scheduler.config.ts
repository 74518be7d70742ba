import path from 'path';
import Joi from 'joi';
import defaultCategoryMap from './category-map.json';
import { ValidationError } from '../utils/errors';
import { isKnownTimezone } from '../utils/time';

/**
 * Scheduler Configuration
 *
 * Read from the environment once at startup and validated before any
 * service is built.
 *
 * Environment Variables:
 * - PORT, NODE_ENV, CORS_ORIGINS
 * - RATE_LIMIT_WINDOW_MS, RATE_LIMIT_MAX: per-client request budget for /api
 * - VIDEO_DIRECTORY: category folders with the media files
 * - OUTPUT_DIRECTORY: playlists/YYYY/MM/YYYY-MM-DD.json and rotation state
 * - TEMPLATE_DIRECTORY: <name>.json schedule templates
 * - CHANNEL_NAME, TIMEZONE
 * - DURATION_TOLERANCE: allowed relative overrun of a slot target (0.05 = 5%)
 * - DEFAULT_DURATION_SECONDS: used when a file cannot be probed
 * - VIDEO_EXTENSIONS: comma separated, e.g. .mp4,.mkv
 * - PLAYLIST_FORMAT: document|ffplayout
 * - IDENT_FILE, IDENT_EVERY_N, IDENT_DURATION_SECONDS: station ident in ffplayout output
 * - FFPROBE_PATH
 */

export type PlaylistFormat = 'document' | 'ffplayout';

export interface SchedulerConfig {
  port: number;
  nodeEnv: string;
  corsOrigins: string[];
  rateLimit: {
    windowMs: number;
    max: number;
  };
  videoDirectory: string;
  outputDirectory: string;
  templateDirectory: string;
  channelName: string;
  timezone: string;
  durationTolerance: number;
  defaultDurationSeconds: number;
  videoExtensions: string[];
  playlistFormat: PlaylistFormat;
  identFile: string;
  identEveryN: number;
  identDurationSeconds: number;
  ffprobePath?: string;
  categoryMap: Record<string, string>;
}

interface EnvVars {
  PORT: number;
  NODE_ENV: string;
  CORS_ORIGINS: string;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX: number;
  VIDEO_DIRECTORY: string;
  OUTPUT_DIRECTORY: string;
  TEMPLATE_DIRECTORY: string;
  CHANNEL_NAME: string;
  TIMEZONE: string;
  DURATION_TOLERANCE: number;
  DEFAULT_DURATION_SECONDS: number;
  VIDEO_EXTENSIONS: string;
  PLAYLIST_FORMAT: PlaylistFormat;
  IDENT_FILE: string;
  IDENT_EVERY_N: number;
  IDENT_DURATION_SECONDS: number;
  FFPROBE_PATH?: string;
}

const envSchema = Joi.object<EnvVars>({
  PORT: Joi.number().port().default(3000),
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
  CORS_ORIGINS: Joi.string().default('http://localhost:3000'),
  RATE_LIMIT_WINDOW_MS: Joi.number().integer().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX: Joi.number().integer().positive().default(100),
  VIDEO_DIRECTORY: Joi.string().default(path.resolve(process.cwd(), 'media')),
  OUTPUT_DIRECTORY: Joi.string().default(path.resolve(process.cwd(), 'playlists')),
  TEMPLATE_DIRECTORY: Joi.string().default(path.resolve(process.cwd(), 'templates')),
  CHANNEL_NAME: Joi.string().trim().min(1).default('Channel 1'),
  TIMEZONE: Joi.string()
    .default('UTC')
    .custom((value: string, helpers) => (isKnownTimezone(value) ? value : helpers.error('any.invalid')))
    .messages({ 'any.invalid': 'TIMEZONE must be a known IANA timezone' }),
  DURATION_TOLERANCE: Joi.number().min(0).max(1).default(0.05),
  DEFAULT_DURATION_SECONDS: Joi.number().positive().default(900),
  VIDEO_EXTENSIONS: Joi.string().default('.mp4,.mkv,.mov,.avi,.flv'),
  PLAYLIST_FORMAT: Joi.string().valid('document', 'ffplayout').default('document'),
  IDENT_FILE: Joi.string().allow('').default('SPICA_BlagovestiTV.mp4'),
  IDENT_EVERY_N: Joi.number().integer().min(0).default(3),
  IDENT_DURATION_SECONDS: Joi.number().positive().default(25.066667),
  FFPROBE_PATH: Joi.string().allow('').optional(),
}).unknown(true);

const categoryMapSchema = Joi.object().pattern(Joi.string().min(1), Joi.string().min(1));

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

/**
 * Build the scheduler configuration from environment variables
 */
export function loadSchedulerConfig(
  env: NodeJS.ProcessEnv = process.env,
  categoryMap: Record<string, string> = defaultCategoryMap
): SchedulerConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: false, convert: true });
  if (error || !value) {
    throw new ValidationError(
      'Invalid scheduler configuration',
      error ? error.details.map(detail => detail.message) : []
    );
  }

  const mapResult = categoryMapSchema.validate(categoryMap);
  if (mapResult.error) {
    throw new ValidationError(
      'Invalid category map',
      mapResult.error.details.map(detail => detail.message)
    );
  }

  return {
    port: value.PORT,
    nodeEnv: value.NODE_ENV,
    corsOrigins: splitList(value.CORS_ORIGINS),
    rateLimit: {
      windowMs: value.RATE_LIMIT_WINDOW_MS,
      max: value.RATE_LIMIT_MAX,
    },
    videoDirectory: path.resolve(value.VIDEO_DIRECTORY),
    outputDirectory: path.resolve(value.OUTPUT_DIRECTORY),
    templateDirectory: path.resolve(value.TEMPLATE_DIRECTORY),
    channelName: value.CHANNEL_NAME,
    timezone: value.TIMEZONE,
    durationTolerance: value.DURATION_TOLERANCE,
    defaultDurationSeconds: value.DEFAULT_DURATION_SECONDS,
    videoExtensions: splitList(value.VIDEO_EXTENSIONS).map(extension =>
      (extension.startsWith('.') ? extension : `.${extension}`).toLowerCase()
    ),
    playlistFormat: value.PLAYLIST_FORMAT,
    identFile: value.IDENT_FILE,
    identEveryN: value.IDENT_EVERY_N,
    identDurationSeconds: value.IDENT_DURATION_SECONDS,
    ...(value.FFPROBE_PATH ? { ffprobePath: value.FFPROBE_PATH } : {}),
    categoryMap: { ...categoryMap },
  };
}
