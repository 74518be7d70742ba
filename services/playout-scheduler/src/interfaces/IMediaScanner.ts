import { ScannedMediaRecord } from '../models/MediaItem';

/**
 * Media Scanner Interface
 *
 * Single Responsibility: Inventory the media files available for playout
 */

export interface ScanResult {
  videoDirectory: string;
  records: ScannedMediaRecord[];
  /** Categories of leaf folders, including those holding no playable files */
  categories?: string[];
  /** Absolute path of the station ident when it was found in the tree */
  identPath?: string;
}

export interface IMediaScanner {
  /**
   * Walk the video directory and describe every playable file
   */
  scan(): Promise<ScanResult>;
}

/**
 * Media Probe Interface
 *
 * Single Responsibility: Read the playback duration of a media file
 */
export interface IMediaProbe {
  probeDurationSeconds(filePath: string): Promise<number>;
}
