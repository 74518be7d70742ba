import { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { IMediaProbe, IMediaScanner, ScanResult } from '../interfaces/IMediaScanner';
import { ScannedMediaRecord } from '../models/MediaItem';
import { InternalServerError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';

export interface MediaScannerOptions {
  videoDirectory: string;
  videoExtensions: string[];
  /** Folder-name fragment -> category, matched case-insensitively in key order */
  categoryMap: Record<string, string>;
  defaultDurationSeconds: number;
  identFile?: string;
}

/**
 * Media Scanner Service
 *
 * Every file sits in the category named by its nearest folder. Files are
 * returned sorted by path so repeated scans keep the same order.
 */
export class MediaScannerService implements IMediaScanner {
  private readonly logger = new Logger('MediaScannerService');
  private readonly extensions: Set<string>;

  constructor(
    private readonly options: MediaScannerOptions,
    private readonly probe: IMediaProbe
  ) {
    this.extensions = new Set(options.videoExtensions.map(extension => extension.toLowerCase()));
  }

  async scan(): Promise<ScanResult> {
    const videoDirectory = path.resolve(this.options.videoDirectory);

    if (!(await this.directoryExists(videoDirectory))) {
      this.logger.warn(`Video directory ${videoDirectory} does not exist, catalog will be empty`);
      return { videoDirectory, records: [] };
    }

    const leafFolders: string[] = [];
    const files = (await this.collectFiles(videoDirectory, leafFolders)).sort();
    const records: ScannedMediaRecord[] = [];
    let identPath: string | undefined;

    for (const filePath of files) {
      if (this.options.identFile && path.basename(filePath) === this.options.identFile) {
        identPath = filePath;
        continue;
      }

      const folder = path.dirname(filePath);
      if (folder === videoDirectory) {
        this.logger.debug(`Skipping ${filePath}: not inside a category folder`);
        continue;
      }

      records.push({
        filePath,
        category: this.categoryFor(path.basename(folder)),
        durationSeconds: await this.durationOf(filePath),
      });
    }

    // Leaf folders without playable files still declare their category
    const categories = [
      ...new Set(
        leafFolders
          .filter(folder => folder !== videoDirectory)
          .sort()
          .map(folder => this.categoryFor(path.basename(folder)))
      ),
    ];

    this.logger.info(`Scanned ${records.length} media files under ${videoDirectory}`);

    return {
      videoDirectory,
      records,
      categories,
      ...(identPath !== undefined && { identPath }),
    };
  }

  /**
   * Map a folder name to its logical category; unknown folders keep their own name
   */
  categoryFor(folderName: string): string {
    const normalized = folderName.toLowerCase();
    for (const [fragment, category] of Object.entries(this.options.categoryMap)) {
      if (normalized.includes(fragment.toLowerCase())) {
        return category;
      }
    }
    return normalized.trim().replace(/\s+/g, '_');
  }

  private async durationOf(filePath: string): Promise<number> {
    try {
      return await this.probe.probeDurationSeconds(filePath);
    } catch (error) {
      this.logger.warn(
        `Using default duration ${this.options.defaultDurationSeconds}s for ${filePath}: ${errorMessage(error)}`
      );
      return this.options.defaultDurationSeconds;
    }
  }

  private async collectFiles(directory: string, leafFolders: string[]): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      throw new InternalServerError(`Failed to read directory ${directory}: ${errorMessage(error)}`);
    }

    const files: string[] = [];
    let hasSubfolders = false;
    for (const entry of entries) {
      const entryPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        hasSubfolders = true;
        files.push(...(await this.collectFiles(entryPath, leafFolders)));
      } else if (entry.isFile() && this.extensions.has(path.extname(entry.name).toLowerCase())) {
        files.push(entryPath);
      }
    }
    if (!hasSubfolders) {
      leafFolders.push(directory);
    }
    return files;
  }

  private async directoryExists(directory: string): Promise<boolean> {
    try {
      const stats = await fs.stat(directory);
      return stats.isDirectory();
    } catch {
      return false;
    }
  }
}
