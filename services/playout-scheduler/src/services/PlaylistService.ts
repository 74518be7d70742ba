import { PlaylistFormat } from '../config/scheduler.config';
import { IMediaScanner } from '../interfaces/IMediaScanner';
import { IPlaylistAssembler } from '../interfaces/IPlaylistAssembler';
import { IPlaylistStorage, IUsageHistoryStore, StoredPlaylist } from '../interfaces/IPlaylistStorage';
import {
  CatalogOverview,
  GeneratePlaylistRequest,
  GeneratePlaylistResult,
  IPlaylistService,
} from '../interfaces/IPlaylistService';
import { ITemplateRepository } from '../interfaces/ITemplateRepository';
import { MediaCatalog } from '../models/MediaCatalog';
import { PlaylistDocument } from '../models/PlaylistDocument';
import { ScheduleTemplate } from '../models/ScheduleTemplate';
import { UnfillableSlotsError, ValidationError } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { isValidDate } from '../utils/time';
import { PlayoutProgramFormatter } from './PlayoutProgramFormatter';

export interface PlaylistServiceOptions {
  channelName: string;
  playlistFormat: PlaylistFormat;
  identEveryN: number;
  identDurationSeconds: number;
  now?: () => Date;
}

/**
 * Playlist Service Implementation
 *
 * Each generation works on its own catalog snapshot and its own copy of the
 * rotation state, so concurrent requests do not share mutable state.
 * Rotation state is written back only when the playlist itself is written.
 */
export class PlaylistService implements IPlaylistService {
  private readonly logger = new Logger('PlaylistService');
  private readonly formatter = new PlayoutProgramFormatter();
  private readonly now: () => Date;

  constructor(
    private readonly scanner: IMediaScanner,
    private readonly templateRepository: ITemplateRepository,
    private readonly assembler: IPlaylistAssembler,
    private readonly storage: IPlaylistStorage,
    private readonly historyStore: IUsageHistoryStore,
    private readonly options: PlaylistServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async getCatalog(): Promise<CatalogOverview> {
    const scan = await this.scanner.scan();
    const catalog = MediaCatalog.fromRecords(scan.records, scan.categories);

    return {
      videoDirectory: scan.videoDirectory,
      ...(scan.identPath !== undefined && { identPath: scan.identPath }),
      totalItems: catalog.size,
      categories: catalog.summarize(),
    };
  }

  async listTemplates(): Promise<string[]> {
    return this.templateRepository.list();
  }

  async getTemplate(name: string): Promise<ScheduleTemplate> {
    return this.templateRepository.findByName(name);
  }

  async generatePlaylist(request: GeneratePlaylistRequest): Promise<GeneratePlaylistResult> {
    if (!isValidDate(request.date)) {
      throw new ValidationError('Invalid playlist date', [`date must be formatted YYYY-MM-DD, got "${request.date}"`]);
    }

    // Template problems are reported before anything is scanned
    const template = await this.templateRepository.findByName(request.template);

    const scan = await this.scanner.scan();
    const catalog = MediaCatalog.fromRecords(scan.records, scan.categories);
    const history = await this.historyStore.load();

    const missing = template.requiredCategories().filter(category => catalog.isEmpty(category));
    if (missing.length > 0) {
      this.logger.warn(`Catalog has no items for: ${missing.join(', ')}`);
    }

    const document = this.assembler.assemble(template, catalog, {
      channel: this.options.channelName,
      date: request.date,
      generatedAt: this.now(),
      history,
    });

    if (!request.allowPartial && !document.isComplete()) {
      throw new UnfillableSlotsError(
        `${document.unfillable.length} slot(s) of template "${template.name}" could not be filled`,
        document.toJSON().unfillable
      );
    }

    const result: GeneratePlaylistResult = { document, format: this.options.playlistFormat };
    if (!request.persist) {
      return result;
    }

    result.playlistFile = await this.storage.writePlaylist(
      request.date,
      this.serialize(document, scan.identPath)
    );
    // An empty catalog usually means unreachable storage, not deleted media
    if (catalog.size > 0) {
      const dropped = history.retainOnly(catalog.itemIds());
      if (dropped > 0) {
        this.logger.info(`Dropped rotation state for ${dropped} item(s) no longer on storage`);
      }
    }
    await this.historyStore.save(history);

    this.logger.info(`Playlist for ${request.date} written to ${result.playlistFile}`);
    return result;
  }

  async getPlaylist(date: string): Promise<StoredPlaylist | null> {
    return this.storage.readPlaylist(date);
  }

  private serialize(document: PlaylistDocument, identPath?: string): StoredPlaylist {
    if (this.options.playlistFormat === 'ffplayout') {
      return this.formatter.format(document, {
        identPath,
        everyN: this.options.identEveryN,
        durationSeconds: this.options.identDurationSeconds,
      });
    }
    return document.toJSON();
  }
}
