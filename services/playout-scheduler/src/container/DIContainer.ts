import { SchedulerConfig } from '../config/scheduler.config';
import { CatalogController } from '../controllers/CatalogController';
import { PlaylistController } from '../controllers/PlaylistController';
import { IMediaProbe, IMediaScanner } from '../interfaces/IMediaScanner';
import { IPlaylistAssembler } from '../interfaces/IPlaylistAssembler';
import { IPlaylistService } from '../interfaces/IPlaylistService';
import { IPlaylistStorage, IUsageHistoryStore } from '../interfaces/IPlaylistStorage';
import { ISelectionPolicy } from '../interfaces/ISelectionPolicy';
import { ITemplateRepository } from '../interfaces/ITemplateRepository';
import { FileTemplateRepository } from '../repositories/FileTemplateRepository';
import { FfprobeMediaProbe } from '../services/FfprobeMediaProbe';
import { JsonUsageHistoryStore } from '../services/JsonUsageHistoryStore';
import { LocalPlaylistStorageService } from '../services/LocalPlaylistStorageService';
import { MediaScannerService } from '../services/MediaScannerService';
import { PlaylistAssembler } from '../services/PlaylistAssembler';
import { PlaylistService } from '../services/PlaylistService';
import { RotationSelectionPolicy } from '../services/RotationSelectionPolicy';

export interface ContainerOverrides {
  mediaProbe?: IMediaProbe;
  scanner?: IMediaScanner;
  templateRepository?: ITemplateRepository;
  storage?: IPlaylistStorage;
  historyStore?: IUsageHistoryStore;
  now?: () => Date;
}

/**
 * Dependency Injection Container
 *
 * Single Responsibility: Manage object creation and dependencies
 * Dependency Inversion: High-level modules depend on abstractions
 */
export class DIContainer {
  private mediaProbe: IMediaProbe | null = null;
  private scanner: IMediaScanner | null = null;
  private templateRepository: ITemplateRepository | null = null;
  private storage: IPlaylistStorage | null = null;
  private historyStore: IUsageHistoryStore | null = null;
  private selectionPolicy: ISelectionPolicy | null = null;
  private assembler: IPlaylistAssembler | null = null;
  private playlistService: IPlaylistService | null = null;
  private playlistController: PlaylistController | null = null;
  private catalogController: CatalogController | null = null;
  private now?: () => Date;

  constructor(private readonly config: SchedulerConfig) {}

  /**
   * Initialize all services with proper dependency injection
   */
  initialize(): void {
    // Initialize in dependency order
    this.initializeCollaborators();
    this.initializeServices();
    this.initializeControllers();
  }

  /**
   * File system and media collaborators
   */
  private initializeCollaborators(): void {
    if (!this.mediaProbe) {
      this.mediaProbe = new FfprobeMediaProbe(this.config.ffprobePath);
    }

    if (!this.scanner) {
      this.scanner = new MediaScannerService(
        {
          videoDirectory: this.config.videoDirectory,
          videoExtensions: this.config.videoExtensions,
          categoryMap: this.config.categoryMap,
          defaultDurationSeconds: this.config.defaultDurationSeconds,
          identFile: this.config.identFile,
        },
        this.mediaProbe
      );
    }

    if (!this.templateRepository) {
      this.templateRepository = new FileTemplateRepository(this.config.templateDirectory);
    }

    if (!this.storage) {
      this.storage = new LocalPlaylistStorageService(this.config.outputDirectory);
    }

    if (!this.historyStore) {
      this.historyStore = new JsonUsageHistoryStore(this.config.outputDirectory);
    }
  }

  /**
   * Initialize service layer with injected dependencies
   */
  private initializeServices(): void {
    if (!this.selectionPolicy) {
      this.selectionPolicy = new RotationSelectionPolicy(this.config.durationTolerance);
    }

    if (!this.assembler) {
      this.assembler = new PlaylistAssembler(this.selectionPolicy);
    }

    if (
      !this.playlistService &&
      this.scanner &&
      this.templateRepository &&
      this.storage &&
      this.historyStore
    ) {
      this.playlistService = new PlaylistService(
        this.scanner,
        this.templateRepository,
        this.assembler,
        this.storage,
        this.historyStore,
        {
          channelName: this.config.channelName,
          playlistFormat: this.config.playlistFormat,
          identEveryN: this.config.identEveryN,
          identDurationSeconds: this.config.identDurationSeconds,
          ...(this.now && { now: this.now }),
        }
      );
    }
  }

  /**
   * Initialize controller layer with injected services
   */
  private initializeControllers(): void {
    if (!this.playlistService) {
      return;
    }

    if (!this.playlistController) {
      this.playlistController = new PlaylistController(this.playlistService);
    }

    if (!this.catalogController) {
      this.catalogController = new CatalogController(this.playlistService);
    }
  }

  /**
   * Get Playlist Controller instance
   */
  getPlaylistController(): PlaylistController {
    if (!this.playlistController) {
      throw new Error('PlaylistController not initialized. Call initialize() first.');
    }
    return this.playlistController;
  }

  /**
   * Get Catalog Controller instance
   */
  getCatalogController(): CatalogController {
    if (!this.catalogController) {
      throw new Error('CatalogController not initialized. Call initialize() first.');
    }
    return this.catalogController;
  }

  /**
   * Create a new instance for testing with substitute collaborators
   */
  static createTestContainer(config: SchedulerConfig, overrides: ContainerOverrides = {}): DIContainer {
    const container = new DIContainer(config);

    container.mediaProbe = overrides.mediaProbe ?? null;
    container.scanner = overrides.scanner ?? null;
    container.templateRepository = overrides.templateRepository ?? null;
    container.storage = overrides.storage ?? null;
    container.historyStore = overrides.historyStore ?? null;
    container.now = overrides.now;

    container.initialize();

    return container;
  }
}
