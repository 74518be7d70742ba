import { PlaylistFormat } from '../config/scheduler.config';
import { CategorySummary } from '../models/MediaCatalog';
import { PlaylistDocument } from '../models/PlaylistDocument';
import { ScheduleTemplate } from '../models/ScheduleTemplate';
import { StoredPlaylist } from './IPlaylistStorage';

/**
 * Playlist Service Interface
 *
 * Single Responsibility: Coordinate scanning, assembly and persistence of playlists
 */

export interface GeneratePlaylistRequest {
  template: string;
  /** Broadcast date, YYYY-MM-DD */
  date: string;
  /** When false, a playlist with unfillable slots is rejected instead of returned */
  allowPartial: boolean;
  /** Write the playlist and the rotation state */
  persist: boolean;
}

export interface GeneratePlaylistResult {
  document: PlaylistDocument;
  format: PlaylistFormat;
  playlistFile?: string;
}

export interface CatalogOverview {
  videoDirectory: string;
  identPath?: string;
  totalItems: number;
  categories: CategorySummary[];
}

export interface IPlaylistService {
  /**
   * Scan storage and describe the catalog by category
   */
  getCatalog(): Promise<CatalogOverview>;

  /**
   * Names of available schedule templates
   */
  listTemplates(): Promise<string[]>;

  /**
   * Load one schedule template
   */
  getTemplate(name: string): Promise<ScheduleTemplate>;

  /**
   * Build the playlist for a date from a template and the current catalog
   */
  generatePlaylist(request: GeneratePlaylistRequest): Promise<GeneratePlaylistResult>;

  /**
   * Stored playlist for a date, or null
   */
  getPlaylist(date: string): Promise<StoredPlaylist | null>;
}
