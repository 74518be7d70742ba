import { Request, Response } from 'express';
import { GeneratePlaylistRequest, IPlaylistService } from '../interfaces/IPlaylistService';
import { NotFoundError } from '../utils/errors';
import { BaseController } from './BaseController';

/**
 * Playlist Controller
 *
 * Single Responsibility: Handle HTTP requests for playlist generation
 * Dependency Inversion: Depends on IPlaylistService abstraction
 */
export class PlaylistController extends BaseController {
  constructor(private readonly playlistService: IPlaylistService) {
    super();
  }

  /**
   * Generate a playlist
   * POST /api/v1/playlists/generate
   */
  generatePlaylist = async (req: Request, res: Response): Promise<void> => {
    const request: GeneratePlaylistRequest = req.body;
    const result = await this.playlistService.generatePlaylist(request);
    const document = result.document;

    this.sendSuccess(
      res,
      {
        document: document.toJSON(),
        format: result.format,
        playlistFile: result.playlistFile ?? null,
        totalEntries: document.entries.length,
        unfillableCount: document.unfillable.length,
        warningCount: document.warningCount(),
      },
      document.isComplete()
        ? `Playlist generated successfully for ${document.date}`
        : `Playlist generated for ${document.date} with ${document.unfillable.length} unfillable slot(s)`,
      201
    );
  };

  /**
   * Get the stored playlist for a date
   * GET /api/v1/playlists/:date
   */
  getPlaylist = async (req: Request, res: Response): Promise<void> => {
    const { date } = req.params;
    const playlist = await this.playlistService.getPlaylist(date);

    if (!playlist) {
      throw new NotFoundError(`No playlist stored for ${date}`);
    }

    this.sendSuccess(res, playlist);
  };
}
