import { Request, Response } from 'express';
import { IPlaylistService } from '../interfaces/IPlaylistService';
import { BaseController } from './BaseController';

/**
 * Catalog Controller
 *
 * Single Responsibility: Expose the media catalog and schedule templates
 */
export class CatalogController extends BaseController {
  constructor(private readonly playlistService: IPlaylistService) {
    super();
  }

  /**
   * GET /api/v1/catalog
   */
  getCatalog = async (req: Request, res: Response): Promise<void> => {
    const catalog = await this.playlistService.getCatalog();
    this.sendSuccess(res, catalog);
  };

  /**
   * GET /api/v1/templates
   */
  listTemplates = async (req: Request, res: Response): Promise<void> => {
    const templates = await this.playlistService.listTemplates();
    this.sendList(res, templates);
  };

  /**
   * GET /api/v1/templates/:name
   */
  getTemplate = async (req: Request, res: Response): Promise<void> => {
    const template = await this.playlistService.getTemplate(req.params.name);
    this.sendSuccess(res, template.toJSON());
  };
}
