import { Router } from 'express';
import { CatalogController } from '../controllers/CatalogController';
import { PlaylistController } from '../controllers/PlaylistController';
import { asyncHandler } from '../middleware/errorHandlers';
import { validateDateParam, validateGeneratePlaylist } from '../middleware/validation';

/**
 * Playlist Routes
 *
 * Single Responsibility: Define HTTP routes for playlist operations
 * Dependency Inversion: Receives controller through dependency injection
 */
export function createPlaylistRoutes(playlistController: PlaylistController, timezone: string): Router {
  const router = Router();

  /**
   * @route   POST /api/v1/playlists/generate
   * @desc    Generate the playlist for a date from a schedule template
   */
  router.post(
    '/generate',
    validateGeneratePlaylist(timezone),
    asyncHandler(playlistController.generatePlaylist)
  );

  /**
   * @route   GET /api/v1/playlists/:date
   * @desc    Get the stored playlist for a date
   */
  router.get('/:date', validateDateParam, asyncHandler(playlistController.getPlaylist));

  return router;
}

/**
 * Catalog and template routes
 */
export function createCatalogRoutes(catalogController: CatalogController): Router {
  const router = Router();

  /**
   * @route   GET /api/v1/catalog
   * @desc    List discovered media by category
   */
  router.get('/catalog', asyncHandler(catalogController.getCatalog));

  /**
   * @route   GET /api/v1/templates
   * @desc    List schedule templates
   */
  router.get('/templates', asyncHandler(catalogController.listTemplates));

  /**
   * @route   GET /api/v1/templates/:name
   * @desc    Get one schedule template
   */
  router.get('/templates/:name', asyncHandler(catalogController.getTemplate));

  return router;
}
