import { Response } from 'express';

/**
 * Base Controller
 *
 * Response helpers shared by all controllers; errors go to the global handler
 */
export abstract class BaseController {
  /**
   * Send success response
   */
  protected sendSuccess<T>(res: Response, data: T, message?: string, status = 200): void {
    res.status(status).json({
      success: true,
      data,
      ...(message !== undefined && { message }),
    });
  }

  /**
   * Send a success response with list metadata
   */
  protected sendList<T>(res: Response, data: T[], meta: Record<string, unknown> = {}): void {
    res.json({
      success: true,
      data,
      meta: {
        count: data.length,
        ...meta,
      },
    });
  }
}
