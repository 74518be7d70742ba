import { Request, Response, NextFunction, RequestHandler } from 'express';
import Joi from 'joi';
import { GeneratePlaylistRequest } from '../interfaces/IPlaylistService';
import { ValidationError } from '../utils/errors';
import { isValidDate, todayIn } from '../utils/time';

/**
 * Validation Middleware
 *
 * Request validation for playlist operations
 */

const dateSchema = Joi.string()
  .custom((value: string, helpers) => (isValidDate(value) ? value : helpers.error('any.invalid')))
  .messages({ 'any.invalid': 'date must be a valid date formatted YYYY-MM-DD' });

const generatePlaylistSchema = Joi.object<Partial<GeneratePlaylistRequest>>({
  template: Joi.string()
    .trim()
    .pattern(/^[a-zA-Z0-9\-_]+$/)
    .default('default')
    .messages({
      'string.pattern.base': 'template can only contain letters, numbers, hyphens, and underscores',
    }),
  date: dateSchema.optional(),
  allowPartial: Joi.boolean().default(true),
  persist: Joi.boolean().default(true),
});

/**
 * Validate a playlist generation request body; the date defaults to today
 * in the channel's timezone
 */
export function validateGeneratePlaylist(timezone: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      const { error, value } = generatePlaylistSchema.validate(req.body ?? {}, { abortEarly: false });
      if (error || !value) {
        throw new ValidationError(
          'Invalid playlist generation request',
          error ? error.details.map(detail => detail.message) : []
        );
      }

      const request: GeneratePlaylistRequest = {
        template: value.template ?? 'default',
        date: value.date ?? todayIn(timezone),
        allowPartial: value.allowPartial ?? true,
        persist: value.persist ?? true,
      };
      req.body = request;
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Validate the :date route parameter
 */
export function validateDateParam(req: Request, res: Response, next: NextFunction): void {
  const { error } = dateSchema.required().validate(req.params.date);
  if (error) {
    next(new ValidationError('Invalid playlist date', error.details.map(detail => detail.message)));
    return;
  }
  next();
}
