import Joi from 'joi';
import { TemplateDefinition } from '../models/ScheduleTemplate';

/**
 * Template Validation Module
 *
 * Single Responsibility: Check the shape of template files before they are parsed
 */

/**
 * Template as stored on disk; the name defaults to the file name
 */
export type TemplateFile = Omit<TemplateDefinition, 'name'> & { name?: string };

export interface ValidationResult<T> {
  isValid: boolean;
  errors: string[];
  value?: T;
}

const slotSchema = Joi.object({
  startTime: Joi.string()
    .trim()
    .pattern(/^\d{2}:\d{2}(:\d{2})?$/)
    .required()
    .messages({
      'string.pattern.base': 'startTime must be formatted HH:mm or HH:mm:ss',
      'any.required': 'startTime is required',
    }),

  category: Joi.string()
    .trim()
    .min(1)
    .max(100)
    .required()
    .messages({
      'string.empty': 'category is required',
      'any.required': 'category is required',
    }),

  targetDurationSeconds: Joi.number()
    .positive()
    .max(24 * 60 * 60)
    .required()
    .messages({
      'number.base': 'targetDurationSeconds must be a number',
      'number.positive': 'targetDurationSeconds must be positive',
      'any.required': 'targetDurationSeconds is required',
    }),
});

const templateSchema = Joi.object<TemplateFile>({
  name: Joi.string()
    .trim()
    .pattern(/^[a-zA-Z0-9\-_]+$/)
    .optional()
    .messages({
      'string.pattern.base': 'Template name can only contain letters, numbers, hyphens, and underscores',
    }),

  description: Joi.string().max(2000).allow('').optional(),

  slots: Joi.array()
    .items(slotSchema)
    .min(1)
    .required()
    .messages({
      'array.min': 'Template must contain at least one slot',
    }),
});

/**
 * Validate a template read from the template directory
 */
export function validateTemplateFile(data: unknown): ValidationResult<TemplateFile> {
  const { error, value } = templateSchema.validate(data, { abortEarly: false });

  if (error) {
    return {
      isValid: false,
      errors: error.details.map(detail => detail.message),
    };
  }

  return { isValid: true, errors: [], value };
}
