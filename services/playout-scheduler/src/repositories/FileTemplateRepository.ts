import fs from 'fs/promises';
import path from 'path';
import { ITemplateRepository } from '../interfaces/ITemplateRepository';
import { ScheduleTemplate } from '../models/ScheduleTemplate';
import { validateTemplateFile } from '../validators/TemplateValidator';
import {
  InternalServerError,
  InvalidTemplateError,
  NotFoundError,
  ValidationError,
  errorMessage,
  isFileNotFound,
} from '../utils/errors';

const TEMPLATE_NAME_PATTERN = /^[a-zA-Z0-9\-_]+$/;

/**
 * File Template Repository
 *
 * One JSON file per template: <templateDirectory>/<name>.json
 */
export class FileTemplateRepository implements ITemplateRepository {
  constructor(private readonly templateDirectory: string) {}

  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.templateDirectory);
    } catch (error) {
      if (isFileNotFound(error)) {
        return [];
      }
      throw new InternalServerError(`Failed to list templates: ${errorMessage(error)}`);
    }

    return files
      .filter(file => path.extname(file) === '.json')
      .map(file => path.basename(file, '.json'))
      .filter(name => TEMPLATE_NAME_PATTERN.test(name))
      .sort();
  }

  async findByName(name: string): Promise<ScheduleTemplate> {
    if (!TEMPLATE_NAME_PATTERN.test(name)) {
      throw new ValidationError('Invalid template name', [
        'Template name can only contain letters, numbers, hyphens, and underscores',
      ]);
    }

    const filePath = path.join(this.templateDirectory, `${name}.json`);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isFileNotFound(error)) {
        throw new NotFoundError(`Template not found: ${name}`);
      }
      throw new InternalServerError(`Failed to read template ${name}: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new InvalidTemplateError(`Template "${name}" is not valid JSON`, [errorMessage(error)]);
    }

    const { isValid, errors, value } = validateTemplateFile(parsed);
    if (!isValid || !value) {
      throw new InvalidTemplateError(`Template "${name}" is invalid`, errors);
    }

    return ScheduleTemplate.fromDefinition({ ...value, name: value.name ?? name });
  }
}
