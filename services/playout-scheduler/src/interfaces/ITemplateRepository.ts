import { ScheduleTemplate } from '../models/ScheduleTemplate';

/**
 * Template Repository Interface
 *
 * Single Responsibility: Look up schedule templates by name
 */
export interface ITemplateRepository {
  /**
   * Names of all available templates, sorted
   */
  list(): Promise<string[]>;

  /**
   * Load and validate a template; throws NotFoundError for unknown names
   */
  findByName(name: string): Promise<ScheduleTemplate>;
}
