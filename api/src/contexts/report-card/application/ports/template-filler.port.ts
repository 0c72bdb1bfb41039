import type { FieldDict } from '../../domain/value-objects';

/**
 * Template filling port
 * Produces one rendered document per field dictionary.
 */
export interface TemplateFillerPort {
  /**
   * Fill the template and write it to outputPath. Resolves to the written path.
   */
  fill(templatePath: string, fields: FieldDict, outputPath: string): Promise<string>;

  /**
   * Placeholder names the template declares
   */
  listPlaceholders(templatePath: string): Promise<string[]>;
}

export const TEMPLATE_FILLER_PORT = Symbol('TEMPLATE_FILLER_PORT');
