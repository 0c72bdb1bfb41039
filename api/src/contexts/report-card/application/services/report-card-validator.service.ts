import { Inject, Injectable } from '@nestjs/common';
import {
  CLASS_FIELD,
  columnLetterToIndex,
  type FieldMappingVO,
  type RawTable,
} from '../../domain/value-objects';
import { InvalidColumnAddressError, TemplateFillError } from '../../domain/errors';
import { TEMPLATE_FILLER_PORT, type TemplateFillerPort } from '../ports';
import { countRecords, fileExists, isFieldFormat } from './utils';

export interface ValidationInput {
  excelPath: string;
  mappingPath: string;
  templatePath?: string;
  table: RawTable;
  mapping: FieldMappingVO | null;
  headerRowsToSkip: number;
  fieldFormats?: Record<string, string>;
  /** Why the mapping file could not be loaded, when it exists */
  mappingError?: string;
  /** Why the spreadsheet could not be read, when it exists */
  spreadsheetError?: string;
}

export interface ValidationOutcome {
  errors: string[];
  warnings: string[];
  totalStudents: number;
}

/**
 * Pre-flight checks. Every finding is collected; an empty error list is the only go signal.
 */
@Injectable()
export class ReportCardValidatorService {
  constructor(
    @Inject(TEMPLATE_FILLER_PORT)
    private readonly templateFiller: TemplateFillerPort,
  ) {}

  async validate(input: ValidationInput): Promise<ValidationOutcome> {
    const errors: string[] = [];
    const warnings: string[] = [];

    const excelExists = await fileExists(input.excelPath);
    const mappingExists = await fileExists(input.mappingPath);

    if (!excelExists) {
      errors.push(`Excel file not found: ${input.excelPath}`);
    }
    if (!mappingExists) {
      errors.push(`Mapping file not found: ${input.mappingPath}`);
    }

    if (excelExists && input.spreadsheetError) {
      errors.push(input.spreadsheetError);
    }
    if (mappingExists && input.mappingError) {
      errors.push(input.mappingError);
    }

    const totalStudents = countRecords(input.table, input.headerRowsToSkip);
    if (excelExists && !input.spreadsheetError && totalStudents === 0) {
      errors.push(`Excel file has no data after skipping ${input.headerRowsToSkip} header rows`);
    }

    const mapping = input.mapping;
    if (mappingExists && mapping?.isEmpty) {
      errors.push('Mapping file is empty');
    }

    if (mapping) {
      errors.push(...this.checkColumns(mapping, totalStudents > 0 ? input.table.columnCount : null));
      errors.push(...this.checkFieldFormats(mapping, input.fieldFormats));
    }

    if (input.templatePath !== undefined) {
      if (!(await fileExists(input.templatePath))) {
        errors.push(`Template file not found: ${input.templatePath}`);
      } else if (mapping) {
        try {
          warnings.push(...(await this.checkTemplatePlaceholders(input.templatePath, mapping)));
        } catch (error) {
          if (!(error instanceof TemplateFillError)) throw error;
          errors.push(error.message);
        }
      }
    }

    return { errors, warnings, totalStudents };
  }

  /**
   * availableColumns === null: no data rows, only address syntax is checked
   */
  private checkColumns(mapping: FieldMappingVO, availableColumns: number | null): string[] {
    const errors: string[] = [];

    for (const [key, address] of mapping.entries()) {
      let index: number;
      try {
        index = columnLetterToIndex(address);
      } catch (error) {
        if (error instanceof InvalidColumnAddressError) {
          errors.push(`Field "${key}": ${error.message}`);
          continue;
        }
        throw error;
      }

      if (availableColumns !== null && index >= availableColumns) {
        errors.push(
          `Column '${address}' for '${key}' exceeds data columns (${availableColumns} columns available)`,
        );
      }
    }

    return errors;
  }

  private checkFieldFormats(mapping: FieldMappingVO, fieldFormats: Record<string, string> | undefined): string[] {
    if (!fieldFormats) return [];

    const errors: string[] = [];
    for (const [key, format] of Object.entries(fieldFormats)) {
      if (mapping.columnOf(key) === undefined) {
        errors.push(`Format given for unknown field "${key}"`);
      } else if (!isFieldFormat(format)) {
        errors.push(`Unknown format "${format}" for field "${key}"`);
      }
    }
    return errors;
  }

  private async checkTemplatePlaceholders(templatePath: string, mapping: FieldMappingVO): Promise<string[]> {
    const known = new Set([...mapping.keys(), CLASS_FIELD]);
    const placeholders = await this.templateFiller.listPlaceholders(templatePath);

    return placeholders
      .filter((name) => !known.has(name))
      .map((name) => `Template placeholder {{${name}}} has no mapping entry and will be left empty`);
  }
}
