import { Logger } from '@nestjs/common';
import {
  CLASS_FIELD,
  columnLetterToIndex,
  type CellValue,
  type FieldDict,
  type FieldMappingVO,
  type StudentRecord,
} from '../../domain/value-objects';
import type { RecordProcessingWarning } from '../../domain/errors';
import { FIELD_FORMATTERS, type FieldFormat, type ValueNormalizer } from './utils';

export interface RecordProcessorOptions {
  normalizer: ValueNormalizer;
  fieldFormats?: Readonly<Record<string, FieldFormat>>;
  onWarning?: (warning: RecordProcessingWarning) => void;
}

interface ResolvedColumn {
  key: string;
  address: string;
  index: number;
  format?: FieldFormat;
}

/**
 * Builds one FieldDict per student row.
 * Column addresses are resolved once; an unresolvable address throws InvalidColumnAddressError.
 */
export class RecordProcessor {
  private readonly logger = new Logger(RecordProcessor.name);
  private readonly columns: ResolvedColumn[];
  private readonly normalizer: ValueNormalizer;
  private readonly onWarning?: (warning: RecordProcessingWarning) => void;

  constructor(mapping: FieldMappingVO, options: RecordProcessorOptions) {
    this.normalizer = options.normalizer;
    this.onWarning = options.onWarning;
    this.columns = mapping.entries().map(([key, address]) => ({
      key,
      address,
      index: columnLetterToIndex(address),
      format: options.fieldFormats?.[key],
    }));
  }

  process(record: StudentRecord, className: string): FieldDict {
    const fields = new Map<string, string>();

    for (const column of this.columns) {
      let raw: CellValue | undefined;
      if (column.index < record.cells.length) {
        raw = record.cells[column.index];
      } else {
        this.warn({
          rowNumber: record.rowNumber,
          field: column.key,
          columnAddress: column.address,
          message: `Row ${record.rowNumber}: column ${column.address} for "${column.key}" is out of range (${record.cells.length} cells)`,
        });
      }

      let value = this.normalizer.normalize(raw);
      if (column.format && !this.normalizer.isSentinel(value)) {
        value = FIELD_FORMATTERS[column.format](value);
      }
      fields.set(column.key, value);
    }

    fields.set(CLASS_FIELD, className.replace(/_/g, ' '));

    return fields;
  }

  private warn(warning: RecordProcessingWarning): void {
    this.logger.warn(warning.message);
    this.onWarning?.(warning);
  }
}
