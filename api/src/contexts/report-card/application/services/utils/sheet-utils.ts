import {
  RawTableFactory,
  type CellValue,
  type NamedSheet,
  type RawRow,
  type RawTable,
  type StudentRecord,
} from '../../../domain/value-objects';
import { isInvalidDate } from './value-normalizer';

export function isBlankCell(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim() === '';
  return isInvalidDate(value);
}

export function isBlankRow(row: RawRow): boolean {
  return row.every((cell) => isBlankCell(cell));
}

/**
 * First sheet with at least one row and one column, in stored order.
 * No such sheet -> empty table; the validator reports it.
 */
export function selectDataSheet(sheets: readonly NamedSheet[]): RawTable {
  for (const sheet of sheets) {
    const table = RawTableFactory.create(sheet.name, sheet.rows);
    if (table.rows.length > 0 && table.columnCount > 0) {
      return table;
    }
  }
  return RawTableFactory.empty();
}

/**
 * Rows after the header block, skipping blank ones. Single pass, lazy.
 */
export function* extractRecords(table: RawTable, skipCount: number): Generator<StudentRecord> {
  for (let i = Math.max(0, skipCount); i < table.rows.length; i++) {
    const cells = table.rows[i];
    if (isBlankRow(cells)) continue;
    yield { rowNumber: i + 1, cells };
  }
}

export function countRecords(table: RawTable, skipCount: number): number {
  let count = 0;
  for (const _record of extractRecords(table, skipCount)) {
    count++;
  }
  return count;
}
