/**
 * Raw spreadsheet grid, read positionally.
 * Header rows are ordinary rows here; skipping them is the extractor's job.
 */

export type CellValue = string | number | boolean | Date | null;

export type RawRow = readonly CellValue[];

export interface NamedSheet {
  name: string;
  rows: RawRow[];
}

export interface RawTable {
  sheetName: string | null;
  rows: readonly RawRow[];
  columnCount: number;
}

export interface StudentRecord {
  rowNumber: number; // 1-based, as shown in the spreadsheet
  cells: RawRow;
}

export class RawTableFactory {
  static create(sheetName: string | null, rows: readonly RawRow[]): RawTable {
    const columnCount = rows.reduce((max, row) => Math.max(max, row.length), 0);
    return { sheetName, rows, columnCount };
  }

  static empty(): RawTable {
    return { sheetName: null, rows: [], columnCount: 0 };
  }
}
