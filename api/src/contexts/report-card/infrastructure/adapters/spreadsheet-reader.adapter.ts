import { Injectable, Logger } from '@nestjs/common';
import * as ExcelJS from 'exceljs';
import * as XLSX from 'xlsx';
import * as path from 'path';
import type { WorkbookReaderPort } from '../../application/ports';
import type { CellValue, NamedSheet, RawRow } from '../../domain/value-objects';
import { isBlankRow } from '../../application/services/utils';

const EXCELJS_EXTENSIONS = new Set(['.xlsx', '.xlsm']);
const SHEETJS_EXTENSIONS = new Set(['.xls', '.ods', '.csv']);

export const SUPPORTED_SPREADSHEET_EXTENSIONS = [...EXCELJS_EXTENSIONS, ...SHEETJS_EXTENSIONS];

/**
 * ExcelJS cell -> plain value.
 * Rich text is joined, formulas yield their cached result, error cells read as empty.
 */
export function toCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;

  if ('richText' in value) {
    return (value.richText || []).map((t) => t.text).join('');
  }
  if ('error' in value) {
    return null;
  }
  if ('result' in value) {
    const result = value.result;
    if (result instanceof Date) return result;
    if (typeof result === 'string' || typeof result === 'number' || typeof result === 'boolean') return result;
    return null;
  }
  if ('text' in value) {
    return value.text;
  }
  return null;
}

function toSheetJsCellValue(value: unknown): CellValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  return null;
}

function trimTrailingBlankRows(rows: RawRow[]): RawRow[] {
  let end = rows.length;
  while (end > 0 && isBlankRow(rows[end - 1])) {
    end--;
  }
  return rows.slice(0, end);
}

/**
 * Reads every sheet positionally, without header interpretation.
 * .xlsx/.xlsm through ExcelJS; .xls, .ods and .csv through SheetJS.
 */
@Injectable()
export class SpreadsheetReaderAdapter implements WorkbookReaderPort {
  private readonly logger = new Logger(SpreadsheetReaderAdapter.name);

  async readSheets(filePath: string): Promise<NamedSheet[]> {
    const ext = path.extname(filePath).toLowerCase();

    if (EXCELJS_EXTENSIONS.has(ext)) {
      return this.readWithExcelJs(filePath);
    }
    if (SHEETJS_EXTENSIONS.has(ext)) {
      return this.readWithSheetJs(filePath, ext);
    }

    throw new Error(
      `Unsupported spreadsheet format "${ext || path.basename(filePath)}". Supported: ${SUPPORTED_SPREADSHEET_EXTENSIONS.join(', ')}`,
    );
  }

  private async readWithExcelJs(filePath: string): Promise<NamedSheet[]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);

    return workbook.worksheets.map((worksheet) => {
      const rows: RawRow[] = [];
      const columnCount = worksheet.columnCount;

      for (let rowNumber = 1; rowNumber <= worksheet.rowCount; rowNumber++) {
        const row = worksheet.getRow(rowNumber);
        const cells: CellValue[] = [];
        for (let colNumber = 1; colNumber <= columnCount; colNumber++) {
          const cell = row.getCell(colNumber);
          // only the top-left cell of a merged range carries the value
          cells.push(cell.type === ExcelJS.ValueType.Merge ? null : toCellValue(cell.value));
        }
        rows.push(cells);
      }

      this.logger.debug(`Sheet "${worksheet.name}": ${rows.length} rows x ${columnCount} columns`);
      return { name: worksheet.name, rows: trimTrailingBlankRows(rows) };
    });
  }

  private readWithSheetJs(filePath: string, ext: string): NamedSheet[] {
    // CSV cells stay text so codes such as "007" keep their zeros
    const workbook = XLSX.readFile(filePath, { cellDates: true, raw: ext === '.csv' });

    return workbook.SheetNames.map((name) => {
      const worksheet = workbook.Sheets[name];
      const ref = worksheet?.['!ref'];
      if (!worksheet || !ref) {
        return { name, rows: [] };
      }

      // sheet_to_json starts at the used range; shift back to A1
      const range = XLSX.utils.decode_range(ref);
      const data = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
        header: 1,
        defval: null,
        blankrows: true,
        raw: true,
      });

      const leading: CellValue[] = new Array<CellValue>(range.s.c).fill(null);
      const rows: RawRow[] = [];
      for (let r = 0; r < range.s.r; r++) {
        rows.push([]);
      }
      for (const row of data) {
        rows.push([...leading, ...row.map(toSheetJsCellValue)]);
      }

      this.logger.debug(`Sheet "${name}": ${rows.length} rows`);
      return { name, rows: trimTrailingBlankRows(rows) };
    });
  }
}
