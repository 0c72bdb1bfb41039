import type { NamedSheet } from '../../domain/value-objects';

/**
 * Spreadsheet reader port
 */
export interface WorkbookReaderPort {
  /**
   * Read every sheet of the file as a raw grid, in stored order
   */
  readSheets(filePath: string): Promise<NamedSheet[]>;
}

export const WORKBOOK_READER_PORT = Symbol('WORKBOOK_READER_PORT');
