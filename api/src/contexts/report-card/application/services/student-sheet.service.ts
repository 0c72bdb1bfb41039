import { Inject, Injectable, Logger } from '@nestjs/common';
import type { RawTable } from '../../domain/value-objects';
import { WORKBOOK_READER_PORT, type WorkbookReaderPort } from '../ports';
import { selectDataSheet } from './utils';

@Injectable()
export class StudentSheetService {
  private readonly logger = new Logger(StudentSheetService.name);

  constructor(
    @Inject(WORKBOOK_READER_PORT)
    private readonly workbookReader: WorkbookReaderPort,
  ) {}

  /**
   * Raw grid of the first sheet that holds data
   */
  async loadTable(excelPath: string): Promise<RawTable> {
    const sheets = await this.workbookReader.readSheets(excelPath);
    const table = selectDataSheet(sheets);

    if (table.sheetName === null) {
      this.logger.warn(`No sheet with data in ${excelPath} (${sheets.length} sheets)`);
    } else {
      this.logger.log(
        `Using sheet "${table.sheetName}" of ${excelPath}: ${table.rows.length} rows x ${table.columnCount} columns`,
      );
    }

    return table;
  }
}
