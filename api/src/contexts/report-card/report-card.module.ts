import { Module } from '@nestjs/common';
import { ReportCardController } from './interface/http/controllers';
import {
  MappingLoaderService,
  ReportCardGeneratorService,
  ReportCardValidatorService,
  StudentSheetService,
} from './application/services';
import {
  DocxTemplateFillerAdapter,
  LibreOfficeConverterAdapter,
  SpreadsheetReaderAdapter,
} from './infrastructure/adapters';
import { PDF_CONVERTER_PORT, TEMPLATE_FILLER_PORT, WORKBOOK_READER_PORT } from './application/ports';

@Module({
  controllers: [ReportCardController],
  providers: [
    MappingLoaderService,
    StudentSheetService,
    ReportCardValidatorService,
    ReportCardGeneratorService,
    {
      provide: WORKBOOK_READER_PORT,
      useClass: SpreadsheetReaderAdapter,
    },
    {
      provide: TEMPLATE_FILLER_PORT,
      useClass: DocxTemplateFillerAdapter,
    },
    {
      provide: PDF_CONVERTER_PORT,
      useClass: LibreOfficeConverterAdapter,
    },
  ],
  exports: [ReportCardGeneratorService, MappingLoaderService],
})
export class ReportCardModule {}
