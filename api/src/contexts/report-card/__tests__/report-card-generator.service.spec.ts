import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  GENERATION_LOG_FILE,
  MappingLoaderService,
  ReportCardGeneratorService,
  ReportCardValidatorService,
  StudentSheetService,
  type GenerateParams,
  type ProgressInfo,
} from '../application/services';
import { RecordProcessor } from '../application/services/record-processor';
import {
  PDF_CONVERTER_PORT,
  TEMPLATE_FILLER_PORT,
  WORKBOOK_READER_PORT,
  type ConversionSession,
  type PdfConverterPort,
  type TemplateFillerPort,
  type WorkbookReaderPort,
} from '../application/ports';
import { fieldDictToRecord, type CellValue } from '../domain/value-objects';
import { ConverterUnavailableError, MappingLoadError, ValidationFailure } from '../domain/errors';

describe('ReportCardGeneratorService', () => {
  let service: ReportCardGeneratorService;
  let workbookReader: jest.Mocked<WorkbookReaderPort>;
  let templateFiller: jest.Mocked<TemplateFillerPort>;
  let pdfConverter: jest.Mocked<PdfConverterPort>;
  let session: jest.Mocked<ConversionSession>;

  let tmpDir: string;
  let outputDir: string;
  let excelPath: string;
  let mappingPath: string;
  let templatePath: string;

  const classDir = () => path.join(outputDir, '5_A report_cards');

  const useRows = (rows: CellValue[][]) => {
    workbookReader.readSheets.mockResolvedValue([
      { name: 'Cover', rows: [] },
      { name: 'Marks', rows },
    ]);
  };

  const params = (overrides: Partial<GenerateParams> = {}): GenerateParams => ({
    excelPath,
    mappingPath,
    templatePath,
    className: '5_A',
    headerRowsToSkip: 0,
    outputDir,
    ...overrides,
  });

  const filledFields = () => templateFiller.fill.mock.calls.map(([, fields]) => fieldDictToRecord(fields));

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'report-card-generator-'));
    outputDir = path.join(tmpDir, 'out');
    excelPath = path.join(tmpDir, 'marks.xlsx');
    mappingPath = path.join(tmpDir, '5_A_mapping.json');
    templatePath = path.join(tmpDir, 'template.docx');
    await fs.writeFile(excelPath, 'placeholder');
    await fs.writeFile(templatePath, 'placeholder');
    await fs.writeFile(mappingPath, JSON.stringify({ name: 'B', score: 'C' }));

    workbookReader = { readSheets: jest.fn() };
    templateFiller = { fill: jest.fn(), listPlaceholders: jest.fn() };
    templateFiller.fill.mockImplementation(async (_templatePath, _fields, outputPath) => outputPath);
    templateFiller.listPlaceholders.mockResolvedValue(['name', 'score', 'class']);

    session = { convert: jest.fn(), release: jest.fn() };
    session.convert.mockImplementation(async (documentPath, pdfDir) => ({
      success: true,
      pdfPath: path.join(pdfDir, `${path.parse(documentPath).name}.pdf`),
    }));
    session.release.mockResolvedValue(undefined);

    pdfConverter = { status: jest.fn(), acquire: jest.fn() };
    pdfConverter.acquire.mockResolvedValue(session);

    useRows([
      ['1', 'Alice', '92'],
      ['2', 'Bob', ''],
      ['', '', ''],
    ]);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReportCardGeneratorService,
        MappingLoaderService,
        StudentSheetService,
        ReportCardValidatorService,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) => (key === 'reportCard' ? { mappingsDir: tmpDir, outputDir } : undefined)),
          },
        },
        { provide: WORKBOOK_READER_PORT, useValue: workbookReader },
        { provide: TEMPLATE_FILLER_PORT, useValue: templateFiller },
        { provide: PDF_CONVERTER_PORT, useValue: pdfConverter },
      ],
    }).compile();

    service = module.get<ReportCardGeneratorService>(ReportCardGeneratorService);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('generate', () => {
    it('fills and converts one document per non-blank row', async () => {
      const report = await service.generate(params());

      expect(filledFields()).toEqual([
        { name: 'Alice', score: '92', class: '5 A' },
        { name: 'Bob', score: '---', class: '5 A' },
      ]);
      expect(report.outcomes).toEqual([
        {
          rowNumber: 1,
          displayName: 'Alice',
          status: 'success',
          documentPath: path.join(classDir(), 'word', 'Alice.docx'),
          pdfPath: path.join(classDir(), 'Alice.pdf'),
        },
        {
          rowNumber: 2,
          displayName: 'Bob',
          status: 'success',
          documentPath: path.join(classDir(), 'word', 'Bob.docx'),
          pdfPath: path.join(classDir(), 'Bob.pdf'),
        },
      ]);
      expect(report.totalRecords).toBe(2);
      expect(report.successCount).toBe(2);
      expect(report.failureCount).toBe(0);
      expect(report.cancelled).toBe(false);
      expect(session.convert).toHaveBeenCalledWith(path.join(classDir(), 'word', 'Alice.docx'), classDir(), {
        timeoutMs: 60_000,
      });
      expect(session.release).toHaveBeenCalledTimes(1);
    });

    it('records a timed-out conversion and carries on with the batch', async () => {
      useRows([
        ['1', 'Alice', '92'],
        ['2', 'Bob', '75'],
        ['3', 'Cara', '88'],
      ]);
      session.convert.mockImplementationOnce(async () => ({ success: true, pdfPath: 'Alice.pdf' }));
      session.convert.mockImplementationOnce(async () => ({
        success: false,
        error: 'Conversion timed out after 60 seconds',
        timedOut: true,
      }));
      session.convert.mockImplementationOnce(async () => ({ success: true, pdfPath: 'Cara.pdf' }));

      const report = await service.generate(params());

      expect(report.outcomes.map((o) => o.status)).toEqual(['success', 'failed', 'success']);
      expect(report.outcomes[1]).toEqual({
        rowNumber: 2,
        displayName: 'Bob',
        status: 'failed',
        documentPath: path.join(classDir(), 'word', 'Bob.docx'),
        error: 'Conversion timed out after 60 seconds',
        timedOut: true,
      });
      expect(report.successCount).toBe(2);
      expect(report.failureCount).toBe(1);
      expect(session.release).toHaveBeenCalledTimes(1);

      const log = await fs.readFile(path.join(classDir(), GENERATION_LOG_FILE), 'utf-8');
      expect(log).toContain('[Row 2] Bob\nError: Conversion timed out after 60 seconds\nTimed out: yes');
    });

    it('records a template failure without stopping', async () => {
      templateFiller.fill.mockRejectedValueOnce(new Error('Template file not found: x.docx'));

      const report = await service.generate(params());

      expect(report.outcomes.map((o) => [o.status, o.error])).toEqual([
        ['failed', 'Template file not found: x.docx'],
        ['success', undefined],
      ]);
      expect(session.convert).toHaveBeenCalledTimes(1);
    });

    it('treats an invalid date cell as missing and finishes the batch', async () => {
      useRows([
        ['1', 'Alice', '92'],
        ['2', 'Bob', new Date(Number.NaN)],
        ['3', 'Cara', '88'],
      ]);

      const report = await service.generate(params());

      expect(filledFields()).toEqual([
        { name: 'Alice', score: '92', class: '5 A' },
        { name: 'Bob', score: '---', class: '5 A' },
        { name: 'Cara', score: '88', class: '5 A' },
      ]);
      expect(report.outcomes.map((o) => o.status)).toEqual(['success', 'success', 'success']);
    });

    it('records a failure raised while building fields and carries on', async () => {
      useRows([
        ['1', 'Alice', '92'],
        ['2', 'Bob', '75'],
        ['3', 'Cara', '88'],
      ]);
      const original = RecordProcessor.prototype.process;
      const processSpy = jest.spyOn(RecordProcessor.prototype, 'process');
      processSpy
        .mockImplementationOnce(original)
        .mockImplementationOnce(() => {
          throw new Error('Unreadable cell');
        });

      try {
        const report = await service.generate(params());

        expect(report.outcomes.map((o) => o.status)).toEqual(['success', 'failed', 'success']);
        expect(report.outcomes[1]).toMatchObject({
          rowNumber: 2,
          displayName: 'student_2',
          status: 'failed',
          error: 'Unreadable cell',
          timedOut: false,
        });
        expect(report.outcomes[1].documentPath).toBeUndefined();
        expect(report.outcomes[2].displayName).toBe('Cara');
        expect(templateFiller.fill).toHaveBeenCalledTimes(2);
      } finally {
        processSpy.mockRestore();
      }
    });

    it('returns the report when the failure log cannot be written', async () => {
      await fs.mkdir(path.join(classDir(), GENERATION_LOG_FILE), { recursive: true });
      templateFiller.fill.mockRejectedValueOnce(new Error('Template file not found: x.docx'));

      const report = await service.generate(params());

      expect(report.outcomes.map((o) => o.status)).toEqual(['failed', 'success']);
      expect(report.failureCount).toBe(1);
      expect(report.warnings).toContainEqual(expect.stringMatching(/^Could not write generation log: EISDIR/));
    });

    it('retries a fill that hits a busy file', async () => {
      const busy = Object.assign(new Error('EBUSY: resource busy or locked'), { code: 'EBUSY' });
      templateFiller.fill.mockRejectedValueOnce(busy);

      const report = await service.generate(params());

      expect(report.successCount).toBe(2);
      expect(templateFiller.fill).toHaveBeenCalledTimes(3);
    });

    it('skips conversion when PDF output is disabled', async () => {
      const report = await service.generate(params({ convertToPdf: false }));

      expect(pdfConverter.acquire).not.toHaveBeenCalled();
      expect(report.outcomes[0]).toEqual({
        rowNumber: 1,
        displayName: 'Alice',
        status: 'success',
        documentPath: path.join(classDir(), 'word', 'Alice.docx'),
      });
    });

    it('names files after the display field, de-duplicated and with a fallback', async () => {
      useRows([
        ['1', 'Alice', '92'],
        ['2', 'alice', '80'],
        ['3', 'NA', '70'],
        ['4', 'Lee/Kim', '60'],
      ]);

      const report = await service.generate(params({ convertToPdf: false }));

      expect(report.outcomes.map((o) => [o.displayName, path.basename(o.documentPath ?? '')])).toEqual([
        ['Alice', 'Alice.docx'],
        ['alice', 'alice_2.docx'],
        ['student_3', 'student_3.docx'],
        ['Lee_Kim', 'Lee_Kim.docx'],
      ]);
    });

    it('reports progress', async () => {
      const events: ProgressInfo[] = [];

      await service.generate(params({ onProgress: (progress) => events.push(progress) }));

      expect(events.map((e) => [e.phase, e.current, e.percentage])).toEqual([
        ['init', 0, 0],
        ['processing', 1, 50],
        ['processing', 2, 100],
        ['complete', 2, 100],
      ]);
      expect(events[1].message).toBe('Generated: Alice');
    });

    it('stops after the current record when cancelled', async () => {
      const controller = new AbortController();
      templateFiller.fill.mockImplementation(async (_templatePath, _fields, outputPath) => {
        controller.abort();
        return outputPath;
      });

      const report = await service.generate(params({ signal: controller.signal }));

      expect(report.cancelled).toBe(true);
      expect(report.outcomes).toHaveLength(1);
      expect(session.release).toHaveBeenCalledTimes(1);
    });

    it('releases the session when the output folder cannot be created', async () => {
      await fs.rm(outputDir, { recursive: true, force: true });
      await fs.writeFile(outputDir, 'not a directory');

      await expect(service.generate(params())).rejects.toThrow();
      expect(session.release).toHaveBeenCalledTimes(1);
    });

    it('fails validation before touching any row', async () => {
      await fs.writeFile(mappingPath, JSON.stringify({ name: 'B', remarks: 'H' }));

      await expect(service.generate(params())).rejects.toThrow(ValidationFailure);
      expect(pdfConverter.acquire).not.toHaveBeenCalled();
      expect(templateFiller.fill).not.toHaveBeenCalled();
    });

    it('raises a mapping error for an unreadable mapping file', async () => {
      await fs.writeFile(mappingPath, 'not json');

      await expect(service.generate(params())).rejects.toBeInstanceOf(MappingLoadError);
    });

    it('raises when no converter is available', async () => {
      pdfConverter.acquire.mockRejectedValue(new ConverterUnavailableError());

      await expect(service.generate(params())).rejects.toThrow(
        'LibreOffice not found. Install LibreOffice or set LIBREOFFICE_PATH.',
      );
      expect(templateFiller.fill).not.toHaveBeenCalled();
    });

    it('finds the mapping by class name when no path is given', async () => {
      const report = await service.generate(params({ mappingPath: undefined, convertToPdf: false }));

      expect(report.successCount).toBe(2);
    });
  });

  describe('validate', () => {
    it('summarises the pre-flight checks', async () => {
      const summary = await service.validate({ excelPath, mappingPath, className: '5_A', headerRowsToSkip: 0 });

      expect(summary).toEqual({ valid: true, mappingPath, errors: [], warnings: [], totalStudents: 2 });
    });

    it('reports the errors of an invalid run', async () => {
      const summary = await service.validate({ excelPath, mappingPath, className: '5_A', headerRowsToSkip: 3 });

      expect(summary.valid).toBe(false);
      expect(summary.errors).toEqual(['Excel file has no data after skipping 3 header rows']);
    });
  });

  describe('preview', () => {
    it('returns the first field dictionaries without writing files', async () => {
      const fields = await service.preview({ excelPath, mappingPath, className: '5_A', headerRowsToSkip: 0 }, 1);

      expect(fields.map(fieldDictToRecord)).toEqual([{ name: 'Alice', score: '92', class: '5 A' }]);
      expect(templateFiller.fill).not.toHaveBeenCalled();
    });
  });
});
