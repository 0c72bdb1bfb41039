import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  RawTableFactory,
  RunReportFactory,
  type FieldDict,
  type FieldMappingVO,
  type RawTable,
  type RecordOutcome,
  type RunReport,
  type StudentRecord,
} from '../../domain/value-objects';
import { ConversionFailure, MappingLoadError, ValidationFailure } from '../../domain/errors';
import {
  PDF_CONVERTER_PORT,
  TEMPLATE_FILLER_PORT,
  type ConversionSession,
  type ConverterStatus,
  type PdfConverterPort,
  type TemplateFillerPort,
} from '../ports';
import { resolveReportCardConfig, type ReportCardConfig } from '../../config/report-card.config';
import { MappingLoaderService } from './mapping-loader.service';
import { StudentSheetService } from './student-sheet.service';
import { ReportCardValidatorService } from './report-card-validator.service';
import { RecordProcessor } from './record-processor';
import {
  FileNameAllocator,
  ValueNormalizer,
  delay,
  extractRecords,
  fileExists,
  isFieldFormat,
  sanitizeFileName,
  type FieldFormat,
} from './utils';

export interface RunParams {
  excelPath: string;
  /** Defaults to <mappingsDir>/<class_name>_mapping.json */
  mappingPath?: string;
  className: string;
  headerRowsToSkip?: number;
  fieldFormats?: Record<string, string>;
  templatePath?: string;
}

export interface GenerateParams extends RunParams {
  templatePath: string;
  outputDir?: string;
  convertToPdf?: boolean;
  displayNameField?: string;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

export interface ProgressInfo {
  phase: 'init' | 'processing' | 'complete';
  current: number;
  total: number;
  percentage: number;
  message: string;
  fileName?: string;
  successCount: number;
  failureCount: number;
}

export type ProgressCallback = (progress: ProgressInfo) => void;

export interface PreparedRun {
  mappingPath: string;
  mapping: FieldMappingVO | null;
  mappingError?: MappingLoadError;
  table: RawTable;
  headerRowsToSkip: number;
  fieldFormats: Record<string, FieldFormat>;
  errors: string[];
  warnings: string[];
  totalStudents: number;
}

export interface ValidationSummary {
  valid: boolean;
  mappingPath: string;
  errors: string[];
  warnings: string[];
  totalStudents: number;
}

interface BatchContext {
  processor: RecordProcessor;
  allocator: FileNameAllocator;
  normalizer: ValueNormalizer;
  session: ConversionSession | null;
  className: string;
  templatePath: string;
  classDir: string;
  wordDir: string;
  displayNameField: string;
  timeoutMs: number;
}

// transient file-system errors while writing a document
const RETRY_CONFIG = {
  maxRetries: 3,
  retryDelayMs: 100,
  retryableErrors: ['EBUSY', 'EPERM', 'EMFILE'],
};

export const GENERATION_LOG_FILE = '_generation_log.txt';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class ReportCardGeneratorService {
  private readonly logger = new Logger(ReportCardGeneratorService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly mappingLoader: MappingLoaderService,
    private readonly studentSheet: StudentSheetService,
    private readonly validator: ReportCardValidatorService,
    @Inject(TEMPLATE_FILLER_PORT)
    private readonly templateFiller: TemplateFillerPort,
    @Inject(PDF_CONVERTER_PORT)
    private readonly pdfConverter: PdfConverterPort,
  ) {}

  private get config(): ReportCardConfig {
    return resolveReportCardConfig(this.configService);
  }

  private createNormalizer(): ValueNormalizer {
    const { nullIndicators, nullSentinel } = this.config;
    return new ValueNormalizer({ nullIndicators, nullSentinel });
  }

  converterStatus(): Promise<ConverterStatus> {
    return this.pdfConverter.status();
  }

  /**
   * Load mapping and spreadsheet, then run every pre-flight check
   */
  async prepare(params: RunParams): Promise<PreparedRun> {
    const mappingPath = params.mappingPath ?? this.mappingLoader.resolvePathForClass(params.className);
    const headerRowsToSkip = params.headerRowsToSkip ?? this.config.headerRowsToSkip;

    let mapping: FieldMappingVO | null = null;
    let mappingError: MappingLoadError | undefined;
    try {
      mapping = await this.mappingLoader.load(mappingPath);
    } catch (error) {
      if (!(error instanceof MappingLoadError)) throw error;
      mappingError = error;
    }

    let table = RawTableFactory.empty();
    let spreadsheetError: string | undefined;
    if (await fileExists(params.excelPath)) {
      try {
        table = await this.studentSheet.loadTable(params.excelPath);
      } catch (error) {
        spreadsheetError = `Cannot read spreadsheet ${params.excelPath}: ${errorMessage(error)}`;
      }
    }

    const outcome = await this.validator.validate({
      excelPath: params.excelPath,
      mappingPath,
      templatePath: params.templatePath,
      table,
      mapping,
      headerRowsToSkip,
      fieldFormats: params.fieldFormats,
      mappingError: mappingError?.message,
      spreadsheetError,
    });

    const fieldFormats: Record<string, FieldFormat> = {};
    for (const [key, format] of Object.entries(params.fieldFormats ?? {})) {
      if (isFieldFormat(format)) fieldFormats[key] = format;
    }

    return {
      mappingPath,
      mapping,
      mappingError,
      table,
      headerRowsToSkip,
      fieldFormats,
      ...outcome,
    };
  }

  async validate(params: RunParams): Promise<ValidationSummary> {
    const run = await this.prepare(params);
    return {
      valid: run.errors.length === 0,
      mappingPath: run.mappingPath,
      errors: run.errors,
      warnings: run.warnings,
      totalStudents: run.totalStudents,
    };
  }

  /**
   * Field dictionaries of the first `limit` students, without writing anything
   */
  async preview(params: RunParams, limit = 5): Promise<FieldDict[]> {
    const run = await this.prepare(params);
    const mapping = this.requireValid(run);

    const processor = new RecordProcessor(mapping, {
      normalizer: this.createNormalizer(),
      fieldFormats: run.fieldFormats,
    });

    const fields: FieldDict[] = [];
    for (const record of extractRecords(run.table, run.headerRowsToSkip)) {
      if (fields.length >= limit) break;
      fields.push(processor.process(record, params.className));
    }
    return fields;
  }

  /**
   * Setup errors throw before any output is written; per-record failures land in the report
   */
  async generate(params: GenerateParams): Promise<RunReport> {
    const startedAt = new Date();
    const config = this.config;
    const convertToPdf = params.convertToPdf ?? true;
    const outputDir = path.resolve(params.outputDir ?? config.outputDir);

    const run = await this.prepare(params);
    const mapping = this.requireValid(run);

    const session = convertToPdf ? await this.pdfConverter.acquire() : null;

    const classDir = path.join(outputDir, `${params.className} report_cards`);
    const wordDir = path.join(classDir, 'word');
    const warnings = [...run.warnings];
    const outcomes: RecordOutcome[] = [];
    let cancelled = false;

    try {
      await fs.mkdir(wordDir, { recursive: true });

      const normalizer = this.createNormalizer();
      const context: BatchContext = {
        processor: new RecordProcessor(mapping, {
          normalizer,
          fieldFormats: run.fieldFormats,
          onWarning: (warning) => warnings.push(warning.message),
        }),
        allocator: new FileNameAllocator(),
        normalizer,
        session,
        className: params.className,
        templatePath: params.templatePath,
        classDir,
        wordDir,
        displayNameField: params.displayNameField ?? config.displayNameField,
        timeoutMs: config.conversionTimeoutSeconds * 1000,
      };

      const total = run.totalStudents;
      let successCount = 0;
      const reportProgress = (phase: ProgressInfo['phase'], current: number, message: string, fileName?: string) => {
        params.onProgress?.({
          phase,
          current,
          total,
          percentage: total > 0 ? Math.round((current / total) * 100) : 100,
          message,
          fileName,
          successCount,
          failureCount: outcomes.length - successCount,
        });
      };

      this.logger.log(`Generating ${total} report cards for class ${params.className} into ${classDir}`);
      reportProgress('init', 0, `Preparing ${total} report cards`);

      for (const record of extractRecords(run.table, run.headerRowsToSkip)) {
        if (params.signal?.aborted) {
          cancelled = true;
          this.logger.warn(`Generation cancelled after ${outcomes.length} of ${total} records`);
          break;
        }

        const outcome = await this.processRecord(record, context);
        outcomes.push(outcome);
        if (outcome.status === 'success') successCount++;

        reportProgress(
          'processing',
          outcomes.length,
          `${outcome.status === 'success' ? 'Generated' : 'Failed'}: ${outcome.displayName}`,
          outcome.displayName,
        );
      }

      reportProgress('complete', outcomes.length, cancelled ? 'Cancelled' : 'Done');
    } finally {
      if (session) {
        await session.release();
      }
    }

    const report = RunReportFactory.create(params.className, classDir, outcomes, { cancelled, warnings, startedAt });

    if (report.failureCount > 0) {
      try {
        await fs.writeFile(path.join(classDir, GENERATION_LOG_FILE), this.generateRunLog(report), 'utf-8');
      } catch (error) {
        const message = `Could not write generation log: ${errorMessage(error)}`;
        this.logger.warn(message);
        report.warnings.push(message);
      }
    }

    this.logger.log(
      `Class ${params.className}: ${report.successCount} succeeded, ${report.failureCount} failed${cancelled ? ' (cancelled)' : ''}`,
    );

    return report;
  }

  private requireValid(run: PreparedRun): FieldMappingVO {
    if (run.mappingError) {
      throw run.mappingError;
    }
    if (!run.mapping || run.errors.length > 0) {
      throw new ValidationFailure(run.errors);
    }
    return run.mapping;
  }

  private async processRecord(record: StudentRecord, context: BatchContext): Promise<RecordOutcome> {
    let displayName = `student_${record.rowNumber}`;
    let documentPath: string | undefined;

    try {
      const fields = context.processor.process(record, context.className);
      displayName = this.displayNameOf(fields, record.rowNumber, context);
      const targetPath = path.join(context.wordDir, `${context.allocator.allocate(displayName)}.docx`);
      documentPath = targetPath;

      await this.executeWithRetry(
        () => this.templateFiller.fill(context.templatePath, fields, targetPath),
        record.rowNumber,
      );

      if (!context.session) {
        return { rowNumber: record.rowNumber, displayName, status: 'success', documentPath: targetPath };
      }

      const result = await context.session.convert(targetPath, context.classDir, {
        timeoutMs: context.timeoutMs,
      });
      if (!result.success) {
        throw new ConversionFailure(result.error, { timedOut: result.timedOut, detail: result.detail });
      }

      return {
        rowNumber: record.rowNumber,
        displayName,
        status: 'success',
        documentPath: targetPath,
        pdfPath: result.pdfPath,
      };
    } catch (error) {
      const failure =
        error instanceof ConversionFailure ? error : new ConversionFailure(errorMessage(error), { cause: error });
      this.logger.warn(`Row ${record.rowNumber} (${displayName}) failed: ${failure.message}`);

      return {
        rowNumber: record.rowNumber,
        displayName,
        status: 'failed',
        documentPath,
        error: failure.message,
        timedOut: failure.timedOut,
      };
    }
  }

  /**
   * Sanitized display field; a sentinel or missing name falls back to student_<row>
   */
  private displayNameOf(fields: FieldDict, rowNumber: number, context: BatchContext): string {
    const name = fields.get(context.displayNameField);
    if (name === undefined || context.normalizer.isSentinel(name)) {
      return `student_${rowNumber}`;
    }
    return sanitizeFileName(name);
  }

  private isRetryableError(error: unknown): boolean {
    const code = error instanceof Error && 'code' in error ? String(error.code) : '';
    const message = errorMessage(error);
    return RETRY_CONFIG.retryableErrors.some((retryable) => code === retryable || message.includes(retryable));
  }

  private async executeWithRetry<T>(operation: () => Promise<T>, rowNumber: number): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (attempt >= RETRY_CONFIG.maxRetries || !this.isRetryableError(error)) {
          throw error;
        }
        this.logger.warn(`Row ${rowNumber}: retry ${attempt + 1}/${RETRY_CONFIG.maxRetries} after ${errorMessage(error)}`);
        await delay(RETRY_CONFIG.retryDelayMs * (attempt + 1));
      }
    }
  }

  private generateRunLog(report: RunReport): string {
    const lines: string[] = [
      '========================================',
      'Generation summary',
      '========================================',
      `Class: ${report.className}`,
      `Started: ${report.startedAt.toISOString()}`,
      `Finished: ${report.finishedAt.toISOString()}`,
      `Total records: ${report.totalRecords}`,
      `Succeeded: ${report.successCount}`,
      `Failed: ${report.failureCount}`,
    ];
    if (report.cancelled) {
      lines.push('Run was cancelled before all records were processed');
    }

    lines.push('', '========================================', 'Failed records', '========================================');
    for (const outcome of report.outcomes) {
      if (outcome.status !== 'failed') continue;
      lines.push(`\n[Row ${outcome.rowNumber}] ${outcome.displayName}`);
      lines.push(`Error: ${outcome.error ?? 'unknown'}`);
      if (outcome.timedOut) {
        lines.push('Timed out: yes');
      }
    }

    if (report.warnings.length > 0) {
      lines.push('', '========================================', 'Warnings', '========================================');
      lines.push(...report.warnings);
    }

    return lines.join('\n') + '\n';
  }
}
