export type RecordStatus = 'success' | 'failed';

export interface RecordOutcome {
  rowNumber: number;
  displayName: string;
  status: RecordStatus;
  documentPath?: string;
  pdfPath?: string;
  error?: string;
  timedOut?: boolean;
}

export interface RunReport {
  className: string;
  outputDir: string;
  totalRecords: number;
  successCount: number;
  failureCount: number;
  cancelled: boolean;
  outcomes: RecordOutcome[];
  warnings: string[];
  startedAt: Date;
  finishedAt: Date;
}

export class RunReportFactory {
  static create(
    className: string,
    outputDir: string,
    outcomes: RecordOutcome[],
    options: { cancelled: boolean; warnings: string[]; startedAt: Date },
  ): RunReport {
    const successCount = outcomes.filter((o) => o.status === 'success').length;
    return {
      className,
      outputDir,
      totalRecords: outcomes.length,
      successCount,
      failureCount: outcomes.length - successCount,
      cancelled: options.cancelled,
      outcomes,
      warnings: options.warnings,
      startedAt: options.startedAt,
      finishedAt: new Date(),
    };
  }
}
