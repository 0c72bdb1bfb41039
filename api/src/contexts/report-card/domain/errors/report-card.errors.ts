/**
 * Report card pipeline errors
 * Setup-phase errors abort the run; per-record errors are collected into the run report.
 */

export class MappingLoadError extends Error {
  constructor(
    message: string,
    public readonly mappingPath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MappingLoadError';
  }
}

export class InvalidColumnAddressError extends Error {
  constructor(public readonly address: string) {
    super(`Invalid column address "${address}": expected letters A-Z only`);
    this.name = 'InvalidColumnAddressError';
  }
}

export class ValidationFailure extends Error {
  constructor(public readonly errors: readonly string[]) {
    super(`Validation failed:\n${errors.map((e) => `- ${e}`).join('\n')}`);
    this.name = 'ValidationFailure';
  }
}

export class ConverterUnavailableError extends Error {
  constructor(message = 'LibreOffice not found. Install LibreOffice or set LIBREOFFICE_PATH.') {
    super(message);
    this.name = 'ConverterUnavailableError';
  }
}

export class TemplateFillError extends Error {
  constructor(
    message: string,
    public readonly templatePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TemplateFillError';
  }
}

/**
 * Per-record failure (template fill or PDF conversion)
 */
export class ConversionFailure extends Error {
  public readonly timedOut: boolean;
  public readonly detail?: string;

  constructor(
    message: string,
    options: { timedOut?: boolean; detail?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'ConversionFailure';
    this.timedOut = options.timedOut ?? false;
    this.detail = options.detail;
  }
}

/**
 * Recovered locally: the cell is replaced by the null sentinel.
 */
export interface RecordProcessingWarning {
  rowNumber: number;
  field: string;
  columnAddress: string;
  message: string;
}
