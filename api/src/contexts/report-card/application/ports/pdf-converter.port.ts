export type ConversionResult =
  | { success: true; pdfPath: string }
  | { success: false; error: string; detail?: string; timedOut: boolean };

export interface ConverterStatus {
  available: boolean;
  path: string | null;
  version: string | null;
}

export interface ConvertOptions {
  timeoutMs: number;
}

/**
 * One acquired conversion engine, used for a whole batch and released afterwards.
 * Calls must not overlap.
 */
export interface ConversionSession {
  convert(documentPath: string, outputDir: string, options: ConvertOptions): Promise<ConversionResult>;
  release(): Promise<void>;
}

/**
 * PDF conversion port
 */
export interface PdfConverterPort {
  status(): Promise<ConverterStatus>;

  /**
   * Probe the engine and open a session. Rejects with ConverterUnavailableError.
   */
  acquire(): Promise<ConversionSession>;
}

export const PDF_CONVERTER_PORT = Symbol('PDF_CONVERTER_PORT');
