import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import type {
  ConversionResult,
  ConversionSession,
  ConverterStatus,
  ConvertOptions,
  PdfConverterPort,
} from '../../application/ports';
import { ConverterUnavailableError } from '../../domain/errors';
import { fileExists } from '../../application/services/utils';
import { resolveReportCardConfig } from '../../config/report-card.config';
import { runProcess, type ProcessResult } from './process-runner';

const VERSION_TIMEOUT_MS = 10_000;

function candidatePaths(): string[] {
  switch (os.platform()) {
    case 'win32': {
      const programFiles = process.env.PROGRAMFILES || 'C:\\Program Files';
      const programFilesX86 = process.env['PROGRAMFILES(X86)'] || 'C:\\Program Files (x86)';
      const paths = [
        path.join(programFiles, 'LibreOffice', 'program', 'soffice.exe'),
        path.join(programFilesX86, 'LibreOffice', 'program', 'soffice.exe'),
      ];
      if (process.env.LOCALAPPDATA) {
        paths.push(path.join(process.env.LOCALAPPDATA, 'Programs', 'LibreOffice', 'program', 'soffice.exe'));
      }
      return paths;
    }
    case 'darwin':
      return [
        '/Applications/LibreOffice.app/Contents/MacOS/soffice',
        path.join(os.homedir(), 'Applications', 'LibreOffice.app', 'Contents', 'MacOS', 'soffice'),
      ];
    default:
      return ['/usr/bin/soffice', '/usr/bin/libreoffice', '/usr/local/bin/soffice'];
  }
}

async function isExecutable(filePath: string): Promise<boolean> {
  if (!(await fileExists(filePath))) return false;
  if (os.platform() === 'win32') return true;
  try {
    await fs.access(filePath, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

async function findOnPath(names: string[]): Promise<string | null> {
  const dirs = (process.env.PATH ?? '').split(path.delimiter).filter(Boolean);
  const suffix = os.platform() === 'win32' ? '.exe' : '';
  for (const name of names) {
    for (const dir of dirs) {
      const candidate = path.join(dir, `${name}${suffix}`);
      if (await isExecutable(candidate)) return candidate;
    }
  }
  return null;
}

/**
 * One LibreOffice profile for the whole batch; conversions run one at a time.
 */
class LibreOfficeSession implements ConversionSession {
  private busy = false;

  constructor(
    private readonly executable: string,
    private readonly profileDir: string,
    private readonly logger: Logger,
  ) {}

  async convert(documentPath: string, outputDir: string, options: ConvertOptions): Promise<ConversionResult> {
    if (this.busy) {
      throw new Error('Conversion session is already converting a document');
    }
    this.busy = true;
    try {
      return await this.runConversion(documentPath, outputDir, options);
    } finally {
      this.busy = false;
    }
  }

  async release(): Promise<void> {
    try {
      await fs.rm(this.profileDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Could not remove LibreOffice profile ${this.profileDir}: ${String(error)}`);
    }
  }

  private async runConversion(
    documentPath: string,
    outputDir: string,
    options: ConvertOptions,
  ): Promise<ConversionResult> {
    if (!(await fileExists(documentPath))) {
      return { success: false, error: `File not found: ${documentPath}`, timedOut: false };
    }

    await fs.mkdir(outputDir, { recursive: true });

    // a stale PDF from an earlier run must not pass for this one
    const expectedPdf = path.join(outputDir, `${path.parse(documentPath).name}.pdf`);
    await fs.rm(expectedPdf, { force: true });

    const args = [
      `-env:UserInstallation=${pathToFileURL(this.profileDir).href}`,
      '--headless',
      '--convert-to',
      'pdf',
      '--outdir',
      outputDir,
      documentPath,
    ];

    let result: ProcessResult;
    try {
      result = await runProcess(this.executable, args, { timeoutMs: options.timeoutMs, cwd: outputDir });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, error: `Conversion error: ${message}`, detail: message, timedOut: false };
    }

    if (result.timedOut) {
      return {
        success: false,
        error: `Conversion timed out after ${options.timeoutMs / 1000} seconds`,
        timedOut: true,
      };
    }

    if (await fileExists(expectedPdf)) {
      this.logger.debug(`Converted ${documentPath} -> ${expectedPdf}`);
      return { success: true, pdfPath: expectedPdf };
    }

    const output = result.stderr.trim() || result.stdout.trim() || 'Unknown error';
    return {
      success: false,
      error: `Conversion failed: ${output}`,
      detail: result.stderr.trim() || undefined,
      timedOut: false,
    };
  }
}

@Injectable()
export class LibreOfficeConverterAdapter implements PdfConverterPort {
  private readonly logger = new Logger(LibreOfficeConverterAdapter.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Configured path first, then the usual install locations, then PATH
   */
  async findExecutable(): Promise<string | null> {
    const { libreofficePath } = resolveReportCardConfig(this.configService);
    if (libreofficePath) {
      if (await isExecutable(libreofficePath)) return libreofficePath;
      this.logger.warn(`LIBREOFFICE_PATH ${libreofficePath} is not an executable file`);
      return null;
    }

    for (const candidate of candidatePaths()) {
      if (await isExecutable(candidate)) return candidate;
    }
    return findOnPath(['soffice', 'libreoffice']);
  }

  async status(): Promise<ConverterStatus> {
    const executable = await this.findExecutable();
    if (!executable) {
      return { available: false, path: null, version: null };
    }

    try {
      const result = await runProcess(executable, ['--version'], { timeoutMs: VERSION_TIMEOUT_MS });
      const ok = !result.timedOut && result.code === 0;
      return { available: ok, path: executable, version: ok ? result.stdout.trim() || null : null };
    } catch (error) {
      this.logger.warn(`${executable} --version failed: ${String(error)}`);
      return { available: false, path: executable, version: null };
    }
  }

  async acquire(): Promise<ConversionSession> {
    const status = await this.status();
    if (!status.available || !status.path) {
      throw status.path
        ? new ConverterUnavailableError(`LibreOffice at ${status.path} did not respond to --version`)
        : new ConverterUnavailableError();
    }

    const profileDir = await fs.mkdtemp(path.join(os.tmpdir(), 'report-card-lo-'));
    this.logger.log(`Using ${status.version ?? status.path}`);

    return new LibreOfficeSession(status.path, profileDir, this.logger);
  }
}
