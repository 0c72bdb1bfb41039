import { registerAs } from '@nestjs/config';
import type { ConfigService } from '@nestjs/config';

export interface ReportCardConfig {
  headerRowsToSkip: number;
  nullIndicators: string[];
  nullSentinel: string;
  conversionTimeoutSeconds: number;
  libreofficePath?: string;
  outputDir: string;
  mappingsDir: string;
  displayNameField: string;
}

export const DEFAULT_NULL_INDICATORS = ['NAN', 'NONE', 'NA', 'NULL', ''];

export const DEFAULT_REPORT_CARD_CONFIG: ReportCardConfig = {
  headerRowsToSkip: 4,
  nullIndicators: DEFAULT_NULL_INDICATORS,
  nullSentinel: '---',
  conversionTimeoutSeconds: 60,
  outputDir: './output',
  mappingsDir: './mappings',
  displayNameField: 'name',
};

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map((item) => item.trim());
}

/**
 * Unset or empty -> fallback. Anything but a whole number >= min stops startup.
 */
function parseInteger(name: string, value: string | undefined, fallback: number, min: number): number {
  const text = value?.trim();
  if (!text) return fallback;
  if (!/^\d+$/.test(text) || Number(text) < min) {
    throw new Error(`${name} must be a whole number of at least ${min}, got "${value}"`);
  }
  return Number(text);
}

export const reportCardConfig = registerAs('reportCard', (): ReportCardConfig => ({
  headerRowsToSkip: parseInteger('HEADER_ROWS_TO_SKIP', process.env.HEADER_ROWS_TO_SKIP, 4, 0),
  nullIndicators: parseList(process.env.NULL_INDICATORS) ?? DEFAULT_NULL_INDICATORS,
  nullSentinel: process.env.NULL_SENTINEL ?? '---',
  conversionTimeoutSeconds: parseInteger('CONVERSION_TIMEOUT_SECONDS', process.env.CONVERSION_TIMEOUT_SECONDS, 60, 1),
  libreofficePath: process.env.LIBREOFFICE_PATH || undefined,
  outputDir: process.env.OUTPUT_DIR || './output',
  mappingsDir: process.env.MAPPINGS_DIR || './mappings',
  displayNameField: process.env.DISPLAY_NAME_FIELD || 'name',
}));

/**
 * Loaded namespace merged over the defaults
 */
export function resolveReportCardConfig(configService: ConfigService): ReportCardConfig {
  const loaded = configService.get<Partial<ReportCardConfig>>('reportCard') ?? {};
  return { ...DEFAULT_REPORT_CARD_CONFIG, ...loaded };
}
