import type { CellValue } from '../../../domain/value-objects';
import { DEFAULT_NULL_INDICATORS } from '../../../config/report-card.config';

export interface ValueNormalizerOptions {
  nullIndicators?: readonly string[];
  nullSentinel?: string;
}

export function isInvalidDate(value: unknown): boolean {
  return value instanceof Date && Number.isNaN(value.getTime());
}

/**
 * Cell value as text. Dates are written as YYYY-MM-DD; an unrepresentable date is empty.
 */
export function stringifyCell(value: Exclude<CellValue, null>): string {
  if (value instanceof Date) {
    return isInvalidDate(value) ? '' : value.toISOString().split('T')[0];
  }
  return String(value);
}

/**
 * Raw cell -> display string, with null-like values replaced by the sentinel
 */
export class ValueNormalizer {
  readonly sentinel: string;
  private readonly indicators: ReadonlySet<string>;

  constructor(options: ValueNormalizerOptions = {}) {
    this.sentinel = options.nullSentinel ?? '---';
    this.indicators = new Set(
      (options.nullIndicators ?? DEFAULT_NULL_INDICATORS).map((v) => v.toUpperCase()),
    );
  }

  normalize(value: CellValue | undefined): string {
    if (value === null || value === undefined) {
      return this.sentinel;
    }
    if ((typeof value === 'number' && Number.isNaN(value)) || isInvalidDate(value)) {
      return this.sentinel;
    }

    const text = stringifyCell(value).trim();

    // compare on a folded copy, return the original text
    const folded = text.toUpperCase().replace(/ /g, '');
    if (this.indicators.has(folded)) {
      return this.sentinel;
    }

    return text;
  }

  isSentinel(text: string): boolean {
    return text === this.sentinel;
  }
}
