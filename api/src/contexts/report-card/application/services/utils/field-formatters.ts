/**
 * Optional per-field display transforms, applied after normalization.
 * The sentinel never reaches a formatter.
 */
export type FieldFormat = 'percent' | 'uppercase';

export type FieldFormatter = (value: string) => string;

export const FIELD_FORMATS: readonly FieldFormat[] = ['percent', 'uppercase'];

export const FIELD_FORMATTERS: Record<FieldFormat, FieldFormatter> = {
  // 85.754 -> "85.75%"; "85.75%" and non-numeric text pass through
  percent: (value) => {
    if (value.endsWith('%')) return value;
    const numeric = Number(value);
    if (value === '' || !Number.isFinite(numeric)) return value;
    return `${numeric.toFixed(2)}%`;
  },
  uppercase: (value) => value.toUpperCase(),
};

export function isFieldFormat(value: string): value is FieldFormat {
  return FIELD_FORMATS.some((format) => format === value);
}
