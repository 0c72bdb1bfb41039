/**
 * Per-student payload for the template stage: placeholder key -> display string.
 * Key order follows the field mapping, with `class` last.
 */
export type FieldDict = ReadonlyMap<string, string>;

export const CLASS_FIELD = 'class';

export function fieldDictToRecord(fields: FieldDict): Record<string, string> {
  return Object.fromEntries(fields);
}
