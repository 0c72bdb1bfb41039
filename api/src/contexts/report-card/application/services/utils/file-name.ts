// characters Windows rejects in a path component, plus control characters
const INVALID_FILE_NAME_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;
const MAX_FILE_NAME_LENGTH = 200;

export function sanitizeFileName(name: string): string {
  let sanitized = name.replace(INVALID_FILE_NAME_CHARS, '_');
  sanitized = sanitized.replace(/^[ .]+|[ .]+$/g, '');

  if (sanitized.length > MAX_FILE_NAME_LENGTH) {
    sanitized = sanitized.slice(0, MAX_FILE_NAME_LENGTH);
  }

  return sanitized || 'unnamed';
}

/**
 * Hands out file names unique within one run (case-insensitive): "Asha", "Asha_2", ...
 */
export class FileNameAllocator {
  private readonly taken = new Set<string>();

  allocate(baseName: string): string {
    let candidate = baseName;
    let counter = 1;
    while (this.taken.has(candidate.toLowerCase())) {
      counter++;
      candidate = `${baseName}_${counter}`;
    }
    this.taken.add(candidate.toLowerCase());
    return candidate;
  }
}
