import { InvalidColumnAddressError } from '../errors';

const COLUMN_LETTERS = /^[A-Za-z]+$/;

/**
 * Column letter to 0-based index ('A' -> 0, 'Z' -> 25, 'AA' -> 26)
 */
export function columnLetterToIndex(address: string): number {
  // checked before upper-casing: 'ß' would become 'SS'
  if (!COLUMN_LETTERS.test(address)) {
    throw new InvalidColumnAddressError(address);
  }
  const letters = address.toUpperCase();

  let col = 0;
  for (let i = 0; i < letters.length; i++) {
    col = col * 26 + (letters.charCodeAt(i) - 64);
  }
  return col - 1;
}

/**
 * 0-based index to column letter (0 -> 'A', 26 -> 'AA')
 */
export function columnIndexToLetter(index: number): string {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`Column index must be a non-negative integer, got ${index}`);
  }

  let letter = '';
  let temp = index + 1;
  while (temp > 0) {
    const remainder = (temp - 1) % 26;
    letter = String.fromCharCode(65 + remainder) + letter;
    temp = Math.floor((temp - 1) / 26);
  }
  return letter;
}
