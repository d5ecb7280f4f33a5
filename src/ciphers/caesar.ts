/**
 * Caesar cipher: every symbol moves a fixed number of positions along the
 * alphabet, wrapping at the end.
 */

import { mod, validateText, type Alphabet } from "../alphabet/index.js";
import { CipherUsageError } from "../errors/index.js";
import { substitute } from "./transform.js";
import type { CipherMode } from "./types.js";

/**
 * Integer shift. Keys beyond Number.MAX_SAFE_INTEGER arrive as bigint.
 */
export type ShiftKey = number | bigint;

/**
 * Reduce a shift to [0, size).
 *
 * @throws CipherUsageError if a number key is not an integer
 */
export function normalizeShift(key: ShiftKey, size: number): number {
  if (typeof key === "bigint") {
    const n = BigInt(size);
    return Number(((key % n) + n) % n);
  }
  if (!Number.isInteger(key)) {
    throw new CipherUsageError(`Caesar key must be an integer, got: ${key}`);
  }
  return mod(key, size);
}

/**
 * Encrypt or decrypt with a fixed shift.
 *
 * @param key - Shift; negative values and values past the alphabet size wrap
 * @throws CipherUsageError if the key is not an integer
 * @throws AlphabetError if the text uses a symbol outside the alphabet
 */
export function caesar(
  text: string,
  key: ShiftKey,
  alphabet: Alphabet,
  mode: CipherMode = "encrypt"
): string {
  const shift = normalizeShift(key, alphabet.size);
  validateText(text, alphabet);

  const direction = mode === "encrypt" ? 1 : -1;

  return substitute(text, alphabet, (index) => index + direction * shift);
}
