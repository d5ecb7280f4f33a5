/**
 * Text validation against an alphabet.
 *
 * The space character is always accepted: ciphers copy it through without
 * translating it. Validation is fail-fast and reports only the first
 * offending symbol.
 */

import { AlphabetError } from "../errors/index.js";
import type { Alphabet } from "./alphabet.js";

/** Symbol every cipher passes through untouched */
export const PASS_THROUGH = " ";

export interface UnknownSymbol {
  symbol: string;
  /** Code-point position in the validated text */
  position: number;
}

/**
 * Find the first symbol of `text` that is neither a space nor in the alphabet.
 */
export function findUnknownSymbol(text: string, alphabet: Alphabet): UnknownSymbol | null {
  let position = 0;
  for (const symbol of text) {
    if (symbol !== PASS_THROUGH && !alphabet.has(symbol)) {
      return { symbol, position };
    }
    position++;
  }
  return null;
}

/**
 * Check that every symbol of `text` belongs to the alphabet.
 *
 * @throws AlphabetError naming the first symbol not in the alphabet
 */
export function validateText(text: string, alphabet: Alphabet): void {
  const unknown = findUnknownSymbol(text, alphabet);
  if (unknown) {
    throw new AlphabetError(`Symbol "${unknown.symbol}" is not in the alphabet`, {
      reason: "unknown_symbol",
      symbol: unknown.symbol,
      position: unknown.position,
    });
  }
}
