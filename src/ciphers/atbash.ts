/**
 * Atbash cipher: each symbol maps to its mirror position in the alphabet.
 * Applying it twice restores the text.
 */

import { validateText, type Alphabet } from "../alphabet/index.js";
import { substitute } from "./transform.js";
import type { CipherMode } from "./types.js";

/**
 * @param _mode - Accepted for a uniform signature; both directions are the same
 * @throws AlphabetError if the text uses a symbol outside the alphabet
 */
export function atbash(text: string, alphabet: Alphabet, _mode: CipherMode = "encrypt"): string {
  validateText(text, alphabet);
  const last = alphabet.size - 1;
  return substitute(text, alphabet, (index) => last - index);
}
