/**
 * Vigenère cipher: a repeating key varies the shift per text position.
 *
 * The key symbol for a text symbol is chosen by its position in the whole
 * text. Spaces are copied through but still advance that position, so
 * "ab cd" under key "ba" uses key symbols b, a, -, a, b.
 */

import { validateText, PASS_THROUGH, type Alphabet } from "../alphabet/index.js";
import { CipherUsageError } from "../errors/index.js";
import { substitute } from "./transform.js";
import type { CipherMode } from "./types.js";

/**
 * Encrypt or decrypt with a repeating key.
 *
 * @param key - Key text; its spaces are removed before use
 * @throws CipherUsageError if the key is empty or only spaces
 * @throws AlphabetError if the text or the key uses a symbol outside the alphabet
 */
export function vigenere(
  text: string,
  key: string,
  alphabet: Alphabet,
  mode: CipherMode = "encrypt"
): string {
  validateText(text, alphabet);
  validateText(key, alphabet);
  if (key.length === 0) {
    throw new CipherUsageError("Key must not be empty");
  }

  const shifts: number[] = [];
  for (const symbol of key) {
    if (symbol === PASS_THROUGH) continue;
    const index = alphabet.indexOf(symbol);
    if (index !== undefined) {
      shifts.push(index);
    }
  }

  if (shifts.length === 0) {
    throw new CipherUsageError("Key must contain at least one alphabet symbol");
  }

  const direction = mode === "encrypt" ? 1 : -1;

  return substitute(text, alphabet, (index, position) => {
    const shift = shifts[position % shifts.length] ?? 0;
    return index + direction * shift;
  });
}
