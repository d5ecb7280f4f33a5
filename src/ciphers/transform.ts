import type { Alphabet } from "../alphabet/index.js";
import { PASS_THROUGH } from "../alphabet/index.js";

/**
 * Maps a symbol's alphabet index to its replacement index.
 * `position` counts code points over the whole text, spaces included.
 */
export type IndexMapper = (index: number, position: number) => number;

/**
 * Substitute every non-space symbol of an already validated text.
 */
export function substitute(text: string, alphabet: Alphabet, mapIndex: IndexMapper): string {
  let output = "";
  let position = 0;

  for (const symbol of text) {
    if (symbol === PASS_THROUGH) {
      output += symbol;
    } else {
      const index = alphabet.indexOf(symbol);
      if (index === undefined) {
        throw new RangeError(`Symbol "${symbol}" reached substitution without validation`);
      }
      output += alphabet.at(mapIndex(index, position));
    }
    position++;
  }

  return output;
}
