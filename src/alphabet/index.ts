/**
 * Alphabet module.
 *
 * Usage:
 *   import { loadAlphabet, validateText } from "./alphabet/index.js";
 *
 *   const alphabet = loadAlphabet("alphabets/russian.txt");
 *   validateText("привет мир", alphabet);
 */

export { Alphabet, createAlphabet, findDuplicateSymbol, mod } from "./alphabet.js";
export { AlphabetSourceSchema, type AlphabetSource } from "./schema.js";
export { loadAlphabet, parseAlphabet } from "./loader.js";
export {
  validateText,
  findUnknownSymbol,
  PASS_THROUGH,
  type UnknownSymbol,
} from "./validators.js";
