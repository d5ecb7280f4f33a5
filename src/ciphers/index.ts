/**
 * Cipher engine.
 *
 * Usage:
 *   import { loadAlphabet } from "../alphabet/index.js";
 *   import { caesar, vigenere, atbash } from "./ciphers/index.js";
 *
 *   const alphabet = loadAlphabet("alphabets/russian.txt");
 *   const secret = vigenere("привет мир", "ключ", alphabet, "encrypt");
 *   vigenere(secret, "ключ", alphabet, "decrypt"); // "привет мир"
 */

export { caesar, normalizeShift, type ShiftKey } from "./caesar.js";
export { vigenere } from "./vigenere.js";
export { atbash } from "./atbash.js";
export { CipherMode, CipherName, CIPHERS, type CipherInfo } from "./types.js";
export {
  CipherRequestSchema,
  CaesarRequestSchema,
  VigenereRequestSchema,
  AtbashRequestSchema,
  ShiftKeySchema,
  parseCipherRequest,
  runCipher,
  type CipherRequest,
} from "./request.js";

// Alphabet and error surface, so library users need a single import
export {
  Alphabet,
  createAlphabet,
  loadAlphabet,
  parseAlphabet,
  validateText,
  findUnknownSymbol,
} from "../alphabet/index.js";
export * from "../errors/index.js";
