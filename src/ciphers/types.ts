/**
 * Cipher vocabulary shared by the engine and the console layer.
 */

import { z } from "zod";

/**
 * Direction of a transformation.
 */
export const CipherMode = z.enum(["encrypt", "decrypt"]);
export type CipherMode = z.infer<typeof CipherMode>;

/**
 * Ciphers the engine implements.
 */
export const CipherName = z.enum(["caesar", "vigenere", "atbash"]);
export type CipherName = z.infer<typeof CipherName>;

export interface CipherInfo {
  readonly name: CipherName;
  /** Menu label */
  readonly label: string;
  /** What the cipher takes as a key */
  readonly key: "integer" | "text" | "none";
}

/**
 * Display metadata, in menu order.
 */
export const CIPHERS: readonly CipherInfo[] = Object.freeze([
  { name: "caesar", label: "Caesar cipher", key: "integer" },
  { name: "vigenere", label: "Vigenère cipher", key: "text" },
  { name: "atbash", label: "Atbash cipher", key: "none" },
]);
