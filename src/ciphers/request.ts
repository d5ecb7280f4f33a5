/**
 * Cipher requests: one validated bundle of (cipher, mode, text, key) that the
 * console front ends build from user input and hand to the engine.
 */

import { z, type ZodIssue } from "zod";
import type { Alphabet } from "../alphabet/index.js";
import { CipherUsageError } from "../errors/index.js";
import { atbash } from "./atbash.js";
import { caesar } from "./caesar.js";
import { vigenere } from "./vigenere.js";
import { CipherMode } from "./types.js";

/**
 * Integer shift, given as a number, a bigint or text such as "-3".
 * Text keys become bigint so that no digit of a long key is lost.
 */
export const ShiftKeySchema = z.union([
  z.number().int(),
  z.bigint(),
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, { message: "Key must be an integer" })
    .transform((value) => BigInt(value.replace(/^\+/, ""))),
]);

export const CaesarRequestSchema = z.object({
  cipher: z.literal("caesar"),
  mode: CipherMode.default("encrypt"),
  text: z.string(),
  key: ShiftKeySchema,
});

export const VigenereRequestSchema = z.object({
  cipher: z.literal("vigenere"),
  mode: CipherMode.default("encrypt"),
  text: z.string(),
  key: z.string({ required_error: "Key is required" }).min(1, { message: "Key must not be empty" }),
});

export const AtbashRequestSchema = z.object({
  cipher: z.literal("atbash"),
  mode: CipherMode.default("encrypt"),
  text: z.string(),
});

export const CipherRequestSchema = z.discriminatedUnion("cipher", [
  CaesarRequestSchema,
  VigenereRequestSchema,
  AtbashRequestSchema,
]);

export type CipherRequest = z.infer<typeof CipherRequestSchema>;

function describeIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(request)";
  return `${path}: ${issue.message}`;
}

/**
 * Validate a raw request.
 *
 * @throws CipherUsageError listing every schema violation
 */
export function parseCipherRequest(input: unknown): CipherRequest {
  const result = CipherRequestSchema.safeParse(input);
  if (!result.success) {
    throw new CipherUsageError(
      `Invalid cipher request: ${result.error.issues.map(describeIssue).join("; ")}`
    );
  }
  return result.data;
}

/**
 * Run a validated request against an alphabet.
 */
export function runCipher(request: CipherRequest, alphabet: Alphabet): string {
  switch (request.cipher) {
    case "caesar":
      return caesar(request.text, request.key, alphabet, request.mode);
    case "vigenere":
      return vigenere(request.text, request.key, alphabet, request.mode);
    case "atbash":
      return atbash(request.text, alphabet, request.mode);
  }
}
