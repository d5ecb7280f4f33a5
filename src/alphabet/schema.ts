/**
 * Schema for alphabet source content.
 *
 * Source files hold a single logical line of symbols. Surrounding whitespace,
 * the trailing newline and a byte-order mark are not part of the alphabet.
 */

import { z } from "zod";

export const AlphabetSourceSchema = z
  .string()
  .trim()
  .min(1, { message: "Alphabet must not be empty" })
  .describe("Alphabet symbols in cipher order, one logical line");

export type AlphabetSource = z.infer<typeof AlphabetSourceSchema>;
