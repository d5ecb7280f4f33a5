/**
 * Alphabet loader.
 *
 * Responsible for:
 * - Reading alphabet files (UTF-8, one logical line)
 * - Normalizing the content through AlphabetSourceSchema
 * - Rejecting empty alphabets and repeated symbols
 */

import { readFileSync } from "node:fs";
import { AlphabetError, AlphabetNotFoundError } from "../errors/index.js";
import { Alphabet } from "./alphabet.js";
import { AlphabetSourceSchema } from "./schema.js";

/**
 * Parse alphabet source content.
 *
 * @param content - Raw file content
 * @returns Frozen alphabet
 * @throws AlphabetError if the trimmed content is empty or repeats a symbol
 */
export function parseAlphabet(content: string): Alphabet {
  const result = AlphabetSourceSchema.safeParse(content);

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new AlphabetError(issue?.message ?? "Alphabet must not be empty", {
      reason: "empty",
    });
  }

  return Alphabet.from(result.data);
}

/**
 * Load an alphabet from a file.
 *
 * @param filePath - Path to a UTF-8 text file
 * @throws AlphabetNotFoundError if the file cannot be opened
 * @throws AlphabetError if the content is not a valid alphabet
 */
export function loadAlphabet(filePath: string): Alphabet {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new AlphabetNotFoundError(filePath, err);
  }
  return parseAlphabet(content);
}
