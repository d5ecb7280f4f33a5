/**
 * Interactive cipher session.
 *
 * Asks for an alphabet file once, then loops: pick a cipher, pick a
 * direction, enter a key and a text, print the result. Every prompt repeats
 * until the answer is usable. Input and output go through SessionIO so the
 * whole dialogue can be scripted.
 */

import { existsSync } from "node:fs";

import { loadAlphabet, type Alphabet } from "../alphabet/index.js";
import {
  CIPHERS,
  ShiftKeySchema,
  parseCipherRequest,
  runCipher,
  type CipherInfo,
  type CipherMode,
  type ShiftKey,
} from "../ciphers/index.js";
import { isCipherError } from "../errors/index.js";
import { silentLogger, type Logger } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface SessionIO {
  /** Show a prompt and read one line; null once input has ended */
  ask(prompt: string): Promise<string | null>;
  print(line: string): void;
}

export interface SessionOptions {
  /** Skip the alphabet prompt and load this file */
  alphabetPath?: string;
  logger?: Logger;
  /** Used by the alphabet prompt to decide whether to ask again */
  fileExists?: (path: string) => boolean;
}

/**
 * How a session ended.
 */
export type SessionOutcome = "exit" | "interrupted" | "not_found" | "alphabet_error";

/** Answers to "Continue?" that keep the session going */
export const CONTINUE_ANSWERS: readonly string[] = ["yes", "y", "да", "д"];

class EndOfInput extends Error {
  constructor() {
    super("Input ended");
    this.name = "EndOfInput";
  }
}

// ============================================================
// Prompts
// ============================================================

async function prompt(io: SessionIO, text: string): Promise<string> {
  const answer = await io.ask(text);
  if (answer === null) {
    throw new EndOfInput();
  }
  return answer;
}

async function askAlphabetPath(
  io: SessionIO,
  fileExists: (path: string) => boolean
): Promise<string> {
  for (;;) {
    const path = (await prompt(io, "Enter the path to the alphabet file: ")).trim();
    if (fileExists(path)) {
      return path;
    }
    io.print(`Error: file '${path}' not found. Try again.`);
  }
}

/**
 * Show the cipher menu. Returns null when the user picks Exit.
 */
async function selectCipher(io: SessionIO): Promise<CipherInfo | null> {
  const exitChoice = CIPHERS.length + 1;

  io.print("");
  io.print("Choose a cipher:");
  CIPHERS.forEach((cipher, index) => io.print(`${index + 1}. ${cipher.label}`));
  io.print(`${exitChoice}. Exit`);

  for (;;) {
    const answer = (await prompt(io, `Your choice (1-${exitChoice}): `)).trim();
    if (!/^[+-]?\d+$/.test(answer)) {
      io.print("Error: enter a number");
      continue;
    }
    const choice = Number(answer);
    if (choice === exitChoice) {
      return null;
    }
    const cipher = CIPHERS[choice - 1];
    if (choice >= 1 && cipher !== undefined) {
      return cipher;
    }
    io.print(`Error: enter a number from 1 to ${exitChoice}`);
  }
}

async function selectMode(io: SessionIO): Promise<CipherMode> {
  for (;;) {
    const answer = (await prompt(io, "Choose an operation (1 - encrypt, 2 - decrypt): ")).trim();
    if (answer === "1") return "encrypt";
    if (answer === "2") return "decrypt";
    io.print("Error: enter 1 or 2");
  }
}

async function askKey(
  io: SessionIO,
  cipher: CipherInfo,
  mode: CipherMode
): Promise<ShiftKey | string | undefined> {
  switch (cipher.key) {
    case "integer":
      for (;;) {
        const parsed = ShiftKeySchema.safeParse(await prompt(io, "Enter the key (integer): "));
        if (parsed.success) {
          return parsed.data;
        }
        io.print("Error: the key must be an integer");
      }
    case "text": {
      const action = mode === "encrypt" ? "encryption" : "decryption";
      for (;;) {
        const key = (await prompt(io, `Enter the key for ${action}: `)).trim();
        if (key) {
          return key;
        }
        io.print("Error: the key must not be empty");
      }
    }
    case "none":
      return undefined;
  }
}

async function askText(io: SessionIO): Promise<string> {
  for (;;) {
    const text = (await prompt(io, "Enter the text: ")).trim();
    if (text) {
      return text;
    }
    io.print("Error: the text must not be empty");
  }
}

// ============================================================
// Session
// ============================================================

/**
 * Run one cipher request and print its result, or the reason it failed.
 */
function applyCipher(
  io: SessionIO,
  logger: Logger,
  alphabet: Alphabet,
  input: { cipher: CipherInfo; mode: CipherMode; key: ShiftKey | string | undefined; text: string }
): void {
  try {
    const request = parseCipherRequest({
      cipher: input.cipher.name,
      mode: input.mode,
      key: input.key,
      text: input.text,
    });
    const result = runCipher(request, alphabet);

    io.print("");
    io.print(`${input.mode === "encrypt" ? "Encrypted" : "Decrypted"} text:`);
    io.print("-".repeat(30));
    io.print(result);
    io.print("-".repeat(30));
    logger.info("Cipher applied", { cipher: request.cipher, mode: request.mode });
  } catch (err) {
    if (!isCipherError(err)) {
      throw err;
    }
    switch (err.kind) {
      case "alphabet":
        io.print(`Error in text: ${err.message}`);
        break;
      case "cipher_usage":
        io.print(`Cipher error: ${err.message}`);
        break;
      case "not_found":
        throw err;
    }
    logger.warn("Cipher request rejected", { cipher: input.cipher.name, error: err.message });
  }
}

async function loop(io: SessionIO, logger: Logger, alphabet: Alphabet): Promise<void> {
  for (;;) {
    const cipher = await selectCipher(io);
    if (cipher === null) {
      return;
    }

    const mode = await selectMode(io);
    const key = await askKey(io, cipher, mode);
    const text = await askText(io);

    applyCipher(io, logger, alphabet, { cipher, mode, key, text });

    io.print("");
    const answer = (await prompt(io, "Continue? (yes/no): ")).trim().toLowerCase();
    if (!CONTINUE_ANSWERS.includes(answer)) {
      return;
    }
  }
}

/**
 * Run an interactive session until the user exits or input ends.
 */
export async function runSession(
  io: SessionIO,
  options: SessionOptions = {}
): Promise<SessionOutcome> {
  const logger = options.logger ?? silentLogger;
  const fileExists = options.fileExists ?? existsSync;

  io.print("=".repeat(50));
  io.print("Text encryption and decryption");
  io.print("=".repeat(50));

  try {
    const path = options.alphabetPath ?? (await askAlphabetPath(io, fileExists));

    let alphabet: Alphabet;
    try {
      alphabet = loadAlphabet(path);
    } catch (err) {
      if (!isCipherError(err)) {
        throw err;
      }
      logger.error("Alphabet rejected", { path, error: err.message });
      if (err.kind === "not_found") {
        io.print(`Error: ${err.message}`);
        return "not_found";
      }
      io.print(`Error in alphabet: ${err.message}`);
      return "alphabet_error";
    }

    io.print(`Alphabet loaded (${alphabet.size} symbols)`);
    logger.info("Alphabet loaded", { path, size: alphabet.size });

    await loop(io, logger, alphabet);
    io.print("Exiting.");
    return "exit";
  } catch (err) {
    if (err instanceof EndOfInput) {
      io.print("");
      io.print("Interrupted by user.");
      return "interrupted";
    }
    throw err;
  }
}
