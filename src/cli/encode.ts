#!/usr/bin/env node
/**
 * One-shot cipher command.
 *
 * Usage:
 *   npm run encode -- --alphabet alphabets/latin.txt --cipher caesar --key 3 --text "hello world"
 *   npm run encode -- -a alphabets/latin.txt -c vigenere -k lemon -d "lxfopv"
 *
 * Options:
 *   -a, --alphabet <path>   Alphabet file (default: $CIPHER_ALPHABET_PATH)
 *   -c, --cipher <name>     caesar | vigenere | atbash
 *   -k, --key <key>         Integer shift (caesar) or key text (vigenere)
 *   -t, --text <text>       Text to transform (or pass it as positional arguments)
 *   -d, --decrypt           Decrypt instead of encrypt
 *   --json                  Output the result as JSON
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Usage or cipher error
 *   2 - Alphabet error (malformed alphabet, or a symbol outside it)
 *   3 - Alphabet file not found
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import { loadAlphabet } from "../alphabet/index.js";
import { CipherName, parseCipherRequest, runCipher } from "../ciphers/index.js";
import { loadConfig } from "../config/index.js";
import { isCipherError, type CipherErrorKind } from "../errors/index.js";
import { createLogger, initRunId, silentLogger, type Logger } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

export interface EncodeOptions {
  /** Alphabet file used when --alphabet is absent */
  defaultAlphabetPath?: string;
  logger?: Logger;
}

export interface EncodeOutcome {
  exitCode: number;
  stdout: string[];
  stderr: string[];
}

export const EXIT_CODES: Readonly<Record<CipherErrorKind, number>> = Object.freeze({
  cipher_usage: 1,
  alphabet: 2,
  not_found: 3,
});

const HELP = `
Usage: encode --alphabet <path> --cipher <name> [--key <key>] [--decrypt] --text <text>

Options:
  -a, --alphabet <path>   Alphabet file (default: $CIPHER_ALPHABET_PATH)
  -c, --cipher <name>     caesar | vigenere | atbash
  -k, --key <key>         Integer shift (caesar) or key text (vigenere)
  -t, --text <text>       Text to transform (or pass it as positional arguments)
  -d, --decrypt           Decrypt instead of encrypt
  --json                  Output the result as JSON
  -h, --help              Show this help message

Exit codes:
  0 - Success
  1 - Usage or cipher error
  2 - Alphabet error
  3 - Alphabet file not found
`;

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      alphabet: { type: "string", short: "a" },
      cipher: { type: "string", short: "c" },
      key: { type: "string", short: "k" },
      text: { type: "string", short: "t" },
      decrypt: { type: "boolean", short: "d", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

// ============================================================
// Command
// ============================================================

/**
 * Run the command without touching the process: output and exit code are returned.
 */
export function runEncode(argv: string[], options: EncodeOptions = {}): EncodeOutcome {
  const logger = options.logger ?? silentLogger;
  const stdout: string[] = [];
  const stderr: string[] = [];
  const fail = (exitCode: number, message: string): EncodeOutcome => {
    stderr.push(`Error: ${message}`);
    return { exitCode, stdout, stderr };
  };

  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    return fail(1, err instanceof Error ? err.message : String(err));
  }
  const { values, positionals } = args;

  if (values.help) {
    stdout.push(HELP);
    return { exitCode: 0, stdout, stderr };
  }

  const alphabetPath = values.alphabet ?? options.defaultAlphabetPath;
  if (alphabetPath === undefined) {
    return fail(1, "--alphabet is required (or set CIPHER_ALPHABET_PATH)");
  }

  const cipher = CipherName.safeParse(values.cipher);
  if (!cipher.success) {
    return fail(1, `--cipher must be one of ${CipherName.options.join(", ")}`);
  }

  const text = values.text ?? positionals.join(" ");
  const mode = values.decrypt ? "decrypt" : "encrypt";

  try {
    const alphabet = loadAlphabet(alphabetPath);
    logger.debug("Alphabet loaded", { path: alphabetPath, size: alphabet.size });

    const request = parseCipherRequest({ cipher: cipher.data, mode, key: values.key, text });
    const result = runCipher(request, alphabet);
    logger.info("Cipher applied", { cipher: request.cipher, mode: request.mode });

    stdout.push(
      values.json ? JSON.stringify({ cipher: request.cipher, mode: request.mode, result }, null, 2) : result
    );
    return { exitCode: 0, stdout, stderr };
  } catch (err) {
    if (!isCipherError(err)) {
      throw err;
    }
    logger.warn("Cipher command failed", { kind: err.kind, error: err.message });
    return fail(EXIT_CODES[err.kind], err.message);
  }
}

// Only run when executed directly (not imported by tests)
function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isDirectExecution()) {
  try {
    const config = loadConfig();
    initRunId();
    const logger = createLogger({
      level: config.logLevel,
      file: config.logToFile,
      logDir: config.logDir,
    });

    const outcome = runEncode(process.argv.slice(2), {
      defaultAlphabetPath: config.alphabetPath,
      logger,
    });
    outcome.stdout.forEach((line) => console.log(line));
    outcome.stderr.forEach((line) => console.error(line));
    process.exit(outcome.exitCode);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}
