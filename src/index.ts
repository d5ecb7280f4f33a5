#!/usr/bin/env node
/**
 * Entry point for the interactive cipher session.
 *
 * Usage:
 *   npm start
 *   npm start -- --alphabet alphabets/russian.txt
 */

import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";

import { runSession, type SessionIO, type SessionOutcome } from "./cli/session.js";
import { ConfigError, loadConfig } from "./config/index.js";
import { createLogger, initRunId } from "./logging/index.js";

const EXIT_CODES: Record<SessionOutcome, number> = {
  exit: 0,
  interrupted: 130,
  alphabet_error: 2,
  not_found: 3,
};

/**
 * Console-backed SessionIO. Closing stdin (Ctrl+D) or Ctrl+C ends input.
 */
function createConsoleIO(): { io: SessionIO; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let isClosed = false;
  const closed = new Promise<null>((resolve) => {
    rl.once("close", () => {
      isClosed = true;
      resolve(null);
    });
  });
  rl.on("SIGINT", () => rl.close());

  const io: SessionIO = {
    ask: async (prompt) => {
      if (isClosed) {
        return null;
      }
      const answer = rl.question(prompt).catch((err: unknown) => {
        if (isClosed) {
          return null;
        }
        throw err;
      });
      return Promise.race([answer, closed]);
    },
    print: (line) => console.log(line),
  };

  return { io, close: () => rl.close() };
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      alphabet: { type: "string", short: "a" },
    },
  });

  const runId = initRunId();
  const config = loadConfig();
  const logger = createLogger({
    level: config.logLevel,
    file: config.logToFile,
    logDir: config.logDir,
  });
  logger.debug("Session starting", { runId, env: config.env });

  const { io, close } = createConsoleIO();
  try {
    const outcome = await runSession(io, {
      alphabetPath: values.alphabet ?? config.alphabetPath,
      logger,
    });
    logger.debug("Session finished", { outcome });
    return EXIT_CODES[outcome];
  } finally {
    close();
  }
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`Unexpected error: ${message}`);
    }
    process.exitCode = 1;
  });
