/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { LOG_LEVELS, type LogLevel } from "../logging/index.js";
import { maybeEnv, optionalEnv, optionalEnvBool, optionalEnvChoice } from "./env.js";

export { ConfigError } from "./env.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: Environment;
  /** Minimum log level */
  readonly logLevel: LogLevel;
  /** Also append log lines to a file */
  readonly logToFile: boolean;
  /** Directory for log files */
  readonly logDir: string;
  /** Alphabet file used when none is given on the command line */
  readonly alphabetPath?: string;
}

/**
 * Load and validate configuration from the environment.
 * Fails fast with ConfigError on the first invalid value.
 */
export function loadConfig(): AppConfig {
  return Object.freeze({
    env: optionalEnvChoice("NODE_ENV", ENVIRONMENTS, "development"),
    logLevel: optionalEnvChoice("LOG_LEVEL", LOG_LEVELS, "warn"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    alphabetPath: maybeEnv("CIPHER_ALPHABET_PATH"),
  });
}
