/**
 * Error taxonomy for the cipher engine.
 *
 * Every error carries a `kind` discriminant so callers can branch with a
 * `switch` instead of walking the class hierarchy:
 *
 *   cipher_usage  - a cipher was called with parameters it cannot use
 *   alphabet      - malformed alphabet, or a symbol outside the alphabet
 *   not_found     - the alphabet source could not be opened
 */

export type CipherErrorKind = "cipher_usage" | "alphabet" | "not_found";

/**
 * Why an alphabet or a text was rejected.
 */
export type AlphabetErrorReason = "empty" | "duplicate" | "unknown_symbol";

/**
 * Base class for everything the engine throws.
 */
export abstract class CipherError extends Error {
  abstract readonly kind: CipherErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /**
   * Format the error for display.
   */
  format(): string {
    return `${this.name}: ${this.message}`;
  }
}

/**
 * A cipher received parameters it cannot work with (e.g. an empty key).
 */
export class CipherUsageError extends CipherError {
  readonly kind = "cipher_usage";
}

/**
 * The alphabet is malformed, or a text/key uses a symbol it does not contain.
 */
export class AlphabetError extends CipherError {
  readonly kind = "alphabet";
  public readonly reason: AlphabetErrorReason;
  /** Offending symbol, for "duplicate" and "unknown_symbol" */
  public readonly symbol?: string;
  /** Code-point position of the offending symbol in its source string */
  public readonly position?: number;

  constructor(
    message: string,
    details: { reason: AlphabetErrorReason; symbol?: string; position?: number }
  ) {
    super(message);
    this.reason = details.reason;
    this.symbol = details.symbol;
    this.position = details.position;
  }

  format(): string {
    if (this.symbol === undefined) {
      return `${this.name}: ${this.message}`;
    }
    return `${this.name}: ${this.message} (symbol "${this.symbol}" at position ${this.position ?? "?"})`;
  }
}

/**
 * The alphabet source does not exist or cannot be read.
 */
export class AlphabetNotFoundError extends CipherError {
  readonly kind = "not_found";
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Alphabet file not found: ${path}`, { cause });
    this.path = path;
  }
}

/**
 * Type guard for errors raised by the engine.
 */
export function isCipherError(value: unknown): value is CipherError {
  return value instanceof CipherError;
}
