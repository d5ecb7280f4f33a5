/**
 * Alphabet: an ordered, duplicate-free set of symbols.
 *
 * A symbol is a single Unicode code point, so alphabets in non-Latin scripts
 * (and outside the Basic Multilingual Plane) index the way a reader counts.
 * Position in the alphabet is the symbol's cipher index.
 */

import { AlphabetError } from "../errors/index.js";

/**
 * Locate the first symbol that occurs more than once.
 */
export function findDuplicateSymbol(
  symbols: readonly string[]
): { symbol: string; firstPosition: number; position: number } | null {
  const seen = new Map<string, number>();

  for (const [position, symbol] of symbols.entries()) {
    const firstPosition = seen.get(symbol);
    if (firstPosition !== undefined) {
      return { symbol, firstPosition, position };
    }
    seen.set(symbol, position);
  }

  return null;
}

export class Alphabet {
  /** Symbols in cipher order */
  public readonly symbols: readonly string[];
  private readonly positions: ReadonlyMap<string, number>;

  private constructor(symbols: string[]) {
    this.symbols = Object.freeze(symbols);
    this.positions = new Map(symbols.map((symbol, index): [string, number] => [symbol, index]));
    Object.freeze(this);
  }

  /**
   * Build an alphabet from a string, taken verbatim (no trimming).
   *
   * @throws AlphabetError if the string is empty or repeats a symbol
   */
  static from(source: string): Alphabet {
    const symbols = Array.from(source);

    if (symbols.length === 0) {
      throw new AlphabetError("Alphabet must not be empty", { reason: "empty" });
    }

    const duplicate = findDuplicateSymbol(symbols);
    if (duplicate) {
      throw new AlphabetError(
        `Alphabet contains duplicate symbols: "${duplicate.symbol}" appears at positions ${duplicate.firstPosition} and ${duplicate.position}`,
        { reason: "duplicate", symbol: duplicate.symbol, position: duplicate.position }
      );
    }

    return new Alphabet(symbols);
  }

  get size(): number {
    return this.symbols.length;
  }

  has(symbol: string): boolean {
    return this.positions.has(symbol);
  }

  /**
   * Position of a symbol, or undefined when it is not in the alphabet.
   */
  indexOf(symbol: string): number | undefined {
    return this.positions.get(symbol);
  }

  /**
   * Symbol at a position, wrapping with a non-negative modulo.
   */
  at(index: number): string {
    const symbol = this.symbols[mod(index, this.symbols.length)];
    if (symbol === undefined) {
      throw new RangeError(`No symbol at index ${index}`);
    }
    return symbol;
  }

  toString(): string {
    return this.symbols.join("");
  }
}

/**
 * Modulo whose result always lies in [0, n).
 */
export function mod(value: number, n: number): number {
  return ((value % n) + n) % n;
}

/**
 * Build an alphabet from an in-memory string.
 *
 * @throws AlphabetError if the string is empty or repeats a symbol
 */
export function createAlphabet(symbols: string): Alphabet {
  return Alphabet.from(symbols);
}
