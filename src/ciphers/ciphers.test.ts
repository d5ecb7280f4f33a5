/**
 * Cipher engine tests.
 *
 * Run: node --import tsx src/ciphers/ciphers.test.ts
 *
 * Covers:
 *   1. Caesar shifts, wrapping and key normalization
 *   2. Vigenère key stream (spaces advance the key position)
 *   3. Atbash mirroring and mode independence
 *   4. Round trips over Latin, Cyrillic and emoji alphabets
 *   5. Validation failures propagate with no partial output
 */

import { strict as assert } from "node:assert";

import { caesar, vigenere, atbash, normalizeShift } from "./index.js";
import { createAlphabet } from "../alphabet/index.js";
import { AlphabetError, CipherUsageError } from "../errors/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const LATIN6 = createAlphabet("abcdef");
const RUSSIAN = createAlphabet("абвгдеёжзийклмнопрстуфхцчшщъыьэюя");
const SHORT_RUSSIAN = createAlphabet("абвгде");

// ═══════════════════════════════════════════════════════════════════════════
// CAESAR
// ═══════════════════════════════════════════════════════════════════════════

section("Caesar — Shifts");

test("shifts each symbol and wraps at the end", () => {
  assert.equal(caesar("ace", 2, LATIN6, "encrypt"), "cea");
  assert.equal(caesar("cea", 2, LATIN6, "decrypt"), "ace");
});

test("encrypt is the default mode", () => {
  assert.equal(caesar("ace", 2, LATIN6), "cea");
});

test("spaces pass through", () => {
  assert.equal(caesar("a b", 1, LATIN6, "encrypt"), "b c");
});

test("Cyrillic text", () => {
  assert.equal(caesar("привет", 3, RUSSIAN, "encrypt"), "тулезх");
  assert.equal(caesar("тулезх", 3, RUSSIAN, "decrypt"), "привет");
});

test("round trip for every key from -13 to 13", () => {
  const text = "привет мир";
  for (let key = -13; key <= 13; key++) {
    assert.equal(caesar(caesar(text, key, RUSSIAN, "encrypt"), key, RUSSIAN, "decrypt"), text);
  }
});

section("Caesar — Key Normalization");

test("negative and oversized keys are normalized", () => {
  assert.equal(caesar("ace", -4, LATIN6, "encrypt"), "cea");
  assert.equal(caesar("ace", 8, LATIN6, "encrypt"), "cea");
  assert.equal(caesar("ace", 6, LATIN6, "encrypt"), "ace");
});

test("integer keys past 2^53 shift by key mod n", () => {
  // 2^60 mod 6 = 4
  assert.equal(normalizeShift(2 ** 60, 6), 4);
  assert.equal(caesar("ace", 2 ** 60, LATIN6, "encrypt"), "eac");
  assert.equal(caesar("eac", 2 ** 60, LATIN6, "decrypt"), "ace");
});

test("a 20-digit bigint key shifts by key mod n", () => {
  // 10^20 mod 6 = 4, -10^20 mod 6 = 2
  assert.equal(normalizeShift(100000000000000000000n, 6), 4);
  assert.equal(normalizeShift(-100000000000000000000n, 6), 2);
  assert.equal(caesar("ace", 100000000000000000000n, LATIN6, "encrypt"), caesar("ace", 4, LATIN6, "encrypt"));
  assert.equal(caesar("ace", -100000000000000000000n, LATIN6, "encrypt"), "cea");
});

test("non-integer key is a usage error", () => {
  assert.throws(() => caesar("abc", 1.5, LATIN6), CipherUsageError);
  assert.throws(() => caesar("abc", Number.NaN, LATIN6), CipherUsageError);
  assert.throws(() => caesar("abc", Number.POSITIVE_INFINITY, LATIN6), CipherUsageError);
});

test("text outside the alphabet fails", () => {
  assert.throws(() => caesar("hello", 1, RUSSIAN), AlphabetError);
});

// ═══════════════════════════════════════════════════════════════════════════
// VIGENÈRE
// ═══════════════════════════════════════════════════════════════════════════

section("Vigenère — Key Stream");

test("spaces advance the key position", () => {
  assert.equal(vigenere("ab cd", "ba", LATIN6, "encrypt"), "bb ce");
  assert.equal(vigenere("bb ce", "ba", LATIN6, "decrypt"), "ab cd");
});

test("a space skips a key symbol", () => {
  assert.equal(vigenere("a a", "bc", LATIN6, "encrypt"), "b b");
});

test("spaces inside the key are removed", () => {
  assert.equal(vigenere("ab cd", "b a", LATIN6, "encrypt"), "bb ce");
});

test("Cyrillic round trip", () => {
  const text = "программирование";
  const encrypted = vigenere(text, "ключ", RUSSIAN, "encrypt");
  assert.notEqual(encrypted, text);
  assert.equal(vigenere(encrypted, "ключ", RUSSIAN, "decrypt"), text);
});

test("round trip with spaces in the text", () => {
  const text = "шифр виженера с пробелами";
  const encrypted = vigenere(text, "тайна", RUSSIAN, "encrypt");
  assert.equal(vigenere(encrypted, "тайна", RUSSIAN, "decrypt"), text);
});

test("emoji alphabet", () => {
  const emoji = createAlphabet("😀😁😂");
  assert.equal(vigenere("😀😀 😀", "😁", emoji, "encrypt"), "😁😁 😁");
});

section("Vigenère — Key Errors");

test("empty key is a usage error", () => {
  assert.throws(() => vigenere("текст", "", RUSSIAN), (err: unknown) => {
    assert.ok(err instanceof CipherUsageError);
    assert.equal(err.kind, "cipher_usage");
    assert.equal(err.message, "Key must not be empty");
    return true;
  });
});

test("invalid text is reported before an empty key", () => {
  assert.throws(() => vigenere("xyz", "", LATIN6), (err: unknown) => {
    assert.ok(err instanceof AlphabetError);
    assert.equal(err.symbol, "x");
    assert.equal(err.position, 0);
    return true;
  });
});

test("key of only spaces is a usage error", () => {
  assert.throws(() => vigenere("abc", "   ", LATIN6), (err: unknown) => {
    assert.ok(err instanceof CipherUsageError);
    assert.equal(err.message, "Key must contain at least one alphabet symbol");
    return true;
  });
});

test("key outside the alphabet fails", () => {
  assert.throws(() => vigenere("привет", "key", RUSSIAN), (err: unknown) => {
    assert.ok(err instanceof AlphabetError);
    assert.equal(err.symbol, "k");
    return true;
  });
});

test("invalid key symbol after a space", () => {
  assert.throws(() => vigenere("abc", "b z", LATIN6), (err: unknown) => {
    assert.ok(err instanceof AlphabetError);
    assert.equal(err.symbol, "z");
    assert.equal(err.position, 2);
    return true;
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// ATBASH
// ═══════════════════════════════════════════════════════════════════════════

section("Atbash");

test("maps each symbol to its mirror", () => {
  assert.equal(atbash("abc def", LATIN6, "encrypt"), "fed cba");
  assert.equal(atbash("абв", RUSSIAN, "encrypt"), "яюэ");
});

test("mode has no effect", () => {
  assert.equal(atbash("шифрование", RUSSIAN, "encrypt"), atbash("шифрование", RUSSIAN, "decrypt"));
});

test("applying twice restores the text", () => {
  const text = "шифр атбаш";
  assert.equal(atbash(atbash(text, RUSSIAN), RUSSIAN), text);
});

test("odd-sized alphabet keeps the middle symbol", () => {
  assert.equal(atbash("abc", createAlphabet("abc")), "cba");
  assert.equal(atbash("b", createAlphabet("abc")), "b");
});

// ═══════════════════════════════════════════════════════════════════════════
// FAIL-FAST
// ═══════════════════════════════════════════════════════════════════════════

section("Fail-Fast With a Minimal Alphabet");

test("every cipher rejects text outside a short alphabet", () => {
  const attempts: Array<() => string> = [
    () => caesar("привет", 1, SHORT_RUSSIAN),
    () => vigenere("привет", "а", SHORT_RUSSIAN),
    () => atbash("привет", SHORT_RUSSIAN),
  ];
  for (const attempt of attempts) {
    assert.throws(attempt, (err: unknown) => {
      assert.ok(err instanceof AlphabetError);
      assert.equal(err.symbol, "п");
      assert.equal(err.position, 0);
      return true;
    });
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
