/**
 * Signal extraction: turns a password into the feature record the scorer
 * consumes. Every function here is pure and total; no input throws.
 *
 * Lengths and frequencies are counted over Unicode code points, so an emoji
 * or an astral-plane character counts once.
 */

import type { PasswordFeatures } from "./schemas.js";
import { DEFAULT_REFERENCE_DATA, type ReferenceData } from "./reference-data.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SignalOptions {
  reference?: ReferenceData;
  /** Shortest alphabet run flagged as a sequence. Values below 2 are raised to 2. */
  minSequenceLength?: number;
}

export const DEFAULT_MIN_SEQUENCE_LENGTH = 3;

const REPETITION_RUN_LENGTH = 3;

// ---------------------------------------------------------------------------
// Character classes
// ---------------------------------------------------------------------------

const LOWERCASE = /[a-z]/;
const UPPERCASE = /[A-Z]/;
const DIGIT = /[0-9]/;
// Anything outside [A-Za-z0-9_]; whitespace and non-ASCII letters count.
const SPECIAL = /[^A-Za-z0-9_]/;

// ---------------------------------------------------------------------------
// Individual signals
// ---------------------------------------------------------------------------

/**
 * Estimated information content in bits: Shannon entropy of the password's own
 * character distribution multiplied by its length, rounded to 2 decimals.
 *
 * This measures how evenly the characters are spread, not how the password was
 * generated. "abcdefgh" scores 24 bits even though it is trivially guessable,
 * so treat the number as a structural hint only.
 */
export function calculateEntropy(password: string): number {
  const chars = Array.from(password);
  if (chars.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const ch of chars) {
    counts.set(ch, (counts.get(ch) ?? 0) + 1);
  }

  let perSymbol = 0;
  for (const count of counts.values()) {
    const p = count / chars.length;
    perSymbol -= p * Math.log2(p);
  }

  return Math.round(perSymbol * chars.length * 100) / 100;
}

/** True when some character appears `runLength` or more times in a row. */
export function hasRepeatedRun(password: string, runLength = REPETITION_RUN_LENGTH): boolean {
  let prev: string | undefined;
  let run = 0;

  for (const ch of password) {
    run = ch === prev ? run + 1 : 1;
    if (run >= runLength) return true;
    prev = ch;
  }

  return false;
}

/**
 * True when the password contains `minLength` consecutive characters of any
 * alphabet, read forwards ("abc", "123") or backwards ("cba", "321").
 */
export function hasSequentialPattern(
  password: string,
  alphabets: readonly string[] = DEFAULT_REFERENCE_DATA.alphabets,
  minLength = DEFAULT_MIN_SEQUENCE_LENGTH,
): boolean {
  const windowSize = Math.max(2, Math.trunc(minLength));

  for (const alphabet of alphabets) {
    const symbols = Array.from(alphabet);
    for (let i = 0; i + windowSize <= symbols.length; i++) {
      const window = symbols.slice(i, i + windowSize);
      if (password.includes(window.join(""))) return true;
      if (password.includes(window.reverse().join(""))) return true;
    }
  }

  return false;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function extractSignals(password: string, options: SignalOptions = {}): PasswordFeatures {
  const reference = options.reference ?? DEFAULT_REFERENCE_DATA;
  const minSequenceLength = options.minSequenceLength ?? DEFAULT_MIN_SEQUENCE_LENGTH;

  return {
    length: Array.from(password).length,
    has_lowercase: LOWERCASE.test(password),
    has_uppercase: UPPERCASE.test(password),
    has_digit: DIGIT.test(password),
    has_special: SPECIAL.test(password),
    is_common: reference.commonPasswords.has(password.toLowerCase()),
    has_repetition: hasRepeatedRun(password),
    has_sequence: hasSequentialPattern(password, reference.alphabets, minSequenceLength),
    entropy_bits: calculateEntropy(password),
  };
}
