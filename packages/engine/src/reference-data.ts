/**
 * Reference tables used by the signal extractor.
 *
 * Built once and frozen. Callers that need a larger dictionary construct their
 * own instance with `createReferenceData()` and pass it in; nothing here is
 * mutated after construction.
 */

import { readFileSync } from "node:fs";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReferenceData {
  /** Lowercased known-weak passwords. */
  readonly commonPasswords: ReadonlySet<string>;
  /** Ordered alphabets scanned for sequential runs. */
  readonly alphabets: readonly string[];
}

export interface ReferenceDataOptions {
  /** Replaces the built-in common-password list. */
  commonPasswords?: Iterable<string>;
  /** Added on top of the base list (built-in or replaced). */
  extraCommonPasswords?: Iterable<string>;
  alphabets?: readonly string[];
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

// Kept short on purpose: no leaked datasets in the repository.
export const DEFAULT_COMMON_PASSWORDS: readonly string[] = Object.freeze([
  "123456",
  "password",
  "12345678",
  "qwerty",
  "abc123",
  "111111",
  "1234567890",
  "password1",
  "iloveyou",
]);

export const DEFAULT_SEQUENTIAL_ALPHABETS: readonly string[] = Object.freeze([
  "abcdefghijklmnopqrstuvwxyz",
  "ABCDEFGHIJKLMNOPQRSTUVWXYZ",
  "0123456789",
]);

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

function normalizeWords(words: Iterable<string>): string[] {
  const out: string[] = [];
  for (const w of words) {
    const trimmed = w.trim();
    if (trimmed) out.push(trimmed.toLowerCase());
  }
  return out;
}

export function createReferenceData(options: ReferenceDataOptions = {}): ReferenceData {
  const base = normalizeWords(options.commonPasswords ?? DEFAULT_COMMON_PASSWORDS);
  const extra = normalizeWords(options.extraCommonPasswords ?? []);

  return Object.freeze({
    commonPasswords: new Set([...base, ...extra]),
    alphabets: Object.freeze([...(options.alphabets ?? DEFAULT_SEQUENTIAL_ALPHABETS)]),
  });
}

export const DEFAULT_REFERENCE_DATA: ReferenceData = createReferenceData();

// ---------------------------------------------------------------------------
// Wordlists
// ---------------------------------------------------------------------------

/** Parse a newline-separated wordlist. Blank lines and `#` comments are skipped. */
export function parseWordlist(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export function loadWordlist(filePath: string): string[] {
  return parseWordlist(readFileSync(filePath, "utf-8"));
}
