import { describe, it, expect } from "vitest";
import {
  extractSignals,
  calculateEntropy,
  hasRepeatedRun,
  hasSequentialPattern,
} from "../signals.js";
import { createReferenceData } from "../reference-data.js";

describe("calculateEntropy", () => {
  it("returns 0 for the empty string", () => {
    expect(calculateEntropy("")).toBe(0);
  });

  it("returns 0 when every character is the same", () => {
    expect(calculateEntropy("aaaa")).toBe(0);
  });

  it("multiplies per-symbol entropy by length", () => {
    expect(calculateEntropy("ab")).toBe(2);
    expect(calculateEntropy("aabb")).toBe(4);
    expect(calculateEntropy("abcd")).toBe(8);
    expect(calculateEntropy("abcdefgh")).toBe(24);
  });

  it("weights by observed frequency", () => {
    // six singletons and one pair over 8 characters: 2.75 bits/symbol
    expect(calculateEntropy("password")).toBe(22);
  });

  it("rounds to two decimals", () => {
    // log2(3) * 3 = 4.754887...
    expect(calculateEntropy("abc")).toBe(4.75);
  });

  it("counts astral characters once", () => {
    expect(calculateEntropy("😀😀")).toBe(0);
  });
});

describe("hasRepeatedRun", () => {
  it("detects three identical characters in a row", () => {
    expect(hasRepeatedRun("xaaay")).toBe(true);
    expect(hasRepeatedRun("111")).toBe(true);
  });

  it("ignores runs of two", () => {
    expect(hasRepeatedRun("aabbaa")).toBe(false);
  });

  it("ignores repeats that are not adjacent", () => {
    expect(hasRepeatedRun("ababab")).toBe(false);
  });

  it("accepts a custom run length", () => {
    expect(hasRepeatedRun("aab", 2)).toBe(true);
    expect(hasRepeatedRun("aaab", 4)).toBe(false);
  });

  it("is false for the empty string", () => {
    expect(hasRepeatedRun("")).toBe(false);
  });
});

describe("hasSequentialPattern", () => {
  it("detects forward letter and digit runs", () => {
    expect(hasSequentialPattern("xxabcxx")).toBe(true);
    expect(hasSequentialPattern("pass123")).toBe(true);
    expect(hasSequentialPattern("XYZ!")).toBe(true);
  });

  it("detects reversed runs exactly like forward ones", () => {
    expect(hasSequentialPattern("xxcbaxx")).toBe(hasSequentialPattern("xxabcxx"));
    expect(hasSequentialPattern("321go")).toBe(true);
    expect(hasSequentialPattern("ZYX")).toBe(true);
  });

  it("does not mix cases within one run", () => {
    expect(hasSequentialPattern("aBc")).toBe(false);
  });

  it("treats repeated digits as repetition, not sequence", () => {
    expect(hasSequentialPattern("aaaa1111")).toBe(false);
  });

  it("does not wrap around the end of an alphabet", () => {
    expect(hasSequentialPattern("yza")).toBe(false);
    expect(hasSequentialPattern("901")).toBe(false);
  });

  it("honours a longer minimum", () => {
    expect(hasSequentialPattern("abc", undefined, 4)).toBe(false);
    expect(hasSequentialPattern("abcd", undefined, 4)).toBe(true);
  });

  it("raises a minimum below 2 to 2", () => {
    expect(hasSequentialPattern("ab", undefined, 1)).toBe(true);
    expect(hasSequentialPattern("a", undefined, 1)).toBe(false);
  });

  it("uses custom alphabets", () => {
    expect(hasSequentialPattern("qwe", ["qwertyuiop"])).toBe(true);
    expect(hasSequentialPattern("abc", ["qwertyuiop"])).toBe(false);
  });
});

describe("extractSignals", () => {
  it("returns an all-false record for the empty string", () => {
    expect(extractSignals("")).toEqual({
      length: 0,
      has_lowercase: false,
      has_uppercase: false,
      has_digit: false,
      has_special: false,
      is_common: false,
      has_repetition: false,
      has_sequence: false,
      entropy_bits: 0,
    });
  });

  it("detects each character class independently", () => {
    const f = extractSignals("aB3!");
    expect(f.has_lowercase).toBe(true);
    expect(f.has_uppercase).toBe(true);
    expect(f.has_digit).toBe(true);
    expect(f.has_special).toBe(true);
  });

  it("does not count underscore as special", () => {
    expect(extractSignals("snake_case").has_special).toBe(false);
  });

  it("counts whitespace and non-ASCII characters as special", () => {
    expect(extractSignals("two words").has_special).toBe(true);
    expect(extractSignals("café").has_special).toBe(true);
  });

  it("only counts ASCII letters for the letter classes", () => {
    const f = extractSignals("ÉÀ");
    expect(f.has_uppercase).toBe(false);
    expect(f.has_lowercase).toBe(false);
  });

  it("matches common passwords case-insensitively", () => {
    expect(extractSignals("PassWord").is_common).toBe(true);
    expect(extractSignals("password!").is_common).toBe(false);
  });

  it("does not treat 1234567 as common", () => {
    expect(extractSignals("1234567").is_common).toBe(false);
  });

  it("uses injected reference data", () => {
    const reference = createReferenceData({ extraCommonPasswords: ["Hunter2"] });
    expect(extractSignals("hunter2", { reference }).is_common).toBe(true);
    expect(extractSignals("hunter2").is_common).toBe(false);
  });

  it("passes the minimum sequence length through", () => {
    expect(extractSignals("xabcx").has_sequence).toBe(true);
    expect(extractSignals("xabcx", { minSequenceLength: 4 }).has_sequence).toBe(false);
  });

  it("counts length in code points", () => {
    expect(extractSignals("a😀b").length).toBe(3);
  });

  it("flags aaaa1111 for repetition", () => {
    const f = extractSignals("aaaa1111");
    expect(f.has_repetition).toBe(true);
    expect(f.has_sequence).toBe(false);
    expect(f.entropy_bits).toBe(8);
  });

  it("is deterministic", () => {
    expect(extractSignals("Tr0ub4dor&3")).toEqual(extractSignals("Tr0ub4dor&3"));
  });
});
