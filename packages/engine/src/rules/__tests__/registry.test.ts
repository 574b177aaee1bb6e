import { describe, it, expect } from "vitest";
import { getAllRules, getRulesByCategory, getRule, adviceFor } from "../registry.js";

describe("getAllRules", () => {
  it("lists the rules in application order", () => {
    expect(getAllRules().map((r) => r.id)).toEqual([
      "pw-length",
      "pw-variety",
      "pw-common",
      "pw-repetition",
      "pw-sequence",
      "pw-entropy",
      "pw-entropy-moderate",
      "pw-general",
    ]);
  });

  it("every rule has required fields", () => {
    for (const rule of getAllRules()) {
      expect(rule.id).toBeTruthy();
      expect(rule.name).toBeTruthy();
      expect(rule.description).toBeTruthy();
      expect(rule.effect).toBeTruthy();
      expect(["length", "variety", "weakness", "entropy", "advice"]).toContain(rule.category);
    }
  });

  it("has no duplicate rule IDs", () => {
    const ids = getAllRules().map((r) => r.id);
    expect(new Set(ids).size).toBe(ids.length);
  });
});

describe("getRulesByCategory", () => {
  it("returns the weakness rules", () => {
    expect(getRulesByCategory(["weakness"]).map((r) => r.id)).toEqual([
      "pw-common",
      "pw-repetition",
      "pw-sequence",
    ]);
  });

  it("returns both entropy rules", () => {
    expect(getRulesByCategory(["entropy"]).map((r) => r.id)).toEqual(["pw-entropy", "pw-entropy-moderate"]);
  });

  it("returns nothing for an unknown category", () => {
    expect(getRulesByCategory(["gas"])).toHaveLength(0);
  });
});

describe("adviceFor", () => {
  it("returns the recommendation text", () => {
    expect(adviceFor("pw-common")).toBe("Avoid commonly used passwords.");
    expect(adviceFor("pw-entropy-moderate")).toBe(
      "Password entropy is moderate; add length or randomness for a stronger password.",
    );
  });

  it("returns an empty string for point-only rules", () => {
    expect(getRule("pw-variety")?.advice).toBeUndefined();
    expect(adviceFor("pw-variety")).toBe("");
  });
});
