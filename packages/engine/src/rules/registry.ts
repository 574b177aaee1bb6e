/**
 * Rule registry.
 *
 * Catalogue of the scoring rules, in the order the scorer applies them. The
 * scorer takes its advice text from here so the CLI listing and the
 * recommendations in a result never drift apart.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RuleCategory = "length" | "variety" | "weakness" | "entropy" | "advice";

export type RuleId =
  | "pw-length"
  | "pw-variety"
  | "pw-common"
  | "pw-repetition"
  | "pw-sequence"
  | "pw-entropy"
  | "pw-entropy-moderate"
  | "pw-general";

export interface Rule {
  id: RuleId;
  name: string;
  description: string;
  category: RuleCategory;
  /** Point effect under the default policy, for display. */
  effect: string;
  /** Recommendation added when the rule fires. Variety only moves points. */
  advice?: string;
}

// ---------------------------------------------------------------------------
// All rules, in application order
// ---------------------------------------------------------------------------

const ALL_RULES: readonly Rule[] = [
  {
    id: "pw-length",
    name: "Length",
    description: "Rewards length in tiers: 16+, 12-15 and 8-11 characters. Shorter passwords earn nothing.",
    category: "length",
    effect: "+30 / +20 / +10",
    advice: "Increase password length (minimum 12 characters recommended).",
  },
  {
    id: "pw-variety",
    name: "Character variety",
    description: "Rewards each character class present: lowercase, uppercase, digits and special characters.",
    category: "variety",
    effect: "+10 per class",
  },
  {
    id: "pw-common",
    name: "Common password",
    description: "Penalises exact (case-insensitive) matches against the common-password list.",
    category: "weakness",
    effect: "-40",
    advice: "Avoid commonly used passwords.",
  },
  {
    id: "pw-repetition",
    name: "Repeated characters",
    description: "Penalises any character repeated three or more times in a row.",
    category: "weakness",
    effect: "-10",
    advice: "Avoid repeated characters (e.g., 'aaa').",
  },
  {
    id: "pw-sequence",
    name: "Sequential pattern",
    description: "Penalises forward or reversed alphabet and digit runs such as 'abc', 'cba' or '321'.",
    category: "weakness",
    effect: "-10",
    advice: "Avoid sequential patterns (e.g., '1234', 'abcd').",
  },
  {
    id: "pw-entropy",
    name: "Entropy",
    description:
      "Penalises passwords whose estimated entropy is under 28 bits and rewards the rest.",
    category: "entropy",
    effect: "-10 / +10",
    advice: "Password entropy is low; use a longer, more random password.",
  },
  {
    id: "pw-entropy-moderate",
    name: "Moderate entropy",
    description: "Advises more randomness when entropy is 28 bits or more but under 50.",
    category: "entropy",
    effect: "0",
    advice: "Password entropy is moderate; add length or randomness for a stronger password.",
  },
  {
    id: "pw-general",
    name: "General advice",
    description: "Added when the final score lands below the Strong tier.",
    category: "advice",
    effect: "0",
    advice: "Consider using a long passphrase or a password manager to generate strong passwords.",
  },
];

const RULES_BY_ID = new Map<RuleId, Rule>(ALL_RULES.map((r) => [r.id, r]));

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function getAllRules(): readonly Rule[] {
  return ALL_RULES;
}

export function getRulesByCategory(categories: readonly string[]): Rule[] {
  const wanted = new Set(categories);
  return ALL_RULES.filter((rule) => wanted.has(rule.category));
}

export function getRule(id: RuleId): Rule | undefined {
  return RULES_BY_ID.get(id);
}

/** Recommendation text for a rule, or an empty string for point-only rules. */
export function adviceFor(id: RuleId): string {
  return RULES_BY_ID.get(id)?.advice ?? "";
}
