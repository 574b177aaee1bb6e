/**
 * Password score calculator.
 *
 * Point-based: length tiers, character-class bonuses and sufficient entropy add,
 * weakness signals subtract, the total is clamped to 0-100 and mapped onto a verdict tier.
 * Recommendations are appended in rule order, each at most once.
 */

import type { PasswordEvaluation, PasswordFeatures, Verdict } from "./schemas.js";
import { adviceFor } from "./rules/registry.js";

// ---------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------

export interface LengthTier {
  readonly minLength: number;
  readonly points: number;
}

export interface ScoringPolicy {
  /** Checked top to bottom; the first tier whose minLength is met wins. */
  lengthTiers: readonly LengthTier[];
  varietyBonus: number;
  commonPenalty: number;
  repetitionPenalty: number;
  sequencePenalty: number;
  /** Below this many bits the penalty applies; at or above it the bonus does. */
  entropyThreshold: number;
  entropyPenalty: number;
  /** 0 disables the bonus. */
  entropyBonus: number;
  /** Entropy at or above `entropyThreshold` but under this gets the moderate-entropy advice. */
  moderateEntropyThreshold: number;
  /** Scores below this get the general passphrase advice. */
  adviceThreshold: number;
}

const DEFAULT_LENGTH_TIERS: LengthTier[] = [
  { minLength: 16, points: 30 },
  { minLength: 12, points: 20 },
  { minLength: 8, points: 10 },
];

export const DEFAULT_SCORING_POLICY: ScoringPolicy = Object.freeze({
  lengthTiers: Object.freeze(DEFAULT_LENGTH_TIERS.map((tier) => Object.freeze(tier))),
  varietyBonus: 10,
  commonPenalty: 40,
  repetitionPenalty: 10,
  sequencePenalty: 10,
  entropyThreshold: 28,
  entropyPenalty: 10,
  entropyBonus: 10,
  moderateEntropyThreshold: 50,
  adviceThreshold: 60,
});

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

export interface VerdictTier {
  readonly min: number;
  readonly verdict: Verdict;
}

const TIERS: VerdictTier[] = [
  { min: 80, verdict: "Very Strong" },
  { min: 60, verdict: "Strong" },
  { min: 40, verdict: "Moderate" },
  { min: 20, verdict: "Weak" },
  { min: 0, verdict: "Very Weak" },
];

/** Lower bounds, highest first. Intervals are half-open except the top one. */
export const VERDICT_TIERS: readonly VerdictTier[] = Object.freeze(TIERS.map((tier) => Object.freeze(tier)));

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

export function clampScore(raw: number): number {
  return Math.max(MIN_SCORE, Math.min(MAX_SCORE, Math.round(raw)));
}

export function scoreToVerdict(score: number): Verdict {
  for (const tier of VERDICT_TIERS) {
    if (score >= tier.min) return tier.verdict;
  }
  return "Very Weak";
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

function lengthPoints(length: number, tiers: readonly LengthTier[]): number | null {
  for (const tier of tiers) {
    if (length >= tier.minLength) return tier.points;
  }
  return null;
}

export function aggregate(
  features: PasswordFeatures,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY,
): PasswordEvaluation {
  const recommendations: string[] = [];
  let score = 0;

  const tierPoints = lengthPoints(features.length, policy.lengthTiers);
  if (tierPoints === null) {
    recommendations.push(adviceFor("pw-length"));
  } else {
    score += tierPoints;
  }

  const classes = [
    features.has_lowercase,
    features.has_uppercase,
    features.has_digit,
    features.has_special,
  ];
  score += classes.filter(Boolean).length * policy.varietyBonus;

  if (features.is_common) {
    score -= policy.commonPenalty;
    recommendations.push(adviceFor("pw-common"));
  }

  if (features.has_repetition) {
    score -= policy.repetitionPenalty;
    recommendations.push(adviceFor("pw-repetition"));
  }

  if (features.has_sequence) {
    score -= policy.sequencePenalty;
    recommendations.push(adviceFor("pw-sequence"));
  }

  if (features.entropy_bits < policy.entropyThreshold) {
    score -= policy.entropyPenalty;
    recommendations.push(adviceFor("pw-entropy"));
  } else {
    score += policy.entropyBonus;
    if (features.entropy_bits < policy.moderateEntropyThreshold) {
      recommendations.push(adviceFor("pw-entropy-moderate"));
    }
  }

  const clamped = clampScore(score);

  if (clamped < policy.adviceThreshold) {
    recommendations.push(adviceFor("pw-general"));
  }

  return {
    ...features,
    score: clamped,
    verdict: scoreToVerdict(clamped),
    recommendations,
  };
}
