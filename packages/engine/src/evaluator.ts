/**
 * Main entry point: password in, evaluation out.
 *
 * `createEvaluator` binds reference data and policy once so batch callers do
 * not rebuild the dictionary per password. Evaluations share no state, so any
 * number of them may run side by side.
 */

import type { PasswordEvaluation } from "./schemas.js";
import { extractSignals } from "./signals.js";
import { aggregate, DEFAULT_SCORING_POLICY, type ScoringPolicy } from "./scoring.js";
import {
  createReferenceData,
  DEFAULT_REFERENCE_DATA,
  loadWordlist,
  type ReferenceData,
} from "./reference-data.js";
import type { PassgaugeConfig } from "./config.js";
import { logger } from "./logger.js";

export interface EvaluateOptions {
  reference?: ReferenceData;
  policy?: ScoringPolicy;
  minSequenceLength?: number;
}

export type Evaluator = (password: string) => PasswordEvaluation;

export function evaluate(password: string, options: EvaluateOptions = {}): PasswordEvaluation {
  const features = extractSignals(password, {
    reference: options.reference,
    minSequenceLength: options.minSequenceLength,
  });
  return aggregate(features, options.policy ?? DEFAULT_SCORING_POLICY);
}

export function createEvaluator(options: EvaluateOptions = {}): Evaluator {
  const bound: EvaluateOptions = {
    reference: options.reference ?? DEFAULT_REFERENCE_DATA,
    policy: options.policy ?? DEFAULT_SCORING_POLICY,
    minSequenceLength: options.minSequenceLength,
  };
  return (password) => evaluate(password, bound);
}

export function evaluateMany(passwords: readonly string[], options: EvaluateOptions = {}): PasswordEvaluation[] {
  return passwords.map(createEvaluator(options));
}

/**
 * Turn a loaded config into evaluator options. Reads the dictionary file, if
 * any; an unreadable one is skipped with a warning.
 */
export function evaluatorOptionsFromConfig(config: PassgaugeConfig): EvaluateOptions {
  const extra = [...config.common_passwords];

  if (config.dictionary) {
    try {
      const words = loadWordlist(config.dictionary);
      extra.push(...words);
      logger.debug(`Loaded ${words.length} dictionary words from ${config.dictionary}`);
    } catch (err) {
      logger.warn(`could not read dictionary ${config.dictionary} — ${(err as Error).message}`);
    }
  }

  return {
    reference: extra.length > 0 ? createReferenceData({ extraCommonPasswords: extra }) : DEFAULT_REFERENCE_DATA,
    policy: {
      ...DEFAULT_SCORING_POLICY,
      entropyThreshold: config.entropy_threshold,
      entropyBonus: config.entropy_bonus,
    },
    minSequenceLength: config.min_sequence_length,
  };
}
