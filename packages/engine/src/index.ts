// ---------------------------------------------------------------------------
// @passgauge/engine
//
// Heuristic password strength scoring. Pure functions; no I/O except the
// optional config and wordlist loaders.
// ---------------------------------------------------------------------------

// Schemas
export {
  VerdictSchema,
  PasswordFeaturesSchema,
  PasswordEvaluationSchema,
  type Verdict,
  type PasswordFeatures,
  type PasswordEvaluation,
} from "./schemas.js";

// Reference data
export {
  DEFAULT_COMMON_PASSWORDS,
  DEFAULT_SEQUENTIAL_ALPHABETS,
  DEFAULT_REFERENCE_DATA,
  createReferenceData,
  parseWordlist,
  loadWordlist,
  type ReferenceData,
  type ReferenceDataOptions,
} from "./reference-data.js";

// Signals
export {
  extractSignals,
  calculateEntropy,
  hasRepeatedRun,
  hasSequentialPattern,
  DEFAULT_MIN_SEQUENCE_LENGTH,
  type SignalOptions,
} from "./signals.js";

// Scoring
export {
  aggregate,
  clampScore,
  scoreToVerdict,
  DEFAULT_SCORING_POLICY,
  VERDICT_TIERS,
  MIN_SCORE,
  MAX_SCORE,
  type ScoringPolicy,
  type LengthTier,
  type VerdictTier,
} from "./scoring.js";

// Rules
export {
  getAllRules,
  getRulesByCategory,
  getRule,
  adviceFor,
  type Rule,
  type RuleId,
  type RuleCategory,
} from "./rules/registry.js";

// Config
export {
  loadConfig,
  loadConfigFile,
  parseConfig,
  renderConfig,
  didYouMean,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  type PassgaugeConfig,
} from "./config.js";

// Logger
export { logger } from "./logger.js";

// Main entry point
export {
  evaluate,
  evaluateMany,
  createEvaluator,
  evaluatorOptionsFromConfig,
  type EvaluateOptions,
  type Evaluator,
} from "./evaluator.js";
