/**
 * Config loader: reads and validates `.passgauge.yml` configuration files.
 * Uses Zod for schema validation; problems degrade to warnings and defaults.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, join, dirname, isAbsolute } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { logger } from "./logger.js";
import { DEFAULT_MIN_SEQUENCE_LENGTH } from "./signals.js";
import { DEFAULT_SCORING_POLICY } from "./scoring.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export interface PassgaugeConfig {
  /** Shortest alphabet run flagged as a sequence */
  min_sequence_length: number;
  /** Entropy (bits) under which the low-entropy penalty applies */
  entropy_threshold: number;
  /** Points added once entropy reaches entropy_threshold; 0 disables */
  entropy_bonus: number;
  /** Extra words added to the common-password list */
  common_passwords: string[];
  /** Absolute path of a newline-separated wordlist, or null */
  dictionary: string | null;
}

export const CONFIG_FILE_NAME = ".passgauge.yml";

export const DEFAULT_CONFIG: PassgaugeConfig = {
  min_sequence_length: DEFAULT_MIN_SEQUENCE_LENGTH,
  entropy_threshold: DEFAULT_SCORING_POLICY.entropyThreshold,
  entropy_bonus: DEFAULT_SCORING_POLICY.entropyBonus,
  common_passwords: [],
  dictionary: null,
};

const KNOWN_KEYS = [
  "min_sequence_length",
  "entropy_threshold",
  "entropy_bonus",
  "common_passwords",
  "dictionary",
] as const;

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const passgaugeConfigSchema = z.object({
  min_sequence_length: z.number().int().min(2).optional(),
  entropy_threshold: z.number().nonnegative().optional(),
  entropy_bonus: z.number().int().min(0).max(100).optional(),
  common_passwords: z.array(z.string()).optional(),
  dictionary: z.string().min(1).optional(),
}).passthrough();

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

export function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

export function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  let prev = Array.from({ length: n + 1 }, (_, j) => j);

  for (let i = 1; i <= m; i++) {
    const row = [i];
    for (let j = 1; j <= n; j++) {
      row[j] = a[i - 1] === b[j - 1]
        ? prev[j - 1]
        : 1 + Math.min(prev[j], row[j - 1], prev[j - 1]);
    }
    prev = row;
  }

  return prev[n];
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load `.passgauge.yml` from the given directory.
 * Returns the parsed config merged with defaults, or null if no config file exists.
 */
export function loadConfig(dir: string): PassgaugeConfig | null {
  return loadConfigFile(join(dir, CONFIG_FILE_NAME));
}

/** Load an explicit config file. Returns null if it does not exist. */
export function loadConfigFile(filePath: string): PassgaugeConfig | null {
  const configPath = resolve(filePath);

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    logger.warn(`could not read ${configPath} — ${(err as Error).message}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  return parseConfig(raw, dirname(configPath));
}

/**
 * Parse YAML config text. Relative `dictionary` paths resolve against `baseDir`.
 */
export function parseConfig(raw: string, baseDir: string): PassgaugeConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    logger.warn(`could not parse ${CONFIG_FILE_NAME} — ${(err as Error).message}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  if (!parsed || typeof parsed !== "object") return { ...DEFAULT_CONFIG };

  const result = passgaugeConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      logger.warn(`config validation error — ${issue.path.join(".")}: ${issue.message}`);
    }
    return { ...DEFAULT_CONFIG };
  }

  const data = result.data;

  const known = new Set<string>(KNOWN_KEYS);
  for (const key of Object.keys(data)) {
    if (!known.has(key)) {
      const suggestion = didYouMean(key, KNOWN_KEYS);
      const hint = suggestion ? ` — did you mean '${suggestion}'?` : "";
      logger.warn(`unknown config key '${key}'${hint}`);
    }
  }

  const config: PassgaugeConfig = { ...DEFAULT_CONFIG, common_passwords: [] };

  if (data.min_sequence_length !== undefined) config.min_sequence_length = data.min_sequence_length;
  if (data.entropy_threshold !== undefined) config.entropy_threshold = data.entropy_threshold;
  if (data.entropy_bonus !== undefined) config.entropy_bonus = data.entropy_bonus;
  if (data.common_passwords) config.common_passwords = data.common_passwords;

  if (data.dictionary !== undefined) {
    const dictPath = isAbsolute(data.dictionary) ? data.dictionary : resolve(baseDir, data.dictionary);
    if (existsSync(dictPath)) {
      config.dictionary = dictPath;
    } else {
      logger.warn(`dictionary '${data.dictionary}' not found — ignoring`);
    }
  }

  return config;
}

/**
 * Serialise a config as YAML, the form `passgauge init` writes.
 */
export function renderConfig(config: PassgaugeConfig = DEFAULT_CONFIG): string {
  const doc: Record<string, unknown> = {
    min_sequence_length: config.min_sequence_length,
    entropy_threshold: config.entropy_threshold,
    entropy_bonus: config.entropy_bonus,
    common_passwords: config.common_passwords,
  };
  if (config.dictionary) doc.dictionary = config.dictionary;
  return yaml.dump(doc, { lineWidth: 100 });
}
