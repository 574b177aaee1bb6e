import {
  loadConfig,
  loadConfigFile,
  evaluatorOptionsFromConfig,
  logger,
  DEFAULT_CONFIG,
  type EvaluateOptions,
  type PassgaugeConfig,
} from "@passgauge/engine";
import { UsageError } from "../args.js";
import { isOutputFormat, VALID_FORMATS, type OutputFormat } from "../formatter.js";

export interface CommonOptions {
  format: string;
  /** Explicit config file; otherwise `.passgauge.yml` in `cwd` is used if present */
  config?: string;
  minSequence?: number;
  failBelow?: number;
  color?: boolean;
  cwd?: string;
}

export function resolveFormat(format: string): OutputFormat {
  if (!isOutputFormat(format)) {
    throw new UsageError(`invalid format '${format}'. Must be one of: ${VALID_FORMATS.join(", ")}`);
  }
  return format;
}

export function resolveEvaluateOptions(options: CommonOptions): EvaluateOptions {
  let config: PassgaugeConfig;
  if (options.config) {
    const loaded = loadConfigFile(options.config);
    if (!loaded) throw new UsageError(`config file '${options.config}' not found`);
    logger.debug(`Using config ${options.config}`);
    config = loaded;
  } else {
    config = loadConfig(options.cwd ?? process.cwd()) ?? DEFAULT_CONFIG;
  }

  if (options.minSequence !== undefined) {
    config = { ...config, min_sequence_length: options.minSequence };
  }

  return evaluatorOptionsFromConfig(config);
}
