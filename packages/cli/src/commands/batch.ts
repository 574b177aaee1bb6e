import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { createEvaluator, logger } from "@passgauge/engine";
import { UsageError } from "../args.js";
import { formatBatch, type BatchEntry } from "../formatter.js";
import { resolveEvaluateOptions, resolveFormat, type CommonOptions } from "./options.js";

export interface BatchOptions extends CommonOptions {
  file: string;
}

/** One password per line; empty lines are skipped, line numbers are 1-based. */
export function readPasswordFile(filePath: string): { line: number; password: string }[] {
  let content: string;
  try {
    content = readFileSync(resolve(filePath), "utf-8");
  } catch (err) {
    throw new UsageError(`could not read '${filePath}' — ${(err as Error).message}`);
  }

  const entries: { line: number; password: string }[] = [];
  content.split("\n").forEach((raw, i) => {
    const password = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
    if (password.length > 0) entries.push({ line: i + 1, password });
  });
  return entries;
}

/**
 * Evaluate every password in a file. Output carries line numbers and scores,
 * never the passwords. Returns 2 when any score is below `failBelow`.
 */
export function runBatch(options: BatchOptions): number {
  const format = resolveFormat(options.format);
  const evaluator = createEvaluator(resolveEvaluateOptions(options));

  const passwords = readPasswordFile(options.file);
  logger.debug(`Evaluating ${passwords.length} passwords from ${options.file}`);

  const entries: BatchEntry[] = passwords.map(({ line, password }) => ({
    line,
    result: evaluator(password),
  }));

  process.stdout.write(formatBatch(entries, { format, color: options.color }));

  const failBelow = options.failBelow;
  if (failBelow !== undefined && entries.some((e) => e.result.score < failBelow)) {
    return 2;
  }
  return 0;
}
