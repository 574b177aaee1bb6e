import type { PasswordEvaluation, Rule, Verdict } from "@passgauge/engine";
import { VERDICT_TIERS } from "@passgauge/engine";

// ANSI escape codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const BLUE = "\x1b[34m";
const CYAN = "\x1b[36m";
const WHITE = "\x1b[37m";
const BG_RED = "\x1b[41m";
const BG_GREEN = "\x1b[42m";

export type OutputFormat = "table" | "json";

export const VALID_FORMATS: readonly OutputFormat[] = ["table", "json"];

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "table" || value === "json";
}

export interface FormatOptions {
  format: OutputFormat;
  color?: boolean;
}

export interface BatchEntry {
  line: number;
  result: PasswordEvaluation;
}

function painter(color: boolean): (code: string, text: string) => string {
  return color ? (code, text) => `${code}${text}${RESET}` : (_code, text) => text;
}

function verdictColor(verdict: Verdict): string {
  switch (verdict) {
    case "Very Strong": return BG_GREEN + WHITE;
    case "Strong": return GREEN;
    case "Moderate": return YELLOW;
    case "Weak": return RED;
    case "Very Weak": return BG_RED + WHITE;
  }
}

/** Verdicts from weakest to strongest. */
const VERDICT_ORDER: Verdict[] = VERDICT_TIERS.map((t) => t.verdict).reverse();

// ---------------------------------------------------------------------------
// Single result
// ---------------------------------------------------------------------------

export function formatEvaluation(result: PasswordEvaluation, options: FormatOptions): string {
  switch (options.format) {
    case "json":
      return `${JSON.stringify(result, null, 2)}\n`;
    case "table":
    default:
      return formatTable(result, options.color ?? false);
  }
}

function formatTable(result: PasswordEvaluation, color: boolean): string {
  const c = painter(color);
  const lines: string[] = [];

  lines.push("");
  lines.push(c(BOLD, "Password Strength Analysis"));
  lines.push("----------------------------");
  lines.push(`Length            : ${result.length}`);
  lines.push(`Entropy (bits)    : ${result.entropy_bits}`);
  lines.push(`Score             : ${c(BOLD, String(result.score))} / 100`);
  lines.push(`Verdict           : ${c(verdictColor(result.verdict), result.verdict)}`);
  lines.push("");
  lines.push("Characteristics:");
  lines.push(`  Lowercase letters : ${result.has_lowercase}`);
  lines.push(`  Uppercase letters : ${result.has_uppercase}`);
  lines.push(`  Digits            : ${result.has_digit}`);
  lines.push(`  Special chars     : ${result.has_special}`);
  lines.push(`  Common password   : ${result.is_common}`);
  lines.push(`  Repeated chars    : ${result.has_repetition}`);
  lines.push(`  Sequences         : ${result.has_sequence}`);

  if (result.recommendations.length > 0) {
    lines.push("");
    lines.push(c(CYAN, "Recommendations:"));
    for (const rec of result.recommendations) {
      lines.push(` - ${rec}`);
    }
  }

  lines.push("");
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

export function summarizeBatch(entries: readonly BatchEntry[]): { counts: Record<Verdict, number>; average: number } {
  const counts: Record<Verdict, number> = {
    "Very Weak": 0,
    "Weak": 0,
    "Moderate": 0,
    "Strong": 0,
    "Very Strong": 0,
  };
  let total = 0;
  for (const { result } of entries) {
    counts[result.verdict]++;
    total += result.score;
  }
  const average = entries.length === 0 ? 0 : Math.round((total / entries.length) * 10) / 10;
  return { counts, average };
}

export function formatBatch(entries: readonly BatchEntry[], options: FormatOptions): string {
  const summary = summarizeBatch(entries);

  if (options.format === "json") {
    const results = entries.map(({ line, result }) => ({ line, ...result }));
    return `${JSON.stringify({ summary, results }, null, 2)}\n`;
  }

  const c = painter(options.color ?? false);
  const lines: string[] = [];
  const lineW = 8;
  const lenW = 8;
  const scoreW = 8;

  lines.push("");
  lines.push(`${c(BOLD, "LINE".padEnd(lineW))}${c(BOLD, "LENGTH".padEnd(lenW))}${c(BOLD, "SCORE".padEnd(scoreW))}${c(BOLD, "VERDICT")}`);
  lines.push("─".repeat(lineW + lenW + scoreW + 11));

  for (const { line, result } of entries) {
    lines.push(
      `${String(line).padEnd(lineW)}${String(result.length).padEnd(lenW)}${String(result.score).padEnd(scoreW)}${c(verdictColor(result.verdict), result.verdict)}`,
    );
  }

  lines.push("");
  const parts = VERDICT_ORDER
    .filter((v) => summary.counts[v] > 0)
    .map((v) => `${v}: ${summary.counts[v]}`);
  if (parts.length > 0) lines.push(parts.join("  "));
  lines.push(`${entries.length} password${entries.length === 1 ? "" : "s"} evaluated, average score ${summary.average}`);
  lines.push("");

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

export function formatRulesTable(rules: readonly Rule[], color = false): string {
  const c = painter(color);
  const lines: string[] = [];

  const idW = 21;
  const nameW = 24;
  const catW = 11;
  const effectW = 18;

  lines.push("");
  lines.push(
    `${c(BOLD, "ID".padEnd(idW))}${c(BOLD, "NAME".padEnd(nameW))}${c(BOLD, "CATEGORY".padEnd(catW))}${c(BOLD, "EFFECT")}`,
  );
  lines.push("─".repeat(idW + nameW + catW + effectW));

  for (const rule of rules) {
    lines.push(
      `${c(DIM, rule.id.padEnd(idW))}${rule.name.padEnd(nameW)}${c(BLUE, rule.category.padEnd(catW))}${rule.effect}`,
    );
  }

  lines.push("");
  lines.push(`${rules.length} rules total`);
  lines.push("");

  return lines.join("\n");
}
