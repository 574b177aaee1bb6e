import { getAllRules, getRulesByCategory } from "@passgauge/engine";
import { formatRulesTable } from "../formatter.js";

export function runRules(category?: string, color = false): void {
  const rules = category
    ? getRulesByCategory(category.split(",").map((s) => s.trim()))
    : getAllRules();

  process.stdout.write(formatRulesTable(rules, color));
}
