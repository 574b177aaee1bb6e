import { evaluate } from "@passgauge/engine";
import { formatEvaluation } from "../formatter.js";
import { promptHidden } from "../prompt.js";
import { resolveEvaluateOptions, resolveFormat, type CommonOptions } from "./options.js";

export interface CheckOptions extends CommonOptions {
  /** Prompted for (without echo) when omitted */
  password?: string;
  prompt?: (question: string) => Promise<string>;
}

export const PROMPT_QUESTION = "Enter password to evaluate: ";

/**
 * Evaluate a single password. Returns the process exit code: 2 when the score
 * is below `failBelow`, otherwise 0.
 */
export async function runCheck(options: CheckOptions): Promise<number> {
  const format = resolveFormat(options.format);
  const evaluateOptions = resolveEvaluateOptions(options);

  const ask = options.prompt ?? ((question: string) => promptHidden(question));
  const password = options.password ?? await ask(PROMPT_QUESTION);

  const result = evaluate(password, evaluateOptions);
  process.stdout.write(formatEvaluation(result, { format, color: options.color }));

  if (options.failBelow !== undefined && result.score < options.failBelow) {
    return 2;
  }
  return 0;
}
