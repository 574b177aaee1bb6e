#!/usr/bin/env node

import { parseArgs, intFlag, UsageError } from "./args.js";
import { runCheck } from "./commands/check.js";
import { runBatch } from "./commands/batch.js";
import { runRules } from "./commands/rules.js";
import { runInit } from "./commands/init.js";
import { PromptCancelledError } from "./prompt.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36mpassgauge\x1b[0m — heuristic password strength checker
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  passgauge [password]              Evaluate a password (prompts without echo if omitted)
  passgauge check [password]        Same as above
  passgauge batch <file>            Evaluate one password per line (passwords are never printed)
  passgauge rules                   List scoring rules
  passgauge init [path]             Write a default .passgauge.yml (default: .)
  passgauge version                 Print version

\x1b[1mOPTIONS\x1b[0m
  --format <fmt>               Output: table, json (default: table)
  --json                       Shorthand for --format json
  --config <file>              Config file (default: ./.passgauge.yml if present)
  --min-sequence <n>           Shortest run flagged as a sequence (default: 3)
  --fail-below <score>         Exit 2 if any score is below this value (0-100)
  --no-color                   Disable ANSI colors
  --category <list>            rules: filter by category (length, variety, weakness, entropy, advice)
  --with-dictionary            init: also create an empty wordlist and reference it

\x1b[1mEXAMPLES\x1b[0m
  passgauge                                   Prompt for a password
  passgauge 'correct horse battery staple'    Evaluate an argument (visible in shell history)
  passgauge --json < secret.txt               JSON report, password read from stdin
  passgauge batch passwords.txt --fail-below 60

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output

\x1b[1mENVIRONMENT\x1b[0m
  PASSGAUGE_LOG_LEVEL               Log level: debug, info, warn, error, silent
  NO_COLOR                          Disable ANSI colors

`);
}

function useColor(args: Record<string, string>): boolean {
  if (args["no-color"] === "true" || process.env.NO_COLOR) return false;
  return process.stdout.isTTY === true;
}

async function main(): Promise<number> {
  const rawArgs = process.argv.slice(2);
  const { command, args, positional } = parseArgs(rawArgs);

  if (args["help"] === "true") {
    printHelp();
    return 0;
  }

  if (args["version"] === "true" || command === "version") {
    process.stdout.write(`passgauge v${VERSION}\n`);
    return 0;
  }

  const color = useColor(args);
  const common = {
    format: args["format"] || "table",
    config: args["config"],
    minSequence: intFlag(args, "min-sequence", 2),
    failBelow: intFlag(args, "fail-below", 0, 100),
    color,
  };

  switch (command) {
    case "rules":
      runRules(args["category"], color);
      return 0;

    case "init":
      runInit({
        path: positional[0] || ".",
        withDictionary: args["with-dictionary"] === "true",
      });
      return 0;

    case "batch": {
      const file = positional[0];
      if (!file) throw new UsageError("batch requires a file argument");
      return runBatch({ ...common, file });
    }

    case "check":
    default:
      if (positional.length > 1) {
        throw new UsageError("expected a single password; quote it if it contains spaces");
      }
      return runCheck({ ...common, password: positional[0] });
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof PromptCancelledError) {
      process.stderr.write("\nCancelled.\n");
    } else if (err instanceof UsageError) {
      process.stderr.write(`[passgauge] Error: ${err.message}\n`);
    } else {
      process.stderr.write(`[passgauge] Fatal: ${err}\n`);
    }
    process.exitCode = 1;
  },
);
