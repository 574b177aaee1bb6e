const BOOLEAN_FLAGS = new Set([
  "help", "version", "json", "verbose", "quiet", "no-color", "with-dictionary",
]);

const KNOWN_FLAGS = new Set([
  ...BOOLEAN_FLAGS,
  "format", "config", "min-sequence", "fail-below", "category",
]);

export const COMMANDS = new Set(["check", "batch", "rules", "init", "version"]);

export interface ParsedArgs {
  command: string;
  args: Record<string, string>;
  positional: string[];
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/**
 * Split argv into command, flags and positionals. A first argument that is not
 * a known command is treated as the password for `check`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args: Record<string, string> = {};
  const positional: string[] = [];

  let start = 0;
  let command = "";
  if (argv[0] !== undefined && COMMANDS.has(argv[0])) {
    command = argv[0];
    start = 1;
  }

  for (let i = start; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }
    if (arg.startsWith("--")) {
      const key = arg.slice(2);

      if (!KNOWN_FLAGS.has(key)) {
        process.stderr.write(`[passgauge] Warning: unknown flag --${key}\n`);
      }

      if (BOOLEAN_FLAGS.has(key)) {
        args[key] = "true";
      } else {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith("--")) {
          throw new UsageError(`--${key} requires a value`);
        }
        args[key] = value;
        i++;
      }
    } else if (arg === "-h") {
      args["help"] = "true";
    } else if (arg === "-v") {
      args["version"] = "true";
    } else {
      positional.push(arg);
    }
  }

  if (args["json"] === "true" && args["format"] === undefined) {
    args["format"] = "json";
  }

  // Handle --verbose / --quiet
  if (args["verbose"] === "true") {
    process.env.PASSGAUGE_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.PASSGAUGE_LOG_LEVEL = "error";
  }

  return { command: command || "check", args, positional };
}

/** Parse an integer flag; returns undefined when the flag is absent. */
export function intFlag(args: Record<string, string>, name: string, min: number, max = Infinity): number | undefined {
  const raw = args[name];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Infinity ? `>= ${min}` : `${min}-${max}`;
    throw new UsageError(`--${name} must be an integer ${range}, got '${raw}'`);
  }
  return value;
}
