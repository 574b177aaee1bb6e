import { existsSync, writeFileSync, statSync } from "node:fs";
import { resolve, join } from "node:path";
import { renderConfig, CONFIG_FILE_NAME, DEFAULT_CONFIG } from "@passgauge/engine";
import { UsageError } from "../args.js";

export interface InitOptions {
  path: string;
  withDictionary: boolean;
}

export const DICTIONARY_FILE_NAME = "passgauge-words.txt";

const DICTIONARY_TEMPLATE = `# passgauge wordlist
# One password per line, matched case-insensitively. Lines starting with # are ignored.
`;

function generateConfig(withDictionary: boolean): string {
  const header = `# passgauge configuration
#
# min_sequence_length: shortest alphabet/digit run flagged as a sequence
# entropy_threshold:   bits under which the low-entropy penalty applies
# entropy_bonus:       points added at or above entropy_threshold (0 disables)
# common_passwords:    extra words treated as common passwords
# dictionary:          newline-separated wordlist, relative to this file

`;
  return header + renderConfig({
    ...DEFAULT_CONFIG,
    dictionary: withDictionary ? DICTIONARY_FILE_NAME : null,
  });
}

export function runInit(options: InitOptions): void {
  const dir = resolve(options.path);

  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new UsageError(`${dir} is not a directory`);
  }

  const created: string[] = [];
  const skipped: string[] = [];

  // 1. Wordlist (optional), written first so the config never points at a missing file
  if (options.withDictionary) {
    const dictFile = join(dir, DICTIONARY_FILE_NAME);
    if (existsSync(dictFile)) {
      skipped.push(DICTIONARY_FILE_NAME);
    } else {
      writeFileSync(dictFile, DICTIONARY_TEMPLATE);
      created.push(DICTIONARY_FILE_NAME);
    }
  }

  // 2. Project config
  const configFile = join(dir, CONFIG_FILE_NAME);
  if (existsSync(configFile)) {
    skipped.push(CONFIG_FILE_NAME);
  } else {
    writeFileSync(configFile, generateConfig(options.withDictionary));
    created.push(CONFIG_FILE_NAME);
  }

  // Summary
  process.stdout.write("\n\x1b[36mpassgauge init\x1b[0m\n\n");

  if (created.length > 0) {
    process.stdout.write("\x1b[32mCreated:\x1b[0m\n");
    for (const f of created) {
      process.stdout.write(`  + ${f}\n`);
    }
  }

  if (skipped.length > 0) {
    process.stdout.write("\x1b[33mSkipped (already exists):\x1b[0m\n");
    for (const f of skipped) {
      process.stdout.write(`  ~ ${f}\n`);
    }
  }

  process.stdout.write("\n");
}
