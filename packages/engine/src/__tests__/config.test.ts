import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdirSync, writeFileSync, existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import yaml from "js-yaml";
import {
  loadConfig,
  loadConfigFile,
  parseConfig,
  renderConfig,
  didYouMean,
  DEFAULT_CONFIG,
} from "../config.js";

const TEST_DIR = join(tmpdir(), `passgauge-config-test-${Date.now()}`);

function setupConfig(content: string): void {
  mkdirSync(TEST_DIR, { recursive: true });
  writeFileSync(join(TEST_DIR, ".passgauge.yml"), content);
}

function captureStderr() {
  return vi.spyOn(process.stderr, "write").mockImplementation(() => true);
}

function messages(spy: ReturnType<typeof captureStderr>): string[] {
  return spy.mock.calls.map((c) => String(c[0]));
}

describe("loadConfig", () => {
  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("returns null when no config file exists", () => {
    mkdirSync(TEST_DIR, { recursive: true });
    expect(loadConfig(TEST_DIR)).toBeNull();
  });

  it("parses valid config", () => {
    setupConfig(`
min_sequence_length: 4
entropy_threshold: 32.5
entropy_bonus: 5
common_passwords:
  - Winter2024
  - companyname
`);

    const config = loadConfig(TEST_DIR);
    expect(config).toEqual({
      min_sequence_length: 4,
      entropy_threshold: 32.5,
      entropy_bonus: 5,
      common_passwords: ["Winter2024", "companyname"],
      dictionary: null,
    });
  });

  it("returns defaults for empty YAML", () => {
    setupConfig("");
    expect(loadConfig(TEST_DIR)).toEqual(DEFAULT_CONFIG);
  });

  it("resolves a relative dictionary against the config directory", () => {
    setupConfig("dictionary: words.txt\n");
    writeFileSync(join(TEST_DIR, "words.txt"), "hunter2\n");

    const config = loadConfig(TEST_DIR);
    expect(config?.dictionary).toBe(join(TEST_DIR, "words.txt"));
  });

  it("warns and ignores a missing dictionary", () => {
    const stderrSpy = captureStderr();
    setupConfig("dictionary: nope.txt\n");

    const config = loadConfig(TEST_DIR);
    expect(config?.dictionary).toBeNull();
    expect(messages(stderrSpy)).toContain("[passgauge] Warning: dictionary 'nope.txt' not found — ignoring\n");
  });

  it("falls back to defaults on schema errors", () => {
    const stderrSpy = captureStderr();
    setupConfig("min_sequence_length: 1\n");

    expect(loadConfig(TEST_DIR)).toEqual(DEFAULT_CONFIG);
    expect(messages(stderrSpy).some((msg) => msg.includes("config validation error — min_sequence_length"))).toBe(true);
  });

  it("warns on malformed YAML", () => {
    const stderrSpy = captureStderr();
    setupConfig(`
common_passwords: [
  unclosed bracket
`);

    expect(loadConfig(TEST_DIR)).toEqual(DEFAULT_CONFIG);
    expect(messages(stderrSpy).some((msg) => msg.includes("could not parse"))).toBe(true);
  });

  it("warns on unknown config keys with a suggestion", () => {
    const stderrSpy = captureStderr();
    setupConfig(`
entropy_treshold: 30
foo: bar
`);

    const config = loadConfig(TEST_DIR);
    expect(config?.entropy_threshold).toBe(28);

    const warnings = messages(stderrSpy);
    expect(warnings).toContain(
      "[passgauge] Warning: unknown config key 'entropy_treshold' — did you mean 'entropy_threshold'?\n",
    );
    expect(warnings).toContain("[passgauge] Warning: unknown config key 'foo'\n");
  });

  it("stays quiet when the log level is silent", () => {
    const stderrSpy = captureStderr();
    vi.stubEnv("PASSGAUGE_LOG_LEVEL", "silent");
    setupConfig("foo: bar\n");

    loadConfig(TEST_DIR);
    expect(stderrSpy).not.toHaveBeenCalled();
  });
});

describe("loadConfigFile", () => {
  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
  });

  it("loads a file with any name", () => {
    mkdirSync(TEST_DIR, { recursive: true });
    const file = join(TEST_DIR, "strict.yml");
    writeFileSync(file, "entropy_threshold: 40\n");
    expect(loadConfigFile(file)?.entropy_threshold).toBe(40);
  });

  it("returns null for a missing file", () => {
    expect(loadConfigFile(join(TEST_DIR, "absent.yml"))).toBeNull();
  });
});

describe("renderConfig", () => {
  it("round-trips through parseConfig", () => {
    const text = renderConfig({ ...DEFAULT_CONFIG, common_passwords: ["acme"] });
    expect(parseConfig(text, TEST_DIR)).toEqual({ ...DEFAULT_CONFIG, common_passwords: ["acme"] });
  });

  it("omits the dictionary when unset", () => {
    const doc = yaml.load(renderConfig());
    expect(doc).toEqual({
      min_sequence_length: 3,
      entropy_threshold: 28,
      entropy_bonus: 10,
      common_passwords: [],
    });
  });
});

describe("didYouMean", () => {
  it("suggests the closest candidate within distance 3", () => {
    expect(didYouMean("dictonary", ["dictionary", "entropy_bonus"])).toBe("dictionary");
  });

  it("returns null when nothing is close", () => {
    expect(didYouMean("colour_scheme", ["dictionary"])).toBeNull();
  });
});
