import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig, parseConfigText, resolveConfigPath, validateConfig } from "./loader";

const ENV_KEY = "CMDTREE_LOADER_TEST_PAGE_SIZE";
const ORIGINAL_ENV = process.env[ENV_KEY];
const tempDirs: string[] = [];

function writeConfig(text: string, dotEnv?: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cmdtree-loader-"));
  tempDirs.push(dir);
  const configPath = path.join(dir, "config.jsonc");
  fs.writeFileSync(configPath, text, "utf-8");
  if (dotEnv !== undefined) {
    fs.writeFileSync(path.join(dir, ".env"), dotEnv, "utf-8");
  }
  return configPath;
}

afterEach(() => {
  if (ORIGINAL_ENV === undefined) {
    delete process.env[ENV_KEY];
  } else {
    process.env[ENV_KEY] = ORIGINAL_ENV;
  }
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("config loader", () => {
  it("loads JSONC with comments and applies logging defaults", () => {
    const configPath = writeConfig(`{
      // command framework settings
      "commands": {
        "help": { "pageSize": 4 },
        "messages": { "commands.not-found": "Nope: {command}" },
      },
    }`);

    const result = loadConfig(configPath);

    expect(result.success).toBe(true);
    expect(result.path).toBe(configPath);
    expect(result.config?.logging?.level).toBe("info");
    expect(result.config?.commands?.help?.pageSize).toBe(4);
    expect(result.config?.commands?.messages).toEqual({ "commands.not-found": "Nope: {command}" });
  });

  it("reads placeholders from the .env beside the config", () => {
    delete process.env[ENV_KEY];
    const configPath = writeConfig(
      `{ "logging": { "level": "\${${ENV_KEY}:-info}" } }`,
      `${ENV_KEY}=debug\n`,
    );

    const result = loadConfig(configPath);

    expect(result.success).toBe(true);
    expect(result.config?.logging?.level).toBe("debug");
  });

  it("reports a missing file", () => {
    const missing = path.join(os.tmpdir(), "cmdtree-missing", "config.jsonc");

    expect(loadConfig(missing)).toEqual({
      success: false,
      errors: [`Config file not found: ${missing}`],
      path: missing,
    });
  });

  it("reports syntax errors", () => {
    const result = loadConfig(writeConfig(`{ "commands": { "debug": true `));

    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toMatch(/^JSONC \w+ at offset \d+$/);
  });

  it("reports schema violations with their path", () => {
    const result = loadConfig(writeConfig(`{ "commands": { "help": { "pageSize": 0 } } }`));

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["commands.help.pageSize: Number must be greater than 0"]);
  });
});

describe("config helpers", () => {
  it("resolves explicit and home-relative paths", () => {
    expect(resolveConfigPath("~/cmdtree.jsonc")).toBe(path.join(os.homedir(), "cmdtree.jsonc"));
    expect(resolveConfigPath("/etc/cmdtree.jsonc")).toBe("/etc/cmdtree.jsonc");
  });

  it("rejects unknown top-level keys", () => {
    const { config, errors } = validateConfig({ plugins: [] });

    expect(config).toBeUndefined();
    expect(errors).toEqual([": Unrecognized key(s) in object: 'plugins'"]);
  });

  it("rejects a zero completion ttl", () => {
    const { errors } = validateConfig({ commands: { completion: { ttlMs: 0 } } });

    expect(errors).toEqual(["commands.completion.ttlMs: Number must be greater than 0"]);
  });

  it("parses JSONC text without a file", () => {
    expect(parseConfigText(`{ "a": 1, /* note */ }`)).toEqual({ value: { a: 1 }, errors: [] });
  });
});
