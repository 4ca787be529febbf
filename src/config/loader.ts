import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { replaceEnvVars } from "./env";
import { CmdtreeConfigSchema, type CmdtreeConfig } from "./schema";

export interface ConfigLoadResult {
  success: boolean;
  config?: CmdtreeConfig;
  errors?: string[];
  path: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

export function resolveConfigPath(customPath?: string): string {
  if (customPath) {
    return path.resolve(expandHomePath(customPath));
  }
  const envPath = process.env.CMDTREE_CONFIG;
  if (envPath) {
    return path.resolve(expandHomePath(envPath));
  }
  return path.join(os.homedir(), ".cmdtree", "config.jsonc");
}

export function applyConfigDefaults(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };
  if (!Object.hasOwn(obj, "logging")) {
    obj.logging = { level: "info" };
  } else if (isRecord(obj.logging) && !Object.hasOwn(obj.logging, "level")) {
    obj.logging = { ...obj.logging, level: "info" };
  }
  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const envPath = path.join(path.dirname(resolvedPath), ".env");
  if (!fs.existsSync(envPath)) {
    return;
  }
  const result = loadDotEnv({ path: envPath, override: false });
  if (result.error) {
    throw result.error;
  }
}

export function parseConfigText(raw: string): { value: unknown; errors: string[] } {
  const parseErrors: ParseError[] = [];
  const value: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
  const errors = parseErrors.map(
    (error) => `JSONC ${printParseErrorCode(error.error)} at offset ${error.offset}`,
  );
  return { value, errors };
}

export function validateConfig(raw: unknown): { config?: CmdtreeConfig; errors?: string[] } {
  const result = CmdtreeConfigSchema.safeParse(applyConfigDefaults(replaceEnvVars(raw)));
  if (!result.success) {
    return {
      errors: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }
  return { config: result.data };
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return {
      success: false,
      errors: [`Config file not found: ${resolvedPath}`],
      path: resolvedPath,
    };
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    const parsed = parseConfigText(fs.readFileSync(resolvedPath, "utf-8"));
    if (parsed.errors.length > 0) {
      return { success: false, errors: parsed.errors, path: resolvedPath };
    }
    const { config, errors } = validateConfig(parsed.value);
    if (!config) {
      return { success: false, errors, path: resolvedPath };
    }
    return { success: true, config, path: resolvedPath };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}
