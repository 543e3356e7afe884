import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { MAX_ANALYSIS_CHARS } from "../analysis/truncate.js";
import { isLogLevel } from "../logging/logger.js";
import type { ConfigOverrides, ReviewConfig } from "./types.js";

export const DEFAULT_CONFIG_FILE = "docreview.yaml";

const CONFIG_KEYS = new Set(["disabled_rules", "max_chars", "log_level"]);

export const DEFAULT_CONFIG: ReviewConfig = {
  disabled_rules: [],
  max_chars: MAX_ANALYSIS_CHARS,
  log_level: "warn",
};

export interface LoadConfigOptions {
  readonly configPath?: string;
  readonly cwd?: string;
}

/**
 * Load the config file named by `configPath`, or `docreview.yaml` in `cwd`
 * when present. An explicit path that does not exist is an error; a missing
 * default file yields the defaults.
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<ReviewConfig> {
  const cwd = options.cwd ?? process.cwd();
  if (options.configPath) {
    const raw = await fs.readFile(path.resolve(cwd, options.configPath), "utf8");
    return parseConfig(yaml.load(raw), options.configPath);
  }

  const defaultPath = path.join(cwd, DEFAULT_CONFIG_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(defaultPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return DEFAULT_CONFIG;
    }
    throw error;
  }
  return parseConfig(yaml.load(raw), defaultPath);
}

export function parseConfig(doc: unknown, source = "config"): ReviewConfig {
  if (doc === undefined || doc === null) {
    return DEFAULT_CONFIG;
  }
  if (!isRecord(doc)) {
    throw new Error(`Invalid config format: ${source}`);
  }

  const errors: string[] = [];
  for (const key of Object.keys(doc)) {
    if (!CONFIG_KEYS.has(key)) {
      errors.push(`${key} is not allowed`);
    }
  }

  const disabledRules = doc.disabled_rules ?? DEFAULT_CONFIG.disabled_rules;
  if (
    !Array.isArray(disabledRules) ||
    !disabledRules.every((value): value is string => typeof value === "string")
  ) {
    errors.push("disabled_rules must be a list of rule ids");
  }

  const maxChars = doc.max_chars ?? DEFAULT_CONFIG.max_chars;
  if (typeof maxChars !== "number" || !Number.isInteger(maxChars) || maxChars <= 0) {
    errors.push("max_chars must be a positive integer");
  }

  const logLevel = doc.log_level ?? DEFAULT_CONFIG.log_level;
  if (!isLogLevel(logLevel)) {
    errors.push("log_level must be one of debug, info, warn, error");
  }

  if (errors.length > 0) {
    throw new Error(`Invalid config ${source}: ${errors.join("; ")}`);
  }

  return {
    disabled_rules: Array.isArray(disabledRules)
      ? disabledRules.filter((value): value is string => typeof value === "string")
      : [],
    max_chars: typeof maxChars === "number" ? maxChars : DEFAULT_CONFIG.max_chars,
    log_level: isLogLevel(logLevel) ? logLevel : DEFAULT_CONFIG.log_level,
  };
}

/** CLI flags win over the file; `disable` adds to the file's list. */
export function mergeConfig(
  base: ReviewConfig,
  overrides: ConfigOverrides,
): ReviewConfig {
  const disabled = new Set([...base.disabled_rules, ...(overrides.disable ?? [])]);
  return {
    disabled_rules: [...disabled],
    max_chars: overrides.maxChars ?? base.max_chars,
    log_level: overrides.logLevel ?? base.log_level,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
