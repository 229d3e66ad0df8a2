// src/config/config.ts
// Configuration for the catalog machines, the classifier and logging

import * as fs from "fs";
import * as path from "path";
import { isLogLevel, type LogLevel } from "../logging/logger";
import {
  DEFAULT_INT_CATEGORY_THRESHOLDS,
  type IntCategoryThresholds,
} from "../catalog/intCategory";
import { DEFAULT_PLAYER_RULES, type PlayerRules } from "../catalog/player";
import type { Outcome } from "../outcome/outcome";
import { isFail } from "../outcome/outcome";
import { configError, done } from "../outcome/constructors";
import { makeDiagnostic } from "../outcome/codes";

// =========================================================================
// Configuration Types
// =========================================================================

export type LogConfig = {
  /** Minimum level written: debug, info, warn, error or silent */
  level: LogLevel;
};

export type VariantConfig = {
  classify: IntCategoryThresholds;
  player: PlayerRules;
  log: LogConfig;
};

export type PartialVariantConfig = {
  classify?: Partial<IntCategoryThresholds>;
  player?: Partial<PlayerRules>;
  log?: Partial<LogConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: "warn",
};

export const DEFAULT_CONFIG: VariantConfig = {
  classify: DEFAULT_INT_CATEGORY_THRESHOLDS,
  player: DEFAULT_PLAYER_RULES,
  log: DEFAULT_LOG_CONFIG,
};

export const DEFAULT_CONFIG_FILES = [
  "variant.config.json",
  "variant.config.yaml",
  "variant.config.yml",
];

// =========================================================================
// Configuration Loading
// =========================================================================

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Load configuration from environment variables. Only the variables that are
 * set show up in the result.
 */
export function configFromEnv(prefix = "VARIANT", env: NodeJS.ProcessEnv = process.env): PartialVariantConfig {
  const classify: Partial<IntCategoryThresholds> = {};
  const smallFrom = envNumber(env, `${prefix}_SMALL_FROM`);
  const mediumFrom = envNumber(env, `${prefix}_MEDIUM_FROM`);
  const bigFrom = envNumber(env, `${prefix}_BIG_FROM`);
  const weirdFrom = envNumber(env, `${prefix}_WEIRD_FROM`);
  if (smallFrom !== undefined) classify.smallFrom = smallFrom;
  if (mediumFrom !== undefined) classify.mediumFrom = mediumFrom;
  if (bigFrom !== undefined) classify.bigFrom = bigFrom;
  if (weirdFrom !== undefined) classify.weirdFrom = weirdFrom;

  const player: Partial<PlayerRules> = {};
  const maxHearts = envNumber(env, `${prefix}_MAX_HEARTS`);
  if (maxHearts !== undefined) player.maxHearts = maxHearts;

  const log: Partial<LogConfig> = {};
  const level = env[`${prefix}_LOG_LEVEL`];
  if (isLogLevel(level)) log.level = level;

  return { classify, player, log };
}

/**
 * Load configuration from a JSON or YAML file. A missing file, an unknown
 * extension or malformed JSON is a `config-error`.
 */
export function configFromFile(filePath: string): Outcome<PartialVariantConfig> {
  const meta = { source: filePath };
  if (!fs.existsSync(filePath)) {
    return configError(makeDiagnostic("E0500", { path: filePath }, filePath), meta);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    try {
      data = JSON.parse(content);
    } catch {
      return configError(makeDiagnostic("E0502", { path: filePath }, filePath), meta);
    }
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    return configError(makeDiagnostic("E0501", { ext }, filePath), meta);
  }

  return done(configFromObject(isRecord(data) ? data : {}), meta);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(data: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === "number" && Number.isFinite(value)) return value;
  }
  return undefined;
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): PartialVariantConfig {
  const classifyData = isRecord(data.classify) ? data.classify : {};
  const playerData = isRecord(data.player) ? data.player : {};
  const logData = isRecord(data.log) ? data.log : {};

  const classify: Partial<IntCategoryThresholds> = {};
  const smallFrom = readNumber(classifyData, "smallFrom", "small_from");
  const mediumFrom = readNumber(classifyData, "mediumFrom", "medium_from");
  const bigFrom = readNumber(classifyData, "bigFrom", "big_from");
  const weirdFrom = readNumber(classifyData, "weirdFrom", "weird_from");
  if (smallFrom !== undefined) classify.smallFrom = smallFrom;
  if (mediumFrom !== undefined) classify.mediumFrom = mediumFrom;
  if (bigFrom !== undefined) classify.bigFrom = bigFrom;
  if (weirdFrom !== undefined) classify.weirdFrom = weirdFrom;

  const player: Partial<PlayerRules> = {};
  const maxHearts = readNumber(playerData, "maxHearts", "max_hearts");
  if (maxHearts !== undefined) player.maxHearts = maxHearts;

  const log: Partial<LogConfig> = {};
  const level = logData.level;
  if (isLogLevel(level)) log.level = level;

  return { classify, player, log };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialVariantConfig[]): VariantConfig {
  const result: VariantConfig = {
    classify: { ...DEFAULT_CONFIG.classify },
    player: { ...DEFAULT_CONFIG.player },
    log: { ...DEFAULT_CONFIG.log },
  };

  for (const cfg of configs) {
    if (cfg.classify) {
      result.classify = { ...result.classify, ...cfg.classify };
    }
    if (cfg.player) {
      result.player = { ...result.player, ...cfg.player };
    }
    if (cfg.log) {
      result.log = { ...result.log, ...cfg.log };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialVariantConfig;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): Outcome<VariantConfig> {
  const layers: PartialVariantConfig[] = [configFromEnv("VARIANT", options?.env ?? process.env)];

  let filePath = options?.configFile;
  if (!filePath) {
    const cwd = options?.cwd ?? process.cwd();
    filePath = DEFAULT_CONFIG_FILES.map(name => path.join(cwd, name)).find(candidate => fs.existsSync(candidate));
  }
  if (filePath) {
    const fromFile = configFromFile(filePath);
    if (isFail(fromFile)) return fromFile;
    layers.push(fromFile.value);
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return done(mergeConfigs(...layers));
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }

    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if (/^-?\d+\.\d+$/.test(value)) {
      parent[key] = parseFloat(value);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: VariantConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  const { smallFrom, mediumFrom, bigFrom, weirdFrom } = config.classify;
  if (!(smallFrom < mediumFrom && mediumFrom < bigFrom && bigFrom < weirdFrom)) {
    errors.push(
      `classify thresholds must be strictly ascending: smallFrom ${smallFrom}, mediumFrom ${mediumFrom}, bigFrom ${bigFrom}, weirdFrom ${weirdFrom}`
    );
  }

  if (!Number.isInteger(config.player.maxHearts) || config.player.maxHearts < 1) {
    errors.push(`player.maxHearts must be a positive integer, got ${config.player.maxHearts}`);
  } else if (config.player.maxHearts > 1000) {
    warnings.push(makeDiagnostic("W0001", { field: "player.maxHearts" }).message);
  }

  if (!isLogLevel(config.log.level)) {
    errors.push(`Unknown log level: ${String(config.log.level)}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
