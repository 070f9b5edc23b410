// src/core/config/config.ts
// Configuration system for ownlint

import * as fs from "fs";
import * as path from "path";
import { DEFAULT_MAX_VALUE_CHAIN_DEPTH } from "../../lint/analysis/ownershipGraph";
import { DEFAULT_PASSES } from "../../lint/runner";
import type { LintConfig, PassConfig, SeverityOverride } from "../../lint/types";
import { ConfigError } from "../../outcome/errors";

// =========================================================================
// Configuration Types
// =========================================================================

export type OutputFormat = "text" | "json";

export type AnalysisConfig = {
  /** Deepest value-type nesting flattened before a chain is treated as open */
  maxValueChainDepth: number;
};

export type OutputConfig = {
  format: OutputFormat;
  /** Log pass progress to stderr */
  verbose: boolean;
};

export type OwnlintConfig = {
  analysis: AnalysisConfig;
  lint: LintConfig;
  output: OutputConfig;
};

/** A configuration source: only the keys it actually sets. */
export type OwnlintConfigInput = {
  analysis?: Partial<AnalysisConfig>;
  lint?: LintConfig;
  output?: Partial<OutputConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  maxValueChainDepth: DEFAULT_MAX_VALUE_CHAIN_DEPTH,
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfig = {
  format: "text",
  verbose: false,
};

export const DEFAULT_CONFIG: OwnlintConfig = {
  analysis: DEFAULT_ANALYSIS_CONFIG,
  lint: { passes: {} },
  output: DEFAULT_OUTPUT_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["ownlint.config.json", "ownlint.config.yaml", "ownlint.config.yml"];

const FORMATS: readonly OutputFormat[] = ["text", "json"];
const SEVERITY_OVERRIDES: readonly SeverityOverride[] = ["error", "warning", "off"];

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 *
 *   OWNLINT_MAX_VALUE_CHAIN_DEPTH  positive integer
 *   OWNLINT_FORMAT                 text | json
 *   OWNLINT_VERBOSE                1 | true
 *   OWNLINT_DISABLE                comma-separated pass ids
 */
export function configFromEnv(prefix = "OWNLINT", env: NodeJS.ProcessEnv = process.env): OwnlintConfigInput {
  const config: OwnlintConfigInput = {};

  const depth = env[`${prefix}_MAX_VALUE_CHAIN_DEPTH`];
  if (depth) {
    config.analysis = { maxValueChainDepth: parsePositiveInt(depth, `${prefix}_MAX_VALUE_CHAIN_DEPTH`) };
  }

  const output: Partial<OutputConfig> = {};
  const format = env[`${prefix}_FORMAT`];
  if (format) {
    output.format = parseFormat(format, `${prefix}_FORMAT`);
  }
  const verbose = env[`${prefix}_VERBOSE`];
  if (verbose) {
    output.verbose = verbose === "1" || verbose.toLowerCase() === "true";
  }
  if (Object.keys(output).length > 0) {
    config.output = output;
  }

  const disabled = env[`${prefix}_DISABLE`];
  if (disabled) {
    config.lint = { passes: disablePasses(disabled.split(",")) };
  }

  return config;
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): OwnlintConfigInput {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    try {
      data = JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Config file is not valid JSON: ${filePath} (${e instanceof Error ? e.message : String(e)})`);
    }
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new ConfigError(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new ConfigError(`Config file must contain an object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): OwnlintConfigInput {
  const config: OwnlintConfigInput = {};

  const analysisData = section(data, "analysis");
  if (analysisData) {
    const depth = pick(analysisData, "maxValueChainDepth", "max_value_chain_depth");
    if (depth !== undefined) {
      if (typeof depth !== "number" || !Number.isInteger(depth) || depth < 1) {
        throw new ConfigError("analysis.maxValueChainDepth must be a positive integer");
      }
      config.analysis = { maxValueChainDepth: depth };
    }
  }

  const outputData = section(data, "output");
  if (outputData) {
    const output: Partial<OutputConfig> = {};
    const format = pick(outputData, "format");
    if (format !== undefined) {
      output.format = parseFormat(String(format), "output.format");
    }
    const verbose = pick(outputData, "verbose");
    if (verbose !== undefined) {
      if (typeof verbose !== "boolean") {
        throw new ConfigError("output.verbose must be a boolean");
      }
      output.verbose = verbose;
    }
    config.output = output;
  }

  const lintData = section(data, "lint");
  if (lintData) {
    const passesData = section(lintData, "passes");
    const passes: Record<string, PassConfig> = {};
    for (const [id, value] of Object.entries(passesData ?? {})) {
      passes[id] = parsePassConfig(id, value);
    }
    config.lint = { passes };
  }

  return config;
}

/**
 * Merge configs over the defaults, later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: OwnlintConfigInput[]): OwnlintConfig {
  const result: OwnlintConfig = {
    analysis: { ...DEFAULT_CONFIG.analysis },
    lint: { passes: { ...DEFAULT_CONFIG.lint.passes } },
    output: { ...DEFAULT_CONFIG.output },
  };

  for (const cfg of configs) {
    if (cfg.analysis) {
      result.analysis = { ...result.analysis, ...cfg.analysis };
    }
    if (cfg.lint) {
      result.lint = { passes: { ...result.lint.passes, ...cfg.lint.passes } };
    }
    if (cfg.output) {
      result.output = { ...result.output, ...cfg.output };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: CLI args > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: OwnlintConfigInput;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): OwnlintConfig {
  const sources: OwnlintConfigInput[] = [configFromEnv("OWNLINT", options?.env ?? process.env)];

  if (options?.configFile) {
    sources.push(configFromFile(options.configFile));
  } else {
    // Try to find default config files
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        sources.push(configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    sources.push(options.overrides);
  }

  return mergeConfigs(...sources);
}

export function disablePasses(ids: readonly string[]): Record<string, PassConfig> {
  const passes: Record<string, PassConfig> = {};
  for (const raw of ids) {
    const id = raw.trim();
    if (id) passes[id] = { enabled: false };
  }
  return passes;
}

function parsePassConfig(id: string, value: unknown): PassConfig {
  if (typeof value === "boolean") {
    return { enabled: value };
  }
  if (typeof value === "string") {
    return { enabled: value !== "off", severityOverride: parseSeverity(value, `lint.passes.${id}`) };
  }
  if (!isRecord(value)) {
    throw new ConfigError(`lint.passes.${id} must be a boolean, a severity or an object`);
  }

  let enabled = true;
  const rawEnabled = pick(value, "enabled");
  if (rawEnabled !== undefined) {
    if (typeof rawEnabled !== "boolean") {
      throw new ConfigError(`lint.passes.${id}.enabled must be a boolean`);
    }
    enabled = rawEnabled;
  }
  const severity = pick(value, "severityOverride", "severity_override", "severity");
  return {
    enabled,
    ...(severity !== undefined ? { severityOverride: parseSeverity(String(severity), `lint.passes.${id}.severity`) } : {}),
  };
}

function parseSeverity(value: string, where: string): SeverityOverride {
  const found = SEVERITY_OVERRIDES.find(s => s === value);
  if (!found) {
    throw new ConfigError(`${where} must be one of ${SEVERITY_OVERRIDES.join(", ")}`);
  }
  return found;
}

function parseFormat(value: string, where: string): OutputFormat {
  const found = FORMATS.find(f => f === value);
  if (!found) {
    throw new ConfigError(`${where} must be one of ${FORMATS.join(", ")}`);
  }
  return found;
}

function parsePositiveInt(value: string, where: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`${where} must be a positive integer, got ${value}`);
  }
  return n;
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be an object`);
  }
  return value;
}

function pick(data: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (data[key] !== undefined) return data[key];
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
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
    if (indent < 0) continue;

    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }

    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = unquote(trimmed.slice(0, colonIdx).trim());
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
    } else {
      parent[key] = unquote(value);
    }
  }

  return result;
}

function unquote(value: string): string {
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: OwnlintConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.analysis.maxValueChainDepth) || config.analysis.maxValueChainDepth < 1) {
    errors.push("analysis.maxValueChainDepth must be at least 1");
  } else if (config.analysis.maxValueChainDepth > 1024) {
    warnings.push("analysis.maxValueChainDepth is very high, value-type chains will almost never be treated as open");
  }

  const known = new Set(DEFAULT_PASSES.map(p => p.id));
  for (const id of Object.keys(config.lint.passes)) {
    if (!known.has(id)) {
      warnings.push(`Unknown pass in lint.passes: ${id}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
