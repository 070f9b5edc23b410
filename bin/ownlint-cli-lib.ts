// bin/ownlint-cli-lib.ts
// CLI utilities for the ownlint command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { loadConfig, validateConfig, disablePasses, type OwnlintConfigInput, type OutputFormat } from "../src/core/config";
import { DEFAULT_PASSES } from "../src/lint/runner";
import { parseDeclarations } from "../src/model/decode";
import { hasErrors, countBySeverity } from "../src/outcome/diagnostic";
import { DeclarationFormatError, OwnlintError } from "../src/outcome/errors";
import { explainCode, listRules } from "../src/report/docgen";
import { formatJson, formatText } from "../src/report/format";
import { validate } from "../src/validate";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  config?: string;
  format?: string;
  maxDepth?: string;
  disable: string[];
  explain?: string;
  listRules?: boolean;
  verbose?: boolean;
  warningsAsErrors?: boolean;
  showFixes?: boolean;
  file?: string;
  /** Usage problems found while parsing. */
  errors: string[];
};

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (filePath: string) => string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export const EXIT_OK = 0;
export const EXIT_DIAGNOSTICS = 1;
export const EXIT_USAGE = 2;
export const EXIT_INTERNAL = 3;

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { disable: [], errors: [] };

  const value = (flag: string, i: number): string | undefined => {
    const v = args[i];
    if (v === undefined || v.startsWith("-")) {
      result.errors.push(`Missing value for ${flag}`);
      return undefined;
    }
    return v;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--list-rules") {
      result.listRules = true;
    } else if (arg === "--warnings-as-errors") {
      result.warningsAsErrors = true;
    } else if (arg === "--fixes") {
      result.showFixes = true;
    } else if (arg === "--config" || arg === "-c") {
      result.config = value(arg, ++i);
    } else if (arg === "--format" || arg === "-f") {
      result.format = value(arg, ++i);
    } else if (arg === "--max-depth") {
      result.maxDepth = value(arg, ++i);
    } else if (arg === "--explain") {
      result.explain = value(arg, ++i);
    } else if (arg === "--disable") {
      const id = value(arg, ++i);
      if (id) result.disable.push(id);
    } else if (arg.startsWith("-")) {
      result.errors.push(`Unknown option: ${arg}`);
    } else if (!result.file) {
      result.file = arg;
    } else {
      result.errors.push(`Unexpected argument: ${arg}`);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
ownlint - ownership annotation validator

USAGE:
  ownlint [options] <declarations.json>   Validate a declaration set
  ownlint --explain <code>                Explain a diagnostic code
  ownlint --list-rules                    List diagnostic codes

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -c, --config <file>                Load configuration (.json, .yaml)
  -f, --format <text|json>           Output format (default: text)
  --max-depth <n>                    Cap on nested value-type flattening
  --disable <pass-id>                Disable a pass (repeatable)
  --fixes                            Show suggested owns-list rewrites
  --warnings-as-errors               Exit with 1 when only warnings are found
  --verbose                          Log pass progress to stderr

EXIT CODES:
  0  no errors
  1  errors found (or warnings with --warnings-as-errors)
  2  usage, configuration or input problem
  3  internal error

EXAMPLES:
  ownlint types.json
  ownlint --format json --disable lint/retain-cycle types.json
  ownlint --explain E0704
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(path.dirname(fileURLToPath(import.meta.url)), "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `ownlint v${pkg.version}`;
    }
  } catch {
    // fall through to the built-in version
  }
  return "ownlint v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

/** CLI flags as the highest-priority config source. */
export function buildOverrides(args: CliArgs): OwnlintConfigInput {
  const overrides: OwnlintConfigInput = {};

  if (args.maxDepth !== undefined) {
    const depth = Number(args.maxDepth);
    if (!Number.isInteger(depth) || depth < 1) {
      throw new OwnlintError(`--max-depth must be a positive integer, got ${args.maxDepth}`, "INVALID_ARGS");
    }
    overrides.analysis = { maxValueChainDepth: depth };
  }

  const output: { format?: OutputFormat; verbose?: boolean } = {};
  if (args.format !== undefined) {
    if (args.format !== "text" && args.format !== "json") {
      throw new OwnlintError(`--format must be text or json, got ${args.format}`, "INVALID_ARGS");
    }
    output.format = args.format;
  }
  if (args.verbose) {
    output.verbose = true;
  }
  if (Object.keys(output).length > 0) {
    overrides.output = output;
  }

  if (args.disable.length > 0) {
    overrides.lint = { passes: disablePasses(args.disable) };
  }

  return overrides;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run the CLI against the given IO. Returns the process exit code.
 */
export function runCli(argv: string[], io: CliIO): number {
  const args = parseCliArgs(argv);

  if (args.errors.length > 0) {
    for (const e of args.errors) io.stderr(`ownlint: ${e}`);
    io.stderr("Run ownlint --help for usage.");
    return EXIT_USAGE;
  }
  if (args.help) {
    io.stdout(getHelpText());
    return EXIT_OK;
  }
  if (args.version) {
    io.stdout(getVersion());
    return EXIT_OK;
  }
  if (args.listRules) {
    io.stdout(listRules(DEFAULT_PASSES));
    return EXIT_OK;
  }
  if (args.explain !== undefined) {
    const text = explainCode(args.explain);
    if (!text) {
      io.stderr(`ownlint: unknown diagnostic code: ${args.explain}`);
      return EXIT_USAGE;
    }
    io.stdout(text);
    return EXIT_OK;
  }
  if (!args.file) {
    io.stderr("ownlint: no declaration file given");
    io.stderr("Run ownlint --help for usage.");
    return EXIT_USAGE;
  }

  try {
    const config = loadConfig({
      configFile: args.config,
      overrides: buildOverrides(args),
      env: io.env,
      cwd: io.cwd,
    });
    const check = validateConfig(config);
    for (const w of check.warnings) io.stderr(`ownlint: warning: ${w}`);
    if (!check.valid) {
      for (const e of check.errors) io.stderr(`ownlint: ${e}`);
      return EXIT_USAGE;
    }

    let text: string;
    try {
      text = io.readFile(args.file);
    } catch (e) {
      io.stderr(`ownlint: cannot read ${args.file}: ${e instanceof Error ? e.message : String(e)}`);
      return EXIT_USAGE;
    }

    const declarations = parseDeclarations(text);
    const log = config.output.verbose
      ? (msg: string, data?: unknown) => io.stderr(`[ownlint] ${msg}${data === undefined ? "" : ` ${JSON.stringify(data)}`}`)
      : undefined;

    log?.(`validating ${declarations.length} declarations from ${args.file}`);
    const diagnostics = validate(declarations, {
      maxValueChainDepth: config.analysis.maxValueChainDepth,
      lint: config.lint,
      log,
    });

    io.stdout(
      config.output.format === "json"
        ? formatJson(diagnostics)
        : formatText(diagnostics, { showFixes: args.showFixes })
    );

    if (hasErrors(diagnostics)) return EXIT_DIAGNOSTICS;
    if (args.warningsAsErrors && countBySeverity(diagnostics).warning > 0) return EXIT_DIAGNOSTICS;
    return EXIT_OK;
  } catch (e) {
    if (e instanceof DeclarationFormatError) {
      io.stderr(`ownlint: ${e.message}`);
      for (const p of e.problems) io.stderr(`  ${p.path}: ${p.message}`);
      return EXIT_USAGE;
    }
    if (e instanceof OwnlintError && e.code !== "INTERNAL_INVARIANT") {
      io.stderr(`ownlint: ${e.message}`);
      return EXIT_USAGE;
    }
    throw e;
  }
}
