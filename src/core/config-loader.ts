import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { SweepConfigSchema, type SweepConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export const DEFAULT_CONFIG_FILENAME = "holdsweep.yaml";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
  env: NodeJS.ProcessEnv;
};

export function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = ctx.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = `Pass an existing file to --config or remove the flag to use defaults.`;
const INVALID_CONFIG_HINT = "Fix the config file and rerun.";

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Sweep config missing.",
    message: `Sweep config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Sweep config invalid.",
    message: `Sweep config at ${configPath} is invalid.\n${cause.message}`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

// =============================================================================
// PUBLIC API
// =============================================================================

export type LoadedSweepConfig = {
  config: SweepConfig;
  configPath: string | null;
};

/**
 * Resolves the run config: an explicit path must exist; otherwise `holdsweep.yaml`
 * in `cwd` is used when present, and built-in defaults when not.
 */
export function loadSweepConfig(
  options: { explicitPath?: string; cwd?: string; env?: NodeJS.ProcessEnv } = {},
): LoadedSweepConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (options.explicitPath) {
    const absolutePath = path.resolve(cwd, options.explicitPath);
    if (!fs.existsSync(absolutePath)) {
      throw createMissingConfigError(absolutePath);
    }
    return { config: parseConfigFile(absolutePath, env), configPath: absolutePath };
  }

  const discovered = path.join(cwd, DEFAULT_CONFIG_FILENAME);
  if (fs.existsSync(discovered)) {
    return { config: parseConfigFile(discovered, env), configPath: discovered };
  }

  return { config: SweepConfigSchema.parse({}), configPath: null };
}

export function parseSweepConfigText(
  raw: string,
  source: string,
  env: NodeJS.ProcessEnv = process.env,
): SweepConfig {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML in ${source}: ${detail}`, err);
  }

  const expanded = expandEnv(doc ?? {}, { file: source, trail: [], env });
  const parsed = SweepConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error.issues), parsed.error);
  }

  return parsed.data;
}

function parseConfigFile(absolutePath: string, env: NodeJS.ProcessEnv): SweepConfig {
  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read sweep config at ${absolutePath}`, err);
    }

    return parseSweepConfigText(raw, absolutePath, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw createInvalidConfigError(absolutePath, error);
    }
    throw error;
  }
}
