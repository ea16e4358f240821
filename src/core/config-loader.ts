import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { PipelineConfigSchema, type PipelineConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { buildPipelineDefinition, type PipelineDefinition } from "./pipeline.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoadedPipeline = {
  configPath: string;
  config: PipelineConfig;
  pipeline: PipelineDefinition;
};

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

// ${VAR} must be set; ${VAR:-fallback} falls back when unset or empty.
const ENV_REFERENCE = /\$\{([A-Z0-9_]+)(:-([^}]*))?\}/gi;

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(
      ENV_REFERENCE,
      (_match, varName: string, fallbackClause: string | undefined, fallback: string | undefined) => {
        const envValue = process.env[varName];
        if (fallbackClause !== undefined) {
          return envValue !== undefined && envValue.length > 0 ? envValue : (fallback ?? "");
        }
        if (envValue === undefined) {
          const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
          throw new ConfigError(
            `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
          );
        }
        return envValue;
      },
    );
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

const MISSING_CONFIG_HINT = "Create .stagegate/pipeline.yaml in the repo or pass --config <path>.";
const INVALID_CONFIG_HINT = "Fix the pipeline file and rerun `stagegate validate`.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const mark: unknown = error.mark;
  if (!mark || typeof mark !== "object") {
    return null;
  }
  if (!("line" in mark) || !("column" in mark)) {
    return null;
  }

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

function formatIssues(issues: ZodIssue[]): string {
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
    title: "Pipeline config missing.",
    message: `Pipeline config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Pipeline config invalid.",
    message: `Pipeline config at ${configPath} is invalid.\n${cause.message}`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadPipelineConfig(configPath: string): LoadedPipeline {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read pipeline config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}: ${detail}`,
        err,
      );
    }

    const expanded = expandEnv(doc, { file: absolutePath, trail: [] });

    const parsed = PipelineConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(details, parsed.error);
    }

    // Relative repo paths are anchored at the config file, not the caller's cwd.
    const config: PipelineConfig = {
      ...parsed.data,
      repo_path: path.resolve(path.dirname(absolutePath), parsed.data.repo_path),
    };

    return { configPath: absolutePath, config, pipeline: buildPipelineDefinition(config) };
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}
