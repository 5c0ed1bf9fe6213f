import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ProjectConfigSchema, defaultProjectConfig, type ProjectConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

export const DEFAULT_CONFIG_FILENAME = "tractline.yaml";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
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

const INVALID_CONFIG_HINT = "Fix the config file and rerun, or drop --config to use built-in defaults.";

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

function toUserFacing(error: unknown, configPath: string): never {
  if (error instanceof ConfigError) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config invalid.",
      message: `Config at ${configPath} is invalid.`,
      hint: INVALID_CONFIG_HINT,
      cause: error,
    });
  }
  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadProjectConfig(configPath: string): ProjectConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config missing.",
      message: `Config not found at ${absolutePath}.`,
      hint: `Create ${DEFAULT_CONFIG_FILENAME} or drop --config to use built-in defaults.`,
    });
  }

  try {
    const raw = fs.readFileSync(absolutePath, "utf8");

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Failed to parse YAML config at ${absolutePath}: ${detail}`, err);
    }

    const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });
    const parsed = ProjectConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid config at ${absolutePath}:\n${details}`, parsed.error);
    }

    return resolveConfigPaths(parsed.data, path.dirname(absolutePath));
  } catch (err) {
    toUserFacing(err, absolutePath);
  }
}

/**
 * Resolves the config to use: an explicit path must exist, otherwise `tractline.yaml` in
 * `cwd` is used when present, otherwise built-in defaults.
 */
export function resolveProjectConfig(opts: {
  explicitPath?: string;
  cwd?: string;
}): { config: ProjectConfig; configPath: string | null } {
  if (opts.explicitPath) {
    const configPath = path.resolve(opts.explicitPath);
    return { config: loadProjectConfig(configPath), configPath };
  }

  const discovered = path.join(opts.cwd ?? process.cwd(), DEFAULT_CONFIG_FILENAME);
  if (fs.existsSync(discovered)) {
    return { config: loadProjectConfig(discovered), configPath: discovered };
  }

  return { config: defaultProjectConfig(), configPath: null };
}

// =============================================================================
// INTERNALS
// =============================================================================

// Relative paths are anchored at the config file so the file can live beside the data.
function resolveConfigPaths(cfg: ProjectConfig, configDir: string): ProjectConfig {
  const resolveOptional = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(configDir, value);

  return {
    ...cfg,
    pipeline: { ...cfg.pipeline, template: resolveOptional(cfg.pipeline.template) },
    toolkit: { ...cfg.toolkit, bin_dir: resolveOptional(cfg.toolkit.bin_dir) },
    designs: {
      ...cfg.designs,
      designs_dir: resolveOptional(cfg.designs.designs_dir),
      data_dir: resolveOptional(cfg.designs.data_dir),
      out_dir: resolveOptional(cfg.designs.out_dir),
    },
  };
}
