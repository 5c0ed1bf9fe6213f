import path from "node:path";

import type { PipelineSettings } from "../app/pipeline/run-context.js";
import type { ProjectConfig, SchedulerBackend } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { isFile } from "../core/utils.js";
import { toJobResources } from "../scheduler/job-submitter.js";

// =============================================================================
// TYPES
// =============================================================================

/** Option values as commander hands them over: unparsed strings and switches. */
export type RawRunOptions = {
  tbssDir?: string;
  subList?: string;
  design?: string;
  contrast?: string;
  template?: string;
  faThreshold?: string;
  perm?: string;
  checkDesign?: boolean;
  nonFaTbss?: boolean;
  maxParallel?: string;
  scheduler?: string;
};

export type ResolvedRunOptions = {
  settings: PipelineSettings;
  backend: SchedulerBackend;
};

const MAX_NUMERIC_ARGUMENT = 9999999;
const INTEGER_PATTERN = /^[0-9]+$/;
const DECIMAL_PATTERN = /^[+-]?[0-9]+\.?[0-9]*$/;
const SCHEDULER_BACKENDS: readonly SchedulerBackend[] = ["lsf", "local"];

export const DEFAULT_TEMPLATE_RELATIVE = "data/standard/FMRIB58_FA_1mm.nii.gz";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Validates `run` options in a fixed order and merges them over the config. The first
 * problem found is thrown; nothing is created on disk here.
 */
export async function resolveRunOptions(
  raw: RawRunOptions,
  config: ProjectConfig,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ResolvedRunOptions> {
  if (!raw.tbssDir) {
    throw invalidArgument("'--tbss-dir' argument required.");
  }

  const subjectListPath = await requireFile("--sub-list", raw.subList);
  const designPath = await requireFile("--design", raw.design);
  const contrastPath = await requireFile("--contrast", raw.contrast);
  const templatePath = await requireFile("--template", resolveTemplate(raw.template, config, env));

  const permutations =
    raw.perm === undefined ? config.pipeline.permutations : parsePermutations(raw.perm);
  const faThreshold =
    raw.faThreshold === undefined ? config.pipeline.fa_threshold : parseThreshold(raw.faThreshold);
  const maxParallelCopies =
    raw.maxParallel === undefined
      ? config.pipeline.max_parallel_copies
      : parseMaxParallel(raw.maxParallel);
  const backend =
    raw.scheduler === undefined ? config.scheduler.backend : parseBackend(raw.scheduler);

  return {
    backend,
    settings: {
      runDir: path.resolve(raw.tbssDir),
      subjectListPath,
      designPath,
      contrastPath,
      templatePath,
      faThreshold,
      permutations,
      fillThreshold: config.pipeline.fill_threshold,
      checkDesign: raw.checkDesign ?? false,
      secondaryMeasures: raw.nonFaTbss ?? false,
      gating: config.pipeline.gating,
      designHeaderLines: config.pipeline.design_header_lines,
      maxParallelCopies,
      statsResources: toJobResources(config.pipeline.stats_job),
      toolkitBinDir: config.toolkit.bin_dir,
    },
  };
}

/** Flag, then config, then the standard template of the toolkit install named by FSLDIR. */
export function resolveTemplate(
  flag: string | undefined,
  config: ProjectConfig,
  env: NodeJS.ProcessEnv,
): string | undefined {
  if (flag) return flag;
  if (config.pipeline.template) return config.pipeline.template;
  const fslDir = env.FSLDIR;
  return fslDir ? path.join(fslDir, DEFAULT_TEMPLATE_RELATIVE) : undefined;
}

export async function requireFile(flag: string, value: string | undefined): Promise<string> {
  if (!value || !(await isFile(value))) {
    throw invalidArgument(`'${flag}' option was not specified or the file does not exist.`);
  }
  return path.resolve(value);
}

export function parsePermutations(value: string): number {
  const parsed = Number(value);
  if (!INTEGER_PATTERN.test(value) || parsed < 1 || parsed > MAX_NUMERIC_ARGUMENT) {
    throw invalidArgument(`'--perm' argument requires integers only [1 - ${MAX_NUMERIC_ARGUMENT}]`);
  }
  return parsed;
}

export function parseThreshold(value: string): number {
  const parsed = Number(value);
  if (!DECIMAL_PATTERN.test(value) || parsed < 0 || parsed > MAX_NUMERIC_ARGUMENT) {
    throw invalidArgument(
      `'--fa-threshold' argument requires floats [0.0 - ${MAX_NUMERIC_ARGUMENT}.0]`,
    );
  }
  return parsed;
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseMaxParallel(value: string): number {
  const parsed = Number(value);
  if (!INTEGER_PATTERN.test(value) || parsed < 1) {
    throw invalidArgument("'--max-parallel' argument requires a positive integer");
  }
  return parsed;
}

function parseBackend(value: string): SchedulerBackend {
  const backend = SCHEDULER_BACKENDS.find((candidate) => candidate === value);
  if (!backend) {
    throw invalidArgument(`'--scheduler' must be one of: ${SCHEDULER_BACKENDS.join(", ")}`);
  }
  return backend;
}

function invalidArgument(message: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Invalid arguments.",
    message,
    hint: "Run `tractline run --help` for usage.",
  });
}
