/**
 * Design enumerator: walks `<designs>/<group>/<design>/` and submits one full pipeline run per
 * design as its own scheduler job.
 * Purpose: resolve each design's subjects against the data root and hand the run off without waiting.
 * Assumptions: designs share nothing, so they are submitted back-to-back.
 * Usage: const result = await enumerateDesigns(settings, { submitter, logger, reporter });
 */

import path from "node:path";

import fg from "fast-glob";

import { logPipelineEvent, type EventLogger } from "../../core/logger.js";
import type { Reporter } from "../../core/reporter.js";
import { isFile, pathExists, readTextFile, splitLines, writeTextFileAtomic } from "../../core/utils.js";
import type { JobHandle, JobResources, JobSubmitter } from "../../scheduler/job-submitter.js";

// =============================================================================
// TYPES
// =============================================================================

export type DesignSettings = {
  designsDir: string;
  dataDir: string;
  outDir: string;
  /** Subject artifact path relative to `dataDir`; every `{subject}` is replaced by the id. */
  subjectPathTemplate: string;
  includeFile: string;
  matrixFile: string;
  contrastFile: string;
  /** Command (and leading arguments such as `--config`) that starts one pipeline run. */
  pipelineCommand: string;
  pipelineArgs: string[];
  templatePath: string;
  faThreshold: number;
  permutations: number;
  resources: JobResources;
};

export type DesignEntry = {
  group: string;
  design: string;
  designDir: string;
  /** `<outDir>/TBSS/<group>/<design>` */
  outputDir: string;
  runDir: string;
  subjectListPath: string;
  matrixPath: string;
  contrastPath: string;
};

export type SubjectResolution = {
  resolved: string[];
  omitted: Array<{ subject: string; path: string }>;
};

export type DesignSubmission =
  | {
      status: "submitted";
      entry: DesignEntry;
      /** False when an existing subject list was reused as is. */
      listWritten: boolean;
      omitted: string[];
      handle: JobHandle;
    }
  | { status: "skipped"; entry: DesignEntry; reason: string };

export type EnumeratorDeps = {
  submitter: JobSubmitter;
  logger: EventLogger;
  reporter: Reporter;
};

// =============================================================================
// DISCOVERY
// =============================================================================

/** Groups and designs in sorted order; plain files at either level are ignored. */
export async function discoverDesigns(settings: DesignSettings): Promise<DesignEntry[]> {
  const groups = await listSubdirectories(settings.designsDir);
  const entries: DesignEntry[] = [];

  for (const group of groups) {
    const designs = await listSubdirectories(path.join(settings.designsDir, group));
    for (const design of designs) {
      const designDir = path.join(settings.designsDir, group, design);
      const outputDir = path.join(settings.outDir, "TBSS", group, design);
      entries.push({
        group,
        design,
        designDir,
        outputDir,
        runDir: path.join(outputDir, "tbss"),
        subjectListPath: path.join(outputDir, "subs.list.txt"),
        matrixPath: path.join(designDir, settings.matrixFile),
        contrastPath: path.join(designDir, settings.contrastFile),
      });
    }
  }

  return entries;
}

export function subjectArtifactPath(settings: DesignSettings, subject: string): string {
  return path.resolve(settings.dataDir, settings.subjectPathTemplate.split("{subject}").join(subject));
}

/** Keeps subjects whose artifact is a regular file; the rest are reported as omitted. */
export async function resolveDesignSubjects(
  settings: DesignSettings,
  subjects: string[],
): Promise<SubjectResolution> {
  const resolution: SubjectResolution = { resolved: [], omitted: [] };
  for (const subject of subjects) {
    const artifact = subjectArtifactPath(settings, subject);
    if (await isFile(artifact)) {
      resolution.resolved.push(artifact);
    } else {
      resolution.omitted.push({ subject, path: artifact });
    }
  }
  return resolution;
}

// =============================================================================
// SUBMISSION
// =============================================================================

export async function enumerateDesigns(
  settings: DesignSettings,
  deps: EnumeratorDeps,
): Promise<DesignSubmission[]> {
  const entries = await discoverDesigns(settings);
  const submissions: DesignSubmission[] = [];

  for (const entry of entries) {
    deps.reporter.info(`Processing Design: ${entry.group} | ${entry.design}`);
    submissions.push(await submitDesign(settings, entry, deps));
  }

  return submissions;
}

export function buildRunArgs(settings: DesignSettings, entry: DesignEntry): string[] {
  return [
    ...settings.pipelineArgs,
    "run",
    "--tbss-dir",
    entry.runDir,
    "--sub-list",
    entry.subjectListPath,
    "--design",
    entry.matrixPath,
    "--contrast",
    entry.contrastPath,
    "--template",
    settings.templatePath,
    "--fa-threshold",
    String(settings.faThreshold),
    "--perm",
    String(settings.permutations),
    "--check-design",
    "--non-fa-tbss",
  ];
}

async function submitDesign(
  settings: DesignSettings,
  entry: DesignEntry,
  deps: EnumeratorDeps,
): Promise<DesignSubmission> {
  const { logger, reporter } = deps;
  const listed = await ensureSubjectList(settings, entry, deps);
  if (listed.status === "skipped") {
    reporter.warn(`${entry.group} | ${entry.design}: ${listed.reason}`);
    logPipelineEvent(logger, "design.skipped", {
      group: entry.group,
      design: entry.design,
      reason: listed.reason,
    });
    return { status: "skipped", entry, reason: listed.reason };
  }

  const logPath = path.join(entry.outputDir, `tbss_${entry.group}_${entry.design}.log`);
  const handle = await deps.submitter.submit(
    {
      name: `tbss_${entry.group}_${entry.design}`,
      command: settings.pipelineCommand,
      args: buildRunArgs(settings, entry),
      cwd: entry.outputDir,
      resources: settings.resources,
      stdoutPath: logPath,
      stderrPath: logPath,
    },
    "background",
  );

  logPipelineEvent(logger, "design.submit", {
    group: entry.group,
    design: entry.design,
    job_id: handle.jobId,
    subject_list: entry.subjectListPath,
  });
  reporter.success(`Submitted ${handle.name} as job ${handle.jobId}.`);

  return {
    status: "submitted",
    entry,
    listWritten: listed.written,
    omitted: listed.omitted,
    handle,
  };
}

type ListOutcome =
  | { status: "ready"; written: boolean; omitted: string[] }
  | { status: "skipped"; reason: string };

// The list is written once; an existing list is never re-resolved or rewritten.
async function ensureSubjectList(
  settings: DesignSettings,
  entry: DesignEntry,
  deps: EnumeratorDeps,
): Promise<ListOutcome> {
  if (await pathExists(entry.subjectListPath)) {
    return { status: "ready", written: false, omitted: [] };
  }

  const includePath = path.join(entry.designDir, settings.includeFile);
  if (!(await pathExists(includePath))) {
    return { status: "skipped", reason: `subject include file ${includePath} does not exist` };
  }

  const subjects = splitLines(await readTextFile(includePath))
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const resolution = await resolveDesignSubjects(settings, subjects);

  for (const omission of resolution.omitted) {
    deps.reporter.warn(`${entry.group} | ${entry.design} | ${omission.subject} does not exist`);
    logPipelineEvent(deps.logger, "subject.omitted", {
      group: entry.group,
      design: entry.design,
      subject: omission.subject,
      path: omission.path,
    });
  }

  if (resolution.resolved.length === 0) {
    return { status: "skipped", reason: "no subject in the include file has an artifact on disk" };
  }

  await writeTextFileAtomic(entry.subjectListPath, `${resolution.resolved.join("\n")}\n`);
  return {
    status: "ready",
    written: true,
    omitted: resolution.omitted.map((omission) => omission.subject),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function listSubdirectories(dir: string): Promise<string[]> {
  if (!(await pathExists(dir))) return [];
  const found = await fg("*", { cwd: dir, onlyDirectories: true });
  return found.sort();
}
