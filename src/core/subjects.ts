/*
Subject artifacts and the design-matrix consistency gate.
Artifacts are located by filename convention: `<dir>/<stem>_FA<ext>` is the primary image and
secondary measures are sibling images named `<dir>/<stem>_<MEASURE><ext>` or `<dir>/<stem>_*<MEASURE>*<ext>`.
*/

import path from "node:path";

import fg from "fast-glob";

import { PRIMARY_MEASURE, type Measure } from "./run-layout.js";
import { StageError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { readTextFile, splitLines } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type Subject = {
  /** Subject-data stem: the artifact basename without extension and without `_FA`. */
  id: string;
  primaryPath: string;
  dataDir: string;
};

// Longest first so `.nii.gz` wins over `.gz`-less matches.
const IMAGE_EXTENSIONS = [".nii.gz", ".hdr.gz", ".img.gz", ".nii", ".hdr", ".img"];

// Source images are NIfTI or the header half of an Analyze pair.
const IMAGE_GLOB_SUFFIX = ".{nii.gz,nii,hdr.gz,hdr}";

// =============================================================================
// NAMING
// =============================================================================

export function imageExtension(filePath: string): string {
  const base = path.basename(filePath);
  return IMAGE_EXTENSIONS.find((ext) => base.endsWith(ext)) ?? "";
}

export function removeImageExtension(filePath: string): string {
  const ext = imageExtension(filePath);
  return ext ? filePath.slice(0, -ext.length) : filePath;
}

export function subjectStem(primaryPath: string): string {
  return path.basename(removeImageExtension(primaryPath)).split(`_${PRIMARY_MEASURE}`).join("");
}

export function toSubject(primaryPath: string): Subject {
  const resolved = path.resolve(primaryPath);
  return { id: subjectStem(resolved), primaryPath: resolved, dataDir: path.dirname(resolved) };
}

/**
 * Finds the source image of a measure for a subject, or null when none exists.
 * FA resolves to `<stem>_FA`; other measures to `<stem>_<MEASURE>`, falling back to
 * `<stem>_*<MEASURE>*`. Only image files count, and more than one candidate is an error.
 */
export async function resolveMeasureSource(
  subject: Subject,
  measure: Measure,
): Promise<string | null> {
  const stem = fg.escapePath(subject.id);
  const patterns =
    measure === PRIMARY_MEASURE
      ? [`${stem}_${PRIMARY_MEASURE}${IMAGE_GLOB_SUFFIX}`]
      : [`${stem}_${measure}${IMAGE_GLOB_SUFFIX}`, `${stem}_*${measure}*${IMAGE_GLOB_SUFFIX}`];

  for (const pattern of patterns) {
    const matches = await fg(pattern, { cwd: subject.dataDir, onlyFiles: true, dot: false });
    if (matches.length === 0) continue;
    if (matches.length > 1) {
      throw new StageError(
        `${measure} image for ${subject.id} is ambiguous in ${subject.dataDir}: ${matches.sort().join(", ")}`,
        "copy",
      );
    }
    return path.join(subject.dataDir, matches[0]);
  }
  return null;
}

// =============================================================================
// LISTS
// =============================================================================

export async function readSubjectList(listPath: string): Promise<Subject[]> {
  const content = await readTextFile(listPath);
  return splitLines(content)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map(toSubject);
}

export async function countDesignRows(designPath: string): Promise<number> {
  const content = await readTextFile(designPath);
  return splitLines(content).length;
}

/**
 * The design matrix carries `headerLines` fixed lines before one row per subject, in
 * subject-list order. A mismatch is fatal.
 */
export async function assertDesignMatchesSubjects(opts: {
  designPath: string;
  subjectCount: number;
  headerLines: number;
}): Promise<void> {
  const totalLines = await countDesignRows(opts.designPath);
  const rows = totalLines - opts.headerLines;
  if (rows === opts.subjectCount) return;

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.consistency,
    title: "Design matrix mismatch.",
    message: "Design matrix does not contain the correct number of subjects",
    hint: `Subject list has ${opts.subjectCount} entries; ${opts.designPath} has ${rows} rows after ${opts.headerLines} header lines.`,
  });
}
