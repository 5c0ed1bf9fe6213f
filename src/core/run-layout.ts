import path from "node:path";

// =============================================================================
// MEASURES
// =============================================================================

export const PRIMARY_MEASURE = "FA";
export const SECONDARY_MEASURES = ["AD", "MD", "RD"] as const;

export type SecondaryMeasure = (typeof SECONDARY_MEASURES)[number];
export type Measure = typeof PRIMARY_MEASURE | SecondaryMeasure;

// =============================================================================
// LAYOUT
// =============================================================================

/**
 * Every path the pipeline reads or writes under one run directory. The presence of these
 * paths is the only progress record a run keeps.
 */
export type RunLayout = {
  root: string;
  statsDir: string;
  logsDir: string;
  stagesDir: string;
  designMat: string;
  designCon: string;
  eventsLog: string;
};

export function createRunLayout(runDir: string): RunLayout {
  const root = path.resolve(runDir);
  const statsDir = path.join(root, "stats");
  const logsDir = path.join(root, "logs");

  return {
    root,
    statsDir,
    logsDir,
    stagesDir: path.join(root, ".stages"),
    designMat: path.join(statsDir, "design.mat"),
    designCon: path.join(statsDir, "design.con"),
    eventsLog: path.join(logsDir, "pipeline.jsonl"),
  };
}

export function measureDir(layout: RunLayout, measure: Measure): string {
  return path.join(layout.root, measure);
}

// Copies land here first; the directory is renamed to measureDir only once every copy succeeded.
export function measureStagingDir(layout: RunLayout, measure: Measure): string {
  return path.join(layout.root, `.${measure}.staging`);
}

export function skeletonisedPath(layout: RunLayout, measure: Measure): string {
  return path.join(layout.statsDir, `all_${measure}_skeletonised.nii.gz`);
}

export function statsOutputBase(measure: Measure): string {
  return `tbss_${measure}`;
}

export function statsMarkerPath(layout: RunLayout, measure: Measure): string {
  return path.join(layout.statsDir, `${statsOutputBase(measure)}_tfce_p_tstat1.nii.gz`);
}

export function corrpPattern(measure: Measure): string {
  return `*${statsOutputBase(measure)}_tfce_corrp_tstat*.nii*`;
}

export function filledPattern(measure: Measure): string {
  return `*${statsOutputBase(measure)}_tfce_corrp_tstat*fill*.nii*`;
}

export function randomiseLogPath(layout: RunLayout, measure: Measure): string {
  return path.join(measureDir(layout, measure), `00_tbss_${measure}_randomise.log`);
}

export function stageSentinelPath(layout: RunLayout, stage: string): string {
  return path.join(layout.stagesDir, `${stage}.done`);
}

export function commandLogPaths(
  layout: RunLayout,
  step: string,
): { stdoutPath: string; stderrPath: string } {
  return {
    stdoutPath: path.join(layout.logsDir, `${step}.out.log`),
    stderrPath: path.join(layout.logsDir, `${step}.err.log`),
  };
}
