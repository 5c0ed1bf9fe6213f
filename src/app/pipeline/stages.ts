/**
 * Pipeline stages and the marker each one is gated on. Shared by the sequencer and by the
 * read-only status report so both read progress the same way.
 */

import type { GatingMode } from "../../core/config.js";
import {
  PRIMARY_MEASURE,
  SECONDARY_MEASURES,
  filledPattern,
  measureDir,
  skeletonisedPath,
  stageSentinelPath,
  statsMarkerPath,
  type Measure,
  type RunLayout,
} from "../../core/run-layout.js";

import { globMarker, pathMarker, type StageMarker } from "./stage-gate.js";

// =============================================================================
// STAGES
// =============================================================================

export const PIPELINE_STAGES = [
  "init",
  "copy",
  "preproc",
  "register",
  "postreg",
  "prestats",
  "stats",
  "poststats_fill",
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

/** Single-command stages that coarse gating treats as one unit behind `stats/`. */
export const PREPROCESSING_STAGES = ["preproc", "register", "postreg", "prestats"] as const;

export type PreprocessingStage = (typeof PREPROCESSING_STAGES)[number];

// Secondary measures add a projection step between their copy and their stats.
export type StepKind = Exclude<PipelineStage, "init"> | "skeletonise";

export type StageCheck = {
  /** Step id, e.g. `copy-FA` or `prestats`; also the command log file stem. */
  id: string;
  kind: StepKind;
  measure?: Measure;
  marker: StageMarker;
};

// =============================================================================
// MARKERS
// =============================================================================

export function copyMarker(layout: RunLayout, measure: Measure): StageMarker {
  return pathMarker(measureDir(layout, measure));
}

export function preprocessingMarker(
  layout: RunLayout,
  stage: PreprocessingStage,
  gating: GatingMode,
): StageMarker {
  return gating === "coarse"
    ? pathMarker(layout.statsDir)
    : pathMarker(stageSentinelPath(layout, stage));
}

export function skeletonMarker(layout: RunLayout, measure: Measure): StageMarker {
  return pathMarker(skeletonisedPath(layout, measure));
}

export function statsMarker(layout: RunLayout, measure: Measure): StageMarker {
  return pathMarker(statsMarkerPath(layout, measure));
}

export function fillMarker(layout: RunLayout, measure: Measure): StageMarker {
  return globMarker(layout.statsDir, filledPattern(measure));
}

// =============================================================================
// PLAN
// =============================================================================

export function stepId(kind: StepKind, measure?: Measure): string {
  return measure ? `${kind}-${measure}` : kind;
}

/** Every gated step of a run, in execution order. */
export function planStageChecks(
  layout: RunLayout,
  opts: { gating: GatingMode; secondaryMeasures: boolean },
): StageCheck[] {
  const checks: StageCheck[] = [
    {
      id: stepId("copy", PRIMARY_MEASURE),
      kind: "copy",
      measure: PRIMARY_MEASURE,
      marker: copyMarker(layout, PRIMARY_MEASURE),
    },
    ...PREPROCESSING_STAGES.map((stage) => ({
      id: stepId(stage),
      kind: stage,
      marker: preprocessingMarker(layout, stage, opts.gating),
    })),
    {
      id: stepId("stats", PRIMARY_MEASURE),
      kind: "stats",
      measure: PRIMARY_MEASURE,
      marker: statsMarker(layout, PRIMARY_MEASURE),
    },
  ];

  if (opts.secondaryMeasures) {
    for (const measure of SECONDARY_MEASURES) {
      checks.push(
        { id: stepId("copy", measure), kind: "copy", measure, marker: copyMarker(layout, measure) },
        {
          id: stepId("skeletonise", measure),
          kind: "skeletonise",
          measure,
          marker: skeletonMarker(layout, measure),
        },
        { id: stepId("stats", measure), kind: "stats", measure, marker: statsMarker(layout, measure) },
      );
    }
  }

  const filled: Measure[] = opts.secondaryMeasures
    ? [PRIMARY_MEASURE, ...SECONDARY_MEASURES]
    : [PRIMARY_MEASURE];
  for (const measure of filled) {
    checks.push({
      id: stepId("poststats_fill", measure),
      kind: "poststats_fill",
      measure,
      marker: fillMarker(layout, measure),
    });
  }

  return checks;
}
