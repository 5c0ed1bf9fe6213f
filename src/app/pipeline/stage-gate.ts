/**
 * Stage gate: decides skip-vs-run from filesystem evidence.
 * Purpose: keep every "has this stage already converged" check behind one interface.
 * Assumptions: markers are written only by successful stage completion.
 * Usage: `if (await gate.isComplete(marker)) skip(); else run();`
 *
 * An empty directory counts as present. A crash after a stage created its marker directory
 * but before it filled it therefore reads as complete; a re-run will not repair it.
 */

import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

// =============================================================================
// TYPES
// =============================================================================

export type StageMarker =
  | { kind: "path"; path: string }
  | { kind: "glob"; cwd: string; pattern: string };

/** Filesystem probes the gate needs; swapped for an in-memory fake in tests. */
export interface MarkerProbe {
  exists(targetPath: string): Promise<boolean>;
  matches(cwd: string, pattern: string): Promise<string[]>;
}

export interface StageGate {
  isComplete(marker: StageMarker): Promise<boolean>;
}

// =============================================================================
// MARKERS
// =============================================================================

export function pathMarker(targetPath: string): StageMarker {
  return { kind: "path", path: targetPath };
}

export function globMarker(cwd: string, pattern: string): StageMarker {
  return { kind: "glob", cwd, pattern };
}

export function describeMarker(marker: StageMarker): string {
  return marker.kind === "path" ? marker.path : path.join(marker.cwd, marker.pattern);
}

// =============================================================================
// IMPLEMENTATIONS
// =============================================================================

export const fsMarkerProbe: MarkerProbe = {
  exists: (targetPath) => fse.pathExists(targetPath),
  matches: async (cwd, pattern) => {
    if (!(await fse.pathExists(cwd))) return [];
    return fg(pattern, { cwd, onlyFiles: true });
  },
};

/** Evaluated fresh on every call; nothing is cached across a run. */
export function createStageGate(probe: MarkerProbe = fsMarkerProbe): StageGate {
  return {
    async isComplete(marker) {
      if (marker.kind === "path") {
        return probe.exists(marker.path);
      }
      const found = await probe.matches(marker.cwd, marker.pattern);
      return found.length > 0;
    },
  };
}
