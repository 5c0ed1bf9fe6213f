/**
 * Command lines for the FSL TBSS tools. Pure: nothing here runs a process.
 * The tools themselves are opaque; only their file outputs matter to the pipeline.
 */

import path from "node:path";

import type { CommandSpec } from "../exec/command.js";
import {
  skeletonisedPath,
  statsOutputBase,
  type Measure,
  type RunLayout,
} from "../core/run-layout.js";
import { removeImageExtension } from "../core/subjects.js";

export type ToolkitStep = Pick<CommandSpec, "command" | "args" | "cwd"> & {
  /** Stable step id used for log file names and events. */
  step: string;
};

export class FslToolkit {
  constructor(
    private readonly layout: RunLayout,
    private readonly binDir?: string,
  ) {}

  /** Erosion and end-slice zeroing of the staged primary images. */
  preprocess(images: string[]): ToolkitStep {
    const relative = images.map((image) => path.relative(this.layout.root, image));
    return this.step("preproc", "tbss_1_preproc", relative, this.layout.root);
  }

  register(templatePath: string): ToolkitStep {
    return this.step("register", "tbss_2_reg", ["-t", templatePath], this.layout.root);
  }

  /** Applies the registration and derives the mean skeleton from the study mean. */
  postRegister(): ToolkitStep {
    return this.step("postreg", "tbss_3_postreg", ["-S"], this.layout.root);
  }

  prestats(threshold: number): ToolkitStep {
    return this.step("prestats", "tbss_4_prestats", [String(threshold)], this.layout.statsDir);
  }

  projectMeasure(measure: Measure): ToolkitStep {
    return this.step(`skeletonise-${measure}`, "tbss_non_FA", [measure], this.layout.root);
  }

  randomise(measure: Measure, permutations: number): ToolkitStep {
    return this.step(
      `randomise-${measure}`,
      "randomise",
      [
        "-i",
        path.basename(skeletonisedPath(this.layout, measure)).replace(/\.nii\.gz$/, ""),
        "-o",
        statsOutputBase(measure),
        "-m",
        "mean_FA_skeleton_mask",
        "-d",
        "design.mat",
        "-t",
        "design.con",
        "-n",
        String(permutations),
        "--T2",
        "--uncorrp",
      ],
      this.layout.statsDir,
    );
  }

  fill(statImage: string, threshold: number): ToolkitStep {
    const base = path.basename(removeImageExtension(statImage));
    return this.step(
      `fill-${base}`,
      "tbss_fill",
      [path.basename(statImage), String(threshold), "mean_FA", `${base}_filled`],
      this.layout.statsDir,
    );
  }

  private step(step: string, tool: string, args: string[], cwd: string): ToolkitStep {
    return {
      step,
      command: this.binDir ? path.join(this.binDir, tool) : tool,
      args,
      cwd,
    };
  }
}
