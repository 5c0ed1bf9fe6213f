import type { ProjectConfig } from "../core/config.js";
import type { CommandRunner } from "../exec/command.js";

import type { JobSubmitter } from "./job-submitter.js";
import { LocalJobSubmitter } from "./local.js";
import { LsfJobSubmitter } from "./lsf.js";

export function createJobSubmitter(
  scheduler: ProjectConfig["scheduler"],
  runner?: CommandRunner,
): JobSubmitter {
  if (scheduler.backend === "local") {
    return new LocalJobSubmitter({ runner });
  }
  return new LsfJobSubmitter({ runner, notify: scheduler.notify, queue: scheduler.queue });
}
