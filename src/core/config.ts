import { z } from "zod";

const JobResourcesSchema = z.object({
  cpus: z.number().int().positive().default(1),
  memory_mb: z.number().int().positive(),
  wall_minutes: z.number().int().positive(),
  single_host: z.boolean().default(true),
});

const SchedulerSchema = z.object({
  backend: z.enum(["lsf", "local"]).default("lsf"),
  // bsub -N: mail the submitter when a job finishes.
  notify: z.boolean().default(true),
  queue: z.string().min(1).optional(),
});

const PipelineSchema = z.object({
  template: z.string().min(1).optional(),
  fa_threshold: z.number().min(0).max(9999999).default(0.2),
  permutations: z.number().int().min(1).max(9999999).default(5000),
  fill_threshold: z.number().min(0).max(1).default(0.95),
  gating: z.enum(["coarse", "fine"]).default("coarse"),
  design_header_lines: z.number().int().min(0).default(3),
  max_parallel_copies: z.number().int().positive().optional(),
  stats_job: JobResourcesSchema.default({ memory_mb: 15000, wall_minutes: 30000 }),
});

const ToolkitSchema = z.object({
  bin_dir: z.string().min(1).optional(),
});

const DesignsSchema = z.object({
  designs_dir: z.string().min(1).optional(),
  data_dir: z.string().min(1).optional(),
  out_dir: z.string().min(1).optional(),
  subject_path_template: z
    .string()
    .min(1)
    .default("{subject}/dwi_run-01/Tensor/{subject}_ses-001_run-01_FA.nii.gz"),
  include_file: z.string().min(1).default("grp.design.include.txt"),
  matrix_file: z.string().min(1).default("grp.design.mat"),
  contrast_file: z.string().min(1).default("grp.design.con"),
  pipeline_command: z.string().min(1).default("tractline"),
  job: JobResourcesSchema.default({ memory_mb: 35000, wall_minutes: 15000 }),
});

export const ProjectConfigSchema = z
  .object({
    scheduler: SchedulerSchema.default({}),
    pipeline: PipelineSchema.default({}),
    toolkit: ToolkitSchema.default({}),
    designs: DesignsSchema.default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type JobResourcesConfig = z.infer<typeof JobResourcesSchema>;
export type GatingMode = ProjectConfig["pipeline"]["gating"];
export type SchedulerBackend = ProjectConfig["scheduler"]["backend"];

export function defaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}
