import * as z from "zod/v4";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zRunId = z.string().regex(new RegExp(`^run_${ulid26}$`), "invalid run_id");
export const zGatkType = z.enum(["gatk4", "restricted", "lite"]);

const zPloidyCount = z.number().int().min(1).max(64);

export const zBatchItemInput = z.object({
  name: z.string().min(1).max(256),
  bam: z.string().min(1),
  phenotype: z.enum(["tumor", "normal"]).optional(),
  ploidy: z
    .union([
      zPloidyCount,
      z.object({
        default: zPloidyCount.optional(),
        male: zPloidyCount.optional(),
        female: zPloidyCount.optional(),
        mitochondrial: zPloidyCount.optional()
      })
    ])
    .optional(),
  sex: z.enum(["male", "female", "m", "f", "unknown"]).optional(),
  variant_regions: z.string().min(1).optional(),
  callable_regions: z.string().min(1).optional(),
  coverage_interval: z.enum(["genome", "regional", "amplicon"]).optional(),
  aligner: z.string().min(1).nullable().optional(),
  mark_duplicates: z.boolean().optional(),
  normal_panel: z.string().min(1).optional()
});

export const zMutect2Input = z.object({
  items: z.array(zBatchItemInput).min(1).max(64),
  ref_file: z.string().min(1),
  region: z.string().min(1).optional(),
  out_file: z.string().min(1).optional(),
  assoc_files: z
    .object({
      dbsnp: z.string().min(1).optional(),
      cosmic: z.string().min(1).optional()
    })
    .optional()
});

export const zProvenance = z.object({
  provenance_run_id: zRunId
});

export const zPlannedStep = z.object({
  name: z.string(),
  // One argv per pipeline stage.
  stages: z.array(z.array(z.string())),
  stdout_path: z.string().nullable()
});

export const zMutect2PlanOutput = zProvenance.extend({
  out_file: z.string(),
  gatk_version: z.string(),
  gatk_type: zGatkType,
  ploidy: z.number().int(),
  call_region: z.string().nullable(),
  steps: z.array(zPlannedStep)
});

export const zRunEvent = z.object({
  ts: z.string(),
  kind: z.string(),
  message: z.string(),
  data: z.record(z.string(), z.unknown()).nullable()
});

export const zMutect2CallOutput = zProvenance.extend({
  out_file: z.string(),
  index_file: z.string(),
  skipped: z.boolean(),
  steps: z.array(z.string()),
  log_file: z.string(),
  events: z.array(zRunEvent)
});

export const zGatkVersionCheckInput = z.object({});

export const zGatkVersionCheckOutput = zProvenance.extend({
  gatk_version: z.string().nullable(),
  gatk_type: zGatkType.nullable(),
  major_version: z.string().nullable(),
  minimum_version: z.string(),
  meets_mutect2_minimum: z.boolean(),
  reason: z.string().nullable()
});
