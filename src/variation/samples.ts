import { CallerError } from "../core/errors.js";

export type Phenotype = "tumor" | "normal";
export type Sex = "male" | "female" | "m" | "f" | "unknown";

export type PloidySetting =
  | number
  | {
      default?: number;
      male?: number;
      female?: number;
      mitochondrial?: number;
    };

/** One sample of a calling batch, with the per-sample settings the caller reads. */
export interface BatchItem {
  name: string;
  bam: string;
  phenotype?: Phenotype;
  ploidy?: PloidySetting;
  sex?: Sex;
  variantRegions?: string;
  callableRegions?: string;
  coverageInterval?: "genome" | "regional" | "amplicon";
  aligner?: string | null;
  markDuplicates?: boolean;
  normalPanel?: string;
}

export interface PairedSamples {
  tumorBam: string;
  tumorName: string;
  normalBam: string | null;
  normalName: string | null;
  normalPanel: string | null;
  tumor: BatchItem;
  normal: BatchItem | null;
}

export function sampleNames(items: BatchItem[]): string[] {
  return items.map((i) => i.name);
}

export function getPairedBams(items: BatchItem[]): PairedSamples | null {
  const tumors = items.filter((i) => i.phenotype === "tumor");
  const normals = items.filter((i) => i.phenotype === "normal");

  if (tumors.length > 1) {
    throw new CallerError("BATCH_INVALID", `expected one tumor sample per batch, got ${tumors.length}: ${sampleNames(tumors).join(", ")}`);
  }
  if (normals.length > 1) {
    throw new CallerError("BATCH_INVALID", `expected at most one normal sample per batch, got ${normals.length}: ${sampleNames(normals).join(", ")}`);
  }

  const tumor = tumors[0];
  if (!tumor) return null;
  const normal = normals[0] ?? null;

  return {
    tumorBam: tumor.bam,
    tumorName: tumor.name,
    normalBam: normal?.bam ?? null,
    normalName: normal?.name ?? null,
    normalPanel: tumor.normalPanel ?? null,
    tumor,
    normal
  };
}
