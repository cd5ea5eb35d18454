import { CallerError } from "../core/errors.js";
import type { BatchItem } from "./samples.js";
import type { Region } from "./regions.js";

const DEFAULT_PLOIDY = 2;

type PloidyKey = "default" | "male" | "female" | "mitochondrial";
type ChromClass = "mitochondrial" | "X" | "Y" | "autosome";

export function chromosomeSpecialCase(chrom: string | null): ChromClass {
  if (chrom === null) return "autosome";
  if (["MT", "M", "chrM", "chrMT"].includes(chrom)) return "mitochondrial";
  if (chrom === "X" || chrom === "chrX") return "X";
  if (chrom === "Y" || chrom === "chrY") return "Y";
  return "autosome";
}

function configuredPloidy(items: BatchItem[]): Partial<Record<PloidyKey, number>> {
  const seen = new Map<PloidyKey, Set<number>>();
  const add = (k: PloidyKey, v: number | undefined): void => {
    if (v === undefined) return;
    const set = seen.get(k) ?? new Set<number>();
    set.add(v);
    seen.set(k, set);
  };

  for (const item of items) {
    const p = item.ploidy ?? DEFAULT_PLOIDY;
    if (typeof p === "number") {
      add("default", p);
    } else {
      add("default", p.default ?? DEFAULT_PLOIDY);
      add("male", p.male);
      add("female", p.female);
      add("mitochondrial", p.mitochondrial);
    }
  }

  const out: Partial<Record<PloidyKey, number>> = {};
  for (const [k, vs] of seen) {
    if (vs.size !== 1) {
      throw new CallerError("BATCH_INVALID", `multiple ploidies set for group calling: ${k} ${[...vs].join(", ")}`);
    }
    out[k] = [...vs][0];
  }
  return out;
}

/**
 * Ploidy for calling `region` across the batch: haploid mitochondria and Y,
 * X by sample sex, the configured default elsewhere.
 */
export function getPloidy(items: BatchItem[], region: Region | null): number {
  const chrom = region && region.kind === "interval" ? region.chrom : null;
  const ploidy = configuredPloidy(items);
  const base = ploidy.default ?? DEFAULT_PLOIDY;
  const sexes = new Set(items.map((i) => i.sex ?? "unknown"));

  switch (chromosomeSpecialCase(chrom)) {
    case "mitochondrial":
      return ploidy.mitochondrial ?? 1;
    case "X":
      if (sexes.has("female") || sexes.has("f")) return ploidy.female ?? base;
      if (sexes.has("male") || sexes.has("m")) return ploidy.male ?? 1;
      return ploidy.female ?? base;
    case "Y":
      return 1;
    case "autosome":
      return base;
  }
}
