import path from "path";
import type * as z from "zod/v4";
import type { JsonObject, JsonValue } from "../../core/json.js";
import type { zBatchItemInput, zMutect2Input } from "../../mcp/toolSchemas.js";
import { defaultOutFile, type Mutect2Request } from "../../variation/mutect2.js";
import { parseRegion } from "../../variation/regions.js";
import type { BatchItem } from "../../variation/samples.js";
import type { PreparedToolRun } from "../types.js";

export type Mutect2Args = z.output<typeof zMutect2Input>;
type BatchItemArgs = z.output<typeof zBatchItemInput>;

function toBatchItem(a: BatchItemArgs): BatchItem {
  const item: BatchItem = { name: a.name, bam: path.resolve(a.bam) };
  if (a.phenotype !== undefined) item.phenotype = a.phenotype;
  if (a.ploidy !== undefined) item.ploidy = a.ploidy;
  if (a.sex !== undefined) item.sex = a.sex;
  if (a.variant_regions !== undefined) item.variantRegions = path.resolve(a.variant_regions);
  if (a.callable_regions !== undefined) item.callableRegions = path.resolve(a.callable_regions);
  if (a.coverage_interval !== undefined) item.coverageInterval = a.coverage_interval;
  if (a.aligner !== undefined) item.aligner = a.aligner;
  if (a.mark_duplicates !== undefined) item.markDuplicates = a.mark_duplicates;
  if (a.normal_panel !== undefined) item.normalPanel = path.resolve(a.normal_panel);
  return item;
}

function ploidyJson(p: BatchItemArgs["ploidy"]): JsonValue {
  if (p === undefined) return null;
  if (typeof p === "number") return p;
  return {
    default: p.default ?? null,
    male: p.male ?? null,
    female: p.female ?? null,
    mitochondrial: p.mitochondrial ?? null
  };
}

/** Resolves paths and the default output so that equivalent requests share a run id. */
export function prepareMutect2Request(args: Mutect2Args): PreparedToolRun<Mutect2Request> {
  const items = args.items.map(toBatchItem);
  const region = args.region !== undefined ? parseRegion(args.region) : null;
  const request: Mutect2Request = {
    items,
    refFile: path.resolve(args.ref_file),
    region: region && region.kind === "bed" ? { kind: "bed", path: path.resolve(region.path) } : region,
    outFile: path.resolve(args.out_file ?? defaultOutFile(items))
  };
  if (args.assoc_files) {
    request.assocFiles = {};
    if (args.assoc_files.dbsnp) request.assocFiles.dbsnp = path.resolve(args.assoc_files.dbsnp);
    if (args.assoc_files.cosmic) request.assocFiles.cosmic = path.resolve(args.assoc_files.cosmic);
  }

  const canonicalParams: JsonObject = {
    items: args.items.map((i, idx) => ({
      name: i.name,
      bam: items[idx]?.bam ?? i.bam,
      phenotype: i.phenotype ?? null,
      ploidy: ploidyJson(i.ploidy),
      sex: i.sex ?? null,
      variant_regions: items[idx]?.variantRegions ?? null,
      callable_regions: items[idx]?.callableRegions ?? null,
      coverage_interval: i.coverage_interval ?? null,
      aligner: i.aligner ?? null,
      mark_duplicates: i.mark_duplicates ?? null,
      normal_panel: items[idx]?.normalPanel ?? null
    })),
    ref_file: request.refFile,
    region: args.region ?? null,
    out_file: request.outFile ?? null,
    assoc_files: request.assocFiles ? { dbsnp: request.assocFiles.dbsnp ?? null, cosmic: request.assocFiles.cosmic ?? null } : null
  };

  return { canonicalParams, request };
}
