import path from "path";
import type { CallerConfig } from "../config/callerConfig.js";
import { assocFilesFromResources, loadGenomeResources, type AssocFiles } from "../config/genomeResources.js";
import { CallerError } from "../core/errors.js";
import { fileExists, splitextPlus } from "../core/paths.js";
import type { ExecutionResources, ExecutionSpec, RunnerBackend } from "../execution/backends/types.js";
import { describeSpec, runChecked } from "../execution/runChecked.js";
import { fileTransaction } from "../execution/transaction.js";
import { GatkRunner } from "../gatk/runner.js";
import { assertMinimumVersion, compareLooseVersion, MUTECT2_MIN_GATK_VERSION, type GatkType } from "../gatk/version.js";
import type { CallRun } from "../runs/callRun.js";
import { getGatkAnnotations } from "./annotation.js";
import { getPloidy } from "./ploidy.js";
import { prepInputs } from "./prepInputs.js";
import { populationVariantRegions, regionToGatk, subsetVariantRegions, type Region } from "./regions.js";
import { getPairedBams, sampleNames, type BatchItem, type PairedSamples } from "./samples.js";
import { bgzipAndIndex } from "./vcfutils.js";

export interface Mutect2Request {
  items: BatchItem[];
  refFile: string;
  assocFiles?: AssocFiles;
  region?: Region | null;
  outFile?: string;
}

export interface PlannedStep {
  name: string;
  spec: ExecutionSpec;
}

export interface Mutect2Plan {
  outFile: string;
  gatkVersion: string;
  gatkType: GatkType;
  ploidy: number;
  callRegion: Region | null;
  params: string[];
  steps: PlannedStep[];
}

export interface Mutect2Result {
  outFile: string;
  indexFile: string;
  skipped: boolean;
  steps: string[];
}

export function defaultOutFile(items: BatchItem[]): string {
  const first = items[0];
  if (!first) throw new CallerError("BATCH_INVALID", "mutect2 requires at least one sample");
  return `${splitextPlus(first.bam)[0]}-variants.vcf.gz`;
}

function tumorMissing(items: BatchItem[]): CallerError {
  return new CallerError(
    "TUMOR_MISSING",
    "Specified MuTect2 calling but 'tumor' phenotype not present in batch\n" +
      `for samples: ${sampleNames(items).join(", ")}`,
    { samples: sampleNames(items) }
  );
}

export function tumorParams(paired: PairedSamples | null, items: BatchItem[], type: GatkType): string[] {
  if (!paired) throw tumorMissing(items);

  const params: string[] = [];
  if (type === "gatk4") {
    params.push("-I", paired.tumorBam, "--tumor-sample", paired.tumorName);
  } else {
    params.push("-I:tumor", paired.tumorBam);
  }
  if (paired.normalBam !== null) {
    if (type === "gatk4") {
      params.push("-I", paired.normalBam);
      if (paired.normalName !== null) params.push("--normal-sample", paired.normalName);
    } else {
      params.push("-I:normal", paired.normalBam);
    }
  }
  if (paired.normalPanel !== null) {
    params.push(type === "gatk4" ? "--panel-of-normals" : "--normal_panel", paired.normalPanel);
  }
  return params;
}

/** Duplicate read filtering is switched off for amplicon data and for aligned reads without duplicate marking. */
export function standardClParams(items: BatchItem[], type: GatkType, version: string): string[] {
  const skipDuplicates = items.some(
    (d) => d.coverageInterval === "amplicon" || (Boolean(d.aligner) && d.markDuplicates === false)
  );
  if (!skipDuplicates) return [];
  if (type === "gatk4") return ["--disable-read-filter", "NotDuplicateReadFilter"];
  if (compareLooseVersion(version, "3.5") >= 0) return ["-drf", "DuplicateRead"];
  return [];
}

export async function regionParams(input: {
  region: Region | null;
  outFile: string;
  items: BatchItem[];
  paired: PairedSamples | null;
  type: GatkType;
  version: string;
}): Promise<{ params: string[]; callRegion: Region | null }> {
  const variantRegions = await populationVariantRegions(input.items, input.paired);
  const callRegion = await subsetVariantRegions(variantRegions, input.region, input.outFile);

  const params: string[] = [];
  if (callRegion) {
    const rule = input.type === "gatk4" ? "--interval-set-rule" : "--interval_set_rule";
    params.push("-L", regionToGatk(callRegion), rule, "INTERSECTION");
  }
  params.push(...standardClParams(input.items, input.type, input.version));
  return { params, callRegion };
}

export function assocParams(assocFiles: AssocFiles | undefined): string[] {
  const params: string[] = [];
  if (assocFiles?.dbsnp) params.push("--dbsnp", assocFiles.dbsnp);
  if (assocFiles?.cosmic) params.push("--cosmic", assocFiles.cosmic);
  return params;
}

async function resolveAssocFiles(request: Mutect2Request, config: CallerConfig): Promise<AssocFiles | undefined> {
  if (request.assocFiles) return request.assocFiles;
  const resourcesPath = config.genomeResourcesPath();
  if (!resourcesPath) return undefined;
  return assocFilesFromResources(await loadGenomeResources(resourcesPath));
}

export async function buildMutect2Params(input: {
  request: Mutect2Request;
  outFile: string;
  paired: PairedSamples | null;
  gatk: GatkRunner;
  config: CallerConfig;
}): Promise<{ params: string[]; ploidy: number; callRegion: Region | null }> {
  const { request, outFile, paired, gatk, config } = input;
  const type = gatk.gatkType();
  const region = request.region ?? null;
  const overrides = config.annotationOverrides();

  const params = [
    "-T",
    type === "gatk4" ? "Mutect2" : "MuTect2",
    "-R",
    request.refFile,
    "--annotation",
    "ClippingRankSumTest",
    "--annotation",
    "DepthPerSampleHC"
  ];
  for (const a of getGatkAnnotations(type, { includeBaseQRankSum: false, ...overrides })) {
    params.push("--annotation", a);
  }
  // GATK 4 rejects some aligner CIGARs under strict validation.
  if (type === "gatk4") {
    params.push("--read-validation-stringency", "LENIENT");
  }
  params.push(...tumorParams(paired, request.items, type));

  const regions = await regionParams({
    region,
    outFile,
    items: request.items,
    paired,
    type,
    version: gatk.gatkVersion()
  });
  params.push(...regions.params);

  // dbSNP/COSMIC are opt-in: mutect2.use_assoc_files.
  if (config.useAssocFiles()) {
    params.push(...assocParams(await resolveAssocFiles(request, config)));
  }

  const ploidy = getPloidy(request.items, region);
  params.push("-ploidy", String(ploidy));
  params.push(...config.resourcesFor("mutect2").options);

  return { params, ploidy, callRegion: regions.callRegion };
}

/** GATK 4 calls to a raw VCF and filters in a second pass; GATK 3 streams straight into bgzip. */
export function mutect2Steps(gatk: GatkRunner, params: string[], txOutFile: string, bgzip: string): PlannedStep[] {
  const tmpDir = path.dirname(txOutFile);
  const callCmd = gatk.clGatk(params, tmpDir);

  if (gatk.gatkType() === "gatk4") {
    const [base, ext] = splitextPlus(txOutFile);
    const txRawFile = `${base}-raw${ext}`;
    const filterCmd = gatk.clGatk(["-T", "FilterMutectCalls", "--variant", txRawFile, "--output", txOutFile], tmpDir);
    return [
      { name: "Mutect2", spec: { ...callCmd, argv: [...callCmd.argv, "-O", txRawFile] } },
      { name: "FilterMutectCalls", spec: filterCmd }
    ];
  }

  return [
    {
      name: "MuTect2",
      spec: {
        kind: "pipeline",
        stages: [callCmd, { kind: "local_process", argv: [bgzip, "-c"] }],
        stdoutPath: txOutFile
      }
    }
  ];
}

function pairOrFail(items: BatchItem[]): PairedSamples {
  const paired = getPairedBams(items);
  if (!paired) throw tumorMissing(items);
  return paired;
}

/**
 * Everything `mutect2Caller` would run, without running it. Commands target
 * the final output path; at run time they target the transaction path.
 */
export async function planMutect2Call(request: Mutect2Request, config: CallerConfig): Promise<Mutect2Plan> {
  const outFile = path.resolve(request.outFile ?? defaultOutFile(request.items));
  const gatkVersion = assertMinimumVersion(config.gatkVersion(), MUTECT2_MIN_GATK_VERSION, "mutect2");
  const paired = pairOrFail(request.items);

  const gatk = new GatkRunner(config);
  gatk.newResources("mutect2");
  const built = await buildMutect2Params({ request, outFile, paired, gatk, config });

  return {
    outFile,
    gatkVersion,
    gatkType: gatk.gatkType(),
    ploidy: built.ploidy,
    callRegion: built.callRegion,
    params: built.params,
    steps: mutect2Steps(gatk, built.params, outFile, config.programs.bgzip)
  };
}

/**
 * Calls somatic variants for a tumor (and optional normal) into a bgzipped,
 * tabix-indexed VCF. An existing output is only re-indexed.
 */
export async function mutect2Caller(
  request: Mutect2Request,
  deps: { config: CallerConfig; runner: RunnerBackend; run?: CallRun }
): Promise<Mutect2Result> {
  const { config, runner, run } = deps;
  const outFile = path.resolve(request.outFile ?? defaultOutFile(request.items));
  const resources: ExecutionResources = { runtimeSeconds: config.maxRuntimeSeconds() };
  const indexDeps = { programs: config.programs, runner, resources, run };

  if (await fileExists(outFile)) {
    run?.event("mutect2.skip", `output exists: ${outFile}`, null);
    const indexed = await bgzipAndIndex(outFile, indexDeps);
    return { outFile: indexed.vcf, indexFile: indexed.index, skipped: true, steps: [] };
  }

  assertMinimumVersion(config.gatkVersion(), MUTECT2_MIN_GATK_VERSION, "mutect2");
  const paired = pairOrFail(request.items);
  const gatk = new GatkRunner(config);

  await prepInputs(
    request.items.map((i) => i.bam),
    request.refFile,
    { gatk, programs: config.programs, runner, resources, run }
  );

  const executed: string[] = [];
  await fileTransaction(outFile, async (tx) => {
    gatk.newResources("mutect2");
    const built = await buildMutect2Params({ request, outFile, paired, gatk, config });
    run?.event("mutect2.params", `gatk=${gatk.gatkType()} ploidy=${built.ploidy}`, { params: built.params });

    for (const step of mutect2Steps(gatk, built.params, tx.txPath, config.programs.bgzip)) {
      await runChecked(runner, step.spec, resources, step.name, run);
      executed.push(describeSpec(step.spec));
    }
  });

  const indexed = await bgzipAndIndex(outFile, indexDeps);
  return { outFile: indexed.vcf, indexFile: indexed.index, skipped: false, steps: executed };
}
