import { describe, it, expect } from "vitest";
import path from "path";
import { CallerConfig } from "../src/config/callerConfig.js";
import { CallerError, isCallerError } from "../src/core/errors.js";
import { getGatkAnnotations } from "../src/variation/annotation.js";
import {
  assocParams,
  planMutect2Call,
  regionParams,
  standardClParams,
  tumorParams
} from "../src/variation/mutect2.js";
import type { Region } from "../src/variation/regions.js";
import { getPairedBams, type BatchItem } from "../src/variation/samples.js";

const tumor: BatchItem = { name: "tumor1", bam: "/data/t.bam", phenotype: "tumor" };
const normal: BatchItem = { name: "normal1", bam: "/data/n.bam", phenotype: "normal" };
const chr1Region: Region = { kind: "interval", chrom: "chr1", start: 99, end: 200 };

const GATK4_ANNOTATIONS = [
  "MappingQualityRankSumTest",
  "MappingQualityZero",
  "QualByDepth",
  "ReadPosRankSumTest",
  "RMSMappingQuality",
  "FisherStrand",
  "MappingQuality",
  "DepthPerAlleleBySample",
  "Coverage"
];

function gatk4Config(extra: Record<string, unknown> = {}): CallerConfig {
  return CallerConfig.parse({ version: 1, programs: { gatk: { version: "4.1.4.0" } }, ...extra });
}

function gatk3Config(): CallerConfig {
  return CallerConfig.parse({
    version: 1,
    programs: { gatk: { version: "3.8-1-0-gf15c1c3ef", jar: "/opt/gatk/GenomeAnalysisTK.jar" } }
  });
}

function count(params: string[], value: string): number {
  return params.filter((p) => p === value).length;
}

describe("tumorParams", () => {
  it("uses -I with sample names for gatk4", () => {
    const items = [tumor, normal];
    expect(tumorParams(getPairedBams(items), items, "gatk4")).toEqual([
      "-I",
      "/data/t.bam",
      "--tumor-sample",
      "tumor1",
      "-I",
      "/data/n.bam",
      "--normal-sample",
      "normal1"
    ]);
  });

  it("uses tagged inputs for gatk 3 and never --tumor-sample", () => {
    const items = [tumor, normal];
    const params = tumorParams(getPairedBams(items), items, "restricted");
    expect(params).toEqual(["-I:tumor", "/data/t.bam", "-I:normal", "/data/n.bam"]);
    expect(params).not.toContain("--tumor-sample");
  });

  it("adds no normal flags for tumor-only batches", () => {
    const params = tumorParams(getPairedBams([tumor]), [tumor], "gatk4");
    expect(params).toEqual(["-I", "/data/t.bam", "--tumor-sample", "tumor1"]);
    expect(tumorParams(getPairedBams([tumor]), [tumor], "restricted")).toEqual(["-I:tumor", "/data/t.bam"]);
  });

  it("passes the panel of normals with version-specific spelling", () => {
    const withPon: BatchItem = { ...tumor, normalPanel: "/data/pon.vcf.gz" };
    expect(tumorParams(getPairedBams([withPon]), [withPon], "gatk4").slice(-2)).toEqual([
      "--panel-of-normals",
      "/data/pon.vcf.gz"
    ]);
    expect(tumorParams(getPairedBams([withPon]), [withPon], "restricted").slice(-2)).toEqual([
      "--normal_panel",
      "/data/pon.vcf.gz"
    ]);
  });

  it("fails with the batch's sample names when no tumor is present", () => {
    const items = [normal, { name: "normal2", bam: "/data/n2.bam" }];
    let caught: unknown = null;
    try {
      tumorParams(getPairedBams(items), items, "gatk4");
    } catch (e) {
      caught = e;
    }
    expect(isCallerError(caught, "TUMOR_MISSING")).toBe(true);
    expect(caught instanceof CallerError ? caught.message : "").toContain("for samples: normal1, normal2");
  });

  it("rejects batches with two tumors", () => {
    const items = [tumor, { ...tumor, name: "tumor2" }];
    expect(() => getPairedBams(items)).toThrow(/expected one tumor sample per batch, got 2/);
  });
});

describe("regionParams", () => {
  it("adds the region once with the gatk4 interval rule", async () => {
    const items = [tumor, normal];
    const { params } = await regionParams({
      region: chr1Region,
      outFile: "/work/out.vcf.gz",
      items,
      paired: getPairedBams(items),
      type: "gatk4",
      version: "4.1.4.0"
    });
    expect(params).toEqual(["-L", "chr1:100-200", "--interval-set-rule", "INTERSECTION"]);
  });

  it("uses the legacy spelling for gatk 3", async () => {
    const items = [tumor, normal];
    const { params } = await regionParams({
      region: chr1Region,
      outFile: "/work/out.vcf.gz",
      items,
      paired: getPairedBams(items),
      type: "restricted",
      version: "3.8"
    });
    expect(params).toEqual(["-L", "chr1:100-200", "--interval_set_rule", "INTERSECTION"]);
  });

  it("adds nothing without a region or variant regions", async () => {
    const { params, callRegion } = await regionParams({
      region: null,
      outFile: "/work/out.vcf.gz",
      items: [tumor],
      paired: getPairedBams([tumor]),
      type: "gatk4",
      version: "4.1.4.0"
    });
    expect(params).toEqual([]);
    expect(callRegion).toBeNull();
  });
});

describe("standardClParams", () => {
  it("disables duplicate filtering for amplicon data", () => {
    const amplicon: BatchItem = { ...tumor, coverageInterval: "amplicon" };
    expect(standardClParams([amplicon], "gatk4", "4.1.4.0")).toEqual(["--disable-read-filter", "NotDuplicateReadFilter"]);
    expect(standardClParams([amplicon], "restricted", "3.8")).toEqual(["-drf", "DuplicateRead"]);
  });

  it("disables duplicate filtering when aligned without marking duplicates", () => {
    const unmarked: BatchItem = { ...tumor, aligner: "bwa", markDuplicates: false };
    expect(standardClParams([unmarked], "gatk4", "4.1.4.0")).toEqual(["--disable-read-filter", "NotDuplicateReadFilter"]);
  });

  it("keeps duplicate filtering otherwise", () => {
    expect(standardClParams([tumor, { ...normal, aligner: "bwa", markDuplicates: true }], "gatk4", "4.1.4.0")).toEqual([]);
  });
});

describe("assocParams", () => {
  it("adds dbsnp and cosmic when present", () => {
    expect(assocParams({ dbsnp: "/v/dbsnp.vcf.gz", cosmic: "/v/cosmic.vcf.gz" })).toEqual([
      "--dbsnp",
      "/v/dbsnp.vcf.gz",
      "--cosmic",
      "/v/cosmic.vcf.gz"
    ]);
    expect(assocParams({})).toEqual([]);
    expect(assocParams(undefined)).toEqual([]);
  });
});

describe("getGatkAnnotations", () => {
  it("differs between gatk 4 and gatk 3", () => {
    expect(getGatkAnnotations("gatk4", { includeBaseQRankSum: false })).toEqual(GATK4_ANNOTATIONS);
    expect(getGatkAnnotations("restricted", { includeBaseQRankSum: false })).toEqual([
      "MappingQualityRankSumTest",
      "MappingQualityZero",
      "QualByDepth",
      "ReadPosRankSumTest",
      "RMSMappingQuality",
      "FisherStrand",
      "GCContent",
      "HaplotypeScore",
      "HomopolymerRun",
      "DepthPerAlleleBySample",
      "Coverage"
    ]);
  });

  it("applies configured extras and exclusions", () => {
    const anns = getGatkAnnotations("gatk4", {
      includeBaseQRankSum: true,
      includeDepth: false,
      extra: ["StrandOddsRatio"],
      exclude: ["MappingQualityZero"]
    });
    expect(anns).toEqual([
      "MappingQualityRankSumTest",
      "QualByDepth",
      "ReadPosRankSumTest",
      "RMSMappingQuality",
      "BaseQualityRankSumTest",
      "FisherStrand",
      "MappingQuality",
      "StrandOddsRatio"
    ]);
  });
});

describe("planMutect2Call", () => {
  const request = {
    items: [tumor, normal],
    refFile: "/ref/hg38.fa",
    region: chr1Region,
    outFile: "/work/calls/out.vcf.gz"
  };

  it("plans a gatk4 call followed by FilterMutectCalls", async () => {
    const plan = await planMutect2Call(request, gatk4Config());
    const annotationArgs = GATK4_ANNOTATIONS.flatMap((a) => ["--annotation", a]);

    expect(plan.gatkType).toBe("gatk4");
    expect(plan.ploidy).toBe(2);
    expect(plan.params).toEqual([
      "-T",
      "Mutect2",
      "-R",
      "/ref/hg38.fa",
      "--annotation",
      "ClippingRankSumTest",
      "--annotation",
      "DepthPerSampleHC",
      ...annotationArgs,
      "--read-validation-stringency",
      "LENIENT",
      "-I",
      "/data/t.bam",
      "--tumor-sample",
      "tumor1",
      "-I",
      "/data/n.bam",
      "--normal-sample",
      "normal1",
      "-L",
      "chr1:100-200",
      "--interval-set-rule",
      "INTERSECTION",
      "-ploidy",
      "2"
    ]);

    expect(plan.steps.map((s) => s.name)).toEqual(["Mutect2", "FilterMutectCalls"]);
    const [call, filter] = plan.steps;
    const jvm = "-Xms750m -Xmx3500m -Djava.io.tmpdir=/work/calls";
    expect(call?.spec).toEqual({
      kind: "local_process",
      argv: ["gatk", "--java-options", jvm, "Mutect2", ...plan.params.slice(2), "-O", "/work/calls/out-raw.vcf.gz"]
    });
    expect(filter?.spec).toEqual({
      kind: "local_process",
      argv: [
        "gatk",
        "--java-options",
        jvm,
        "FilterMutectCalls",
        "--variant",
        "/work/calls/out-raw.vcf.gz",
        "--output",
        "/work/calls/out.vcf.gz"
      ]
    });
    expect(count(plan.params, "-L")).toBe(1);
  });

  it("plans a gatk 3 call piped through bgzip", async () => {
    const plan = await planMutect2Call(request, gatk3Config());
    expect(plan.gatkType).toBe("restricted");
    expect(plan.params.slice(0, 2)).toEqual(["-T", "MuTect2"]);
    expect(plan.params).toContain("-I:tumor");
    expect(plan.params).not.toContain("--tumor-sample");
    expect(plan.params).not.toContain("--read-validation-stringency");
    expect(count(plan.params, "--interval_set_rule")).toBe(1);

    expect(plan.steps).toHaveLength(1);
    const step = plan.steps[0];
    expect(step?.spec.kind).toBe("pipeline");
    if (step?.spec.kind !== "pipeline") return;
    expect(step.spec.stdoutPath).toBe("/work/calls/out.vcf.gz");
    expect(step.spec.stages[0]?.argv.slice(0, 6)).toEqual([
      "java",
      "-Xms750m",
      "-Xmx3500m",
      "-Djava.io.tmpdir=/work/calls",
      "-jar",
      "/opt/gatk/GenomeAnalysisTK.jar"
    ]);
    expect(step.spec.stages[1]?.argv).toEqual(["bgzip", "-c"]);
  });

  it("appends configured mutect2 options after the ploidy", async () => {
    const config = gatk4Config({
      resources: { mutect2: { jvm_opts: ["-Xmx8g"], options: ["--max-reads-per-alignment-start", 0] } }
    });
    const plan = await planMutect2Call(request, config);
    expect(plan.params.slice(-4)).toEqual(["-ploidy", "2", "--max-reads-per-alignment-start", "0"]);
    const call = plan.steps[0]?.spec;
    expect(call?.kind === "local_process" ? call.argv.slice(0, 3) : []).toEqual([
      "gatk",
      "--java-options",
      "-Xmx8g -Djava.io.tmpdir=/work/calls"
    ]);
  });

  it("uses haploid calling on chrY", async () => {
    const plan = await planMutect2Call({ ...request, region: { kind: "interval", chrom: "chrY", start: 0, end: null } }, gatk4Config());
    expect(plan.ploidy).toBe(1);
    expect(plan.params).toContain("chrY");
  });

  it("adds association files from the genome resources only when enabled", async () => {
    const off = await planMutect2Call(request, CallerConfig.parse({
      version: 1,
      programs: { gatk: { version: "4.1.4.0" } },
      genome: { resources_path: "genomes/hg38-noalt-resources.yaml" }
    }, path.resolve("config")));
    expect(off.params).not.toContain("--dbsnp");

    const on = await planMutect2Call(request, CallerConfig.parse({
      version: 1,
      programs: { gatk: { version: "4.1.4.0" } },
      mutect2: { use_assoc_files: true },
      genome: { resources_path: "genomes/hg38-noalt-resources.yaml" }
    }, path.resolve("config")));
    const i = on.params.indexOf("--dbsnp");
    expect(on.params.slice(i, i + 4)).toEqual([
      "--dbsnp",
      path.resolve("config/variation/dbsnp-150.vcf.gz"),
      "--cosmic",
      path.resolve("config/variation/cosmic.vcf.gz")
    ]);
  });

  it("prefers association files given with the request", async () => {
    const config = gatk4Config({ mutect2: { use_assoc_files: true } });
    const plan = await planMutect2Call({ ...request, assocFiles: { cosmic: "/v/cosmic.vcf.gz" } }, config);
    const i = plan.params.indexOf("--cosmic");
    expect(plan.params.slice(i, i + 2)).toEqual(["--cosmic", "/v/cosmic.vcf.gz"]);
    expect(plan.params).not.toContain("--dbsnp");
  });

  it("refuses to plan without a configured gatk version", async () => {
    const config = CallerConfig.parse({ version: 1 });
    await expect(planMutect2Call(request, config)).rejects.toMatchObject({ code: "VERSION_UNSUPPORTED" });
  });

  it("refuses gatk older than 3.5", async () => {
    const config = CallerConfig.parse({ version: 1, programs: { gatk: { version: "3.4-46-gbc02625", jar: "/opt/gatk.jar" } } });
    await expect(planMutect2Call(request, config)).rejects.toThrow(/require full version of GATK 3\.5\+/);
  });
});
