import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { CallerConfig } from "../src/config/callerConfig.js";
import { CallRun } from "../src/runs/callRun.js";
import { mutect2Caller, type Mutect2Request } from "../src/variation/mutect2.js";
import { RecordingRunner } from "./helpers/recordingRunner.js";

const gatk4 = CallerConfig.parse({ version: 1, programs: { gatk: { version: "4.1.4.0" } } });

let dir: string;
let request: Mutect2Request;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "mutect2-caller-"));
  await fs.writeFile(path.join(dir, "t.bam"), "bam", "utf8");
  await fs.writeFile(path.join(dir, "n.bam"), "bam", "utf8");
  await fs.writeFile(path.join(dir, "ref.fa"), ">chr1\nACGT\n", "utf8");
  request = {
    items: [
      { name: "tumor1", bam: path.join(dir, "t.bam"), phenotype: "tumor" },
      { name: "normal1", bam: path.join(dir, "n.bam"), phenotype: "normal" }
    ],
    refFile: path.join(dir, "ref.fa"),
    region: { kind: "interval", chrom: "chr1", start: 0, end: 1000 },
    outFile: path.join(dir, "calls", "out.vcf.gz")
  };
  await fs.mkdir(path.join(dir, "calls"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("mutect2Caller", () => {
  it("prepares inputs, calls, filters and indexes with gatk4", async () => {
    const runner = new RecordingRunner();
    const run = new CallRun({
      runId: "run_00000000000000000000000000",
      toolName: "mutect2_call",
      paramsHash: "sha256:test",
      configHash: gatk4.configHash
    });

    const result = await mutect2Caller(request, { config: gatk4, runner, run });

    expect(runner.labels()).toEqual([
      "picard CreateSequenceDictionary",
      "samtools index",
      "samtools index",
      "gatk Mutect2",
      "gatk FilterMutectCalls",
      "tabix -f"
    ]);
    expect(result).toMatchObject({
      outFile: path.join(dir, "calls", "out.vcf.gz"),
      indexFile: path.join(dir, "calls", "out.vcf.gz.tbi"),
      skipped: false
    });
    expect(result.steps).toHaveLength(2);
    expect(await fs.readFile(result.outFile, "utf8")).toBe("FilterMutectCalls\n");
    await expect(fs.access(path.join(dir, "calls", "tx"))).rejects.toThrow();
    await expect(fs.access(path.join(dir, "ref.dict"))).resolves.toBeUndefined();

    const kinds = run.events().map((e) => e.kind);
    expect(kinds.filter((k) => k === "mutect2.params")).toHaveLength(1);
    expect(kinds.filter((k) => k === "exec.result")).toHaveLength(6);
  });

  it("runs the caller against the transaction path, not the final output", async () => {
    const runner = new RecordingRunner();
    await mutect2Caller(request, { config: gatk4, runner });

    const filter = runner.calls[4];
    const argv = filter?.kind === "local_process" ? filter.argv : [];
    const out = argv[argv.indexOf("--output") + 1] ?? "";
    expect(path.dirname(path.dirname(out))).toBe(path.join(dir, "calls", "tx"));
    expect(path.basename(out)).toBe("out.vcf.gz");
    expect(argv[argv.indexOf("--variant") + 1]).toBe(path.join(path.dirname(out), "out-raw.vcf.gz"));
  });

  it("skips existing dictionaries and bam indexes", async () => {
    await fs.writeFile(path.join(dir, "ref.dict"), "@HD", "utf8");
    await fs.writeFile(path.join(dir, "t.bam.bai"), "bai", "utf8");
    await fs.writeFile(path.join(dir, "n.bai"), "bai", "utf8");
    const runner = new RecordingRunner();

    await mutect2Caller(request, { config: gatk4, runner });
    expect(runner.labels()).toEqual(["gatk Mutect2", "gatk FilterMutectCalls", "tabix -f"]);
  });

  it("only indexes an existing output", async () => {
    await fs.writeFile(path.join(dir, "calls", "out.vcf.gz"), "existing", "utf8");
    const runner = new RecordingRunner();

    const result = await mutect2Caller(request, { config: gatk4, runner });
    expect(result.skipped).toBe(true);
    expect(result.steps).toEqual([]);
    expect(runner.labels()).toEqual(["tabix -f"]);
    expect(await fs.readFile(result.outFile, "utf8")).toBe("existing");
  });

  it("does nothing for an existing, indexed output", async () => {
    await fs.writeFile(path.join(dir, "calls", "out.vcf.gz"), "existing", "utf8");
    await fs.writeFile(path.join(dir, "calls", "out.vcf.gz.tbi"), "tbi", "utf8");
    const runner = new RecordingRunner();

    const result = await mutect2Caller(request, { config: gatk4, runner });
    expect(result.skipped).toBe(true);
    expect(runner.calls).toHaveLength(0);
  });

  it("leaves no output or transaction directory when the caller fails", async () => {
    const runner = new RecordingRunner((argv) => argv.includes("Mutect2"));

    await expect(mutect2Caller(request, { config: gatk4, runner })).rejects.toMatchObject({ code: "PROCESS_FAILED" });
    await expect(fs.access(path.join(dir, "calls", "out.vcf.gz"))).rejects.toThrow();
    await expect(fs.access(path.join(dir, "calls", "tx"))).rejects.toThrow();
    expect(runner.labels()).not.toContain("gatk FilterMutectCalls");
  });

  it("reports the failing step with its stderr", async () => {
    const runner = new RecordingRunner((argv) => argv.includes("FilterMutectCalls"));

    await expect(mutect2Caller(request, { config: gatk4, runner })).rejects.toThrow(/^FilterMutectCalls failed \(exit 1\): gatk /);
  });

  it("runs nothing without a configured gatk version", async () => {
    const runner = new RecordingRunner();
    const config = CallerConfig.parse({ version: 1 });

    await expect(mutect2Caller(request, { config, runner })).rejects.toMatchObject({ code: "VERSION_UNSUPPORTED" });
    expect(runner.calls).toHaveLength(0);
  });

  it("runs nothing without a tumor sample", async () => {
    const runner = new RecordingRunner();
    const normalsOnly: Mutect2Request = {
      ...request,
      items: request.items.map((i) => ({ ...i, phenotype: "normal" as const })).slice(1)
    };

    await expect(mutect2Caller(normalsOnly, { config: gatk4, runner })).rejects.toThrow(
      "Specified MuTect2 calling but 'tumor' phenotype not present in batch\nfor samples: normal1"
    );
    expect(runner.calls).toHaveLength(0);
  });

  it("streams gatk 3 output through bgzip", async () => {
    const config = CallerConfig.parse({
      version: 1,
      programs: { gatk: { version: "3.8", jar: "/opt/gatk/GenomeAnalysisTK.jar" } }
    });
    const runner = new RecordingRunner();

    const result = await mutect2Caller(request, { config, runner });
    expect(runner.labels()).toEqual([
      "picard CreateSequenceDictionary",
      "samtools index",
      "samtools index",
      "java -Xms750m",
      "tabix -f"
    ]);
    const call = runner.calls[3];
    expect(call?.kind).toBe("pipeline");
    if (call?.kind !== "pipeline") return;
    expect(call.stages[1]?.argv).toEqual(["bgzip", "-c"]);
    expect(call.stages[0]?.argv).toContain("-I:tumor");
    expect(await fs.readFile(result.outFile, "utf8")).toBe("bgzipped\n");
  });
});
