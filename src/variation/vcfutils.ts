import { promises as fs } from "fs";
import type { Programs } from "../config/callerConfig.js";
import { fileExists, isNewerThan } from "../core/paths.js";
import type { ExecutionResources, RunnerBackend } from "../execution/backends/types.js";
import { runChecked } from "../execution/runChecked.js";
import { fileTransaction } from "../execution/transaction.js";
import type { CallRun } from "../runs/callRun.js";

export interface IndexedVcf {
  vcf: string;
  index: string;
}

/** Ensures `file` is bgzip-compressed and has an up-to-date tabix index. */
export async function bgzipAndIndex(
  file: string,
  deps: { programs: Programs; runner: RunnerBackend; resources: ExecutionResources; run?: CallRun }
): Promise<IndexedVcf> {
  const { programs, runner, resources, run } = deps;
  let vcf = file;

  if (!file.endsWith(".gz")) {
    vcf = `${file}.gz`;
    // Recompress when the uncompressed file is newer than an earlier .gz.
    const stale = !(await fileExists(vcf)) || ((await fileExists(file)) && !(await isNewerThan(vcf, file)));
    if (stale) {
      await fileTransaction(vcf, async (tx) => {
        await runChecked(
          runner,
          { kind: "pipeline", stages: [{ kind: "local_process", argv: [programs.bgzip, "-c", file] }], stdoutPath: tx.txPath },
          resources,
          "bgzip",
          run
        );
      });
      await fs.rm(file, { force: true });
    }
  }

  const index = `${vcf}.tbi`;
  if (!(await fileExists(index)) || !(await isNewerThan(index, vcf))) {
    await runChecked(runner, { kind: "local_process", argv: [programs.tabix, "-f", "-p", "vcf", vcf] }, resources, "tabix", run);
  }
  return { vcf, index };
}
