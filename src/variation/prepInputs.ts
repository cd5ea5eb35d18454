import type { Programs } from "../config/callerConfig.js";
import { fileExists, splitextPlus } from "../core/paths.js";
import type { ExecutionResources, RunnerBackend } from "../execution/backends/types.js";
import { runChecked } from "../execution/runChecked.js";
import type { GatkRunner } from "../gatk/runner.js";
import type { CallRun } from "../runs/callRun.js";

async function hasBamIndex(bam: string): Promise<boolean> {
  return (await fileExists(`${bam}.bai`)) || (await fileExists(`${splitextPlus(bam)[0]}.bai`));
}

/** Sequence dictionary for the reference and a .bai for every input BAM. */
export async function prepInputs(
  alignBams: string[],
  refFile: string,
  deps: { gatk: GatkRunner; programs: Programs; runner: RunnerBackend; resources: ExecutionResources; run?: CallRun }
): Promise<void> {
  const dict = await deps.gatk.picardIndexRef(refFile);
  if (dict) {
    await runChecked(deps.runner, dict, deps.resources, "picard CreateSequenceDictionary", deps.run);
  }

  for (const bam of alignBams) {
    if (await hasBamIndex(bam)) continue;
    await runChecked(
      deps.runner,
      { kind: "local_process", argv: [deps.programs.samtools, "index", bam] },
      deps.resources,
      "samtools index",
      deps.run
    );
  }
}
