import { zMutect2CallOutput, zMutect2Input } from "../../mcp/toolSchemas.js";
import { mutect2Caller, type Mutect2Request } from "../../variation/mutect2.js";
import type { ToolDefinition } from "../types.js";
import { prepareMutect2Request, type Mutect2Args } from "./mutect2Request.js";

export const mutect2CallTool: ToolDefinition<Mutect2Args, Mutect2Request> = {
  toolName: "mutect2_call",
  contractVersion: "v1",
  description:
    "Call somatic variants with GATK MuTect2 on a tumor (and optional normal) BAM into a bgzipped, tabix-indexed VCF. Existing outputs are re-indexed, not recalled.",
  inputSchema: zMutect2Input,
  outputSchema: zMutect2CallOutput,

  async canonicalize(args) {
    return prepareMutect2Request(args);
  },

  async run({ callRun, prepared, ctx }) {
    const result = await mutect2Caller(prepared.request, { config: ctx.config, runner: ctx.runner, run: callRun });
    callRun.event("run.succeeded", result.skipped ? "existing output" : "called", { out_file: result.outFile });

    const logFile = `${result.outFile}.log.jsonl`;
    await callRun.writeLog(logFile);

    return {
      summary: result.skipped ? "skipped (output exists)" : "complete",
      result: {
        out_file: result.outFile,
        index_file: result.indexFile,
        skipped: result.skipped,
        steps: result.steps,
        log_file: logFile,
        events: callRun.events().map((e) => ({ ts: e.ts, kind: e.kind, message: e.message, data: e.data }))
      }
    };
  }
};
