import { zMutect2Input, zMutect2PlanOutput } from "../../mcp/toolSchemas.js";
import { planMutect2Call, type Mutect2Request } from "../../variation/mutect2.js";
import { regionToGatk } from "../../variation/regions.js";
import type { ToolDefinition } from "../types.js";
import { prepareMutect2Request, type Mutect2Args } from "./mutect2Request.js";

export const mutect2PlanTool: ToolDefinition<Mutect2Args, Mutect2Request> = {
  toolName: "mutect2_plan",
  contractVersion: "v1",
  description:
    "Show the MuTect2 command lines (call, filter, compress) for a tumor/normal batch without running them. May write the region subset BED beside the output.",
  inputSchema: zMutect2Input,
  outputSchema: zMutect2PlanOutput,

  async canonicalize(args) {
    return prepareMutect2Request(args);
  },

  async run({ callRun, prepared, ctx }) {
    const plan = await planMutect2Call(prepared.request, ctx.config);
    callRun.event("mutect2.plan", `gatk=${plan.gatkType} steps=${plan.steps.length}`, null);

    return {
      summary: "planned",
      result: {
        out_file: plan.outFile,
        gatk_version: plan.gatkVersion,
        gatk_type: plan.gatkType,
        ploidy: plan.ploidy,
        call_region: plan.callRegion ? regionToGatk(plan.callRegion) : null,
        steps: plan.steps.map((s) => ({
          name: s.name,
          stages: s.spec.kind === "pipeline" ? s.spec.stages.map((st) => st.argv) : [s.spec.argv],
          stdout_path: s.spec.kind === "pipeline" ? (s.spec.stdoutPath ?? null) : null
        }))
      }
    };
  }
};
