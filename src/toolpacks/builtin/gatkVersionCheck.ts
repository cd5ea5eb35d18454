import type * as z from "zod/v4";
import { CallerError } from "../../core/errors.js";
import { zGatkVersionCheckInput, zGatkVersionCheckOutput } from "../../mcp/toolSchemas.js";
import { assertMinimumVersion, gatkMajorVersion, gatkType, MUTECT2_MIN_GATK_VERSION } from "../../gatk/version.js";
import type { ToolDefinition } from "../types.js";

type Args = z.output<typeof zGatkVersionCheckInput>;

export const gatkVersionCheckTool: ToolDefinition<Args, null> = {
  toolName: "gatk_version_check",
  contractVersion: "v1",
  description: "Report the configured GATK version and whether it can run MuTect2.",
  inputSchema: zGatkVersionCheckInput,
  outputSchema: zGatkVersionCheckOutput,

  async canonicalize() {
    return { canonicalParams: {}, request: null };
  },

  async run({ ctx }) {
    const version = ctx.config.gatkVersion();
    let reason: string | null = null;
    try {
      assertMinimumVersion(version, MUTECT2_MIN_GATK_VERSION, "mutect2");
    } catch (e) {
      if (!(e instanceof CallerError)) throw e;
      reason = e.message;
    }

    return {
      summary: reason ? "unsupported" : "ok",
      result: {
        gatk_version: version,
        gatk_type: version ? gatkType(version) : null,
        major_version: version ? gatkMajorVersion(version) : null,
        minimum_version: MUTECT2_MIN_GATK_VERSION,
        meets_mutect2_minimum: reason === null,
        reason
      }
    };
  }
};
