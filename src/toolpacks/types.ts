import type { ZodType } from "zod/v4";
import type { CallerConfig } from "../config/callerConfig.js";
import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { RunnerBackend } from "../execution/backends/types.js";
import type { CallRun } from "../runs/callRun.js";

export interface ToolContext {
  config: CallerConfig;
  runner: RunnerBackend;
}

export interface ToolExecutionResult {
  summary: string;
  result: JsonObject;
}

export interface PreparedToolRun<TRequest> {
  // Hashed into the run id together with the tool, contract and config hash.
  canonicalParams: JsonObject;
  request: TRequest;
}

export interface ToolDefinition<TArgs, TRequest> {
  toolName: string;
  contractVersion: string;
  description: string;
  inputSchema: ZodType<TArgs>;
  outputSchema: ZodType<unknown>;
  canonicalize(args: TArgs, ctx: ToolContext): Promise<PreparedToolRun<TRequest>>;
  run(args: {
    runId: RunId;
    callRun: CallRun;
    prepared: PreparedToolRun<TRequest>;
    ctx: ToolContext;
  }): Promise<ToolExecutionResult>;
}

export type AnyToolDefinition = ToolDefinition<unknown, unknown>;
