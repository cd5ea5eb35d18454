import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ErrorCode, McpError, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { canonicalObject } from "../core/canonicalJson.js";
import { CallerError } from "../core/errors.js";
import { CallRun } from "../runs/callRun.js";
import { deriveRunId } from "../runs/runIdentity.js";
import type { AnyToolDefinition, ToolContext } from "./types.js";

const TOOL_NAME_RE = /^[a-z][a-z0-9_]{0,127}$/;
const CONTRACT_VERSION_RE = /^v\d+$/;

function definitionProblem(tool: AnyToolDefinition, seen: ReadonlySet<string>): string | null {
  if (typeof tool.toolName !== "string" || tool.toolName.length === 0) return "toolpack: missing toolName";
  if (!TOOL_NAME_RE.test(tool.toolName)) return `toolpack: invalid toolName: ${tool.toolName}`;
  if (seen.has(tool.toolName)) return `toolpack: duplicate toolName: ${tool.toolName}`;
  if (!CONTRACT_VERSION_RE.test(tool.contractVersion)) {
    return `toolpack:${tool.toolName}: invalid contractVersion: ${tool.contractVersion}`;
  }
  if (tool.description.trim().length === 0) return `toolpack:${tool.toolName}: description must be non-empty`;
  return null;
}

export function validateToolDefinitions(tools: AnyToolDefinition[]): void {
  const seen = new Set<string>();
  for (const tool of tools) {
    const problem = definitionProblem(tool, seen);
    if (problem) throw new Error(problem);
    seen.add(tool.toolName);
  }
}

/** Request problems become InvalidParams, environment problems InvalidRequest; process failures stay plain errors. */
export function toMcpError(e: unknown): Error {
  if (e instanceof McpError) return e;
  if (e instanceof CallerError) {
    switch (e.code) {
      case "TUMOR_MISSING":
      case "BATCH_INVALID":
      case "REGION_INVALID":
        return new McpError(ErrorCode.InvalidParams, e.message);
      case "VERSION_UNSUPPORTED":
      case "CONFIG_INVALID":
        return new McpError(ErrorCode.InvalidRequest, e.message);
      case "PROCESS_FAILED":
        return e;
    }
  }
  return e instanceof Error ? e : new Error(String(e));
}

async function callTool(tool: AnyToolDefinition, ctx: ToolContext, args: unknown): Promise<CallToolResult> {
  const prepared = await tool.canonicalize(args, ctx);
  prepared.canonicalParams = canonicalObject(prepared.canonicalParams);

  const { runId, paramsHash } = deriveRunId({
    toolName: tool.toolName,
    contractVersion: tool.contractVersion,
    configHash: ctx.config.configHash,
    canonicalParams: prepared.canonicalParams
  });
  const callRun = new CallRun({ runId, toolName: tool.toolName, paramsHash, configHash: ctx.config.configHash });
  callRun.start();

  const res = await tool.run({ runId, callRun, prepared, ctx });
  return {
    content: [{ type: "text", text: `${tool.toolName} ${res.summary} (run ${runId})` }],
    structuredContent: { provenance_run_id: runId, ...res.result }
  };
}

export function registerToolDefinitions(mcp: McpServer, ctx: ToolContext, tools: AnyToolDefinition[]): void {
  // Nothing is registered when any definition is invalid.
  validateToolDefinitions(tools);

  for (const tool of tools) {
    mcp.registerTool(
      tool.toolName,
      { description: tool.description, inputSchema: tool.inputSchema, outputSchema: tool.outputSchema },
      async (args) => {
        try {
          return await callTool(tool, ctx, args);
        } catch (e) {
          throw toMcpError(e);
        }
      }
    );
  }
}
