import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallerConfig } from "../config/callerConfig.js";
import { LocalProcessRunner } from "../execution/backends/localProcess.js";
import type { RunnerBackend } from "../execution/backends/types.js";
import { builtinToolDefinitions } from "../toolpacks/builtin/index.js";
import { registerToolDefinitions } from "../toolpacks/register.js";
import type { AnyToolDefinition } from "../toolpacks/types.js";

export interface GatewayDeps {
  config: CallerConfig;
  runner?: RunnerBackend;
  tools?: AnyToolDefinition[];
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const mcp = new McpServer({
    name: "somatic-caller-gateway",
    version: "0.1.0"
  });

  registerToolDefinitions(
    mcp,
    { config: deps.config, runner: deps.runner ?? new LocalProcessRunner() },
    deps.tools ?? builtinToolDefinitions
  );
  return mcp;
}
