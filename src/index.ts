#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallerConfig } from "./config/callerConfig.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";

async function main(): Promise<void> {
  const configPath = process.env.CALLER_CONFIG_PATH ?? "config/caller.yaml";
  const config = await CallerConfig.loadFromFile(configPath);

  const server = createGatewayServer({ config });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`somatic-caller gateway ready (gatk ${config.gatkVersion() ?? "unconfigured"}, config ${config.configHash})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
