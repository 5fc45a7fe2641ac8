#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CommandDispatcher, resolveRuntimeConfig } from "@supabase-mcp/cli";
import { createRelayServer } from "./relay.js";

async function main() {
  const runtime = resolveRuntimeConfig({});
  if (!runtime.accessTokenPresent) {
    process.stderr.write("[supabase-mcp-relay] SUPABASE_ACCESS_TOKEN not set; authenticated tools will fail\n");
  }

  const server = createRelayServer(
    new CommandDispatcher({
      executable: runtime.executable,
      serverName: runtime.serverName,
      timeoutMs: runtime.timeoutMs
    })
  );
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : "Unknown MCP relay error";
  process.stderr.write(`[supabase-mcp-relay] ${message}\n`);
  process.exit(1);
});
