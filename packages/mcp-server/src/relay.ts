import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  EXIT_SENTINELS,
  JsonObjectSchema,
  OPERATION_CATALOG,
  OPERATION_DESCRIPTIONS,
  type DispatchResult
} from "@supabase-mcp/shared-types";
import type { CommandDispatcher } from "@supabase-mcp/cli";

export function asToolOutput(result: DispatchResult) {
  if (!result.ok) {
    const { kind, message, code } = result.error;
    return {
      isError: true,
      content: [
        {
          type: "text" as const,
          text: JSON.stringify({ kind, message, code }, null, 2)
        }
      ]
    };
  }

  return {
    content: [
      {
        type: "text" as const,
        text: JSON.stringify(result.data, null, 2)
      }
    ]
  };
}

export async function relayCall(
  dispatcher: CommandDispatcher,
  operation: string,
  args: Record<string, unknown> | undefined
) {
  const input = JsonObjectSchema.safeParse(args ?? {});
  if (!input.success) {
    return asToolOutput({
      ok: false,
      error: {
        kind: "InvocationError",
        message: "Arguments must be an object of JSON-serializable values",
        code: EXIT_SENTINELS.invalidRequest
      }
    });
  }
  return asToolOutput(await dispatcher.invoke(operation, input.data));
}

export function createRelayServer(dispatcher: CommandDispatcher, version = "0.1.0") {
  const server = new McpServer({
    name: "supabase-mcp-relay",
    version
  });

  for (const operation of OPERATION_CATALOG) {
    server.tool(
      operation,
      OPERATION_DESCRIPTIONS[operation],
      {
        arguments: z.record(z.unknown()).optional()
      },
      async ({ arguments: args }) => relayCall(dispatcher, operation, args)
    );
  }

  return server;
}
