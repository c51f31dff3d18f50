import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";

import type { RegisteredTool } from "./mcp/registry.js";
import type { ToolRuntime } from "./runtime.js";
import { isPlainRecord } from "./utils/object.js";

export const SERVER_NAME = "toolgate";
export const SERVER_VERSION = "0.1.0";

export interface ToolServerInfo {
  name: string;
  version: string;
}

/** Serialises a JSON payload for the textual MCP channel. */
function asJsonText(payload: unknown): string {
  return JSON.stringify(payload ?? null, null, 2);
}

function describeForCatalogue(tool: RegisteredTool): Tool {
  return {
    name: tool.name,
    ...(tool.description.length > 0 ? { description: tool.description } : {}),
    inputSchema: tool.inputSchema,
    annotations: { readOnlyHint: !tool.mutating },
  };
}

/**
 * Exposes the runtime over MCP. The catalogue publishes the derived input
 * schemas and every call goes through the dispatcher, so the SDK never
 * validates arguments on its own. Cancelled calls reject and are left to the
 * SDK, which drops the response.
 */
export function createToolServer(
  runtime: ToolRuntime,
  info: ToolServerInfo = { name: SERVER_NAME, version: SERVER_VERSION },
): McpServer {
  const server = new McpServer(info, { capabilities: { tools: { listChanged: false } } });

  server.server.setRequestHandler(ListToolsRequestSchema, () => ({
    tools: runtime.registry
      .list()
      .filter((tool) => tool.visibility === "public")
      .map((tool) => describeForCatalogue(tool)),
  }));

  server.server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<CallToolResult> => {
    const invocation = await runtime.dispatcher.invoke({
      name: request.params.name,
      arguments: request.params.arguments ?? {},
      signal: extra.signal,
    });
    if (!invocation.ok) {
      return { isError: true, content: [{ type: "text", text: asJsonText(invocation.error) }] };
    }
    const { result } = invocation;
    return {
      content: [{ type: "text", text: asJsonText(result) }],
      ...(isPlainRecord(result) ? { structuredContent: result } : {}),
    };
  });

  return server;
}
