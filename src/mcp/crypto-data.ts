import { pathToFileURL } from "node:url";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createDefaultInvoker } from "../capabilities.js";
import { loadTradingConfig } from "../config.js";
import { createLogger } from "../logger.js";
import { LOG_FILE } from "../paths.js";
import type { ToolInvoker, ToolResult } from "../tools.js";

export function toolResultContent(result: ToolResult) {
  if (result.ok) {
    return { content: [{ type: "text" as const, text: result.text }] };
  }
  return {
    content: [{ type: "text" as const, text: `${result.failure}: ${result.message}` }],
    isError: true,
  };
}

/** Every registered capability as an MCP tool with the same name and arguments */
export function createCryptoDataServer(invoker: ToolInvoker): McpServer {
  const server = new McpServer(
    { name: "crypto-data", version: "0.1.0" },
    { capabilities: { tools: {} } },
  );

  for (const cap of invoker.capabilities) {
    server.tool(cap.name, cap.description, cap.args, async (args) =>
      toolResultContent(await invoker.invoke(cap.name, args)),
    );
  }
  return server;
}

// ── Start ────────────────────────────────────────────────────

async function main() {
  const config = await loadTradingConfig();
  const logger = createLogger({ scope: "mcp", file: LOG_FILE });
  const invoker = createDefaultInvoker({ timeoutMs: config.tool_timeout_ms, logger });
  invoker.validate();

  const server = createCryptoDataServer(invoker);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err) => {
    console.error("crypto-data MCP server error:", err);
    process.exit(1);
  });
}
