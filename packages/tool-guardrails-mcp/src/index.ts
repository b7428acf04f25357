#!/usr/bin/env tsx
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { SERVER_NAME, SERVER_VERSION, createGuardrailsServer } from "./server.js";

/**
 * Tool Guardrails MCP server.
 *
 * IMPORTANT: This is an STDIO MCP server.
 * Never write to stdout except MCP JSON-RPC. Use console.error for logs.
 */

async function main(): Promise<void> {
  const server = createGuardrailsServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[${SERVER_NAME}] MCP server running on stdio (v${SERVER_VERSION})`);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
