#!/usr/bin/env node
/**
 * voicebridge MCP server: exposes get_voice_input over stdio.
 *
 * The tool files a voice request with the HTTP coordinator
 * (VOICEBRIDGE_SERVER_URL) and waits for a recording surface to answer it.
 * Stdout carries JSON-RPC; all logging goes to stderr.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from "./config";
import { dispatchTool } from "./handlers";
import { getToolDefinitions } from "./mcp-tools";
import { VoiceClient } from "./voice-client";

const config = loadConfig();
const client = new VoiceClient(config.serverUrl);

const server = new Server(
  {
    name: "voicebridge",
    version: "0.1.0",
  },
  {
    capabilities: { tools: {} },
    instructions:
      "Voice input for agents. 1 tool:\n" +
      "- get_voice_input(language?, timeout?): BLOCKING. Asks the user to speak and returns the transcription.\n" +
      "A timeout result means nobody answered; an empty transcript means the user said nothing audible.",
  },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: getToolDefinitions(),
}));

server.setRequestHandler(CallToolRequestSchema, async (request) =>
  dispatchTool(request.params.name, request.params.arguments, client),
);

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[mcp] MCP server running (voice server: ${config.serverUrl})`);
}

main().catch((err) => {
  console.error("[mcp] Fatal:", err);
  process.exit(1);
});
