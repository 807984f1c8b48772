/**
 * MCP tool definitions for the ListTools response.
 */

import { VOICE_LANGUAGES } from "./schemas/mcp-inputs";

export function getToolDefinitions() {
  return [
    {
      name: "get_voice_input",
      description:
        "Ask the user for spoken input. BLOCKING: waits until a recording surface " +
        "(phone, browser, desktop client) picks up the request, records the user " +
        "and returns the transcription, or until the timeout elapses.",
      inputSchema: {
        type: "object" as const,
        properties: {
          language: {
            type: "string",
            description: "Language of the expected speech",
            enum: [...VOICE_LANGUAGES],
            default: "fr",
          },
          timeout: {
            type: "number",
            description: "Seconds to wait for the user (10-120)",
            minimum: 10,
            maximum: 120,
            default: 60,
          },
        },
      },
    },
  ];
}
