/**
 * MCP tool handler functions.
 *
 * Each handler validates input via Zod schemas and returns an MCP tool
 * result. Handlers never throw: every failure is a text result with
 * isError set.
 */

import { errorMessage } from "./errors";
import { GetVoiceInputSchema } from "./schemas/mcp-inputs";
import type { VoiceInputOptions, VoiceInputOutcome } from "./voice-client";

// --- MCP result helper ---

export type McpResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

function textResult(text: string, isError = false): McpResult {
  return {
    content: [{ type: "text" as const, text }],
    ...(isError && { isError }),
  };
}

export interface VoiceInputSource {
  getVoiceInput(options: VoiceInputOptions): Promise<VoiceInputOutcome>;
}

export const TIMEOUT_MESSAGE =
  "Voice input timed out. User did not provide input within the timeout period.";

export async function handleGetVoiceInput(args: unknown, source: VoiceInputSource): Promise<McpResult> {
  const parsed = GetVoiceInputSchema.safeParse(args ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`).join("; ");
    return textResult(`Invalid arguments: ${problems}`, true);
  }

  try {
    const outcome = await source.getVoiceInput({
      language: parsed.data.language,
      timeoutSeconds: parsed.data.timeout,
    });
    switch (outcome.status) {
      case "completed":
        console.error(`[mcp] Voice input received (${outcome.transcript.length} chars)`);
        return textResult(`Voice input received: "${outcome.transcript}"`);
      case "failed":
        return textResult(`Voice input failed: ${outcome.error}`, true);
      case "timed_out":
        return textResult(TIMEOUT_MESSAGE);
    }
  } catch (err) {
    console.error(`[mcp] get_voice_input failed: ${errorMessage(err)}`);
    return textResult(`Error getting voice input: ${errorMessage(err)}`, true);
  }
}

/** Route a CallTool request to its handler. */
export async function dispatchTool(name: string, args: unknown, source: VoiceInputSource): Promise<McpResult> {
  switch (name) {
    case "get_voice_input":
      return handleGetVoiceInput(args, source);
    default:
      return textResult(`Unknown tool: ${name}`, true);
  }
}
