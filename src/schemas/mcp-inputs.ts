/**
 * Zod schemas for MCP tool inputs.
 *
 * Single source of truth for runtime validation and TypeScript types.
 */

import { z } from "zod";

export const VOICE_LANGUAGES = ["fr", "en", "es", "de", "it"] as const;

/** get_voice_input tool input. */
export const GetVoiceInputSchema = z.object({
  language: z.enum(VOICE_LANGUAGES).default("fr"),
  timeout: z.number().min(10).max(120).default(60),
});

export type GetVoiceInputArgs = z.infer<typeof GetVoiceInputSchema>;
