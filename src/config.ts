/**
 * Runtime configuration, read from VOICEBRIDGE_* environment variables.
 *
 * Parsed once through a Zod schema so every consumer gets typed, defaulted
 * values. A malformed variable fails startup with the variable's name.
 */

import { z } from "zod";

const port = z.coerce.number().int().min(1).max(65535);
const millis = z.coerce.number().int().min(0);

const EnvSchema = z.object({
  VOICEBRIDGE_HOST: z.string().min(1).default("127.0.0.1"),
  VOICEBRIDGE_PORT: port.default(8765),
  VOICEBRIDGE_DATA_DIR: z.string().min(1).default("/tmp/voicebridge"),

  VOICEBRIDGE_STT_BACKEND: z.enum(["wyoming", "whisper-server", "auto"]).default("auto"),
  VOICEBRIDGE_WHISPER_HOST: z.string().min(1).default("127.0.0.1"),
  VOICEBRIDGE_WHISPER_PORT: port.default(10300),
  VOICEBRIDGE_WHISPER_SERVER_URL: z.string().url().default("http://127.0.0.1:8178"),
  VOICEBRIDGE_PIPER_HOST: z.string().min(1).default("127.0.0.1"),
  VOICEBRIDGE_PIPER_PORT: port.default(10200),
  VOICEBRIDGE_TTS_VOICE: z.string().min(1).optional(),
  VOICEBRIDGE_LANGUAGE: z.string().min(2).default("fr"),

  VOICEBRIDGE_AGENT_COMMAND: z.string().min(1).default("claude"),
  VOICEBRIDGE_AGENT_ARGS: z.string().default("chat"),
  VOICEBRIDGE_COMPLETION: z.enum(["prompt", "quiescence", "sentinel"]).default("prompt"),
  VOICEBRIDGE_PROMPT_MARKER: z.string().min(1).default(">"),
  VOICEBRIDGE_QUIESCENCE_MS: millis.default(1500),
  VOICEBRIDGE_TURN_TIMEOUT_MS: millis.default(120_000),
  VOICEBRIDGE_KILL_GRACE_MS: millis.default(5000),
  VOICEBRIDGE_MAX_SESSIONS: z.coerce.number().int().min(1).default(10),
  VOICEBRIDGE_SESSION_IDLE_MS: millis.default(30 * 60_000),

  VOICEBRIDGE_CLAIM_TIMEOUT_MS: millis.default(30_000),
  VOICEBRIDGE_REQUEST_TIMEOUT_MS: millis.default(60_000),
  VOICEBRIDGE_RETENTION_MS: millis.default(60_000),
  VOICEBRIDGE_REAP_INTERVAL_MS: z.coerce.number().int().min(10).default(1000),

  VOICEBRIDGE_SERVER_URL: z.string().url().default("http://127.0.0.1:8765"),
});

export type CompletionMode = "prompt" | "quiescence" | "sentinel";
export type SttBackendPreference = "wyoming" | "whisper-server" | "auto";

export interface Config {
  host: string;
  port: number;
  dataDir: string;
  stt: {
    backend: SttBackendPreference;
    wyomingHost: string;
    wyomingPort: number;
    whisperServerUrl: string;
    defaultLanguage: string;
  };
  tts: {
    host: string;
    port: number;
    voice?: string;
  };
  agent: {
    command: string;
    args: string[];
    completion: CompletionMode;
    promptMarker: string;
    quiescenceMs: number;
    turnTimeoutMs: number;
    killGraceMs: number;
  };
  sessions: {
    maxSessions: number;
    idleMs: number;
  };
  broker: {
    claimTimeoutMs: number;
    requestTimeoutMs: number;
    retentionMs: number;
    reapIntervalMs: number;
  };
  serverUrl: string;
}

/**
 * Build a Config from an environment map. Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith("VOICEBRIDGE_") && typeof value === "string" && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;

  return {
    host: e.VOICEBRIDGE_HOST,
    port: e.VOICEBRIDGE_PORT,
    dataDir: e.VOICEBRIDGE_DATA_DIR,
    stt: {
      backend: e.VOICEBRIDGE_STT_BACKEND,
      wyomingHost: e.VOICEBRIDGE_WHISPER_HOST,
      wyomingPort: e.VOICEBRIDGE_WHISPER_PORT,
      whisperServerUrl: e.VOICEBRIDGE_WHISPER_SERVER_URL,
      defaultLanguage: e.VOICEBRIDGE_LANGUAGE,
    },
    tts: {
      host: e.VOICEBRIDGE_PIPER_HOST,
      port: e.VOICEBRIDGE_PIPER_PORT,
      voice: e.VOICEBRIDGE_TTS_VOICE,
    },
    agent: {
      command: e.VOICEBRIDGE_AGENT_COMMAND,
      args: e.VOICEBRIDGE_AGENT_ARGS.split(/\s+/).filter((a) => a.length > 0),
      completion: e.VOICEBRIDGE_COMPLETION,
      promptMarker: e.VOICEBRIDGE_PROMPT_MARKER,
      quiescenceMs: e.VOICEBRIDGE_QUIESCENCE_MS,
      turnTimeoutMs: e.VOICEBRIDGE_TURN_TIMEOUT_MS,
      killGraceMs: e.VOICEBRIDGE_KILL_GRACE_MS,
    },
    sessions: {
      maxSessions: e.VOICEBRIDGE_MAX_SESSIONS,
      idleMs: e.VOICEBRIDGE_SESSION_IDLE_MS,
    },
    broker: {
      claimTimeoutMs: e.VOICEBRIDGE_CLAIM_TIMEOUT_MS,
      requestTimeoutMs: e.VOICEBRIDGE_REQUEST_TIMEOUT_MS,
      retentionMs: e.VOICEBRIDGE_RETENTION_MS,
      reapIntervalMs: e.VOICEBRIDGE_REAP_INTERVAL_MS,
    },
    serverUrl: e.VOICEBRIDGE_SERVER_URL,
  };
}
