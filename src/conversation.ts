/**
 * Conversational data flow: recorded audio → transcript → one agent turn →
 * reply (→ synthesized speech).
 */

import { wavToSttAudio } from "./audio-utils";
import { BridgeError } from "./errors";
import type { SessionStore } from "./session-store";
import type { Transcriber } from "./stt";
import type { Synthesizer } from "./tts";

export interface ConversationTurn {
  sessionId: string;
  transcript: string;
  reply: string;
  respawned: boolean;
  discardedOutput: string | null;
}

export interface SpokenTurn extends ConversationTurn {
  audio: Uint8Array;
}

export interface ConversationDeps {
  sessions: SessionStore;
  stt: Transcriber;
  tts: Synthesizer;
  defaultLanguage: string;
}

/** Transcribe an uploaded WAV. */
export async function transcribeWav(deps: ConversationDeps, wav: Uint8Array, language?: string): Promise<string> {
  const audio = wavToSttAudio(wav);
  const result = await deps.stt.transcribe(audio, language ?? deps.defaultLanguage);
  return result.text;
}

/**
 * Run one voice turn without synthesis.
 *
 * @throws BridgeError invalid_input when no speech was detected
 */
export async function textTurn(
  deps: ConversationDeps,
  wav: Uint8Array,
  sessionId?: string,
): Promise<ConversationTurn> {
  const transcript = await transcribeWav(deps, wav);
  if (transcript === "") {
    throw new BridgeError("invalid_input", "No speech detected");
  }
  console.error(`[voicebridge] Transcript: ${transcript}`);

  const handle = await deps.sessions.getOrCreate(sessionId);
  const turn = await deps.sessions.sendTurn(handle.sessionId, transcript);
  if (turn.status === "not_found") {
    throw new BridgeError("not_found", `Session ${handle.sessionId} was cleared during the turn`);
  }

  return {
    sessionId: handle.sessionId,
    transcript,
    reply: turn.reply,
    respawned: handle.respawned || turn.respawned,
    discardedOutput: turn.discardedOutput,
  };
}

/** Run one voice turn and synthesize the reply. */
export async function voiceTurn(
  deps: ConversationDeps,
  wav: Uint8Array,
  sessionId?: string,
): Promise<SpokenTurn> {
  const turn = await textTurn(deps, wav, sessionId);
  if (turn.reply === "") {
    throw new BridgeError("upstream_failure", `Agent for session ${turn.sessionId} sent an empty reply`);
  }
  const audio = await deps.tts.synthesize(turn.reply);
  return { ...turn, audio };
}
