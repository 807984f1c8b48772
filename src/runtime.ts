/**
 * Builds the long-lived components from a Config. Shared by the HTTP
 * coordinator and the one-shot CLI.
 */

import { spawnAgentProcess } from "./agent-process";
import { VoiceRequestBroker } from "./broker";
import { createCompletionPolicy } from "./completion";
import type { Config } from "./config";
import { ProcessBridge } from "./process-bridge";
import type { RouterDeps } from "./routes";
import { SessionStore } from "./session-store";
import { createTranscriber } from "./stt";
import { createSynthesizer } from "./tts";

export function buildDeps(config: Config): RouterDeps {
  const policy = createCompletionPolicy(config.agent.completion, {
    marker: config.agent.promptMarker,
    quiescenceMs: config.agent.quiescenceMs,
  });

  const sessions = new SessionStore({
    createBridge: (sessionId) =>
      new ProcessBridge({
        spawn: () => spawnAgentProcess(config.agent.command, config.agent.args),
        policy,
        killGraceMs: config.agent.killGraceMs,
        label: sessionId,
      }),
    dataDir: config.dataDir,
    maxSessions: config.sessions.maxSessions,
    idleMs: config.sessions.idleMs,
    turnTimeoutMs: config.agent.turnTimeoutMs,
  });

  const broker = new VoiceRequestBroker({
    claimTimeoutMs: config.broker.claimTimeoutMs,
    retentionMs: config.broker.retentionMs,
  });

  return {
    sessions,
    broker,
    stt: createTranscriber(config.stt),
    tts: createSynthesizer(config),
    defaultLanguage: config.stt.defaultLanguage,
    requestTimeoutMs: config.broker.requestTimeoutMs,
    describe: {
      stt:
        config.stt.backend === "whisper-server"
          ? config.stt.whisperServerUrl
          : `${config.stt.backend}:${config.stt.wyomingHost}:${config.stt.wyomingPort}`,
      tts: `piper:${config.tts.host}:${config.tts.port}`,
    },
  };
}
