import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createWavBuffer } from "../audio-utils";
import { PromptMarkerPolicy } from "../completion";
import { textTurn, transcribeWav, voiceTurn, type ConversationDeps } from "../conversation";
import { BridgeError } from "../errors";
import { ProcessBridge } from "../process-bridge";
import { SessionStore } from "../session-store";
import { FakeSynthesizer, FakeTranscriber } from "./helpers/fake-speech";
import { echoResponder, fakeSpawner, type FakeAgent } from "./helpers/fake-agent";

const wav = createWavBuffer(new Uint8Array(3200));

let deps: ConversationDeps;
let stt: FakeTranscriber;
let tts: FakeSynthesizer;
let agents: FakeAgent[];

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
  const spawner = fakeSpawner(echoResponder);
  agents = spawner.agents;
  stt = new FakeTranscriber();
  tts = new FakeSynthesizer();
  deps = {
    sessions: new SessionStore({
      createBridge: (id) =>
        new ProcessBridge({ spawn: spawner.spawn, policy: new PromptMarkerPolicy(">"), killGraceMs: 20, label: id }),
      dataDir: null,
      maxSessions: 3,
      idleMs: 60_000,
      turnTimeoutMs: 1000,
    }),
    stt,
    tts,
    defaultLanguage: "fr",
  };
});

afterEach(async () => {
  await deps.sessions.shutdown();
  vi.restoreAllMocks();
});

describe("transcribeWav", () => {
  it("uses the default language unless one is given", async () => {
    stt.next = "salut";
    expect(await transcribeWav(deps, wav)).toBe("salut");
    await transcribeWav(deps, wav, "en");
    expect(stt.calls).toEqual([
      { language: "fr", bytes: 3200 },
      { language: "en", bytes: 3200 },
    ]);
  });
});

describe("textTurn", () => {
  it("sends the transcript to a new session and returns the reply", async () => {
    stt.next = "bonjour";
    const turn = await textTurn(deps, wav);
    expect(turn.sessionId).toMatch(/^[0-9a-f]{8}$/);
    expect(turn).toMatchObject({
      transcript: "bonjour",
      reply: "You said: bonjour",
      respawned: false,
      discardedOutput: null,
    });
    expect(agents[0].received).toEqual(["bonjour"]);
  });

  it("continues a named session", async () => {
    stt.next = "one";
    await textTurn(deps, wav, "desk");
    stt.next = "two";
    const turn = await textTurn(deps, wav, "desk");
    expect(turn.reply).toBe("You said: two");
    expect(agents).toHaveLength(1);
    expect(deps.sessions.history("desk")?.map((h) => h.content)).toEqual([
      "one",
      "You said: one",
      "two",
      "You said: two",
    ]);
  });

  it("reports a respawn when the session's process had died", async () => {
    stt.next = "first";
    await textTurn(deps, wav, "desk");
    agents[0].crash();
    await agents[0].exited;

    stt.next = "second";
    const turn = await textTurn(deps, wav, "desk");
    expect(turn.respawned).toBe(true);
    expect(turn.reply).toBe("You said: second");
    expect(agents).toHaveLength(2);
  });

  it("refuses an empty transcript without touching sessions", async () => {
    stt.next = "";
    await expect(textTurn(deps, wav)).rejects.toMatchObject({ kind: "invalid_input", message: "No speech detected" });
    expect(deps.sessions.size).toBe(0);
  });

  it("propagates transcription failures", async () => {
    stt.next = new BridgeError("upstream_failure", "ASR service error: model not loaded");
    await expect(textTurn(deps, wav)).rejects.toThrow("ASR service error: model not loaded");
  });

  it("rejects audio that is not WAV", async () => {
    await expect(textTurn(deps, new Uint8Array([1, 2, 3]))).rejects.toMatchObject({ kind: "invalid_input" });
    expect(stt.calls).toEqual([]);
  });
});

describe("voiceTurn", () => {
  it("synthesizes the agent's reply", async () => {
    stt.next = "quelle heure";
    const turn = await voiceTurn(deps, wav, "desk");
    expect(tts.texts).toEqual(["You said: quelle heure"]);
    expect(new TextDecoder().decode(turn.audio)).toBe("You said: quelle heure");
    expect(turn.sessionId).toBe("desk");
  });

  it("propagates a synthesis failure after the turn is recorded", async () => {
    stt.next = "hello";
    tts.failure = new BridgeError("upstream_failure", "TTS service returned no audio");
    await expect(voiceTurn(deps, wav, "desk")).rejects.toThrow("TTS service returned no audio");
    expect(deps.sessions.history("desk")).toHaveLength(2);
  });
});
