/**
 * Scripted speech backends for conversation and route tests.
 */

import type { PcmAudio } from "../../audio-utils";
import type { STTResult, Transcriber } from "../../stt";
import type { Synthesizer } from "../../tts";

export class FakeTranscriber implements Transcriber {
  /** What the next transcription returns, or throws. */
  next: string | Error = "";
  readonly calls: { language: string; bytes: number }[] = [];

  async transcribe(audio: PcmAudio, language: string): Promise<STTResult> {
    this.calls.push({ language, bytes: audio.pcm.byteLength });
    if (this.next instanceof Error) throw this.next;
    return { text: this.next, backend: "fake", durationMs: 1 };
  }
}

/** "Synthesizes" by UTF-8 encoding the text, so tests can read it back. */
export class FakeSynthesizer implements Synthesizer {
  failure: Error | null = null;
  readonly texts: string[] = [];

  async synthesize(text: string): Promise<Uint8Array> {
    this.texts.push(text);
    if (this.failure) throw this.failure;
    return new TextEncoder().encode(text);
  }
}
