/**
 * Transcription gateway: audio in, transcript out.
 *
 * Two backends:
 *   1. Wyoming ASR service (faster-whisper behind the Wyoming protocol, TCP)
 *   2. whisper.cpp `whisper-server` HTTP API (POST /inference)
 *
 * Selected by VOICEBRIDGE_STT_BACKEND ("wyoming" | "whisper-server" | "auto").
 * Auto prefers Wyoming and falls back to whisper-server.
 *
 * Backend failures surface as BridgeError upstream_failure and are never
 * retried here: resubmitting someone's audio behind their back is worse than
 * telling them it failed. An empty transcript is a valid result.
 */

import type { Config } from "./config";
import { createWavBuffer, chunkPcm, sameFormat, STT_FORMAT, type PcmAudio } from "./audio-utils";
import { BridgeError, errorMessage, isBridgeError } from "./errors";
import { KeyedMutex } from "./keyed-mutex";
import { event, tcpConnector, type ConnectWyoming } from "./wyoming";

// --- Types ---

export interface STTResult {
  text: string;
  backend: string;
  durationMs: number;
}

export interface STTBackend {
  name: string;
  isAvailable(): Promise<boolean>;
  transcribe(audio: PcmAudio, language: string): Promise<STTResult>;
}

function requireSttFormat(audio: PcmAudio): void {
  if (!sameFormat(audio.format, STT_FORMAT)) {
    const f = audio.format;
    throw new BridgeError(
      "invalid_input",
      `Transcription needs 16 kHz 16-bit mono PCM (got ${f.rate} Hz, ${f.width * 8}-bit, ${f.channels} ch)`,
    );
  }
}

/** Race `work` against a deadline. A late failure of `work` is still logged. */
async function withDeadline<T>(work: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new BridgeError("timeout", message)), ms);
  });
  try {
    return await Promise.race([work, deadline]);
  } catch (err) {
    if (isBridgeError(err, "timeout") && err.message === message) {
      work.catch((late: unknown) => console.error(`[stt] Abandoned transcription failed: ${errorMessage(late)}`));
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

// --- Wyoming Backend ---

export interface WyomingSTTOptions {
  /** Lock wait + transcription. */
  overallTimeoutMs?: number;
  /** Per event while waiting for the transcript. */
  readTimeoutMs?: number;
  maxEvents?: number;
  samplesPerChunk?: number;
}

export class WyomingSTTBackend implements STTBackend {
  name = "wyoming";
  // One transcription at a time per service connection
  private lock = new KeyedMutex();
  private readonly overallTimeoutMs: number;
  private readonly readTimeoutMs: number;
  private readonly maxEvents: number;
  private readonly samplesPerChunk: number;

  constructor(
    private readonly connect: ConnectWyoming,
    options: WyomingSTTOptions = {},
  ) {
    this.overallTimeoutMs = options.overallTimeoutMs ?? 120_000;
    this.readTimeoutMs = options.readTimeoutMs ?? 30_000;
    this.maxEvents = options.maxEvents ?? 100;
    this.samplesPerChunk = options.samplesPerChunk ?? 1024;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const conn = await this.connect();
      conn.close();
      return true;
    } catch {
      return false;
    }
  }

  async transcribe(audio: PcmAudio, language: string): Promise<STTResult> {
    requireSttFormat(audio);
    return withDeadline(
      this.lock.runExclusive("asr", () => this.run(audio, language)),
      this.overallTimeoutMs,
      `Transcription did not finish within ${this.overallTimeoutMs}ms`,
    );
  }

  private async run(audio: PcmAudio, language: string): Promise<STTResult> {
    const start = Date.now();
    const conn = await this.connect();
    try {
      const { rate, width, channels } = audio.format;
      await conn.write(event("transcribe", { language }));
      await conn.write(event("audio-start", { rate, width, channels }));
      for (const chunk of chunkPcm(audio.pcm, audio.format, this.samplesPerChunk)) {
        await conn.write(event("audio-chunk", { rate, width, channels }, chunk));
      }
      await conn.write(event("audio-stop"));

      for (let count = 1; count <= this.maxEvents; count++) {
        const ev = await conn.read(this.readTimeoutMs);
        if (!ev) {
          throw new BridgeError("upstream_failure", "ASR service closed the connection before sending a transcript");
        }
        if (ev.type === "transcript") {
          const text = typeof ev.data.text === "string" ? ev.data.text.trim() : "";
          return { text, backend: this.name, durationMs: Date.now() - start };
        }
        if (ev.type === "error") {
          const detail = typeof ev.data.text === "string" ? ev.data.text : "unknown error";
          throw new BridgeError("upstream_failure", `ASR service error: ${detail}`);
        }
      }
      throw new BridgeError("upstream_failure", `No transcript after ${this.maxEvents} events`);
    } catch (err) {
      if (err instanceof BridgeError) throw err;
      throw new BridgeError("upstream_failure", `Transcription failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      conn.close();
    }
  }
}

// --- whisper-server Backend ---

/** Health check timeout in ms. */
const HEALTH_TIMEOUT = 2000;

export class WhisperServerBackend implements STTBackend {
  name = "whisper-server";
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly inferenceTimeoutMs = 30_000,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async isAvailable(): Promise<boolean> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), HEALTH_TIMEOUT);
    try {
      const resp = await this.fetchImpl(`${this.baseUrl}/health`, { signal: controller.signal });
      if (!resp.ok) return false;
      const body: unknown = await resp.json();
      return typeof body === "object" && body !== null && "status" in body && body.status === "ok";
    } catch {
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  async transcribe(audio: PcmAudio, language: string): Promise<STTResult> {
    requireSttFormat(audio);
    const start = Date.now();

    const formData = new FormData();
    formData.append(
      "file",
      new Blob([Buffer.from(createWavBuffer(audio.pcm, audio.format))], { type: "audio/wav" }),
      "audio.wav",
    );
    formData.append("response_format", "json");
    formData.append("temperature", "0.0");
    formData.append("language", language);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.inferenceTimeoutMs);
    try {
      const resp = await this.fetchImpl(`${this.baseUrl}/inference`, {
        method: "POST",
        body: formData,
        signal: controller.signal,
      });
      if (!resp.ok) {
        throw new BridgeError(
          "upstream_failure",
          `whisper-server inference failed: ${resp.status} ${resp.statusText}`,
        );
      }
      const result: unknown = await resp.json();
      const text =
        typeof result === "object" && result !== null && "text" in result && typeof result.text === "string"
          ? result.text.trim()
          : "";
      return { text, backend: this.name, durationMs: Date.now() - start };
    } catch (err) {
      if (err instanceof BridgeError) throw err;
      if (controller.signal.aborted) {
        throw new BridgeError("timeout", `whisper-server did not answer within ${this.inferenceTimeoutMs}ms`);
      }
      throw new BridgeError("upstream_failure", `whisper-server unreachable: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }
}

// --- Backend Detection ---

let cachedBackend: STTBackend | null = null;

/**
 * Detect and return the best available STT backend.
 * A successful result is cached for the lifetime of the process.
 */
export async function getBackend(config: Config["stt"]): Promise<STTBackend> {
  if (cachedBackend) return cachedBackend;

  const wyoming = new WyomingSTTBackend(tcpConnector(config.wyomingHost, config.wyomingPort));
  const whisper = new WhisperServerBackend(config.whisperServerUrl);

  if (config.backend === "wyoming") {
    cachedBackend = wyoming;
    return wyoming;
  }
  if (config.backend === "whisper-server") {
    cachedBackend = whisper;
    return whisper;
  }

  if (await wyoming.isAvailable()) {
    cachedBackend = wyoming;
    console.error(`[stt] Backend: Wyoming ASR at ${config.wyomingHost}:${config.wyomingPort}`);
    return wyoming;
  }
  if (await whisper.isAvailable()) {
    cachedBackend = whisper;
    console.error(`[stt] Backend: whisper-server at ${config.whisperServerUrl}`);
    return whisper;
  }

  throw new BridgeError(
    "upstream_failure",
    "No STT backend available. Options:\n" +
      `  1. Run a Wyoming ASR service (e.g. wyoming-faster-whisper) on ${config.wyomingHost}:${config.wyomingPort}\n` +
      `  2. Run whisper.cpp's whisper-server at ${config.whisperServerUrl}`,
  );
}

/**
 * Reset cached backend (for testing).
 */
export function resetBackendCache(): void {
  cachedBackend = null;
}

export interface Transcriber {
  transcribe(audio: PcmAudio, language: string): Promise<STTResult>;
}

/** Transcriber that resolves the configured backend on first use. */
export function createTranscriber(config: Config["stt"]): Transcriber {
  return {
    transcribe: async (audio, language) => {
      const backend = await getBackend(config);
      const result = await backend.transcribe(audio, language);
      console.error(
        `[stt] ${result.backend}: ${result.text.length} chars in ${result.durationMs}ms (language=${language})`,
      );
      return result;
    },
  };
}
