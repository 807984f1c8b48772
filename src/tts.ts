/**
 * Synthesis adapter: text in, WAV bytes out, via a Piper voice behind the
 * Wyoming protocol.
 *
 *   → synthesize {text, voice?}
 *   ← audio-start {rate, width, channels}
 *   ← audio-chunk (payload)*
 *   ← audio-stop
 *
 * Replies are cleaned for speech (markdown stripped, pronunciation
 * dictionary applied) before they are sent. Failures are upstream_failure;
 * nothing is retried.
 */

import type { Config } from "./config";
import { createWavBuffer, type PcmFormat } from "./audio-utils";
import { BridgeError, errorMessage } from "./errors";
import { prepareForSpeech } from "./speech-text";
import { event, tcpConnector, type ConnectWyoming } from "./wyoming";

/** Piper's native output when audio-start carries no format. */
export const PIPER_DEFAULT_FORMAT: PcmFormat = { rate: 22050, width: 2, channels: 1 };

export interface Synthesizer {
  synthesize(text: string): Promise<Uint8Array>;
}

export interface PiperOptions {
  voice?: string;
  /** Directory holding pronunciation.yaml; null skips the dictionary. */
  dataDir?: string | null;
  readTimeoutMs?: number;
  maxEvents?: number;
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : fallback;
}

export class PiperWyomingBackend implements Synthesizer {
  private readonly readTimeoutMs: number;
  private readonly maxEvents: number;

  constructor(
    private readonly connect: ConnectWyoming,
    private readonly options: PiperOptions = {},
  ) {
    this.readTimeoutMs = options.readTimeoutMs ?? 30_000;
    this.maxEvents = options.maxEvents ?? 10_000;
  }

  async synthesize(text: string): Promise<Uint8Array> {
    const spoken = prepareForSpeech(text, this.options.dataDir ?? null);
    if (spoken === "") {
      throw new BridgeError("invalid_input", "Nothing to synthesize");
    }

    const start = Date.now();
    const conn = await this.connect();
    try {
      const data: Record<string, unknown> = { text: spoken };
      if (this.options.voice) data.voice = { name: this.options.voice };
      await conn.write(event("synthesize", data));

      let format: PcmFormat = PIPER_DEFAULT_FORMAT;
      const chunks: Uint8Array[] = [];
      let total = 0;

      for (let count = 1; count <= this.maxEvents; count++) {
        const ev = await conn.read(this.readTimeoutMs);
        if (!ev || ev.type === "audio-stop") break;

        if (ev.type === "audio-start") {
          format = {
            rate: positiveInt(ev.data.rate, PIPER_DEFAULT_FORMAT.rate),
            width: positiveInt(ev.data.width, PIPER_DEFAULT_FORMAT.width),
            channels: positiveInt(ev.data.channels, PIPER_DEFAULT_FORMAT.channels),
          };
        } else if (ev.type === "audio-chunk" && ev.payload) {
          chunks.push(ev.payload);
          total += ev.payload.byteLength;
        } else if (ev.type === "error") {
          const detail = typeof ev.data.text === "string" ? ev.data.text : "unknown error";
          throw new BridgeError("upstream_failure", `TTS service error: ${detail}`);
        }
      }

      if (total === 0) {
        throw new BridgeError("upstream_failure", "TTS service returned no audio");
      }

      const pcm = new Uint8Array(total);
      let offset = 0;
      for (const chunk of chunks) {
        pcm.set(chunk, offset);
        offset += chunk.byteLength;
      }
      console.error(
        `[tts] Synthesized ${spoken.length} chars → ${total} bytes at ${format.rate} Hz in ${Date.now() - start}ms`,
      );
      return createWavBuffer(pcm, format);
    } catch (err) {
      if (err instanceof BridgeError) throw err;
      throw new BridgeError("upstream_failure", `Synthesis failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      conn.close();
    }
  }
}

export function createSynthesizer(config: Config): Synthesizer {
  return new PiperWyomingBackend(tcpConnector(config.tts.host, config.tts.port), {
    voice: config.tts.voice,
    dataDir: config.dataDir,
  });
}
