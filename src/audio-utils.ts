/**
 * PCM / WAV helpers shared by the transcription and synthesis adapters.
 *
 * Transcription expects single-channel, 16 kHz, 16-bit little-endian PCM.
 * Recording surfaces upload WAV at whatever rate their audio stack uses, so
 * uploads are parsed and resampled here before they reach the gateway.
 */

import { BridgeError } from "./errors";

export interface PcmFormat {
  /** Samples per second. */
  rate: number;
  /** Bytes per sample. */
  width: number;
  channels: number;
}

export interface PcmAudio {
  format: PcmFormat;
  pcm: Uint8Array;
}

export const STT_FORMAT: PcmFormat = { rate: 16000, width: 2, channels: 1 };

const WAV_HEADER_BYTES = 44;
const BYTES_PER_SAMPLE = 2;

/**
 * Create a WAV file buffer from raw PCM data.
 * Writes standard 44-byte RIFF/WAV header + PCM payload.
 */
export function createWavBuffer(pcmData: Uint8Array, format: PcmFormat = STT_FORMAT): Uint8Array {
  const bitsPerSample = format.width * 8;
  const byteRate = format.rate * format.channels * format.width;
  const blockAlign = format.channels * format.width;
  const dataSize = pcmData.byteLength;

  const header = new ArrayBuffer(WAV_HEADER_BYTES);
  const view = new DataView(header);

  // RIFF header
  writeString(view, 0, "RIFF");
  view.setUint32(4, 36 + dataSize, true);
  writeString(view, 8, "WAVE");

  // fmt sub-chunk
  writeString(view, 12, "fmt ");
  view.setUint32(16, 16, true); // sub-chunk size (PCM = 16)
  view.setUint16(20, 1, true); // audio format (1 = PCM)
  view.setUint16(22, format.channels, true);
  view.setUint32(24, format.rate, true);
  view.setUint32(28, byteRate, true);
  view.setUint16(32, blockAlign, true);
  view.setUint16(34, bitsPerSample, true);

  // data sub-chunk
  writeString(view, 36, "data");
  view.setUint32(40, dataSize, true);

  const wav = new Uint8Array(WAV_HEADER_BYTES + dataSize);
  wav.set(new Uint8Array(header));
  wav.set(pcmData, WAV_HEADER_BYTES);
  return wav;
}

function writeString(view: DataView, offset: number, str: string): void {
  for (let i = 0; i < str.length; i++) {
    view.setUint8(offset + i, str.charCodeAt(i));
  }
}

function readString(view: DataView, offset: number, length: number): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += String.fromCharCode(view.getUint8(offset + i));
  }
  return out;
}

/**
 * Parse a PCM WAV file. Walks the RIFF chunks, so headers with extra chunks
 * (LIST, fact) are fine. A data size larger than the file (streaming
 * writers) is clamped to what is there.
 *
 * @throws BridgeError invalid_input for anything that is not PCM WAV
 */
export function parseWav(bytes: Uint8Array): PcmAudio {
  if (bytes.byteLength < 12) {
    throw new BridgeError("invalid_input", "Audio is too short to be a WAV file");
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (readString(view, 0, 4) !== "RIFF" || readString(view, 8, 4) !== "WAVE") {
    throw new BridgeError("invalid_input", "Audio is not a RIFF/WAVE file");
  }

  let format: PcmFormat | null = null;
  let offset = 12;
  while (offset + 8 <= bytes.byteLength) {
    const id = readString(view, offset, 4);
    const size = view.getUint32(offset + 4, true);
    const body = offset + 8;

    if (id === "fmt ") {
      if (size < 16 || body + 16 > bytes.byteLength) {
        throw new BridgeError("invalid_input", "WAV fmt chunk is truncated");
      }
      const audioFormat = view.getUint16(body, true);
      if (audioFormat !== 1) {
        throw new BridgeError("invalid_input", `Unsupported WAV encoding ${audioFormat} (PCM required)`);
      }
      format = {
        channels: view.getUint16(body + 2, true),
        rate: view.getUint32(body + 4, true),
        width: view.getUint16(body + 14, true) / 8,
      };
    } else if (id === "data") {
      if (!format) {
        throw new BridgeError("invalid_input", "WAV data chunk precedes fmt chunk");
      }
      const end = Math.min(body + size, bytes.byteLength);
      return { format, pcm: bytes.subarray(body, end) };
    }

    offset = body + size + (size % 2);
  }

  throw new BridgeError("invalid_input", "WAV file has no data chunk");
}

/**
 * Downsample (or upsample) 16-bit signed PCM audio between sample rates.
 * Uses linear interpolation.
 *
 * @param input - Raw 16-bit signed PCM bytes at fromRate
 * @returns Resampled 16-bit signed PCM bytes at toRate
 */
export function resamplePCM16(
  input: Uint8Array,
  fromRate: number,
  toRate: number,
): Uint8Array {
  if (fromRate === toRate) return input;

  const inputView = new DataView(
    input.buffer,
    input.byteOffset,
    input.byteLength,
  );
  const inputSamples = Math.floor(input.byteLength / BYTES_PER_SAMPLE);
  if (inputSamples === 0) return new Uint8Array(0);

  const ratio = fromRate / toRate;
  const outputSamples = Math.floor(inputSamples / ratio);
  const output = new Uint8Array(outputSamples * BYTES_PER_SAMPLE);
  const outputView = new DataView(output.buffer);

  for (let i = 0; i < outputSamples; i++) {
    const srcIdx = i * ratio;
    const low = Math.floor(srcIdx);
    const high = Math.min(low + 1, inputSamples - 1);
    const frac = srcIdx - low;
    const sampleLow = inputView.getInt16(low * BYTES_PER_SAMPLE, true);
    const sampleHigh = inputView.getInt16(high * BYTES_PER_SAMPLE, true);
    const interpolated = Math.round(
      sampleLow * (1 - frac) + sampleHigh * frac,
    );
    outputView.setInt16(i * BYTES_PER_SAMPLE, interpolated, true);
  }

  return output;
}

/**
 * Turn an uploaded WAV into transcription-ready PCM (mono, 16-bit, 16 kHz).
 * Other sample rates are resampled; other widths or channel counts are
 * rejected.
 */
export function wavToSttAudio(wav: Uint8Array): PcmAudio {
  const { format, pcm } = parseWav(wav);
  if (format.channels !== 1) {
    throw new BridgeError("invalid_input", `Audio must be mono (got ${format.channels} channels)`);
  }
  if (format.width !== BYTES_PER_SAMPLE) {
    throw new BridgeError("invalid_input", `Audio must be 16-bit (got ${format.width * 8}-bit)`);
  }
  return { format: STT_FORMAT, pcm: resamplePCM16(pcm, format.rate, STT_FORMAT.rate) };
}

export function sameFormat(a: PcmFormat, b: PcmFormat): boolean {
  return a.rate === b.rate && a.width === b.width && a.channels === b.channels;
}

/** Split PCM into chunks of `samplesPerChunk` frames. */
export function chunkPcm(pcm: Uint8Array, format: PcmFormat, samplesPerChunk: number): Uint8Array[] {
  const chunkBytes = samplesPerChunk * format.width * format.channels;
  const chunks: Uint8Array[] = [];
  for (let offset = 0; offset < pcm.byteLength; offset += chunkBytes) {
    chunks.push(pcm.subarray(offset, Math.min(offset + chunkBytes, pcm.byteLength)));
  }
  return chunks;
}
