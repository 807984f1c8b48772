import { describe, it, expect } from "vitest";
import {
  chunkPcm,
  createWavBuffer,
  parseWav,
  resamplePCM16,
  wavToSttAudio,
  type PcmFormat,
} from "../audio-utils";

function pcm16(samples: number[]): Uint8Array {
  const out = new Uint8Array(samples.length * 2);
  const view = new DataView(out.buffer);
  samples.forEach((s, i) => view.setInt16(i * 2, s, true));
  return out;
}

function samples16(pcm: Uint8Array): number[] {
  const view = new DataView(pcm.buffer, pcm.byteOffset, pcm.byteLength);
  const out: number[] = [];
  for (let i = 0; i + 1 < pcm.byteLength; i += 2) out.push(view.getInt16(i, true));
  return out;
}

const ascii = (s: string) => Uint8Array.from(s, (c) => c.charCodeAt(0));

describe("createWavBuffer", () => {
  it("writes a 44-byte PCM header", () => {
    const wav = createWavBuffer(pcm16([1, 2]), { rate: 22050, width: 2, channels: 1 });
    const view = new DataView(wav.buffer);
    expect(wav.byteLength).toBe(48);
    expect(Buffer.from(wav.subarray(0, 4)).toString("ascii")).toBe("RIFF");
    expect(view.getUint32(4, true)).toBe(40);
    expect(view.getUint16(20, true)).toBe(1);
    expect(view.getUint32(24, true)).toBe(22050);
    expect(view.getUint32(28, true)).toBe(44100);
    expect(view.getUint16(34, true)).toBe(16);
    expect(view.getUint32(40, true)).toBe(4);
  });
});

describe("parseWav", () => {
  it("reads back format and samples", () => {
    const format: PcmFormat = { rate: 8000, width: 2, channels: 1 };
    const parsed = parseWav(createWavBuffer(pcm16([5, -5, 300]), format));
    expect(parsed.format).toEqual(format);
    expect(samples16(parsed.pcm)).toEqual([5, -5, 300]);
  });

  it("skips chunks between fmt and data", () => {
    const base = createWavBuffer(pcm16([7, 8]), { rate: 16000, width: 2, channels: 1 });
    const list = new Uint8Array(8 + 4);
    list.set(ascii("LIST"));
    new DataView(list.buffer).setUint32(4, 4, true);
    list.set(ascii("INFO"), 8);
    const wav = new Uint8Array(base.byteLength + list.byteLength);
    wav.set(base.subarray(0, 36));
    wav.set(list, 36);
    wav.set(base.subarray(36), 36 + list.byteLength);
    expect(samples16(parseWav(wav).pcm)).toEqual([7, 8]);
  });

  it("clamps a data size larger than the file", () => {
    const wav = createWavBuffer(pcm16([1, 2, 3]));
    new DataView(wav.buffer).setUint32(40, 0xffffffff, true);
    expect(samples16(parseWav(wav).pcm)).toEqual([1, 2, 3]);
  });

  it("rejects what is not PCM WAV", () => {
    expect(() => parseWav(new Uint8Array(4))).toThrow("Audio is too short to be a WAV file");
    expect(() => parseWav(ascii("ID3\u0003 not a wave file"))).toThrow("Audio is not a RIFF/WAVE file");

    const float = createWavBuffer(pcm16([1]));
    new DataView(float.buffer).setUint16(20, 3, true);
    expect(() => parseWav(float)).toThrow("Unsupported WAV encoding 3 (PCM required)");

    const noData = createWavBuffer(pcm16([])).subarray(0, 36);
    expect(() => parseWav(noData)).toThrow("WAV file has no data chunk");
  });
});

describe("resamplePCM16", () => {
  it("returns the input unchanged at equal rates", () => {
    const input = pcm16([1, 2, 3]);
    expect(resamplePCM16(input, 16000, 16000)).toBe(input);
  });

  it("downsamples by picking interpolated positions", () => {
    expect(samples16(resamplePCM16(pcm16([0, 100, 200, 300]), 32000, 16000))).toEqual([0, 200]);
  });

  it("upsamples with linear interpolation", () => {
    expect(samples16(resamplePCM16(pcm16([0, 100]), 8000, 16000))).toEqual([0, 50, 100, 100]);
  });
});

describe("wavToSttAudio", () => {
  it("resamples mono 16-bit audio to 16 kHz", () => {
    const wav = createWavBuffer(pcm16([0, 10, 20, 30, 40, 50]), { rate: 48000, width: 2, channels: 1 });
    const audio = wavToSttAudio(wav);
    expect(audio.format).toEqual({ rate: 16000, width: 2, channels: 1 });
    expect(samples16(audio.pcm)).toEqual([0, 30]);
  });

  it("rejects stereo and 8-bit audio", () => {
    expect(() => wavToSttAudio(createWavBuffer(pcm16([1, 2]), { rate: 16000, width: 2, channels: 2 }))).toThrow(
      "Audio must be mono (got 2 channels)",
    );
    expect(() => wavToSttAudio(createWavBuffer(new Uint8Array([1, 2]), { rate: 16000, width: 1, channels: 1 }))).toThrow(
      "Audio must be 16-bit (got 8-bit)",
    );
  });
});

describe("chunkPcm", () => {
  it("splits into whole-sample chunks with a short tail", () => {
    const chunks = chunkPcm(pcm16([1, 2, 3, 4, 5]), { rate: 16000, width: 2, channels: 1 }, 2);
    expect(chunks.map((c) => c.byteLength)).toEqual([4, 4, 2]);
  });
});
