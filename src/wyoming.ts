/**
 * Wyoming protocol client: the event stream spoken by the speech-to-text
 * and text-to-speech services.
 *
 * Framing: one JSON header line, then optional data bytes (JSON object,
 * `data_length` long), then optional binary payload (`payload_length` long).
 * Older peers put `data` inline in the header; the reader accepts both and
 * merges them.
 *
 *   header  {"type":"audio-chunk","version":"1.5.2","data_length":41,"payload_length":2048}\n
 *   data    {"rate":16000,"width":2,"channels":1}
 *   payload <2048 bytes of PCM>
 */

import { createConnection } from "net";
import type { Duplex, Readable } from "stream";
import { z } from "zod";
import { BridgeError } from "./errors";

export const WYOMING_VERSION = "1.5.2";

export interface WyomingEvent {
  type: string;
  data: Record<string, unknown>;
  payload: Uint8Array | null;
}

const HeaderSchema = z.object({
  type: z.string().min(1),
  version: z.string().optional(),
  data: z.record(z.unknown()).optional(),
  data_length: z.number().int().min(0).optional(),
  payload_length: z.number().int().min(0).optional(),
});

const DataSchema = z.record(z.unknown());

type Header = z.infer<typeof HeaderSchema>;

export function event(
  type: string,
  data: Record<string, unknown> = {},
  payload: Uint8Array | null = null,
): WyomingEvent {
  return { type, data, payload };
}

/** Serialize one event to its wire bytes. */
export function encodeEvent(ev: WyomingEvent): Buffer {
  const header: Record<string, unknown> = { type: ev.type, version: WYOMING_VERSION };
  const parts: Buffer[] = [];

  const dataBytes =
    Object.keys(ev.data).length > 0 ? Buffer.from(JSON.stringify(ev.data), "utf-8") : null;
  if (dataBytes) header.data_length = dataBytes.byteLength;
  if (ev.payload && ev.payload.byteLength > 0) header.payload_length = ev.payload.byteLength;

  parts.push(Buffer.from(`${JSON.stringify(header)}\n`, "utf-8"));
  if (dataBytes) parts.push(dataBytes);
  if (ev.payload && ev.payload.byteLength > 0) parts.push(Buffer.from(ev.payload));
  return Buffer.concat(parts);
}

interface Waiter {
  resolve: (ev: WyomingEvent | null) => void;
  reject: (err: Error) => void;
}

/**
 * Incremental decoder over a byte stream. Events are queued as they complete;
 * `next` hands them out in order and resolves null once the stream ends.
 */
export class WyomingEventReader {
  private buffer: Buffer = Buffer.alloc(0);
  private header: Header | null = null;
  private queue: WyomingEvent[] = [];
  private waiters: Waiter[] = [];
  private ended = false;
  private failure: Error | null = null;

  constructor(stream: Readable) {
    stream.on("data", (chunk: Buffer | string) => {
      this.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
    });
    stream.on("end", () => this.end());
    stream.on("close", () => this.end());
    stream.on("error", (err: Error) => this.fail(err));
  }

  /** Next event, null at end of stream. Rejects with a timeout BridgeError. */
  next(timeoutMs?: number): Promise<WyomingEvent | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(null);

    return new Promise<WyomingEvent | null>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | null = null;
      const waiter: Waiter = {
        resolve: (ev) => {
          if (timer) clearTimeout(timer);
          resolve(ev);
        },
        reject: (err) => {
          if (timer) clearTimeout(timer);
          reject(err);
        },
      };
      this.waiters.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          reject(new BridgeError("timeout", `No Wyoming event within ${timeoutMs}ms`));
        }, timeoutMs);
      }
    });
  }

  private push(chunk: Buffer): void {
    this.buffer = this.buffer.byteLength === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    try {
      this.parse();
    } catch (err) {
      this.fail(err instanceof Error ? err : new Error(String(err)));
    }
  }

  private parse(): void {
    for (;;) {
      if (!this.header) {
        const newline = this.buffer.indexOf(0x0a);
        if (newline === -1) return;
        const line = this.buffer.subarray(0, newline).toString("utf-8");
        this.buffer = this.buffer.subarray(newline + 1);
        if (line.trim() === "") continue;

        const parsed = HeaderSchema.safeParse(JSON.parse(line));
        if (!parsed.success) {
          throw new BridgeError("upstream_failure", `Malformed Wyoming header: ${line.slice(0, 200)}`);
        }
        this.header = parsed.data;
      }

      const dataLength = this.header.data_length ?? 0;
      const payloadLength = this.header.payload_length ?? 0;
      if (this.buffer.byteLength < dataLength + payloadLength) return;

      let data: Record<string, unknown> = { ...(this.header.data ?? {}) };
      if (dataLength > 0) {
        const raw = this.buffer.subarray(0, dataLength).toString("utf-8");
        const extra = DataSchema.safeParse(JSON.parse(raw));
        if (!extra.success) {
          throw new BridgeError("upstream_failure", `Malformed Wyoming data for ${this.header.type}`);
        }
        data = { ...data, ...extra.data };
      }
      const payload =
        payloadLength > 0
          ? new Uint8Array(this.buffer.subarray(dataLength, dataLength + payloadLength))
          : null;
      this.buffer = this.buffer.subarray(dataLength + payloadLength);

      const ev: WyomingEvent = { type: this.header.type, data, payload };
      this.header = null;
      this.deliver(ev);
    }
  }

  private deliver(ev: WyomingEvent): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(ev);
    else this.queue.push(ev);
  }

  private end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve(null);
  }

  private fail(err: Error): void {
    if (this.failure) return;
    this.failure = err;
    for (const waiter of this.waiters.splice(0)) waiter.reject(err);
  }
}

export interface WyomingConnection {
  write(ev: WyomingEvent): Promise<void>;
  read(timeoutMs?: number): Promise<WyomingEvent | null>;
  close(): void;
}

export type ConnectWyoming = () => Promise<WyomingConnection>;

/** Wrap an open duplex stream as a Wyoming connection. */
export function wyomingConnection(stream: Duplex): WyomingConnection {
  const reader = new WyomingEventReader(stream);
  return {
    write: (ev) =>
      new Promise<void>((resolve, reject) => {
        stream.write(encodeEvent(ev), (err) => (err ? reject(err) : resolve()));
      }),
    read: (timeoutMs) => reader.next(timeoutMs),
    close: () => {
      stream.end();
      stream.destroy();
    },
  };
}

/** Connect to a Wyoming service over TCP. */
export function tcpConnector(host: string, port: number, connectTimeoutMs = 5000): ConnectWyoming {
  return () =>
    new Promise<WyomingConnection>((resolve, reject) => {
      const socket = createConnection({ host, port });
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new BridgeError("upstream_failure", `Timed out connecting to ${host}:${port}`));
      }, connectTimeoutMs);

      socket.once("connect", () => {
        clearTimeout(timer);
        resolve(wyomingConnection(socket));
      });
      socket.once("error", (err) => {
        clearTimeout(timer);
        reject(new BridgeError("upstream_failure", `Cannot reach ${host}:${port}: ${err.message}`, { cause: err }));
      });
    });
}
