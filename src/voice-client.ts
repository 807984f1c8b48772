/**
 * Requester side of the voice request broker, over HTTP.
 *
 * getVoiceInput creates a request whose overall deadline equals the local
 * wait budget, then polls /api/result/:id until it settles or the budget runs
 * out. The three outcomes (completed, failed, timed_out) are distinct, and an
 * empty transcript is still `completed`.
 */

import { z } from "zod";
import { BridgeError, errorMessage } from "./errors";

export type VoiceInputOutcome =
  | { status: "completed"; transcript: string }
  | { status: "failed"; error: string }
  | { status: "timed_out" };

export interface VoiceInputOptions {
  language: string;
  timeoutSeconds: number;
  pollIntervalMs?: number;
}

export interface VoiceClientOptions {
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const CreatedSchema = z.object({
  request_id: z.string().min(1),
  status: z.literal("pending"),
});

const ResultSchema = z.object({
  status: z.enum(["pending", "claimed", "recording_submitted", "completed", "failed", "timed_out"]),
  transcript: z.string().nullable(),
  error: z.string().nullable(),
});

export type RequestResult = z.infer<typeof ResultSchema>;

const DEFAULT_POLL_INTERVAL_MS = 1000;

export class VoiceClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(baseUrl: string, options: VoiceClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = options.now ?? Date.now;
  }

  async requestVoice(language: string, timeoutSeconds: number): Promise<string> {
    const body = await this.call("/api/request-voice", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ language, timeout_seconds: timeoutSeconds }),
    });
    return parseBody(CreatedSchema, body, "request-voice").request_id;
  }

  async getResult(requestId: string): Promise<RequestResult> {
    const body = await this.call(`/api/result/${encodeURIComponent(requestId)}`, { method: "GET" });
    return parseBody(ResultSchema, body, "result");
  }

  async getVoiceInput(options: VoiceInputOptions): Promise<VoiceInputOutcome> {
    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const requestId = await this.requestVoice(options.language, options.timeoutSeconds);
    const deadline = this.now() + options.timeoutSeconds * 1000;
    console.error(`[mcp] Waiting for voice input on request ${requestId} (${options.timeoutSeconds}s)`);

    for (;;) {
      const result = await this.getResult(requestId);
      switch (result.status) {
        case "completed":
          return { status: "completed", transcript: result.transcript ?? "" };
        case "failed":
          return { status: "failed", error: result.error ?? "unknown error" };
        case "timed_out":
          return { status: "timed_out" };
      }
      if (this.now() >= deadline) return { status: "timed_out" };
      await this.sleep(pollIntervalMs);
    }
  }

  private async call(path: string, init: RequestInit): Promise<unknown> {
    let resp: Response;
    try {
      resp = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    } catch (err) {
      throw new BridgeError("upstream_failure", `Voice server unreachable at ${this.baseUrl}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (resp.status === 404) {
      throw new BridgeError("not_found", `${path} not found on voice server`);
    }
    if (!resp.ok) {
      throw new BridgeError("upstream_failure", `Voice server answered ${resp.status} for ${path}`);
    }
    return resp.json();
  }
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new BridgeError("upstream_failure", `Unexpected ${what} response from voice server`);
  }
  return parsed.data;
}
