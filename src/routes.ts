/**
 * HTTP coordinator routes.
 *
 * Transport-free: a route takes a parsed request and returns a status plus a
 * JSON or audio body. http-server.ts adapts this to node:http, and tests call
 * `handleRequest` directly.
 */

import { z } from "zod";
import { wavToSttAudio } from "./audio-utils";
import type { VoiceRequestBroker } from "./broker";
import { textTurn, transcribeWav, voiceTurn, type ConversationDeps } from "./conversation";
import { BridgeError, errorMessage, isBridgeError, type BridgeErrorKind } from "./errors";

export interface RouteRequest {
  method: string;
  path: string;
  /** Lower-cased header names. */
  headers: Record<string, string | undefined>;
  body: Uint8Array;
}

export type RouteResponse =
  | { status: number; json: unknown; headers?: Record<string, string> }
  | { status: number; audio: Uint8Array; headers?: Record<string, string> };

export interface RouterDeps extends ConversationDeps {
  broker: VoiceRequestBroker;
  /** Overall deadline for voice requests that do not name one. */
  requestTimeoutMs: number;
  /** Backend descriptions reported by /health. */
  describe: { stt: string; tts: string };
}

type Handler = (req: RouteRequest, params: string[], deps: RouterDeps) => Promise<RouteResponse>;

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

const STATUS_BY_KIND: Record<BridgeErrorKind, number> = {
  invalid_input: 400,
  not_found: 404,
  conflict: 409,
  timeout: 504,
  upstream_failure: 502,
  capacity_exceeded: 503,
};

/** Seconds a client should wait before retrying after capacity_exceeded. */
const RETRY_AFTER_SECONDS = "5";

const RequestVoiceSchema = z.object({
  language: z.string().min(2).max(16).optional(),
  timeout_seconds: z.number().positive().max(3600).optional(),
});

function json(status: number, body: unknown, headers?: Record<string, string>): RouteResponse {
  return headers ? { status, json: body, headers } : { status, json: body };
}

function parseJsonBody(body: Uint8Array): unknown {
  const text = Buffer.from(body).toString("utf-8").trim();
  if (text === "") return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new BridgeError("invalid_input", "Request body is not valid JSON");
  }
}

function requireAudio(req: RouteRequest): Uint8Array {
  if (req.body.byteLength === 0) {
    throw new BridgeError("invalid_input", "Request body must be a WAV file");
  }
  return req.body;
}

/** Map a thrown error to its response. */
export function errorResponse(err: unknown): RouteResponse {
  if (isBridgeError(err)) {
    const status = STATUS_BY_KIND[err.kind];
    const headers = err.kind === "capacity_exceeded" ? { "Retry-After": RETRY_AFTER_SECONDS } : undefined;
    return json(status, { error: err.message, kind: err.kind }, headers);
  }
  return json(500, { error: errorMessage(err) });
}

// --- Conversation ---

const health: Handler = async (_req, _params, deps) =>
  json(200, {
    status: "ok",
    stt: deps.describe.stt,
    tts: deps.describe.tts,
    sessions: deps.sessions.size,
    pending_requests: deps.broker.listPending().length,
  });

const voice: Handler = async (req, _params, deps) => {
  const turn = await voiceTurn(deps, requireAudio(req), req.headers["x-session-id"]);
  const headers: Record<string, string> = { "X-Session-ID": turn.sessionId };
  if (turn.respawned) headers["X-Session-Respawned"] = "true";
  return { status: 200, audio: turn.audio, headers };
};

const voiceText: Handler = async (req, _params, deps) => {
  const turn = await textTurn(deps, requireAudio(req), req.headers["x-session-id"]);
  return json(
    200,
    {
      session_id: turn.sessionId,
      transcript: turn.transcript,
      response: turn.reply,
      respawned: turn.respawned,
      discarded_output: turn.discardedOutput,
    },
    { "X-Session-ID": turn.sessionId },
  );
};

const testTranscribe: Handler = async (req, _params, deps) => {
  const transcript = await transcribeWav(deps, requireAudio(req));
  return json(200, { transcript, status: "ok" });
};

const newSession: Handler = async (_req, _params, deps) => {
  const handle = await deps.sessions.getOrCreate();
  return json(200, { session_id: handle.sessionId });
};

const clearSession: Handler = async (_req, [sessionId], deps) => {
  const cleared = await deps.sessions.clear(sessionId);
  return json(200, { status: cleared ? "cleared" : "absent" });
};

const sessionHistory: Handler = async (_req, [sessionId], deps) => {
  const history = deps.sessions.history(sessionId);
  if (!history) return json(404, { error: `Session ${sessionId} not found` });
  return json(200, { session_id: sessionId, history });
};

// --- Voice request broker ---

const requestVoice: Handler = async (req, _params, deps) => {
  const parsed = RequestVoiceSchema.safeParse(parseJsonBody(req.body));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new BridgeError("invalid_input", `Invalid voice request: ${problems}`);
  }
  const language = parsed.data.language ?? deps.defaultLanguage;
  const timeoutMs =
    parsed.data.timeout_seconds !== undefined ? Math.round(parsed.data.timeout_seconds * 1000) : deps.requestTimeoutMs;
  const requestId = deps.broker.createRequest(language, timeoutMs);
  return json(200, { request_id: requestId, status: "pending" });
};

const pendingRequests: Handler = async (_req, _params, deps) =>
  json(200, { requests: deps.broker.listPending() });

const claimRequest: Handler = async (_req, [requestId], deps) => {
  const result = deps.broker.claim(requestId);
  switch (result.status) {
    case "claimed":
      return json(200, {
        status: "claimed",
        claim_token: result.claimToken,
        claim_deadline: new Date(result.claimDeadline).toISOString(),
      });
    case "not_found":
      return json(404, { status: "not_found", error: `Request ${requestId} not found` });
    case "already_claimed":
      return json(409, { status: "already_claimed", error: `Request ${requestId} is already claimed` });
    case "expired":
      return json(410, { status: "expired", error: `Request ${requestId} has expired` });
  }
};

const submitVoice: Handler = async (req, [requestId], deps) => {
  const claimToken = req.headers["x-claim-token"];
  // Malformed audio leaves the claim intact so the surface can retry
  const audio = wavToSttAudio(requireAudio(req));

  const begun = deps.broker.beginSubmission(requestId, claimToken);
  if (begun.status === "not_found") {
    return json(404, { status: "not_found", error: `Request ${requestId} not found` });
  }
  if (begun.status === "wrong_state") {
    return json(409, { status: begun.state, error: `Request ${requestId} is not awaiting audio` });
  }

  try {
    const result = await deps.stt.transcribe(audio, begun.language);
    const stored = deps.broker.submitResult(requestId, { transcript: result.text }, claimToken);
    if (stored.status !== "ok") {
      const status = stored.status === "wrong_state" ? stored.state : stored.status;
      return json(409, { status, error: `Request ${requestId} expired during transcription` });
    }
    return json(200, { status: "completed", transcript: result.text });
  } catch (err) {
    deps.broker.submitResult(requestId, { error: errorMessage(err) }, claimToken);
    throw err;
  }
};

const requestResult: Handler = async (_req, [requestId], deps) => {
  const result = deps.broker.getResult(requestId);
  switch (result.status) {
    case "not_found":
      return json(404, { status: "not_found", transcript: null, error: `Request ${requestId} not found` });
    case "completed":
      return json(200, { status: "completed", transcript: result.transcript, error: null });
    case "failed":
      return json(200, { status: "failed", transcript: null, error: result.error });
    default:
      return json(200, { status: result.status, transcript: null, error: null });
  }
};

const ID = "([^/]+)";

function decodeParam(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch (err) {
    throw new BridgeError("invalid_input", `Malformed path segment ${raw}`, { cause: err });
  }
}

const ROUTES: Route[] = [
  { method: "GET", pattern: /^\/health$/, handler: health },
  { method: "POST", pattern: /^\/voice$/, handler: voice },
  { method: "POST", pattern: /^\/voice-text$/, handler: voiceText },
  { method: "POST", pattern: /^\/test-transcribe$/, handler: testTranscribe },
  { method: "POST", pattern: /^\/session\/new$/, handler: newSession },
  { method: "POST", pattern: new RegExp(`^/session/${ID}/clear$`), handler: clearSession },
  { method: "GET", pattern: new RegExp(`^/session/${ID}/history$`), handler: sessionHistory },
  { method: "POST", pattern: /^\/api\/request-voice$/, handler: requestVoice },
  { method: "GET", pattern: /^\/api\/pending-requests$/, handler: pendingRequests },
  { method: "POST", pattern: new RegExp(`^/api/claim-request/${ID}$`), handler: claimRequest },
  { method: "POST", pattern: new RegExp(`^/api/submit-voice/${ID}$`), handler: submitVoice },
  { method: "GET", pattern: new RegExp(`^/api/result/${ID}$`), handler: requestResult },
];

/** Dispatch one request. Never throws: failures become error responses. */
export async function handleRequest(req: RouteRequest, deps: RouterDeps): Promise<RouteResponse> {
  const path = req.path.split("?")[0];
  let pathMatched = false;

  for (const route of ROUTES) {
    const match = route.pattern.exec(path);
    if (!match) continue;
    pathMatched = true;
    if (route.method !== req.method) continue;

    try {
      const params = match.slice(1).map(decodeParam);
      return await route.handler(req, params, deps);
    } catch (err) {
      if (!isBridgeError(err)) {
        console.error(`[http] ${req.method} ${path} failed: ${errorMessage(err)}`);
      }
      return errorResponse(err);
    }
  }

  return pathMatched
    ? json(405, { error: `Method ${req.method} not allowed on ${path}` })
    : json(404, { error: `No route for ${req.method} ${path}` });
}
