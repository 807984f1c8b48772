import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { VoiceClient } from "../voice-client";

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function pending(status = "pending") {
  return { status, transcript: null, error: null };
}

/** Serves request-voice, then the queued result bodies one poll at a time. */
function server(results: unknown[]) {
  const queue = [...results];
  return vi.fn<typeof fetch>(async (input) => {
    const url = String(input);
    if (url.endsWith("/api/request-voice")) return json({ request_id: "req-1", status: "pending" });
    if (url.endsWith("/api/result/req-1")) return json(queue.length > 1 ? queue.shift() : queue[0]);
    return json({ error: "no route" }, 404);
  });
}

function clock() {
  let t = 0;
  return {
    now: () => t,
    sleep: vi.fn(async (ms: number) => {
      t += ms;
    }),
  };
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("VoiceClient.getVoiceInput", () => {
  it("creates a request with the wait budget and polls until completed", async () => {
    const fetchMock = server([pending(), pending("claimed"), { status: "completed", transcript: "bonjour", error: null }]);
    const c = clock();
    const client = new VoiceClient("http://voice.test:8765/", { fetch: fetchMock, ...c });

    const outcome = await client.getVoiceInput({ language: "fr", timeoutSeconds: 30, pollIntervalMs: 500 });
    expect(outcome).toEqual({ status: "completed", transcript: "bonjour" });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://voice.test:8765/api/request-voice");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"language":"fr","timeout_seconds":30}');
    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(c.sleep.mock.calls).toEqual([[500], [500]]);
  });

  it("keeps an empty transcript as completed", async () => {
    const client = new VoiceClient("http://voice.test", {
      fetch: server([{ status: "completed", transcript: "", error: null }]),
      ...clock(),
    });
    expect(await client.getVoiceInput({ language: "en", timeoutSeconds: 10 })).toEqual({
      status: "completed",
      transcript: "",
    });
  });

  it("reports a failed request with its error", async () => {
    const client = new VoiceClient("http://voice.test", {
      fetch: server([{ status: "failed", transcript: null, error: "ASR service error: model not loaded" }]),
      ...clock(),
    });
    expect(await client.getVoiceInput({ language: "fr", timeoutSeconds: 10 })).toEqual({
      status: "failed",
      error: "ASR service error: model not loaded",
    });
  });

  it("passes through a server-side timeout", async () => {
    const client = new VoiceClient("http://voice.test", { fetch: server([pending("timed_out")]), ...clock() });
    expect(await client.getVoiceInput({ language: "fr", timeoutSeconds: 10 })).toEqual({ status: "timed_out" });
  });

  it("gives up locally when the budget runs out", async () => {
    const c = clock();
    const client = new VoiceClient("http://voice.test", { fetch: server([pending()]), ...c });
    const outcome = await client.getVoiceInput({ language: "fr", timeoutSeconds: 10, pollIntervalMs: 1000 });
    expect(outcome).toEqual({ status: "timed_out" });
    expect(c.sleep).toHaveBeenCalledTimes(10);
  });
});

describe("VoiceClient errors", () => {
  it("wraps a network failure as upstream_failure", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });
    const client = new VoiceClient("http://voice.test", { fetch: fetchMock });
    await expect(client.requestVoice("fr", 10)).rejects.toMatchObject({
      kind: "upstream_failure",
      message: "Voice server unreachable at http://voice.test: fetch failed",
    });
  });

  it("maps 404 to not_found", async () => {
    const client = new VoiceClient("http://voice.test", { fetch: server([]) });
    await expect(client.getResult("other")).rejects.toMatchObject({ kind: "not_found" });
  });

  it("maps other error statuses to upstream_failure", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => json({ error: "full", kind: "capacity_exceeded" }, 503));
    const client = new VoiceClient("http://voice.test", { fetch: fetchMock });
    await expect(client.requestVoice("fr", 10)).rejects.toThrow("Voice server answered 503 for /api/request-voice");
  });

  it("rejects a malformed response body", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => json({ id: "x" }));
    const client = new VoiceClient("http://voice.test", { fetch: fetchMock });
    await expect(client.requestVoice("fr", 10)).rejects.toThrow("Unexpected request-voice response from voice server");
  });
});
