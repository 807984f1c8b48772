import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { PromptMarkerPolicy } from "../completion";
import { ProcessBridge } from "../process-bridge";
import { SessionStore } from "../session-store";
import { echoResponder, fakeSpawner, type FakeAgent, type Responder } from "./helpers/fake-agent";

const tick = () => new Promise((resolve) => setImmediate(resolve));

let dataDir: string;
let t: number;
let stores: SessionStore[];

function makeStore(
  respond: Responder = echoResponder,
  maxSessions = 5,
  killGraceMs = 20,
): { store: SessionStore; agents: FakeAgent[] } {
  const { spawn, agents } = fakeSpawner(respond);
  const store = new SessionStore({
    createBridge: (id) => new ProcessBridge({ spawn, policy: new PromptMarkerPolicy(">"), killGraceMs, label: id }),
    dataDir,
    maxSessions,
    idleMs: 1000,
    turnTimeoutMs: 1000,
    now: () => t,
  });
  stores.push(store);
  return { store, agents };
}

beforeEach(() => {
  dataDir = mkdtempSync(join(tmpdir(), "voicebridge-store-"));
  t = 0;
  stores = [];
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(async () => {
  await Promise.all(stores.map((s) => s.shutdown()));
  rmSync(dataDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("getOrCreate", () => {
  it("mints an 8-hex id and starts a process", async () => {
    const { store, agents } = makeStore();
    const handle = await store.getOrCreate();
    expect(handle.sessionId).toMatch(/^[0-9a-f]{8}$/);
    expect(handle).toMatchObject({ created: true, respawned: false });
    expect(agents).toHaveLength(1);
  });

  it("adopts a well-formed caller id and returns the same session afterwards", async () => {
    const { store, agents } = makeStore();
    expect(await store.getOrCreate("kitchen-1")).toEqual({ sessionId: "kitchen-1", created: true, respawned: false });
    expect(await store.getOrCreate("kitchen-1")).toEqual({ sessionId: "kitchen-1", created: false, respawned: false });
    expect(agents).toHaveLength(1);
  });

  it("mints a fresh id for a malformed caller id", async () => {
    const { store } = makeStore();
    const handle = await store.getOrCreate("../etc/passwd");
    expect(handle.sessionId).toMatch(/^[0-9a-f]{8}$/);
  });

  it("replaces a dead process and says so", async () => {
    const { store, agents } = makeStore();
    await store.getOrCreate("s");
    agents[0].crash();
    await tick();
    expect(await store.getOrCreate("s")).toEqual({ sessionId: "s", created: false, respawned: true });
    expect(agents).toHaveLength(2);
  });

  it("evicts idle sessions at capacity, and refuses when none are idle", async () => {
    const { store } = makeStore(echoResponder, 2);
    await store.getOrCreate("a");
    await store.getOrCreate("b");
    await expect(store.getOrCreate("c")).rejects.toMatchObject({ kind: "capacity_exceeded" });

    t = 1000;
    expect((await store.getOrCreate("c")).created).toBe(true);
    expect(store.size).toBe(1);
    expect(store.has("a")).toBe(false);
  });
});

describe("evictIdle", () => {
  it("keeps a session that takes a turn while earlier evictions are still closing", async () => {
    const { store, agents } = makeStore(echoResponder, 5, 200);
    await store.getOrCreate("a");
    await store.getOrCreate("b");
    agents[0].stubborn = true;

    t = 1000;
    const sweep = store.evictIdle();
    const turn = await store.sendTurn("b", "hi");
    expect(turn.status).toBe("ok");

    expect(await sweep).toBe(1);
    expect(store.has("a")).toBe(false);
    expect(store.has("b")).toBe(true);
    expect(agents[1].isAlive()).toBe(true);
    expect(agents[0].signals).toEqual(["SIGTERM", "SIGKILL"]);
  });

  it("counts resuming a session as activity", async () => {
    const { store } = makeStore();
    await store.getOrCreate("b");
    t = 1000;
    await store.getOrCreate("b");
    expect(await store.evictIdle()).toBe(0);
    expect(store.has("b")).toBe(true);
  });

  it("skips a session with a turn in flight", async () => {
    const { store } = makeStore((line, agent) => {
      setTimeout(() => agent.emit(`R:${line}\n> `), 20);
      return null;
    });
    await store.getOrCreate("busy");
    t = 1000;
    const turn = store.sendTurn("busy", "slow");
    expect(await store.evictIdle()).toBe(0);
    expect(await turn).toMatchObject({ status: "ok", reply: "R:slow" });
  });
});

describe("sendTurn", () => {
  it("returns the reply and records history on disk", async () => {
    const { store } = makeStore();
    await store.getOrCreate("s1");
    const result = await store.sendTurn("s1", "bonjour");
    expect(result).toEqual({
      status: "ok",
      sessionId: "s1",
      reply: "You said: bonjour",
      respawned: false,
      discardedOutput: null,
    });

    const expected = [
      { role: "user", content: "bonjour", at: "1970-01-01T00:00:00.000Z" },
      { role: "assistant", content: "You said: bonjour", at: "1970-01-01T00:00:00.000Z" },
    ];
    expect(store.history("s1")).toEqual(expected);
    const file = join(dataDir, "sessions", "s1.json");
    expect(JSON.parse(readFileSync(file, "utf-8"))).toEqual(expected);
  });

  it("reports not_found for an unknown session", async () => {
    const { store } = makeStore();
    expect(await store.sendTurn("ghost", "hi")).toEqual({ status: "not_found", sessionId: "ghost" });
  });

  it("queues concurrent turns for one session in order", async () => {
    const { store, agents } = makeStore((line, agent) => {
      setTimeout(() => agent.emit(`R:${line}\n> `), 10);
      return null;
    });
    await store.getOrCreate("q");
    const [a, b] = await Promise.all([store.sendTurn("q", "a"), store.sendTurn("q", "b")]);
    expect(a.status === "ok" && a.reply).toBe("R:a");
    expect(b.status === "ok" && b.reply).toBe("R:b");
    expect(agents[0].received).toEqual(["a", "b"]);
  });

  it("runs turns for different sessions in parallel without mixing replies", async () => {
    const delays: Record<string, number> = { ping: 60, ping2: 5 };
    const { store } = makeStore((line, agent) => {
      const reply = line === "ping" ? "pong" : "pong2";
      setTimeout(() => agent.emit(`${reply}\n> `), delays[line] ?? 0);
      return null;
    });
    await store.getOrCreate("A");
    await store.getOrCreate("B");

    const finished: string[] = [];
    const track = async (sessionId: string, text: string) => {
      const result = await store.sendTurn(sessionId, text);
      finished.push(sessionId);
      return result;
    };
    const [a, b] = await Promise.all([track("A", "ping"), track("B", "ping2")]);

    expect(a).toMatchObject({ status: "ok", sessionId: "A", reply: "pong" });
    expect(b).toMatchObject({ status: "ok", sessionId: "B", reply: "pong2" });
    expect(finished).toEqual(["B", "A"]);
  });

  it("reloads cached history when a session id comes back", async () => {
    const first = makeStore();
    await first.store.getOrCreate("persist");
    await first.store.sendTurn("persist", "remember me");
    await first.store.shutdown();

    const second = makeStore();
    await second.store.getOrCreate("persist");
    expect(second.store.history("persist")?.map((h) => h.content)).toEqual(["remember me", "You said: remember me"]);
  });
});

describe("clear", () => {
  it("terminates the process, deletes history and is idempotent", async () => {
    const { store, agents } = makeStore();
    await store.getOrCreate("gone");
    await store.sendTurn("gone", "hi");
    const file = join(dataDir, "sessions", "gone.json");
    expect(existsSync(file)).toBe(true);

    expect(await store.clear("gone")).toBe(true);
    expect(await store.clear("gone")).toBe(false);
    expect(store.has("gone")).toBe(false);
    expect(existsSync(file)).toBe(false);
    expect(agents[0].isAlive()).toBe(false);
    expect(agents[0].signals).toEqual(["SIGTERM"]);
  });

  it("is a no-op for an id that never existed", async () => {
    const { store } = makeStore();
    expect(await store.clear("never")).toBe(false);
  });
});

describe("list", () => {
  it("describes live sessions", async () => {
    const { store, agents } = makeStore();
    await store.getOrCreate("l");
    await store.sendTurn("l", "one");
    expect(store.list()).toEqual([
      { id: "l", pid: agents[0].pid, alive: true, busy: false, turns: 1, createdAt: 0, lastActiveAt: 0 },
    ]);
  });
});
