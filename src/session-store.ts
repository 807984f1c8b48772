/**
 * Session store: maps a session id to its agent process bridge, its turn
 * history and its activity timestamps.
 *
 * All work on one session (create, turn, clear) runs under that session's
 * lock, so turns for a session are applied in submission order and never
 * overlap. Different sessions never wait on each other.
 *
 * Callers only ever hold a session id; the bridge itself stays inside the
 * store.
 */

import { randomBytes } from "crypto";
import { BridgeError } from "./errors";
import { KeyedMutex } from "./keyed-mutex";
import type { ProcessBridge } from "./process-bridge";
import { deleteHistory, loadHistory, saveHistory, type HistoryEntry } from "./session-history";

export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export interface SessionStoreOptions {
  createBridge: (sessionId: string) => ProcessBridge;
  /** Directory for the history cache; null keeps history in memory only. */
  dataDir: string | null;
  maxSessions: number;
  idleMs: number;
  turnTimeoutMs: number;
  now?: () => number;
}

interface Session {
  id: string;
  bridge: ProcessBridge;
  history: HistoryEntry[];
  createdAt: number;
  lastActiveAt: number;
}

export interface SessionHandle {
  sessionId: string;
  created: boolean;
  /** The session existed but its process had died and was replaced. */
  respawned: boolean;
}

export interface SessionInfo {
  id: string;
  pid: number | undefined;
  alive: boolean;
  busy: boolean;
  turns: number;
  createdAt: number;
  lastActiveAt: number;
}

export type TurnResult =
  | {
      status: "ok";
      sessionId: string;
      reply: string;
      respawned: boolean;
      discardedOutput: string | null;
    }
  | { status: "not_found"; sessionId: string };

export class SessionStore {
  private sessions = new Map<string, Session>();
  private locks = new KeyedMutex();
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Return a live session. An omitted or invalid id gets a freshly minted
   * one; a valid id the store has not seen creates that session.
   *
   * @throws BridgeError capacity_exceeded when no slot can be freed
   */
  async getOrCreate(sessionId?: string): Promise<SessionHandle> {
    const id = sessionId && SESSION_ID_PATTERN.test(sessionId) ? sessionId : this.mintId();

    if (!this.sessions.has(id) && this.sessions.size >= this.options.maxSessions) {
      await this.evictIdle();
    }

    return this.locks.runExclusive(id, async () => {
      const existing = this.sessions.get(id);
      if (existing) {
        existing.lastActiveAt = this.now();
        const respawned = existing.bridge.ensureProcess();
        return { sessionId: id, created: false, respawned };
      }

      if (this.sessions.size >= this.options.maxSessions) {
        throw new BridgeError(
          "capacity_exceeded",
          `Too many live sessions (${this.sessions.size}/${this.options.maxSessions}); retry later`,
        );
      }

      const bridge = this.options.createBridge(id);
      const now = this.now();
      const history = this.options.dataDir ? loadHistory(this.options.dataDir, id) : [];
      this.sessions.set(id, { id, bridge, history, createdAt: now, lastActiveAt: now });
      try {
        bridge.ensureProcess();
      } catch (err) {
        this.sessions.delete(id);
        throw err;
      }
      console.error(`[session] Created session ${id} (${this.sessions.size} live)`);
      return { sessionId: id, created: true, respawned: false };
    });
  }

  /**
   * Send one turn to a session's agent. Turns for the same session queue
   * behind each other.
   *
   * @throws BridgeError timeout | upstream_failure | invalid_input from the bridge
   */
  async sendTurn(sessionId: string, text: string, timeoutMs?: number): Promise<TurnResult> {
    return this.locks.runExclusive(sessionId, async () => {
      const session = this.sessions.get(sessionId);
      if (!session) return { status: "not_found", sessionId };

      session.lastActiveAt = this.now();
      const turn = await session.bridge.sendTurn(text, timeoutMs ?? this.options.turnTimeoutMs);

      const at = new Date(this.now()).toISOString();
      session.history.push({ role: "user", content: text, at });
      session.history.push({ role: "assistant", content: turn.reply, at });
      session.lastActiveAt = this.now();
      this.persist(session);

      return {
        status: "ok",
        sessionId,
        reply: turn.reply,
        respawned: turn.respawned,
        discardedOutput: turn.discardedOutput,
      };
    });
  }

  /**
   * Terminate a session's process and discard its history. Returns whether a
   * live session was torn down; clearing an unknown id is a no-op.
   */
  async clear(sessionId: string): Promise<boolean> {
    return this.locks.runExclusive(sessionId, () => this.teardown(sessionId));
  }

  /**
   * Tear down sessions idle for longer than idleMs. Returns how many.
   * Idleness is checked again under each session's lock, so a session that
   * took a turn while earlier ones were closing is kept.
   */
  async evictIdle(): Promise<number> {
    const candidates = [...this.sessions.values()]
      .filter((s) => this.isIdle(s) && !this.locks.isLocked(s.id))
      .map((s) => s.id);
    let evicted = 0;
    for (const id of candidates) {
      if (await this.clearIfIdle(id)) evicted++;
    }
    return evicted;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /** Copy of a session's history, or null for an unknown session. */
  history(sessionId: string): HistoryEntry[] | null {
    const session = this.sessions.get(sessionId);
    return session ? [...session.history] : null;
  }

  list(): SessionInfo[] {
    return [...this.sessions.values()].map((s) => ({
      id: s.id,
      pid: s.bridge.pid,
      alive: s.bridge.isAlive(),
      busy: this.locks.isLocked(s.id),
      turns: s.history.filter((h) => h.role === "user").length,
      createdAt: s.createdAt,
      lastActiveAt: s.lastActiveAt,
    }));
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Start the periodic idle sweep. Safe to call more than once. */
  start(intervalMs: number): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.evictIdle().catch((err: unknown) => {
        console.error(`[session] Idle sweep failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  /**
   * Stop sweeping and terminate every session's process. Cached history is
   * left on disk.
   */
  async shutdown(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(sessions.map((s) => s.bridge.close()));
    console.error(`[session] Shut down ${sessions.length} session(s)`);
  }

  private isIdle(session: Session): boolean {
    return this.now() - session.lastActiveAt >= this.options.idleMs;
  }

  private clearIfIdle(sessionId: string): Promise<boolean> {
    return this.locks.runExclusive(sessionId, async () => {
      const session = this.sessions.get(sessionId);
      if (!session || !this.isIdle(session)) return false;
      console.error(`[session] Evicting idle session ${sessionId}`);
      return this.teardown(sessionId);
    });
  }

  /** Caller holds the session's lock. */
  private async teardown(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (this.options.dataDir && SESSION_ID_PATTERN.test(sessionId)) {
      deleteHistory(this.options.dataDir, sessionId);
    }
    if (!session) return false;

    this.sessions.delete(sessionId);
    await session.bridge.close();
    console.error(`[session] Cleared session ${sessionId} (${this.sessions.size} live)`);
    return true;
  }

  private mintId(): string {
    let id = randomBytes(4).toString("hex");
    while (this.sessions.has(id)) {
      id = randomBytes(4).toString("hex");
    }
    return id;
  }

  private persist(session: Session): void {
    if (!this.options.dataDir) return;
    try {
      saveHistory(this.options.dataDir, session.id, session.history);
    } catch (err) {
      console.error(
        `[session] Could not cache history for ${session.id}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
