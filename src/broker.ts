/**
 * Voice request broker: hands one "please get spoken input" request to
 * exactly one recording surface and carries the transcript back to the
 * requester.
 *
 *   pending --claim--> claimed --begin--> recording_submitted
 *   claimed | recording_submitted --submit(ok)--> completed
 *   claimed | recording_submitted --submit(err)--> failed
 *   pending | claimed | recording_submitted --overall deadline--> timed_out
 *   claimed --claim deadline--> pending (once), then timed_out
 *
 * Every operation is synchronous: deadline checks and the transition they
 * guard run in one turn of the event loop, so no other caller can observe or
 * act on the entry in between. That makes claim single-winner without a lock.
 *
 * Requests live in memory only. The sweep (reap) reverts abandoned claims,
 * times out stale requests and drops terminal ones once retrieved or past the
 * retention window.
 */

import { randomBytes } from "crypto";

export type VoiceRequestState =
  | "pending"
  | "claimed"
  | "recording_submitted"
  | "completed"
  | "failed"
  | "timed_out";

const TERMINAL: ReadonlySet<VoiceRequestState> = new Set(["completed", "failed", "timed_out"]);

export function isTerminal(state: VoiceRequestState): boolean {
  return TERMINAL.has(state);
}

export interface VoiceRequest {
  id: string;
  language: string;
  state: VoiceRequestState;
  transcript: string | null;
  error: string | null;
  createdAt: number;
  overallDeadline: number;
  /** Set while claimed; cleared on revert. */
  claimDeadline: number | null;
  claimToken: string | null;
  /** How many times an abandoned claim has been reverted to pending. */
  reverts: number;
  /** The requester has observed the terminal state. */
  retrieved: boolean;
  settledAt: number | null;
}

export interface PendingRequest {
  id: string;
  language: string;
}

export type ClaimResult =
  | { status: "claimed"; claimToken: string; claimDeadline: number }
  | { status: "already_claimed" }
  | { status: "not_found" }
  | { status: "expired" };

export type BeginSubmissionResult =
  | { status: "ok"; language: string }
  | { status: "not_found" }
  | { status: "wrong_state"; state: VoiceRequestState };

export type SubmitOutcome = { transcript: string } | { error: string };

export type SubmitResult =
  | { status: "ok"; state: "completed" | "failed" }
  | { status: "not_found" }
  | { status: "wrong_state"; state: VoiceRequestState };

export type VoiceResult =
  | { status: "pending" }
  | { status: "claimed" }
  | { status: "recording_submitted" }
  | { status: "completed"; transcript: string }
  | { status: "failed"; error: string }
  | { status: "timed_out" }
  | { status: "not_found" };

export interface ReapReport {
  reverted: number;
  timedOut: number;
  removed: number;
}

export interface BrokerOptions {
  /** How long a claimant has to deliver audio before the claim lapses. */
  claimTimeoutMs: number;
  /** How long a terminal request is kept when nobody retrieves it. */
  retentionMs: number;
  /** Reverts allowed per request after an abandoned claim. Default 1. */
  maxReverts?: number;
  now?: () => number;
}

type Transition = "reverted" | "timed_out" | null;

export class VoiceRequestBroker {
  private requests = new Map<string, VoiceRequest>();
  private readonly claimTimeoutMs: number;
  private readonly retentionMs: number;
  private readonly maxReverts: number;
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: BrokerOptions) {
    this.claimTimeoutMs = options.claimTimeoutMs;
    this.retentionMs = options.retentionMs;
    this.maxReverts = options.maxReverts ?? 1;
    this.now = options.now ?? Date.now;
  }

  /** Insert a new pending request. Always succeeds. */
  createRequest(language: string, overallTimeoutMs: number): string {
    const id = randomBytes(8).toString("hex");
    const createdAt = this.now();
    this.requests.set(id, {
      id,
      language,
      state: "pending",
      transcript: null,
      error: null,
      createdAt,
      overallDeadline: createdAt + overallTimeoutMs,
      claimDeadline: null,
      claimToken: null,
      reverts: 0,
      retrieved: false,
      settledAt: null,
    });
    console.error(`[broker] Created request ${id} (language=${language}, timeout=${overallTimeoutMs}ms)`);
    return id;
  }

  /** Unexpired pending requests, in creation order. */
  listPending(): PendingRequest[] {
    const now = this.now();
    const pending: PendingRequest[] = [];
    for (const req of this.requests.values()) {
      this.refresh(req, now);
      if (req.state === "pending") {
        pending.push({ id: req.id, language: req.language });
      }
    }
    return pending;
  }

  /** Single-winner pending → claimed transition. */
  claim(requestId: string): ClaimResult {
    const req = this.requests.get(requestId);
    if (!req) return { status: "not_found" };

    const now = this.now();
    this.refresh(req, now);

    if (req.state === "timed_out") return { status: "expired" };
    if (req.state !== "pending") return { status: "already_claimed" };

    const claimToken = randomBytes(8).toString("hex");
    const claimDeadline = Math.min(now + this.claimTimeoutMs, req.overallDeadline);
    req.state = "claimed";
    req.claimToken = claimToken;
    req.claimDeadline = claimDeadline;
    console.error(`[broker] Request ${requestId} claimed`);
    return { status: "claimed", claimToken, claimDeadline };
  }

  /**
   * Audio has arrived from the claimant: claimed → recording_submitted.
   * From here only the overall deadline applies.
   */
  beginSubmission(requestId: string, claimToken?: string): BeginSubmissionResult {
    const req = this.requests.get(requestId);
    if (!req) return { status: "not_found" };

    this.refresh(req, this.now());
    if (req.state !== "claimed" || !this.tokenMatches(req, claimToken)) {
      return { status: "wrong_state", state: req.state };
    }

    req.state = "recording_submitted";
    req.claimDeadline = null;
    return { status: "ok", language: req.language };
  }

  /**
   * Resolve a claimed request. Rejected without side effects unless the
   * request is in its claimed phase and, when given, the token matches.
   */
  submitResult(requestId: string, outcome: SubmitOutcome, claimToken?: string): SubmitResult {
    const req = this.requests.get(requestId);
    if (!req) return { status: "not_found" };

    const now = this.now();
    this.refresh(req, now);
    const inClaimedPhase = req.state === "claimed" || req.state === "recording_submitted";
    if (!inClaimedPhase || !this.tokenMatches(req, claimToken)) {
      return { status: "wrong_state", state: req.state };
    }

    if ("transcript" in outcome) {
      req.state = "completed";
      req.transcript = outcome.transcript;
      console.error(`[broker] Request ${requestId} completed (${outcome.transcript.length} chars)`);
    } else {
      req.state = "failed";
      req.error = outcome.error;
      console.error(`[broker] Request ${requestId} failed: ${outcome.error}`);
    }
    req.claimDeadline = null;
    req.settledAt = now;
    return { status: "ok", state: req.state };
  }

  /** Non-blocking read. Observing a terminal state marks it for removal. */
  getResult(requestId: string): VoiceResult {
    const req = this.requests.get(requestId);
    if (!req) return { status: "not_found" };

    this.refresh(req, this.now());
    switch (req.state) {
      case "pending":
        return { status: "pending" };
      case "claimed":
        return { status: "claimed" };
      case "recording_submitted":
        return { status: "recording_submitted" };
      case "completed":
        req.retrieved = true;
        return { status: "completed", transcript: req.transcript ?? "" };
      case "failed":
        req.retrieved = true;
        return { status: "failed", error: req.error ?? "unknown error" };
      case "timed_out":
        req.retrieved = true;
        return { status: "timed_out" };
    }
  }

  /** Apply every due deadline and drop settled requests. */
  reap(): ReapReport {
    const now = this.now();
    const report: ReapReport = { reverted: 0, timedOut: 0, removed: 0 };

    for (const [id, req] of this.requests) {
      const transition = this.refresh(req, now);
      if (transition === "reverted") report.reverted++;
      if (transition === "timed_out") report.timedOut++;

      if (isTerminal(req.state)) {
        const settledAt = req.settledAt ?? now;
        if (req.retrieved || now - settledAt >= this.retentionMs) {
          this.requests.delete(id);
          report.removed++;
        }
      }
    }

    if (report.reverted || report.timedOut || report.removed) {
      console.error(
        `[broker] Sweep: ${report.reverted} reverted, ${report.timedOut} timed out, ${report.removed} removed (${this.requests.size} left)`,
      );
    }
    return report;
  }

  /** Start the periodic sweep. Safe to call more than once. */
  start(intervalMs: number): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.reap(), intervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /** Copy of a request's record, for diagnostics. */
  inspect(requestId: string): VoiceRequest | null {
    const req = this.requests.get(requestId);
    return req ? { ...req } : null;
  }

  /** Count of tracked requests per state. */
  stats(): Record<VoiceRequestState, number> {
    const counts: Record<VoiceRequestState, number> = {
      pending: 0,
      claimed: 0,
      recording_submitted: 0,
      completed: 0,
      failed: 0,
      timed_out: 0,
    };
    for (const req of this.requests.values()) counts[req.state]++;
    return counts;
  }

  get size(): number {
    return this.requests.size;
  }

  private tokenMatches(req: VoiceRequest, claimToken: string | undefined): boolean {
    return claimToken === undefined || claimToken === req.claimToken;
  }

  /** Move `req` along any deadline that has passed at `now`. */
  private refresh(req: VoiceRequest, now: number): Transition {
    if (isTerminal(req.state)) return null;

    if (now >= req.overallDeadline) {
      this.timeOut(req, now);
      return "timed_out";
    }

    if (req.state === "claimed" && req.claimDeadline !== null && now >= req.claimDeadline) {
      if (req.reverts < this.maxReverts) {
        req.state = "pending";
        req.reverts++;
        req.claimDeadline = null;
        req.claimToken = null;
        console.error(`[broker] Claim on ${req.id} lapsed, back to pending`);
        return "reverted";
      }
      this.timeOut(req, now);
      return "timed_out";
    }

    return null;
  }

  private timeOut(req: VoiceRequest, now: number): void {
    console.error(`[broker] Request ${req.id} timed out (was ${req.state})`);
    req.state = "timed_out";
    req.claimDeadline = null;
    req.claimToken = null;
    req.settledAt = now;
  }
}
