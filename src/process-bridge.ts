/**
 * Process bridge: one long-running conversational agent process, driven one
 * turn at a time.
 *
 * send turn → write one line to the agent's stdin → read stdout until the
 * completion policy says the reply is finished (or the turn times out).
 *
 * Invariants:
 *   - at most one turn in flight; a second concurrent sendTurn is a conflict
 *   - output that arrives outside a turn is never merged into a reply: it is
 *     drained before the next write and reported as discardedOutput
 *   - a dead process is replaced before the next write; a process that dies
 *     mid-turn is replaced and the turn retried once
 *   - a timed-out turn leaves the process running
 */

import { createInterface } from "readline";
import { StringDecoder } from "string_decoder";
import { terminate, type AgentProcess, type ExitInfo, type SpawnAgent } from "./agent-process";
import type { CompletionDetector, CompletionPolicy } from "./completion";
import { BridgeError, isBridgeError } from "./errors";

export interface ProcessBridgeOptions {
  spawn: SpawnAgent;
  policy: CompletionPolicy;
  killGraceMs: number;
  /** Tag used in log lines, usually the session id. */
  label?: string;
}

export interface TurnReply {
  reply: string;
  /** A fresh process was started for this turn; it has no memory of earlier turns. */
  respawned: boolean;
  /** Output left over from an earlier, timed-out turn. */
  discardedOutput: string | null;
}

interface ActiveTurn {
  detector: CompletionDetector;
  resolve: (reply: string) => void;
  reject: (err: Error) => void;
  deadline: ReturnType<typeof setTimeout>;
  idle: ReturnType<typeof setTimeout> | null;
}

export class ProcessBridge {
  private proc: AgentProcess | null = null;
  private generation = 0;
  private decoder = new StringDecoder("utf8");
  private unread = "";
  private turnsThisProcess = 0;
  private active: ActiveTurn | null = null;
  private busy = false;
  private closed = false;
  private readonly label: string;

  constructor(private readonly options: ProcessBridgeOptions) {
    this.label = options.label ?? "agent";
  }

  get pid(): number | undefined {
    return this.proc?.pid;
  }

  get isBusy(): boolean {
    return this.busy;
  }

  isAlive(): boolean {
    return this.proc !== null && this.proc.isAlive();
  }

  /**
   * Make sure a live process exists. Returns true when a new one was spawned
   * to replace a dead one (a discontinuity in the conversation).
   */
  ensureProcess(): boolean {
    if (this.closed) {
      throw new BridgeError("not_found", `Session ${this.label} has been closed`);
    }
    if (this.proc && this.proc.isAlive()) return false;

    const replacing = this.proc !== null;
    if (replacing) {
      console.error(`[bridge] ${this.label}: agent process is gone, starting a new one (prior turns are not replayed)`);
    }
    this.start();
    return replacing;
  }

  /**
   * Send one turn and wait for its reply.
   *
   * @throws BridgeError conflict (turn already in flight), timeout,
   *   upstream_failure (agent died twice), invalid_input (blank turn)
   */
  async sendTurn(text: string, timeoutMs: number): Promise<TurnReply> {
    const line = text.replace(/\s*\r?\n\s*/g, " ").trim();
    if (line === "") {
      throw new BridgeError("invalid_input", "Turn text is empty");
    }
    if (this.busy) {
      throw new BridgeError("conflict", `Session ${this.label} already has a turn in flight`);
    }
    this.busy = true;

    try {
      let respawned = this.ensureProcess();
      const discardedOutput = this.drainUnread();

      try {
        const reply = await this.runTurn(line, timeoutMs);
        return { reply, respawned, discardedOutput };
      } catch (err) {
        if (!isBridgeError(err, "upstream_failure") || this.closed) throw err;
        console.error(`[bridge] ${this.label}: ${err.message}; respawning and retrying once`);
        respawned = this.ensureProcess() || respawned;
        this.drainUnread();
        const reply = await this.runTurn(line, timeoutMs);
        return { reply, respawned, discardedOutput };
      }
    } finally {
      this.busy = false;
    }
  }

  /** Terminate the process. Any turn in flight fails. Idempotent. */
  async close(graceMs: number = this.options.killGraceMs): Promise<void> {
    this.closed = true;
    this.settle((turn) => turn.reject(new BridgeError("upstream_failure", `Session ${this.label} was closed`)));
    const proc = this.proc;
    if (!proc) return;
    const exit = await terminate(proc, graceMs);
    console.error(`[bridge] ${this.label}: agent stopped (${describeExit(exit)})`);
  }

  private start(): void {
    const proc = this.options.spawn();
    const generation = ++this.generation;
    this.proc = proc;
    this.decoder = new StringDecoder("utf8");
    this.unread = "";
    this.turnsThisProcess = 0;

    proc.output.on("data", (chunk: Buffer | string) => {
      if (generation !== this.generation) return;
      const text = typeof chunk === "string" ? chunk : this.decoder.write(chunk);
      if (text !== "") this.onOutput(text);
    });

    if (proc.errors) {
      const rl = createInterface({ input: proc.errors });
      rl.on("line", (line) => {
        if (line.trim() !== "") console.error(`[bridge] ${this.label} stderr: ${line}`);
      });
    }

    void proc.exited.then((exit) => this.onExit(generation, exit));
    console.error(`[bridge] ${this.label}: agent process started (PID ${proc.pid ?? "?"})`);
  }

  private runTurn(line: string, timeoutMs: number): Promise<string> {
    const proc = this.proc;
    if (!proc) {
      return Promise.reject(new BridgeError("upstream_failure", "No agent process"));
    }

    return new Promise<string>((resolve, reject) => {
      const detector = this.options.policy.createDetector();
      const deadline = setTimeout(() => {
        this.settle((turn) =>
          turn.reject(new BridgeError("timeout", `No reply from agent within ${timeoutMs}ms`)),
        );
      }, timeoutMs);

      this.active = { detector, resolve, reject, deadline, idle: null };
      this.turnsThisProcess++;

      if (!proc.isAlive()) {
        this.settle((turn) => turn.reject(new BridgeError("upstream_failure", "Agent process exited")));
        return;
      }
      proc.input.write(`${line}\n`);
    });
  }

  private onOutput(text: string): void {
    const turn = this.active;
    if (!turn) {
      this.unread += text;
      return;
    }

    const done = turn.detector.push(text);
    if (done) {
      this.unread += done.remainder;
      this.settle((t) => t.resolve(done.reply));
      return;
    }

    const idleMs = turn.detector.idleMs;
    if (idleMs !== null) {
      if (turn.idle) clearTimeout(turn.idle);
      turn.idle = setTimeout(() => {
        const flushed = turn.detector.flush();
        if (flushed && this.active === turn) {
          this.settle((t) => t.resolve(flushed.reply));
        }
      }, idleMs);
    }
  }

  private onExit(generation: number, exit: ExitInfo): void {
    if (generation !== this.generation) return;
    console.error(`[bridge] ${this.label}: agent process exited (${describeExit(exit)})`);
    const reason = exit.error
      ? `Agent process failed to start: ${exit.error.message}`
      : `Agent process exited during turn (${describeExit(exit)})`;
    this.settle((turn) => turn.reject(new BridgeError("upstream_failure", reason)));
  }

  /** End the active turn, if any, clearing its timers first. */
  private settle(finish: (turn: ActiveTurn) => void): void {
    const turn = this.active;
    if (!turn) return;
    this.active = null;
    clearTimeout(turn.deadline);
    if (turn.idle) clearTimeout(turn.idle);
    finish(turn);
  }

  private drainUnread(): string | null {
    const leftover = this.unread;
    this.unread = "";
    if (leftover.trim() === "") return null;

    if (this.turnsThisProcess === 0) {
      console.error(`[bridge] ${this.label}: skipped ${leftover.length} chars of startup output`);
      return null;
    }
    console.error(`[bridge] ${this.label}: discarded ${leftover.length} chars of late output from a previous turn`);
    return leftover.trim();
  }
}

function describeExit(exit: ExitInfo): string {
  if (exit.error) return `error: ${exit.error.message}`;
  if (exit.signal) return `signal ${exit.signal}`;
  return `code ${exit.code}`;
}
