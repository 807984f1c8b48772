/**
 * In-process stand-in for an agent subprocess. Lines written to `input` are
 * handed to `respond`, whose return value (if any) is emitted on `output`.
 */

import { PassThrough } from "stream";
import type { AgentProcess, ExitInfo, SpawnAgent } from "../../agent-process";

export type Responder = (line: string, agent: FakeAgent) => string | null | void;

let nextPid = 1000;

export class FakeAgent implements AgentProcess {
  readonly pid = nextPid++;
  readonly input = new PassThrough();
  readonly output = new PassThrough();
  readonly errors = new PassThrough();
  readonly exited: Promise<ExitInfo>;
  readonly received: string[] = [];
  readonly signals: NodeJS.Signals[] = [];
  /** Ignore SIGTERM (only SIGKILL ends it). */
  stubborn = false;
  private alive = true;
  private resolveExit: (exit: ExitInfo) => void = () => {};
  private pending = "";

  constructor(private readonly respond: Responder) {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
    this.input.on("data", (chunk: Buffer) => {
      this.pending += chunk.toString("utf-8");
      let idx = this.pending.indexOf("\n");
      while (idx !== -1) {
        const line = this.pending.slice(0, idx);
        this.pending = this.pending.slice(idx + 1);
        this.received.push(line);
        const reply = this.respond(line, this);
        if (typeof reply === "string") this.emit(reply);
        idx = this.pending.indexOf("\n");
      }
    });
  }

  emit(text: string): void {
    if (this.alive) this.output.write(text);
  }

  isAlive(): boolean {
    return this.alive;
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): void {
    this.signals.push(signal);
    if (signal === "SIGTERM" && this.stubborn) return;
    this.exit({ code: null, signal });
  }

  /** Simulate the process dying on its own. */
  crash(code = 1): void {
    this.exit({ code, signal: null });
  }

  private exit(info: ExitInfo): void {
    if (!this.alive) return;
    this.alive = false;
    this.resolveExit(info);
  }
}

/** Spawner that records every agent it creates. */
export function fakeSpawner(respond: Responder): { spawn: SpawnAgent; agents: FakeAgent[] } {
  const agents: FakeAgent[] = [];
  return {
    agents,
    spawn: () => {
      const agent = new FakeAgent(respond);
      agents.push(agent);
      return agent;
    },
  };
}

/** Agent that echoes each line back, then re-prints its "> " prompt. */
export const echoResponder: Responder = (line) => `You said: ${line}\n> `;
