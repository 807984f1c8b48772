/**
 * Conversational agent subprocess handle.
 *
 * Wraps child_process behind a small interface (input, output, exited) so the
 * bridge can be driven by a real process or an in-memory stand-in. Whoever
 * spawns a handle releases it with `terminate`, which always ends in an exit:
 * SIGTERM first, SIGKILL once the grace period runs out.
 */

import { spawn } from "child_process";
import type { EventEmitter } from "events";
import type { Readable, Writable } from "stream";

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started at all. */
  error?: Error;
}

export interface AgentProcess {
  readonly pid: number | undefined;
  readonly input: Writable;
  readonly output: Readable;
  readonly errors: Readable | null;
  /** Resolves once, when the process is gone. Never rejects. */
  readonly exited: Promise<ExitInfo>;
  isAlive(): boolean;
  kill(signal?: NodeJS.Signals): void;
}

export type SpawnAgent = () => AgentProcess;

export interface SpawnOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function spawnAgentProcess(
  command: string,
  args: string[],
  options: SpawnOptions = {},
): AgentProcess {
  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env ?? { ...process.env },
    stdio: ["pipe", "pipe", "pipe"],
  });

  const { exited, isAlive } = trackExit(child);

  // Writes racing a dying process fail with EPIPE; the exit path reports it
  child.stdin.on("error", (err) => {
    console.error(`[bridge] Agent stdin error: ${err.message}`);
  });

  return {
    pid: child.pid,
    input: child.stdin,
    output: child.stdout,
    errors: child.stderr,
    exited,
    isAlive,
    kill: (signal: NodeJS.Signals = "SIGTERM") => {
      if (isAlive()) child.kill(signal);
    },
  };
}

/**
 * Follow a child's lifetime through its "exit" and "error" events. The error
 * listener stays attached for the child's whole life: a live child can emit
 * "error" more than once (a failed kill, for one).
 */
export function trackExit(child: EventEmitter & { readonly pid?: number }): {
  exited: Promise<ExitInfo>;
  isAlive: () => boolean;
} {
  let alive = true;
  const exited = new Promise<ExitInfo>((resolve) => {
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      alive = false;
      resolve({ code, signal });
    });
    child.on("error", (error: Error) => {
      // Spawn failures emit "error" without "exit"
      if (child.pid === undefined) {
        alive = false;
        resolve({ code: null, signal: null, error });
      } else {
        console.error(`[bridge] Agent process ${child.pid} error: ${error.message}`);
      }
    });
  });
  return { exited, isAlive: () => alive };
}

/**
 * Stop an agent process: close its input, SIGTERM, then SIGKILL after
 * `graceMs`. Resolves when the process has exited. Idempotent.
 */
export async function terminate(proc: AgentProcess, graceMs: number): Promise<ExitInfo> {
  if (!proc.isAlive()) return proc.exited;

  proc.input.end();
  proc.kill("SIGTERM");

  let timer: ReturnType<typeof setTimeout> | undefined;
  const graceElapsed = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), graceMs);
  });
  try {
    const exit = await Promise.race([proc.exited, graceElapsed]);
    if (exit) return exit;
  } finally {
    clearTimeout(timer);
  }

  console.error(`[bridge] Agent process ${proc.pid ?? "?"} ignored SIGTERM, sending SIGKILL`);
  proc.kill("SIGKILL");
  return proc.exited;
}
