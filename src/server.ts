#!/usr/bin/env node
/**
 * voicebridge HTTP coordinator.
 *
 * Wires config → broker + session store + STT/TTS adapters → HTTP routes,
 * starts the sweeps, and tears every agent process down on SIGINT/SIGTERM.
 */

import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { close, createHttpServer, listen } from "./http-server";
import { ensureDir } from "./paths";
import { buildDeps } from "./runtime";
import { getBackend } from "./stt";

async function main(): Promise<void> {
  const config = loadConfig();
  ensureDir(config.dataDir);
  const deps = buildDeps(config);

  // Detect the STT backend early so it is logged on startup
  try {
    await getBackend(config.stt);
  } catch (err: unknown) {
    console.error("[voicebridge] Warning: no STT backend available, voice routes will fail");
    console.error(`[voicebridge]   ${errorMessage(err)}`);
  }

  deps.broker.start(config.broker.reapIntervalMs);
  deps.sessions.start(config.broker.reapIntervalMs);

  const server = createHttpServer(deps);
  const port = await listen(server, config.port, config.host);
  console.error(
    `[voicebridge] Listening on http://${config.host}:${port}, agent: ${config.agent.command} ${config.agent.args.join(" ")} (${config.agent.completion})`,
  );

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.error(`[voicebridge] ${signal} received, shutting down`);
    deps.broker.stop();
    await deps.sessions.shutdown();
    await close(server);
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        console.error(`[voicebridge] Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
    });
  }
}

main().catch((err) => {
  console.error("[voicebridge] Fatal:", err);
  process.exit(1);
});
