#!/usr/bin/env node
/**
 * One conversational turn from the command line.
 *
 *   npm run turn -- <input.wav> [output.wav]
 *
 * Transcribes the input, sends it to a fresh agent session, writes the
 * spoken reply (default response.wav) and tears the session down.
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import { loadConfig } from "./config";
import { voiceTurn } from "./conversation";
import { errorMessage } from "./errors";
import { buildDeps } from "./runtime";

const DEFAULT_OUTPUT = "response.wav";

function parseArgs(argv: string[]): { input: string; output: string } | null {
  const [input, output] = argv;
  if (!input) return null;
  return { input, output: output ?? DEFAULT_OUTPUT };
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error("Usage: npm run turn -- <input.wav> [output.wav]");
    return 1;
  }
  if (!existsSync(args.input)) {
    console.error(`[voicebridge] Input file not found: ${args.input}`);
    return 1;
  }

  const config = loadConfig();
  const deps = buildDeps(config);
  let sessionId: string | undefined;
  try {
    const turn = await voiceTurn(deps, new Uint8Array(readFileSync(args.input)));
    sessionId = turn.sessionId;
    writeFileSync(args.output, turn.audio);
    console.error(`[voicebridge] You said: ${turn.transcript}`);
    console.error(`[voicebridge] Reply: ${turn.reply}`);
    console.error(`[voicebridge] Audio written to ${args.output}`);
    return 0;
  } catch (err) {
    console.error(`[voicebridge] Error: ${errorMessage(err)}`);
    return 1;
  } finally {
    if (sessionId) await deps.sessions.clear(sessionId);
    await deps.sessions.shutdown();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("[voicebridge] Fatal:", err);
    process.exit(1);
  });
