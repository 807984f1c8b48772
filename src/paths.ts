/**
 * Data directory layout. All modules derive file locations from here to
 * prevent drift.
 *
 *   <dataDir>/sessions/<id>.json   cached turn history per session
 *   <dataDir>/pronunciation.yaml   optional TTS pronunciation dictionary
 */

import { existsSync, lstatSync, mkdirSync, writeFileSync } from "fs";
import { join } from "path";

export function sessionsDir(dataDir: string): string {
  return join(dataDir, "sessions");
}

export function sessionHistoryPath(dataDir: string, sessionId: string): string {
  return join(sessionsDir(dataDir), `${sessionId}.json`);
}

export function pronunciationPath(dataDir: string): string {
  return join(dataDir, "pronunciation.yaml");
}

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Write that refuses to follow symlinks. The default data dir lives in /tmp,
 * where paths are predictable.
 */
export function safeWriteFileSync(filePath: string, content: string): void {
  if (lstatSync(filePath, { throwIfNoEntry: false })?.isSymbolicLink()) {
    throw new Error(`Refusing to write ${filePath}: it is a symlink`);
  }
  writeFileSync(filePath, content, { mode: 0o600 });
}
