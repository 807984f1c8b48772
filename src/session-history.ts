/**
 * Session history cache.
 *
 * Each session's turns are kept as a JSON file in <dataDir>/sessions/<id>.json.
 * The cache is for diagnostics and replay only: a respawned agent process is
 * never fed this history.
 */

import { existsSync, readFileSync, unlinkSync } from "fs";
import { z } from "zod";
import { ensureDir, safeWriteFileSync, sessionHistoryPath, sessionsDir } from "./paths";

const HistoryEntrySchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  at: z.string(),
});

const HistoryFileSchema = z.array(HistoryEntrySchema);

export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

/**
 * Save a session's history to disk. Returns the file path.
 */
export function saveHistory(dataDir: string, sessionId: string, history: HistoryEntry[]): string {
  ensureDir(sessionsDir(dataDir));
  const path = sessionHistoryPath(dataDir, sessionId);
  safeWriteFileSync(path, JSON.stringify(history, null, 2));
  return path;
}

/**
 * Load a session's cached history. Missing or malformed files yield [].
 */
export function loadHistory(dataDir: string, sessionId: string): HistoryEntry[] {
  const path = sessionHistoryPath(dataDir, sessionId);
  if (!existsSync(path)) return [];
  try {
    const parsed = HistoryFileSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
    if (!parsed.success) {
      console.error(`[session] Invalid history shape, ignoring: ${path}`);
      return [];
    }
    return parsed.data;
  } catch (err) {
    console.error(`[session] Failed to read history ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }
}

/** Remove a session's cached history, if any. */
export function deleteHistory(dataDir: string, sessionId: string): void {
  const path = sessionHistoryPath(dataDir, sessionId);
  if (existsSync(path)) {
    unlinkSync(path);
  }
}
