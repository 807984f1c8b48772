/**
 * Text preprocessing before synthesis.
 *
 * Agent replies are written for a terminal: markdown emphasis, code fences,
 * bullets and links read badly aloud. `prepareForSpeech` strips that markup
 * and then applies the pronunciation dictionary.
 *
 * Dictionary: <dataDir>/pronunciation.yaml, re-read when its mtime changes.
 *
 *   tech:
 *     TypeScript: "Type Script"
 *   acronyms:
 *     API: "A P I"
 *
 * Categories are only for grouping. Replacements are case-insensitive and
 * whole-word.
 */

import { existsSync, readFileSync, statSync } from "fs";
import { errorMessage } from "./errors";
import { pronunciationPath } from "./paths";

interface PronunciationEntry {
  pattern: RegExp;
  replacement: string;
}

interface DictionaryCache {
  path: string;
  mtime: number;
  entries: PronunciationEntry[];
}

let cache: DictionaryCache | null = null;

/**
 * Parse the flat two-level YAML dictionary. Not a general YAML parser.
 */
export function parseDictionary(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  let inCategory = false;

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    if (/^[a-z_]+:\s*$/i.test(trimmed)) {
      inCategory = true;
      continue;
    }

    if (inCategory && trimmed.includes(":")) {
      const colonIdx = trimmed.indexOf(":");
      const key = trimmed.slice(0, colonIdx).trim();
      let value = trimmed.slice(colonIdx + 1).trim();
      if (
        (value.startsWith('"') && value.endsWith('"')) ||
        (value.startsWith("'") && value.endsWith("'"))
      ) {
        value = value.slice(1, -1);
      }
      if (key && value) {
        result[key] = value;
      }
    }
  }

  return result;
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildEntries(dict: Record<string, string>): PronunciationEntry[] {
  return Object.entries(dict).map(([term, replacement]) => ({
    pattern: new RegExp(`\\b${escapeRegex(term)}\\b`, "gi"),
    replacement,
  }));
}

function loadEntries(dataDir: string): PronunciationEntry[] {
  const path = pronunciationPath(dataDir);
  if (!existsSync(path)) return [];

  try {
    const mtime = statSync(path).mtimeMs;
    if (cache && cache.path === path && cache.mtime === mtime) {
      return cache.entries;
    }
    const entries = buildEntries(parseDictionary(readFileSync(path, "utf-8")));
    cache = { path, mtime, entries };
    console.error(`[tts] Loaded ${entries.length} pronunciation entries from ${path}`);
    return entries;
  } catch (err) {
    console.error(`[tts] Could not read ${path}: ${errorMessage(err)}`);
    return cache && cache.path === path ? cache.entries : [];
  }
}

export function applyPronunciation(text: string, dataDir: string): string {
  const entries = loadEntries(dataDir);
  let result = text;
  for (const { pattern, replacement } of entries) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

/** Remove markdown markup, keeping the words. */
export function stripMarkdown(text: string): string {
  return text
    .replace(/```[^\n]*\n?/g, "")
    .replace(/`([^`]*)`/g, "$1")
    .replace(/!\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/^[ \t]{0,3}#{1,6}[ \t]+/gm, "")
    .replace(/^[ \t]*>[ \t]?/gm, "")
    .replace(/^[ \t]*[-*+][ \t]+/gm, "")
    .replace(/\*\*(.*?)\*\*/g, "$1")
    .replace(/\b__(.*?)__\b/g, "$1")
    .replace(/\*(\S(?:.*?\S)?)\*/g, "$1")
    .replace(/\b_(\S(?:.*?\S)?)_\b/g, "$1")
    .replace(/~~(.*?)~~/g, "$1")
    .replace(/[ \t]+/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function prepareForSpeech(text: string, dataDir: string | null): string {
  const plain = stripMarkdown(text);
  return dataDir ? applyPronunciation(plain, dataDir) : plain;
}

/** Forget the cached dictionary (for testing). */
export function resetPronunciationCache(): void {
  cache = null;
}
