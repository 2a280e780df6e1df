import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, join, resolve } from "path";
import type { z } from "zod";
import { StoreCorrupt } from "./errors.js";

// ── Data directory layout ───────────────────────────────────

export const CONFIG_FILE = "config.json";
export const ROADMAP_FILE = "roadmap.json";
export const PROPOSALS_FILE = "proposals.json";
export const MANUAL_LOG = "manual.jsonl";
export const ACTIVITIES_DIR = "activities";
export const LOCK_FILE = "daybook.lock";

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return resolve(expandHome(env.DAYBOOK_HOME || join(homedir(), ".daybook")));
}

export function resolveConfigPath(dataDir: string, env: NodeJS.ProcessEnv = process.env): string {
  return env.DAYBOOK_CONFIG ? resolve(expandHome(env.DAYBOOK_CONFIG)) : join(dataDir, CONFIG_FILE);
}

export function ensureDir(dir: string): string {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return dir;
}

// ── JSON files ──────────────────────────────────────────────

/** Reads and validates a JSON file; null when it does not exist. */
export function readJsonFile<S extends z.ZodTypeAny>(file: string, schema: S): z.output<S> | null {
  if (!existsSync(file)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8"));
  } catch (error) {
    throw new StoreCorrupt(file, error instanceof Error ? error.message : String(error));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i: z.ZodIssue) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new StoreCorrupt(file, detail);
  }
  return parsed.data;
}

export interface PendingWrite {
  file: string;
  tmp: string;
}

/** Writes `data` next to `file` without touching `file` itself. */
export function stageJson(file: string, data: unknown): PendingWrite {
  ensureDir(dirname(file));
  const tmp = `${file}.${process.pid}.tmp`;
  writeFileSync(tmp, JSON.stringify(data, null, 2) + "\n");
  return { file, tmp };
}

/** Renames every staged file into place. Call only once all of them were staged. */
export function commitWrites(writes: PendingWrite[]): void {
  for (const w of writes) {
    renameSync(w.tmp, w.file);
  }
}

export function discardWrites(writes: PendingWrite[]): void {
  for (const w of writes) {
    rmSync(w.tmp, { force: true });
  }
}

/**
 * Stages all writes, then commits them. If any staging step fails nothing is
 * renamed and the temp files are removed.
 */
export function writeJsonFilesAtomically(entries: Array<{ file: string; data: unknown }>): void {
  const staged: PendingWrite[] = [];
  try {
    for (const e of entries) {
      staged.push(stageJson(e.file, e.data));
    }
  } catch (error) {
    discardWrites(staged);
    throw error;
  }
  commitWrites(staged);
}

export function writeJsonAtomic(file: string, data: unknown): void {
  writeJsonFilesAtomically([{ file, data }]);
}
