import { closeSync, openSync, readFileSync, rmSync, statSync, writeSync } from "fs";
import { join } from "path";
import { z } from "zod";
import * as log from "./log.js";
import { LockHeld } from "./errors.js";
import { ensureDir, LOCK_FILE } from "./store.js";

const lockInfoSchema = z.object({
  pid: z.number().int(),
  acquiredAt: z.string(),
});

export type LockInfo = z.infer<typeof lockInfoSchema>;

export interface LockHandle {
  readonly file: string;
  readonly info: LockInfo;
  release(): void;
}

export function lockPath(dataDir: string): string {
  return join(dataDir, LOCK_FILE);
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

/** Holder of an existing lock; null when the file is unreadable. */
export function readLock(file: string): LockInfo | null {
  try {
    const parsed = lockInfoSchema.safeParse(JSON.parse(readFileSync(file, "utf-8")));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function lockAge(file: string, info: LockInfo | null, now: Date): number {
  const acquired = info ? Date.parse(info.acquiredAt) : NaN;
  if (!Number.isNaN(acquired)) return now.getTime() - acquired;
  try {
    return now.getTime() - statSync(file).mtimeMs;
  } catch {
    return Infinity;   // released between the two calls
  }
}

function tryCreate(file: string, info: LockInfo): boolean {
  let fd: number;
  try {
    fd = openSync(file, "wx");
  } catch (error) {
    if (isAlreadyExists(error)) return false;
    throw error;
  }
  try {
    writeSync(fd, JSON.stringify(info) + "\n");
  } finally {
    closeSync(fd);
  }
  return true;
}

/**
 * Takes the data directory lock. Returns null while another process holds
 * it; a lock older than `staleMinutes` is taken over.
 */
export function acquireLock(dataDir: string, staleMinutes: number, now: Date = new Date()): LockHandle | null {
  ensureDir(dataDir);
  const file = lockPath(dataDir);
  const info: LockInfo = { pid: process.pid, acquiredAt: now.toISOString() };

  if (!tryCreate(file, info)) {
    const holder = readLock(file);
    if (lockAge(file, holder, now) < staleMinutes * 60_000) return null;
    log.warn(`Taking over stale lock ${file}${holder ? ` (pid ${holder.pid}, ${holder.acquiredAt})` : ""}`);
    rmSync(file, { force: true });
    if (!tryCreate(file, info)) return null;
  }

  let released = false;
  return {
    file,
    info,
    release() {
      if (released) return;
      released = true;
      // Leave the file alone if someone took it over in the meantime.
      const current = readLock(file);
      if (current === null || (current.pid === info.pid && current.acquiredAt === info.acquiredAt)) {
        rmSync(file, { force: true });
      }
    },
  };
}

/** Runs `fn` under the lock, or throws LockHeld. */
export function withLock<T>(dataDir: string, staleMinutes: number, fn: () => T, now: Date = new Date()): T {
  const lock = acquireLock(dataDir, staleMinutes, now);
  if (!lock) {
    const holder = readLock(lockPath(dataDir));
    throw new LockHeld(lockPath(dataDir), holder ? `pid ${holder.pid} since ${holder.acquiredAt}` : "unknown holder");
  }
  try {
    return fn();
  } finally {
    lock.release();
  }
}
