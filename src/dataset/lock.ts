import fs from "fs";
import path from "path";

export const DEFAULT_STALE_LOCK_MS = 10 * 60 * 1000;

export type LockOptions = {
  staleMs?: number;
  now?: () => number;
};

const hasCode = (error: unknown, code: string) =>
  error instanceof Error && "code" in error && error.code === code;

const createLockFile = (lockPath: string, now: number) => {
  fs.writeFileSync(lockPath, JSON.stringify({ pid: process.pid, acquired_at: new Date(now).toISOString() }), {
    flag: "wx"
  });
};

const lockAge = (lockPath: string, now: number): number | null => {
  try {
    return now - fs.statSync(lockPath).mtimeMs;
  } catch (error) {
    if (hasCode(error, "ENOENT")) return null;
    throw error;
  }
};

const createOrReportLocked = (lockPath: string, now: number) => {
  try {
    createLockFile(lockPath, now);
  } catch (error) {
    if (hasCode(error, "EEXIST")) {
      throw new Error(`Dataset store is locked by another run (${lockPath})`);
    }
    throw error;
  }
};

/**
 * Single-writer lock over the integrated store and the report ledger. A second run fails
 * fast while the lock is held; a lock left behind longer than `staleMs` is replaced.
 */
export const acquireLock = (lockPath: string, options: LockOptions = {}): (() => void) => {
  const staleMs = options.staleMs ?? DEFAULT_STALE_LOCK_MS;
  const now = (options.now ?? Date.now)();
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  try {
    createLockFile(lockPath, now);
  } catch (error) {
    if (!hasCode(error, "EEXIST")) throw error;
    const age = lockAge(lockPath, now);
    if (age === null) {
      // Released between the create and the stat.
      createOrReportLocked(lockPath, now);
      return () => fs.rmSync(lockPath, { force: true });
    }
    if (age <= staleMs) {
      throw new Error(`Dataset store is locked by another run (${lockPath})`);
    }
    console.warn(`Replacing stale lock ${lockPath} (${Math.round(age / 1000)}s old)`);
    fs.rmSync(lockPath, { force: true });
    createLockFile(lockPath, now);
  }

  return () => fs.rmSync(lockPath, { force: true });
};

export const withLock = async <T>(lockPath: string, fn: () => Promise<T>, options: LockOptions = {}): Promise<T> => {
  const release = acquireLock(lockPath, options);
  try {
    return await fn();
  } finally {
    release();
  }
};
