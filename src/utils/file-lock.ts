/**
 * File Locking Utility
 *
 * Lock files (.lock suffix) recording the owning process. A lock held by a
 * process that is no longer alive is treated as stale and reclaimed.
 *
 * The lock content is written to a private temp file first and then
 * hard-linked into place, so a lock file is never observed half-written.
 */

import { randomUUID } from "node:crypto";
import { linkSync, mkdirSync, readFileSync, unlinkSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { hostname } from "node:os";
import { z } from "zod";

// ============================================================================
// TYPES
// ============================================================================

const LockInfoSchema = z.object({
  pid: z.number().int(),
  sessionId: z.string().optional(),
  acquiredAt: z.number(),
  hostname: z.string().optional(),
});

type LockInfo = z.infer<typeof LockInfoSchema>;

/**
 * Result of a lock acquisition attempt.
 */
export interface LockResult {
  acquired: boolean;
  lockPath: string;
  /** Reason the lock wasn't acquired */
  error?: string;
  /** Process holding the lock (if not acquired) */
  holder?: LockInfo;
}

// ============================================================================
// CONSTANTS
// ============================================================================

const LOCK_SUFFIX = ".lock";

// ============================================================================
// LOCK FUNCTIONS
// ============================================================================

function getLockPath(filePath: string): string {
  return `${filePath}${LOCK_SUFFIX}`;
}

/**
 * Narrow an unknown error to a Node errno code.
 */
export function hasErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function readHolder(lockPath: string): LockInfo | null {
  try {
    const parsed = LockInfoSchema.safeParse(JSON.parse(readFileSync(lockPath, "utf-8")));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT")) return null;
    if (error instanceof SyntaxError) return null;
    throw error;
  }
}

function removeLockFile(lockPath: string): void {
  try {
    unlinkSync(lockPath);
  } catch (error) {
    if (!hasErrnoCode(error, "ENOENT")) throw error;
  }
}

/**
 * Try to acquire a lock on a file without waiting.
 *
 * @param filePath - Path to the file to lock
 * @param sessionId - Optional session ID recorded in the lock
 */
export function tryAcquireLock(filePath: string, sessionId?: string): LockResult {
  const lockPath = getLockPath(filePath);
  mkdirSync(dirname(lockPath), { recursive: true });

  const lockInfo: LockInfo = {
    pid: process.pid,
    sessionId,
    acquiredAt: Date.now(),
    hostname: hostname(),
  };

  const tempPath = `${lockPath}.${process.pid}.${randomUUID()}.tmp`;
  writeFileSync(tempPath, JSON.stringify(lockInfo, null, 2), { flag: "wx" });
  try {
    return acquireFromTemp(lockPath, tempPath);
  } finally {
    removeLockFile(tempPath);
  }
}

function acquireFromTemp(lockPath: string, tempPath: string): LockResult {
  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      // Fails with EEXIST if another holder got there first
      linkSync(tempPath, lockPath);
      return { acquired: true, lockPath };
    } catch (error) {
      if (!hasErrnoCode(error, "EEXIST")) {
        return {
          acquired: false,
          lockPath,
          error: `Failed to acquire lock: ${error instanceof Error ? error.message : String(error)}`,
        };
      }
    }

    const holder = readHolder(lockPath);
    if (holder && isProcessAlive(holder.pid)) {
      return {
        acquired: false,
        lockPath,
        error: `File is locked by process ${holder.pid}`,
        holder,
      };
    }

    // Dead holder or unparsable content
    removeLockFile(lockPath);
  }

  return { acquired: false, lockPath, error: "Lock was re-taken while reclaiming a stale lock" };
}

/**
 * Release a lock held by this process.
 *
 * @returns True if the lock is no longer held by anyone
 */
export function releaseLock(filePath: string, options: { force?: boolean } = {}): boolean {
  const lockPath = getLockPath(filePath);
  const holder = readHolder(lockPath);

  if (holder && holder.pid !== process.pid && !options.force) {
    return false;
  }

  removeLockFile(lockPath);
  return true;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Check if a process is still alive.
 */
function isProcessAlive(pid: number): boolean {
  try {
    // Signal 0 only checks for existence
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return hasErrnoCode(error, "EPERM");
  }
}
