/**
 * Checkpoint Store for the Graph Execution Engine
 *
 * Checkpoints are JSON envelopes kept in a keyed blob store, one blob per
 * session holding its latest snapshot:
 *
 * ```json
 * { "version": 1, "sessionId": "...", "seq": 4, "stage": "writer",
 *   "lastStage": "researcher", "state": { ... }, "savedAt": "..." }
 * ```
 *
 * Blob stores:
 * - MemoryBlobStore: Map storage (tests, single-process runs)
 * - FileBlobStore: one `<sessionId>.json` file per session, written via
 *   rename, with `.lock` files guarding exclusive session access
 *
 * Sessions are never removed implicitly; `prune()` is the only deletion path.
 */

import { mkdir, readFile, readdir, rename, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

import { hasErrnoCode, releaseLock, tryAcquireLock } from "../utils/file-lock.ts";
import { log, logWarn } from "../utils/logger.ts";
import {
  CheckpointCorruptError,
  GraphError,
  SessionLockedError,
} from "./errors.ts";
import type { StageId } from "./types.ts";

// ============================================================================
// BLOB STORE INTERFACE
// ============================================================================

export interface LockAttempt {
  acquired: boolean;
  holderPid?: number;
}

/**
 * Keyed blob persistence backing the checkpoint store.
 */
export interface BlobStore {
  put(id: string, blob: string): Promise<void>;
  /** Returns null when nothing is stored under `id` */
  get(id: string): Promise<string | null>;
  delete(id: string): Promise<void>;
  list(): Promise<string[]>;
  tryLock(id: string): Promise<LockAttempt>;
  unlock(id: string): Promise<void>;
}

// ============================================================================
// MEMORY BLOB STORE
// ============================================================================

/**
 * In-memory blob store.
 *
 * @example
 * ```typescript
 * const checkpoints = new CheckpointStore(new MemoryBlobStore());
 * ```
 */
export class MemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, string>();
  private readonly locks = new Set<string>();

  async put(id: string, blob: string): Promise<void> {
    this.blobs.set(id, blob);
  }

  async get(id: string): Promise<string | null> {
    return this.blobs.get(id) ?? null;
  }

  async delete(id: string): Promise<void> {
    this.blobs.delete(id);
  }

  async list(): Promise<string[]> {
    return [...this.blobs.keys()].sort();
  }

  async tryLock(id: string): Promise<LockAttempt> {
    if (this.locks.has(id)) {
      return { acquired: false, holderPid: process.pid };
    }
    this.locks.add(id);
    return { acquired: true };
  }

  async unlock(id: string): Promise<void> {
    this.locks.delete(id);
  }
}

// ============================================================================
// FILE BLOB STORE
// ============================================================================

const BLOB_EXTENSION = ".json";

/**
 * File-based blob store.
 *
 * Storage structure:
 * ```
 * baseDir/
 *   {sessionId}.json
 *   {sessionId}.json.lock   (while a traversal holds the session)
 * ```
 */
export class FileBlobStore implements BlobStore {
  constructor(private readonly baseDir: string) {}

  private getPath(id: string): string {
    return join(this.baseDir, `${id}${BLOB_EXTENSION}`);
  }

  async put(id: string, blob: string): Promise<void> {
    await mkdir(this.baseDir, { recursive: true });
    const target = this.getPath(id);
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, blob, "utf-8");
    await rename(temp, target);
  }

  async get(id: string): Promise<string | null> {
    try {
      return await readFile(this.getPath(id), "utf-8");
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT")) {
        return null;
      }
      throw error;
    }
  }

  async delete(id: string): Promise<void> {
    try {
      await unlink(this.getPath(id));
    } catch (error) {
      if (!hasErrnoCode(error, "ENOENT")) {
        throw error;
      }
    }
  }

  async list(): Promise<string[]> {
    try {
      const files = await readdir(this.baseDir);
      return files
        .filter((file) => file.endsWith(BLOB_EXTENSION))
        .map((file) => file.slice(0, -BLOB_EXTENSION.length))
        .sort();
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT")) {
        return [];
      }
      throw error;
    }
  }

  async tryLock(id: string): Promise<LockAttempt> {
    const result = tryAcquireLock(this.getPath(id), id);
    if (!result.acquired && result.error && !result.holder) {
      throw new GraphError(result.error);
    }
    return { acquired: result.acquired, holderPid: result.holder?.pid };
  }

  async unlock(id: string): Promise<void> {
    releaseLock(this.getPath(id));
  }
}

// ============================================================================
// CHECKPOINT STORE
// ============================================================================

export const CHECKPOINT_VERSION = 1;

const CheckpointSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  sessionId: z.string().min(1),
  seq: z.number().int().nonnegative(),
  /** Stage to run next, or TERMINAL */
  stage: z.string().min(1),
  /** Stage whose completion produced this checkpoint */
  lastStage: z.string().nullable(),
  /** Route label chosen after `lastStage`, when it had a conditional edge */
  lastLabel: z.string().optional(),
  state: z.record(z.unknown()),
  savedAt: z.string(),
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;

export interface CheckpointInput {
  /** JSON-serializable state record */
  state: object;
  stage: StageId;
  lastStage: StageId | null;
  lastLabel?: string;
  seq: number;
}

export type CheckpointSummary = Omit<Checkpoint, "state" | "version">;

const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function assertValidSessionId(sessionId: string): void {
  if (!SESSION_ID_PATTERN.test(sessionId)) {
    throw new GraphError(
      `Invalid session id "${sessionId}": use letters, digits, ".", "_" or "-"`,
    );
  }
}

/**
 * Session-keyed checkpoint persistence.
 *
 * @example
 * ```typescript
 * const store = new CheckpointStore(new FileBlobStore("~/.loopgraph/sessions"));
 * const release = await store.acquire("survey-1");
 * try {
 *   await store.save("survey-1", { state, stage: "writer", lastStage: "planner", seq: 1 });
 * } finally {
 *   await release();
 * }
 * ```
 */
export class CheckpointStore {
  constructor(readonly blobs: BlobStore) {}

  /**
   * Persist the latest snapshot for a session.
   *
   * @throws GraphError when `seq` does not advance past the stored sequence
   */
  async save(sessionId: string, input: CheckpointInput): Promise<Checkpoint> {
    assertValidSessionId(sessionId);
    const previous = await this.load(sessionId);
    if (previous && input.seq <= previous.seq) {
      throw new GraphError(
        `Checkpoint sequence for "${sessionId}" must increase (stored ${previous.seq}, got ${input.seq})`,
      );
    }

    const blob = JSON.stringify({
      version: CHECKPOINT_VERSION,
      sessionId,
      seq: input.seq,
      stage: input.stage,
      lastStage: input.lastStage,
      lastLabel: input.lastLabel,
      state: input.state,
      savedAt: new Date().toISOString(),
    });
    await this.blobs.put(sessionId, blob);
    log("Checkpoint", "saved", { sessionId, seq: input.seq, stage: input.stage });

    return this.decode(sessionId, blob);
  }

  /**
   * Load the latest checkpoint, or null when the session has none.
   *
   * @throws CheckpointCorruptError when the stored blob is not a valid checkpoint
   */
  async load(sessionId: string): Promise<Checkpoint | null> {
    assertValidSessionId(sessionId);
    const blob = await this.blobs.get(sessionId);
    return blob === null ? null : this.decode(sessionId, blob);
  }

  async exists(sessionId: string): Promise<boolean> {
    assertValidSessionId(sessionId);
    return (await this.blobs.get(sessionId)) !== null;
  }

  /**
   * Summaries of all stored sessions. Corrupt checkpoints are skipped.
   */
  async list(): Promise<CheckpointSummary[]> {
    const summaries: CheckpointSummary[] = [];
    for (const id of await this.blobs.list()) {
      try {
        const checkpoint = await this.load(id);
        if (checkpoint) {
          const { state: _state, version: _version, ...summary } = checkpoint;
          summaries.push(summary);
        }
      } catch (error) {
        if (!(error instanceof GraphError)) throw error;
        logWarn("Checkpoint", "skipped_unreadable", { sessionId: id, error: error.message });
      }
    }
    return summaries;
  }

  /**
   * Delete a session's checkpoint.
   *
   * @returns false when nothing was stored
   */
  async prune(sessionId: string): Promise<boolean> {
    const existed = await this.exists(sessionId);
    await this.blobs.delete(sessionId);
    log("Checkpoint", "pruned", { sessionId, existed });
    return existed;
  }

  /**
   * Take exclusive access to a session.
   *
   * @returns A function releasing the lock
   * @throws SessionLockedError when another traversal holds the session
   */
  async acquire(sessionId: string): Promise<() => Promise<void>> {
    assertValidSessionId(sessionId);
    const attempt = await this.blobs.tryLock(sessionId);
    if (!attempt.acquired) {
      throw new SessionLockedError(sessionId, attempt.holderPid);
    }
    let released = false;
    return async () => {
      if (released) return;
      released = true;
      await this.blobs.unlock(sessionId);
    };
  }

  private decode(sessionId: string, blob: string): Checkpoint {
    let raw: unknown;
    try {
      raw = JSON.parse(blob);
    } catch (error) {
      throw new CheckpointCorruptError(
        sessionId,
        error instanceof Error ? error.message : String(error),
      );
    }
    const parsed = CheckpointSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CheckpointCorruptError(
        sessionId,
        parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
        parsed.error,
      );
    }
    if (parsed.data.sessionId !== sessionId) {
      throw new CheckpointCorruptError(
        sessionId,
        `stored under "${sessionId}" but records "${parsed.data.sessionId}"`,
      );
    }
    return parsed.data;
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

export type CheckpointStoreType = "memory" | "file";

/**
 * Create a checkpoint store.
 *
 * @example
 * ```typescript
 * const memory = createCheckpointStore("memory");
 * const file = createCheckpointStore("file", { baseDir: "/tmp/sessions" });
 * ```
 */
export function createCheckpointStore(
  type: CheckpointStoreType,
  options: { baseDir?: string } = {},
): CheckpointStore {
  switch (type) {
    case "memory":
      return new CheckpointStore(new MemoryBlobStore());
    case "file":
      if (!options.baseDir) {
        throw new GraphError("A file checkpoint store needs a baseDir");
      }
      return new CheckpointStore(new FileBlobStore(options.baseDir));
  }
}
