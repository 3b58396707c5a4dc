/**
 * Per-key lock files under `<root>/_meta/locks/`
 *
 * A lock is held by whoever creates the file with an exclusive open. A file
 * older than `staleMs` belongs to a writer that died mid-update and is
 * reclaimed.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { LockTimeoutError, errnoCode } from "../errors.js";
import { logger } from "../observability/logs.js";

export interface LockOptions {
  /** Give up after this long (default 10s) */
  timeoutMs?: number;
  /** Poll interval while another process holds the lock (default 5ms) */
  retryIntervalMs?: number;
  /** Age after which an abandoned lock file is removed (default 30s) */
  staleMs?: number;
}

const DEFAULTS: Required<LockOptions> = {
  timeoutMs: 10_000,
  retryIntervalMs: 5,
  staleMs: 30_000,
};

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class FileLock {
  readonly lockPath: string;
  #handle: fs.FileHandle | undefined;

  constructor(root: string, lockName: string) {
    this.lockPath = path.join(root, "_meta", "locks", lockName);
  }

  isAcquired(): boolean {
    return this.#handle !== undefined;
  }

  async acquire(options: LockOptions = {}): Promise<void> {
    if (this.#handle) {
      throw new Error(`Lock already held: ${this.lockPath}`);
    }
    const { timeoutMs, retryIntervalMs, staleMs } = { ...DEFAULTS, ...options };
    const deadline = Date.now() + timeoutMs;
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });

    for (;;) {
      try {
        const handle = await fs.open(this.lockPath, "wx");
        this.#handle = handle;
        await handle.writeFile(`${process.pid}\n`);
        return;
      } catch (err) {
        if (errnoCode(err) !== "EEXIST") {
          await this.release();
          throw err;
        }
      }

      if (await this.#reclaimIfStale(staleMs)) continue;
      if (Date.now() > deadline) {
        throw new LockTimeoutError(this.lockPath, timeoutMs);
      }
      await sleep(retryIntervalMs);
    }
  }

  async release(): Promise<void> {
    const handle = this.#handle;
    if (!handle) return;
    this.#handle = undefined;
    try {
      await handle.close();
    } finally {
      await fs.rm(this.lockPath, { force: true });
    }
  }

  async withLock<T>(fn: () => Promise<T>, options?: LockOptions): Promise<T> {
    await this.acquire(options);
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  async #reclaimIfStale(staleMs: number): Promise<boolean> {
    let age: number;
    try {
      age = Date.now() - (await fs.stat(this.lockPath)).mtimeMs;
    } catch (err) {
      // Holder released between our open and stat
      if (errnoCode(err) === "ENOENT") return true;
      throw err;
    }
    if (age < staleMs) return false;

    logger.warn("store.lock.stale", { details: { lock: this.lockPath, ageMs: Math.round(age) } });
    await fs.rm(this.lockPath, { force: true });
    return true;
  }
}
