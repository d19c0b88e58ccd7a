/**
 * Advisory single-writer lock for a vault.
 *
 * Write-class operations run inside {@link VaultLock.run}. Across processes
 * the lock is a proper-lockfile lock directory in the vault root; within one
 * process, top-level runs are queued and nested runs reuse the held lock.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import fs from "node:fs";
import path from "node:path";
import lockfile from "proper-lockfile";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { VaultBusyError, errnoCode, errorMessage, toIoFailure } from "./errors.js";
import { DIR_MODE } from "./fs-utils.js";

const log = createSubsystemLogger("lock");

export interface VaultLockOptions {
  /** Disable locking entirely */
  enabled?: boolean;
  /** Acquisition retries before giving up */
  retries?: number;
  /** Milliseconds after which an abandoned lock is considered stale */
  staleMs?: number;
}

export class VaultLock {
  private readonly scope = new AsyncLocalStorage<VaultLock>();
  private queue: Promise<void> = Promise.resolve();
  private held = false;
  private readonly enabled: boolean;
  private readonly retries: number;
  private readonly staleMs: number;

  constructor(
    readonly lockPath: string,
    options: VaultLockOptions = {},
  ) {
    this.enabled = options.enabled ?? true;
    this.retries = options.retries ?? 5;
    this.staleMs = options.staleMs ?? 10_000;
  }

  isHeld(): boolean {
    return this.held;
  }

  /**
   * Run `fn` while holding the lock. Released on every exit path.
   */
  run<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.enabled || this.scope.getStore() === this) {
      return fn();
    }

    const turn = this.queue.then(() => this.runLocked(fn));
    this.queue = turn.then(
      () => undefined,
      () => undefined,
    );
    return turn;
  }

  private async runLocked<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    this.held = true;
    try {
      return await this.scope.run(this, fn);
    } finally {
      this.held = false;
      await this.release(release);
    }
  }

  private async acquire(): Promise<() => Promise<void>> {
    const root = path.dirname(this.lockPath);
    try {
      await fs.promises.mkdir(root, { recursive: true, mode: DIR_MODE });
    } catch (err) {
      throw toIoFailure("create vault directory", err);
    }

    try {
      const release = await lockfile.lock(root, {
        realpath: false,
        lockfilePath: this.lockPath,
        stale: this.staleMs,
        retries: { retries: this.retries, minTimeout: 50, maxTimeout: 500 },
        onCompromised: (err) => {
          log.error("Vault lock compromised", { path: this.lockPath, error: errorMessage(err) });
        },
      });
      log.debug("Acquired vault lock", { path: this.lockPath });
      return release;
    } catch (err) {
      if (errnoCode(err) === "ELOCKED") {
        throw new VaultBusyError(this.lockPath, { cause: err });
      }
      throw toIoFailure("acquire vault lock", err);
    }
  }

  private async release(release: () => Promise<void>): Promise<void> {
    try {
      await release();
      log.debug("Released vault lock", { path: this.lockPath });
    } catch (err) {
      // Lock may already be gone (stale takeover or manual removal)
      log.warn("Failed to release vault lock", { path: this.lockPath, error: errorMessage(err) });
    }
  }
}
