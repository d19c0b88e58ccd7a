/**
 * Session key/value storage.
 *
 * A session is the lifetime of the parent process (usually the user's shell):
 * sibling invocations started from it share one directory named after its
 * PID. Values are small strings, one owner-only file per key. The in-memory
 * backend carries the same contract for tests and embedding.
 */

import path from "node:path";
import { InvalidInputError, toIoFailure } from "../vault/errors.js";
import { readFileIfExists, removeIfExists, writeFileAtomic } from "../vault/fs-utils.js";

export interface SessionStore {
  /** Value for `key`, or null when absent. */
  read(key: string): Promise<string | null>;
  write(key: string, value: string): Promise<void>;
  /** Remove `key`; absent keys are not an error. */
  remove(key: string): Promise<void>;
}

const KEY_PATTERN = /^[a-z][a-z0-9-]*$/;

function assertKey(key: string): void {
  if (!KEY_PATTERN.test(key)) {
    throw new InvalidInputError(`Invalid session key: ${key}`);
  }
}

/**
 * Session directory for a parent process under the session root.
 */
export function sessionDirFor(sessionRoot: string, ppid: number = process.ppid): string {
  return path.join(sessionRoot, String(ppid));
}

// ============================================================================
// FileSessionStore
// ============================================================================

export class FileSessionStore implements SessionStore {
  constructor(readonly dir: string) {}

  private keyPath(key: string): string {
    assertKey(key);
    return path.join(this.dir, key);
  }

  async read(key: string): Promise<string | null> {
    try {
      const data = await readFileIfExists(this.keyPath(key));
      return data === null ? null : data.toString("utf-8");
    } catch (err) {
      throw toIoFailure(`read session entry ${key}`, err);
    }
  }

  async write(key: string, value: string): Promise<void> {
    try {
      await writeFileAtomic(this.keyPath(key), value);
    } catch (err) {
      throw toIoFailure(`write session entry ${key}`, err);
    }
  }

  async remove(key: string): Promise<void> {
    try {
      await removeIfExists(this.keyPath(key));
    } catch (err) {
      throw toIoFailure(`remove session entry ${key}`, err);
    }
  }
}

// ============================================================================
// MemorySessionStore
// ============================================================================

export class MemorySessionStore implements SessionStore {
  private readonly values = new Map<string, string>();

  async read(key: string): Promise<string | null> {
    assertKey(key);
    return this.values.get(key) ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    assertKey(key);
    this.values.set(key, value);
  }

  async remove(key: string): Promise<void> {
    assertKey(key);
    this.values.delete(key);
  }

  /** Number of stored keys. */
  get size(): number {
    return this.values.size;
  }
}
