/**
 * Soft delete into the freedesktop trash, and undo.
 *
 * A trashed item file is renamed to <dataHome>/Trash/files/sealbox-<id> and
 * described by a .trashinfo sidecar in Trash/info. The session remembers the
 * most recently deleted IDs so "undo the last N" does not need to scan the
 * trash.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { APP_NAME, type VaultPaths } from "../config/paths.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { SessionStore } from "../session/session-store.js";
import {
  AlreadyExistsError,
  CorruptedError,
  NotFoundError,
  errorMessage,
  isNotFoundErrno,
  toIoFailure,
} from "../vault/errors.js";
import { DIR_MODE, pathExists, removeIfExists, writeFileExclusive } from "../vault/fs-utils.js";
import { assertValidId, type ItemStore } from "../vault/item-store.js";

const log = createSubsystemLogger("trash");

export const SESSION_DELETED_KEY = "deleted";
export const TRASH_PREFIX = `${APP_NAME}-`;
const TRASHINFO_SUFFIX = ".trashinfo";
const MAX_RECORDED = 100;

const deletedListSchema = z.array(z.string());

export interface UndoFailure {
  id: string;
  error: Error;
}

export interface UndoResult {
  restored: string[];
  failed: UndoFailure[];
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local time as YYYY-MM-DDThh:mm:ss, the .trashinfo DeletionDate format.
 */
export function formatDeletionDate(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatTrashInfo(originalPath: string, deletedAt: Date): string {
  return `[Trash Info]\nPath=${encodeURI(originalPath)}\nDeletionDate=${formatDeletionDate(deletedAt)}\n`;
}

export class Trash {
  constructor(
    readonly paths: VaultPaths,
    private readonly items: ItemStore,
    private readonly session: SessionStore,
  ) {}

  trashedPath(id: string): string {
    assertValidId(id);
    return path.join(this.paths.trashFilesDir, `${TRASH_PREFIX}${id}`);
  }

  infoPath(id: string): string {
    assertValidId(id);
    return path.join(this.paths.trashInfoDir, `${TRASH_PREFIX}${id}${TRASHINFO_SUFFIX}`);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Move / restore
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Move an item file into the trash and write its sidecar.
   */
  async moveToTrash(id: string): Promise<void> {
    const source = this.items.itemPath(id);
    if (!(await this.items.exists(id))) {
      throw new NotFoundError(`Item ${id} not found`);
    }

    const destination = this.trashedPath(id);
    const info = this.infoPath(id);
    try {
      await fs.promises.mkdir(this.paths.trashFilesDir, { recursive: true, mode: DIR_MODE });
      await fs.promises.mkdir(this.paths.trashInfoDir, { recursive: true, mode: DIR_MODE });
      // An older trashed copy of the same ID is replaced
      await removeIfExists(info);
      await fs.promises.rename(source, destination);
    } catch (err) {
      throw toIoFailure(`move ${id} to trash`, err);
    }

    try {
      await writeFileExclusive(info, formatTrashInfo(source, new Date()));
    } catch (err) {
      try {
        await fs.promises.rename(destination, source);
      } catch (rollbackErr) {
        log.error("Failed to move item back after sidecar write failed", {
          id,
          trashedPath: destination,
          error: errorMessage(rollbackErr),
        });
      }
      throw toIoFailure(`write trash info for ${id}`, err);
    }
    log.info("Moved item to trash", { id });
  }

  /**
   * Move a trashed item back. Never overwrites a live item.
   */
  async restoreFromTrash(id: string): Promise<void> {
    const trashed = this.trashedPath(id);
    if (!(await pathExists(trashed))) {
      throw new NotFoundError(`Item ${id} is not in the trash`);
    }
    if (await this.items.exists(id)) {
      throw new AlreadyExistsError(`Item ${id} already exists; not restoring over it`);
    }

    try {
      await fs.promises.mkdir(this.paths.itemsDir, { recursive: true, mode: DIR_MODE });
      await fs.promises.rename(trashed, this.items.itemPath(id));
    } catch (err) {
      throw toIoFailure(`restore ${id} from trash`, err);
    }

    try {
      await removeIfExists(this.infoPath(id));
    } catch (err) {
      log.warn("Restored item but failed to remove its trash info", { id, error: errorMessage(err) });
    }
    log.info("Restored item from trash", { id });
  }

  /**
   * IDs currently in the trash, sorted.
   */
  async listTrashed(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.paths.trashFilesDir);
    } catch (err) {
      if (isNotFoundErrno(err)) {
        return [];
      }
      throw toIoFailure("list trash", err);
    }
    return names
      .filter((name) => name.startsWith(TRASH_PREFIX))
      .map((name) => name.slice(TRASH_PREFIX.length))
      .sort();
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Recently deleted / undo
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Remember deleted IDs, most recent first.
   */
  async recordDeleted(ids: string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }
    const existing = await this.readDeleted();
    const fresh = new Set(ids);
    const next = [...ids, ...existing.filter((id) => !fresh.has(id))].slice(0, MAX_RECORDED);
    await this.writeDeleted(next);
  }

  /**
   * The most recently deleted IDs (all of them when count is absent or <= 0).
   */
  async pendingDeleted(count?: number): Promise<string[]> {
    const pending = await this.readDeleted();
    if (pending.length === 0) {
      throw new NotFoundError("No recently deleted items");
    }
    return count !== undefined && count > 0 ? pending.slice(0, count) : pending;
  }

  /**
   * Restore the most recently deleted items. The recently-deleted list keeps
   * whatever could not be restored.
   */
  async undo(count?: number): Promise<UndoResult> {
    const all = await this.readDeleted();
    const targets = await this.pendingDeleted(count);
    const result: UndoResult = { restored: [], failed: [] };

    for (const id of targets) {
      try {
        await this.restoreFromTrash(id);
        result.restored.push(id);
      } catch (err) {
        log.warn("Failed to restore item", { id, error: errorMessage(err) });
        result.failed.push({ id, error: err instanceof Error ? err : new Error(String(err)) });
      }
    }

    const restored = new Set(result.restored);
    await this.writeDeleted(all.filter((id) => !restored.has(id)));
    return result;
  }

  private async readDeleted(): Promise<string[]> {
    const raw = await this.session.read(SESSION_DELETED_KEY);
    if (raw === null) {
      return [];
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new CorruptedError("Recently deleted list is not valid JSON", { cause: err });
    }
    const result = deletedListSchema.safeParse(parsed);
    if (!result.success) {
      throw new CorruptedError("Recently deleted list is malformed");
    }
    return result.data;
  }

  private async writeDeleted(ids: string[]): Promise<void> {
    if (ids.length === 0) {
      await this.session.remove(SESSION_DELETED_KEY);
      return;
    }
    await this.session.write(SESSION_DELETED_KEY, JSON.stringify(ids));
  }
}
