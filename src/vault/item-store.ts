/**
 * Encrypted item store.
 *
 * One envelope per item under <root>/items/<id>, owner-only. Writes replace
 * whole files: creation uses an exclusive create so nothing is overwritten,
 * updates go through a temp file and rename.
 */

import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { VaultPaths } from "../config/paths.js";
import { DEFAULT_KDF_PARAMS, decrypt, encrypt, type KdfParams } from "../crypto/envelope.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import {
  AlreadyExistsError,
  IdExhaustedError,
  InvalidInputError,
  NotFoundError,
  errnoCode,
  isNotFoundErrno,
  toIoFailure,
} from "./errors.js";
import { DIR_MODE, pathExists, readFileIfExists, writeFileAtomic, writeFileExclusive } from "./fs-utils.js";
import { cloneItem, decodeItem, encodeItem, type Item } from "./item.js";

const log = createSubsystemLogger("item-store");

export const ID_LENGTH = 3;
export const MAX_ID_ATTEMPTS = 10;
export const ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

const GITIGNORE_CONTENT = ".spawned/\nlinks.json\n";

/**
 * Hook run before a reconciling read (the link engine's drift sync).
 */
export interface ItemReconciler {
  syncIfNeeded(id: string, password: string): Promise<boolean>;
}

export interface ReadOptions {
  /** Run the reconciler first (default true). */
  reconcile?: boolean;
}

export interface ItemStoreOptions {
  kdf?: KdfParams;
  /** ID generator (tests inject collisions) */
  generateId?: () => string;
  maxIdAttempts?: number;
}

/**
 * Random 3-character URL-safe ID.
 */
export function generateItemId(): string {
  return crypto.randomBytes(3).toString("base64url").slice(0, ID_LENGTH);
}

export function assertValidId(id: string): void {
  if (!ID_PATTERN.test(id)) {
    throw new InvalidInputError(`Invalid item ID: ${JSON.stringify(id)}`);
  }
}

export class ItemStore {
  private readonly kdf: KdfParams;
  private readonly generateId: () => string;
  private readonly maxIdAttempts: number;
  private reconciler: ItemReconciler | null = null;

  constructor(
    readonly paths: VaultPaths,
    options: ItemStoreOptions = {},
  ) {
    this.kdf = options.kdf ?? DEFAULT_KDF_PARAMS;
    this.generateId = options.generateId ?? generateItemId;
    this.maxIdAttempts = options.maxIdAttempts ?? MAX_ID_ATTEMPTS;
  }

  /**
   * Attach the reconciler consulted by {@link read}.
   */
  setReconciler(reconciler: ItemReconciler | null): void {
    this.reconciler = reconciler;
  }

  get kdfParams(): KdfParams {
    return this.kdf;
  }

  itemPath(id: string): string {
    assertValidId(id);
    return path.join(this.paths.itemsDir, id);
  }

  /**
   * Create the vault directories and the .gitignore for derived state.
   */
  async ensureDirectories(): Promise<void> {
    try {
      await fs.promises.mkdir(this.paths.itemsDir, { recursive: true, mode: DIR_MODE });
      await fs.promises.mkdir(this.paths.spawnedDir, { recursive: true, mode: DIR_MODE });
      if (!(await pathExists(this.paths.gitignoreFile))) {
        await writeFileAtomic(this.paths.gitignoreFile, GITIGNORE_CONTENT, 0o644);
      }
    } catch (err) {
      throw toIoFailure("create vault directories", err);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Encoding
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Serialize and encrypt an item.
   */
  seal(item: Item, password: string): Uint8Array {
    return encrypt(encodeItem(item), password, this.kdf);
  }

  /**
   * Decrypt and deserialize an item file's bytes.
   */
  open(data: Uint8Array, password: string): Item {
    return decodeItem(decrypt(data, password, this.kdf));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // CRUD
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Create a new item. Generates an ID unless one is given; never overwrites.
   */
  async create(item: Item, password: string, id?: string): Promise<string> {
    const envelope = this.seal(item, password);
    await this.ensureDirectories();

    if (id !== undefined) {
      assertValidId(id);
      if (!(await this.writeNew(id, envelope))) {
        throw new AlreadyExistsError(`Item ${id} already exists`);
      }
      log.debug("Created item", { id });
      return id;
    }

    for (let attempt = 1; attempt <= this.maxIdAttempts; attempt++) {
      const candidate = this.generateId();
      assertValidId(candidate);
      if (await this.writeNew(candidate, envelope)) {
        log.debug("Created item", { id: candidate, attempt });
        return candidate;
      }
    }
    throw new IdExhaustedError(this.maxIdAttempts);
  }

  /**
   * Exclusive create. Returns false when the ID is taken.
   */
  private async writeNew(id: string, envelope: Uint8Array): Promise<boolean> {
    try {
      await writeFileExclusive(this.itemPath(id), envelope);
      return true;
    } catch (err) {
      if (errnoCode(err) === "EEXIST") {
        return false;
      }
      throw toIoFailure(`write item ${id}`, err);
    }
  }

  /**
   * Decrypt an item without reconciling linked content. No side effects.
   */
  async loadRaw(id: string, password: string): Promise<Item> {
    let data: Buffer | null;
    try {
      data = await readFileIfExists(this.itemPath(id));
    } catch (err) {
      throw toIoFailure(`read item ${id}`, err);
    }
    if (data === null) {
      throw new NotFoundError(`Item ${id} not found`);
    }
    const item = this.open(data, password);
    item.id = id;
    return item;
  }

  /**
   * Read an item. When reconciling (the default) and the item is linked,
   * external edits to its spawned file are first written back into the
   * item, so this call may update it.
   */
  async read(id: string, password: string, options: ReadOptions = {}): Promise<Item> {
    const reconcile = options.reconcile ?? true;
    if (reconcile && this.reconciler) {
      if (!(await this.exists(id))) {
        throw new NotFoundError(`Item ${id} not found`);
      }
      await this.reconciler.syncIfNeeded(id, password);
    }
    return this.loadRaw(id, password);
  }

  /**
   * Replace an existing item. Bumps `modified` and returns what was stored.
   */
  async update(id: string, item: Item, password: string): Promise<Item> {
    if (!(await this.exists(id))) {
      throw new NotFoundError(`Item ${id} not found`);
    }

    const next = cloneItem(item);
    next.modified = new Date();
    const envelope = this.seal(next, password);
    next.id = id;

    try {
      await writeFileAtomic(this.itemPath(id), envelope);
    } catch (err) {
      throw toIoFailure(`write item ${id}`, err);
    }
    log.debug("Updated item", { id });
    return next;
  }

  /**
   * Hard delete.
   */
  async delete(id: string): Promise<void> {
    try {
      await fs.promises.unlink(this.itemPath(id));
    } catch (err) {
      if (isNotFoundErrno(err)) {
        throw new NotFoundError(`Item ${id} not found`);
      }
      throw toIoFailure(`delete item ${id}`, err);
    }
    log.debug("Deleted item", { id });
  }

  async exists(id: string): Promise<boolean> {
    try {
      return await pathExists(this.itemPath(id));
    } catch (err) {
      throw toIoFailure(`stat item ${id}`, err);
    }
  }

  /**
   * All item IDs, sorted. Files that are not item IDs are ignored.
   */
  async listIds(): Promise<string[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(this.paths.itemsDir, { withFileTypes: true });
    } catch (err) {
      if (isNotFoundErrno(err)) {
        return [];
      }
      throw toIoFailure("list items", err);
    }
    return entries
      .filter((entry) => entry.isFile() && ID_PATTERN.test(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  /**
   * Move an item file to a new ID.
   */
  async rename(oldId: string, newId: string): Promise<void> {
    const from = this.itemPath(oldId);
    const to = this.itemPath(newId);
    if (!(await this.exists(oldId))) {
      throw new NotFoundError(`Item ${oldId} not found`);
    }
    if (await this.exists(newId)) {
      throw new AlreadyExistsError(`Item ${newId} already exists`);
    }
    try {
      await fs.promises.rename(from, to);
    } catch (err) {
      throw toIoFailure(`rename item ${oldId} to ${newId}`, err);
    }
    log.debug("Renamed item", { from: oldId, to: newId });
  }
}
