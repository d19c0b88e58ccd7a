/**
 * Vault facade.
 *
 * Composes the item store, link engine, password session, trash and rotation
 * for one vault location. Operations that write (or may write, like a
 * reconciling read) run under the vault lock.
 */

import fs from "node:fs";
import path from "node:path";
import type { VaultPaths } from "../config/paths.js";
import type { KdfParams } from "../crypto/envelope.js";
import { LinkManager, type LinkOptions, type UnlinkResult } from "../links/link-manager.js";
import type { LinkEntry, LinkManifest } from "../links/manifest.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { selfHeal, type SelfHealResult } from "../maintenance/self-heal.js";
import {
  rotatePassword,
  type RotationFs,
  type RotationResult,
} from "../rotation/password-rotation.js";
import { PasswordSession, PasswordVerifier, type PasswordPrompt } from "../session/password.js";
import type { SessionStore } from "../session/session-store.js";
import { Trash, type UndoResult } from "../trash/trash.js";
import {
  AlreadyExistsError,
  InvalidInputError,
  NotFoundError,
  NothingToCleanUpError,
  errnoCode,
  errorMessage,
  isNotFoundErrno,
  toIoFailure,
} from "./errors.js";
import { writeFileExclusive } from "./fs-utils.js";
import { cloneItem, fileItemBytes, itemFromFileData, type Item } from "./item.js";
import { ItemStore, assertValidId, type ReadOptions } from "./item-store.js";
import { VaultLock, type VaultLockOptions } from "./lock.js";

const log = createSubsystemLogger("vault");

export interface VaultOptions {
  paths: VaultPaths;
  /** Session state (password cache, recently deleted) */
  session: SessionStore;
  kdf?: KdfParams;
  /** false disables the advisory lock */
  lock?: boolean | VaultLockOptions;
  /** ID generator for new items */
  generateId?: () => string;
  /** Filesystem used by rotation swaps */
  rotationFs?: RotationFs;
}

export interface ImportOptions {
  /** Defaults to the source file name */
  title?: string;
  tags?: string[];
  id?: string;
}

export interface MoveResult {
  id: string;
  /** Link target carried over to the new ID, if the item was linked */
  targetPath?: string;
}

/**
 * Changes the given copy of an item in place.
 */
export type ItemMutator = (item: Item) => void | Promise<void>;

function lockOptions(lock: VaultOptions["lock"]): VaultLockOptions {
  if (lock === undefined || lock === true) {
    return {};
  }
  if (lock === false) {
    return { enabled: false };
  }
  return lock;
}

export class Vault {
  readonly paths: VaultPaths;
  readonly items: ItemStore;
  readonly links: LinkManager;
  readonly verifier: PasswordVerifier;
  readonly session: PasswordSession;
  readonly trash: Trash;
  private readonly lock: VaultLock;
  private readonly rotationFs?: RotationFs;

  constructor(options: VaultOptions) {
    this.paths = options.paths;
    this.items = new ItemStore(options.paths, { kdf: options.kdf, generateId: options.generateId });
    this.links = new LinkManager(options.paths, this.items);
    this.items.setReconciler(this.links);
    this.verifier = new PasswordVerifier(options.paths.verifyFile, this.items.kdfParams);
    this.session = new PasswordSession(options.session, this.verifier);
    this.trash = new Trash(options.paths, this.items, options.session);
    this.lock = new VaultLock(options.paths.lockFile, lockOptions(options.lock));
    this.rotationFs = options.rotationFs;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Password
  // ─────────────────────────────────────────────────────────────────────────

  isInitialized(): boolean {
    return this.verifier.exists();
  }

  getPasswordWithVerification(prompt: PasswordPrompt): Promise<string> {
    return this.session.getPasswordWithVerification(prompt);
  }

  rotatePassword(currentPassword: string, newPassword: string): Promise<RotationResult> {
    return this.lock.run(() =>
      rotatePassword(
        { paths: this.paths, items: this.items, verifier: this.verifier, session: this.session },
        currentPassword,
        newPassword,
        { fs: this.rotationFs },
      ),
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Items
  // ─────────────────────────────────────────────────────────────────────────

  create(item: Item, password: string, id?: string): Promise<string> {
    return this.lock.run(() => this.items.create(item, password, id));
  }

  /**
   * Read an item. A reconciling read may write external edits back, so it
   * takes the lock.
   */
  read(id: string, password: string, options: ReadOptions = {}): Promise<Item> {
    if (options.reconcile === false) {
      return this.items.read(id, password, options);
    }
    return this.lock.run(() => this.items.read(id, password, options));
  }

  list(): Promise<string[]> {
    return this.items.listIds();
  }

  /**
   * Replace an item; a linked item's spawned file follows the new content.
   */
  update(id: string, item: Item, password: string): Promise<Item> {
    return this.lock.run(async () => {
      const linked = await this.links.isLinked(id);
      if (linked && item.kind !== "text") {
        throw new InvalidInputError(`Item ${id} is linked and must stay a text item; unlink it first`);
      }
      const stored = await this.items.update(id, item, password);
      if (linked) {
        await this.links.refresh(id, stored.content);
      }
      return stored;
    });
  }

  /**
   * Read, change and write back an item in one locked step.
   */
  edit(id: string, password: string, mutate: ItemMutator): Promise<Item> {
    return this.lock.run(async () => {
      const draft = cloneItem(await this.items.read(id, password));
      await mutate(draft);
      return this.update(id, draft, password);
    });
  }

  /**
   * Hard delete. A linked item is synced and unlinked first.
   */
  delete(id: string, password: string): Promise<void> {
    return this.lock.run(async () => {
      await this.unlinkIfLinked(id, password);
      await this.items.delete(id);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Trash
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Move items to the trash and remember them for undo. Linked items are
   * synced and unlinked first, so the trashed copy carries any pending edits.
   * IDs trashed before a failure are still recorded.
   */
  remove(ids: string[], password: string): Promise<string[]> {
    return this.lock.run(async () => {
      const removed: string[] = [];
      try {
        for (const id of ids) {
          if (!(await this.items.exists(id))) {
            throw new NotFoundError(`Item ${id} not found`);
          }
          await this.unlinkIfLinked(id, password);
          await this.trash.moveToTrash(id);
          removed.push(id);
        }
      } finally {
        await this.trash.recordDeleted(removed);
      }
      return removed;
    });
  }

  undo(count?: number): Promise<UndoResult> {
    return this.lock.run(() => this.trash.undo(count));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Links
  // ─────────────────────────────────────────────────────────────────────────

  link(id: string, targetPath: string, password: string, options: LinkOptions = {}): Promise<LinkEntry> {
    return this.lock.run(() => this.links.link(id, targetPath, password, options));
  }

  /**
   * Remove a projection after syncing its pending edits into the item.
   */
  unlink(id: string, password: string): Promise<UnlinkResult> {
    return this.lock.run(() => this.links.unlink(id, password));
  }

  listLinks(): Promise<LinkManifest> {
    return this.links.listLinks();
  }

  private async unlinkIfLinked(id: string, password: string): Promise<void> {
    if (!(await this.links.isLinked(id))) {
      return;
    }
    try {
      await this.links.unlink(id, password);
    } catch (err) {
      if (!(err instanceof NothingToCleanUpError)) {
        throw err;
      }
      log.warn("Link of item was already gone", { id });
    }
  }

  /**
   * Give an item a new ID, carrying its link over to the same target.
   */
  move(oldId: string, newId: string, password: string): Promise<MoveResult> {
    return this.lock.run(async () => {
      assertValidId(newId);
      if (!(await this.items.exists(oldId))) {
        throw new NotFoundError(`Item ${oldId} not found`);
      }
      if (await this.items.exists(newId)) {
        throw new AlreadyExistsError(`Item ${newId} already exists`);
      }

      const targetPath = await this.links.getLinkedPath(oldId);
      if (targetPath === undefined) {
        await this.items.rename(oldId, newId);
        return { id: newId };
      }

      await this.unlinkIfLinked(oldId, password);
      try {
        await this.items.rename(oldId, newId);
      } catch (err) {
        await this.relinkAfterFailedMove(oldId, targetPath, password);
        throw err;
      }

      try {
        await this.links.link(newId, targetPath, password, { force: true });
      } catch (err) {
        try {
          await this.items.rename(newId, oldId);
        } catch (renameErr) {
          log.error("Failed to roll back move", { from: oldId, to: newId, error: errorMessage(renameErr) });
          throw err;
        }
        await this.relinkAfterFailedMove(oldId, targetPath, password);
        throw err;
      }
      log.info("Moved item", { from: oldId, to: newId });
      return { id: newId, targetPath };
    });
  }

  private async relinkAfterFailedMove(id: string, targetPath: string, password: string): Promise<void> {
    try {
      await this.links.link(id, targetPath, password, { force: true });
    } catch (err) {
      log.warn("Failed to restore link after failed move", { id, targetPath, error: errorMessage(err) });
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Import / export
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Store a file from disk: a text item when it is text, a file item
   * otherwise.
   */
  importFile(sourcePath: string, options: ImportOptions, password: string): Promise<string> {
    return this.lock.run(async () => {
      let data: Buffer;
      try {
        data = await fs.promises.readFile(sourcePath);
      } catch (err) {
        if (isNotFoundErrno(err)) {
          throw new NotFoundError(`File not found: ${sourcePath}`, { cause: err });
        }
        throw toIoFailure(`read ${sourcePath}`, err);
      }
      const filename = path.basename(sourcePath);
      const item = itemFromFileData(options.title ?? filename, filename, data, { tags: options.tags });
      const id = await this.items.create(item, password, options.id);
      log.info("Imported file", { id, kind: item.kind, bytes: data.length });
      return id;
    });
  }

  /**
   * Write a file item's bytes to disk. A directory target gets the item's
   * original file name. Never overwrites; returns the path written.
   */
  async exportFile(id: string, password: string, outputPath: string): Promise<string> {
    const item = await this.items.read(id, password, { reconcile: false });
    const data = fileItemBytes(item);

    let destination = outputPath;
    try {
      const stat = await fs.promises.stat(outputPath);
      if (stat.isDirectory()) {
        destination = path.join(outputPath, path.basename(item.filename ?? id));
      }
    } catch (err) {
      if (!isNotFoundErrno(err)) {
        throw toIoFailure(`inspect ${outputPath}`, err);
      }
    }

    try {
      await writeFileExclusive(destination, data);
    } catch (err) {
      if (errnoCode(err) === "EEXIST") {
        throw new AlreadyExistsError(`Refusing to overwrite ${destination}`, { cause: err });
      }
      throw toIoFailure(`write ${destination}`, err);
    }
    log.info("Exported file", { id, destination });
    return destination;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Maintenance
  // ─────────────────────────────────────────────────────────────────────────

  selfHeal(): Promise<SelfHealResult> {
    return this.lock.run(() => selfHeal(this.links, this.items));
  }
}
