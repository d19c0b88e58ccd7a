/**
 * Link / spawn / sync engine.
 *
 * Linking an item writes its plaintext to <root>/.spawned/<id> and points a
 * symlink at the target path to it. The manifest remembers the target and the
 * hash of the spawned file as last synced. The spawned file is the editable
 * surface; the encrypted item stays the source of truth, and a hash mismatch
 * means the spawned file was edited and must be written back.
 *
 * Per ID the only transitions are Unlinked -> link() -> Linked -> unlink().
 */

import fs from "node:fs";
import path from "node:path";
import type { VaultPaths } from "../config/paths.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import {
  AlreadyExistsError,
  InvalidInputError,
  IoFailureError,
  NotFoundError,
  NothingToCleanUpError,
  errorMessage,
  isNotFoundErrno,
  toIoFailure,
} from "../vault/errors.js";
import {
  lstatIfExists,
  readFileIfExists,
  removeIfExists,
  sha256Hex,
  writeFileAtomic,
} from "../vault/fs-utils.js";
import { ID_PATTERN, assertValidId, type ItemReconciler, type ItemStore } from "../vault/item-store.js";
import { HASH_PREFIX, ManifestStore, type LinkEntry, type LinkManifest } from "./manifest.js";

const log = createSubsystemLogger("links");

export interface LinkOptions {
  /** Replace whatever exists at the target path */
  force?: boolean;
}

export interface UnlinkResult {
  removedSymlink: boolean;
  removedSpawned: boolean;
}

export function contentHash(data: Uint8Array | string): string {
  return `${HASH_PREFIX}${sha256Hex(data)}`;
}

export class LinkManager implements ItemReconciler {
  readonly manifest: ManifestStore;

  constructor(
    readonly paths: VaultPaths,
    private readonly items: ItemStore,
  ) {
    this.manifest = new ManifestStore(paths.manifestFile);
  }

  spawnedPath(id: string): string {
    assertValidId(id);
    return path.join(this.paths.spawnedDir, id);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Link
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Project a text item to `targetPath` through a symlink to its spawned file.
   */
  async link(id: string, targetPath: string, password: string, options: LinkOptions = {}): Promise<LinkEntry> {
    const existing = await this.manifest.get(id);
    if (existing) {
      throw new AlreadyExistsError(`Item ${id} is already linked to ${existing.targetPath}`);
    }
    if (!path.isAbsolute(targetPath)) {
      throw new InvalidInputError(`Link target must be an absolute path: ${targetPath}`);
    }

    const item = await this.items.loadRaw(id, password);
    if (item.kind !== "text") {
      throw new InvalidInputError(`Only text items can be linked (${id} is a ${item.kind} item)`);
    }

    await this.clearTarget(targetPath, options.force ?? false);
    await this.assertParentDirectory(targetPath);

    const spawnedPath = this.spawnedPath(id);
    const data = Buffer.from(item.content, "utf-8");
    try {
      await writeFileAtomic(spawnedPath, data);
    } catch (err) {
      throw toIoFailure(`write spawned file for ${id}`, err);
    }

    let symlinked = false;
    try {
      const entry: LinkEntry = { targetPath, contentHash: contentHash(data) };
      await fs.promises.symlink(spawnedPath, targetPath);
      symlinked = true;
      await this.manifest.set(id, entry);
      log.info("Linked item", { id, targetPath });
      return entry;
    } catch (err) {
      await this.rollbackLink(id, targetPath, symlinked);
      throw toIoFailure(`link ${id} to ${targetPath}`, err);
    }
  }

  private async clearTarget(targetPath: string, force: boolean): Promise<void> {
    let stat: fs.Stats | null;
    try {
      stat = await lstatIfExists(targetPath);
    } catch (err) {
      throw toIoFailure(`inspect ${targetPath}`, err);
    }
    if (!stat) {
      return;
    }
    if (!force) {
      throw new AlreadyExistsError(`Target already exists: ${targetPath} (use force to replace it)`);
    }
    try {
      await fs.promises.rm(targetPath);
    } catch (err) {
      throw toIoFailure(`remove existing target ${targetPath}`, err);
    }
    log.info("Removed existing link target", { targetPath });
  }

  private async assertParentDirectory(targetPath: string): Promise<void> {
    const parent = path.dirname(targetPath);
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(parent);
    } catch (err) {
      throw new IoFailureError(`Parent directory does not exist: ${parent}`, { cause: err });
    }
    if (!stat.isDirectory()) {
      throw new IoFailureError(`Parent path is not a directory: ${parent}`);
    }
  }

  private async rollbackLink(id: string, targetPath: string, symlinked: boolean): Promise<void> {
    if (symlinked) {
      await removeIfExists(targetPath).catch((err: unknown) => {
        log.warn("Failed to remove symlink after failed link", { id, targetPath, error: errorMessage(err) });
      });
    }
    await removeIfExists(this.spawnedPath(id)).catch((err: unknown) => {
      log.warn("Failed to remove spawned file after failed link", { id, error: errorMessage(err) });
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Sync
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Write external edits of a linked item's spawned file back into the item.
   * Returns true when the item was updated.
   */
  async syncIfNeeded(id: string, password: string): Promise<boolean> {
    const entry = await this.manifest.get(id);
    if (!entry) {
      return false;
    }

    const data = await this.readSpawned(id);
    if (data === null) {
      log.warn("Spawned file is missing; skipping sync", { id });
      return false;
    }

    const hash = contentHash(data);
    if (hash === entry.contentHash) {
      return false;
    }

    let content: string;
    try {
      content = new TextDecoder("utf-8", { fatal: true }).decode(data);
    } catch {
      // Stored hash is left alone so a later valid edit is still picked up
      log.warn("Linked file is not valid UTF-8; skipping sync", { id, targetPath: entry.targetPath });
      return false;
    }

    const item = await this.items.loadRaw(id, password);
    item.content = content;
    await this.items.update(id, item, password);
    await this.manifest.set(id, { ...entry, contentHash: hash });
    log.info("Synced external edit into item", { id });
    return true;
  }

  /**
   * Whether the spawned file differs from what was last synced.
   */
  async hasPendingEdits(id: string): Promise<boolean> {
    const entry = await this.manifest.get(id);
    if (!entry) {
      return false;
    }
    const data = await this.readSpawned(id);
    return data !== null && contentHash(data) !== entry.contentHash;
  }

  private async readSpawned(id: string): Promise<Buffer | null> {
    try {
      return await readFileIfExists(this.spawnedPath(id));
    } catch (err) {
      throw toIoFailure(`read spawned file for ${id}`, err);
    }
  }

  /**
   * Rewrite a linked item's spawned file after the item itself changed.
   * Returns false when the item is not linked.
   */
  async refresh(id: string, content: string): Promise<boolean> {
    const entry = await this.manifest.get(id);
    if (!entry) {
      return false;
    }
    const data = Buffer.from(content, "utf-8");
    try {
      await writeFileAtomic(this.spawnedPath(id), data);
    } catch (err) {
      throw toIoFailure(`refresh spawned file for ${id}`, err);
    }
    await this.manifest.set(id, { ...entry, contentHash: contentHash(data) });
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Unlink
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Remove a projection. While the item exists, pending edits are synced
   * first (best effort); without a password a linked file with pending edits
   * is left untouched and the unlink refused.
   */
  async unlink(id: string, password?: string): Promise<UnlinkResult> {
    const entry = await this.manifest.get(id);
    if (!entry) {
      throw new NotFoundError(`Item ${id} is not linked`);
    }

    if (await this.items.exists(id)) {
      if (password === undefined) {
        if (await this.hasPendingEdits(id)) {
          throw new InvalidInputError(
            `Linked file for ${id} has unsaved edits; a password is needed to keep them before unlinking`,
          );
        }
      } else {
        try {
          await this.syncIfNeeded(id, password);
        } catch (err) {
          log.warn("Failed to sync before unlink; unlinking anyway", { id, error: errorMessage(err) });
        }
      }
    }

    const removedSymlink = await this.removeSymlink(id, entry.targetPath);

    let removedSpawned: boolean;
    try {
      removedSpawned = await removeIfExists(this.spawnedPath(id));
    } catch (err) {
      throw toIoFailure(`remove spawned file for ${id}`, err);
    }

    await this.manifest.remove(id);
    log.info("Unlinked item", { id, targetPath: entry.targetPath });

    if (!removedSymlink && !removedSpawned) {
      throw new NothingToCleanUpError(id);
    }
    return { removedSymlink, removedSpawned };
  }

  private async removeSymlink(id: string, targetPath: string): Promise<boolean> {
    try {
      const stat = await lstatIfExists(targetPath);
      if (!stat) {
        return false;
      }
      if (!stat.isSymbolicLink()) {
        log.warn("Link target is no longer a symlink; leaving it in place", { id, targetPath });
        return false;
      }
      await fs.promises.unlink(targetPath);
      return true;
    } catch (err) {
      if (isNotFoundErrno(err)) {
        return false;
      }
      throw toIoFailure(`remove symlink ${targetPath}`, err);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lookups
  // ─────────────────────────────────────────────────────────────────────────

  async getLinkedPath(id: string): Promise<string | undefined> {
    try {
      return (await this.manifest.get(id))?.targetPath;
    } catch (err) {
      log.warn("Failed to read link manifest", { error: errorMessage(err) });
      return undefined;
    }
  }

  async isLinked(id: string): Promise<boolean> {
    return (await this.getLinkedPath(id)) !== undefined;
  }

  async listLinks(): Promise<LinkManifest> {
    return this.manifest.load();
  }

  /**
   * Manifest keys that are not item IDs (a hand-edited links.json), sorted.
   */
  async invalidLinkIds(): Promise<string[]> {
    return Object.keys(await this.listLinks())
      .filter((id) => !ID_PATTERN.test(id))
      .sort();
  }

  /**
   * Linked IDs whose item no longer exists, sorted. Keys that are not item
   * IDs are skipped.
   */
  async orphanedLinkIds(exists: (id: string) => Promise<boolean>): Promise<string[]> {
    const orphaned: string[] = [];
    for (const id of Object.keys(await this.listLinks()).sort()) {
      if (ID_PATTERN.test(id) && !(await exists(id))) {
        orphaned.push(id);
      }
    }
    return orphaned;
  }

  /**
   * Spawned files no manifest entry refers to, sorted.
   */
  async orphanedSpawnedFiles(): Promise<string[]> {
    const referenced = new Set(Object.keys(await this.listLinks()));
    return (await this.listSpawnedFiles()).filter((name) => !referenced.has(name));
  }

  /**
   * Names of the files currently in the spawned directory.
   */
  async listSpawnedFiles(): Promise<string[]> {
    try {
      const entries = await fs.promises.readdir(this.paths.spawnedDir, { withFileTypes: true });
      return entries.filter((entry) => !entry.isDirectory()).map((entry) => entry.name).sort();
    } catch (err) {
      if (isNotFoundErrno(err)) {
        return [];
      }
      throw toIoFailure("list spawned files", err);
    }
  }

  /**
   * Delete a file from the spawned directory by name.
   */
  async removeSpawnedFile(name: string): Promise<boolean> {
    if (name !== path.basename(name)) {
      throw new InvalidInputError(`Invalid spawned file name: ${name}`);
    }
    try {
      return await removeIfExists(path.join(this.paths.spawnedDir, name));
    } catch (err) {
      throw toIoFailure(`remove spawned file ${name}`, err);
    }
  }
}
