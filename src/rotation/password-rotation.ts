/**
 * Vault-wide password rotation.
 *
 * Every item is decrypted with the current password before anything is
 * written, re-encrypted under the new password into items.tmp, and swapped in
 * with two renames (items -> items.old, items.tmp -> items). The verification
 * file is swapped the same way. Until the renames the live vault is untouched;
 * a failed rename is rolled back, and a failed rollback is reported loudly
 * with the backup location.
 */

import fs from "node:fs";
import path from "node:path";
import type { VaultPaths } from "../config/paths.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { PasswordSession, PasswordVerifier } from "../session/password.js";
import {
  InconsistentStateError,
  InvalidInputError,
  RotationSwapError,
  errorMessage,
  toIoFailure,
} from "../vault/errors.js";
import { DIR_MODE, FILE_MODE, pathExists, removeIfExists } from "../vault/fs-utils.js";
import type { Item } from "../vault/item.js";
import type { ItemStore } from "../vault/item-store.js";

const log = createSubsystemLogger("rotation");

/**
 * Filesystem calls used for the swap (replaceable to simulate failures).
 */
export interface RotationFs {
  rename(from: string, to: string): Promise<void>;
}

export interface RotationContext {
  paths: VaultPaths;
  items: ItemStore;
  verifier: PasswordVerifier;
  /** Session to cache the new password in after success */
  session?: PasswordSession;
}

export interface RotationOptions {
  fs?: RotationFs;
}

export interface RotationResult {
  /** Number of items re-encrypted */
  rotated: number;
}

export interface RotationPaths {
  itemsTmp: string;
  itemsBackup: string;
  verifyTmp: string;
  verifyBackup: string;
}

export function rotationPaths(paths: VaultPaths): RotationPaths {
  return {
    itemsTmp: path.join(paths.root, "items.tmp"),
    itemsBackup: path.join(paths.root, "items.old"),
    verifyTmp: `${paths.verifyFile}.tmp`,
    verifyBackup: `${paths.verifyFile}.old`,
  };
}

const defaultFs: RotationFs = {
  rename: (from, to) => fs.promises.rename(from, to),
};

/**
 * Re-encrypt the whole vault under a new password.
 */
export async function rotatePassword(
  context: RotationContext,
  currentPassword: string,
  newPassword: string,
  options: RotationOptions = {},
): Promise<RotationResult> {
  const { paths, items, verifier } = context;
  const rename = (options.fs ?? defaultFs).rename;
  const rp = rotationPaths(paths);

  if (!newPassword) {
    throw new InvalidInputError("New password cannot be empty");
  }
  if (newPassword === currentPassword) {
    throw new InvalidInputError("New password must differ from the current password");
  }

  await verifier.verify(currentPassword);

  for (const backup of [rp.itemsBackup, rp.verifyBackup]) {
    if (await pathExists(backup)) {
      throw new InconsistentStateError(
        `A previous rotation left a backup at ${backup}; recover or remove it before rotating again`,
      );
    }
  }

  // Read phase: every item must open before anything is written
  const ids = await items.listIds();
  const loaded: Array<{ id: string; item: Item }> = [];
  for (const id of ids) {
    loaded.push({ id, item: await items.read(id, currentPassword) });
  }

  await removeStaging(rp);

  // Write phase: staged copies only
  try {
    if (loaded.length > 0) {
      await fs.promises.mkdir(rp.itemsTmp, { mode: DIR_MODE });
      for (const { id, item } of loaded) {
        await fs.promises.writeFile(path.join(rp.itemsTmp, id), items.seal(item, newPassword), {
          mode: FILE_MODE,
          flag: "wx",
        });
      }
    }
    await fs.promises.writeFile(rp.verifyTmp, verifier.seal(newPassword), { mode: FILE_MODE, flag: "wx" });
  } catch (err) {
    await removeStaging(rp);
    throw toIoFailure("write re-encrypted items", err);
  }

  if (loaded.length > 0) {
    const staged = await fs.promises.readdir(rp.itemsTmp);
    if (staged.length !== loaded.length) {
      await removeStaging(rp);
      throw new InconsistentStateError(
        `Re-encrypted ${staged.length} items but expected ${loaded.length}; rotation aborted`,
      );
    }
  }

  // Swap phase
  let itemsSwapped = false;
  if (loaded.length > 0) {
    try {
      await swap(rename, paths.itemsDir, rp.itemsTmp, rp.itemsBackup, "item directory");
    } catch (err) {
      await removeStagedPath(rp.verifyTmp);
      throw err;
    }
    itemsSwapped = true;
  }

  try {
    await swap(rename, paths.verifyFile, rp.verifyTmp, rp.verifyBackup, "verification file");
  } catch (err) {
    if (itemsSwapped) {
      await undoItemsSwap(rename, paths, rp, err);
    }
    throw err;
  }

  // Commit
  await fs.promises.rm(rp.itemsBackup, { recursive: true, force: true }).catch((err: unknown) => {
    log.warn("Failed to remove item backup", { path: rp.itemsBackup, error: errorMessage(err) });
  });
  await removeIfExists(rp.verifyBackup).catch((err: unknown) => {
    log.warn("Failed to remove verification backup", { path: rp.verifyBackup, error: errorMessage(err) });
  });

  if (context.session) {
    try {
      await context.session.cachePassword(newPassword);
    } catch (err) {
      log.warn("Rotated password but failed to cache it", { error: errorMessage(err) });
    }
  }

  log.info("Rotated vault password", { items: loaded.length });
  return { rotated: loaded.length };
}

/**
 * live -> backup, staged -> live; on failure put the backup back.
 */
async function swap(
  rename: RotationFs["rename"],
  live: string,
  staged: string,
  backup: string,
  label: string,
): Promise<void> {
  try {
    await rename(live, backup);
  } catch (err) {
    await removeStagedPath(staged);
    throw new RotationSwapError(`Failed to back up ${label}: ${errorMessage(err)}`, true, backup, {
      cause: err,
    });
  }

  try {
    await rename(staged, live);
  } catch (err) {
    let recovered = true;
    try {
      await rename(backup, live);
    } catch (restoreErr) {
      recovered = false;
      log.error(`Failed to restore ${label} after a failed swap; manual recovery needed`, {
        backup,
        live,
        error: errorMessage(restoreErr),
      });
    }
    if (recovered) {
      await removeStagedPath(staged);
    }
    throw new RotationSwapError(
      recovered
        ? `Failed to swap in re-encrypted ${label}; previous state restored`
        : `Failed to swap in re-encrypted ${label} and to restore it; backup kept at ${backup}`,
      recovered,
      backup,
      { cause: err },
    );
  }
}

/**
 * Put the old item directory back after the verification swap failed.
 */
async function undoItemsSwap(
  rename: RotationFs["rename"],
  paths: VaultPaths,
  rp: RotationPaths,
  cause: unknown,
): Promise<void> {
  try {
    await rename(paths.itemsDir, rp.itemsTmp);
    await rename(rp.itemsBackup, paths.itemsDir);
    await removeStagedPath(rp.itemsTmp);
  } catch (err) {
    log.error("Failed to roll back item directory after verification swap failed; manual recovery needed", {
      backup: rp.itemsBackup,
      error: errorMessage(err),
    });
    throw new RotationSwapError(
      `Items were rotated but the verification file was not, and rolling back failed; old items kept at ${rp.itemsBackup}`,
      false,
      rp.itemsBackup,
      { cause },
    );
  }
}

async function removeStaging(rp: RotationPaths): Promise<void> {
  await removeStagedPath(rp.itemsTmp);
  await removeStagedPath(rp.verifyTmp);
}

async function removeStagedPath(target: string): Promise<void> {
  await fs.promises.rm(target, { recursive: true, force: true }).catch((err: unknown) => {
    log.warn("Failed to remove staged rotation files", { path: target, error: errorMessage(err) });
  });
}
