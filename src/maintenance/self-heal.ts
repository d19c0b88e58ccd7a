/**
 * Orphan cleanup, run once at the start of a new session.
 *
 * Manifest entries whose item is gone are unlinked, and files in the spawned
 * directory that no manifest entry refers to are deleted. Running it twice in
 * a row changes nothing the second time.
 */

import type { LinkManager } from "../links/link-manager.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { errorMessage } from "../vault/errors.js";
import type { ItemStore } from "../vault/item-store.js";

const log = createSubsystemLogger("self-heal");

export interface SelfHealResult {
  /** Item IDs whose dangling links were removed */
  unlinked: string[];
  /** Spawned files deleted because nothing referenced them */
  removedSpawned: string[];
}

export async function selfHeal(links: LinkManager, items: ItemStore): Promise<SelfHealResult> {
  const result: SelfHealResult = { unlinked: [], removedSpawned: [] };

  for (const key of await links.invalidLinkIds()) {
    try {
      await links.manifest.remove(key);
      log.warn("Dropped link manifest entry with an invalid item ID", { key });
      result.unlinked.push(key);
    } catch (err) {
      log.warn("Failed to drop invalid link manifest entry", { key, error: errorMessage(err) });
    }
  }

  for (const id of await links.orphanedLinkIds((id) => items.exists(id))) {
    try {
      await links.unlink(id);
    } catch (err) {
      // Expected when the projection was already gone; the entry is dropped regardless
      log.debug("Unlink of orphaned entry reported an error", { id, error: errorMessage(err) });
    }
    if (!(await links.isLinked(id))) {
      result.unlinked.push(id);
    }
  }

  for (const name of await links.orphanedSpawnedFiles()) {
    try {
      if (await links.removeSpawnedFile(name)) {
        result.removedSpawned.push(name);
      }
    } catch (err) {
      log.warn("Failed to remove orphaned spawned file", { name, error: errorMessage(err) });
    }
  }

  if (result.unlinked.length > 0 || result.removedSpawned.length > 0) {
    log.info("Self-heal cleaned up orphans", {
      unlinked: result.unlinked,
      removedSpawned: result.removedSpawned,
    });
  }
  return result;
}
