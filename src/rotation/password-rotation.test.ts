import fs from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveVaultPaths, type VaultPaths } from "../config/paths.js";
import type { KdfParams } from "../crypto/envelope.js";
import { LinkManager } from "../links/link-manager.js";
import { PasswordSession, PasswordVerifier } from "../session/password.js";
import { MemorySessionStore } from "../session/session-store.js";
import {
  InconsistentStateError,
  InvalidInputError,
  RotationSwapError,
  WrongPasswordError,
} from "../vault/errors.js";
import { newTextItem } from "../vault/item.js";
import { ItemStore } from "../vault/item-store.js";
import { rotatePassword, rotationPaths, type RotationContext, type RotationFs } from "./password-rotation.js";

const TEST_KDF: KdfParams = { t: 1, m: 64, p: 1 };
const OLD = "old-secret";
const NEW = "new-secret";

function failingRename(shouldFail: (from: string) => boolean): RotationFs {
  return {
    rename: async (from, to) => {
      if (shouldFail(from)) {
        throw Object.assign(new Error(`simulated rename failure: ${from}`), { code: "EIO" });
      }
      await fs.promises.rename(from, to);
    },
  };
}

describe("rotatePassword", () => {
  let tempDir: string;
  let paths: VaultPaths;
  let items: ItemStore;
  let verifier: PasswordVerifier;
  let session: PasswordSession;
  let context: RotationContext;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "sealbox-rotation-test-"));
    paths = resolveVaultPaths({ dataHome: tempDir, sessionRoot: path.join(tempDir, "session") });
    items = new ItemStore(paths, { kdf: TEST_KDF });
    verifier = new PasswordVerifier(paths.verifyFile, TEST_KDF);
    session = new PasswordSession(new MemorySessionStore(), verifier);
    context = { paths, items, verifier, session };

    await verifier.create(OLD);
    await items.create(newTextItem("First", "one"), OLD, "aaa");
    await items.create(newTextItem("Second", "two"), OLD, "bbb");
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function expectOldVaultIntact(): Promise<void> {
    await expect(verifier.verify(OLD)).resolves.toBeUndefined();
    expect((await items.read("aaa", OLD)).content).toBe("one");
    expect((await items.read("bbb", OLD)).content).toBe("two");
    expect(await items.listIds()).toEqual(["aaa", "bbb"]);
  }

  it("re-encrypts every item under the new password", async () => {
    const result = await rotatePassword(context, OLD, NEW);

    expect(result).toEqual({ rotated: 2 });
    expect((await items.read("aaa", NEW)).content).toBe("one");
    expect((await items.read("bbb", NEW)).content).toBe("two");
    await expect(items.read("aaa", OLD)).rejects.toThrow(WrongPasswordError);
    await expect(verifier.verify(NEW)).resolves.toBeUndefined();
    await expect(verifier.verify(OLD)).rejects.toThrow(WrongPasswordError);
  });

  it("leaves no staging or backup files behind", async () => {
    await rotatePassword(context, OLD, NEW);

    const rp = rotationPaths(paths);
    for (const leftover of [rp.itemsTmp, rp.itemsBackup, rp.verifyTmp, rp.verifyBackup]) {
      expect(fs.existsSync(leftover)).toBe(false);
    }
  });

  it("caches the new password", async () => {
    await session.cachePassword(OLD);

    await rotatePassword(context, OLD, NEW);

    expect(await session.getCachedPassword()).toBe(NEW);
  });

  it("rejects an unchanged or empty new password", async () => {
    await expect(rotatePassword(context, OLD, OLD)).rejects.toThrow(InvalidInputError);
    await expect(rotatePassword(context, OLD, "")).rejects.toThrow(InvalidInputError);
    await expectOldVaultIntact();
  });

  it("rejects a wrong current password", async () => {
    await expect(rotatePassword(context, "wrong-secret", NEW)).rejects.toThrow(WrongPasswordError);
    await expectOldVaultIntact();
  });

  it("rotates only the verification file of an empty vault", async () => {
    await items.delete("aaa");
    await items.delete("bbb");

    expect(await rotatePassword(context, OLD, NEW)).toEqual({ rotated: 0 });
    await expect(verifier.verify(NEW)).resolves.toBeUndefined();
  });

  it("aborts before writing when an item cannot be decrypted", async () => {
    fs.writeFileSync(path.join(paths.itemsDir, "bbb"), Buffer.alloc(64, 1));

    await expect(rotatePassword(context, OLD, NEW)).rejects.toThrow(WrongPasswordError);

    expect(fs.existsSync(rotationPaths(paths).itemsTmp)).toBe(false);
    expect((await items.read("aaa", OLD)).content).toBe("one");
    await expect(verifier.verify(OLD)).resolves.toBeUndefined();
  });

  it("refuses to run over a backup left by an earlier failure", async () => {
    fs.mkdirSync(rotationPaths(paths).itemsBackup);

    await expect(rotatePassword(context, OLD, NEW)).rejects.toThrow(InconsistentStateError);
    await expectOldVaultIntact();
  });

  it("includes pending edits of linked items", async () => {
    const links = new LinkManager(paths, items);
    items.setReconciler(links);
    const target = path.join(tempDir, "linked");
    await links.link("aaa", target, OLD);
    fs.writeFileSync(target, "edited");

    await rotatePassword(context, OLD, NEW);

    expect((await items.read("aaa", NEW, { reconcile: false })).content).toBe("edited");
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Swap failures
  // ─────────────────────────────────────────────────────────────────────────

  describe("swap failures", () => {
    it("restores the original items when the swap fails", async () => {
      const rp = rotationPaths(paths);
      const fsOverride = failingRename((from) => from === rp.itemsTmp);

      const error = await rotatePassword(context, OLD, NEW, { fs: fsOverride }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RotationSwapError);
      expect(error instanceof RotationSwapError && error.recovered).toBe(true);
      await expectOldVaultIntact();
      for (const leftover of [rp.itemsTmp, rp.itemsBackup, rp.verifyTmp]) {
        expect(fs.existsSync(leftover)).toBe(false);
      }
    });

    it("keeps the backup when the restore fails too", async () => {
      const rp = rotationPaths(paths);
      const fsOverride = failingRename((from) => from === rp.itemsTmp || from === rp.itemsBackup);

      const error = await rotatePassword(context, OLD, NEW, { fs: fsOverride }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RotationSwapError);
      expect(error instanceof RotationSwapError && error.recovered).toBe(false);
      expect(error instanceof RotationSwapError && error.backupPath).toBe(rp.itemsBackup);
      const backedUp = fs.readFileSync(path.join(rp.itemsBackup, "aaa"));
      expect(items.open(backedUp, OLD).content).toBe("one");
    });

    it("rolls the items back when the verification swap fails", async () => {
      const rp = rotationPaths(paths);
      const fsOverride = failingRename((from) => from === rp.verifyTmp);

      await expect(rotatePassword(context, OLD, NEW, { fs: fsOverride })).rejects.toThrow(RotationSwapError);

      await expectOldVaultIntact();
      for (const leftover of [rp.itemsTmp, rp.itemsBackup, rp.verifyTmp, rp.verifyBackup]) {
        expect(fs.existsSync(leftover)).toBe(false);
      }
    });
  });
});
