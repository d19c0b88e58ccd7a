import fs from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveVaultPaths, type VaultPaths } from "../config/paths.js";
import type { KdfParams } from "../crypto/envelope.js";
import {
  AlreadyExistsError,
  InvalidInputError,
  IoFailureError,
  NotFoundError,
  NothingToCleanUpError,
} from "../vault/errors.js";
import { newFileItem, newTextItem } from "../vault/item.js";
import { ItemStore } from "../vault/item-store.js";
import { LinkManager, contentHash } from "./link-manager.js";

const TEST_KDF: KdfParams = { t: 1, m: 64, p: 1 };
const PASSWORD = "test-secret";

describe("LinkManager", () => {
  let tempDir: string;
  let homeDir: string;
  let paths: VaultPaths;
  let items: ItemStore;
  let links: LinkManager;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "sealbox-links-test-"));
    homeDir = path.join(tempDir, "home");
    fs.mkdirSync(homeDir);
    paths = resolveVaultPaths({ dataHome: path.join(tempDir, "data"), sessionRoot: path.join(tempDir, "session") });
    items = new ItemStore(paths, { kdf: TEST_KDF });
    links = new LinkManager(paths, items);
    items.setReconciler(links);

    await items.create(newTextItem("SSH Config", "Host github.com", { tags: ["ssh"] }), PASSWORD, "abc");
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // link
  // ─────────────────────────────────────────────────────────────────────────

  describe("link", () => {
    it("spawns the item and symlinks the target to it", async () => {
      const target = path.join(homeDir, "config");

      const entry = await links.link("abc", target, PASSWORD);

      expect(fs.lstatSync(target).isSymbolicLink()).toBe(true);
      expect(fs.readlinkSync(target)).toBe(links.spawnedPath("abc"));
      expect(fs.readFileSync(target, "utf-8")).toBe("Host github.com");
      expect(fs.statSync(links.spawnedPath("abc")).mode & 0o777).toBe(0o600);
      expect(entry).toEqual({ targetPath: target, contentHash: contentHash("Host github.com") });
      expect(await links.listLinks()).toEqual({ abc: entry });
    });

    it("refuses to link twice before touching the filesystem", async () => {
      await links.link("abc", path.join(homeDir, "target"), PASSWORD);
      const other = path.join(homeDir, "other");

      await expect(links.link("abc", other, PASSWORD)).rejects.toThrow(AlreadyExistsError);
      expect(fs.existsSync(other)).toBe(false);
    });

    it("requires an absolute target path", async () => {
      await expect(links.link("abc", "relative/config", PASSWORD)).rejects.toThrow(InvalidInputError);
    });

    it("refuses to link file items", async () => {
      await items.create(newFileItem("Key", "id_rsa", new Uint8Array([1, 2])), PASSWORD, "key");

      await expect(links.link("key", path.join(homeDir, "id_rsa"), PASSWORD)).rejects.toThrow(
        InvalidInputError,
      );
      expect(fs.existsSync(links.spawnedPath("key"))).toBe(false);
    });

    it("fails for a missing item", async () => {
      await expect(links.link("nop", path.join(homeDir, "x"), PASSWORD)).rejects.toThrow(NotFoundError);
    });

    it("keeps an existing target unless forced", async () => {
      const target = path.join(homeDir, "config");
      fs.writeFileSync(target, "existing");

      await expect(links.link("abc", target, PASSWORD)).rejects.toThrow(AlreadyExistsError);
      expect(fs.readFileSync(target, "utf-8")).toBe("existing");

      await links.link("abc", target, PASSWORD, { force: true });
      expect(fs.readFileSync(target, "utf-8")).toBe("Host github.com");
    });

    it("cleans up when the target directory is missing", async () => {
      const target = path.join(homeDir, "missing", "config");

      await expect(links.link("abc", target, PASSWORD)).rejects.toThrow(IoFailureError);
      expect(fs.existsSync(links.spawnedPath("abc"))).toBe(false);
      expect(await links.listLinks()).toEqual({});
    });

    it("removes the spawned file when the symlink cannot be created", async () => {
      const symlink = vi
        .spyOn(fs.promises, "symlink")
        .mockRejectedValueOnce(Object.assign(new Error("permission denied"), { code: "EACCES" }));

      await expect(links.link("abc", path.join(homeDir, "config"), PASSWORD)).rejects.toThrow(
        IoFailureError,
      );
      expect(fs.existsSync(links.spawnedPath("abc"))).toBe(false);
      expect(await links.listLinks()).toEqual({});
      symlink.mockRestore();
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // sync
  // ─────────────────────────────────────────────────────────────────────────

  describe("syncIfNeeded", () => {
    it("writes external edits back on read", async () => {
      const target = path.join(homeDir, "config");
      await links.link("abc", target, PASSWORD);

      fs.writeFileSync(target, "B");
      const item = await items.read("abc", PASSWORD);

      expect(item.content).toBe("B");
      expect((await items.loadRaw("abc", PASSWORD)).content).toBe("B");
      expect((await links.manifest.get("abc"))?.contentHash).toBe(contentHash("B"));
    });

    it("does nothing when the spawned file is unchanged", async () => {
      await links.link("abc", path.join(homeDir, "config"), PASSWORD);
      const before = await items.loadRaw("abc", PASSWORD);

      expect(await links.syncIfNeeded("abc", PASSWORD)).toBe(false);
      expect((await items.loadRaw("abc", PASSWORD)).modified.toISOString()).toBe(
        before.modified.toISOString(),
      );
    });

    it("does nothing for unlinked items", async () => {
      expect(await links.syncIfNeeded("abc", PASSWORD)).toBe(false);
    });

    it("skips a missing spawned file", async () => {
      await links.link("abc", path.join(homeDir, "config"), PASSWORD);
      fs.rmSync(links.spawnedPath("abc"));

      expect(await links.syncIfNeeded("abc", PASSWORD)).toBe(false);
      expect((await items.loadRaw("abc", PASSWORD)).content).toBe("Host github.com");
    });

    it("does not sync on a pure read", async () => {
      const target = path.join(homeDir, "config");
      await links.link("abc", target, PASSWORD);
      fs.writeFileSync(target, "B");

      expect((await items.read("abc", PASSWORD, { reconcile: false })).content).toBe("Host github.com");
      expect((await links.manifest.get("abc"))?.contentHash).toBe(contentHash("Host github.com"));
    });

    it("skips an edit that is not valid UTF-8 and keeps the stored hash", async () => {
      const target = path.join(homeDir, "config");
      await links.link("abc", target, PASSWORD);
      fs.writeFileSync(target, Buffer.from([0x41, 0xff]));

      expect(await links.syncIfNeeded("abc", PASSWORD)).toBe(false);
      expect((await items.read("abc", PASSWORD)).content).toBe("Host github.com");
      expect((await links.manifest.get("abc"))?.contentHash).toBe(contentHash("Host github.com"));

      fs.writeFileSync(target, "fixed");
      expect((await items.read("abc", PASSWORD)).content).toBe("fixed");
    });
  });

  describe("refresh", () => {
    it("rewrites the spawned file and hash", async () => {
      const target = path.join(homeDir, "config");
      await links.link("abc", target, PASSWORD);

      expect(await links.refresh("abc", "Host example.com")).toBe(true);

      expect(fs.readFileSync(target, "utf-8")).toBe("Host example.com");
      expect((await links.manifest.get("abc"))?.contentHash).toBe(contentHash("Host example.com"));
    });

    it("returns false for unlinked items", async () => {
      expect(await links.refresh("abc", "x")).toBe(false);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // unlink
  // ─────────────────────────────────────────────────────────────────────────

  describe("unlink", () => {
    it("removes the symlink, spawned file and manifest entry", async () => {
      const target = path.join(homeDir, "config");
      const before = await items.loadRaw("abc", PASSWORD);
      await links.link("abc", target, PASSWORD);

      const result = await links.unlink("abc", PASSWORD);

      expect(result).toEqual({ removedSymlink: true, removedSpawned: true });
      expect(fs.existsSync(target)).toBe(false);
      expect(fs.existsSync(links.spawnedPath("abc"))).toBe(false);
      expect(await links.listLinks()).toEqual({});

      const after = await items.loadRaw("abc", PASSWORD);
      expect(after.content).toBe("Host github.com");
      expect(after.modified.toISOString()).toBe(before.modified.toISOString());
    });

    it("keeps pending edits", async () => {
      const target = path.join(homeDir, "config");
      await links.link("abc", target, PASSWORD);
      fs.writeFileSync(target, "edited");

      await links.unlink("abc", PASSWORD);

      expect((await items.loadRaw("abc", PASSWORD)).content).toBe("edited");
    });

    it("refuses to drop pending edits without a password", async () => {
      const target = path.join(homeDir, "config");
      await links.link("abc", target, PASSWORD);
      fs.writeFileSync(target, "edited");

      await expect(links.unlink("abc")).rejects.toThrow(InvalidInputError);

      expect(fs.readlinkSync(target)).toBe(links.spawnedPath("abc"));
      expect(fs.readFileSync(links.spawnedPath("abc"), "utf-8")).toBe("edited");
      expect(await links.isLinked("abc")).toBe(true);
    });

    it("unlinks without a password once the item is gone", async () => {
      const target = path.join(homeDir, "config");
      await links.link("abc", target, PASSWORD);
      fs.writeFileSync(target, "edited");
      await items.delete("abc");

      expect(await links.unlink("abc")).toEqual({ removedSymlink: true, removedSpawned: true });
      expect(await links.listLinks()).toEqual({});
    });

    it("proceeds when the pre-unlink sync fails", async () => {
      const target = path.join(homeDir, "config");
      await links.link("abc", target, PASSWORD);
      fs.writeFileSync(target, "edited");

      await links.unlink("abc", "wrong-secret");

      expect(fs.existsSync(target)).toBe(false);
      expect((await items.loadRaw("abc", PASSWORD)).content).toBe("Host github.com");
    });

    it("fails for an unlinked item", async () => {
      await expect(links.unlink("abc")).rejects.toThrow(NotFoundError);
    });

    it("reports nothing to clean up and still drops the entry", async () => {
      const target = path.join(homeDir, "config");
      await links.link("abc", target, PASSWORD);
      fs.rmSync(target);
      fs.rmSync(links.spawnedPath("abc"));

      await expect(links.unlink("abc")).rejects.toThrow(NothingToCleanUpError);
      expect(await links.isLinked("abc")).toBe(false);
    });

    it("leaves a target that is no longer a symlink", async () => {
      const target = path.join(homeDir, "config");
      await links.link("abc", target, PASSWORD);
      fs.rmSync(target);
      fs.writeFileSync(target, "user file");

      const result = await links.unlink("abc");

      expect(result).toEqual({ removedSymlink: false, removedSpawned: true });
      expect(fs.readFileSync(target, "utf-8")).toBe("user file");
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // lookups
  // ─────────────────────────────────────────────────────────────────────────

  describe("lookups", () => {
    it("reports linked paths", async () => {
      const target = path.join(homeDir, "config");
      await links.link("abc", target, PASSWORD);

      expect(await links.getLinkedPath("abc")).toBe(target);
      expect(await links.isLinked("abc")).toBe(true);
      expect(await links.isLinked("zzz")).toBe(false);
    });

    it("treats an unreadable manifest as not linked", async () => {
      fs.mkdirSync(paths.root, { recursive: true });
      fs.writeFileSync(paths.manifestFile, "{broken");

      expect(await links.getLinkedPath("abc")).toBe(undefined);
      expect(await links.isLinked("abc")).toBe(false);
    });

    it("lists spawned files", async () => {
      await links.link("abc", path.join(homeDir, "config"), PASSWORD);
      fs.writeFileSync(path.join(paths.spawnedDir, "stray"), "x");

      expect(await links.listSpawnedFiles()).toEqual(["abc", "stray"]);
    });

    it("finds orphaned entries and spawned files", async () => {
      await links.link("abc", path.join(homeDir, "config"), PASSWORD);
      fs.writeFileSync(path.join(paths.spawnedDir, "stray"), "x");

      expect(await links.orphanedSpawnedFiles()).toEqual(["stray"]);
      expect(await links.orphanedLinkIds(async () => true)).toEqual([]);
      expect(await links.orphanedLinkIds(async (id) => id !== "abc")).toEqual(["abc"]);
    });
  });
});
