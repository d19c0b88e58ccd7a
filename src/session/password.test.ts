import fs from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { encrypt, type KdfParams } from "../crypto/envelope.js";
import {
  AlreadyExistsError,
  CorruptedError,
  InvalidInputError,
  NotFoundError,
  WrongPasswordError,
} from "../vault/errors.js";
import { PasswordSession, PasswordVerifier, SESSION_PASSWORD_KEY } from "./password.js";
import { MemorySessionStore } from "./session-store.js";

const TEST_KDF: KdfParams = { t: 1, m: 64, p: 1 };

describe("PasswordVerifier", () => {
  let tempDir: string;
  let verifier: PasswordVerifier;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "sealbox-password-test-"));
    verifier = new PasswordVerifier(path.join(tempDir, "vault", ".sealbox-key"), TEST_KDF);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("reports a missing verification file", async () => {
    expect(verifier.exists()).toBe(false);
    await expect(verifier.verify("test-secret")).rejects.toThrow(NotFoundError);
  });

  it("creates the verification file and accepts the same password", async () => {
    await verifier.create("test-secret");

    expect(verifier.exists()).toBe(true);
    await expect(verifier.verify("test-secret")).resolves.toBeUndefined();
  });

  it("rejects a different password", async () => {
    await verifier.create("test-secret");

    await expect(verifier.verify("other-secret")).rejects.toThrow(WrongPasswordError);
  });

  it("refuses to create twice", async () => {
    await verifier.create("test-secret");

    await expect(verifier.create("other-secret")).rejects.toThrow(AlreadyExistsError);
    await expect(verifier.verify("test-secret")).resolves.toBeUndefined();
  });

  it("refuses an empty password", async () => {
    await expect(verifier.create("")).rejects.toThrow(InvalidInputError);
  });

  it("treats a decryptable file with the wrong content as corruption", async () => {
    fs.mkdirSync(path.dirname(verifier.verifyFile), { recursive: true });
    fs.writeFileSync(
      verifier.verifyFile,
      encrypt(new TextEncoder().encode("something else"), "test-secret", TEST_KDF),
    );

    await expect(verifier.verify("test-secret")).rejects.toThrow(CorruptedError);
  });
});

describe("PasswordSession", () => {
  let tempDir: string;
  let store: MemorySessionStore;
  let verifier: PasswordVerifier;
  let session: PasswordSession;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "sealbox-password-test-"));
    store = new MemorySessionStore();
    verifier = new PasswordVerifier(path.join(tempDir, ".sealbox-key"), TEST_KDF);
    session = new PasswordSession(store, verifier);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Cache
  // ─────────────────────────────────────────────────────────────────────────

  describe("cache", () => {
    it("returns null when nothing is cached", async () => {
      expect(await session.getCachedPassword()).toBe(null);
      expect(await session.hasActiveSession()).toBe(false);
    });

    it("caches and clears a password", async () => {
      await session.cachePassword("test-secret");
      expect(await session.getCachedPassword()).toBe("test-secret");
      expect(await session.hasActiveSession()).toBe(true);

      await session.clearSession();
      expect(await session.getCachedPassword()).toBe(null);
    });

    it("refuses to cache an empty password", async () => {
      await expect(session.cachePassword("")).rejects.toThrow(InvalidInputError);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Verification
  // ─────────────────────────────────────────────────────────────────────────

  describe("verifyPassword", () => {
    it("checks the candidate rather than the cached value", async () => {
      await verifier.create("test-secret");
      await session.cachePassword("test-secret");

      await expect(session.verifyPassword("wrong-secret")).rejects.toThrow(WrongPasswordError);
      expect(await session.getCachedPassword()).toBe("test-secret");
    });

    it("leaves a different cached password in place", async () => {
      await verifier.create("test-secret");
      await store.write(SESSION_PASSWORD_KEY, "stale-secret");

      await session.verifyPassword("test-secret");

      expect(await session.getCachedPassword()).toBe("stale-secret");
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Prompt flow
  // ─────────────────────────────────────────────────────────────────────────

  describe("getPasswordWithVerification", () => {
    it("bootstraps the verification file on first run", async () => {
      const prompt = vi.fn().mockResolvedValue("test-secret");

      const password = await session.getPasswordWithVerification(prompt);

      expect(password).toBe("test-secret");
      expect(prompt).toHaveBeenCalledTimes(1);
      expect(verifier.exists()).toBe(true);
      expect(await session.getCachedPassword()).toBe("test-secret");
    });

    it("returns a cached password that still verifies without prompting", async () => {
      await verifier.create("test-secret");
      await session.cachePassword("test-secret");
      const prompt = vi.fn().mockResolvedValue("unused");

      expect(await session.getPasswordWithVerification(prompt)).toBe("test-secret");
      expect(prompt).not.toHaveBeenCalled();
    });

    it("drops a stale cached password and prompts", async () => {
      await verifier.create("test-secret");
      await session.cachePassword("stale-secret");
      const prompt = vi.fn().mockResolvedValue("test-secret");

      expect(await session.getPasswordWithVerification(prompt)).toBe("test-secret");
      expect(prompt).toHaveBeenCalledTimes(1);
      expect(await session.getCachedPassword()).toBe("test-secret");
    });

    it("clears the cache when the verification file is corrupted", async () => {
      fs.mkdirSync(path.dirname(verifier.verifyFile), { recursive: true });
      fs.writeFileSync(
        verifier.verifyFile,
        encrypt(new TextEncoder().encode("something else"), "test-secret", TEST_KDF),
      );
      await session.cachePassword("test-secret");
      const prompt = vi.fn().mockResolvedValue("test-secret");

      await expect(session.getPasswordWithVerification(prompt)).rejects.toThrow(CorruptedError);
      expect(await session.getCachedPassword()).toBe(null);
      expect(prompt).not.toHaveBeenCalled();
    });

    it("rejects a wrong prompted password and leaves the cache empty", async () => {
      await verifier.create("test-secret");
      const prompt = vi.fn().mockResolvedValue("wrong-secret");

      await expect(session.getPasswordWithVerification(prompt)).rejects.toThrow(WrongPasswordError);
      expect(await session.getCachedPassword()).toBe(null);
    });

    it("rejects an empty prompted password", async () => {
      const prompt = vi.fn().mockResolvedValue("");

      await expect(session.getPasswordWithVerification(prompt)).rejects.toThrow(InvalidInputError);
      expect(verifier.exists()).toBe(false);
    });
  });
});
