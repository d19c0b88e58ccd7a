/**
 * Password verification and the per-session password cache.
 *
 * The verification file is an envelope around a fixed string. A password is
 * accepted when it opens that envelope and the content matches; real items are
 * never touched to check a password. The cache only saves a prompt: every
 * cached value is verified again before it is handed out.
 */

import fs from "node:fs";
import path from "node:path";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { DEFAULT_KDF_PARAMS, decrypt, encrypt, type KdfParams } from "../crypto/envelope.js";
import {
  AlreadyExistsError,
  CorruptedError,
  InvalidInputError,
  NotFoundError,
  isVaultError,
  toIoFailure,
} from "../vault/errors.js";
import { DIR_MODE, readFileIfExists, writeFileExclusive } from "../vault/fs-utils.js";
import type { SessionStore } from "./session-store.js";

const log = createSubsystemLogger("password");

export const VERIFICATION_CONTENT = "sealbox-vault-v1";

export const SESSION_PASSWORD_KEY = "password";

/**
 * Asks the user for a password (terminal prompt, GUI dialog, ...).
 */
export type PasswordPrompt = () => Promise<string>;

// ============================================================================
// PasswordVerifier
// ============================================================================

export class PasswordVerifier {
  constructor(
    readonly verifyFile: string,
    private readonly kdf: KdfParams = DEFAULT_KDF_PARAMS,
  ) {}

  /**
   * Whether the vault has been initialized with a password.
   */
  exists(): boolean {
    return fs.existsSync(this.verifyFile);
  }

  /**
   * Build a verification envelope for a password.
   */
  seal(password: string): Uint8Array {
    return encrypt(new TextEncoder().encode(VERIFICATION_CONTENT), password, this.kdf);
  }

  /**
   * Create the verification file (first run).
   */
  async create(password: string): Promise<void> {
    if (!password) {
      throw new InvalidInputError("Password cannot be empty");
    }
    const envelope = this.seal(password);
    try {
      await fs.promises.mkdir(path.dirname(this.verifyFile), { recursive: true, mode: DIR_MODE });
      await writeFileExclusive(this.verifyFile, envelope);
    } catch (err) {
      if (isVaultError(err)) {
        throw err;
      }
      if (fs.existsSync(this.verifyFile)) {
        throw new AlreadyExistsError("Vault password is already set", { cause: err });
      }
      throw toIoFailure("create verification file", err);
    }
    log.info("Created verification file", { path: this.verifyFile });
  }

  /**
   * Check a password against the verification file. Uses exactly the given
   * candidate; nothing cached is consulted.
   */
  async verify(password: string): Promise<void> {
    let envelope: Buffer | null;
    try {
      envelope = await readFileIfExists(this.verifyFile);
    } catch (err) {
      throw toIoFailure("read verification file", err);
    }
    if (envelope === null) {
      throw new NotFoundError("Vault is not initialized: no verification file");
    }

    // Throws WrongPasswordError (or CorruptedError for a truncated file)
    const plain = decrypt(envelope, password, this.kdf);
    if (new TextDecoder().decode(plain) !== VERIFICATION_CONTENT) {
      throw new CorruptedError("Verification file content mismatch");
    }
  }
}

// ============================================================================
// PasswordSession
// ============================================================================

export class PasswordSession {
  constructor(
    private readonly store: SessionStore,
    readonly verifier: PasswordVerifier,
  ) {}

  /**
   * Cache a password for the rest of the session.
   */
  async cachePassword(password: string): Promise<void> {
    if (!password) {
      throw new InvalidInputError("Password cannot be empty");
    }
    await this.store.write(SESSION_PASSWORD_KEY, password);
  }

  /**
   * Cached password, or null when none is cached.
   */
  async getCachedPassword(): Promise<string | null> {
    const cached = await this.store.read(SESSION_PASSWORD_KEY);
    return cached ? cached : null;
  }

  async clearSession(): Promise<void> {
    await this.store.remove(SESSION_PASSWORD_KEY);
  }

  async hasActiveSession(): Promise<boolean> {
    return (await this.getCachedPassword()) !== null;
  }

  /**
   * Verify a candidate password. Never reads or writes the cache.
   */
  async verifyPassword(password: string): Promise<void> {
    await this.verifier.verify(password);
  }

  /**
   * Accept a freshly entered password: bootstrap the verification file when
   * the vault has none, otherwise verify. Caches the password on success.
   */
  async authenticate(candidate: string): Promise<string> {
    if (!candidate) {
      throw new InvalidInputError("Password cannot be empty");
    }

    if (!this.verifier.exists()) {
      await this.verifier.create(candidate);
    } else {
      await this.verifier.verify(candidate);
    }

    await this.cachePassword(candidate);
    return candidate;
  }

  /**
   * Return a verified password, from the cache when it still verifies,
   * otherwise by prompting.
   */
  async getPasswordWithVerification(prompt: PasswordPrompt): Promise<string> {
    const cached = await this.getCachedPassword();
    if (cached !== null) {
      try {
        await this.verifier.verify(cached);
        return cached;
      } catch (err) {
        const code = isVaultError(err) ? err.code : undefined;
        log.debug("Dropping cached password that failed verification", { reason: code });
        await this.clearSession();
        // Only a mismatch or a missing file can be settled by prompting
        if (code !== "WRONG_PASSWORD" && code !== "NOT_FOUND") {
          throw err;
        }
      }
    }

    const entered = await prompt();
    if (!entered) {
      throw new InvalidInputError("Password cannot be empty");
    }
    return this.authenticate(entered);
  }
}
