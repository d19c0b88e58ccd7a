/**
 * Password envelope encryption.
 *
 * Format: salt (16 bytes) + nonce (12 bytes) + ciphertext + GCM tag (16 bytes).
 * The key is derived per envelope with Argon2id from the password and the
 * embedded salt; salt and nonce are fresh on every call, so encrypting the
 * same plaintext twice never yields the same bytes.
 */

import { gcm } from "@noble/ciphers/aes.js";
import { argon2id } from "@noble/hashes/argon2.js";
import crypto from "node:crypto";
import { CorruptedError, InvalidInputError, WrongPasswordError } from "../vault/errors.js";

// ============================================================================
// Constants
// ============================================================================

export const SALT_LENGTH = 16;
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;
export const KEY_LENGTH = 32;
export const MIN_ENVELOPE_LENGTH = SALT_LENGTH + NONCE_LENGTH + TAG_LENGTH;

/**
 * Argon2id cost parameters. `m` is in KiB.
 */
export interface KdfParams {
  /** Passes over memory */
  t: number;
  /** Memory in KiB */
  m: number;
  /** Lanes */
  p: number;
}

/**
 * Production parameters: 1 pass, 64 MiB, 4 lanes.
 * WARNING: Only use lower values in test environments!
 */
export const DEFAULT_KDF_PARAMS: Readonly<KdfParams> = Object.freeze({
  t: 1,
  m: 64 * 1024,
  p: 4,
});

// ============================================================================
// Errors
// ============================================================================

export class EnvelopeTooShortError extends CorruptedError {
  constructor(public readonly length: number) {
    super(`Invalid envelope: ${length} bytes, expected at least ${MIN_ENVELOPE_LENGTH}`);
    this.name = "EnvelopeTooShortError";
  }
}

export class AuthenticationFailedError extends WrongPasswordError {
  constructor(options?: ErrorOptions) {
    super("Decryption failed: wrong password or tampered data", options);
    this.name = "AuthenticationFailedError";
  }
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Derive a 32-byte key from a password and salt.
 */
export function deriveKey(
  password: string,
  salt: Uint8Array,
  kdf: KdfParams = DEFAULT_KDF_PARAMS,
): Uint8Array {
  return argon2id(password, salt, { t: kdf.t, m: kdf.m, p: kdf.p, dkLen: KEY_LENGTH });
}

/**
 * Encrypt a payload under a password.
 */
export function encrypt(
  plaintext: Uint8Array,
  password: string,
  kdf: KdfParams = DEFAULT_KDF_PARAMS,
): Uint8Array {
  if (!password) {
    throw new InvalidInputError("Password cannot be empty");
  }

  const salt = new Uint8Array(crypto.randomBytes(SALT_LENGTH));
  const nonce = new Uint8Array(crypto.randomBytes(NONCE_LENGTH));
  const key = deriveKey(password, salt, kdf);

  try {
    const sealed = gcm(key, nonce).encrypt(plaintext);

    const result = new Uint8Array(SALT_LENGTH + NONCE_LENGTH + sealed.length);
    result.set(salt, 0);
    result.set(nonce, SALT_LENGTH);
    result.set(sealed, SALT_LENGTH + NONCE_LENGTH);
    return result;
  } finally {
    key.fill(0);
  }
}

/**
 * Decrypt an envelope produced by {@link encrypt}.
 */
export function decrypt(
  envelope: Uint8Array,
  password: string,
  kdf: KdfParams = DEFAULT_KDF_PARAMS,
): Uint8Array {
  if (envelope.length < MIN_ENVELOPE_LENGTH) {
    throw new EnvelopeTooShortError(envelope.length);
  }

  const salt = envelope.subarray(0, SALT_LENGTH);
  const nonce = envelope.subarray(SALT_LENGTH, SALT_LENGTH + NONCE_LENGTH);
  const sealed = envelope.subarray(SALT_LENGTH + NONCE_LENGTH);
  const key = deriveKey(password, salt, kdf);

  try {
    return gcm(key, nonce).decrypt(sealed);
  } catch (err) {
    throw new AuthenticationFailedError({ cause: err });
  } finally {
    key.fill(0);
  }
}

export function encryptString(
  plaintext: string,
  password: string,
  kdf: KdfParams = DEFAULT_KDF_PARAMS,
): Uint8Array {
  return encrypt(new TextEncoder().encode(plaintext), password, kdf);
}

export function decryptString(
  envelope: Uint8Array,
  password: string,
  kdf: KdfParams = DEFAULT_KDF_PARAMS,
): string {
  return new TextDecoder().decode(decrypt(envelope, password, kdf));
}
