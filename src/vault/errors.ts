/**
 * Vault error taxonomy.
 *
 * Every failure surfaced by the core is a VaultError carrying one of a fixed
 * set of codes. Callers branch on `code` (or `instanceof`); the message is for
 * humans.
 */

export type VaultErrorCode =
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "WRONG_PASSWORD"
  | "CORRUPTED"
  | "INVALID_INPUT"
  | "IO_FAILURE"
  | "INCONSISTENT_STATE";

export class VaultError extends Error {
  constructor(
    public readonly code: VaultErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "VaultError";
  }
}

export class NotFoundError extends VaultError {
  constructor(message: string, options?: ErrorOptions) {
    super("NOT_FOUND", message, options);
    this.name = "NotFoundError";
  }
}

export class AlreadyExistsError extends VaultError {
  constructor(message: string, options?: ErrorOptions) {
    super("ALREADY_EXISTS", message, options);
    this.name = "AlreadyExistsError";
  }
}

/**
 * Random ID generation collided on every attempt.
 */
export class IdExhaustedError extends AlreadyExistsError {
  constructor(public readonly attempts: number) {
    super(`Failed to generate a unique item ID after ${attempts} attempts`);
    this.name = "IdExhaustedError";
  }
}

/**
 * Authenticated decryption failed. Wrong password and tampered ciphertext
 * are reported the same way.
 */
export class WrongPasswordError extends VaultError {
  constructor(message = "Wrong password or corrupted data", options?: ErrorOptions) {
    super("WRONG_PASSWORD", message, options);
    this.name = "WrongPasswordError";
  }
}

/**
 * Decryption succeeded but the content is not what it should be.
 */
export class CorruptedError extends VaultError {
  constructor(message: string, options?: ErrorOptions) {
    super("CORRUPTED", message, options);
    this.name = "CorruptedError";
  }
}

export class InvalidInputError extends VaultError {
  constructor(message: string, options?: ErrorOptions) {
    super("INVALID_INPUT", message, options);
    this.name = "InvalidInputError";
  }
}

export class IoFailureError extends VaultError {
  constructor(message: string, options?: ErrorOptions) {
    super("IO_FAILURE", message, options);
    this.name = "IoFailureError";
  }
}

export class InconsistentStateError extends VaultError {
  constructor(message: string, options?: ErrorOptions) {
    super("INCONSISTENT_STATE", message, options);
    this.name = "InconsistentStateError";
  }
}

/**
 * Unlink found neither a symlink nor a spawned file to remove.
 */
export class NothingToCleanUpError extends InconsistentStateError {
  constructor(public readonly id: string) {
    super(`Nothing to clean up for ${id}: link state was already inconsistent`);
    this.name = "NothingToCleanUpError";
  }
}

/**
 * A directory or file swap during password rotation failed.
 * `recovered` tells whether the previous state was put back.
 */
export class RotationSwapError extends InconsistentStateError {
  constructor(
    message: string,
    public readonly recovered: boolean,
    public readonly backupPath: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RotationSwapError";
  }
}

/**
 * Another process holds the vault lock.
 */
export class VaultBusyError extends InconsistentStateError {
  constructor(lockPath: string, options?: ErrorOptions) {
    super(`Vault is locked by another process (${lockPath})`, options);
    this.name = "VaultBusyError";
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export function isVaultError(err: unknown, code?: VaultErrorCode): err is VaultError {
  return err instanceof VaultError && (code === undefined || err.code === code);
}

/**
 * Extract the errno code (ENOENT, EEXIST, ...) from an unknown thrown value.
 */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function isNotFoundErrno(err: unknown): boolean {
  return errnoCode(err) === "ENOENT";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wrap a filesystem failure, leaving vault errors untouched.
 */
export function toIoFailure(action: string, err: unknown): VaultError {
  if (err instanceof VaultError) {
    return err;
  }
  return new IoFailureError(`Failed to ${action}: ${errorMessage(err)}`, { cause: err });
}
