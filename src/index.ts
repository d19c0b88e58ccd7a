/**
 * sealbox public API.
 *
 * The Vault facade and openVault cover normal use; the lower-level stores are
 * exported for embedding and tests.
 */

// Configuration
export {
  APP_NAME,
  ENV_HOME,
  ENV_LOG_LEVEL,
  ENV_PASSWORD,
  ENV_SESSION_DIR,
  resolveDataHome,
  resolveEnvPassword,
  resolveSessionRoot,
  resolveVaultPaths,
} from "./config/paths.js";
export type { VaultPathOptions, VaultPaths } from "./config/paths.js";

// Envelope crypto
export {
  AuthenticationFailedError,
  DEFAULT_KDF_PARAMS,
  EnvelopeTooShortError,
  decrypt,
  decryptString,
  deriveKey,
  encrypt,
  encryptString,
} from "./crypto/envelope.js";
export type { KdfParams } from "./crypto/envelope.js";

// Links
export { LinkManager, contentHash } from "./links/link-manager.js";
export type { LinkOptions, UnlinkResult } from "./links/link-manager.js";
export { ManifestStore } from "./links/manifest.js";
export type { LinkEntry, LinkManifest } from "./links/manifest.js";

// Logging
export { createSubsystemLogger, setRootLogger } from "./logging/subsystem.js";
export type { LogLevel, SubsystemLogger } from "./logging/subsystem.js";

// Maintenance
export { selfHeal } from "./maintenance/self-heal.js";
export type { SelfHealResult } from "./maintenance/self-heal.js";

// Rotation
export { rotatePassword, rotationPaths } from "./rotation/password-rotation.js";
export type { RotationFs, RotationResult } from "./rotation/password-rotation.js";

// Session
export { PasswordSession, PasswordVerifier, VERIFICATION_CONTENT } from "./session/password.js";
export type { PasswordPrompt } from "./session/password.js";
export { FileSessionStore, MemorySessionStore, sessionDirFor } from "./session/session-store.js";
export type { SessionStore } from "./session/session-store.js";

// Trash
export { Trash } from "./trash/trash.js";
export type { UndoFailure, UndoResult } from "./trash/trash.js";

// Vault
export {
  AlreadyExistsError,
  CorruptedError,
  IdExhaustedError,
  InconsistentStateError,
  InvalidInputError,
  IoFailureError,
  NotFoundError,
  NothingToCleanUpError,
  RotationSwapError,
  VaultBusyError,
  VaultError,
  WrongPasswordError,
  isVaultError,
} from "./vault/errors.js";
export type { VaultErrorCode } from "./vault/errors.js";
export {
  decodeItem,
  encodeItem,
  isProbablyText,
  itemFromFileData,
  newFileItem,
  newTextItem,
  validateItem,
} from "./vault/item.js";
export type { Item, ItemKind, NewItemOptions } from "./vault/item.js";
export { ItemStore, generateItemId } from "./vault/item-store.js";
export type { ReadOptions } from "./vault/item-store.js";
export { VaultLock } from "./vault/lock.js";
export type { VaultLockOptions } from "./vault/lock.js";
export { openVault, resolvePassword } from "./vault/runtime.js";
export type { VaultRuntimeConfig, VaultRuntimeState } from "./vault/runtime.js";
export { Vault } from "./vault/vault.js";
export type { ImportOptions, ItemMutator, MoveResult, VaultOptions } from "./vault/vault.js";
