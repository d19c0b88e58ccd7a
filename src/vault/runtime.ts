/**
 * Vault runtime: opens the vault for the current process.
 *
 * Resolves locations from the environment, keys the session to the parent
 * process, and runs self-heal once when a session starts.
 */

import { resolveEnvPassword, resolveVaultPaths, type VaultPaths } from "../config/paths.js";
import type { KdfParams } from "../crypto/envelope.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { SelfHealResult } from "../maintenance/self-heal.js";
import type { PasswordPrompt } from "../session/password.js";
import { FileSessionStore, sessionDirFor, type SessionStore } from "../session/session-store.js";
import { errorMessage } from "./errors.js";
import type { VaultLockOptions } from "./lock.js";
import { Vault } from "./vault.js";

const log = createSubsystemLogger("runtime");

export interface VaultRuntimeConfig {
  /** Overrides SEALBOX_HOME / XDG_DATA_HOME */
  dataHome?: string;
  /** Overrides SEALBOX_SESSION_DIR */
  sessionRoot?: string;
  env?: NodeJS.ProcessEnv;
  /** Session backend (default: a file store for the parent process) */
  session?: SessionStore;
  kdf?: KdfParams;
  lock?: boolean | VaultLockOptions;
  /** Run self-heal when a new session starts (default: true) */
  selfHeal?: boolean;
}

export interface VaultRuntimeState {
  vault: Vault;
  paths: VaultPaths;
  /** No password was cached when the vault was opened */
  newSession: boolean;
  /** Self-heal outcome, or null when it did not run */
  healed: SelfHealResult | null;
  env: NodeJS.ProcessEnv;
}

export async function openVault(config: VaultRuntimeConfig = {}): Promise<VaultRuntimeState> {
  const env = config.env ?? process.env;
  const paths = resolveVaultPaths({ dataHome: config.dataHome, sessionRoot: config.sessionRoot, env });
  const session = config.session ?? new FileSessionStore(sessionDirFor(paths.sessionRoot));
  const vault = new Vault({ paths, session, kdf: config.kdf, lock: config.lock });

  const newSession = !(await vault.session.hasActiveSession());
  let healed: SelfHealResult | null = null;
  if (newSession && (config.selfHeal ?? true)) {
    try {
      healed = await vault.selfHeal();
    } catch (err) {
      // Items stay usable with an unreadable manifest
      log.warn("Self-heal failed", { error: errorMessage(err) });
    }
  }

  log.debug("Opened vault", { root: paths.root, newSession });
  return { vault, paths, newSession, healed, env };
}

/**
 * A verified password: SEALBOX_PASSWORD when set (checked directly, never
 * through the cache), otherwise the cached password or the prompt.
 */
export async function resolvePassword(state: VaultRuntimeState, prompt: PasswordPrompt): Promise<string> {
  const fromEnv = resolveEnvPassword(state.env);
  if (fromEnv !== undefined) {
    return state.vault.session.authenticate(fromEnv);
  }
  return state.vault.getPasswordWithVerification(prompt);
}
