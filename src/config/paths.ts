/**
 * Vault location and environment configuration.
 *
 * Everything lives under a data home (SEALBOX_HOME, else XDG_DATA_HOME, else
 * ~/.local/share): the vault root at <dataHome>/sealbox and the freedesktop
 * trash at <dataHome>/Trash. Session state lives under a volatile directory
 * (SEALBOX_SESSION_DIR, else <tmpdir>/sealbox).
 */

import os from "node:os";
import path from "node:path";

export const APP_NAME = "sealbox";

export const ENV_HOME = "SEALBOX_HOME";
export const ENV_SESSION_DIR = "SEALBOX_SESSION_DIR";
export const ENV_PASSWORD = "SEALBOX_PASSWORD";
export const ENV_LOG_LEVEL = "SEALBOX_LOG_LEVEL";

export const ITEMS_DIR_NAME = "items";
export const SPAWNED_DIR_NAME = ".spawned";
export const MANIFEST_FILE_NAME = "links.json";
export const VERIFY_FILE_NAME = ".sealbox-key";
export const LOCK_FILE_NAME = ".lock";
export const GITIGNORE_FILE_NAME = ".gitignore";

export interface VaultPaths {
  /** Data home the vault and trash hang off */
  dataHome: string;
  /** <dataHome>/sealbox */
  root: string;
  itemsDir: string;
  spawnedDir: string;
  manifestFile: string;
  verifyFile: string;
  lockFile: string;
  gitignoreFile: string;
  trashFilesDir: string;
  trashInfoDir: string;
  /** Parent directory of per-process session directories */
  sessionRoot: string;
}

export interface VaultPathOptions {
  /** Overrides SEALBOX_HOME / XDG_DATA_HOME */
  dataHome?: string;
  /** Overrides SEALBOX_SESSION_DIR */
  sessionRoot?: string;
  env?: NodeJS.ProcessEnv;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function resolveDataHome(env: NodeJS.ProcessEnv = process.env): string {
  return (
    nonEmpty(env[ENV_HOME]) ??
    nonEmpty(env.XDG_DATA_HOME) ??
    path.join(os.homedir(), ".local", "share")
  );
}

export function resolveSessionRoot(env: NodeJS.ProcessEnv = process.env): string {
  return nonEmpty(env[ENV_SESSION_DIR]) ?? path.join(os.tmpdir(), APP_NAME);
}

export function resolveVaultPaths(options: VaultPathOptions = {}): VaultPaths {
  const env = options.env ?? process.env;
  const dataHome = path.resolve(options.dataHome ?? resolveDataHome(env));
  const root = path.join(dataHome, APP_NAME);
  const trashDir = path.join(dataHome, "Trash");

  return {
    dataHome,
    root,
    itemsDir: path.join(root, ITEMS_DIR_NAME),
    spawnedDir: path.join(root, SPAWNED_DIR_NAME),
    manifestFile: path.join(root, MANIFEST_FILE_NAME),
    verifyFile: path.join(root, VERIFY_FILE_NAME),
    lockFile: path.join(root, LOCK_FILE_NAME),
    gitignoreFile: path.join(root, GITIGNORE_FILE_NAME),
    trashFilesDir: path.join(trashDir, "files"),
    trashInfoDir: path.join(trashDir, "info"),
    sessionRoot: path.resolve(options.sessionRoot ?? resolveSessionRoot(env)),
  };
}

/**
 * Password supplied through the environment, if any.
 */
export function resolveEnvPassword(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[ENV_PASSWORD];
  return value ? value : undefined;
}
