/**
 * Whole-file write helpers shared by the item store, manifest and session files.
 */

import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { isNotFoundErrno } from "./errors.js";

const log = createSubsystemLogger("fs");

export const FILE_MODE = 0o600;
export const DIR_MODE = 0o700;

/**
 * Write a file atomically: write to a temp file beside it, then rename.
 */
export async function writeFileAtomic(
  filePath: string,
  data: string | Uint8Array,
  mode: number = FILE_MODE,
): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${crypto.randomUUID()}.tmp`;

  await fs.promises.mkdir(path.dirname(filePath), { recursive: true, mode: DIR_MODE });

  try {
    await fs.promises.writeFile(tempPath, data, { mode });
    await fs.promises.rename(tempPath, filePath);
  } finally {
    // Clean up temp file if it still exists
    await fs.promises.rm(tempPath, { force: true }).catch((err: unknown) => {
      log.debug("Failed to remove temp file", { path: tempPath, error: err });
    });
  }
}

/**
 * Create a file, failing if anything already exists at the path.
 */
export async function writeFileExclusive(
  filePath: string,
  data: string | Uint8Array,
  mode: number = FILE_MODE,
): Promise<void> {
  await fs.promises.writeFile(filePath, data, { mode, flag: "wx" });
}

/**
 * Read a file, returning null when it does not exist.
 */
export async function readFileIfExists(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.promises.readFile(filePath);
  } catch (err) {
    if (isNotFoundErrno(err)) {
      return null;
    }
    throw err;
  }
}

/**
 * Remove a file. Returns false when it was already gone.
 */
export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.unlink(filePath);
    return true;
  } catch (err) {
    if (isNotFoundErrno(err)) {
      return false;
    }
    throw err;
  }
}

/**
 * lstat that returns null for a missing path (does not follow symlinks).
 */
export async function lstatIfExists(filePath: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.lstat(filePath);
  } catch (err) {
    if (isNotFoundErrno(err)) {
      return null;
    }
    throw err;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  return (await lstatIfExists(filePath)) !== null;
}

export function sha256Hex(data: Uint8Array | string): string {
  return crypto.createHash("sha256").update(data).digest("hex");
}
