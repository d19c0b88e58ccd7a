/**
 * Link manifest: item ID -> { targetPath, contentHash }, stored as links.json
 * in the vault root and rewritten whole on every change.
 */

import { z } from "zod";
import { CorruptedError, toIoFailure } from "../vault/errors.js";
import { readFileIfExists, writeFileAtomic } from "../vault/fs-utils.js";

export const HASH_PREFIX = "sha256:";

const linkEntrySchema = z.object({
  targetPath: z.string().min(1),
  contentHash: z.string().startsWith(HASH_PREFIX),
});

const manifestSchema = z.record(z.string(), linkEntrySchema);

export type LinkEntry = z.infer<typeof linkEntrySchema>;

export type LinkManifest = Record<string, LinkEntry>;

export class ManifestStore {
  constructor(readonly manifestFile: string) {}

  /**
   * Load the manifest. A missing file is an empty manifest.
   */
  async load(): Promise<LinkManifest> {
    let data: Buffer | null;
    try {
      data = await readFileIfExists(this.manifestFile);
    } catch (err) {
      throw toIoFailure("read link manifest", err);
    }
    if (data === null) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data.toString("utf-8"));
    } catch (err) {
      throw new CorruptedError("Link manifest is not valid JSON", { cause: err });
    }
    const result = manifestSchema.safeParse(raw);
    if (!result.success) {
      throw new CorruptedError(`Link manifest is malformed: ${result.error.issues[0]?.message ?? "invalid"}`);
    }
    return result.data;
  }

  async save(manifest: LinkManifest): Promise<void> {
    try {
      await writeFileAtomic(this.manifestFile, `${JSON.stringify(manifest, null, 2)}\n`);
    } catch (err) {
      throw toIoFailure("write link manifest", err);
    }
  }

  async get(id: string): Promise<LinkEntry | undefined> {
    const manifest = await this.load();
    return Object.hasOwn(manifest, id) ? manifest[id] : undefined;
  }

  async set(id: string, entry: LinkEntry): Promise<void> {
    const manifest = await this.load();
    manifest[id] = entry;
    await this.save(manifest);
  }

  /**
   * Remove an entry. Returns false when there was none.
   */
  async remove(id: string): Promise<boolean> {
    const manifest = await this.load();
    if (!Object.hasOwn(manifest, id)) {
      return false;
    }
    delete manifest[id];
    await this.save(manifest);
    return true;
  }
}
