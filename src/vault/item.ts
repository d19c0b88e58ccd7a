/**
 * Item model and serialization.
 *
 * The decrypted payload of an item file is UTF-8 JSON validated with zod.
 * Text items keep their content as-is; file items keep base64 of the bytes
 * together with the original filename and byte size.
 */

import { z } from "zod";
import { CorruptedError, InvalidInputError } from "./errors.js";

export type ItemKind = "text" | "file";

export interface Item {
  /** Set on items returned by the store; never part of the encrypted payload */
  id?: string;
  title: string;
  tags: string[];
  kind: ItemKind;
  created: Date;
  modified: Date;
  /** Original file name (file items, and text items imported from a file) */
  filename?: string;
  /** Declared byte length of the decoded content (file items) */
  size?: number;
  /** Plaintext for text items, base64 for file items */
  content: string;
}

// ============================================================================
// Schema
// ============================================================================

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "Invalid timestamp" })
  .transform((value) => new Date(value));

const baseItemSchema = z.object({
  title: z.string().trim().min(1, "Title cannot be empty"),
  tags: z.array(z.string()).default([]),
  created: isoTimestamp,
  modified: isoTimestamp,
  content: z.string(),
});

const textItemSchema = baseItemSchema.extend({
  kind: z.literal("text"),
  filename: z.string().min(1).optional(),
  size: z.number().int().nonnegative().optional(),
});

const fileItemSchema = baseItemSchema.extend({
  kind: z.literal("file"),
  filename: z.string().min(1, "File items need a filename"),
  size: z.number().int().nonnegative(),
});

export const storedItemSchema = z.discriminatedUnion("kind", [textItemSchema, fileItemSchema]);

export type StoredItem = z.infer<typeof storedItemSchema>;

// ============================================================================
// Constructors
// ============================================================================

export interface NewItemOptions {
  tags?: string[];
  now?: Date;
}

export function newTextItem(title: string, content: string, options: NewItemOptions = {}): Item {
  const now = options.now ?? new Date();
  const item: Item = {
    title,
    tags: [...(options.tags ?? [])],
    kind: "text",
    created: now,
    modified: now,
    content,
  };
  validateItem(item);
  return item;
}

export function newFileItem(
  title: string,
  filename: string,
  data: Uint8Array,
  options: NewItemOptions = {},
): Item {
  const now = options.now ?? new Date();
  const item: Item = {
    title,
    tags: [...(options.tags ?? [])],
    kind: "file",
    created: now,
    modified: now,
    filename,
    size: data.length,
    content: Buffer.from(data).toString("base64"),
  };
  validateItem(item);
  return item;
}

/**
 * Whether bytes look like text: valid UTF-8 without NUL bytes.
 */
export function isProbablyText(data: Uint8Array): boolean {
  if (data.includes(0)) {
    return false;
  }
  try {
    new TextDecoder("utf-8", { fatal: true }).decode(data);
    return true;
  } catch {
    return false;
  }
}

/**
 * Build an item from the contents of a file, as text when it is text and as a
 * file item otherwise.
 */
export function itemFromFileData(
  title: string,
  filename: string,
  data: Uint8Array,
  options: NewItemOptions = {},
): Item {
  if (!isProbablyText(data)) {
    return newFileItem(title, filename, data, options);
  }
  const item = newTextItem(title, new TextDecoder().decode(data), options);
  item.filename = filename;
  item.size = data.length;
  return item;
}

// ============================================================================
// Validation & Serialization
// ============================================================================

function toStored(item: Item): Record<string, unknown> {
  const stored: Record<string, unknown> = {
    title: item.title,
    tags: item.tags,
    kind: item.kind,
    created: item.created.toISOString(),
    modified: item.modified.toISOString(),
    content: item.content,
  };
  if (item.filename !== undefined) {
    stored.filename = item.filename;
  }
  if (item.size !== undefined) {
    stored.size = item.size;
  }
  return stored;
}

function fromStored(stored: StoredItem): Item {
  const item: Item = {
    title: stored.title,
    tags: stored.tags,
    kind: stored.kind,
    created: stored.created,
    modified: stored.modified,
    content: stored.content,
  };
  if (stored.filename !== undefined) {
    item.filename = stored.filename;
  }
  if (stored.size !== undefined) {
    item.size = stored.size;
  }
  return item;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Check the item invariants before it is written.
 */
export function validateItem(item: Item): void {
  if (Number.isNaN(item.created.getTime()) || Number.isNaN(item.modified.getTime())) {
    throw new InvalidInputError("Invalid item: timestamps must be valid dates");
  }
  const result = storedItemSchema.safeParse(toStored(item));
  if (!result.success) {
    throw new InvalidInputError(`Invalid item: ${describeIssues(result.error)}`);
  }
}

export function encodeItem(item: Item): Uint8Array {
  validateItem(item);
  return new TextEncoder().encode(JSON.stringify(toStored(item)));
}

export function decodeItem(data: Uint8Array): Item {
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder("utf-8", { fatal: true }).decode(data));
  } catch (err) {
    throw new CorruptedError("Item payload is not valid JSON", { cause: err });
  }

  const result = storedItemSchema.safeParse(raw);
  if (!result.success) {
    throw new CorruptedError(`Item payload is malformed: ${describeIssues(result.error)}`);
  }
  return fromStored(result.data);
}

export function cloneItem(item: Item): Item {
  return { ...item, tags: [...item.tags], created: new Date(item.created), modified: new Date(item.modified) };
}

/**
 * Decode the bytes of a file item, checking them against the declared size.
 */
export function fileItemBytes(item: Item): Buffer {
  if (item.kind !== "file") {
    throw new InvalidInputError("Only file items can be exported");
  }
  const data = Buffer.from(item.content, "base64");
  if (item.size === undefined || data.length !== item.size) {
    throw new CorruptedError(
      `File item size mismatch: expected ${item.size ?? "unknown"} bytes, got ${data.length}`,
    );
  }
  return data;
}
