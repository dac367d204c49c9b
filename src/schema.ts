/**
 * Collector Record Validation
 *
 * Every collector emits the same record shape (id, timestamp, content_type,
 * content_preview, source, file_path) plus module-specific keys. The core
 * fields are checked here once; downstream code works with MemoryItem.
 */

import { createHash } from "crypto";
import { existsSync, statSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { IMAGE_CONTENT_TYPES } from "./routing.js";
import { CONTENT_TYPES, SOURCES } from "./types.js";
import type { ContentType, MemoryItem, RawContent } from "./types.js";
import { RecordValidationError } from "./errors.js";

const CORE_KEYS = new Set(["id", "timestamp", "content_type", "content_preview", "source", "file_path"]);

/**
 * Extension keys a record must carry for its content type
 */
export const REQUIRED_FIELDS: Partial<Record<ContentType, string[]>> = {
  browser_history: ["url"],
  email: ["email_details"],
  calendar_event: ["event_details"],
};

export const TimestampSchema = z.union([
  z.number().finite().nonnegative(),
  z
    .string()
    .min(1)
    .transform((value, ctx) => {
      // Collectors write either ISO 8601 or "YYYY-MM-DD HH:MM:SS"
      const parsed = Date.parse(value.includes("T") ? value : value.replace(" ", "T"));
      if (Number.isNaN(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable timestamp '${value}'` });
        return z.NEVER;
      }
      return parsed;
    }),
]);

export const CollectorRecordSchema = z
  .object({
    id: z.string().trim().min(1).optional(),
    timestamp: TimestampSchema,
    content_type: z.enum(CONTENT_TYPES),
    content_preview: z.string(),
    source: z.enum(SOURCES),
    file_path: z.string().nullish(),
  })
  .passthrough()
  .superRefine((record, ctx) => {
    for (const key of REQUIRED_FIELDS[record.content_type] ?? []) {
      const value = record[key];
      if (value === undefined || value === null) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `'${key}' is required for content_type '${record.content_type}'`,
        });
      }
    }
  });

export type CollectorRecord = z.input<typeof CollectorRecordSchema>;

/**
 * Stable content hash used as the item id when a collector omits one.
 * Text is whitespace-normalized; bytes are hashed as they are.
 */
export function computeItemId(source: string, content: string | Buffer): string {
  const hash = createHash("sha256").update(`${source}|`, "utf8");
  if (typeof content === "string") {
    hash.update(content.split(/\s+/).filter(Boolean).join(" "), "utf8");
  } else {
    hash.update(content);
  }
  return hash.digest("hex");
}

/**
 * Path identity of an image file: resolved path, plus size and mtime in
 * seconds when the file exists, so a rewritten file gets a new id.
 */
function fileIdentity(path: string): string {
  const resolved = resolve(path);
  if (!existsSync(resolved)) return resolved;
  const stat = statSync(resolved);
  return `${resolved}|${stat.size}|${Math.floor(stat.mtimeMs / 1000)}`;
}

function identityOf(
  contentType: ContentType,
  preview: string,
  filePath: string | null | undefined,
  raw: RawContent | undefined
): string | Buffer {
  if (IMAGE_CONTENT_TYPES.has(contentType)) {
    const image = raw?.image ?? filePath ?? null;
    const ocr = raw?.ocrText?.trim() ?? "";
    if (Buffer.isBuffer(image)) {
      return Buffer.concat([image, Buffer.from(`|${ocr}`, "utf8")]);
    }
    if (image) {
      return `${fileIdentity(image)}|${ocr}`;
    }
  }
  return raw?.text ?? preview;
}

export function parseRecord(input: unknown, raw?: RawContent): MemoryItem {
  const result = CollectorRecordSchema.safeParse(input);
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`)
      .join("; ");
    throw new RecordValidationError(`Invalid collector record: ${summary}`, result.error.issues);
  }

  const record = result.data;
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!CORE_KEYS.has(key)) {
      fields[key] = value;
    }
  }

  return {
    id:
      record.id ??
      computeItemId(record.source, identityOf(record.content_type, record.content_preview, record.file_path, raw)),
    timestamp: record.timestamp,
    contentType: record.content_type,
    source: record.source,
    contentPreview: record.content_preview,
    rawPath: record.file_path ?? null,
    fields,
  };
}
