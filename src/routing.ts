/**
 * Content Routing
 *
 * Maps a memory item and its raw payload to the shape the ingestion
 * pipeline works on. Decided once per item at ingestion entry.
 */

import type { ContentType, MemoryItem, RawContent } from "./types.js";

export type IngestPayload =
  | { kind: "text"; text: string }
  | { kind: "image"; image: Buffer | string | null; ocrText: string | null };

export const IMAGE_CONTENT_TYPES: ReadonlySet<ContentType> = new Set<ContentType>(["image"]);

export function routeContent(item: MemoryItem, raw: RawContent = {}): IngestPayload {
  if (IMAGE_CONTENT_TYPES.has(item.contentType)) {
    const ocrText = raw.ocrText?.trim() ? raw.ocrText : null;
    return { kind: "image", image: raw.image ?? item.rawPath, ocrText };
  }

  return { kind: "text", text: textOf(item, raw) };
}

/**
 * Structured keys that carry searchable text, per content type. Calendar and
 * email collectors nest theirs under a details object.
 */
const SEARCHABLE_FIELDS: Partial<Record<ContentType, { nested?: string; keys: string[] }>> = {
  browser_history: { keys: ["title", "url", "search_query"] },
  url: { keys: ["title", "url"] },
  calendar_event: { nested: "event_details", keys: ["summary", "description", "location", "attendees", "start"] },
  email: { nested: "email_details", keys: ["subject", "from", "sender", "to", "recipients", "body_preview"] },
  file: { keys: ["event_type", "filename", "full_path", "destination_path"] },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringsOf(value: unknown): string[] {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? [trimmed] : [];
  }
  if (typeof value === "number" && Number.isFinite(value)) return [String(value)];
  if (Array.isArray(value)) return value.flatMap(stringsOf);
  // attendee objects, {dateTime} starts
  if (isRecord(value)) return Object.values(value).flatMap(stringsOf);
  return [];
}

/**
 * Searchable text from an item's structured fields, in key order
 */
function fieldText(item: MemoryItem): string[] {
  const spec = SEARCHABLE_FIELDS[item.contentType];
  if (!spec) return [];

  const nested = spec.nested ? item.fields[spec.nested] : undefined;
  const fields = isRecord(nested) ? { ...item.fields, ...nested } : item.fields;
  return spec.keys.flatMap((key) => stringsOf(fields[key]));
}

function baseText(item: MemoryItem, raw: RawContent): string {
  if (raw.text !== undefined && raw.text.trim() !== "") {
    return raw.text;
  }
  if (raw.segments && raw.segments.length > 0) {
    return raw.segments
      .map((segment) => segment.text.trim())
      .filter(Boolean)
      .join(" ");
  }
  return item.contentPreview;
}

function textOf(item: MemoryItem, raw: RawContent): string {
  const base = baseText(item, raw);
  const extra: string[] = [];
  for (const part of fieldText(item)) {
    if (!base.includes(part) && !extra.includes(part)) extra.push(part);
  }
  return extra.length > 0 ? [base, ...extra].join(" ") : base;
}
