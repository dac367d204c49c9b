/**
 * Type Definitions
 */

export const CONTENT_TYPES = [
  "text",
  "url",
  "image",
  "file",
  "calendar_event",
  "browser_history",
  "email",
  "audio",
] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];

export const SOURCES = [
  "browser",
  "clipboard",
  "google_calendar",
  "gmail",
  "filesystem",
  "screenshot",
  "audio",
] as const;

export type Source = (typeof SOURCES)[number];

export type Modality = "text" | "visual";

export type SearchModality = Modality | "both";

/**
 * A top-level ingested unit (one email, one clipboard event, one screenshot...)
 */
export interface MemoryItem {
  id: string;
  timestamp: number;
  contentType: ContentType;
  source: Source;
  contentPreview: string;
  rawPath: string | null;
  /** Module-specific keys of the collector record */
  fields: Record<string, unknown>;
}

export interface TextSpan {
  text: string;
  /** Character offsets into the text the span was cut from */
  start: number;
  end: number;
}

export interface FrameReference {
  path: string | null;
  ocr?: string;
}

interface ChunkBase {
  id: string;
  parentId: string;
  sequenceIndex: number;
  embedding: number[];
}

export interface TextChunk extends ChunkBase {
  modality: "text";
  textSpan: TextSpan;
}

export interface VisualChunk extends ChunkBase {
  modality: "visual";
  frameReference: FrameReference;
}

export type Chunk = TextChunk | VisualChunk;

export interface VectorIndexEntry {
  indexKey: string;
  slot: number;
  chunkId: string;
}

export interface ItemFilter {
  contentType?: ContentType | ContentType[];
  source?: Source | Source[];
  /** Inclusive lower bound, epoch ms */
  since?: number;
  /** Inclusive upper bound, epoch ms */
  until?: number;
  ids?: string[];
}

export interface SearchResult {
  item: MemoryItem;
  chunk: Chunk;
  score: number;
  modality: Modality;
}

/**
 * Raw payload handed over with a record. Everything is optional: text
 * types fall back to the record's preview, images to its file_path.
 */
export interface RawContent {
  text?: string;
  /** Time-aligned transcript segments (speech-to-text output) */
  segments?: Array<{ start: number; end: number; text: string }>;
  image?: Buffer | string;
  ocrText?: string;
}

export type IngestResult =
  | {
      status: "ingested";
      item: MemoryItem;
      chunks: number;
      textChunks: number;
      visualChunks: number;
      skipped: number;
    }
  | { status: "duplicate"; id: string };

export interface BatchReport {
  ingested: number;
  duplicates: number;
  failed: Array<{ id?: string; reason: string }>;
}

export interface StorageStats {
  memoryItems: number;
  chunks: number;
  textChunks: number;
  visualChunks: number;
  indices: Array<{ key: string; modality: Modality; size: number; corrupt: boolean }>;
}
