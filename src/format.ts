/**
 * Response Formatting Utilities
 *
 * Convert store records to plain JSON for tool responses (snake_case keys,
 * ISO 8601 timestamps) and search results to a context block for the RAG stage.
 */

import type { Chunk, MemoryItem, SearchResult } from "./types.js";

/**
 * Convert Unix timestamp (ms) to ISO 8601 string
 */
function formatTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

export interface FormattedMemoryItem {
  id: string;
  timestamp: string;
  content_type: string;
  source: string;
  content_preview: string;
  file_path: string | null;
  [key: string]: unknown;
}

export function formatMemoryItem(item: MemoryItem): FormattedMemoryItem {
  return {
    ...item.fields,
    id: item.id,
    timestamp: formatTimestamp(item.timestamp),
    content_type: item.contentType,
    source: item.source,
    content_preview: item.contentPreview,
    file_path: item.rawPath,
  };
}

/**
 * Format a chunk without its embedding
 */
export function formatChunk(chunk: Chunk): Record<string, unknown> {
  const base = {
    id: chunk.id,
    sequence_index: chunk.sequenceIndex,
    modality: chunk.modality,
  };

  if (chunk.modality === "text") {
    return { ...base, text: chunk.textSpan.text, start: chunk.textSpan.start, end: chunk.textSpan.end };
  }
  return { ...base, frame_path: chunk.frameReference.path, ocr: chunk.frameReference.ocr ?? null };
}

export function formatSearchResult(result: SearchResult): Record<string, unknown> {
  return {
    score: Number(result.score.toFixed(4)),
    modality: result.modality,
    item: formatMemoryItem(result.item),
    chunk: formatChunk(result.chunk),
  };
}

/**
 * Text of the chunk that matched; images fall back to OCR text, then the preview
 */
export function matchedText(result: SearchResult): string {
  const { chunk } = result;
  if (chunk.modality === "text") {
    return chunk.textSpan.text;
  }
  return chunk.frameReference.ocr ?? result.item.contentPreview;
}

/**
 * Build numbered context blocks from ranked results, stopping before the
 * block that would exceed maxChars.
 */
export function buildContext(results: SearchResult[], options: { maxChars?: number } = {}): string {
  const maxChars = options.maxChars ?? 8000;
  const parts: string[] = [];
  let total = 0;

  for (const [i, result] of results.entries()) {
    const part =
      `[${i + 1}] Source: ${result.item.source} ` +
      `(${result.item.contentType}, relevance: ${result.score.toFixed(2)})\n` +
      `${matchedText(result)}\n`;

    if (total + part.length > maxChars) break;
    parts.push(part);
    total += part.length;
  }

  return parts.join("\n---\n");
}
