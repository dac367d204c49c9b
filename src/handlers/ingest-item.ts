/**
 * Handler: ingest_item
 *
 * Ingest one collector record, or a batch of them
 */

import { z } from "zod";
import type { StorageManager } from "../storage-manager.js";
import type { BatchEntry } from "../storage-manager.js";
import type { RawContent } from "../types.js";
import { formatMemoryItem } from "../format.js";
import { jsonResponse, parseArgs } from "./shared.js";
import type { ToolResponse } from "./shared.js";

const EntrySchema = z.object({
  record: z.record(z.unknown()),
  text: z.string().optional(),
  ocr_text: z.string().optional(),
  image_path: z.string().optional(),
});

const IngestArgsSchema = z.union([
  EntrySchema,
  z.object({ records: z.array(EntrySchema).min(1) }),
]);

function toBatchEntry(entry: z.infer<typeof EntrySchema>): BatchEntry {
  const raw: RawContent = {};
  if (entry.text !== undefined) raw.text = entry.text;
  if (entry.ocr_text !== undefined) raw.ocrText = entry.ocr_text;
  if (entry.image_path !== undefined) raw.image = entry.image_path;
  return { record: entry.record, raw };
}

export async function handleIngestItem(manager: StorageManager, args: unknown): Promise<ToolResponse> {
  const parsed = parseArgs(IngestArgsSchema, args, "ingest_item");

  if ("records" in parsed) {
    const report = await manager.ingestBatch(parsed.records.map(toBatchEntry));
    return jsonResponse({ success: report.failed.length === 0, ...report });
  }

  const { record, raw } = toBatchEntry(parsed);
  const result = await manager.ingest(record, raw);

  if (result.status === "duplicate") {
    return jsonResponse({ success: true, status: "duplicate", id: result.id });
  }

  manager.flush();
  return jsonResponse({
    success: true,
    status: result.status,
    item: formatMemoryItem(result.item),
    chunks: result.chunks,
    text_chunks: result.textChunks,
    visual_chunks: result.visualChunks,
    skipped_units: result.skipped,
  });
}
