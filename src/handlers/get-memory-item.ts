/**
 * Handler: get_memory_item
 *
 * Retrieve a specific memory item and its chunks by ID
 */

import { z } from "zod";
import type { StorageManager } from "../storage-manager.js";
import { formatChunk, formatMemoryItem } from "../format.js";
import { jsonResponse, parseArgs } from "./shared.js";
import type { ToolResponse } from "./shared.js";

const GetArgsSchema = z.object({
  id: z.string().min(1, "id parameter is required"),
});

export async function handleGetMemoryItem(manager: StorageManager, args: unknown): Promise<ToolResponse> {
  const { id } = parseArgs(GetArgsSchema, args, "get_memory_item");
  const found = manager.getItem(id);

  if (!found) {
    return jsonResponse({
      success: false,
      error: `Memory item with ID '${id}' not found`,
    });
  }

  return jsonResponse({
    success: true,
    item: formatMemoryItem(found.item),
    chunks: found.chunks.map(formatChunk),
  });
}
