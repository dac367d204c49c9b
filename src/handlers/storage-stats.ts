/**
 * Handler: storage_stats
 */

import type { StorageManager } from "../storage-manager.js";
import { jsonResponse } from "./shared.js";
import type { ToolResponse } from "./shared.js";

export async function handleStorageStats(manager: StorageManager, embeddingType: string): Promise<ToolResponse> {
  const stats = manager.getStats();

  return jsonResponse({
    memory_items: stats.memoryItems,
    chunks: stats.chunks,
    text_chunks: stats.textChunks,
    visual_chunks: stats.visualChunks,
    text_embedding: embeddingType,
    indices: stats.indices,
  });
}
