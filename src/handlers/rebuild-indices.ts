/**
 * Handler: rebuild_indices
 *
 * Re-create both vector indices from the embeddings kept in the metadata
 * store. Clears the corrupt state that blocks search and ingestion.
 */

import type { StorageManager } from "../storage-manager.js";
import { jsonResponse } from "./shared.js";
import type { ToolResponse } from "./shared.js";

export async function handleRebuildIndices(manager: StorageManager): Promise<ToolResponse> {
  const started = Date.now();
  const sizes = manager.rebuildIndices();

  return jsonResponse({
    success: true,
    text_vectors: sizes.text,
    visual_vectors: sizes.visual,
    elapsed_ms: Date.now() - started,
  });
}
