/**
 * Handler: search_memory
 *
 * Similarity search over the text index, the visual index, or both, with
 * optional metadata filters. Each memory item appears once.
 */

import { z } from "zod";
import type { StorageManager } from "../storage-manager.js";
import { buildContext, formatSearchResult } from "../format.js";
import { FilterArgsSchema, jsonResponse, parseArgs, toItemFilter } from "./shared.js";
import type { ToolResponse } from "./shared.js";

const SearchArgsSchema = FilterArgsSchema.extend({
  query: z.string().trim().min(1, "Query is required"),
  limit: z.number().int().positive().max(100).default(10),
  modality: z.enum(["text", "visual", "both"]).default("text"),
  include_context: z.boolean().default(false),
});

export async function handleSearchMemory(manager: StorageManager, args: unknown): Promise<ToolResponse> {
  const { query, limit, modality, include_context, ...filterArgs } = parseArgs(SearchArgsSchema, args, "search_memory");

  const results = await manager.search(query, {
    topK: limit,
    modality,
    filter: toItemFilter(filterArgs),
  });

  return jsonResponse({
    query,
    modality,
    results: results.length,
    memories: results.map(formatSearchResult),
    ...(include_context ? { context: buildContext(results) } : {}),
  });
}
