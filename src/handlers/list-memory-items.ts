/**
 * Handler: list_memory_items
 *
 * List memory items newest first, filtered by content type, source and time
 */

import { z } from "zod";
import type { StorageManager } from "../storage-manager.js";
import { formatMemoryItem } from "../format.js";
import { FilterArgsSchema, jsonResponse, parseArgs, toItemFilter } from "./shared.js";
import type { ToolResponse } from "./shared.js";

const TRUNCATE_LENGTH = 200;

const ListArgsSchema = FilterArgsSchema.extend({
  limit: z.number().int().positive().max(1000).default(50),
});

/**
 * Truncate text to approximately 200 characters at word boundary
 */
export function truncateText(text: string): string {
  if (text.length <= TRUNCATE_LENGTH) {
    return text;
  }

  const truncated = text.substring(0, TRUNCATE_LENGTH);
  const lastSpace = truncated.lastIndexOf(" ");

  if (lastSpace > 0) {
    return truncated.substring(0, lastSpace) + "...";
  }

  return truncated + "...";
}

export async function handleListMemoryItems(manager: StorageManager, args: unknown): Promise<ToolResponse> {
  const { limit, ...filterArgs } = parseArgs(ListArgsSchema, args, "list_memory_items");
  const items = manager.listItems(toItemFilter(filterArgs), limit);

  return jsonResponse({
    count: items.length,
    items: items.map((item) => {
      const formatted = formatMemoryItem(item);
      return { ...formatted, content_preview: truncateText(formatted.content_preview) };
    }),
    note: "Previews truncated to ~200 characters. Use get_memory_item(id) to retrieve the full item.",
  });
}
