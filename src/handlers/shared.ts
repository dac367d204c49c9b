/**
 * Helpers shared by the tool handlers
 */

import { z } from "zod";
import { RecordValidationError } from "../errors.js";
import { TimestampSchema } from "../schema.js";
import { CONTENT_TYPES, SOURCES } from "../types.js";
import type { ItemFilter } from "../types.js";

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export function jsonResponse(value: unknown): ToolResponse {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

export const FilterArgsSchema = z.object({
  content_type: z.union([z.enum(CONTENT_TYPES), z.array(z.enum(CONTENT_TYPES))]).optional(),
  source: z.union([z.enum(SOURCES), z.array(z.enum(SOURCES))]).optional(),
  since: TimestampSchema.optional(),
  until: TimestampSchema.optional(),
});

export type FilterArgs = z.infer<typeof FilterArgsSchema>;

export function toItemFilter(args: FilterArgs): ItemFilter {
  const filter: ItemFilter = {};
  if (args.content_type !== undefined) filter.contentType = args.content_type;
  if (args.source !== undefined) filter.source = args.source;
  if (args.since !== undefined) filter.since = args.since;
  if (args.until !== undefined) filter.until = args.until;
  return filter;
}

/**
 * Parse tool arguments, reporting every issue at once
 */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown, tool: string): z.output<T> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
      .join("; ");
    throw new RecordValidationError(`Invalid arguments for ${tool}: ${summary}`, result.error.issues);
  }
  return result.data;
}
