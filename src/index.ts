#!/usr/bin/env node

/**
 * Local Memory Store MCP Server
 *
 * Exposes the unified storage manager over stdio: ingest collector records,
 * search text and images, browse items, and repair the vector indices.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";

import { loadConfig } from "./config.js";
import { createEmbeddingGateway } from "./embeddings/factory.js";
import { MemoryStoreError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { StorageManager } from "./storage-manager.js";
import { handleIngestItem } from "./handlers/ingest-item.js";
import { handleSearchMemory } from "./handlers/search-memory.js";
import { handleGetMemoryItem } from "./handlers/get-memory-item.js";
import { handleListMemoryItems } from "./handlers/list-memory-items.js";
import { handleStorageStats } from "./handlers/storage-stats.js";
import { handleRebuildIndices } from "./handlers/rebuild-indices.js";
import type { ToolResponse } from "./handlers/shared.js";
import { CONTENT_TYPES, SOURCES } from "./types.js";

// ============================================================================
// Tool Definitions
// ============================================================================

const filterProperties = {
  content_type: {
    type: "string",
    enum: [...CONTENT_TYPES],
    description: "Only items of this content type.",
  },
  source: {
    type: "string",
    enum: [...SOURCES],
    description: "Only items from this collector source.",
  },
  since: {
    type: "string",
    description: "Only items at or after this time (ISO 8601).",
  },
  until: {
    type: "string",
    description: "Only items at or before this time (ISO 8601).",
  },
};

const recordEntryProperties = {
  record: {
    type: "object",
    description:
      "Collector record: id, timestamp, content_type, content_preview, source, file_path, plus module-specific keys (url for browser_history, email_details for email, event_details for calendar_event).",
  },
  text: {
    type: "string",
    description: "Full extracted text. Defaults to content_preview.",
  },
  ocr_text: {
    type: "string",
    description: "For images: OCR text, indexed in the text index alongside the image.",
  },
  image_path: {
    type: "string",
    description: "For images: path to the image file. Defaults to file_path.",
  },
};

const TOOLS = [
  {
    name: "ingest_item",
    description:
      "Store a collector record. Text is chunked and embedded into the text index; images go to the visual index. Re-ingesting the same item is a no-op reported as 'duplicate'. Pass 'records' to ingest a batch.",
    inputSchema: {
      type: "object",
      properties: {
        ...recordEntryProperties,
        records: {
          type: "array",
          items: { type: "object", properties: recordEntryProperties, required: ["record"] },
          description: "Batch of entries, each shaped like a single ingest_item call.",
        },
      },
    },
  },
  {
    name: "search_memory",
    description:
      "Semantic search through stored items. modality 'text' searches text chunks, 'visual' matches the query against images, 'both' interleaves the two. Each item appears once, with its best-matching chunk.",
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "What to find. Be specific.",
        },
        limit: {
          type: "number",
          description: "Max results. Default: 10.",
        },
        modality: {
          type: "string",
          enum: ["text", "visual", "both"],
          description: "Which index to search. Default: 'text'.",
        },
        include_context: {
          type: "boolean",
          description: "Also return the results as a numbered context block for answer generation.",
        },
        ...filterProperties,
      },
      required: ["query"],
    },
  },
  {
    name: "get_memory_item",
    description: "Retrieve a memory item and its chunks by ID.",
    inputSchema: {
      type: "object",
      properties: {
        id: {
          type: "string",
          description: "Item ID (from search_memory, list_memory_items, or ingest_item)",
        },
      },
      required: ["id"],
    },
  },
  {
    name: "list_memory_items",
    description: "List memory items newest first. Prefer search_memory for finding specific information.",
    inputSchema: {
      type: "object",
      properties: {
        limit: {
          type: "number",
          description: "Max items. Default: 50.",
        },
        ...filterProperties,
      },
    },
  },
  {
    name: "storage_stats",
    description: "Counts of items and chunks, and the size and health of each vector index.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "rebuild_indices",
    description:
      "Rebuild both vector indices from the metadata store. Use when a search or ingest reports a corrupt index.",
    inputSchema: { type: "object", properties: {} },
  },
];

// ============================================================================
// MCP Server Setup
// ============================================================================

export function createServer(manager: StorageManager, embeddingType: string, logger: Logger): Server {
  const server = new Server(
    {
      name: "local-memory-store",
      version: "1.0.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<ToolResponse> => {
    const { name, arguments: args } = request.params;

    try {
      switch (name) {
        case "ingest_item":
          return await handleIngestItem(manager, args);

        case "search_memory":
          return await handleSearchMemory(manager, args);

        case "get_memory_item":
          return await handleGetMemoryItem(manager, args);

        case "list_memory_items":
          return await handleListMemoryItems(manager, args);

        case "storage_stats":
          return await handleStorageStats(manager, embeddingType);

        case "rebuild_indices":
          return await handleRebuildIndices(manager);

        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      logger.warn({ tool: name, err: error }, "Tool call failed");
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(
              {
                error: errorMessage(error),
                code: error instanceof MemoryStoreError ? error.code : "INTERNAL_ERROR",
              },
              null,
              2
            ),
          },
        ],
        isError: true,
      };
    }
  });

  return server;
}

// ============================================================================
// Server Startup
// ============================================================================

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const gateway = await createEmbeddingGateway(config, logger);
  const manager = StorageManager.open({
    sqlitePath: config.sqlitePath,
    indexDir: config.indexDir,
    gateway,
    chunking: config.chunking,
    fanOut: config.search.fanOut,
    minVisualScore: config.search.minVisualScore,
    rebuildOnCorruption: config.rebuildOnCorruption,
    logger,
  });

  const shutdown = () => {
    manager.close();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  const server = createServer(manager, gateway.textEmbeddingType, logger);
  await server.connect(new StdioServerTransport());

  logger.info(
    { textEmbedding: gateway.textEmbeddingType, sqlitePath: config.sqlitePath, indexDir: config.indexDir },
    "Local memory store MCP server running on stdio"
  );
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
