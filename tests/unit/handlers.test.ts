import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { EmbeddingGateway } from "../../src/embeddings/gateway.js";
import { RecordValidationError } from "../../src/errors.js";
import { handleGetMemoryItem } from "../../src/handlers/get-memory-item.js";
import { handleIngestItem } from "../../src/handlers/ingest-item.js";
import { handleListMemoryItems, truncateText } from "../../src/handlers/list-memory-items.js";
import { handleRebuildIndices } from "../../src/handlers/rebuild-indices.js";
import { handleSearchMemory } from "../../src/handlers/search-memory.js";
import type { ToolResponse } from "../../src/handlers/shared.js";
import { handleStorageStats } from "../../src/handlers/storage-stats.js";
import { StorageManager } from "../../src/storage-manager.js";
import { FakeTextEmbedder, FakeVisualEmbedder } from "../helpers/fake-embedders.js";

function payload(response: ToolResponse): unknown {
  expect(response.content).toHaveLength(1);
  return JSON.parse(response.content[0].text);
}

const meeting = {
  id: "clip-1",
  timestamp: "2024-05-01T10:00:00Z",
  content_type: "text",
  content_preview: "Meet at 3pm",
  source: "clipboard",
  file_path: null,
};

describe("tool handlers", () => {
  let store: StorageManager;

  beforeEach(() => {
    store = StorageManager.open({
      sqlitePath: ":memory:",
      indexDir: null,
      gateway: new EmbeddingGateway(new FakeTextEmbedder(), new FakeVisualEmbedder()),
    });
  });

  afterEach(() => {
    store.close();
  });

  describe("ingest_item", () => {
    it("should report what was stored", async () => {
      expect(payload(await handleIngestItem(store, { record: meeting }))).toEqual({
        success: true,
        status: "ingested",
        item: {
          id: "clip-1",
          timestamp: "2024-05-01T10:00:00.000Z",
          content_type: "text",
          source: "clipboard",
          content_preview: "Meet at 3pm",
          file_path: null,
        },
        chunks: 1,
        text_chunks: 1,
        visual_chunks: 0,
        skipped_units: 0,
      });
    });

    it("should report duplicates", async () => {
      await handleIngestItem(store, { record: meeting });
      expect(payload(await handleIngestItem(store, { record: meeting }))).toEqual({
        success: true,
        status: "duplicate",
        id: "clip-1",
      });
    });

    it("should ingest batches", async () => {
      const response = await handleIngestItem(store, {
        records: [{ record: meeting }, { record: { id: "bad-1", content_type: "text" } }],
      });

      expect(payload(response)).toMatchObject({
        success: false,
        ingested: 1,
        duplicates: 0,
        failed: [{ id: "bad-1" }],
      });
    });

    it("should reject calls without a record", async () => {
      await expect(handleIngestItem(store, {})).rejects.toThrow(RecordValidationError);
    });
  });

  describe("search_memory", () => {
    beforeEach(async () => {
      await store.ingest(meeting);
    });

    it("should return results and the context block", async () => {
      const response = await handleSearchMemory(store, { query: "Meet at 3pm", limit: 1, include_context: true });

      expect(payload(response)).toMatchObject({
        query: "Meet at 3pm",
        modality: "text",
        results: 1,
        memories: [{ modality: "text", item: { id: "clip-1" }, chunk: { id: "clip-1#0", text: "Meet at 3pm" } }],
        context: "[1] Source: clipboard (text, relevance: 1.00)\nMeet at 3pm\n",
      });
    });

    it("should accept filters", async () => {
      const response = await handleSearchMemory(store, { query: "Meet at 3pm", source: "gmail" });
      expect(payload(response)).toMatchObject({ results: 0, memories: [] });
    });

    it("should reject an empty query", async () => {
      await expect(handleSearchMemory(store, { query: "" })).rejects.toThrow(
        "Invalid arguments for search_memory: query: Query is required"
      );
    });
  });

  describe("get_memory_item", () => {
    it("should return the item with its chunks", async () => {
      await store.ingest(meeting);

      expect(payload(await handleGetMemoryItem(store, { id: "clip-1" }))).toMatchObject({
        success: true,
        item: { id: "clip-1" },
        chunks: [{ id: "clip-1#0", sequence_index: 0, modality: "text", text: "Meet at 3pm", start: 0, end: 11 }],
      });
    });

    it("should report unknown ids", async () => {
      expect(payload(await handleGetMemoryItem(store, { id: "nope" }))).toEqual({
        success: false,
        error: "Memory item with ID 'nope' not found",
      });
    });
  });

  describe("list_memory_items", () => {
    it("should list filtered items with truncated previews", async () => {
      await store.ingest(meeting);
      await store.ingest({ ...meeting, id: "file-1", source: "filesystem", content_preview: "word ".repeat(60) });

      const listed = payload(await handleListMemoryItems(store, { source: "filesystem" }));

      expect(listed).toMatchObject({
        count: 1,
        items: [{ id: "file-1", content_preview: `${"word ".repeat(40).trimEnd()}...` }],
      });
    });

    it("should leave short text alone", () => {
      expect(truncateText("short")).toBe("short");
      expect(truncateText("x".repeat(250))).toBe(`${"x".repeat(200)}...`);
    });
  });

  describe("storage_stats and rebuild_indices", () => {
    it("should report counts and index health", async () => {
      await store.ingest(meeting);

      expect(payload(await handleStorageStats(store, "local_english"))).toEqual({
        memory_items: 1,
        chunks: 1,
        text_chunks: 1,
        visual_chunks: 0,
        text_embedding: "local_english",
        indices: [
          { key: "text-l2-384", modality: "text", size: 1, corrupt: false },
          { key: "visual-ip-512", modality: "visual", size: 0, corrupt: false },
        ],
      });
    });

    it("should rebuild both indices", async () => {
      await store.ingest(meeting);

      expect(payload(await handleRebuildIndices(store))).toMatchObject({
        success: true,
        text_vectors: 1,
        visual_vectors: 0,
      });
    });
  });
});
