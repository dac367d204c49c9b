import { describe, it, expect } from "vitest";
import { buildContext, formatChunk, formatMemoryItem, formatSearchResult } from "../../src/format.js";
import type { MemoryItem, SearchResult } from "../../src/types.js";

const note: MemoryItem = {
  id: "clip-1",
  timestamp: Date.UTC(2024, 4, 1, 10),
  contentType: "text",
  source: "clipboard",
  contentPreview: "Meet at 3pm",
  rawPath: null,
  fields: { app: "Notes" },
};

const screenshot: MemoryItem = {
  id: "shot-1",
  timestamp: Date.UTC(2024, 4, 2, 9),
  contentType: "image",
  source: "screenshot",
  contentPreview: "Screenshot of an invoice",
  rawPath: "/screens/shot-1.png",
  fields: {},
};

const textResult: SearchResult = {
  item: note,
  chunk: {
    id: "clip-1#0",
    parentId: "clip-1",
    sequenceIndex: 0,
    modality: "text",
    embedding: [0.1, 0.2],
    textSpan: { text: "Meet at 3pm", start: 0, end: 11 },
  },
  score: 0.91234,
  modality: "text",
};

const imageResult: SearchResult = {
  item: screenshot,
  chunk: {
    id: "shot-1#0",
    parentId: "shot-1",
    sequenceIndex: 0,
    modality: "visual",
    embedding: [0.3, 0.4],
    frameReference: { path: "/screens/shot-1.png" },
  },
  score: 0.5,
  modality: "visual",
};

describe("format", () => {
  it("should format items with snake_case keys and ISO timestamps", () => {
    expect(formatMemoryItem(note)).toEqual({
      app: "Notes",
      id: "clip-1",
      timestamp: "2024-05-01T10:00:00.000Z",
      content_type: "text",
      source: "clipboard",
      content_preview: "Meet at 3pm",
      file_path: null,
    });
  });

  it("should leave embeddings out of formatted chunks", () => {
    expect(formatChunk(textResult.chunk)).toEqual({
      id: "clip-1#0",
      sequence_index: 0,
      modality: "text",
      text: "Meet at 3pm",
      start: 0,
      end: 11,
    });
    expect(formatChunk(imageResult.chunk)).toEqual({
      id: "shot-1#0",
      sequence_index: 0,
      modality: "visual",
      frame_path: "/screens/shot-1.png",
      ocr: null,
    });
  });

  it("should round scores in search results", () => {
    expect(formatSearchResult(textResult).score).toBe(0.9123);
  });

  describe("buildContext", () => {
    it("should number results and separate them", () => {
      expect(buildContext([textResult, imageResult])).toBe(
        "[1] Source: clipboard (text, relevance: 0.91)\nMeet at 3pm\n" +
          "\n---\n" +
          "[2] Source: screenshot (image, relevance: 0.50)\nScreenshot of an invoice\n"
      );
    });

    it("should stop before exceeding the character budget", () => {
      const first = "[1] Source: clipboard (text, relevance: 0.91)\nMeet at 3pm\n";
      expect(buildContext([textResult, imageResult], { maxChars: first.length + 10 })).toBe(first);
    });

    it("should return an empty context for no results", () => {
      expect(buildContext([])).toBe("");
    });
  });
});
