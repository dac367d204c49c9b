import { describe, it, expect } from "vitest";
import { computeItemId, parseRecord } from "../../src/schema.js";
import { RecordValidationError } from "../../src/errors.js";

describe("collector records", () => {
  it("should map core keys and keep the rest as fields", () => {
    const item = parseRecord({
      id: "visit-1",
      timestamp: "2024-05-01T10:00:00Z",
      content_type: "browser_history",
      content_preview: "Quarterly report draft",
      source: "browser",
      file_path: null,
      url: "https://example.com/report",
      visit_count: 3,
    });

    expect(item).toEqual({
      id: "visit-1",
      timestamp: Date.UTC(2024, 4, 1, 10),
      contentType: "browser_history",
      source: "browser",
      contentPreview: "Quarterly report draft",
      rawPath: null,
      fields: { url: "https://example.com/report", visit_count: 3 },
    });
  });

  it("should accept epoch milliseconds", () => {
    const item = parseRecord({
      id: "clip-1",
      timestamp: 1_714_557_600_000,
      content_type: "text",
      content_preview: "Meet at 3pm",
      source: "clipboard",
      file_path: "/notes/clip-1.txt",
    });

    expect(item.timestamp).toBe(1_714_557_600_000);
    expect(item.rawPath).toBe("/notes/clip-1.txt");
  });

  it("should derive the id from source and content when missing", () => {
    const item = parseRecord({
      timestamp: 0,
      content_type: "text",
      content_preview: "Meet at 3pm",
      source: "clipboard",
    });

    expect(item.id).toBe(computeItemId("clipboard", "Meet at 3pm"));
    expect(item.id).toMatch(/^[0-9a-f]{64}$/);
  });

  it("should prefer the full text over the preview for derived ids", () => {
    const item = parseRecord(
      { timestamp: 0, content_type: "text", content_preview: "Meet...", source: "clipboard" },
      { text: "Meet at 3pm in room 4" }
    );

    expect(item.id).toBe(computeItemId("clipboard", "Meet at 3pm in room 4"));
  });

  describe("derived image ids", () => {
    const shot = { timestamp: 0, content_type: "image", content_preview: "Screenshot", source: "screenshot" };

    it("should hash the image bytes rather than the preview", () => {
      const invoice = parseRecord(shot, { image: Buffer.from("invoice total 42") });
      const beach = parseRecord(shot, { image: Buffer.from("holiday beach sunset") });

      expect(invoice.id).not.toBe(beach.id);
      expect(invoice.id).not.toBe(computeItemId("screenshot", "Screenshot"));
      expect(parseRecord(shot, { image: Buffer.from("invoice total 42") }).id).toBe(invoice.id);
    });

    it("should include the OCR text", () => {
      const image = Buffer.from("scanned page");
      expect(parseRecord(shot, { image, ocrText: "page one" }).id).not.toBe(
        parseRecord(shot, { image, ocrText: "page two" }).id
      );
    });

    it("should hash the resolved path when only a file path is given", () => {
      const first = parseRecord({ ...shot, file_path: "/no/such/dir/shot-a.png" });
      const second = parseRecord({ ...shot, file_path: "/no/such/dir/shot-b.png" });

      expect(first.id).toBe(computeItemId("screenshot", "/no/such/dir/shot-a.png|"));
      expect(first.id).not.toBe(second.id);
    });
  });

  it("should ignore whitespace differences in content hashes", () => {
    expect(computeItemId("clipboard", "  Meet  at\n3pm ")).toBe(computeItemId("clipboard", "Meet at 3pm"));
    expect(computeItemId("gmail", "Meet at 3pm")).not.toBe(computeItemId("clipboard", "Meet at 3pm"));
  });

  it("should require the extension keys of a content type", () => {
    try {
      parseRecord({
        id: "mail-1",
        timestamp: 0,
        content_type: "email",
        content_preview: "Invoice attached",
        source: "gmail",
      });
      expect.unreachable("parseRecord should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(RecordValidationError);
      if (error instanceof RecordValidationError) {
        expect(error.issues.map((issue) => issue.path)).toEqual([["email_details"]]);
        expect(error.message).toBe(
          "Invalid collector record: email_details: 'email_details' is required for content_type 'email'"
        );
      }
    }
  });

  it("should reject unknown content types and sources", () => {
    const base = { id: "x", timestamp: 0, content_preview: "x" };
    expect(() => parseRecord({ ...base, content_type: "video", source: "clipboard" })).toThrow(RecordValidationError);
    expect(() => parseRecord({ ...base, content_type: "text", source: "fax" })).toThrow(RecordValidationError);
  });

  it("should reject unparseable timestamps", () => {
    expect(() =>
      parseRecord({ id: "x", timestamp: "yesterday", content_type: "text", content_preview: "x", source: "clipboard" })
    ).toThrow("Unparseable timestamp 'yesterday'");
  });
});
