import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, unlinkSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { VectorIndex, indexKey } from "../../src/vector-index.js";
import { CorruptIndexError, DimensionMismatchError } from "../../src/errors.js";

describe("VectorIndex", () => {
  describe("in memory", () => {
    it("should name itself after modality, metric and dimension", () => {
      expect(new VectorIndex({ modality: "text", dimension: 384 }).key).toBe("text-l2-384");
      expect(new VectorIndex({ modality: "visual", dimension: 512 }).key).toBe("visual-ip-512");
      expect(indexKey("text", "ip", 8)).toBe("text-ip-8");
    });

    it("should return nearest neighbours best first", () => {
      const index = new VectorIndex({ modality: "text", dimension: 3 });
      index.add("a", [0, 0, 0]);
      index.add("b", [1, 0, 0]);
      index.add("c", [3, 0, 0]);

      const hits = index.search([0.9, 0, 0], 2);

      expect(hits.map((hit) => hit.id)).toEqual(["b", "a"]);
      expect(hits[0].slot).toBe(1);
      expect(hits[0].distance).toBeCloseTo(0.1, 6);
      expect(hits[0].score).toBeCloseTo(1 / 1.1, 6);
    });

    it("should break ties by slot", () => {
      const index = new VectorIndex({ modality: "text", dimension: 3 });
      index.add("x", [1, 0, 0]);
      index.add("y", [1, 0, 0]);

      expect(index.search([1, 0, 0], 2).map((hit) => hit.id)).toEqual(["x", "y"]);
    });

    it("should rank inner-product indices by cosine similarity", () => {
      const index = new VectorIndex({ modality: "visual", dimension: 2 });
      index.add("p", [2, 0]);
      index.add("q", [0, 5]);

      const hits = index.search([3, 1], 2);

      expect(hits.map((hit) => hit.id)).toEqual(["p", "q"]);
      expect(hits[0].score).toBeCloseTo(3 / Math.sqrt(10), 6);
      expect(index.search([1, 0], 1)[0].score).toBe(1);
    });

    it("should only consider candidates accepted by the filter", () => {
      const index = new VectorIndex({ modality: "text", dimension: 2 });
      index.add("keep#0", [5, 5]);
      index.add("drop#0", [0, 0]);

      const hits = index.search([0, 0], 5, (id) => id.startsWith("keep"));
      expect(hits.map((hit) => hit.id)).toEqual(["keep#0"]);
    });

    it("should reject vectors of the wrong dimension", () => {
      const index = new VectorIndex({ modality: "text", dimension: 3 });
      expect(() => index.add("z", [1, 2])).toThrow(DimensionMismatchError);
      expect(() => index.search([1, 2], 1)).toThrow(DimensionMismatchError);
      expect(index.size()).toBe(0);
    });

    it("should refuse to bind an id twice", () => {
      const index = new VectorIndex({ modality: "text", dimension: 1 });
      index.add("a", [1]);
      expect(() => index.add("a", [2])).toThrow("already bound to slot 0");
    });

    it("should drop slots above the truncation point", () => {
      const index = new VectorIndex({ modality: "text", dimension: 1 });
      index.add("a", [1]);
      index.add("b", [2]);
      index.add("c", [3]);

      index.truncate(1);

      expect(index.size()).toBe(1);
      expect(index.search([2], 3).map((hit) => hit.id)).toEqual(["a"]);
      expect(index.idAt(1)).toBeUndefined();
      expect(index.add("b", [2])).toBe(1);
    });

    it("should grow past its initial capacity", () => {
      const index = new VectorIndex({ modality: "text", dimension: 2 });
      for (let i = 0; i < 200; i++) {
        index.add(`item-${i}`, [i, 0]);
      }
      expect(index.size()).toBe(200);
      expect(index.search([150, 0], 1)[0]).toMatchObject({ id: "item-150", slot: 150, distance: 0 });
      expect(index.search([199, 0], 1)[0].id).toBe("item-199");
    });

    it("should return nothing from an empty index", () => {
      expect(new VectorIndex({ modality: "text", dimension: 2 }).search([1, 1], 3)).toEqual([]);
    });
  });

  describe("on disk", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "vector-index-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    function populated(): VectorIndex {
      const index = new VectorIndex({ modality: "text", dimension: 3, dir });
      index.add("a", [1, 2, 3]);
      index.add("b", [4, 5, 6]);
      index.persist();
      return index;
    }

    it("should report nothing to load for a fresh directory", () => {
      expect(new VectorIndex({ modality: "text", dimension: 3, dir }).load()).toBe(false);
    });

    it("should load what it persisted", () => {
      populated();

      const reloaded = new VectorIndex({ modality: "text", dimension: 3, dir });
      expect(reloaded.load()).toBe(true);
      expect(reloaded.size()).toBe(2);
      expect(reloaded.idAt(1)).toBe("b");
      expect(reloaded.search([1, 2, 3], 1)[0]).toMatchObject({ id: "a", distance: 0 });
      expect(reloaded.search([4, 5, 6], 1)[0].id).toBe("b");
    });

    it("should detect a vector file that does not match its checksum", () => {
      const index = populated();
      writeFileSync(join(dir, "text-l2-3.vec"), Buffer.alloc(2 * 3 * 4));

      const reloaded = new VectorIndex({ modality: "text", dimension: 3, dir });
      expect(() => reloaded.load()).toThrow(CorruptIndexError);
      expect(index.vectorPath).toBe(join(dir, "text-l2-3.vec"));
    });

    it("should detect a vector file of the wrong length", () => {
      populated();
      writeFileSync(join(dir, "text-l2-3.vec"), Buffer.alloc(7));

      const reloaded = new VectorIndex({ modality: "text", dimension: 3, dir });
      try {
        reloaded.load();
        expect.unreachable("load should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(CorruptIndexError);
        if (error instanceof CorruptIndexError) {
          expect(error.indexKey).toBe("text-l2-3");
          expect(error.code).toBe("CORRUPT_INDEX");
        }
      }
    });

    it("should detect a missing slot mapping", () => {
      populated();
      unlinkSync(join(dir, "text-l2-3.ids.json"));

      expect(() => new VectorIndex({ modality: "text", dimension: 3, dir }).load()).toThrow("has no slot mapping");
    });

    it("should detect a mapping that is not valid JSON", () => {
      populated();
      writeFileSync(join(dir, "text-l2-3.ids.json"), "{ not json");

      expect(() => new VectorIndex({ modality: "text", dimension: 3, dir }).load()).toThrow(CorruptIndexError);
    });
  });
});
