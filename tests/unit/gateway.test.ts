import { describe, it, expect } from "vitest";
import { EmbeddingGateway } from "../../src/embeddings/gateway.js";
import { DimensionMismatchError, EncodingError } from "../../src/errors.js";
import { dotProduct } from "../../src/vector.js";
import { BrokenTextEmbedder, FakeTextEmbedder, FakeVisualEmbedder } from "../helpers/fake-embedders.js";

describe("EmbeddingGateway", () => {
  const gateway = new EmbeddingGateway(new FakeTextEmbedder(), new FakeVisualEmbedder());

  it("should expose the dimension of each space", () => {
    expect(gateway.textDimension).toBe(384);
    expect(gateway.visualDimension).toBe(512);
    expect(gateway.textEmbeddingType).toBe("local_english");
  });

  it("should embed text deterministically", async () => {
    const first = await gateway.embedText("Meet at 3pm");
    const second = await gateway.embedText("Meet at 3pm");

    expect(first).toHaveLength(384);
    expect(first).toEqual(second);
  });

  it("should embed batches in input order", async () => {
    const [a, b] = await gateway.embedTextBatch(["alpha", "beta"]);
    expect(a).toEqual(await gateway.embedText("alpha"));
    expect(b).toEqual(await gateway.embedText("beta"));
  });

  it("should place text queries in the image space", async () => {
    const image = await gateway.embedImage(Buffer.from("invoice total 42"));
    const query = await gateway.embedTextForImageSearch("invoice total 42");

    expect(query).toHaveLength(512);
    expect(dotProduct(image, query)).toBeCloseTo(1, 6);
  });

  it("should reject empty input", async () => {
    await expect(gateway.embedText("   ")).rejects.toThrow(EncodingError);
    await expect(gateway.embedTextBatch(["fine", ""])).rejects.toThrow(EncodingError);
    await expect(gateway.embedImage(Buffer.alloc(0))).rejects.toThrow(EncodingError);
    await expect(gateway.embedTextForImageSearch("")).rejects.toThrow(EncodingError);
  });

  it("should pass encoder rejections through", async () => {
    await expect(gateway.embedText("POISON pill")).rejects.toThrow(EncodingError);
    await expect(gateway.embedImage(Buffer.from("CORRUPT bytes"))).rejects.toThrow(EncodingError);
  });

  it("should catch vectors of the wrong dimension", async () => {
    const broken = new EmbeddingGateway(new BrokenTextEmbedder(), new FakeVisualEmbedder());

    await expect(broken.embedText("anything")).rejects.toThrow(DimensionMismatchError);
    await expect(broken.embedText("anything")).rejects.toThrow("Vector dimension 10 does not match dimension 384");
  });
});
