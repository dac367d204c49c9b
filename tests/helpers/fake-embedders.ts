/**
 * Deterministic in-process encoders for tests
 *
 * Both hash lowercase word tokens into a bag-of-words vector, so identical
 * word sets embed identically and text can be matched against "images"
 * whose bytes spell out what they show.
 */

import { EncodingError } from "../../src/errors.js";
import type { EmbeddingType, TextEmbedder, VisualEmbedder } from "../../src/embeddings/types.js";
import { normalize } from "../../src/vector.js";

function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function bagOfWords(text: string, dimension: number): number[] {
  const vector = new Array<number>(dimension).fill(0);
  for (const token of text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean)) {
    vector[fnv1a(token) % dimension] += 1;
  }
  return normalize(vector);
}

export class FakeTextEmbedder implements TextEmbedder {
  calls = 0;
  batchCalls = 0;

  constructor(
    private readonly dimension = 384,
    /** Texts containing this marker are rejected */
    private readonly poison = "POISON"
  ) {}

  async embedText(text: string): Promise<number[]> {
    this.calls++;
    this.check(text);
    return bagOfWords(text, this.dimension);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.batchCalls++;
    texts.forEach((text) => this.check(text));
    return texts.map((text) => bagOfWords(text, this.dimension));
  }

  getDimension(): number {
    return this.dimension;
  }

  getType(): EmbeddingType {
    return "local_english";
  }

  private check(text: string): void {
    if (text.includes(this.poison)) {
      throw new EncodingError(`cannot encode text containing ${this.poison}`);
    }
  }
}

/**
 * Treats image bytes (or a path string) as a description of the picture.
 * Bytes starting with "CORRUPT" fail to decode.
 */
export class FakeVisualEmbedder implements VisualEmbedder {
  constructor(private readonly dimension = 512) {}

  async embedImage(image: Buffer | string): Promise<number[]> {
    const description = typeof image === "string" ? image : image.toString("utf8");
    if (description.startsWith("CORRUPT")) {
      throw new EncodingError("cannot decode image");
    }
    return bagOfWords(description, this.dimension);
  }

  async embedText(text: string): Promise<number[]> {
    return bagOfWords(text, this.dimension);
  }

  getDimension(): number {
    return this.dimension;
  }
}

/**
 * Returns vectors of the wrong length
 */
export class BrokenTextEmbedder extends FakeTextEmbedder {
  async embedText(text: string): Promise<number[]> {
    return bagOfWords(text, 10);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => bagOfWords(text, 10));
  }
}
