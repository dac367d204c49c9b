/**
 * Embedding Gateway
 *
 * One entry point for every encoder the store uses. Rejects input an
 * encoder cannot handle with EncodingError and checks output dimensions.
 */

import { DimensionMismatchError, EncodingError } from "../errors.js";
import type { TextEmbedder, VisualEmbedder } from "./types.js";

export class EmbeddingGateway {
  constructor(
    private readonly text: TextEmbedder,
    private readonly visual: VisualEmbedder
  ) {}

  get textDimension(): number {
    return this.text.getDimension();
  }

  get visualDimension(): number {
    return this.visual.getDimension();
  }

  get textEmbeddingType(): string {
    return this.text.getType();
  }

  async embedText(text: string): Promise<number[]> {
    assertText(text);
    return checked(await this.text.embedText(text), this.textDimension);
  }

  async embedTextBatch(texts: string[]): Promise<number[][]> {
    texts.forEach(assertText);
    const embeddings = await this.text.embedBatch(texts);
    if (embeddings.length !== texts.length) {
      throw new Error(`Text encoder returned ${embeddings.length} embeddings for ${texts.length} inputs`);
    }
    return embeddings.map((embedding) => checked(embedding, this.textDimension));
  }

  async embedImage(image: Buffer | string): Promise<number[]> {
    if (typeof image === "string" ? image.trim() === "" : image.byteLength === 0) {
      throw new EncodingError("Cannot embed an empty image");
    }
    return checked(await this.visual.embedImage(image), this.visualDimension);
  }

  /**
   * Embed a text query into the visual space
   */
  async embedTextForImageSearch(text: string): Promise<number[]> {
    assertText(text);
    return checked(await this.visual.embedText(text), this.visualDimension);
  }
}

function assertText(text: string): void {
  if (text.trim() === "") {
    throw new EncodingError("Cannot embed empty text");
  }
}

function checked(vector: number[], dimension: number): number[] {
  if (vector.length !== dimension) {
    throw new DimensionMismatchError(dimension, vector.length);
  }
  if (vector.some((value) => !Number.isFinite(value))) {
    throw new EncodingError("Encoder returned a non-finite embedding");
  }
  return vector;
}
