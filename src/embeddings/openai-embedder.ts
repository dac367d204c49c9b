/**
 * OpenAI Embedder
 *
 * Uses OpenAI API for embeddings (text-embedding-3-small by default),
 * shortened to the configured dimension
 */

import OpenAI from "openai";
import { normalize } from "../vector.js";
import type { TextEmbedder, EmbeddingType } from "./types.js";

export class OpenAIEmbedder implements TextEmbedder {
  private client: OpenAI;
  private model: string;
  private dimension: number;

  constructor(apiKey: string, model: string = "text-embedding-3-small", dimension: number = 1024) {
    this.client = new OpenAI({ apiKey });
    this.model = model;
    this.dimension = dimension;
  }

  async embedText(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        dimensions: this.dimension,
      });

      return response.data
        .sort((a, b) => a.index - b.index)
        .map((item) => normalize(item.embedding));
    } catch (error) {
      throw describeOpenAIError(error);
    }
  }

  getDimension(): number {
    return this.dimension;
  }

  getType(): EmbeddingType {
    return "openai";
  }
}

function describeOpenAIError(error: unknown): unknown {
  if (!(error instanceof OpenAI.APIError)) {
    return error;
  }

  switch (error.status) {
    case 401:
      return new Error(
        "OpenAI API authentication failed. Your API key is invalid. " +
          "Unset OPENAI_API_KEY to use local embeddings, or update the key.",
        { cause: error }
      );
    case 429:
      return new Error(
        "OpenAI API rate limit exceeded. You've hit your quota or rate limit. " +
          "Wait and try again later, or unset OPENAI_API_KEY to use local embeddings.",
        { cause: error }
      );
    case 402:
      return new Error(
        "OpenAI API payment required. Your account needs payment information, " +
          "or unset OPENAI_API_KEY to use local embeddings (no API key needed).",
        { cause: error }
      );
    case 500:
    case 503:
      return new Error(
        "OpenAI API service error. OpenAI's servers are experiencing issues. Try again in a few minutes.",
        { cause: error }
      );
    default:
      return error;
  }
}
