/**
 * Embedder Factory
 *
 * Creates the embedding gateway based on configuration
 */

import type { Config } from "../config.js";
import type { Logger } from "../logger.js";
import { ClipEmbedder } from "./clip-embedder.js";
import { EmbeddingGateway } from "./gateway.js";
import { LocalEmbedder } from "./local-embedder.js";
import { OpenAIEmbedder } from "./openai-embedder.js";
import type { TextEmbedder } from "./types.js";
import { validateOpenAIKey } from "./validation.js";

/**
 * Pick the text embedder
 *
 * Priority:
 * 1. If OPENAI_API_KEY is set and valid → OpenAI embedder
 * 2. Otherwise → Local embedder (uses language_mode: 'en' or 'multilang')
 *
 * The two produce different dimensions, so each gets its own text index.
 */
export async function createTextEmbedder(config: Config, logger: Logger): Promise<TextEmbedder> {
  const { apiKey, embeddingModel, embeddingDimension } = config.openai;

  if (apiKey) {
    if (await validateOpenAIKey(apiKey, embeddingModel, logger)) {
      logger.info({ model: embeddingModel, dimension: embeddingDimension }, "Using OpenAI text embeddings");
      return new OpenAIEmbedder(apiKey, embeddingModel, embeddingDimension);
    }
    logger.warn("OpenAI API key failed validation, falling back to local text embeddings");
  }

  logger.info({ languageMode: config.languageMode }, "Using local text embeddings");
  return new LocalEmbedder(config.languageMode, logger, config.models);
}

export async function createEmbeddingGateway(config: Config, logger: Logger): Promise<EmbeddingGateway> {
  const text = await createTextEmbedder(config, logger.child({ component: "text-embedder" }));
  const visual = new ClipEmbedder(config.visualModel, logger.child({ component: "clip-embedder" }), config.models);
  return new EmbeddingGateway(text, visual);
}
