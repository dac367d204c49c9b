/**
 * Local Embedder
 *
 * Uses @huggingface/transformers for local text embeddings (no API required)
 * Supports both English-only and multilingual models
 */

import { normalize } from "../vector.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { asCallable, tensorData } from "./tensor.js";
import type { AsyncCallable } from "./tensor.js";
import { DEFAULT_MODEL_SOURCE, loadTransformers } from "./transformers.js";
import type { ModelSource } from "./transformers.js";
import { EMBEDDING_CONFIGS } from "./types.js";
import type { EmbeddingConfig, LanguageMode, TextEmbedder, EmbeddingType } from "./types.js";

export class LocalEmbedder implements TextEmbedder {
  private extractor: AsyncCallable | null = null;
  private ready: Promise<void> | null = null;
  private readonly config: EmbeddingConfig;

  constructor(
    languageMode: LanguageMode = "multilang",
    private readonly logger: Logger = silentLogger,
    private readonly source: ModelSource = DEFAULT_MODEL_SOURCE
  ) {
    this.config = EMBEDDING_CONFIGS[languageMode === "en" ? "local_english" : "local_multilingual"];
    // Don't initialize immediately - wait for first use
  }

  private async init(): Promise<AsyncCallable> {
    if (!this.ready) {
      this.ready = (async () => {
        this.logger.info(
          { model: this.config.model, allowRemote: this.source.allowRemote, localPath: this.source.localPath },
          "Loading local text embedding model"
        );
        try {
          // Dynamic import to avoid loading transformers until needed
          const { pipeline } = await loadTransformers(this.source);
          const extractor: unknown = await pipeline("feature-extraction", this.config.model, { dtype: "q8" });
          this.extractor = asCallable(extractor, "feature-extraction pipeline");
          this.logger.info({ dimension: this.config.dimension }, "Text embedding model loaded");
        } catch (error) {
          this.ready = null;
          throw new Error(
            `Failed to load local embedding model ${this.config.model}. ` +
              `Check MODELS_LOCAL_PATH and MODELS_ALLOW_REMOTE, or set OPENAI_API_KEY to use OpenAI embeddings.`,
            { cause: error }
          );
        }
      })();
    }

    await this.ready;
    if (!this.extractor) {
      throw new Error("Local embedding model failed to initialize");
    }
    return this.extractor;
  }

  async embedText(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const extractor = await this.init();
    const output = await extractor(texts, {
      pooling: "mean",
      normalize: true,
    });

    const data = tensorData(output);
    const embeddings: number[][] = [];
    for (let i = 0; i < texts.length; i++) {
      const start = i * this.config.dimension;
      embeddings.push(normalize(data.slice(start, start + this.config.dimension)));
    }
    return embeddings;
  }

  getDimension(): number {
    return this.config.dimension;
  }

  getType(): EmbeddingType {
    return this.config.type;
  }
}
