/**
 * Embedding System Types
 */

export interface TextEmbedder {
  /** Embed a single text */
  embedText(text: string): Promise<number[]>;

  /** Embed multiple texts in batch */
  embedBatch(texts: string[]): Promise<number[][]>;

  /** Get embedding dimension */
  getDimension(): number;

  /** Get embedding type identifier */
  getType(): EmbeddingType;
}

/**
 * Joint image/text encoder (CLIP): both methods land in the same space
 */
export interface VisualEmbedder {
  embedImage(image: Buffer | string): Promise<number[]>;

  /** Project text into the image space, for cross-modal queries */
  embedText(text: string): Promise<number[]>;

  getDimension(): number;
}

export type EmbeddingType = "openai" | "local_english" | "local_multilingual";

export type LanguageMode = "en" | "multilang";

export interface EmbeddingConfig {
  type: EmbeddingType;
  model: string;
  dimension: number;
}

export const EMBEDDING_CONFIGS: Record<EmbeddingType, EmbeddingConfig> = {
  openai: {
    type: "openai",
    model: "text-embedding-3-small",
    dimension: 1024, // shortened via the `dimensions` request parameter
  },
  local_english: {
    type: "local_english",
    model: "Xenova/bge-small-en-v1.5",
    dimension: 384,
  },
  local_multilingual: {
    type: "local_multilingual",
    model: "Xenova/paraphrase-multilingual-MiniLM-L12-v2",
    dimension: 384,
  },
};

export const VISUAL_DIMENSION = 512; // clip-vit-base-patch32
