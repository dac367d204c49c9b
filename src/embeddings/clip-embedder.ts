/**
 * CLIP Embedder
 *
 * Image and text towers of a CLIP model via @huggingface/transformers. Both
 * produce 512d vectors in the same space, so a text query can be matched
 * against stored images.
 */

import { EncodingError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { normalize } from "../vector.js";
import { asCallable, tensorData } from "./tensor.js";
import type { AsyncCallable } from "./tensor.js";
import { DEFAULT_MODEL_SOURCE, loadTransformers } from "./transformers.js";
import type { ModelSource } from "./transformers.js";
import { VISUAL_DIMENSION } from "./types.js";
import type { VisualEmbedder } from "./types.js";

interface ClipModels {
  processor: AsyncCallable;
  tokenizer: AsyncCallable;
  vision: AsyncCallable;
  text: AsyncCallable;
  readImage: (image: Buffer | string) => Promise<unknown>;
}

export class ClipEmbedder implements VisualEmbedder {
  private models: Promise<ClipModels> | null = null;

  constructor(
    private readonly modelName: string = "Xenova/clip-vit-base-patch32",
    private readonly logger: Logger = silentLogger,
    private readonly source: ModelSource = DEFAULT_MODEL_SOURCE
  ) {}

  private init(): Promise<ClipModels> {
    if (!this.models) {
      this.models = this.load().catch((error: unknown) => {
        this.models = null;
        throw new Error(`Failed to load CLIP model ${this.modelName}`, { cause: error });
      });
    }
    return this.models;
  }

  private async load(): Promise<ClipModels> {
    this.logger.info(
      { model: this.modelName, allowRemote: this.source.allowRemote, localPath: this.source.localPath },
      "Loading CLIP model"
    );

    const {
      AutoProcessor,
      AutoTokenizer,
      CLIPVisionModelWithProjection,
      CLIPTextModelWithProjection,
      RawImage,
    } = await loadTransformers(this.source);

    const [processor, tokenizer, vision, text] = await Promise.all([
      AutoProcessor.from_pretrained(this.modelName),
      AutoTokenizer.from_pretrained(this.modelName),
      CLIPVisionModelWithProjection.from_pretrained(this.modelName, { dtype: "q8" }),
      CLIPTextModelWithProjection.from_pretrained(this.modelName, { dtype: "q8" }),
    ]);

    this.logger.info({ dimension: VISUAL_DIMENSION }, "CLIP model loaded");

    return {
      processor: asCallable(processor, "CLIP processor"),
      tokenizer: asCallable(tokenizer, "CLIP tokenizer"),
      vision: asCallable(vision, "CLIP vision model"),
      text: asCallable(text, "CLIP text model"),
      readImage: (image) =>
        typeof image === "string" ? RawImage.read(image) : RawImage.fromBlob(new Blob([image])),
    };
  }

  async embedImage(image: Buffer | string): Promise<number[]> {
    const models = await this.init();

    let decoded: unknown;
    try {
      decoded = await models.readImage(image);
    } catch (error) {
      const label = typeof image === "string" ? image : `${image.byteLength}-byte buffer`;
      throw new EncodingError(`Cannot decode image ${label}`, { cause: error });
    }

    const inputs = await models.processor(decoded);
    const output = await models.vision(inputs);
    return normalize(tensorData(output, "image_embeds"));
  }

  async embedText(text: string): Promise<number[]> {
    const models = await this.init();
    const inputs = await models.tokenizer([text], { padding: true, truncation: true });
    const output = await models.text(inputs);
    return normalize(tensorData(output, "text_embeds"));
  }

  getDimension(): number {
    return VISUAL_DIMENSION;
  }
}
