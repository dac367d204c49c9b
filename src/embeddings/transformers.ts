/**
 * Lazy loader for @huggingface/transformers
 *
 * The library is imported on first use and pointed at the configured model
 * source: the Hugging Face hub, a local directory of model files, or both.
 */

export interface ModelSource {
  /** Fetch missing models from the hub on first use */
  allowRemote: boolean;
  /** Directory holding `<org>/<model>/` folders, checked before the hub */
  localPath: string | null;
}

export const DEFAULT_MODEL_SOURCE: ModelSource = {
  allowRemote: true,
  localPath: null,
};

export async function loadTransformers(source: ModelSource) {
  const transformers = await import("@huggingface/transformers");
  transformers.env.allowRemoteModels = source.allowRemote;
  if (source.localPath) {
    transformers.env.allowLocalModels = true;
    transformers.env.localModelPath = source.localPath;
  }
  return transformers;
}
