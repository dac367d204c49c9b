/**
 * Helpers for calling @huggingface/transformers pipelines and models, whose
 * instances are callable objects without call signatures in their typings.
 */

export type AsyncCallable = (...args: unknown[]) => Promise<unknown>;

export function asCallable(value: unknown, what: string): AsyncCallable {
  if (typeof value !== "function") {
    throw new Error(`${what} is not callable`);
  }
  return async (...args: unknown[]): Promise<unknown> => {
    const result: unknown = await value(...args);
    return result;
  };
}

/**
 * Flat numeric data of a tensor, optionally read from a named output
 * (e.g. `image_embeds`)
 */
export function tensorData(output: unknown, field?: string): number[] {
  let tensor: unknown = output;
  if (field !== undefined) {
    if (typeof output !== "object" || output === null || !(field in output)) {
      throw new Error(`Model output has no '${field}' tensor`);
    }
    tensor = Reflect.get(output, field);
  }

  if (typeof tensor !== "object" || tensor === null || !("data" in tensor)) {
    throw new Error("Model output is not a tensor");
  }
  const data = tensor.data;
  if (!(data instanceof Float32Array) && !Array.isArray(data)) {
    throw new Error("Tensor data is not numeric");
  }
  return Array.from(data, Number);
}
