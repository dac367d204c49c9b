/**
 * OpenAI Key Validation
 *
 * Validates OpenAI API key by making a test embedding call
 */

import OpenAI from "openai";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";

/**
 * Validate OpenAI API key
 * Returns true if valid, false if invalid/missing
 */
export async function validateOpenAIKey(
  apiKey: string,
  model: string = "text-embedding-3-small",
  logger: Logger = silentLogger
): Promise<boolean> {
  if (!apiKey || apiKey.trim() === "") {
    return false;
  }

  try {
    const client = new OpenAI({ apiKey });

    // Make a minimal test call
    await client.embeddings.create({ model, input: "test" });

    return true;
  } catch (error) {
    if (error instanceof OpenAI.APIError) {
      if (error.status === 401) {
        logger.warn("OpenAI API key is invalid");
        return false;
      }
      // Quota and payment problems still mean the key itself is valid
      if (error.status === 429 || error.status === 402) {
        logger.warn({ status: error.status }, "OpenAI API key is valid but the account cannot serve requests right now");
        return true;
      }
    }
    logger.warn({ err: error }, "OpenAI API validation error");
    return false;
  }
}
