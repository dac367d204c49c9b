/**
 * Configuration Management
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

// Load .env file if it exists
loadEnv();

const LanguageModeSchema = z.enum(["en", "multilang"]);
const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "silent"]);

export const ConfigSchema = z.object({
  sqlitePath: z.string().min(1),
  indexDir: z.string().min(1),
  openai: z.object({
    apiKey: z.string(),
    embeddingModel: z.string().min(1),
    embeddingDimension: z.number().int().positive(),
  }),
  languageMode: LanguageModeSchema, // local text model: 'en' or 'multilang'
  visualModel: z.string().min(1),
  models: z.object({
    allowRemote: z.boolean(),
    localPath: z.string().min(1).nullable(),
  }),
  chunking: z.object({
    maxChars: z.number().int().positive(),
    overlapChars: z.number().int().nonnegative(),
  }),
  search: z.object({
    fanOut: z.number().int().positive(),
    minVisualScore: z.number(),
  }),
  rebuildOnCorruption: z.boolean(),
  logLevel: LogLevelSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

const DATA_DIR = process.env.DATA_DIR || join(homedir(), "Documents", "local-memory-store");
export const CONFIG_PATH = process.env.MEMORY_STORE_CONFIG || join(DATA_DIR, "config.json");

export const DEFAULT_CONFIG: Config = {
  sqlitePath: join(DATA_DIR, "metadata.db"),
  indexDir: join(DATA_DIR, "vector_store"),
  openai: {
    apiKey: "",
    embeddingModel: "text-embedding-3-small",
    embeddingDimension: 1024,
  },
  languageMode: "multilang",
  visualModel: "Xenova/clip-vit-base-patch32",
  models: {
    allowRemote: true,
    localPath: null,
  },
  chunking: {
    maxChars: 512,
    overlapChars: 64,
  },
  search: {
    fanOut: 3,
    minVisualScore: 0.22,
  },
  rebuildOnCorruption: false,
  logLevel: "info",
};

function numberFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${name} must be a number, got '${raw}'`);
  }
  return value;
}

function readSavedConfig(path: string): Record<string, unknown> {
  if (!existsSync(path)) return {};
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return z.record(z.unknown()).parse(parsed);
}

/**
 * Defaults, overlaid with the saved JSON config, overlaid with environment
 * variables (which always win).
 */
export function loadConfig(path: string = CONFIG_PATH): Config {
  const saved = readSavedConfig(path);
  const base = ConfigSchema.deepPartial().parse(saved);

  const merged = {
    ...DEFAULT_CONFIG,
    ...base,
    openai: { ...DEFAULT_CONFIG.openai, ...base.openai },
    models: { ...DEFAULT_CONFIG.models, ...base.models },
    chunking: { ...DEFAULT_CONFIG.chunking, ...base.chunking },
    search: { ...DEFAULT_CONFIG.search, ...base.search },
  };

  const env = process.env;
  return ConfigSchema.parse({
    ...merged,
    sqlitePath: env.SQLITE_PATH || merged.sqlitePath,
    indexDir: env.INDEX_DIR || merged.indexDir,
    languageMode: env.LANGUAGE_MODE || merged.languageMode,
    rebuildOnCorruption: env.REBUILD_ON_CORRUPTION
      ? env.REBUILD_ON_CORRUPTION === "true"
      : merged.rebuildOnCorruption,
    logLevel: env.LOG_LEVEL || merged.logLevel,
    models: {
      allowRemote: env.MODELS_ALLOW_REMOTE ? env.MODELS_ALLOW_REMOTE === "true" : merged.models.allowRemote,
      localPath: env.MODELS_LOCAL_PATH || merged.models.localPath,
    },
    openai: {
      ...merged.openai,
      apiKey: env.OPENAI_API_KEY || merged.openai.apiKey,
      embeddingModel: env.OPENAI_EMBEDDING_MODEL || merged.openai.embeddingModel,
      embeddingDimension: numberFromEnv("TEXT_EMBEDDING_DIMENSION") ?? merged.openai.embeddingDimension,
    },
    chunking: {
      maxChars: numberFromEnv("CHUNK_MAX_CHARS") ?? merged.chunking.maxChars,
      overlapChars: numberFromEnv("CHUNK_OVERLAP_CHARS") ?? merged.chunking.overlapChars,
    },
    search: {
      ...merged.search,
      fanOut: numberFromEnv("SEARCH_FAN_OUT") ?? merged.search.fanOut,
    },
  });
}

export function saveConfig(config: Config, path: string = CONFIG_PATH): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  // The API key stays in the environment
  const { apiKey: _apiKey, ...openai } = config.openai;
  writeFileSync(path, JSON.stringify({ ...config, openai }, null, 2));
}
