/**
 * Unified Storage Manager
 *
 * Owns the consistency between memory items, their chunks and the slots
 * those chunks occupy in the text and visual vector indices. Nothing else
 * writes to more than one of these stores.
 *
 * Lifecycle: `StorageManager.open()` → ingest / search → `flush()` /
 * `close()`. Vector indices live in memory between flushes; the metadata
 * store commits per item and keeps a copy of every embedding, so an index
 * that is lost or torn can always be rebuilt from it.
 */

import { z } from "zod";
import { chunkText, DEFAULT_CHUNK_OPTIONS } from "./chunker.js";
import type { ChunkOptions } from "./chunker.js";
import { initDatabase } from "./database.js";
import type { EmbeddingGateway } from "./embeddings/gateway.js";
import {
  CorruptIndexError,
  DimensionMismatchError,
  EncodingError,
  IngestionFailed,
  StoreClosedError,
  errorMessage,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { MetadataStore } from "./metadata-store.js";
import { routeContent } from "./routing.js";
import type { IngestPayload } from "./routing.js";
import { parseRecord } from "./schema.js";
import type {
  BatchReport,
  Chunk,
  IngestResult,
  ItemFilter,
  MemoryItem,
  Modality,
  RawContent,
  SearchModality,
  SearchResult,
  StorageStats,
} from "./types.js";
import { VectorIndex } from "./vector-index.js";
import type { VectorIndexOptions } from "./vector-index.js";

export interface StorageManagerOptions {
  /** SQLite file, or ":memory:" */
  sqlitePath: string;
  /** Directory for the vector index files; null keeps indices in memory and rebuilds them on open */
  indexDir: string | null;
  gateway: EmbeddingGateway;
  chunking?: Partial<ChunkOptions>;
  /** Over-fetch multiplier applied before filtering and deduplication */
  fanOut?: number;
  /** Visual hits scoring below this cosine similarity are dropped (default 0.22) */
  minVisualScore?: number;
  /** Rebuild a corrupt index from the metadata store on open instead of blocking it */
  rebuildOnCorruption?: boolean;
  logger?: Logger;
  createIndex?: (options: VectorIndexOptions) => VectorIndex;
}

export interface SearchOptions {
  topK?: number;
  modality?: SearchModality;
  filter?: ItemFilter;
  fanOut?: number;
  minVisualScore?: number;
}

export interface BatchEntry {
  record: unknown;
  raw?: RawContent;
}

interface IndexState {
  index: VectorIndex;
  corrupt: CorruptIndexError | null;
}

const MODALITIES: readonly Modality[] = ["text", "visual"];

const RecordIdSchema = z.object({ id: z.string() });

export function chunkId(parentId: string, sequenceIndex: number): string {
  return `${parentId}#${sequenceIndex}`;
}

const DEFAULT_MIN_VISUAL_SCORE = 0.22;

/**
 * True when no key of the filter restricts anything
 */
function isUnconstrained(filter: ItemFilter): boolean {
  return Object.values(filter).every((value) => value === undefined);
}

export function parentIdOf(id: string): string {
  const separator = id.lastIndexOf("#");
  return separator === -1 ? id : id.slice(0, separator);
}

export class StorageManager {
  private closed = false;
  private readonly inFlight = new Map<string, Promise<IngestResult>>();
  private readonly chunking: ChunkOptions;

  private constructor(
    private readonly metadata: MetadataStore,
    private readonly indices: Record<Modality, IndexState>,
    private readonly gateway: EmbeddingGateway,
    private readonly options: StorageManagerOptions,
    private readonly logger: Logger
  ) {
    this.chunking = { ...DEFAULT_CHUNK_OPTIONS, ...options.chunking };
  }

  /**
   * Open the metadata store and load both vector indices, checking each
   * index against the slot bindings recorded in the metadata store.
   */
  static open(options: StorageManagerOptions): StorageManager {
    const logger = (options.logger ?? silentLogger).child({ component: "storage-manager" });
    const createIndex = options.createIndex ?? ((indexOptions: VectorIndexOptions) => new VectorIndex(indexOptions));

    const metadata = new MetadataStore(initDatabase(options.sqlitePath));
    const indices: Record<Modality, IndexState> = {
      text: {
        index: createIndex({ modality: "text", dimension: options.gateway.textDimension, dir: options.indexDir }),
        corrupt: null,
      },
      visual: {
        index: createIndex({ modality: "visual", dimension: options.gateway.visualDimension, dir: options.indexDir }),
        corrupt: null,
      },
    };

    const manager = new StorageManager(metadata, indices, options.gateway, options, logger);
    for (const modality of MODALITIES) {
      manager.loadIndex(modality);
    }

    logger.info(
      {
        sqlitePath: options.sqlitePath,
        indices: MODALITIES.map((modality) => ({ key: indices[modality].index.key, size: indices[modality].index.size() })),
      },
      "Storage manager ready"
    );
    return manager;
  }

  // ==========================================================================
  // Ingestion
  // ==========================================================================

  /**
   * Ingest one collector record. Returns `duplicate` (and does nothing) when
   * the item is already stored.
   *
   * @throws RecordValidationError when the record is malformed
   * @throws IngestionFailed after rolling back every write for the item
   * @throws CorruptIndexError when a target index must be rebuilt first
   */
  async ingest(record: unknown, raw?: RawContent): Promise<IngestResult> {
    this.assertOpen();
    const item = parseRecord(record, raw);
    return this.serialized(item.id, () => this.ingestItem(item, raw));
  }

  /**
   * Ingest records one after another, isolating failures per record, then
   * flush the indices once.
   */
  async ingestBatch(entries: Iterable<BatchEntry>): Promise<BatchReport> {
    const report: BatchReport = { ingested: 0, duplicates: 0, failed: [] };

    for (const entry of entries) {
      try {
        const result = await this.ingest(entry.record, entry.raw);
        if (result.status === "ingested") {
          report.ingested++;
        } else {
          report.duplicates++;
        }
      } catch (error) {
        if (error instanceof CorruptIndexError || error instanceof StoreClosedError || error instanceof DimensionMismatchError) {
          throw error;
        }
        const parsedId = RecordIdSchema.safeParse(entry.record);
        const id = parsedId.success ? parsedId.data.id : undefined;
        this.logger.warn({ id, err: error }, "Skipping record that failed to ingest");
        report.failed.push({ ...(id !== undefined ? { id } : {}), reason: errorMessage(error) });
      }
    }

    this.flush();
    this.logger.info(
      { ingested: report.ingested, duplicates: report.duplicates, failed: report.failed.length },
      "Batch ingestion finished"
    );
    return report;
  }

  /**
   * Run ingestions of the same id one at a time
   */
  private async serialized(id: string, task: () => Promise<IngestResult>): Promise<IngestResult> {
    const previous = this.inFlight.get(id);
    // The earlier caller receives its own outcome; here it only orders the work
    const ready: Promise<unknown> = previous ? previous.then(() => undefined, () => undefined) : Promise.resolve();
    const run = ready.then(task);
    this.inFlight.set(id, run);
    try {
      return await run;
    } finally {
      if (this.inFlight.get(id) === run) {
        this.inFlight.delete(id);
      }
    }
  }

  private async ingestItem(item: MemoryItem, raw?: RawContent): Promise<IngestResult> {
    if (this.metadata.hasItem(item.id)) {
      this.logger.debug({ id: item.id }, "Duplicate item skipped");
      return { status: "duplicate", id: item.id };
    }

    const payload = routeContent(item, raw);
    const targets: Modality[] =
      payload.kind === "text"
        ? ["text"]
        : [...(payload.image !== null ? (["visual"] as const) : []), ...(payload.ocrText !== null ? (["text"] as const) : [])];
    for (const modality of targets) {
      this.assertUsable(modality);
    }

    let built: { chunks: Chunk[]; skipped: number };
    try {
      built = await this.buildChunks(item, payload);
    } catch (error) {
      if (error instanceof DimensionMismatchError) throw error;
      throw new IngestionFailed(errorMessage(error), item.id, { cause: error });
    }

    if (built.chunks.length === 0) {
      throw new IngestionFailed(
        built.skipped > 0 ? "none of the item's content could be encoded" : "item has no content to index",
        item.id
      );
    }

    return this.commit(item, built.chunks, built.skipped);
  }

  /**
   * Chunk and embed the payload. Sequence indices are fixed before any
   * embedding runs; a unit the encoder rejects is skipped.
   */
  private async buildChunks(item: MemoryItem, payload: IngestPayload): Promise<{ chunks: Chunk[]; skipped: number }> {
    const chunks: Chunk[] = [];
    let skipped = 0;
    let nextSequence = 0;
    let text: string | null;

    if (payload.kind === "image") {
      text = payload.ocrText;
      if (payload.image !== null) {
        const sequenceIndex = nextSequence++;
        try {
          const embedding = await this.gateway.embedImage(payload.image);
          chunks.push({
            id: chunkId(item.id, sequenceIndex),
            parentId: item.id,
            sequenceIndex,
            modality: "visual",
            embedding,
            frameReference: {
              path: typeof payload.image === "string" ? payload.image : item.rawPath,
              ...(payload.ocrText !== null ? { ocr: payload.ocrText } : {}),
            },
          });
        } catch (error) {
          if (!(error instanceof EncodingError)) throw error;
          skipped++;
          this.logger.warn({ id: item.id, err: error }, "Skipping image that could not be encoded");
        }
      }
    } else {
      text = payload.text;
    }

    if (text !== null) {
      const spans = chunkText(text, this.chunking);
      const firstSequence = nextSequence;
      const embeddings = await this.embedSpans(spans.map((span) => span.text));

      spans.forEach((span, i) => {
        const embedding = embeddings[i];
        const sequenceIndex = firstSequence + i;
        if (embedding instanceof EncodingError) {
          skipped++;
          this.logger.warn({ id: item.id, sequenceIndex, err: embedding }, "Skipping text chunk that could not be encoded");
          return;
        }
        chunks.push({
          id: chunkId(item.id, sequenceIndex),
          parentId: item.id,
          sequenceIndex,
          modality: "text",
          embedding,
          textSpan: span,
        });
      });
    }

    return { chunks, skipped };
  }

  /**
   * Batch-embed; if the batch is rejected, embed one by one so that only
   * the offending spans are lost.
   */
  private async embedSpans(texts: string[]): Promise<Array<number[] | EncodingError>> {
    if (texts.length === 0) return [];
    try {
      return await this.gateway.embedTextBatch(texts);
    } catch (error) {
      if (!(error instanceof EncodingError)) throw error;
    }

    const results: Array<number[] | EncodingError> = [];
    for (const text of texts) {
      try {
        results.push(await this.gateway.embedText(text));
      } catch (error) {
        if (!(error instanceof EncodingError)) throw error;
        results.push(error);
      }
    }
    return results;
  }

  /**
   * Write the item, its chunks and their index slots in one step. Runs
   * synchronously, so no other ingestion can add slots in between; on
   * failure the transaction rolls back and each index is cut back to its
   * previous size.
   */
  private commit(item: MemoryItem, chunks: Chunk[], skipped: number): IngestResult {
    const sizes = {
      text: this.indices.text.index.size(),
      visual: this.indices.visual.index.size(),
    };

    let inserted: boolean;
    try {
      inserted = this.metadata.transaction(() => {
        if (!this.metadata.putItem(item)) {
          return false;
        }
        for (const chunk of chunks) {
          const index = this.indices[chunk.modality].index;
          this.metadata.putChunk(chunk);
          const slot = index.add(chunk.id, chunk.embedding);
          this.metadata.putVectorEntry({ indexKey: index.key, slot, chunkId: chunk.id });
        }
        return true;
      });
    } catch (error) {
      for (const modality of MODALITIES) {
        this.indices[modality].index.truncate(sizes[modality]);
      }
      this.logger.error({ id: item.id, err: error }, "Ingestion rolled back");
      throw new IngestionFailed(errorMessage(error), item.id, { cause: error });
    }

    if (!inserted) {
      this.logger.debug({ id: item.id }, "Duplicate item skipped");
      return { status: "duplicate", id: item.id };
    }

    const textChunks = chunks.filter((chunk) => chunk.modality === "text").length;
    this.logger.debug({ id: item.id, chunks: chunks.length, skipped }, "Item ingested");
    return {
      status: "ingested",
      item,
      chunks: chunks.length,
      textChunks,
      visualChunks: chunks.length - textChunks,
      skipped,
    };
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  /**
   * Similarity search over one or both indices. Results carry the parent
   * item and its best-matching chunk; each item appears at most once.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    this.assertOpen();
    const topK = options.topK ?? 5;
    const modality = options.modality ?? "text";
    if (topK <= 0) return [];

    const wanted: Modality[] = modality === "both" ? ["text", "visual"] : [modality];
    const lists: Record<Modality, SearchResult[]> = { text: [], visual: [] };

    for (const target of wanted) {
      this.assertUsable(target);
      if (this.indices[target].index.size() === 0) continue;

      const vector =
        target === "text"
          ? await this.gateway.embedText(query)
          : await this.gateway.embedTextForImageSearch(query);
      lists[target] = this.rank(target, vector, topK, options);
    }

    if (modality !== "both") {
      return lists[modality];
    }
    return interleaveByRank(lists.text, lists.visual, topK);
  }

  /**
   * Search one index with a precomputed query vector
   */
  searchByVector(vector: number[], modality: Modality, options: Omit<SearchOptions, "modality"> = {}): SearchResult[] {
    this.assertOpen();
    this.assertUsable(modality);
    const topK = options.topK ?? 5;
    if (topK <= 0 || this.indices[modality].index.size() === 0) return [];
    return this.rank(modality, vector, topK, options);
  }

  private rank(modality: Modality, vector: number[], topK: number, options: SearchOptions): SearchResult[] {
    const fanOut = options.fanOut ?? this.options.fanOut ?? 3;
    const minVisualScore = options.minVisualScore ?? this.options.minVisualScore ?? DEFAULT_MIN_VISUAL_SCORE;
    const index = this.indices[modality].index;

    let candidateFilter: ((id: string) => boolean) | undefined;
    if (options.filter && !isUnconstrained(options.filter)) {
      const allowed = new Set(this.metadata.query(options.filter).map((item) => item.id));
      if (allowed.size === 0) return [];
      candidateFilter = (id) => allowed.has(parentIdOf(id));
    }

    const hits = index.search(vector, topK * fanOut, candidateFilter);
    const best = new Map<string, SearchResult>();

    for (const hit of hits) {
      if (modality === "visual" && hit.score < minVisualScore) continue;

      const chunk = this.metadata.getChunk(hit.id);
      if (!chunk) {
        this.logger.warn({ index: index.key, slot: hit.slot, chunkId: hit.id }, "Index slot points at a missing chunk");
        continue;
      }
      // Hits arrive best first, so the first chunk seen for an item is its best
      if (best.has(chunk.parentId)) continue;

      const item = this.metadata.getItem(chunk.parentId);
      if (!item) {
        this.logger.warn({ chunkId: chunk.id }, "Chunk has no parent item");
        continue;
      }
      best.set(item.id, { item, chunk, score: hit.score, modality });
      if (best.size === topK) break;
    }

    return [...best.values()];
  }

  // ==========================================================================
  // Lookups and maintenance
  // ==========================================================================

  getItem(id: string): { item: MemoryItem; chunks: Chunk[] } | null {
    this.assertOpen();
    const item = this.metadata.getItem(id);
    if (!item) return null;
    return { item, chunks: this.metadata.listChunks(id) };
  }

  hasItem(id: string): boolean {
    this.assertOpen();
    return this.metadata.hasItem(id);
  }

  listItems(filter: ItemFilter = {}, limit?: number): MemoryItem[] {
    this.assertOpen();
    return this.metadata.query(filter, limit);
  }

  getStats(): StorageStats {
    this.assertOpen();
    return {
      ...this.metadata.getStats(),
      indices: MODALITIES.map((modality) => {
        const state = this.indices[modality];
        return { key: state.index.key, modality, size: state.index.size(), corrupt: state.corrupt !== null };
      }),
    };
  }

  /**
   * Rebuild both indices from the embeddings kept in the metadata store
   */
  rebuildIndices(): Record<Modality, number> {
    this.assertOpen();
    return {
      text: this.rebuildIndex("text"),
      visual: this.rebuildIndex("visual"),
    };
  }

  /**
   * Persist both indices
   */
  flush(): void {
    this.assertOpen();
    for (const modality of MODALITIES) {
      const state = this.indices[modality];
      // A corrupt index is only in memory partially; never overwrite the files with it
      if (state.corrupt === null) {
        state.index.persist();
      }
    }
  }

  close(): void {
    if (this.closed) return;
    this.flush();
    this.metadata.close();
    this.closed = true;
    this.logger.info("Storage manager closed");
  }

  private loadIndex(modality: Modality): void {
    const state = this.indices[modality];

    if (this.options.indexDir === null) {
      this.rebuildIndex(modality);
      return;
    }

    try {
      state.index.load();
      this.verify(state.index);
      state.corrupt = null;
    } catch (error) {
      if (!(error instanceof CorruptIndexError)) throw error;
      state.corrupt = error;
      this.logger.error({ index: error.indexKey, err: error }, "Vector index does not match the metadata store");
      if (this.options.rebuildOnCorruption) {
        this.rebuildIndex(modality);
      }
    }
  }

  /**
   * The index must hold exactly the slot bindings the metadata store recorded
   */
  private verify(index: VectorIndex): void {
    const recorded = this.metadata.countVectorEntries(index.key);
    if (recorded !== index.size()) {
      throw new CorruptIndexError(
        index.key,
        `index holds ${index.size()} vectors but the metadata store records ${recorded}`
      );
    }
    for (const entry of this.metadata.listVectorEntries(index.key)) {
      const id = index.idAt(entry.slot);
      if (id !== entry.chunkId) {
        throw new CorruptIndexError(index.key, `slot ${entry.slot} is bound to ${id ?? "nothing"}, expected ${entry.chunkId}`);
      }
    }
  }

  private rebuildIndex(modality: Modality): number {
    const state = this.indices[modality];
    const index = state.index;

    index.clear();
    const chunks = this.metadata.listChunksForIndex(modality, index.dimension);
    const entries = chunks.map((chunk) => ({
      indexKey: index.key,
      slot: index.add(chunk.id, chunk.embedding),
      chunkId: chunk.id,
    }));
    this.metadata.replaceVectorEntries(index.key, entries);
    index.persist();

    state.corrupt = null;
    this.logger.info({ index: index.key, size: index.size() }, "Vector index rebuilt from metadata store");
    return index.size();
  }

  private assertUsable(modality: Modality): void {
    const corrupt = this.indices[modality].corrupt;
    if (corrupt) throw corrupt;
  }

  private assertOpen(): void {
    if (this.closed) throw new StoreClosedError();
  }
}

/**
 * Merge two ranked lists by rank position, text first at equal rank.
 * Raw scores of different indices are not comparable, so the merged score
 * is 1 / (1 + rank). An item found in both lists keeps its better rank.
 */
export function interleaveByRank(text: SearchResult[], visual: SearchResult[], topK: number): SearchResult[] {
  const merged: SearchResult[] = [];
  const seen = new Set<string>();
  const depth = Math.max(text.length, visual.length);

  for (let rank = 0; rank < depth && merged.length < topK; rank++) {
    for (const list of [text, visual]) {
      const result = list[rank];
      if (!result || seen.has(result.item.id)) continue;
      seen.add(result.item.id);
      merged.push({ ...result, score: 1 / (1 + rank) });
      if (merged.length === topK) break;
    }
  }

  return merged;
}
