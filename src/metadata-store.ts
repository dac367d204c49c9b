/**
 * Metadata Store
 *
 * Relational record of memory items, their chunks, and the vector index
 * slot bindings. Source of truth for structured queries, existence checks
 * and index rebuilds.
 */

import { z } from "zod";
import type { DB } from "./database.js";
import { CONTENT_TYPES, SOURCES } from "./types.js";
import type { Chunk, ItemFilter, MemoryItem, Modality, VectorIndexEntry } from "./types.js";
import { vectorToBlob, blobToVector } from "./vector.js";

interface ItemRow {
  id: string;
  timestamp: number;
  content_type: string;
  source: string;
  content_preview: string;
  raw_path: string | null;
  fields: string;
}

interface ChunkRow {
  id: string;
  parent_id: string;
  sequence_index: number;
  modality: string;
  text: string | null;
  span_start: number | null;
  span_end: number | null;
  frame_path: string | null;
  frame_ocr: string | null;
  dim: number;
  embedding: Buffer;
}

const ContentTypeSchema = z.enum(CONTENT_TYPES);
const SourceSchema = z.enum(SOURCES);
const FieldsSchema = z.record(z.unknown());

const ITEM_COLUMNS = "id, timestamp, content_type, source, content_preview, raw_path, fields";
const CHUNK_COLUMNS =
  "c.id, c.parent_id, c.sequence_index, c.modality, c.text, c.span_start, c.span_end, c.frame_path, c.frame_ocr, c.dim, c.embedding";

function rowToItem(row: ItemRow): MemoryItem {
  return {
    id: row.id,
    timestamp: row.timestamp,
    contentType: ContentTypeSchema.parse(row.content_type),
    source: SourceSchema.parse(row.source),
    contentPreview: row.content_preview,
    rawPath: row.raw_path,
    fields: FieldsSchema.parse(JSON.parse(row.fields)),
  };
}

function rowToChunk(row: ChunkRow): Chunk {
  const base = {
    id: row.id,
    parentId: row.parent_id,
    sequenceIndex: row.sequence_index,
    embedding: blobToVector(row.embedding),
  };

  if (row.modality === "text") {
    if (row.text === null || row.span_start === null || row.span_end === null) {
      throw new Error(`Text chunk ${row.id} has no text span`);
    }
    return {
      ...base,
      modality: "text",
      textSpan: { text: row.text, start: row.span_start, end: row.span_end },
    };
  }

  return {
    ...base,
    modality: "visual",
    frameReference: {
      path: row.frame_path,
      ...(row.frame_ocr !== null ? { ocr: row.frame_ocr } : {}),
    },
  };
}

function asList<T>(value: T | T[] | undefined): T[] | undefined {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value : [value];
}

export class MetadataStore {
  constructor(private readonly db: DB) {}

  /**
   * Run `fn` in one transaction: every row it writes commits, or none do
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Insert a memory item. Returns false (and writes nothing) when the id
   * already exists.
   */
  putItem(item: MemoryItem): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO memory_items (${ITEM_COLUMNS}, ingested_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        item.id,
        item.timestamp,
        item.contentType,
        item.source,
        item.contentPreview,
        item.rawPath,
        JSON.stringify(item.fields),
        Date.now()
      );
    return result.changes === 1;
  }

  putChunk(chunk: Chunk): void {
    const span = chunk.modality === "text" ? chunk.textSpan : null;
    const frame = chunk.modality === "visual" ? chunk.frameReference : null;

    this.db
      .prepare(
        `INSERT INTO chunks
         (id, parent_id, sequence_index, modality, text, span_start, span_end, frame_path, frame_ocr, dim, embedding)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        chunk.id,
        chunk.parentId,
        chunk.sequenceIndex,
        chunk.modality,
        span?.text ?? null,
        span?.start ?? null,
        span?.end ?? null,
        frame?.path ?? null,
        frame?.ocr ?? null,
        chunk.embedding.length,
        vectorToBlob(chunk.embedding)
      );
  }

  putVectorEntry(entry: VectorIndexEntry): void {
    this.db
      .prepare(`INSERT INTO vector_entries (index_key, slot, chunk_id) VALUES (?, ?, ?)`)
      .run(entry.indexKey, entry.slot, entry.chunkId);
  }

  hasItem(id: string): boolean {
    const row = this.db.prepare<[string], { found: number }>(`SELECT 1 AS found FROM memory_items WHERE id = ?`).get(id);
    return row !== undefined;
  }

  getItem(id: string): MemoryItem | null {
    const row = this.db.prepare<[string], ItemRow>(`SELECT ${ITEM_COLUMNS} FROM memory_items WHERE id = ?`).get(id);
    return row ? rowToItem(row) : null;
  }

  getChunk(id: string): Chunk | null {
    const row = this.db.prepare<[string], ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM chunks c WHERE c.id = ?`).get(id);
    return row ? rowToChunk(row) : null;
  }

  /**
   * All chunks of an item, in sequence order
   */
  listChunks(parentId: string): Chunk[] {
    const rows = this.db
      .prepare<[string], ChunkRow>(
        `SELECT ${CHUNK_COLUMNS} FROM chunks c WHERE c.parent_id = ? ORDER BY c.sequence_index ASC`
      )
      .all(parentId);
    return rows.map(rowToChunk);
  }

  /**
   * Items matching the filter, newest first
   */
  query(filter: ItemFilter = {}, limit?: number): MemoryItem[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    const inClause = (column: string, values: string[] | undefined) => {
      if (values === undefined) return;
      if (values.length === 0) {
        clauses.push("0");
        return;
      }
      clauses.push(`${column} IN (${values.map(() => "?").join(", ")})`);
      params.push(...values);
    };

    inClause("content_type", asList(filter.contentType));
    inClause("source", asList(filter.source));
    inClause("id", filter.ids);

    if (filter.since !== undefined) {
      clauses.push("timestamp >= ?");
      params.push(filter.since);
    }
    if (filter.until !== undefined) {
      clauses.push("timestamp <= ?");
      params.push(filter.until);
    }

    let sql = `SELECT ${ITEM_COLUMNS} FROM memory_items`;
    if (clauses.length > 0) {
      sql += ` WHERE ${clauses.join(" AND ")}`;
    }
    sql += ` ORDER BY timestamp DESC, id ASC`;
    if (limit !== undefined) {
      sql += ` LIMIT ?`;
      params.push(limit);
    }

    return this.db.prepare<Array<string | number>, ItemRow>(sql).all(...params).map(rowToItem);
  }

  /**
   * Chunks that belong in the index for a modality and dimension, in
   * insertion order
   */
  listChunksForIndex(modality: Modality, dimension: number): Chunk[] {
    const rows = this.db
      .prepare<[string, number], ChunkRow>(
        `SELECT ${CHUNK_COLUMNS} FROM chunks c WHERE c.modality = ? AND c.dim = ? ORDER BY c.rowid ASC`
      )
      .all(modality, dimension);
    return rows.map(rowToChunk);
  }

  listVectorEntries(indexKey: string): VectorIndexEntry[] {
    const rows = this.db
      .prepare<[string], { index_key: string; slot: number; chunk_id: string }>(
        `SELECT index_key, slot, chunk_id FROM vector_entries WHERE index_key = ? ORDER BY slot ASC`
      )
      .all(indexKey);
    return rows.map((row) => ({ indexKey: row.index_key, slot: row.slot, chunkId: row.chunk_id }));
  }

  countVectorEntries(indexKey: string): number {
    const row = this.db
      .prepare<[string], { count: number }>(`SELECT COUNT(*) AS count FROM vector_entries WHERE index_key = ?`)
      .get(indexKey);
    return row?.count ?? 0;
  }

  replaceVectorEntries(indexKey: string, entries: VectorIndexEntry[]): void {
    this.transaction(() => {
      this.db.prepare(`DELETE FROM vector_entries WHERE index_key = ?`).run(indexKey);
      for (const entry of entries) {
        this.putVectorEntry(entry);
      }
    });
  }

  getStats(): { memoryItems: number; chunks: number; textChunks: number; visualChunks: number } {
    const count = (sql: string) => this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;
    return {
      memoryItems: count(`SELECT COUNT(*) AS count FROM memory_items`),
      chunks: count(`SELECT COUNT(*) AS count FROM chunks`),
      textChunks: count(`SELECT COUNT(*) AS count FROM chunks WHERE modality = 'text'`),
      visualChunks: count(`SELECT COUNT(*) AS count FROM chunks WHERE modality = 'visual'`),
    };
  }

  close(): void {
    this.db.close();
  }
}
