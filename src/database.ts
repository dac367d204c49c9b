/**
 * Database Setup and Schema
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";

export type DB = Database.Database;

/**
 * Open a database connection and create the schema if needed.
 * Pass ":memory:" for a throwaway store.
 */
export function initDatabase(sqlitePath: string): DB {
  if (sqlitePath !== ":memory:") {
    // Ensure DB directory exists
    const dbDir = dirname(sqlitePath);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }
  }

  const db = new Database(sqlitePath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  db.exec(`
    CREATE TABLE IF NOT EXISTS memory_items (
      id TEXT PRIMARY KEY, -- content hash
      timestamp INTEGER NOT NULL,
      content_type TEXT NOT NULL,
      source TEXT NOT NULL,
      content_preview TEXT NOT NULL,
      raw_path TEXT,
      fields TEXT NOT NULL DEFAULT '{}', -- JSON object
      ingested_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_memory_items_timestamp ON memory_items(timestamp);
    CREATE INDEX IF NOT EXISTS idx_memory_items_content_type ON memory_items(content_type);
    CREATE INDEX IF NOT EXISTS idx_memory_items_source ON memory_items(source);

    CREATE TABLE IF NOT EXISTS chunks (
      id TEXT PRIMARY KEY, -- <parent_id>#<sequence_index>
      parent_id TEXT NOT NULL,
      sequence_index INTEGER NOT NULL,
      modality TEXT NOT NULL CHECK (modality IN ('text', 'visual')),
      text TEXT, -- text span
      span_start INTEGER,
      span_end INTEGER,
      frame_path TEXT, -- visual frame reference
      frame_ocr TEXT,
      dim INTEGER NOT NULL,
      embedding BLOB NOT NULL, -- redundant copy used to rebuild the vector indices
      UNIQUE (parent_id, sequence_index),
      FOREIGN KEY (parent_id) REFERENCES memory_items(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_chunks_parent_id ON chunks(parent_id);
    CREATE INDEX IF NOT EXISTS idx_chunks_modality_dim ON chunks(modality, dim);

    -- Slot -> chunk bindings, mirrored from each vector index mapping file
    CREATE TABLE IF NOT EXISTS vector_entries (
      index_key TEXT NOT NULL, -- <modality>-<metric>-<dim>
      slot INTEGER NOT NULL,
      chunk_id TEXT NOT NULL,
      PRIMARY KEY (index_key, slot),
      UNIQUE (index_key, chunk_id),
      FOREIGN KEY (chunk_id) REFERENCES chunks(id) ON DELETE CASCADE
    );
  `);

  return db;
}
