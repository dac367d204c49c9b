/**
 * Vector Index
 *
 * Exact nearest-neighbour index over fixed-dimension vectors, one instance
 * per modality. Slots are dense and assigned in insertion order; each slot
 * is bound to exactly one chunk id.
 *
 * On disk an index is two files named after its key
 * (`<modality>-<metric>-<dimension>`): the raw float32 vectors (`.vec`) and
 * the slot -> id mapping (`.ids.json`), which carries a checksum of the
 * vector file so that a torn write is caught on load.
 */

import { createHash } from "crypto";
import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { CorruptIndexError, DimensionMismatchError } from "./errors.js";
import type { Modality } from "./types.js";
import { dotProduct, normalize, squaredL2 } from "./vector.js";

export type Metric = "l2" | "ip";

/** Text vectors are compared by L2 distance, visual ones by cosine (normalized inner product) */
export const DEFAULT_METRICS: Record<Modality, Metric> = {
  text: "l2",
  visual: "ip",
};

export interface VectorIndexOptions {
  modality: Modality;
  dimension: number;
  metric?: Metric;
  /** Directory for the index files; null keeps the index in memory only */
  dir?: string | null;
}

export interface IndexHit {
  id: string;
  slot: number;
  /** L2 distance, or 1 - cosine similarity for inner-product indices */
  distance: number;
  /** Higher is better */
  score: number;
}

const FORMAT_VERSION = 1;
const INITIAL_CAPACITY = 64;

const MappingSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  modality: z.enum(["text", "visual"]),
  metric: z.enum(["l2", "ip"]),
  dimension: z.number().int().positive(),
  count: z.number().int().nonnegative(),
  checksum: z.string(),
  ids: z.array(z.string()),
});

export function indexKey(modality: Modality, metric: Metric, dimension: number): string {
  return `${modality}-${metric}-${dimension}`;
}

function sha256(buffer: Buffer): string {
  return createHash("sha256").update(buffer).digest("hex");
}

export class VectorIndex {
  readonly modality: Modality;
  readonly metric: Metric;
  readonly dimension: number;
  readonly key: string;
  private readonly dir: string | null;

  private data: Float32Array;
  private ids: string[] = [];
  private slots = new Map<string, number>();

  constructor(options: VectorIndexOptions) {
    if (!Number.isInteger(options.dimension) || options.dimension <= 0) {
      throw new Error(`Index dimension must be a positive integer, got ${options.dimension}`);
    }
    this.modality = options.modality;
    this.metric = options.metric ?? DEFAULT_METRICS[options.modality];
    this.dimension = options.dimension;
    this.key = indexKey(this.modality, this.metric, this.dimension);
    this.dir = options.dir ?? null;
    this.data = new Float32Array(this.dimension * INITIAL_CAPACITY);
  }

  get vectorPath(): string | null {
    return this.dir ? join(this.dir, `${this.key}.vec`) : null;
  }

  get mappingPath(): string | null {
    return this.dir ? join(this.dir, `${this.key}.ids.json`) : null;
  }

  size(): number {
    return this.ids.length;
  }

  idAt(slot: number): string | undefined {
    return this.ids[slot];
  }

  /**
   * Append a vector and bind it to `id`. Returns the assigned slot.
   */
  add(id: string, vector: number[]): number {
    this.checkDimension(vector);
    if (this.slots.has(id)) {
      throw new Error(`Id ${id} is already bound to slot ${this.slots.get(id)} in index ${this.key}`);
    }

    const slot = this.ids.length;
    this.ensureCapacity(slot + 1);
    this.data.set(this.metric === "ip" ? normalize(vector) : vector, slot * this.dimension);
    this.ids.push(id);
    this.slots.set(id, slot);
    return slot;
  }

  /**
   * Drop every slot at or above `size`
   */
  truncate(size: number): void {
    if (size < 0 || size > this.ids.length) {
      throw new Error(`Cannot truncate index ${this.key} of size ${this.ids.length} to ${size}`);
    }
    for (const id of this.ids.splice(size)) {
      this.slots.delete(id);
    }
  }

  clear(): void {
    this.truncate(0);
    this.data = new Float32Array(this.dimension * INITIAL_CAPACITY);
  }

  /**
   * The k nearest stored vectors, best first. Ties go to the lower slot.
   */
  search(query: number[], k: number, candidateFilter?: (id: string) => boolean): IndexHit[] {
    this.checkDimension(query);
    if (k <= 0 || this.ids.length === 0) return [];

    const q = this.metric === "ip" ? normalize(query) : query;
    const hits: IndexHit[] = [];

    for (let slot = 0; slot < this.ids.length; slot++) {
      const id = this.ids[slot];
      if (candidateFilter && !candidateFilter(id)) continue;

      const stored = this.data.subarray(slot * this.dimension, (slot + 1) * this.dimension);
      if (this.metric === "ip") {
        const similarity = dotProduct(q, stored);
        hits.push({ id, slot, distance: 1 - similarity, score: similarity });
      } else {
        const distance = Math.sqrt(squaredL2(q, stored));
        hits.push({ id, slot, distance, score: 1 / (1 + distance) });
      }
    }

    hits.sort((a, b) => a.distance - b.distance || a.slot - b.slot);
    return hits.slice(0, k);
  }

  /**
   * Write vectors, then the mapping. Each file is written to a temp path and
   * renamed into place.
   */
  persist(): void {
    const vectorPath = this.vectorPath;
    const mappingPath = this.mappingPath;
    if (!vectorPath || !mappingPath || !this.dir) return;

    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true });
    }

    const used = this.data.subarray(0, this.ids.length * this.dimension);
    const vectors = Buffer.from(used.buffer, used.byteOffset, used.byteLength);
    writeFileSync(`${vectorPath}.tmp`, vectors);
    renameSync(`${vectorPath}.tmp`, vectorPath);

    const mapping: z.infer<typeof MappingSchema> = {
      version: FORMAT_VERSION,
      modality: this.modality,
      metric: this.metric,
      dimension: this.dimension,
      count: this.ids.length,
      checksum: sha256(vectors),
      ids: this.ids,
    };
    writeFileSync(`${mappingPath}.tmp`, JSON.stringify(mapping));
    renameSync(`${mappingPath}.tmp`, mappingPath);
  }

  /**
   * Replace the in-memory state with the files on disk. Returns false when
   * there is nothing on disk yet.
   *
   * @throws CorruptIndexError when the two files disagree
   */
  load(): boolean {
    const vectorPath = this.vectorPath;
    const mappingPath = this.mappingPath;
    if (!vectorPath || !mappingPath) return false;

    const hasVectors = existsSync(vectorPath);
    const hasMapping = existsSync(mappingPath);
    if (!hasVectors && !hasMapping) return false;
    if (!hasMapping) {
      throw new CorruptIndexError(this.key, "vector file has no slot mapping");
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(mappingPath, "utf-8"));
    } catch (error) {
      throw new CorruptIndexError(this.key, `unreadable slot mapping (${error instanceof Error ? error.message : String(error)})`);
    }
    const result = MappingSchema.safeParse(parsed);
    if (!result.success) {
      throw new CorruptIndexError(this.key, "malformed slot mapping");
    }
    const mapping = result.data;

    if (mapping.modality !== this.modality || mapping.metric !== this.metric || mapping.dimension !== this.dimension) {
      throw new CorruptIndexError(
        this.key,
        `mapping describes a ${mapping.modality}-${mapping.metric}-${mapping.dimension} index`
      );
    }
    if (mapping.ids.length !== mapping.count || new Set(mapping.ids).size !== mapping.count) {
      throw new CorruptIndexError(this.key, "slot mapping is not a one-to-one list of ids");
    }

    const vectors = hasVectors ? readFileSync(vectorPath) : Buffer.alloc(0);
    if (vectors.byteLength !== mapping.count * this.dimension * 4) {
      throw new CorruptIndexError(
        this.key,
        `vector file holds ${vectors.byteLength / (this.dimension * 4)} vectors but the mapping lists ${mapping.count}`
      );
    }
    if (sha256(vectors) !== mapping.checksum) {
      throw new CorruptIndexError(this.key, "vector file checksum does not match the slot mapping");
    }

    this.data = new Float32Array(Math.max(mapping.count, INITIAL_CAPACITY) * this.dimension);
    for (let i = 0; i < mapping.count * this.dimension; i++) {
      this.data[i] = vectors.readFloatLE(i * 4);
    }
    this.ids = [...mapping.ids];
    this.slots = new Map(this.ids.map((id, slot) => [id, slot]));
    return true;
  }

  private checkDimension(vector: number[]): void {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length, this.key);
    }
  }

  /**
   * Grow by doubling so that appends are amortized O(1)
   */
  private ensureCapacity(slots: number): void {
    const needed = slots * this.dimension;
    if (needed <= this.data.length) return;

    let capacity = this.data.length || this.dimension;
    while (capacity < needed) {
      capacity *= 2;
    }
    const grown = new Float32Array(capacity);
    grown.set(this.data);
    this.data = grown;
  }
}
