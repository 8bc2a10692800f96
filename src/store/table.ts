import type { ChunkType } from "../types.js";

export const CHUNKS_TABLE = "code_chunks";

/** One persisted row; column names are the on-disk schema. */
export interface StoredRow {
  user_id: string;
  repo_id: string;
  file_path: string;
  content: string;
  line_start: number;
  line_end: number;
  chunk_type: ChunkType;
  vector: number[];
}

export interface ScoredRow {
  row: StoredRow;
  /** Cosine distance to the query vector; Infinity when it is undefined. */
  distance: number;
  /** Insertion position, used to order equal distances. */
  order: number;
}

/**
 * Minimal surface the vector store needs from a storage engine: append,
 * nearest-neighbour lookup, full read, and whole-table replacement. There is
 * deliberately no row-level delete.
 *
 * A table that was never written (or was dropped) reads as empty.
 */
export interface VectorTable {
  readonly location: string;
  add(rows: StoredRow[]): Promise<void>;
  search(vector: number[], limit: number): Promise<ScoredRow[]>;
  readAll(): Promise<StoredRow[]>;
  /** Drop the table and recreate it from `rows`; no rows leaves no table. */
  replace(rows: StoredRow[]): Promise<void>;
  drop(): Promise<void>;
  count(): Promise<number>;
  close(): Promise<void>;
}
