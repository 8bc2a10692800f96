import { mkdir } from "node:fs/promises";
import * as lancedb from "@lancedb/lancedb";
import { createLogger } from "../logger.js";
import { errorMessage } from "../errors.js";
import type { ChunkType } from "../types.js";
import { CHUNKS_TABLE, type ScoredRow, type StoredRow, type VectorTable } from "./table.js";

const log = createLogger("lancedb");

/** IVF-PQ training needs a few hundred rows; smaller tables use a flat scan. */
const MIN_ROWS_FOR_ANN_INDEX = 256;

function toVector(value: unknown): number[] {
  if (Array.isArray(value)) {
    return value.map((item) => Number(item));
  }
  if (isIterable(value)) {
    return Array.from(value, (item) => Number(item));
  }
  return [];
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

function toStringSafe(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function toNumberSafe(value: unknown): number {
  if (typeof value === "bigint") {
    return Number(value);
  }
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/** Missing or non-finite distances (zero vectors under cosine) rank last. */
function toDistance(value: unknown, vector: number[]): number {
  if (vector.every((component) => component === 0)) {
    return Number.POSITIVE_INFINITY;
  }
  const distance = typeof value === "bigint" ? Number(value) : value;
  return typeof distance === "number" && Number.isFinite(distance) ? distance : Number.POSITIVE_INFINITY;
}

function toChunkType(value: unknown): ChunkType {
  return value === "file" ? "file" : "block";
}

function toStoredRow(row: Record<string, unknown>): StoredRow {
  return {
    user_id: toStringSafe(row.user_id),
    repo_id: toStringSafe(row.repo_id),
    file_path: toStringSafe(row.file_path),
    content: toStringSafe(row.content),
    line_start: toNumberSafe(row.line_start),
    line_end: toNumberSafe(row.line_end),
    chunk_type: toChunkType(row.chunk_type),
    vector: toVector(row.vector)
  };
}

function toRecord(row: StoredRow): Record<string, unknown> {
  return { ...row, vector: [...row.vector] };
}

/**
 * A single LanceDB table in its own directory. The connection and table
 * handle are opened on first use and cached until {@link close}.
 */
export class LanceVectorTable implements VectorTable {
  private connection: lancedb.Connection | null = null;
  private table: lancedb.Table | null = null;

  constructor(public readonly location: string) {}

  private async connect(): Promise<lancedb.Connection> {
    if (!this.connection) {
      await mkdir(this.location, { recursive: true });
      this.connection = await lancedb.connect(this.location);
    }
    return this.connection;
  }

  private async openTable(): Promise<lancedb.Table | null> {
    if (this.table) {
      return this.table;
    }
    const connection = await this.connect();
    const names = await connection.tableNames();
    if (!names.includes(CHUNKS_TABLE)) {
      return null;
    }
    this.table = await connection.openTable(CHUNKS_TABLE);
    return this.table;
  }

  async add(rows: StoredRow[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }
    const records = rows.map(toRecord);
    const table = await this.openTable();
    if (table) {
      await table.add(records);
      return;
    }
    const connection = await this.connect();
    this.table = await connection.createTable(CHUNKS_TABLE, records);
  }

  async search(vector: number[], limit: number): Promise<ScoredRow[]> {
    const table = await this.openTable();
    if (!table) {
      return [];
    }

    const rows: Array<Record<string, unknown>> = await table
      .vectorSearch(vector)
      .distanceType("cosine")
      .limit(limit)
      .withRowId()
      .toArray();

    return rows
      .map((row) => {
        const stored = toStoredRow(row);
        return {
          row: stored,
          distance: toDistance(row._distance, stored.vector),
          order: toNumberSafe(row._rowid)
        };
      })
      .sort((a, b) => a.distance - b.distance || a.order - b.order);
  }

  async readAll(): Promise<StoredRow[]> {
    const table = await this.openTable();
    if (!table) {
      return [];
    }
    const total = await table.countRows();
    if (total === 0) {
      return [];
    }
    const rows: Array<Record<string, unknown>> = await table.query().limit(total).toArray();
    return rows.map((row) => toStoredRow(row));
  }

  async replace(rows: StoredRow[]): Promise<void> {
    await this.drop();
    if (rows.length === 0) {
      return;
    }

    const connection = await this.connect();
    const table = await connection.createTable(CHUNKS_TABLE, rows.map(toRecord));
    this.table = table;

    if (rows.length >= MIN_ROWS_FOR_ANN_INDEX) {
      try {
        await table.createIndex("vector", {
          config: lancedb.Index.ivfPq({ distanceType: "cosine" })
        });
      } catch (error) {
        log.warn(`ANN index build failed for ${this.location}, using flat scan: ${errorMessage(error)}`);
      }
    }
  }

  async drop(): Promise<void> {
    const table = await this.openTable();
    if (!table) {
      return;
    }
    table.close();
    this.table = null;
    const connection = await this.connect();
    await connection.dropTable(CHUNKS_TABLE);
  }

  async count(): Promise<number> {
    const table = await this.openTable();
    return table ? table.countRows() : 0;
  }

  async close(): Promise<void> {
    this.table?.close();
    this.table = null;
    this.connection?.close();
    this.connection = null;
  }
}
