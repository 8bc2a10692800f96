import type { ScoredRow, StoredRow, VectorTable } from "./table.js";

/** Infinity when the lengths differ or either vector has zero norm. */
export function cosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return Number.POSITIVE_INFINITY;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i += 1) {
    const ai = a[i] ?? 0;
    const bi = b[i] ?? 0;
    dot += ai * bi;
    normA += ai * ai;
    normB += bi * bi;
  }

  if (normA === 0 || normB === 0) {
    return Number.POSITIVE_INFINITY;
  }

  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function copyRow(row: StoredRow): StoredRow {
  return { ...row, vector: [...row.vector] };
}

/**
 * Process-local table with exact (brute-force) search. Selected with
 * REPOLENS_STORE=memory; nothing survives a restart.
 */
export class MemoryVectorTable implements VectorTable {
  private rows: StoredRow[] | null = null;

  constructor(public readonly location: string = "memory") {}

  async add(rows: StoredRow[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }
    const existing = this.rows ?? [];
    const dims = existing[0]?.vector.length ?? rows[0]?.vector.length;
    const mismatch = rows.find((row) => row.vector.length !== dims);
    if (mismatch) {
      throw new Error(
        `vector dimension ${mismatch.vector.length} does not match table dimension ${String(dims)}`
      );
    }
    this.rows = [...existing, ...rows.map(copyRow)];
  }

  async search(vector: number[], limit: number): Promise<ScoredRow[]> {
    const rows = this.rows ?? [];
    return rows
      .map((row, order) => ({ row: copyRow(row), distance: cosineDistance(vector, row.vector), order }))
      .sort((a, b) => a.distance - b.distance || a.order - b.order)
      .slice(0, limit);
  }

  async readAll(): Promise<StoredRow[]> {
    return (this.rows ?? []).map(copyRow);
  }

  async replace(rows: StoredRow[]): Promise<void> {
    this.rows = null;
    if (rows.length > 0) {
      await this.add(rows);
    }
  }

  async drop(): Promise<void> {
    this.rows = null;
  }

  async count(): Promise<number> {
    return this.rows?.length ?? 0;
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
