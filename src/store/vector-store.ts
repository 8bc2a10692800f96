import type { EmbedderRegistry } from "../embedder.js";
import { InvalidInputError, RepolensError, StorageError, errorMessage } from "../errors.js";
import { ReadWriteLock } from "../lock.js";
import { createLogger } from "../logger.js";
import type { CodeChunk, SearchResponse, SearchResult } from "../types.js";
import type { ScoredRow, StoredRow, VectorTable } from "./table.js";

const log = createLogger("store");

/** Candidates fetched per requested result, to survive post-filtering. */
export const OVER_FETCH_FACTOR = 3;

export interface VectorStoreOptions {
  userId: string;
  table: VectorTable;
  embedder: EmbedderRegistry;
}

export interface ClearOutcome {
  /** Rows removed for the repo; -1 when the whole table had to be dropped. */
  removed: number;
  droppedAll: boolean;
}

export interface ReplaceOutcome {
  removed: number;
  added: number;
}

/** Cosine distance lies in [0, 2]; similarity is clamped to [0, 1]. */
export function distanceToScore(distance: number): number {
  if (!Number.isFinite(distance)) {
    return 0;
  }
  return Math.min(1, Math.max(0, 1 - distance));
}

function toSearchResult(scored: ScoredRow): SearchResult {
  return {
    filePath: scored.row.file_path,
    content: scored.row.content,
    lineStart: scored.row.line_start,
    lineEnd: scored.row.line_end,
    score: distanceToScore(scored.distance)
  };
}

function requireRepoId(repoId: string): void {
  if (!repoId.trim()) {
    throw new InvalidInputError("repoId must be a non-empty string");
  }
}

async function storageCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof RepolensError) {
      throw error;
    }
    throw new StorageError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Embedding storage for a single user. Repositories share the user's one
 * physical table and are told apart by the `repo_id` column.
 *
 * Mutations (`indexChunks`, `clearRepo`) hold the store's lock exclusively;
 * reads share it, so a search never observes a half-rebuilt table.
 */
export class VectorStore {
  readonly userId: string;
  private readonly table: VectorTable;
  private readonly embedder: EmbedderRegistry;
  private readonly lock = new ReadWriteLock();

  constructor(options: VectorStoreOptions) {
    this.userId = options.userId;
    this.table = options.table;
    this.embedder = options.embedder;
  }

  get location(): string {
    return this.table.location;
  }

  private async embedRows(chunks: CodeChunk[], repoId: string): Promise<StoredRow[]> {
    const model = await this.embedder.get();
    const vectors = await model.embedBatch(chunks.map((chunk) => chunk.content));
    return chunks.map((chunk, i) => ({
      user_id: this.userId,
      repo_id: repoId,
      file_path: chunk.filePath,
      content: chunk.content,
      line_start: chunk.lineStart,
      line_end: chunk.lineEnd,
      chunk_type: chunk.chunkType,
      vector: vectors[i] ?? []
    }));
  }

  /**
   * Embed and append chunks under `repoId`. Append-only: indexing the same
   * file twice stores it twice unless the repo is cleared first.
   */
  async indexChunks(chunks: CodeChunk[], repoId: string): Promise<number> {
    if (chunks.length === 0) {
      return 0;
    }
    requireRepoId(repoId);

    return this.lock.runWrite(async () => {
      const rows = await this.embedRows(chunks, repoId);
      await storageCall("insert", () => this.table.add(rows));
      log.debug(`indexed ${rows.length} chunks for ${this.userId}/${repoId}`);
      return rows.length;
    });
  }

  /**
   * Swap a repository's rows for `chunks` in one exclusive section. The new
   * chunks are embedded before anything is removed, so a failed embedding
   * or a failed read leaves the previous rows in place.
   */
  async replaceRepo(chunks: CodeChunk[], repoId: string): Promise<ReplaceOutcome> {
    requireRepoId(repoId);

    return this.lock.runWrite(async () => {
      const added = chunks.length > 0 ? await this.embedRows(chunks, repoId) : [];
      const rows = await storageCall("read", () => this.table.readAll());
      const kept = rows.filter((row) => !(row.user_id === this.userId && row.repo_id === repoId));
      const removed = rows.length - kept.length;

      if (removed === 0) {
        await storageCall("insert", () => this.table.add(added));
      } else {
        await storageCall("rebuild", () => this.table.replace([...kept, ...added]));
      }
      log.info(`replaced ${removed} chunks of ${this.userId}/${repoId} with ${added.length}`);
      return { removed, added: added.length };
    });
  }

  /**
   * Nearest chunks to `query`, best first. When `repoId` is given only that
   * repository's chunks are returned; rows of any other user never are.
   */
  async search(query: string, topK: number, repoId?: string): Promise<SearchResponse> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new InvalidInputError(`topK must be a positive integer, got ${topK}`);
    }

    const started = performance.now();
    const model = await this.embedder.get();
    const queryVector = await model.embed(query);

    const candidates = await this.lock.runRead(() =>
      storageCall("search", () => this.table.search(queryVector, topK * OVER_FETCH_FACTOR))
    );

    const results = candidates
      .filter(
        (candidate) =>
          candidate.row.user_id === this.userId && (repoId === undefined || candidate.row.repo_id === repoId)
      )
      .sort((a, b) => a.distance - b.distance || a.order - b.order)
      .slice(0, topK)
      .map(toSearchResult);

    return { results, latencyMs: performance.now() - started };
  }

  /**
   * Remove a repository's rows by rebuilding the table without them. If the
   * rows cannot be read and filtered, the whole table is dropped: every
   * repository of this user is lost, and that is logged as such.
   */
  async clearRepo(repoId: string): Promise<ClearOutcome> {
    requireRepoId(repoId);

    return this.lock.runWrite(async () => {
      let kept: StoredRow[];
      let removed: number;
      try {
        const rows = await this.table.readAll();
        kept = rows.filter((row) => !(row.user_id === this.userId && row.repo_id === repoId));
        removed = rows.length - kept.length;
      } catch (error) {
        log.error(
          `filtering ${this.userId}/${repoId} failed (${errorMessage(error)}); ` +
            `dropping the entire table at ${this.table.location}, all repositories of user ${this.userId} are deleted`
        );
        await storageCall("drop", () => this.table.drop());
        return { removed: -1, droppedAll: true };
      }

      if (removed === 0) {
        return { removed: 0, droppedAll: false };
      }

      await storageCall("rebuild", () => this.table.replace(kept));
      log.info(`cleared ${removed} chunks of ${this.userId}/${repoId}, ${kept.length} remain`);
      return { removed, droppedAll: false };
    });
  }

  async count(): Promise<number> {
    return this.lock.runRead(() => storageCall("count", () => this.table.count()));
  }

  /** Release the table handle once in-flight operations finish. */
  async close(): Promise<void> {
    await this.lock.runWrite(() => this.table.close());
  }
}
