import path from "node:path";
import { chunkFile, type ChunkingMode } from "./chunker.js";
import type { AppContext } from "./context.js";
import { createLogger } from "./logger.js";
import { discoverFiles } from "./scanner.js";
import type { ClearOutcome } from "./store/vector-store.js";
import type { CodeChunk, IndexOutcome, IndexRequest } from "./types.js";

const log = createLogger("indexer");

export interface IndexRepositoryOptions {
  chunkingMode?: ChunkingMode;
}

export async function indexChunks(
  ctx: AppContext,
  chunks: CodeChunk[],
  userId: string,
  repoId: string
): Promise<number> {
  if (chunks.length === 0) {
    return 0;
  }
  const store = await ctx.stores.get(userId);
  return store.indexChunks(chunks, repoId);
}

export async function clearRepo(ctx: AppContext, userId: string, repoId: string): Promise<ClearOutcome> {
  const store = await ctx.stores.get(userId);
  return store.clearRepo(repoId);
}

/**
 * Discover, chunk and store one repository. Finding no files is a successful
 * run with zero counts and leaves stored chunks untouched; unreadable files
 * are skipped by the chunker. With `replace`, the repo's old chunks are
 * swapped out only once the new ones are embedded.
 */
export async function indexRepository(
  ctx: AppContext,
  request: IndexRequest,
  options: IndexRepositoryOptions = {}
): Promise<IndexOutcome> {
  const maxChunkSize = request.maxChunkSize ?? ctx.config.maxChunkSize;
  const root = path.resolve(request.root);

  const files = await discoverFiles(root, request.mode, {
    files: request.files,
    patterns: request.patterns,
    guard: ctx.guard
  });

  if (files.length === 0) {
    return {
      success: true,
      filesIndexed: 0,
      chunksCreated: 0,
      message: `No files found in ${root} (${request.mode} mode)`
    };
  }

  const chunks: CodeChunk[] = [];
  let filesIndexed = 0;
  for (const file of files) {
    const fileChunks = await chunkFile(file, maxChunkSize, { mode: options.chunkingMode });
    if (fileChunks.length > 0) {
      filesIndexed += 1;
      chunks.push(...fileChunks);
    }
  }

  let chunksCreated: number;
  if (request.replace) {
    const store = await ctx.stores.get(request.userId);
    const replaced = await store.replaceRepo(chunks, request.repoId);
    chunksCreated = replaced.added;
  } else {
    chunksCreated = await indexChunks(ctx, chunks, request.userId, request.repoId);
  }
  log.info(`indexed ${root}: ${filesIndexed}/${files.length} files, ${chunksCreated} chunks`);

  return {
    success: true,
    filesIndexed,
    chunksCreated,
    message: `Indexed ${filesIndexed} of ${files.length} files from ${root} (${request.mode} mode)`
  };
}
