export * from "./types.js";
export * from "./errors.js";
export { loadConfig, loadDotenv, type AppConfig, type EmbedderConfig } from "./config.js";
export { createLogger, setLogLevel, type Logger, type LogLevel } from "./logger.js";
export {
  chunkFile,
  chunkText,
  splitIntoChunks,
  regexBoundaryDetector,
  createTypeScriptBoundaryDetector,
  type BoundaryDetector,
  type ChunkingMode
} from "./chunker.js";
export { discoverFiles, isExcludedPath, DEFAULT_GUIDED_PATTERNS, FULL_SCAN_EXTENSIONS } from "./scanner.js";
export { createAllowlistGuard, loadAllowlistGuard, type PathGuard } from "./path-guard.js";
export { EmbedderRegistry, EmbeddingModel, createEmbedder, type Embedder } from "./embedder.js";
export { OllamaEmbedder } from "./ollama.js";
export { LocalHashEmbedder } from "./hash-embedder.js";
export { VectorStore, OVER_FETCH_FACTOR, type ClearOutcome, type ReplaceOutcome } from "./store/vector-store.js";
export { StoreRegistry, deriveRepoId, validateUserId } from "./store/registry.js";
export { LanceVectorTable } from "./store/lance.js";
export { MemoryVectorTable } from "./store/memory.js";
export type { VectorTable, StoredRow, ScoredRow } from "./store/table.js";
export { createAppContext, type AppContext } from "./context.js";
export { indexRepository, indexChunks, clearRepo } from "./indexer.js";
export { searchCode, countChunks } from "./search.js";
