export type ChunkType = "file" | "block";

/** A contiguous span of one file's lines selected for embedding. */
export interface CodeChunk {
  filePath: string;
  content: string;
  /** 1-based, inclusive. */
  lineStart: number;
  lineEnd: number;
  chunkType: ChunkType;
}

export interface SearchResult {
  filePath: string;
  content: string;
  lineStart: number;
  lineEnd: number;
  /** Similarity in [0, 1], higher is better. */
  score: number;
}

export interface SearchResponse {
  results: SearchResult[];
  latencyMs: number;
}

export type DiscoveryMode = "manual" | "guided" | "full";

export interface IndexRequest {
  root: string;
  mode: DiscoveryMode;
  userId: string;
  repoId: string;
  files?: string[];
  patterns?: string[];
  maxChunkSize?: number;
  /** Swap the repo's stored chunks for the new ones once they are embedded. */
  replace?: boolean;
}

export interface IndexOutcome {
  success: boolean;
  filesIndexed: number;
  chunksCreated: number;
  message: string;
}
