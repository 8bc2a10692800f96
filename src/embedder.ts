import type { EmbedderConfig } from "./config.js";
import { EmbeddingError, RepolensError, errorMessage } from "./errors.js";
import { LocalHashEmbedder } from "./hash-embedder.js";
import { createLogger } from "./logger.js";
import { OllamaEmbedder } from "./ollama.js";

const log = createLogger("embedder");

const WARMUP_TEXT = "warmup";
export const DEFAULT_SUB_BATCH = 32;

/** A raw embedding provider: text in, vectors out, nothing else promised. */
export interface Embedder {
  id(): string;
  embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * A loaded, warmed-up provider with a known vector dimension. Every vector it
 * hands out is checked for length and finiteness; a provider failure surfaces
 * as {@link EmbeddingError}.
 */
export class EmbeddingModel {
  constructor(
    private readonly provider: Embedder,
    public readonly dims: number,
    private readonly subBatchSize: number = DEFAULT_SUB_BATCH
  ) {}

  id(): string {
    return this.provider.id();
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) {
      throw new EmbeddingError(`${this.id()} returned no embedding`);
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.subBatchSize) {
      const batch = texts.slice(i, i + this.subBatchSize);
      const batchVectors = await callProvider(this.provider, batch);
      for (const vector of batchVectors) {
        vectors.push(checkVector(this.provider, vector, this.dims));
      }
    }
    return vectors;
  }
}

async function callProvider(provider: Embedder, batch: string[]): Promise<number[][]> {
  let vectors: number[][];
  try {
    vectors = await provider.embedBatch(batch);
  } catch (error) {
    if (error instanceof RepolensError) {
      throw error;
    }
    throw new EmbeddingError(`${provider.id()} failed: ${errorMessage(error)}`, { cause: error });
  }
  if (vectors.length !== batch.length) {
    throw new EmbeddingError(
      `${provider.id()} returned ${vectors.length} embeddings for ${batch.length} inputs`
    );
  }
  return vectors;
}

function checkVector(provider: Embedder, vector: number[], dims: number | undefined): number[] {
  if (vector.length === 0 || (dims !== undefined && vector.length !== dims)) {
    throw new EmbeddingError(
      `${provider.id()} returned a vector of length ${vector.length}, expected ${dims ?? "non-zero"}`
    );
  }
  if (!vector.every((value) => Number.isFinite(value))) {
    throw new EmbeddingError(`${provider.id()} returned non-finite vector components`);
  }
  if (vector.every((value) => value === 0)) {
    throw new EmbeddingError(`${provider.id()} returned an all-zero vector`);
  }
  return vector;
}

export function createEmbedder(config: EmbedderConfig): Embedder {
  switch (config.provider) {
    case "ollama":
      return new OllamaEmbedder({ baseUrl: config.ollamaUrl, model: config.model });
    case "local-hash":
      return new LocalHashEmbedder(config.dims);
    default:
      throw new EmbeddingError(`Unsupported embedder provider: ${String(config.provider)}`);
  }
}

/**
 * Holds the single shared model for the process. The provider is created and
 * warmed up on first use; concurrent callers share the same load. A failed
 * load is forgotten so the next call retries.
 */
export class EmbedderRegistry {
  private loading: Promise<EmbeddingModel> | null = null;
  private loaded = false;

  constructor(
    private readonly factory: () => Embedder,
    private readonly subBatchSize: number = DEFAULT_SUB_BATCH
  ) {}

  isLoaded(): boolean {
    return this.loaded;
  }

  get(): Promise<EmbeddingModel> {
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async load(): Promise<EmbeddingModel> {
    let provider: Embedder;
    try {
      provider = this.factory();
    } catch (error) {
      if (error instanceof RepolensError) {
        throw error;
      }
      throw new EmbeddingError(`Embedding provider could not be created: ${errorMessage(error)}`, { cause: error });
    }

    const started = performance.now();
    const [warmup] = await callProvider(provider, [WARMUP_TEXT]);
    const vector = checkVector(provider, warmup ?? [], undefined);
    log.info(
      `model ready: ${provider.id()} (dims=${vector.length}, warm-up ${(performance.now() - started).toFixed(0)}ms)`
    );

    this.loaded = true;
    return new EmbeddingModel(provider, vector.length, this.subBatchSize);
  }
}
