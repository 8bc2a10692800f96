import type { Embedder } from "./embedder.js";

export interface OllamaOptions {
  baseUrl: string;
  model: string;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number");
}

function isNumberMatrix(value: unknown): value is number[][] {
  return Array.isArray(value) && value.every(isNumberArray);
}

function field(payload: unknown, key: string): unknown {
  if (typeof payload !== "object" || payload === null) {
    return undefined;
  }
  return Object.entries(payload).find(([name]) => name === key)?.[1];
}

/** Embeddings from a local Ollama server. */
export class OllamaEmbedder implements Embedder {
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(options: OllamaOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = options.model;
  }

  id(): string {
    return `ollama:${this.model}`;
  }

  private async post(endpoint: string, body: Record<string, unknown>): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${endpoint}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model: this.model, ...body })
    });

    if (!response.ok) {
      const detail = await response.text();
      throw new Error(`Ollama request failed (${response.status}) ${endpoint}: ${detail}`);
    }
    return response.json();
  }

  private async embedOne(text: string): Promise<number[]> {
    const embedding = field(await this.post("/api/embeddings", { prompt: text }), "embedding");
    if (!isNumberArray(embedding)) {
      throw new Error("Ollama /api/embeddings response has no embedding");
    }
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let batchError: unknown;
    try {
      const embeddings = field(await this.post("/api/embed", { input: texts }), "embeddings");
      if (isNumberMatrix(embeddings)) {
        return embeddings;
      }
    } catch (error) {
      batchError = error;
    }

    // servers older than /api/embed take one prompt per request
    if (texts.length > 1) {
      throw batchError ?? new Error("Ollama /api/embed response has no embeddings");
    }
    const [text = ""] = texts;
    return [await this.embedOne(text)];
  }
}
