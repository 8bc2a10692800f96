import { createHash } from "node:crypto";
import type { Embedder } from "./embedder.js";

const TOKEN_PATTERN = /[A-Za-z0-9]+/g;

/** Split identifiers as well as words: "parseJson_value" -> parse, json, value. */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const parts = match[0]
      .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
      .toLowerCase()
      .split(" ");
    tokens.push(...parts);
  }
  return tokens;
}

/**
 * Deterministic, dependency-free embedder based on feature hashing. Texts
 * that share tokens land close together, which is enough for offline use
 * and for exercising the store without a model server.
 */
export class LocalHashEmbedder implements Embedder {
  constructor(private readonly dimensions: number = 384) {}

  id(): string {
    return `local-hash:${this.dimensions}`;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = tokenize(text);
    for (const token of tokens) {
      const { bucket, sign } = this.hashFeature(token);
      vector[bucket] = (vector[bucket] ?? 0) + sign;
    }
    // symbol-only text, or tokens that cancel out, fall back to the whole text
    if (vector.every((value): boolean => value === 0)) {
      const { bucket } = this.hashFeature(text);
      vector[bucket] = 1;
    }
    return l2Normalize(vector);
  }

  private hashFeature(feature: string): { bucket: number; sign: number } {
    const digest = createHash("sha256").update(feature).digest();
    return {
      bucket: digest.readUInt32BE(0) % this.dimensions,
      sign: (digest[4] ?? 0) & 1 ? -1 : 1
    };
  }
}

export function l2Normalize(values: number[]): number[] {
  const norm = Math.sqrt(values.reduce((sum, value) => sum + value * value, 0));
  if (norm === 0) {
    return values;
  }
  return values.map((value) => value / norm);
}
