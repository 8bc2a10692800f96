import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { EmbedderRegistry, type Embedder } from "../embedder.js";
import { EmbeddingError, InvalidInputError, StorageError } from "../errors.js";
import { setLogLevel } from "../logger.js";
import type { CodeChunk } from "../types.js";
import { MemoryVectorTable } from "./memory.js";
import type { ScoredRow, StoredRow, VectorTable } from "./table.js";
import { VectorStore, distanceToScore } from "./vector-store.js";

setLogLevel("silent");

const VOCAB = ["parse", "json", "http", "sort"];

/** One dimension per vocabulary word, counting occurrences, plus a fallback slot. */
class KeywordEmbedder implements Embedder {
  failAfterWarmup = false;

  id(): string {
    return "keywords";
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (this.failAfterWarmup && texts[0] !== "warmup") {
      throw new Error("model crashed");
    }
    return texts.map((text) => {
      const words = text.toLowerCase().split(/[^a-z]+/);
      const counts = VOCAB.map((word) => words.filter((candidate) => candidate === word).length);
      // a last slot for text with no vocabulary word, so no vector is all-zero
      return [...counts, counts.some((count) => count > 0) ? 0 : 1];
    });
  }
}

/** Delegates to an in-memory table and records what the store asks of it. */
class SpyTable implements VectorTable {
  readonly location = "spy";
  readonly events: string[] = [];
  readonly limits: number[] = [];
  failAdd = false;
  failReadAll = false;

  constructor(private readonly inner: VectorTable = new MemoryVectorTable()) {}

  async add(rows: StoredRow[]): Promise<void> {
    this.events.push("add:start");
    if (this.failAdd) {
      throw new Error("disk full");
    }
    await new Promise<void>((done) => setTimeout(done, 10));
    await this.inner.add(rows);
    this.events.push("add:end");
  }

  async search(vector: number[], limit: number): Promise<ScoredRow[]> {
    this.limits.push(limit);
    return this.inner.search(vector, limit);
  }

  async readAll(): Promise<StoredRow[]> {
    this.events.push("readAll");
    if (this.failReadAll) {
      throw new Error("corrupt fragment");
    }
    return this.inner.readAll();
  }

  async replace(rows: StoredRow[]): Promise<void> {
    this.events.push("replace");
    await this.inner.replace(rows);
  }

  async drop(): Promise<void> {
    this.events.push("drop");
    await this.inner.drop();
  }

  count(): Promise<number> {
    return this.inner.count();
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

function chunk(filePath: string, content: string): CodeChunk {
  return { filePath, content, lineStart: 1, lineEnd: 1, chunkType: "file" };
}

const REPO_A = [
  chunk("a/input.py", "parse the input"),
  chunk("a/output.py", "json output"),
  chunk("a/both.py", "parse json")
];
const REPO_B = [chunk("b/input.py", "parse input")];

function setup(userId = "alice", table: VectorTable = new SpyTable()) {
  const provider = new KeywordEmbedder();
  const embedder = new EmbedderRegistry(() => provider);
  const store = new VectorStore({ userId, table, embedder });
  return { provider, embedder, store, table };
}

async function seeded() {
  const spy = new SpyTable();
  const context = setup("alice", spy);
  await context.store.indexChunks(REPO_A, "repo-a");
  await context.store.indexChunks(REPO_B, "repo-b");
  return { ...context, spy };
}

describe("distanceToScore", () => {
  it("maps cosine distance onto [0, 1]", () => {
    assert.equal(distanceToScore(0), 1);
    assert.equal(distanceToScore(0.25), 0.75);
    assert.equal(distanceToScore(1.5), 0);
    assert.equal(distanceToScore(Number.NaN), 0);
    assert.equal(distanceToScore(Number.POSITIVE_INFINITY), 0);
  });
});

describe("MemoryVectorTable", () => {
  it("ranks a stored zero vector last", async () => {
    const table = new MemoryVectorTable();
    const base = { user_id: "alice", repo_id: "r1", content: "x", line_start: 1, line_end: 1, chunk_type: "file" as const };
    await table.add([
      { ...base, file_path: "zero.ts", vector: [0, 0, 0, 0] },
      { ...base, file_path: "near.ts", vector: [1, 0.1, 0, 0] },
      { ...base, file_path: "far.ts", vector: [0, 1, 0, 0] }
    ]);

    const hits = await table.search([1, 0, 0, 0], 3);

    assert.deepEqual(
      hits.map((hit) => hit.row.file_path),
      ["near.ts", "far.ts", "zero.ts"]
    );
    assert.equal(hits[1]?.distance, 1);
    assert.equal(hits[2]?.distance, Number.POSITIVE_INFINITY);
  });
});

describe("VectorStore.indexChunks", () => {
  it("stores nothing for an empty batch without loading the model", async () => {
    const { store, embedder } = setup();

    assert.equal(await store.indexChunks([], "repo-a"), 0);
    assert.equal(embedder.isLoaded(), false);
    assert.equal(await store.count(), 0);
  });

  it("returns the number of stored chunks", async () => {
    const { store } = await seeded();
    assert.equal(await store.count(), 4);
  });

  it("rejects an empty repo id", async () => {
    const { store } = setup();
    await assert.rejects(store.indexChunks(REPO_B, " "), InvalidInputError);
  });

  it("propagates embedding failures and stores nothing", async () => {
    const { store, provider, embedder } = setup();
    await embedder.get();
    provider.failAfterWarmup = true;

    await assert.rejects(store.indexChunks(REPO_A, "repo-a"), EmbeddingError);
    assert.equal(await store.count(), 0);
  });

  it("wraps table failures as storage errors", async () => {
    const spy = new SpyTable();
    spy.failAdd = true;
    const { store } = setup("alice", spy);

    await assert.rejects(store.indexChunks(REPO_B, "repo-b"), (error: unknown) => {
      assert.ok(error instanceof StorageError);
      assert.equal(error.message, "insert failed: disk full");
      return true;
    });
  });
});

describe("VectorStore.search", () => {
  it("ranks a repository's chunks by similarity", async () => {
    const { store } = await seeded();

    const { results } = await store.search("parse", 2, "repo-a");

    assert.deepEqual(
      results.map((result) => result.filePath),
      ["a/input.py", "a/both.py"]
    );
    assert.equal(results[0]?.score, 1);
    assert.ok(Math.abs((results[1]?.score ?? 0) - Math.SQRT1_2) < 1e-12);
  });

  it("searches every repository when no repo id is given", async () => {
    const { store } = await seeded();

    const { results } = await store.search("parse", 2);

    // equal distances keep insertion order
    assert.deepEqual(
      results.map((result) => result.filePath),
      ["a/input.py", "b/input.py"]
    );
  });

  it("returns scores in [0, 1], best first", async () => {
    const { store } = await seeded();

    const { results, latencyMs } = await store.search("json", 4);

    assert.equal(results.length, 4);
    const scores = results.map((result) => result.score);
    assert.deepEqual([...scores].sort((a, b) => b - a), scores);
    assert.ok(scores.every((score) => score >= 0 && score <= 1));
    assert.ok(latencyMs >= 0);
  });

  it("over-fetches candidates before filtering", async () => {
    const { store, spy } = await seeded();

    await store.search("parse", 4, "repo-b");

    assert.deepEqual(spy.limits, [12]);
  });

  it("never returns another user's rows from a shared table", async () => {
    const shared = new MemoryVectorTable();
    const alice = setup("alice", shared).store;
    const bob = setup("bob", shared).store;
    await alice.indexChunks(REPO_B, "repo-b");
    await bob.indexChunks([chunk("bob/secret.py", "parse secrets")], "repo-b");

    const { results } = await alice.search("parse", 5, "repo-b");

    assert.deepEqual(
      results.map((result) => result.filePath),
      ["b/input.py"]
    );
  });

  it("returns nothing from an empty store", async () => {
    const { store } = setup();
    assert.deepEqual((await store.search("parse", 3)).results, []);
  });

  it("rejects a non-positive topK", async () => {
    const { store } = setup();
    await assert.rejects(store.search("parse", 0), InvalidInputError);
    await assert.rejects(store.search("parse", 1.5), InvalidInputError);
  });
});

describe("VectorStore.clearRepo", () => {
  it("removes only the requested repository", async () => {
    const { store } = await seeded();

    assert.deepEqual(await store.clearRepo("repo-a"), { removed: 3, droppedAll: false });
    assert.equal(await store.count(), 1);
    assert.deepEqual(
      (await store.search("parse", 5)).results.map((result) => result.filePath),
      ["b/input.py"]
    );
  });

  it("leaves the table alone when the repository has no rows", async () => {
    const { store, spy } = await seeded();

    assert.deepEqual(await store.clearRepo("repo-x"), { removed: 0, droppedAll: false });
    assert.equal(spy.events.includes("replace"), false);
    assert.equal(await store.count(), 4);
  });

  it("drops the whole table when rows cannot be filtered", async () => {
    const { store, spy } = await seeded();
    spy.failReadAll = true;

    assert.deepEqual(await store.clearRepo("repo-a"), { removed: -1, droppedAll: true });
    assert.deepEqual(spy.events.slice(-2), ["readAll", "drop"]);
    assert.equal(await store.count(), 0);
  });

  it("waits for an in-flight write before rebuilding", async () => {
    const spy = new SpyTable();
    const { store } = setup("alice", spy);

    const indexing = store.indexChunks(REPO_A, "repo-a");
    const clearing = store.clearRepo("repo-a");
    const [indexed, cleared] = await Promise.all([indexing, clearing]);

    assert.equal(indexed, 3);
    assert.deepEqual(cleared, { removed: 3, droppedAll: false });
    assert.deepEqual(spy.events, ["add:start", "add:end", "readAll", "replace"]);
    assert.equal(await store.count(), 0);
  });
});

describe("VectorStore.replaceRepo", () => {
  it("swaps one repository's rows for new ones", async () => {
    const { store } = await seeded();

    assert.deepEqual(await store.replaceRepo([chunk("a/sort.py", "sort list")], "repo-a"), { removed: 3, added: 1 });
    assert.deepEqual(
      (await store.search("sort", 5, "repo-a")).results.map((result) => result.filePath),
      ["a/sort.py"]
    );
    assert.equal(await store.count(), 2);
  });

  it("leaves stored rows alone when the new chunks cannot be embedded", async () => {
    const { store, provider, spy } = await seeded();
    provider.failAfterWarmup = true;

    await assert.rejects(store.replaceRepo(REPO_A, "repo-a"), EmbeddingError);
    assert.equal(spy.events.includes("readAll"), false);
    assert.equal(await store.count(), 4);
  });

  it("never drops the table when the rows cannot be read", async () => {
    const { store, spy } = await seeded();
    spy.failReadAll = true;

    await assert.rejects(store.replaceRepo(REPO_A, "repo-a"), StorageError);
    assert.equal(spy.events.includes("drop"), false);
    assert.equal(await store.count(), 4);
  });
});
