import path from "node:path";
import type { EmbedderRegistry } from "../embedder.js";
import { InvalidInputError } from "../errors.js";
import { sha256 } from "../hash.js";
import { Mutex } from "../lock.js";
import { createLogger } from "../logger.js";
import type { VectorTable } from "./table.js";
import { VectorStore } from "./vector-store.js";

const log = createLogger("registry");

const USER_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

/** Builds the table backing one user's store from that user's directory. */
export type TableFactory = (userDir: string) => VectorTable;

export interface StoreRegistryOptions {
  dataRoot: string;
  embedder: EmbedderRegistry;
  createTable: TableFactory;
}

/** User ids become directory names, so only a safe alphabet is accepted. */
export function validateUserId(userId: string): string {
  if (!USER_ID_PATTERN.test(userId)) {
    throw new InvalidInputError(`userId must match ${USER_ID_PATTERN.source}, got "${userId}"`);
  }
  return userId;
}

/** Stable opaque id for a repository checkout, from its resolved path. */
export function deriveRepoId(repoRoot: string): string {
  return sha256(path.resolve(repoRoot)).slice(0, 16);
}

/**
 * Process-wide map of user id to {@link VectorStore}. Each user gets a
 * separate directory `{dataRoot}/{userId}`; creation is serialized so two
 * concurrent first requests for one user share a single store.
 */
export class StoreRegistry {
  private readonly stores = new Map<string, VectorStore>();
  private readonly mutex = new Mutex();
  private readonly dataRoot: string;
  private readonly embedder: EmbedderRegistry;
  private readonly createTable: TableFactory;

  constructor(options: StoreRegistryOptions) {
    this.dataRoot = path.resolve(options.dataRoot);
    this.embedder = options.embedder;
    this.createTable = options.createTable;
  }

  get size(): number {
    return this.stores.size;
  }

  has(userId: string): boolean {
    return this.stores.has(userId);
  }

  userDir(userId: string): string {
    return path.join(this.dataRoot, validateUserId(userId));
  }

  async get(userId: string): Promise<VectorStore> {
    const userDir = this.userDir(userId);
    return this.mutex.runExclusive(() => {
      const existing = this.stores.get(userId);
      if (existing) {
        return existing;
      }
      const store = new VectorStore({
        userId,
        table: this.createTable(userDir),
        embedder: this.embedder
      });
      this.stores.set(userId, store);
      log.debug(`opened store for ${userId} at ${userDir}`);
      return store;
    });
  }

  /** Drop the cached handle for an idle user. Data on disk is untouched. */
  async evict(userId: string): Promise<boolean> {
    const store = await this.mutex.runExclusive(() => {
      const found = this.stores.get(userId);
      this.stores.delete(userId);
      return found;
    });
    if (!store) {
      return false;
    }
    await store.close();
    return true;
  }

  async close(): Promise<void> {
    const stores = await this.mutex.runExclusive(() => {
      const all = [...this.stores.values()];
      this.stores.clear();
      return all;
    });
    await Promise.all(stores.map((store) => store.close()));
  }
}
