import type { AppConfig } from "./config.js";
import { EmbedderRegistry, createEmbedder } from "./embedder.js";
import { setLogLevel } from "./logger.js";
import { loadAllowlistGuard, type PathGuard } from "./path-guard.js";
import { LanceVectorTable } from "./store/lance.js";
import { MemoryVectorTable } from "./store/memory.js";
import { StoreRegistry, type TableFactory } from "./store/registry.js";

/**
 * Everything with application lifetime: the shared embedding model, the
 * per-user store registry and the optional path allowlist. Built once at
 * startup and handed to whatever serves requests.
 */
export interface AppContext {
  config: AppConfig;
  embedder: EmbedderRegistry;
  stores: StoreRegistry;
  guard?: PathGuard;
  close(): Promise<void>;
}

export interface AppContextOverrides {
  embedder?: EmbedderRegistry;
  createTable?: TableFactory;
  guard?: PathGuard;
}

function tableFactoryFor(config: AppConfig): TableFactory {
  if (config.storeBackend === "memory") {
    return (userDir) => new MemoryVectorTable(userDir);
  }
  return (userDir) => new LanceVectorTable(userDir);
}

export async function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): Promise<AppContext> {
  setLogLevel(config.logLevel);

  const embedder =
    overrides.embedder ?? new EmbedderRegistry(() => createEmbedder(config.embedder), config.embedder.batchSize);
  const guard =
    overrides.guard ?? (config.allowlistFile ? await loadAllowlistGuard(config.allowlistFile) : undefined);
  const stores = new StoreRegistry({
    dataRoot: config.dataDir,
    embedder,
    createTable: overrides.createTable ?? tableFactoryFor(config)
  });

  return {
    config,
    embedder,
    stores,
    guard,
    close: () => stores.close()
  };
}
