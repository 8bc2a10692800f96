#!/usr/bin/env node
import path from "node:path";
import { Command } from "commander";
import type { ChunkingMode } from "./chunker.js";
import { loadConfig, loadDotenv, type AppConfig, type EmbedderProvider } from "./config.js";
import { createAppContext, type AppContext } from "./context.js";
import { clearRepo, indexRepository } from "./indexer.js";
import { deriveRepoId } from "./store/registry.js";
import { countChunks, searchCode } from "./search.js";
import type { DiscoveryMode } from "./types.js";

const program = new Command();

const DEFAULT_USER = process.env.REPOLENS_USER ?? "local";

function parseInteger(value: string, flag: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${flag} must be an integer`);
  }
  return parsed;
}

function collectList(value: string, current: string[]): string[] {
  const values = value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return [...current, ...values];
}

function parseChunkingMode(value: string): ChunkingMode {
  if (value === "ast" || value === "text") {
    return value;
  }
  throw new Error("--chunking must be one of: ast, text");
}

function parseDiscoveryMode(value: string): DiscoveryMode {
  if (value === "manual" || value === "guided" || value === "full") {
    return value;
  }
  throw new Error("--mode must be one of: manual, guided, full");
}

function parseEmbedder(value: string): EmbedderProvider {
  if (value === "ollama" || value === "local-hash") {
    return value;
  }
  throw new Error("--embedder must be one of: ollama, local-hash");
}

interface CommonOptions {
  user: string;
  dataDir?: string;
  embedder?: EmbedderProvider;
  embeddingModel?: string;
  ollamaUrl?: string;
}

interface RepoOptions {
  repo?: string;
  repoId?: string;
}

interface IndexCommandOptions extends CommonOptions, RepoOptions {
  mode: DiscoveryMode;
  files: string[];
  pattern: string[];
  chunkSize?: number;
  chunking: ChunkingMode;
  replace: boolean;
}

interface SearchCommandOptions extends CommonOptions, RepoOptions {
  query: string;
  topK: number;
  allRepos: boolean;
}

interface ClearCommandOptions extends CommonOptions, RepoOptions {}

function withOverrides(config: AppConfig, options: CommonOptions): AppConfig {
  return {
    ...config,
    dataDir: options.dataDir ? path.resolve(options.dataDir) : config.dataDir,
    embedder: {
      ...config.embedder,
      provider: options.embedder ?? config.embedder.provider,
      model: options.embeddingModel ?? config.embedder.model,
      ollamaUrl: options.ollamaUrl ?? config.embedder.ollamaUrl
    }
  };
}

function resolveRepoId(options: RepoOptions): string {
  return options.repoId ?? deriveRepoId(options.repo ?? process.cwd());
}

async function withContext<T>(options: CommonOptions, fn: (ctx: AppContext) => Promise<T>): Promise<T> {
  loadDotenv();
  const ctx = await createAppContext(withOverrides(loadConfig(), options));
  try {
    return await fn(ctx);
  } finally {
    await ctx.close();
  }
}

function addCommonOptions(command: Command): Command {
  return command
    .option("--user <id>", "user id owning the index", DEFAULT_USER)
    .option("--data-dir <path>", "directory holding per-user indexes")
    .option("--embedder <provider>", "embedding provider: ollama or local-hash", parseEmbedder)
    .option("--embedding-model <name>", "embedding model name")
    .option("--ollama-url <url>", "Ollama base URL");
}

program
  .name("repolens")
  .description("Local semantic code search over LanceDB")
  .version("0.1.0");

addCommonOptions(
  program
    .command("index")
    .description("Chunk, embed and store a repository")
    .option("--repo <path>", "repository root", process.cwd())
    .option("--repo-id <id>", "repository id (default: derived from the repository path)")
    .option("--mode <mode>", "discovery mode: manual, guided or full", parseDiscoveryMode, "guided")
    .option("--files <paths>", "comma-separated files for manual mode", collectList, [] as string[])
    .option("--pattern <globs>", "comma-separated glob patterns for guided mode, matched at any depth", collectList, [] as string[])
    .option("--chunk-size <chars>", "maximum chunk size in chars", (v) => parseInteger(v, "--chunk-size"))
    .option("--chunking <mode>", "boundary detection: ast or text", parseChunkingMode, "text")
    .option("--replace", "swap the repository's previous chunks for the new ones", false)
).action(async (options: IndexCommandOptions) => {
  await withContext(options, async (ctx) => {
    const root = path.resolve(options.repo ?? process.cwd());
    const repoId = options.repoId ?? deriveRepoId(root);
    const outcome = await indexRepository(
      ctx,
      {
        root,
        mode: options.mode,
        userId: options.user,
        repoId,
        files: options.files,
        patterns: options.pattern,
        maxChunkSize: options.chunkSize,
        replace: options.replace
      },
      { chunkingMode: options.chunking }
    );

    console.log(outcome.message);
    console.log(`Repo id: ${repoId}`);
    console.log(`Files: ${outcome.filesIndexed}, chunks: ${outcome.chunksCreated}`);
  });
});

addCommonOptions(
  program
    .command("search")
    .description("Find the code chunks closest to a natural-language query")
    .requiredOption("--query <text>", "search query")
    .option("--repo <path>", "repository root used to derive the repo id", process.cwd())
    .option("--repo-id <id>", "restrict results to this repository id")
    .option("--all-repos", "search every repository of the user", false)
    .option("--top-k <count>", "how many snippets to return", (v) => parseInteger(v, "--top-k"), 5)
).action(async (options: SearchCommandOptions) => {
  await withContext(options, async (ctx) => {
    const repoId = options.allRepos ? undefined : resolveRepoId(options);
    const { results, latencyMs } = await searchCode(ctx, options.query, options.user, options.topK, repoId);

    if (results.length === 0) {
      console.log("No results.");
      return;
    }

    for (const item of results) {
      const preview = item.content.replace(/\s+/g, " ").slice(0, 180);
      console.log(`${item.score.toFixed(4)}  ${item.filePath}:${item.lineStart}-${item.lineEnd}\n${preview}\n`);
    }
    console.log(`(${results.length} results in ${latencyMs.toFixed(1)}ms)`);
  });
});

addCommonOptions(
  program
    .command("clear")
    .description("Remove a repository's chunks from the user's index")
    .option("--repo <path>", "repository root used to derive the repo id", process.cwd())
    .option("--repo-id <id>", "repository id to clear")
).action(async (options: ClearCommandOptions) => {
  await withContext(options, async (ctx) => {
    const repoId = resolveRepoId(options);
    const outcome = await clearRepo(ctx, options.user, repoId);
    if (outcome.droppedAll) {
      console.log(`Index for user ${options.user} could not be filtered and was dropped entirely.`);
      return;
    }
    console.log(`Removed ${outcome.removed} chunks of repo ${repoId}.`);
  });
});

addCommonOptions(
  program.command("status").description("Show how many chunks the user's index holds")
).action(async (options: CommonOptions) => {
  await withContext(options, async (ctx) => {
    const count = await countChunks(ctx, options.user);
    console.log(`User ${options.user}: ${count} chunks in ${ctx.stores.userDir(options.user)}`);
  });
});

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exit(1);
});
