import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { InvalidInputError } from "./errors.js";
import { createLogger } from "./logger.js";
import { isWithin, type PathGuard } from "./path-guard.js";
import type { DiscoveryMode } from "./types.js";

const log = createLogger("scanner");

export const DEFAULT_GUIDED_PATTERNS = ["*.py", "*.swift", "*.ts"];

export const FULL_SCAN_EXTENSIONS = [
  ".py",
  ".swift",
  ".js",
  ".ts",
  ".tsx",
  ".jsx",
  ".go",
  ".rs",
  ".java",
  ".kt",
  ".cpp",
  ".c",
  ".h",
  ".md",
  ".txt",
  ".json",
  ".yaml",
  ".yml"
];

const EXCLUDED_DIRS = new Set([
  "__pycache__",
  "node_modules",
  ".git",
  "venv",
  ".venv",
  "build",
  "dist",
  ".next",
  "Pods",
  ".build"
]);

const GLOB_IGNORE = [...EXCLUDED_DIRS].map((dir) => `**/${dir}/**`);

export interface DiscoverOptions {
  /** Manual mode: paths relative to the root, or absolute. */
  files?: string[];
  /** Guided mode: glob patterns; a pattern without "/" matches at any depth. */
  patterns?: string[];
  guard?: PathGuard;
}

function toPosixPath(input: string): string {
  return input.split(path.sep).join(path.posix.sep);
}

/**
 * True when any segment of the root-relative path is hidden or names a
 * build/vendor directory. The root's own location is not considered.
 */
export function isExcludedPath(relPath: string): boolean {
  return toPosixPath(relPath)
    .split("/")
    .some((segment) => segment.startsWith(".") || EXCLUDED_DIRS.has(segment));
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function resolveRoot(root: string, guard?: PathGuard): Promise<string> {
  const resolved = path.resolve(root);
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(resolved)).isDirectory();
  } catch (error) {
    throw new InvalidInputError(`Repository path does not exist: ${root}`, { cause: error });
  }
  if (!isDirectory) {
    throw new InvalidInputError(`Repository path is not a directory: ${root}`);
  }
  if (guard && !guard.isAllowed(resolved)) {
    throw new InvalidInputError(`Repository path is not in the allowlist: ${resolved}`);
  }
  return resolved;
}

async function discoverManual(root: string, files: string[]): Promise<string[]> {
  const discovered: string[] = [];
  for (const entry of files) {
    const absPath = path.resolve(root, entry);
    if (!isWithin(root, absPath)) {
      log.debug(`ignoring ${entry}: outside ${root}`);
      continue;
    }
    if (isExcludedPath(path.relative(root, absPath))) {
      continue;
    }
    if (await isRegularFile(absPath)) {
      discovered.push(absPath);
    }
  }
  return discovered;
}

/**
 * Let every pattern match at any depth: `baseNameMatch` covers patterns
 * without a slash, and a pattern such as `src/*.ts` is prefixed with a
 * globstar so it also matches `packages/api/src/index.ts`.
 */
function toRecursivePattern(pattern: string): string {
  const trimmed = pattern.replace(/^\.?\/+/, "");
  if (!trimmed.includes("/") || trimmed.startsWith("**/")) {
    return trimmed;
  }
  return `**/${trimmed}`;
}

async function globFiles(root: string, patterns: string[]): Promise<string[]> {
  if (patterns.length === 0) {
    return [];
  }
  const matches = await fg(patterns.map(toRecursivePattern), {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: false,
    baseNameMatch: true,
    ignore: GLOB_IGNORE,
    suppressErrors: true
  });
  return matches
    .map((match) => path.resolve(match))
    .filter((absPath) => !isExcludedPath(path.relative(root, absPath)));
}

/**
 * List the files an indexing run should read. The result is absolute,
 * deduplicated and sorted; excluded trees never appear, whatever the mode.
 */
export async function discoverFiles(
  root: string,
  mode: DiscoveryMode,
  options: DiscoverOptions = {}
): Promise<string[]> {
  const repoRoot = await resolveRoot(root, options.guard);

  let files: string[];
  switch (mode) {
    case "manual":
      files = await discoverManual(repoRoot, options.files ?? []);
      break;
    case "guided": {
      const patterns = options.patterns && options.patterns.length > 0 ? options.patterns : DEFAULT_GUIDED_PATTERNS;
      files = await globFiles(repoRoot, patterns);
      break;
    }
    case "full":
      files = await globFiles(
        repoRoot,
        FULL_SCAN_EXTENSIONS.map((ext) => `*${ext}`)
      );
      break;
    default:
      throw new InvalidInputError(`Unknown discovery mode: ${String(mode)}`);
  }

  const unique = [...new Set(files)].sort();
  log.debug(`discovered ${unique.length} files under ${repoRoot} (${mode})`);
  return unique;
}
