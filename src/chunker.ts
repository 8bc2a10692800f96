import { readFile } from "node:fs/promises";
import path from "node:path";
import * as ts from "typescript";
import { InvalidInputError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import type { CodeChunk } from "./types.js";

const log = createLogger("chunker");

/** Split at a boundary once the buffer holds this share of the chunk budget. */
const BOUNDARY_SPLIT_RATIO = 0.7;
/** Split unconditionally once the buffer reaches this multiple of the budget. */
const HARD_CAP_RATIO = 2;
const BINARY_SAMPLE_BYTES = 4096;

/**
 * Decides whether a line opens a new structural unit. The split algorithm
 * only asks this question; how it is answered (regex, parser) is swappable.
 */
export interface BoundaryDetector {
  isBoundary(line: string, lineNumber: number): boolean;
}

export type ChunkingMode = "ast" | "text";

const BOUNDARY_PATTERNS: RegExp[] = [
  // def / class / func / fn / struct ... behind any run of modifiers or decorators
  /^(?:(?:export|default|declare|public|private|protected|internal|fileprivate|open|static|final|override|abstract|async|unsafe|pub(?:\([\w:]+\))?|@\w+(?:\([^)]*\))?)\s+)*(?:def|class|func|fn|fun|function\*?|struct|enum|interface|protocol|extension|trait|impl|type|object|mod)\s+[\w<]/,
  /^const\s+\w+\s*=/,
  /^(?:export|import)\b/,
  /^from\s+\S+\s+import\b/,
  /^(?:use|package)\s+[\w:.]+/
];

export const regexBoundaryDetector: BoundaryDetector = {
  isBoundary(line: string): boolean {
    const trimmed = line.trim();
    if (!trimmed) {
      return false;
    }
    return BOUNDARY_PATTERNS.some((pattern) => pattern.test(trimmed));
  }
};

const AST_SUPPORTED_EXTENSIONS = new Set([".ts", ".tsx", ".js", ".jsx", ".mts", ".cts", ".mjs", ".cjs"]);

function supportsTypeScriptAst(filePath: string): boolean {
  return AST_SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

function scriptKindFromFilePath(filePath: string): ts.ScriptKind {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".tsx") {
    return ts.ScriptKind.TSX;
  }
  if (ext === ".jsx") {
    return ts.ScriptKind.JSX;
  }
  if (ext === ".js" || ext === ".mjs" || ext === ".cjs") {
    return ts.ScriptKind.JS;
  }
  return ts.ScriptKind.TS;
}

function isDeclarationNode(node: ts.Node): boolean {
  return (
    ts.isFunctionDeclaration(node) ||
    ts.isClassDeclaration(node) ||
    ts.isInterfaceDeclaration(node) ||
    ts.isEnumDeclaration(node) ||
    ts.isTypeAliasDeclaration(node) ||
    ts.isModuleDeclaration(node) ||
    ts.isVariableStatement(node) ||
    ts.isImportDeclaration(node) ||
    ts.isExportDeclaration(node) ||
    ts.isExportAssignment(node)
  );
}

function isClassMember(node: ts.Node): boolean {
  return (
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  );
}

/**
 * Boundaries taken from the TypeScript compiler's syntax tree: the first line
 * of every top-level declaration, plus every method of a top-level class.
 */
export function createTypeScriptBoundaryDetector(text: string, filePath: string): BoundaryDetector {
  const sourceFile = ts.createSourceFile(
    filePath,
    text,
    ts.ScriptTarget.Latest,
    true,
    scriptKindFromFilePath(filePath)
  );

  const boundaryLines = new Set<number>();
  const markLine = (node: ts.Node): void => {
    const start = node.getStart(sourceFile);
    boundaryLines.add(sourceFile.getLineAndCharacterOfPosition(start).line + 1);
  };

  for (const statement of sourceFile.statements) {
    if (!isDeclarationNode(statement)) {
      continue;
    }
    markLine(statement);
    if (ts.isClassDeclaration(statement)) {
      for (const member of statement.members) {
        if (isClassMember(member)) {
          markLine(member);
        }
      }
    }
  }

  return {
    isBoundary: (_line, lineNumber) => boundaryLines.has(lineNumber)
  };
}

export function createBoundaryDetector(mode: ChunkingMode, filePath: string, text: string): BoundaryDetector {
  if (mode === "ast" && supportsTypeScriptAst(filePath)) {
    return createTypeScriptBoundaryDetector(text, filePath);
  }
  return regexBoundaryDetector;
}

function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, "\n");
}

/**
 * Core split loop. Lines are appended to a buffer one at a time; after each
 * append the buffer is closed when a boundary line arrives past 70% of the
 * budget, or when the buffer reaches twice the budget.
 *
 * A boundary split moves the boundary line into the next chunk. A hard-cap
 * split keeps the triggering line and starts the next chunk empty.
 */
export function splitIntoChunks(
  filePath: string,
  text: string,
  maxChunkSize: number,
  detector: BoundaryDetector = regexBoundaryDetector
): CodeChunk[] {
  const lines = normalizeLineEndings(text).split("\n");
  const chunks: CodeChunk[] = [];

  let buffer: string[] = [];
  let bufferLength = 0;
  let bufferStart = 1;

  const emit = (chunkLines: string[], lineStart: number): void => {
    const content = chunkLines.join("\n");
    if (!content.trim()) {
      return;
    }
    chunks.push({
      filePath,
      content,
      lineStart,
      lineEnd: lineStart + chunkLines.length - 1,
      chunkType: "block"
    });
  };

  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i] ?? "";
    const lineNumber = i + 1;
    const isBoundary = detector.isBoundary(line, lineNumber);

    bufferLength += line.length + (buffer.length > 0 ? 1 : 0);
    buffer.push(line);

    const shouldSplit =
      (isBoundary && bufferLength >= maxChunkSize * BOUNDARY_SPLIT_RATIO) ||
      bufferLength >= maxChunkSize * HARD_CAP_RATIO;

    if (!shouldSplit || buffer.length < 2) {
      continue;
    }

    if (isBoundary) {
      emit(buffer.slice(0, -1), bufferStart);
      buffer = [line];
      bufferLength = line.length;
      bufferStart = lineNumber;
    } else {
      emit(buffer, bufferStart);
      buffer = [];
      bufferLength = 0;
      bufferStart = lineNumber + 1;
    }
  }

  if (buffer.length > 0) {
    emit(buffer, bufferStart);
  }

  return chunks;
}

export interface ChunkTextOptions {
  mode?: ChunkingMode;
  detector?: BoundaryDetector;
}

export function chunkText(
  filePath: string,
  text: string,
  maxChunkSize: number,
  options: ChunkTextOptions = {}
): CodeChunk[] {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
    throw new InvalidInputError(`maxChunkSize must be a positive integer, got ${maxChunkSize}`);
  }

  const normalized = normalizeLineEndings(text);
  if (!normalized.trim()) {
    return [];
  }

  if (normalized.length <= maxChunkSize) {
    return [
      {
        filePath,
        content: normalized,
        lineStart: 1,
        lineEnd: normalized.split("\n").length,
        chunkType: "file"
      }
    ];
  }

  const detector = options.detector ?? createBoundaryDetector(options.mode ?? "text", filePath, normalized);
  return splitIntoChunks(filePath, normalized, maxChunkSize, detector);
}

export function isProbablyBinary(buffer: Buffer): boolean {
  if (buffer.length === 0) {
    return false;
  }

  let suspicious = 0;
  for (const byte of buffer) {
    if (byte === 0) {
      return true;
    }
    if (byte < 9 || (byte > 13 && byte < 32)) {
      suspicious += 1;
    }
  }
  return suspicious / buffer.length > 0.3;
}

/**
 * Read and chunk one file. A file that cannot be read as text yields no
 * chunks and a warning; one bad file never aborts an indexing run.
 */
export async function chunkFile(
  filePath: string,
  maxChunkSize: number,
  options: ChunkTextOptions = {}
): Promise<CodeChunk[]> {
  let raw: Buffer;
  try {
    raw = await readFile(filePath);
  } catch (error) {
    log.warn(`skipping unreadable file ${filePath}: ${errorMessage(error)}`);
    return [];
  }

  if (isProbablyBinary(raw.subarray(0, BINARY_SAMPLE_BYTES))) {
    log.warn(`skipping binary file ${filePath}`);
    return [];
  }

  return chunkText(filePath, raw.toString("utf8"), maxChunkSize, options);
}
