import { readFile } from "node:fs/promises";
import path from "node:path";
import { ConfigError, errorMessage } from "./errors.js";

/** Security gate consulted before any repository root is walked. */
export interface PathGuard {
  isAllowed(targetPath: string): boolean;
}

export function isWithin(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

export function createAllowlistGuard(roots: string[]): PathGuard {
  const allowed = roots.map((root) => path.resolve(root));
  return {
    isAllowed(targetPath: string): boolean {
      const resolved = path.resolve(targetPath);
      return allowed.some((root) => isWithin(root, resolved));
    }
  };
}

/**
 * Load a JSON array of approved directories. Fails closed: a missing,
 * malformed or empty allowlist is a configuration error, never "allow all".
 */
export async function loadAllowlistGuard(allowlistFile: string): Promise<PathGuard> {
  let raw: string;
  try {
    raw = await readFile(allowlistFile, "utf8");
  } catch (error) {
    throw new ConfigError(`Allowlist file not readable: ${allowlistFile} (${errorMessage(error)})`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Allowlist file is not valid JSON: ${allowlistFile}`, { cause: error });
  }

  if (!Array.isArray(parsed) || !parsed.every((entry): entry is string => typeof entry === "string")) {
    throw new ConfigError(`Allowlist must be a JSON array of paths: ${allowlistFile}`);
  }
  const roots = parsed.map((entry) => entry.trim()).filter(Boolean);
  if (roots.length === 0) {
    throw new ConfigError(`Allowlist is empty: ${allowlistFile}`);
  }
  return createAllowlistGuard(roots);
}
