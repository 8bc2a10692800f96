import assert from "node:assert/strict";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { after, before, describe, it } from "node:test";
import { ConfigError, InvalidInputError } from "./errors.js";
import { setLogLevel } from "./logger.js";
import { createAllowlistGuard, loadAllowlistGuard } from "./path-guard.js";
import { discoverFiles, isExcludedPath } from "./scanner.js";

setLogLevel("silent");

const REPO_FILES = [
  "main.py",
  "app.ts",
  "util.swift",
  "README.md",
  "notes.txt",
  "src/lib.ts",
  "src/helper.go",
  "src/builder/factory.ts",
  "node_modules/pkg/index.ts",
  ".git/hooks/pre-commit.py",
  ".hidden.py",
  "build/out.ts",
  "dist/bundle.js",
  "__pycache__/cache.py",
  "venv/lib/site.py",
  "Pods/Alamofire/Session.swift",
  "image.png"
];

describe("discoverFiles", () => {
  let root: string;
  const abs = (...parts: string[]) => parts.map((part) => path.join(root, part));

  before(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "repolens-scan-"));
    for (const relPath of REPO_FILES) {
      const filePath = path.join(root, relPath);
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, `// ${relPath}\n`, "utf8");
    }
  });

  after(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("uses the default patterns in guided mode", async () => {
    const files = await discoverFiles(root, "guided");
    assert.deepEqual(files, abs("app.ts", "main.py", "src/builder/factory.ts", "src/lib.ts", "util.swift"));
  });

  it("deduplicates overlapping guided patterns", async () => {
    const files = await discoverFiles(root, "guided", { patterns: ["*.ts", "**/*.ts", "src/*.ts"] });
    assert.deepEqual(files, abs("app.ts", "src/builder/factory.ts", "src/lib.ts"));
  });

  it("matches patterns with a directory part at any depth", async () => {
    assert.deepEqual(await discoverFiles(root, "guided", { patterns: ["builder/*.ts"] }), abs("src/builder/factory.ts"));
    assert.deepEqual(await discoverFiles(root, "guided", { patterns: ["./src/*.ts"] }), abs("src/lib.ts"));
  });

  it("never returns excluded trees even when a pattern names them", async () => {
    const files = await discoverFiles(root, "guided", {
      patterns: ["node_modules/**/*.ts", "build/*.ts", "Pods/**/*.swift", "**/.git/**/*.py"]
    });
    assert.deepEqual(files, []);
  });

  it("scans every supported extension in full mode", async () => {
    const files = await discoverFiles(root, "full");
    assert.deepEqual(
      files,
      abs(
        "README.md",
        "app.ts",
        "main.py",
        "notes.txt",
        "src/builder/factory.ts",
        "src/helper.go",
        "src/lib.ts",
        "util.swift"
      )
    );
  });

  it("keeps only existing regular files in manual mode", async () => {
    const files = await discoverFiles(root, "manual", {
      files: [
        "src/lib.ts",
        "missing.py",
        "src",
        path.join(root, "main.py"),
        "node_modules/pkg/index.ts",
        "../outside.py",
        "main.py"
      ]
    });
    assert.deepEqual(files, abs("main.py", "src/lib.ts"));
  });

  it("fails when the root does not exist", async () => {
    await assert.rejects(discoverFiles(path.join(root, "nope"), "full"), InvalidInputError);
  });

  it("fails when the root is a file", async () => {
    await assert.rejects(discoverFiles(path.join(root, "main.py"), "full"), InvalidInputError);
  });

  it("refuses a root outside the allowlist", async () => {
    const guard = createAllowlistGuard([path.join(os.tmpdir(), "repolens-elsewhere")]);
    await assert.rejects(discoverFiles(root, "guided", { guard }), InvalidInputError);
  });

  it("accepts a root inside the allowlist", async () => {
    const guard = createAllowlistGuard([path.dirname(root)]);
    const files = await discoverFiles(root, "manual", { files: ["app.ts"], guard });
    assert.deepEqual(files, abs("app.ts"));
  });
});

describe("isExcludedPath", () => {
  it("flags hidden segments and vendor directories anywhere in the path", () => {
    assert.equal(isExcludedPath("src/.env"), true);
    assert.equal(isExcludedPath(".github/workflows/ci.yml"), true);
    assert.equal(isExcludedPath("ios/Pods/A/a.swift"), true);
    assert.equal(isExcludedPath("pkg/__pycache__/m.py"), true);
    assert.equal(isExcludedPath("web/.next/server.js"), true);
  });

  it("matches whole segments only", () => {
    assert.equal(isExcludedPath("src/builder/factory.ts"), false);
    assert.equal(isExcludedPath("distance/calc.py"), false);
    assert.equal(isExcludedPath("a/b/c.py"), false);
  });
});

describe("loadAllowlistGuard", () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "repolens-allow-"));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads approved roots from a JSON array", async () => {
    const file = path.join(dir, "allowlist.json");
    await writeFile(file, JSON.stringify(["/srv/repos/app"]), "utf8");
    const guard = await loadAllowlistGuard(file);

    assert.equal(guard.isAllowed("/srv/repos/app/src"), true);
    assert.equal(guard.isAllowed("/srv/repos/app"), true);
    assert.equal(guard.isAllowed("/srv/repos/application"), false);
    assert.equal(guard.isAllowed("/srv/repos"), false);
  });

  it("fails closed on an empty allowlist", async () => {
    const file = path.join(dir, "empty.json");
    await writeFile(file, "[]", "utf8");
    await assert.rejects(loadAllowlistGuard(file), ConfigError);
  });

  it("fails closed on a missing allowlist", async () => {
    await assert.rejects(loadAllowlistGuard(path.join(dir, "absent.json")), ConfigError);
  });
});
