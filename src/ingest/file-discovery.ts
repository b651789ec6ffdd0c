import fs from "node:fs/promises";
import type { Dirent, Stats } from "node:fs";
import path from "node:path";
import {
  compilePathPatterns,
  isPathExcluded,
  matchesPathPattern,
  toPosixPath,
  type PathPattern,
} from "./path-patterns.js";
import type { FileEntry, WalkItem, WalkOptions } from "./types.js";

interface WalkContext {
  readonly extensions: ReadonlySet<string>;
  readonly excludePatterns: readonly PathPattern[];
  readonly cwd: string;
  readonly visitedDirs: Set<string>;
  readonly seenFiles: Set<string>;
}

/**
 * Lazily enumerate source files under the targets, in code-unit order.
 */
export async function* walkTargets(
  targets: readonly string[],
  options: WalkOptions,
): AsyncGenerator<WalkItem> {
  const context: WalkContext = {
    extensions: new Set(options.extensions.map((ext) => ext.toLowerCase())),
    excludePatterns: compilePathPatterns(options.excludePatterns ?? []),
    cwd: path.resolve(options.cwd ?? process.cwd()),
    visitedDirs: new Set(),
    seenFiles: new Set(),
  };

  for (const target of targets) {
    const stats = await statTarget(target);
    if (!stats) {
      yield { kind: "missing", target };
      continue;
    }

    const displayRoot = normalizeDisplayRoot(target);
    if (stats.isDirectory()) {
      const realRoot = await fs.realpath(target);
      yield* walkDirectory(realRoot, realRoot, displayRoot, context);
      continue;
    }

    if (!stats.isFile()) {
      continue;
    }
    const relativePath = fileTargetPath(context.cwd, target);
    if (isPathExcluded(relativePath, context.excludePatterns)) {
      continue;
    }
    const realFile = await fs.realpath(target);
    const entry = createFileEntry(context, realFile, relativePath, displayRoot);
    if (entry) {
      yield { kind: "file", file: entry };
    }
  }
}

export async function discoverFiles(
  targets: readonly string[],
  options: WalkOptions,
): Promise<{ files: FileEntry[]; missing: string[] }> {
  const files: FileEntry[] = [];
  const missing: string[] = [];
  for await (const item of walkTargets(targets, options)) {
    if (item.kind === "file") {
      files.push(item.file);
    } else if (item.kind === "missing") {
      missing.push(item.target);
    }
  }
  return { files, missing };
}

async function* walkDirectory(
  rootPath: string,
  currentPath: string,
  displayRoot: string,
  context: WalkContext,
): AsyncGenerator<WalkItem> {
  const realCurrent = await fs.realpath(currentPath);
  if (context.visitedDirs.has(realCurrent)) {
    return;
  }
  context.visitedDirs.add(realCurrent);

  let dirEntries: Dirent[];
  try {
    dirEntries = await fs.readdir(currentPath, { withFileTypes: true });
  } catch (error) {
    yield {
      kind: "error",
      path:
        joinDisplay(displayRoot, toRelativePosix(rootPath, currentPath)) ||
        ".",
      message: describeError(error),
    };
    return;
  }
  dirEntries.sort((a, b) => compareNames(a.name, b.name));

  for (const dirent of dirEntries) {
    const absolutePath = path.join(currentPath, dirent.name);
    const relativePath = toRelativePosix(rootPath, absolutePath);
    const displayPath = joinDisplay(displayRoot, relativePath);

    let isDirectory = dirent.isDirectory();
    let resolvedPath = absolutePath;
    let stats: Stats | null = null;
    if (dirent.isSymbolicLink()) {
      const resolved = await safeRealpath(absolutePath);
      if (!resolved || !isWithinRoot(rootPath, resolved)) {
        continue;
      }
      resolvedPath = resolved;
      stats = await fs.stat(resolved);
      isDirectory = stats.isDirectory();
    }

    if (
      matchesPathPattern(relativePath, context.excludePatterns, isDirectory)
    ) {
      continue;
    }

    if (isDirectory) {
      yield* walkDirectory(rootPath, resolvedPath, displayRoot, context);
      continue;
    }

    const isFile = stats ? stats.isFile() : dirent.isFile();
    if (!isFile) {
      continue;
    }
    const entry = createFileEntry(
      context,
      resolvedPath,
      relativePath,
      displayPath,
    );
    if (entry) {
      yield { kind: "file", file: entry };
    }
  }
}

function createFileEntry(
  context: WalkContext,
  absolutePath: string,
  relativePath: string,
  displayPath: string,
): FileEntry | null {
  const ext = path.posix.extname(relativePath).toLowerCase();
  if (!context.extensions.has(ext)) {
    return null;
  }
  if (context.seenFiles.has(absolutePath)) {
    return null;
  }
  context.seenFiles.add(absolutePath);
  return { absolutePath, relativePath, displayPath };
}

async function statTarget(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw error;
  }
}

function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

// A file target inside the working directory keeps its directories there;
// one outside it is classified by its name alone.
function fileTargetPath(cwd: string, target: string): string {
  const absolute = path.resolve(target);
  return isWithinRoot(cwd, absolute)
    ? toRelativePosix(cwd, absolute)
    : path.basename(absolute);
}

function normalizeDisplayRoot(target: string): string {
  const normalized = toPosixPath(path.normalize(target));
  if (normalized === "." || normalized === "") {
    return "";
  }
  return normalized.endsWith("/") && normalized.length > 1
    ? normalized.slice(0, -1)
    : normalized;
}

function joinDisplay(displayRoot: string, relativePath: string): string {
  if (!displayRoot) {
    return relativePath;
  }
  if (!relativePath) {
    return displayRoot;
  }
  return path.posix.join(displayRoot, relativePath);
}

function toRelativePosix(rootPath: string, absolutePath: string): string {
  const relative = path.relative(rootPath, absolutePath);
  return relative.split(path.sep).join(path.posix.sep);
}

function isWithinRoot(rootPath: string, targetPath: string): boolean {
  const relative = path.relative(rootPath, targetPath);
  return !relative.startsWith("..") && !path.isAbsolute(relative);
}

async function safeRealpath(targetPath: string): Promise<string | null> {
  try {
    return await fs.realpath(targetPath);
  } catch {
    return null;
  }
}

function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
