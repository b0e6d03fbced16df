import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { minimatch } from "minimatch";
import { createLogger } from "../utils/logger.js";
import { classifyFile, isBinaryPath } from "./file-classifier.js";
import type { FileDiscoveryOptions, FileEntry } from "./types.js";

const logger = createLogger("ingest");

export const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;
const DEFAULT_IGNORE_FILES = [".gitignore", ".compliscanignore"] as const;
const DEFAULT_IGNORE_PATTERNS = [
  ".git/",
  ".svn/",
  "__pycache__/",
  "node_modules/",
  ".venv/",
  "venv/",
] as const;

interface IgnoreRule {
  readonly negated: boolean;
  readonly directoryOnly: boolean;
  readonly matchBase: boolean;
  readonly glob: string;
}

interface WalkContext {
  readonly rootPath: string;
  readonly ignoreRules: readonly IgnoreRule[];
  readonly maxFileSize: number;
  readonly visitedDirs: Set<string>;
  readonly entries: FileEntry[];
}

/**
 * Walk `rootPath` and return every regular file that survives the ignore
 * rules, the binary filter and the size limit, sorted by relative path.
 * Files of an unrecognized type are returned with `contentType: "unknown"`.
 */
export async function discoverFiles(
  rootPath: string,
  options: FileDiscoveryOptions = {},
): Promise<FileEntry[]> {
  const realRoot = await fs.realpath(rootPath);
  const ignoreFileNames = options.ignoreFileNames ?? DEFAULT_IGNORE_FILES;
  const ignoreRules = [
    ...DEFAULT_IGNORE_PATTERNS.map((pattern) => parseIgnoreRule(pattern)),
    ...(await readIgnoreFiles(realRoot, ignoreFileNames)),
    ...(options.ignorePatterns ?? []).map((pattern) => parseIgnoreRule(pattern)),
  ].filter((rule): rule is IgnoreRule => rule !== null);

  const context: WalkContext = {
    rootPath: realRoot,
    ignoreRules,
    maxFileSize: options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES,
    visitedDirs: new Set<string>(),
    entries: [],
  };

  await walkDirectory(realRoot, context);

  return context.entries.sort((a, b) =>
    a.relativePath.localeCompare(b.relativePath),
  );
}

async function walkDirectory(
  currentPath: string,
  context: WalkContext,
): Promise<void> {
  const realCurrent = await safeRealpath(currentPath);
  if (!realCurrent || context.visitedDirs.has(realCurrent)) {
    return;
  }
  context.visitedDirs.add(realCurrent);

  let dirEntries: Dirent[];
  try {
    dirEntries = await fs.readdir(currentPath, { withFileTypes: true });
  } catch (error) {
    logger.warn(`Skipping unreadable directory ${currentPath}:`, error);
    return;
  }
  dirEntries.sort((a, b) => a.name.localeCompare(b.name));

  for (const dirent of dirEntries) {
    const absolutePath = path.join(currentPath, dirent.name);
    const relativePath = toRelativePosix(context.rootPath, absolutePath);

    if (dirent.isSymbolicLink()) {
      const resolved = await safeRealpath(absolutePath);
      if (!resolved || !isWithinRoot(context.rootPath, resolved)) {
        continue;
      }
      const stats = await fs.stat(resolved);
      if (shouldIgnore(relativePath, context.ignoreRules, stats.isDirectory())) {
        continue;
      }
      if (stats.isDirectory()) {
        await walkDirectory(resolved, context);
      } else if (stats.isFile()) {
        addFileEntry(absolutePath, relativePath, stats.size, context);
      }
      continue;
    }

    if (shouldIgnore(relativePath, context.ignoreRules, dirent.isDirectory())) {
      continue;
    }

    if (dirent.isDirectory()) {
      await walkDirectory(absolutePath, context);
      continue;
    }

    if (dirent.isFile()) {
      const stats = await fs.stat(absolutePath);
      addFileEntry(absolutePath, relativePath, stats.size, context);
    }
  }
}

function addFileEntry(
  absolutePath: string,
  relativePath: string,
  sizeBytes: number,
  context: WalkContext,
): void {
  if (sizeBytes > context.maxFileSize || isBinaryPath(relativePath)) {
    return;
  }

  context.entries.push({
    absolutePath,
    relativePath,
    sizeBytes,
    contentType: classifyFile(relativePath),
  });
}

async function readIgnoreFiles(
  rootPath: string,
  ignoreFileNames: readonly string[],
): Promise<Array<IgnoreRule | null>> {
  const rules: Array<IgnoreRule | null> = [];

  for (const ignoreFileName of ignoreFileNames) {
    let contents: string;
    try {
      contents = await fs.readFile(path.join(rootPath, ignoreFileName), "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        continue;
      }
      throw error;
    }

    for (const rawLine of contents.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (!line || line.startsWith("#")) {
        continue;
      }
      rules.push(parseIgnoreRule(line));
    }
  }

  return rules;
}

/**
 * Translate one gitignore line into a minimatch glob. Patterns without a
 * slash match at any depth; a leading slash anchors to the root and a
 * trailing slash restricts the pattern to directories.
 */
export function parseIgnoreRule(raw: string): IgnoreRule | null {
  const negated = raw.startsWith("!");
  let pattern = negated ? raw.slice(1) : raw;

  const directoryOnly = pattern.endsWith("/");
  if (directoryOnly) {
    pattern = pattern.slice(0, -1);
  }

  const anchored = pattern.startsWith("/");
  if (anchored) {
    pattern = pattern.slice(1);
  }

  if (!pattern) {
    return null;
  }

  return {
    negated,
    directoryOnly,
    matchBase: !anchored && !pattern.includes("/"),
    glob: pattern,
  };
}

function shouldIgnore(
  relativePath: string,
  rules: readonly IgnoreRule[],
  isDirectory: boolean,
): boolean {
  let ignored = false;
  for (const rule of rules) {
    if (rule.directoryOnly && !isDirectory) {
      continue;
    }
    if (minimatch(relativePath, rule.glob, { dot: true, matchBase: rule.matchBase })) {
      ignored = !rule.negated;
    }
  }
  return ignored;
}

export function toRelativePosix(rootPath: string, absolutePath: string): string {
  return path.relative(rootPath, absolutePath).split(path.sep).join(path.posix.sep);
}

function isWithinRoot(rootPath: string, targetPath: string): boolean {
  const relative = path.relative(rootPath, targetPath);
  return !relative.startsWith("..") && !path.isAbsolute(relative);
}

// Dangling links, link loops (ELOOP) and unreadable entries (EACCES) are
// skipped so one bad path cannot abort the walk.
async function safeRealpath(targetPath: string): Promise<string | null> {
  try {
    return await fs.realpath(targetPath);
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug(`Skipping dangling link ${targetPath}`);
    } else {
      logger.warn(`Skipping unresolvable path ${targetPath}:`, error);
    }
    return null;
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
