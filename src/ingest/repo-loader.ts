import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { simpleGit } from "simple-git";
import { TargetError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { classifyFile, isBinaryPath } from "./file-classifier.js";
import { discoverFiles, toRelativePosix } from "./file-discovery.js";
import type {
  ArtifactSource,
  FileDiscoveryOptions,
  FileEntry,
  ScanTarget,
  TargetContext,
} from "./types.js";

const logger = createLogger("ingest");

export interface ResolveTargetsOptions extends FileDiscoveryOptions {
  /** Base for artifact ids. Defaults to `process.cwd()`. */
  readonly cwd?: string;
}

/**
 * Resolve files, directories and git URLs into the artifact sources of one
 * run. Sources are deduplicated by id; the caller must invoke `cleanup` once
 * the run is finished to remove cloned repositories.
 */
export async function resolveTargets(
  inputs: readonly string[],
  options: ResolveTargetsOptions = {},
): Promise<TargetContext> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const cleanups: Array<() => Promise<void>> = [];
  const cleanup = async (): Promise<void> => {
    for (const task of cleanups.splice(0)) {
      await task();
    }
  };

  try {
    const targets: ScanTarget[] = [];
    const clonedUrls = new Set<string>();
    const repoPrefixes = new Set<string>();
    for (const input of inputs) {
      if (isGitUrl(input)) {
        if (clonedUrls.has(input)) {
          logger.debug(`Skipping repeated target ${input}`);
          continue;
        }
        clonedUrls.add(input);
        const prefix = uniquePrefix(repositoryName(input), repoPrefixes);
        const cloned = await cloneRepository(input);
        cleanups.push(cloned.cleanup);
        targets.push(await loadGitTarget(input, prefix, cloned.path, options));
        continue;
      }
      targets.push(await loadLocalTarget(input, cwd, options));
    }

    const seen = new Set<string>();
    const sources: ArtifactSource[] = [];
    for (const target of targets) {
      for (const file of target.files) {
        if (seen.has(file.id)) {
          continue;
        }
        seen.add(file.id);
        sources.push(file);
      }
    }

    return { targets, sources, cleanup };
  } catch (error) {
    await cleanup();
    throw error;
  }
}

async function loadLocalTarget(
  input: string,
  cwd: string,
  options: FileDiscoveryOptions,
): Promise<ScanTarget> {
  const resolvedPath = path.resolve(cwd, input);
  let stats: Awaited<ReturnType<typeof fs.stat>>;
  try {
    stats = await fs.stat(resolvedPath);
  } catch {
    throw new TargetError(
      input,
      `Target path does not exist: ${resolvedPath}. Provide a file or directory to scan.`,
    );
  }

  if (stats.isFile()) {
    const relativePath = path.basename(resolvedPath);
    const contentType = classifyFile(relativePath);
    const files: ArtifactSource[] = [];
    if (contentType !== "unknown" && !isBinaryPath(relativePath)) {
      files.push({
        id: artifactIdFor(cwd, resolvedPath),
        absolutePath: resolvedPath,
        contentType,
        sizeBytes: stats.size,
      });
    }
    return {
      input,
      rootPath: path.dirname(resolvedPath),
      source: "file",
      files,
      skipped: 1 - files.length,
    };
  }

  if (!stats.isDirectory()) {
    throw new TargetError(
      input,
      `Target path must be a file or directory: ${resolvedPath}.`,
    );
  }

  const entries = await discoverFiles(resolvedPath, options);
  const files = toSources(entries, (entry) =>
    artifactIdFor(cwd, path.join(resolvedPath, entry.relativePath)),
  );
  logger.debug(`Discovered ${files.length} files under ${input}`);
  return {
    input,
    rootPath: resolvedPath,
    source: "directory",
    files,
    skipped: entries.length - files.length,
  };
}

async function loadGitTarget(
  repoUrl: string,
  prefix: string,
  clonePath: string,
  options: FileDiscoveryOptions,
): Promise<ScanTarget> {
  const entries = await discoverFiles(clonePath, options);
  const files = toSources(entries, (entry) => `${prefix}/${entry.relativePath}`);
  return {
    input: repoUrl,
    rootPath: clonePath,
    source: "git",
    repoUrl,
    files,
    skipped: entries.length - files.length,
  };
}

function toSources(
  entries: readonly FileEntry[],
  idFor: (entry: FileEntry) => string,
): ArtifactSource[] {
  const sources: ArtifactSource[] = [];
  for (const entry of entries) {
    if (entry.contentType === "unknown") {
      continue;
    }
    sources.push({
      id: idFor(entry),
      absolutePath: entry.absolutePath,
      contentType: entry.contentType,
      sizeBytes: entry.sizeBytes,
    });
  }
  return sources;
}

/**
 * POSIX path relative to `cwd`, or the absolute POSIX path when the file
 * lives outside it.
 */
export function artifactIdFor(cwd: string, absolutePath: string): string {
  const relative = toRelativePosix(cwd, absolutePath);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    return absolutePath.split(path.sep).join(path.posix.sep);
  }
  return relative;
}

export function isGitUrl(target: string): boolean {
  if (target.startsWith("git@")) {
    return true;
  }

  try {
    const url = new URL(target);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

export function repositoryName(repoUrl: string): string {
  const trimmed = repoUrl.replace(/\/+$/, "").replace(/\.git$/, "");
  const name = trimmed.split(/[/:]/).pop();
  return name && name.length > 0 ? name : "repository";
}

/**
 * Id prefix for a cloned repository. Repositories sharing a name get `-2`,
 * `-3` and so on, in input order.
 */
export function uniquePrefix(name: string, taken: Set<string>): string {
  let prefix = name;
  for (let suffix = 2; taken.has(prefix); suffix += 1) {
    prefix = `${name}-${suffix}`;
  }
  taken.add(prefix);
  return prefix;
}

async function cloneRepository(
  repoUrl: string,
): Promise<{ path: string; cleanup: () => Promise<void> }> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "compliscan-"));
  const cleanup = async (): Promise<void> => {
    await fs.rm(tempDir, { recursive: true, force: true });
  };

  try {
    logger.info(`Cloning ${repoUrl}`);
    await simpleGit().clone(repoUrl, tempDir, ["--depth", "1"]);
  } catch (error) {
    await cleanup();
    throw error;
  }
  return { path: tempDir, cleanup };
}
