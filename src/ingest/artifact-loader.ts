import fs from "node:fs/promises";
import { ArtifactLoadError } from "../errors.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { createLogger } from "../utils/logger.js";
import type {
  Artifact,
  ArtifactFailure,
  ArtifactSource,
  LoadArtifactsResult,
} from "./types.js";

const logger = createLogger("ingest");

const UTF8_BOM = "\uFEFF";

export interface LoadArtifactsOptions {
  readonly concurrency?: number;
}

export async function loadArtifact(source: ArtifactSource): Promise<Artifact> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(source.absolutePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ArtifactLoadError(source.id, reason);
  }

  return Object.freeze({
    id: source.id,
    absolutePath: source.absolutePath,
    contentType: source.contentType,
    sizeBytes: bytes.byteLength,
    text: decodeText(source.id, bytes),
  });
}

/**
 * Decode strict UTF-8 and fold line endings to `\n`. Invalid byte sequences
 * and NUL bytes are rejected rather than replaced.
 */
export function decodeText(artifactId: string, bytes: Uint8Array): string {
  if (bytes.includes(0)) {
    throw new ArtifactLoadError(artifactId, "binary content (NUL byte)");
  }

  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    throw new ArtifactLoadError(artifactId, "invalid UTF-8 encoding");
  }

  if (text.startsWith(UTF8_BOM)) {
    text = text.slice(UTF8_BOM.length);
  }
  return text.replace(/\r\n?/g, "\n");
}

/**
 * Load every source, recording per-artifact failures instead of rejecting.
 * Output order follows input order.
 */
export async function loadArtifacts(
  sources: readonly ArtifactSource[],
  options: LoadArtifactsOptions = {},
): Promise<LoadArtifactsResult> {
  const outcomes = await mapWithConcurrency(
    sources,
    options.concurrency ?? 8,
    async (source): Promise<Artifact | ArtifactFailure> => {
      try {
        return await loadArtifact(source);
      } catch (error) {
        if (error instanceof ArtifactLoadError) {
          logger.warn(`Skipping ${error.artifactId}: ${error.reason}`);
          return { artifact_id: error.artifactId, reason: error.reason };
        }
        throw error;
      }
    },
  );

  const artifacts: Artifact[] = [];
  const failures: ArtifactFailure[] = [];
  for (const outcome of outcomes) {
    if ("artifact_id" in outcome) {
      failures.push(outcome);
    } else {
      artifacts.push(outcome);
    }
  }
  return { artifacts, failures };
}
