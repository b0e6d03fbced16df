import type { Evidence, Location } from "./types.js";
import { redactSensitive } from "./redaction.js";

const CONTEXT_LINES = 3;

/**
 * Offsets at which each line of `text` starts. Index 0 is line 1.
 */
export function lineStarts(text: string): number[] {
  const starts = [0];
  let newline = text.indexOf("\n");
  while (newline !== -1) {
    starts.push(newline + 1);
    newline = text.indexOf("\n", newline + 1);
  }
  return starts;
}

export function locate(
  starts: readonly number[],
  offset: number,
): Location {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = Math.ceil((low + high) / 2);
    if ((starts[mid] ?? 0) <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  const lineStart = starts[low] ?? 0;
  return { line: low + 1, column: offset - lineStart + 1, offset };
}

/**
 * Build the evidence block for a match: up to three lines of context on
 * either side, with sensitive values redacted.
 */
export function extractEvidence(
  artifactId: string,
  text: string,
  line: number,
  matchText: string,
): Evidence {
  const lines = text.split("\n");
  const startLine = Math.max(1, line - CONTEXT_LINES);
  const endLine = Math.min(lines.length, line + CONTEXT_LINES);
  const snippet = lines.slice(startLine - 1, endLine).join("\n");

  return {
    path: artifactId,
    start_line: startLine,
    end_line: endLine,
    snippet: redactSensitive(snippet),
    match: redactSensitive(matchText),
  };
}

export function gapEvidence(artifactId: string, message: string): Evidence {
  return {
    path: artifactId,
    start_line: 1,
    end_line: 1,
    snippet: message,
    match: message,
  };
}
