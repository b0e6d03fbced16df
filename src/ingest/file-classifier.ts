import path from "node:path";
import type { FileClass } from "./types.js";

const DOCUMENT_EXTENSIONS = new Set([
  ".md",
  ".markdown",
  ".txt",
  ".rst",
  ".adoc",
]);

const CONFIG_EXTENSIONS = new Set([
  ".yml",
  ".yaml",
  ".json",
  ".jsonc",
  ".conf",
  ".ini",
  ".toml",
  ".cfg",
  ".properties",
  ".env",
  ".tf",
  ".tfvars",
  ".xml",
]);

const CODE_EXTENSIONS = new Set([
  ".py",
  ".js",
  ".cjs",
  ".mjs",
  ".jsx",
  ".ts",
  ".cts",
  ".mts",
  ".tsx",
  ".java",
  ".kt",
  ".go",
  ".rb",
  ".php",
  ".cs",
  ".c",
  ".h",
  ".cpp",
  ".hpp",
  ".rs",
  ".swift",
  ".scala",
  ".sql",
  ".sh",
  ".bash",
  ".zsh",
  ".ps1",
]);

export const BINARY_EXTENSIONS = new Set([
  ".pyc",
  ".pyo",
  ".exe",
  ".bin",
  ".so",
  ".dylib",
  ".dll",
  ".class",
  ".jar",
  ".zip",
  ".gz",
  ".tgz",
  ".tar",
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".ico",
  ".pdf",
  ".doc",
  ".docx",
  ".woff",
  ".woff2",
]);

const CONFIG_BASENAMES = new Set(["dockerfile", ".env", ".npmrc", ".htaccess"]);

export function classifyFile(relativePath: string): FileClass {
  const normalized = relativePath.split(path.sep).join(path.posix.sep);
  const lowerPath = normalized.toLowerCase();
  const base = path.posix.basename(lowerPath);
  const ext = path.posix.extname(lowerPath);

  if (CONFIG_BASENAMES.has(base) || base.startsWith(".env.")) {
    return "config";
  }

  if (base.endsWith(".dockerfile")) {
    return "config";
  }

  if (DOCUMENT_EXTENSIONS.has(ext)) {
    return "document";
  }

  if (CONFIG_EXTENSIONS.has(ext)) {
    return "config";
  }

  if (CODE_EXTENSIONS.has(ext)) {
    return "code";
  }

  return "unknown";
}

export function isBinaryPath(relativePath: string): boolean {
  return BINARY_EXTENSIONS.has(path.posix.extname(relativePath.toLowerCase()));
}
