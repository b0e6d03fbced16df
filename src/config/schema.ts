import { z } from "zod";
import { LOG_LEVELS } from "../utils/logger.js";

export const ConfigSchema = z
  .object({
    frameworks: z
      .array(z.string().min(1))
      .optional()
      .describe("Only report findings for these frameworks"),
    rules_dir: z
      .string()
      .min(1)
      .optional()
      .describe("Override catalog merged over the built-in rules"),
    exclude_rules: z.array(z.string().min(1)).default([]),
    ignore: z
      .array(z.string().min(1))
      .default([])
      .describe("Extra gitignore-style patterns to skip"),
    max_file_size_bytes: z
      .number()
      .int()
      .positive("max_file_size_bytes must be > 0")
      .default(10 * 1024 * 1024),
    concurrency: z
      .number()
      .int()
      .min(1, "concurrency must be >= 1")
      .max(64, "concurrency must be <= 64")
      .default(8),
    log_level: z.enum(LOG_LEVELS).default("info"),
  })
  .strict();

export type ScanConfig = z.infer<typeof ConfigSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "config";
    return `${where}: ${issue.message}`;
  });
}
