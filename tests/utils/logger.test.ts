import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  configureLogger,
  createLogger,
  formatMessage,
  info,
  warn,
  error,
} from "../../src/utils/logger.js";

describe("logger", () => {
  let written: string[];

  beforeEach(() => {
    written = [];
    vi.spyOn(process.stderr, "write").mockImplementation((chunk) => {
      written.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    configureLogger({ level: "info", quiet: false });
  });

  it("formats messages with a timestamp and level", () => {
    const now = new Date("2024-01-02T03:04:05.000Z");
    expect(formatMessage("info", "hello", now)).toBe(
      "[2024-01-02T03:04:05.000Z] [INFO] hello",
    );
  });

  it("drops messages below the configured level", () => {
    configureLogger({ level: "warn" });
    info("not shown");
    warn("shown");

    expect(written).toHaveLength(1);
    expect(written[0]).toContain("[WARN] shown");
  });

  it("prefixes messages of named loggers", () => {
    createLogger("engine").warn("boom", { file: "a.py" });

    expect(written).toHaveLength(1);
    expect(written[0]).toContain('[WARN] [engine] boom {"file":"a.py"}');
  });

  it("only writes errors in quiet mode", () => {
    configureLogger({ level: "debug", quiet: true });
    warn("hidden");
    error("failed", new Error("disk full"));

    expect(written).toHaveLength(1);
    expect(written[0]).toContain("[ERROR] failed disk full");
  });

  it("returns the previous settings so they can be restored", () => {
    configureLogger({ level: "warn" });

    const previous = configureLogger({ level: "debug", quiet: true });
    configureLogger(previous);
    info("not shown");

    expect(previous).toEqual({ level: "warn", quiet: false });
    expect(written).toHaveLength(0);
  });
});
