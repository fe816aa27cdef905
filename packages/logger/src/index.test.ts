import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFileSync, rmSync, existsSync, statSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  createLogger,
  enableFileLogging,
  formatLogLine,
  _resetFileLogging,
  LOG_DIR,
  LOG_FILENAME,
  LOG_FILENAME_PREV,
} from "./index.js";

function createTempDir(): string {
  const dir = join(tmpdir(), `logger-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

describe("createLogger", () => {
  it("creates a logger with the given name", () => {
    const log = createLogger("test");
    expect(log.settings.name).toBe("test");
  });

  it("LOG_DIR points to the credscope logs directory", () => {
    expect(LOG_DIR).toContain("logs");
  });
});

describe("formatLogLine", () => {
  it("joins positional arguments after timestamp, level, and name", () => {
    const line = formatLogLine({
      _meta: { date: new Date("2025-03-01T12:00:00.000Z"), logLevelName: "WARN", name: "fetch" },
      "0": "skipped item",
      "1": { id: "h1" },
    });
    expect(line).toBe('2025-03-01T12:00:00.000Z WARN  [fetch] skipped item {"id":"h1"}');
  });
});

describe("file logging", () => {
  let tempDir: string;

  beforeEach(() => {
    _resetFileLogging();
    tempDir = createTempDir();
  });

  afterEach(() => {
    _resetFileLogging();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("writes log lines to credscope.log after enableFileLogging", () => {
    enableFileLogging({ logDir: tempDir });
    const log = createLogger("test-file");

    log.info("hello from test");

    const content = readFileSync(join(tempDir, LOG_FILENAME), "utf-8");
    expect(content).toContain("[test-file] hello from test");
  });

  it("retroactively attaches to loggers created before enableFileLogging", () => {
    const log = createLogger("early-logger");

    enableFileLogging({ logDir: tempDir });
    log.info("retroactive message");

    const content = readFileSync(join(tempDir, LOG_FILENAME), "utf-8");
    expect(content).toContain("[early-logger] retroactive message");
  });

  it("does not write to file when file logging is not enabled", () => {
    const log = createLogger("silent-logger");
    log.info("should not appear on disk");

    expect(existsSync(join(tempDir, LOG_FILENAME))).toBe(false);
  });

  it("stops writing once file logging is reset", () => {
    enableFileLogging({ logDir: tempDir });
    const log = createLogger("reset-test");
    log.info("before reset");

    _resetFileLogging();
    log.info("after reset");

    const content = readFileSync(join(tempDir, LOG_FILENAME), "utf-8");
    expect(content).toContain("[reset-test] before reset");
    expect(content).not.toContain("after reset");
  });

  it("keeps loggers created before a reset, writing each line once", () => {
    const log = createLogger("long-lived");
    enableFileLogging({ logDir: tempDir });
    _resetFileLogging();

    const secondDir = join(tempDir, "second");
    enableFileLogging({ logDir: secondDir });
    log.info("after re-enable");

    const content = readFileSync(join(secondDir, LOG_FILENAME), "utf-8");
    expect(content.trim().split("\n")).toHaveLength(1);
    expect(content).toContain("[long-lived] after re-enable");
  });

  it("creates a missing log directory", () => {
    const nested = join(tempDir, "a", "b");
    enableFileLogging({ logDir: nested });
    createLogger("nested").info("x");

    expect(existsSync(join(nested, LOG_FILENAME))).toBe(true);
  });

  it("rotates when log file exceeds maxFileSize", () => {
    enableFileLogging({ logDir: tempDir, maxFileSize: 200 });
    const log = createLogger("rotate-test");

    for (let i = 0; i < 20; i++) {
      log.info(`line ${i} with some padding to fill the file quickly`);
    }

    expect(existsSync(join(tempDir, LOG_FILENAME))).toBe(true);
    expect(existsSync(join(tempDir, LOG_FILENAME_PREV))).toBe(true);
  });

  it("total disk usage stays bounded", () => {
    const maxSize = 500;
    enableFileLogging({ logDir: tempDir, maxFileSize: maxSize });
    const log = createLogger("bound-test");

    for (let i = 0; i < 100; i++) {
      log.info(`entry ${i}: ${"x".repeat(50)}`);
    }

    const logPath = join(tempDir, LOG_FILENAME);
    const prevPath = join(tempDir, LOG_FILENAME_PREV);

    let totalSize = 0;
    if (existsSync(logPath)) totalSize += statSync(logPath).size;
    if (existsSync(prevPath)) totalSize += statSync(prevPath).size;

    expect(totalSize).toBeLessThan(maxSize * 4);
  });

  it("formats log lines with timestamp, level, and name", () => {
    enableFileLogging({ logDir: tempDir });
    const log = createLogger("fmt-test");

    log.warn("something went wrong", "detail");

    const content = readFileSync(join(tempDir, LOG_FILENAME), "utf-8");
    expect(content).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z WARN  \[fmt-test\] something went wrong detail$/m);
  });
});
