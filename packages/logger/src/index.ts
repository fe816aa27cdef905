import { Logger } from "tslog";
import {
  mkdirSync,
  appendFileSync,
  statSync,
  renameSync,
  existsSync,
  unlinkSync,
} from "node:fs";
import { join } from "node:path";
import { resolveLogDir } from "@credscope/core/node";

export const LOG_DIR = resolveLogDir();

export const LOG_FILENAME = "credscope.log";
export const LOG_FILENAME_PREV = "credscope.log.1";
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MB per file

// --- Module state ---
let fileLoggingEnabled = false;
let logDir = LOG_DIR;
let maxFileSize = DEFAULT_MAX_FILE_SIZE;
let fileWriteFailed = false;
const registeredLoggers: Logger<unknown>[] = [];
// tslog cannot detach a transport; each logger gets one that checks `fileLoggingEnabled`
const loggersWithFileTransport = new WeakSet<Logger<unknown>>();

export interface FileLoggingOptions {
  /** Max size per log file in bytes. Default: 5 MB. Total on disk ~ 2x this value. */
  maxFileSize?: number;
  /** Override log directory. Default: ~/.credscope/logs */
  logDir?: string;
}

/**
 * Enable file-based log persistence. Call once at startup.
 *
 * Writes to `{logDir}/credscope.log`. When the file exceeds `maxFileSize`,
 * it is rotated to `credscope.log.1` (one backup).
 *
 * Loggers created before AND after this call will write to disk.
 */
export function enableFileLogging(options?: FileLoggingOptions): void {
  if (options?.logDir) logDir = options.logDir;
  maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;

  mkdirSync(logDir, { recursive: true });
  rotateIfNeeded();
  fileLoggingEnabled = true;

  for (const logger of registeredLoggers) {
    attachFileTransport(logger);
  }
}

/**
 * Reset module state. Only for testing. Registered loggers are kept and
 * stop writing to disk until file logging is enabled again.
 * @internal
 */
export function _resetFileLogging(): void {
  fileLoggingEnabled = false;
  fileWriteFailed = false;
  logDir = LOG_DIR;
  maxFileSize = DEFAULT_MAX_FILE_SIZE;
}

function attachFileTransport(logger: Logger<unknown>): void {
  if (loggersWithFileTransport.has(logger)) return;
  loggersWithFileTransport.add(logger);
  logger.attachTransport((logObj: Record<string, unknown>) => {
    writeToFile(formatLogLine(logObj));
  });
}

function getLogFilePath(): string {
  return join(logDir, LOG_FILENAME);
}

function rotateIfNeeded(): void {
  const logPath = getLogFilePath();
  if (!existsSync(logPath)) return;
  const { size } = statSync(logPath);
  if (size >= maxFileSize) {
    const prevPath = join(logDir, LOG_FILENAME_PREV);
    if (existsSync(prevPath)) unlinkSync(prevPath);
    renameSync(logPath, prevPath);
  }
}

function writeToFile(line: string): void {
  if (!fileLoggingEnabled || fileWriteFailed) return;
  try {
    appendFileSync(getLogFilePath(), line + "\n", "utf-8");
    rotateIfNeeded();
  } catch (err) {
    // Report once, then keep logging to the console only
    fileWriteFailed = true;
    process.stderr.write(`credscope: file logging disabled: ${String(err)}\n`);
  }
}

/** Format a tslog log object as `<iso> <LEVEL> [name] args...`. */
export function formatLogLine(logObj: Record<string, unknown>): string {
  const meta = logObj._meta as
    | { date?: Date; logLevelName?: string; name?: string }
    | undefined;
  const ts = (meta?.date ?? new Date()).toISOString();
  const level = (meta?.logLevelName ?? "INFO").padEnd(5);
  const name = meta?.name ?? "";

  // tslog stores positional arguments as "0", "1", …
  const parts: string[] = [];
  for (let i = 0; ; i++) {
    const val = logObj[String(i)];
    if (val === undefined) break;
    parts.push(typeof val === "string" ? val : JSON.stringify(val));
  }

  return `${ts} ${level} [${name}] ${parts.join(" ")}`;
}

/**
 * Create a named logger. Console output goes to stderr so that stdout
 * stays free for the JSON report.
 */
export function createLogger(name: string): Logger<unknown> {
  const logger = new Logger({
    name,
    type: "pretty",
    minLevel: process.env.NODE_ENV === "production" ? 3 : 0,
    overwrite: {
      transportFormatted: (logMetaMarkup: string, logArgs: unknown[], logErrors: string[]) => {
        console.error(logMetaMarkup, ...logArgs, ...logErrors);
      },
    },
  });

  registeredLoggers.push(logger);

  if (fileLoggingEnabled) {
    attachFileTransport(logger);
  }

  return logger;
}
