import { writeFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { createLogger } from "@credscope/logger";
import { IOError, formatError, toUnixSeconds } from "@credscope/core";

const log = createLogger("report:writer");

export interface WriteReportOptions {
  /** Directory for the always-written archival copy */
  outputDir: string;
  /** Additional user-requested destination */
  outputPath?: string;
  /** Clock used to name the archival file */
  nowMs?: number;
}

export interface WrittenReport {
  archivePath: string;
  outputPath?: string;
}

/** `api_stats_<unix seconds>.json` inside `outputDir`. */
export function resolveArchivePath(outputDir: string, nowMs: number): string {
  return join(outputDir, `api_stats_${toUnixSeconds(nowMs)}.json`);
}

function writeFileOrThrow(path: string, content: string): void {
  try {
    writeFileSync(path, content, "utf-8");
  } catch (err) {
    throw new IOError(`Cannot write report to ${path}: ${formatError(err)}`, path, err);
  }
}

/**
 * Write the serialized report to the archival file and, when requested,
 * to the user's output path. Existing files are overwritten.
 *
 * @throws IOError when either destination cannot be written.
 */
export function writeReport(json: string, options: WriteReportOptions): WrittenReport {
  const archivePath = resolveArchivePath(options.outputDir, options.nowMs ?? Date.now());

  try {
    mkdirSync(options.outputDir, { recursive: true });
  } catch (err) {
    throw new IOError(
      `Cannot create output directory ${options.outputDir}: ${formatError(err)}`,
      options.outputDir,
      err,
    );
  }

  writeFileOrThrow(archivePath, json);
  log.info(`Results automatically saved to ${archivePath}`);

  if (!options.outputPath) {
    return { archivePath };
  }

  writeFileOrThrow(options.outputPath, json);
  log.info(`Results also saved to ${options.outputPath}`);
  return { archivePath, outputPath: options.outputPath };
}
