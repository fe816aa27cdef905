import { createLogger, enableFileLogging } from "@credscope/logger";
import { IOError, formatError, isCredscopeError } from "@credscope/core";
import { resolveLogDir } from "@credscope/core/node";
import { createProgram } from "./program.js";
import type { CliOptions } from "./program.js";
import { runUsageReport } from "./run.js";
import type { RunDeps } from "./run.js";

const log = createLogger("cli");

function setUpFileLogging(options: CliOptions, env: Record<string, string | undefined>): void {
  const logDir = options.logDir ?? (options.log ? resolveLogDir(env) : undefined);
  if (!logDir) return;
  try {
    enableFileLogging({ logDir });
  } catch (err) {
    throw new IOError(`Cannot write logs to ${logDir}: ${formatError(err)}`, logDir, err);
  }
}

/**
 * Parse `argv` (user arguments only) and run the report.
 * Resolves to the process exit code. Argument errors exit through commander.
 */
export async function runCli(argv: readonly string[], deps: RunDeps = {}): Promise<number> {
  let exitCode = 0;

  const program = createProgram(async (options) => {
    try {
      setUpFileLogging(options, deps.env ?? process.env);
      await runUsageReport(options, deps);
    } catch (err) {
      if (!isCredscopeError(err)) throw err;
      log.error(`${err.name}: ${err.message}`);
      exitCode = 1;
    }
  });

  await program.parseAsync([...argv], { from: "user" });
  return exitCode;
}
