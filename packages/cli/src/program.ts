import { Command, InvalidArgumentError } from "commander";
import { normalizeTimestamp } from "@credscope/core";

export interface CliOptions {
  /** Timestamps as given on the command line (seconds or milliseconds) */
  start: number;
  end: number;
  output?: string;
  pretty: boolean;
  summaryOnly: boolean;
  byDay: boolean;
  outputDir: string;
  logDir?: string;
  /** Write logs under the credscope home when no log directory is given */
  log: boolean;
  print: boolean;
}

type ParsedFlags = {
  output?: string;
  pretty?: boolean;
  summaryOnly?: boolean;
  byDay?: boolean;
  outputDir: string;
  logDir?: string;
  log?: boolean;
  print: boolean;
};

const DESCRIPTION = `Analyze ElevenLabs credit usage over a time range.

Timestamps are Unix time in seconds or milliseconds. A timestamped copy of
the report (api_stats_<unix seconds>.json) is always written to the output
directory.`;

/** Largest epoch offset `Date` can represent, in milliseconds. */
const MAX_DATE_MS = 8.64e15;

export function parseTimestamp(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected an integer Unix timestamp.");
  }
  const timestamp = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(timestamp) || Math.abs(normalizeTimestamp(timestamp)) > MAX_DATE_MS) {
    throw new InvalidArgumentError("Timestamp is out of range.");
  }
  return timestamp;
}

/**
 * Build the `credscope` command. `onRun` receives the validated options;
 * argument errors go through commander's own error path (exit code 1).
 */
export function createProgram(onRun: (options: CliOptions) => Promise<void>): Command {
  const program = new Command();

  program
    .name("credscope")
    .description(DESCRIPTION)
    .version("0.1.0")
    .argument("<start_timestamp>", "Start Unix timestamp (seconds or milliseconds)", parseTimestamp)
    .argument("<end_timestamp>", "End Unix timestamp (seconds or milliseconds)", parseTimestamp)
    .option("-o, --output <path>", "Additional output file")
    .option("--pretty", "Pretty print JSON output")
    .option("--summary-only", "Show only the summary, not individual calls")
    .option("--by-day", "Add a per-day breakdown to the summary")
    .option("--output-dir <dir>", "Directory for the timestamped report", ".")
    .option("--log", "Also write logs to credscope.log in <CREDSCOPE_HOME>/logs")
    .option("--log-dir <dir>", "Also write logs to credscope.log in this directory")
    .option("--no-print", "Do not print the JSON report to stdout")
    .action(async (start: number, end: number) => {
      if (normalizeTimestamp(start) >= normalizeTimestamp(end)) {
        program.error("error: start timestamp must be before end timestamp");
      }
      const flags = program.opts<ParsedFlags>();
      await onRun({
        start,
        end,
        output: flags.output,
        pretty: flags.pretty ?? false,
        summaryOnly: flags.summaryOnly ?? false,
        byDay: flags.byDay ?? false,
        outputDir: flags.outputDir,
        logDir: flags.logDir,
        log: flags.log ?? false,
        print: flags.print,
      });
    });

  return program;
}
