/**
 * Process entry for the `credscope` command.
 *
 * Usage: credscope <start_ts> <end_ts> [options]
 *
 * Reads the API key from ELEVEN_API_STATS. Logs go to stderr; the JSON
 * report goes to stdout and to api_stats_<unix seconds>.json.
 */

import { runCli } from "./cli.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(`credscope error: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    process.exit(1);
  });
