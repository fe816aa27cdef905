export { createProgram, parseTimestamp } from "./program.js";
export type { CliOptions } from "./program.js";
export { runUsageReport, sortChronologically } from "./run.js";
export type { RunDeps, RunResult } from "./run.js";
export { runCli } from "./cli.js";
