import { join } from "node:path";
import { homedir } from "node:os";

/** Resolve the credscope home directory. Defaults to ~/.credscope. */
export function resolveCredscopeHome(
  env: Record<string, string | undefined> = process.env,
): string {
  return env.CREDSCOPE_HOME?.trim() || join(homedir(), ".credscope");
}

/** Resolve the log directory. */
export function resolveLogDir(
  env: Record<string, string | undefined> = process.env,
): string {
  return join(resolveCredscopeHome(env), "logs");
}
