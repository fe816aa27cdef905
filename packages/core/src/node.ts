// Node.js-specific entry point.
// Re-exports everything from the main entry plus path resolvers
// that depend on node:path and node:os.

export * from "./index.js";

export { resolveCredscopeHome, resolveLogDir } from "./paths.js";
