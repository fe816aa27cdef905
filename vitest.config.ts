import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const src = (pkg: string, entry = "index.ts") =>
  fileURLToPath(new URL(`./packages/${pkg}/src/${entry}`, import.meta.url));

export default defineConfig({
  test: {
    globals: false,
    include: ["packages/*/src/**/*.test.ts"],
    alias: {
      "@credscope/core/node": src("core", "node.ts"),
      "@credscope/core": src("core"),
      "@credscope/logger": src("logger"),
      "@credscope/usage": src("usage"),
      "@credscope/provider/testing": src("provider", "fake-provider.ts"),
      "@credscope/provider": src("provider"),
      "@credscope/report": src("report"),
    },
  },
});
