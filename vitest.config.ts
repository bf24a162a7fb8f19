import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (dir: string) =>
  fileURLToPath(new URL(`./packages/${dir}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@qprof/cli-core": pkg("core"),
      "@qprof/cli-adapters": pkg("adapters"),
      "@qprof/sumo-api": pkg("sumo-api"),
      "@qprof/query-profiler": pkg("profiler"),
      "@qprof/cli-runtime": pkg("cli-runtime"),
      "@qprof/cli-commands": pkg("commands"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.spec.ts", "packages/**/src/**/*.test.ts"],
    setupFiles: [fileURLToPath(new URL("./vitest.setup.ts", import.meta.url))],
    restoreMocks: true,
  },
});
