import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    setupFiles: ["test/setup.ts"],
    environment: "node",
    pool: "forks",
    poolOptions: {
      forks: {
        // observer tests force a collection to check the parser's weak reference
        execArgv: ["--expose-gc"],
      },
    },
  },
});
