import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    pool: "forks",
    fileParallelism: false, // CLI tests share PROVESHEET_CONFIG and spy on process.exit
  },
});
