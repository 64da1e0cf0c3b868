import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    // Stores are SQLite files under os.tmpdir(); keep them in one process.
    pool: "forks",
  },
});
