import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    // Component tests opt into jsdom with a per-file environment comment.
    environment: "node",
    include: ["test/**/*.test.ts", "test/**/*.test.tsx"],
    env: {
      SOLVER_CACHE_PATH: ":memory:",
      DATABASE_URL: "",
      POSTGRES_URL: "",
    },
  },
});
