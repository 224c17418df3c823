import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      shared: fileURLToPath(new URL("./shared", import.meta.url)),
    },
  },
  test: {
    include: ["backend/src/**/*.test.ts", "frontend/src/**/*.test.ts"],
    environment: "node",
  },
});
