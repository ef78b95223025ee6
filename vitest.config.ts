import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

export default defineConfig({
  resolve: {
    alias: {
      "@shared": fileURLToPath(new URL("./shared", import.meta.url)),
    },
  },
  test: {
    include: ["{server,scripts,shared}/**/__tests__/**/*.test.ts"],
    environment: "node",
    testTimeout: 20_000,
  },
});
