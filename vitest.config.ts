import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    exclude: ["**/node_modules/**"],
    env: {
      BAYESNET_LOG_LEVEL: "silent",
    },
  },
});
