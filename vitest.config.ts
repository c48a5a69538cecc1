import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@gpuform/contracts": fileURLToPath(new URL("./contracts/src/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["contracts/tests/**/*.test.ts", "lifecycle/tests/**/*.test.ts"],
    environment: "node",
    setupFiles: ["lifecycle/tests/setup-quiet.ts"],
  },
});
