// /vitest.config.ts (workspace root)
import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@shared": path.resolve(__dirname, "backend/services/shared"),
    },
  },
  test: {
    environment: "node",
    reporters: ["default"],
    setupFiles: [
      "backend/services/shared/test/setup.ts",
      "backend/services/content/test/setup.ts",
    ],
    include: ["backend/services/**/test/**/*.spec.ts"],
  },
});
