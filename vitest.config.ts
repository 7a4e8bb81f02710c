import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "shared-types": path.join(root, "packages/shared-types/src/index.ts"),
      "cli-utils": path.join(root, "packages/cli-utils/src/index.ts"),
    },
  },
  test: {
    include: ["apps/*/src/**/*.test.ts", "packages/*/src/**/*.test.ts"],
    environment: "node",
  },
});
