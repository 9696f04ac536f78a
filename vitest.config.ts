import { defineConfig } from "vitest/config";

// Workspace packages resolve to their TypeScript sources under the "development" condition
const conditions = ["development"];

export default defineConfig({
  resolve: { conditions },
  ssr: { resolve: { conditions } },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
