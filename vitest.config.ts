import { defineConfig } from "vitest/config";

const barrels = [
  "src/index.ts",
  "src/analytics/index.ts",
  "src/campaign/index.ts",
  "src/db/schema/index.ts",
  "src/domain/**/index.ts",
  "src/infrastructure/persistence/index.ts",
];

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "scripts/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts", "scripts/**/*.ts"],
      exclude: ["**/*.test.ts", "src/test/**", ...barrels],
      thresholds: { lines: 70, branches: 70 },
    },
  },
});
