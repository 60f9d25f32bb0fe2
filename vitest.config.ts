import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      {
        extends: "./vitest.shared.ts",
        test: {
          name: "candle-primitives",
          include: ["packages/**/src/**/*.test.ts", "packages/**/src/**/*.spec.ts"],
        },
      },
      {
        extends: "./vitest.shared.ts",
        test: {
          name: "ingestor",
          include: ["services/**/src/**/*.test.ts", "services/**/src/**/*.spec.ts"],
        },
      },
    ],
  },
});
