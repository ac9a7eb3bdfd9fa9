import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const here = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    name: "reader",
    root: here("."),
    include: ["src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@almanac/core": here("../core/src/index.ts"),
    },
  },
});
