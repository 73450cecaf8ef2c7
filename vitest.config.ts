import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string): string =>
  fileURLToPath(new URL(`./src/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^#fp$/, replacement: src("fp/index.ts") },
      { find: /^#test-utils$/, replacement: src("test-utils/index.ts") },
      { find: /^#routes$/, replacement: src("routes/index.ts") },
      { find: /^#routes\/(.*)$/, replacement: src("routes/$1") },
      { find: /^#lib\/(.*)$/, replacement: src("lib/$1") },
      { find: /^#src\/(.*)$/, replacement: src("$1") },
    ],
  },
  test: {
    include: ["test/**/*.test.ts"],
    pool: "forks",
  },
});
