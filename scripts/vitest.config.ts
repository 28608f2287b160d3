import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

import { defineConfig } from "vitest/config";

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts", "src/**/*.{spec,test}.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    root: __dirname,
  },
  resolve: {
    alias: [
      {
        find: /^lib\/(.*)$/,
        replacement: resolve(__dirname, "../lib/$1"),
      },
    ],
  },
});
