import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

const srcDir = fileURLToPath(new URL("./src/", import.meta.url));

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**"],
    reporters: "default",
  },
  resolve: {
    alias: [{ find: /^#\/(.*)$/, replacement: `${srcDir}$1` }],
  },
});
