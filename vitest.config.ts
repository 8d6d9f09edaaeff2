import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  esbuild: {
    jsx: "automatic",
    jsxImportSource: "react",
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.spec.{ts,tsx}"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 30000,
    clearMocks: true,
    restoreMocks: true,
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.{ts,tsx}"],
      exclude: ["**/*.spec.ts", "**/*.spec.tsx", "**/testing.ts"],
      reporter: ["text", "json", "html"],
    },
  },
  resolve: {
    alias: [
      { find: "@replkit/shared", replacement: src("shared") },
      { find: "@replkit/kernel", replacement: src("kernel") },
      { find: "@replkit/core", replacement: src("core") },
      // Strip .js from relative imports so vite resolves .ts source files
      { find: /^(\.{1,2}\/.*)\.js$/, replacement: "$1" },
    ],
  },
});
