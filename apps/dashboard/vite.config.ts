import { defineConfig } from "vitest/config";

export default defineConfig({
  root: __dirname,
  esbuild: {
    jsx: "automatic"
  },
  build: {
    sourcemap: true,
    outDir: "dist",
    emptyOutDir: true
  },
  test: {
    environment: "jsdom",
    setupFiles: "./src/test/setup.ts",
    include: ["src/test/**/*.test.ts", "src/test/**/*.test.tsx"]
  }
});
