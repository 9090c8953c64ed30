import { defineConfig } from "vitest/config";
const ROOT = process.cwd();

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    setupFiles: ["./test/setup.ts"],
    include: ["test/**/*.{test,spec}.ts"],
    watch: false,
    pool: "threads",
  },
  resolve: {
    alias: [
      { find: "@", replacement: ROOT },
      { find: "@/", replacement: ROOT + "/" },
    ],
  },
});
