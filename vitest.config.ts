import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const src = (path: string) => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@\//, replacement: src("./src/") },
      { find: /^@db\//, replacement: src("./src/db/") },
      { find: /^@services\//, replacement: src("./src/services/") },
      { find: /^@commands\//, replacement: src("./src/commands/") },
    ],
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "src/**/*.test.tsx"],
  },
})
