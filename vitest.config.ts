import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      "@core": fromRoot("./src/core/index.ts"),
      "@cli": fromRoot("./src/cli"),
      "@domain": fromRoot("./src/domain"),
      "@services": fromRoot("./src/services"),
    },
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
})
