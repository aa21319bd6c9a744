import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: [
        "src/repositories/**/*Live.ts",
        "src/services/**/*Live.ts",
        "src/api/**/*.ts",
        "src/domain/**/*.ts"
      ],
      exclude: [
        "src/**/*.test.ts",
        "src/__tests__/**",
        "src/server.ts",
        "src/db.ts",
        "src/telemetry.ts",
        "src/layers.ts"
      ]
    }
  }
})
