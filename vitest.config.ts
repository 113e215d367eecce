import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    testTimeout: 10_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      // Boundary coverage: the surfaces the host and the executor call into
      include: [
        "src/router/engine.ts",
        "src/preprocessing/pipeline.ts",
        "src/safety/classifier.ts",
        "src/hook/handler.ts",
        "src/events/logger.ts",
      ],
      exclude: [
        "src/**/__tests__/**",
        "src/schemas/**",   // Zod schemas tested via integration
      ],
    },
  },
});
