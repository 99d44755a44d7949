import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["engine/**/*.{test,spec}.ts", "shared/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 15000,
    env: {
      NODE_ENV: "test",
    },
  },
});
