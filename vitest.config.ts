import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const src = (dir: string) =>
  fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@app": src("app"),
      "@config": src("config"),
      "@domain": src("domain"),
      "@infrastructure": src("infrastructure"),
      "@interfaces": src("interfaces"),
      "@middleware": src("middleware"),
      "@routes": src("routes"),
    },
  },
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "error",
      LOG_TO_FILE: "false",
    },
  },
});
