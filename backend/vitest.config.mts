import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const backendRoot = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  root: backendRoot,
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: true,
    env: {
      NODE_ENV: "test"
    }
  }
});
