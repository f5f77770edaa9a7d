import os from "os";
import path from "path";
import { defineConfig } from "vitest/config";

const testDataDir = path.join(os.tmpdir(), "notebook-router-bot-test");

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    testTimeout: 10000,
    env: {
      LOG_LEVEL: "error",
      NODE_ENV: "test",
      DATA_DIR: testDataDir,
      EXPORT_DIR: path.join(testDataDir, "exports"),
      GOOGLE_SERVICE_ACCOUNT_FILE: path.join(testDataDir, "missing-service-account.json"),
    },
  },
});
