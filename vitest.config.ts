// File: vitest.config.ts
// Purpose: Vitest の設定を集約する。
// Reason: テストを安定実行し、CI 環境とローカルの挙動を揃えるため。
// Related: tsconfig.json, package.json, tests/helpers/fakeEngine.ts

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    passWithNoTests: true,
    coverage: {
      provider: "v8",
    },
  },
});
