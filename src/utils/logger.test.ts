// File: src/utils/logger.test.ts
// Purpose: ログレベルの解決と子ロガー生成を検証する。
// Related: src/utils/logger.ts

import { describe, expect, it } from "vitest";
import { createLogger, resolveLogLevel } from "./logger";

describe("resolveLogLevel", () => {
  it("未設定や不正値は warn", () => {
    expect(resolveLogLevel(undefined)).toBe("warn");
    expect(resolveLogLevel("")).toBe("warn");
    expect(resolveLogLevel("verbose")).toBe("warn");
  });

  it("前後の空白と大文字を許容する", () => {
    expect(resolveLogLevel(" DEBUG ")).toBe("debug");
    expect(resolveLogLevel("silent")).toBe("silent");
  });
});

describe("createLogger", () => {
  it("指定したレベルは子ロガーだけに効く", () => {
    const quiet = createLogger("quiet", "silent");
    const loud = createLogger("loud", "trace");

    expect(quiet.level).toBe("silent");
    expect(loud.level).toBe("trace");
    expect(loud.bindings()).toMatchObject({ component: "loud" });
  });
});
