// File: src/utils/logger.ts
// Purpose: pino ベースのロガーを生成し、コンポーネントごとの子ロガーを配る。
// Reason: 標準出力は PDF のパススルーに使うため、開発者向けログを stderr に分離するため。
// Related: src/services/convertService.ts, src/utils/processRunner.ts, src/utils/streamPump.ts

import pino from "pino";

export type LogLevel = pino.LevelWithSilent;
export type Logger = pino.Logger;

export const LOG_LEVEL_ENV = "PRINCE_BRIDGE_LOG_LEVEL";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

let rootLogger: Logger | null = null;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** 環境変数のレベルを解釈する。未設定・不正値なら warn。 */
export function resolveLogLevel(raw: string | undefined = process.env[LOG_LEVEL_ENV]): LogLevel {
  const value = raw?.trim().toLowerCase();
  return value && isLogLevel(value) ? value : "warn";
}

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino(
      {
        name: "prince-bridge",
        level: resolveLogLevel(),
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
          level: (label) => ({ level: label }),
        },
      },
      pino.destination(2)
    );
  }
  return rootLogger;
}

/**
 * コンポーネント名付きの子ロガーを返す。level を渡すとその子ロガーだけレベルを上書きする。
 */
export function createLogger(component: string, level?: LogLevel): Logger {
  const child = getRootLogger().child({ component });
  if (level) child.level = level;
  return child;
}
