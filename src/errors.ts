// File: src/errors.ts
// Purpose: 設定エラーと起動エラーを通常の変換失敗と区別するための例外クラス群。
// Reason: 変換失敗は戻り値で、プログラム側の誤りや起動不能は例外で伝えるため。
// Related: src/services/optionsManager.ts, src/utils/processRunner.ts, src/services/convertService.ts

export class PrinceBridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 範囲外の数値など、プロセス起動前に検出できる設定ミス。 */
export class ConfigurationError extends PrinceBridgeError {
  readonly option: string;

  constructor(option: string, message: string) {
    super(message);
    this.option = option;
  }
}

/** 実行ファイルが見つからない・実行権限がないなど、子プロセスを作れなかった場合。 */
export class LaunchError extends PrinceBridgeError {
  readonly command: string;
  readonly code: string | undefined;

  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to execute ${command}: ${reason}`, { cause });
    this.command = command;
    this.code = readErrorCode(cause);
  }
}

export function readErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  const code = error.code;
  return typeof code === "string" ? code : undefined;
}
