// File: src/utils/argEscaper.ts
// Purpose: 任意の文字列を、プラットフォームに応じて 1 つのコマンドライン引数として安全な形に変換する。
// Reason: Windows の cmd / CreateProcess と POSIX シェルで必要なクォート規則が異なるため。
// Related: src/services/princeCommandBuilder.ts, src/utils/processRunner.ts

/**
 * 1 引数分の文字列をエスケープする。
 *
 * POSIX ではシングルクォートで囲み、内部の `'` を `'\''` に置き換える（フラグに関係なく安全）。
 * Windows では MSVCRT の引数分割規則に合わせてダブルクォートし、
 * `escapeShellMeta` が真なら cmd.exe のメタ文字をキャレットでエスケープする。
 *
 * @param escapeShellMeta cmd.exe に解釈される可能性がある場合に真
 * @param isExecutableName 実行ファイル名のトークンなら真（空白を含む場合にキャレットで分割されないようにする）
 */
export function escapeArg(
  arg: string,
  escapeShellMeta = true,
  isExecutableName = false,
  platform: NodeJS.Platform = process.platform
): string {
  if (platform !== "win32") {
    return `'${arg.replace(/'/g, "'\\''")}'`;
  }

  let quote = /\s/.test(arg) || arg === "";

  // N 個のバックスラッシュ + `"` は 2N+1 個のバックスラッシュ + `"` になる
  let dquotes = 0;
  let escaped = arg.replace(/(\\*)"/g, (_match, slashes: string) => {
    dquotes += 1;
    return `${slashes}${slashes}\\"`;
  });

  let meta = false;
  if (escapeShellMeta) {
    meta = dquotes > 0 || /%[^%]+%/.test(escaped);

    if (!meta) {
      // ダブルクォート内なら無害になるメタ文字
      quote = quote || /[\^&|<>()]/.test(escaped);
    } else if (isExecutableName && dquotes === 0 && quote) {
      // 空白入りの実行ファイル名をキャレットでエスケープすると引数が分割される
      meta = false;
    }
  }

  if (quote) {
    // 閉じクォートをエスケープしないよう末尾のバックスラッシュを倍にする
    escaped = `"${escaped.replace(/(\\*)$/, "$1$1")}"`;
  }

  if (meta) {
    escaped = escaped.replace(/(["^&|<>()%])/g, "^$1");
  }

  return escaped;
}
