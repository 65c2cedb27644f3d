// File: src/services/princeCommandBuilder.ts
// Purpose: Prince 実行コマンドの生成を純粋関数として切り出す。
// Reason: コマンド生成をテストしやすくし、プロセス実行から分離するため。
// Related: src/services/convertService.ts, src/utils/processRunner.ts, src/utils/argEscaper.ts, src/PrinceOptions.ts

import { ConversionOptions } from "../PrinceOptions";
import { escapeArg } from "../utils/argEscaper";

/** "buffered" は標準出力へ PDF を流す呼び出しで使う。 */
export type LogMode = "normal" | "buffered";

/** 1 回の変換で使うコマンド。呼び出しごとに作り直し、共有しない。 */
export interface CommandInvocation {
  readonly command: string;
  readonly args: readonly string[];
}

function flag(name: string, value?: string | number): string {
  return value === undefined ? `--${name}` : `--${name}=${value}`;
}

/**
 * オプションから引数列を組み立てる。順序は ログ → 入力 → ネットワーク → JavaScript → CSS →
 * PDF 出力 → メタデータ → 暗号化 → ラスター → ライセンス → 失敗条件 → 追加オプション で固定。
 * 既定値のフィールドは出力しない。位置引数は最後に付く。
 */
export function buildPrinceCommand(
  options: ConversionOptions,
  logMode: LogMode = "normal",
  positionalArgs: readonly string[] = []
): CommandInvocation {
  const args: string[] = [flag("structured-log", logMode)];

  // ログ
  if (options.verbose) args.push(flag("verbose"));
  if (options.debug) args.push(flag("debug"));
  if (options.logFile) args.push(flag("log", options.logFile));
  if (options.noWarnCssUnknown) args.push(flag("no-warn-css-unknown"));
  if (options.noWarnCssUnsupported) args.push(flag("no-warn-css-unsupported"));

  // 入力
  if (options.inputType !== "auto") args.push(flag("input", options.inputType));
  if (options.baseUrl) args.push(flag("baseurl", options.baseUrl));
  for (const remap of options.remaps) {
    args.push(flag("remap", `${remap.url}=${remap.dir}`));
  }
  if (options.fileRoot) args.push(flag("fileroot", options.fileRoot));
  if (options.xInclude) args.push(flag("xinclude"));
  if (options.xmlExternalEntities) args.push(flag("xml-external-entities"));
  if (options.iframes) args.push(flag("iframes"));
  if (options.noLocalFiles) args.push(flag("no-local-files"));

  // ネットワーク
  if (options.noNetwork) args.push(flag("no-network"));
  if (options.noRedirects) args.push(flag("no-redirects"));
  if (options.authUser) args.push(flag("auth-user", options.authUser));
  if (options.authPassword) args.push(flag("auth-password", options.authPassword));
  if (options.authServer) args.push(flag("auth-server", options.authServer));
  if (options.authScheme) args.push(flag("auth-scheme", options.authScheme));
  if (options.authMethods.length) args.push(flag("auth-method", options.authMethods.join(",")));
  if (options.noAuthPreemptive) args.push(flag("no-auth-preemptive"));
  if (options.httpProxy) args.push(flag("http-proxy", options.httpProxy));
  if (options.httpTimeout > 0) args.push(flag("http-timeout", options.httpTimeout));
  if (options.cookie) args.push(flag("cookie", options.cookie));
  for (const cookie of options.cookies) args.push(flag("cookie", cookie));
  if (options.cookieJar) args.push(flag("cookiejar", options.cookieJar));
  if (options.sslCaCert) args.push(flag("ssl-cacert", options.sslCaCert));
  if (options.sslCaPath) args.push(flag("ssl-capath", options.sslCaPath));
  if (options.sslCert) args.push(flag("ssl-cert", options.sslCert));
  if (options.sslCertType) args.push(flag("ssl-cert-type", options.sslCertType));
  if (options.sslKey) args.push(flag("ssl-key", options.sslKey));
  if (options.sslKeyType) args.push(flag("ssl-key-type", options.sslKeyType));
  if (options.sslKeyPassword) args.push(flag("ssl-key-password", options.sslKeyPassword));
  if (options.sslVersion) args.push(flag("ssl-version", options.sslVersion));
  if (options.insecure) args.push(flag("insecure"));
  if (options.noParallelDownloads) args.push(flag("no-parallel-downloads"));

  // JavaScript
  if (options.javascript) args.push(flag("javascript"));
  for (const script of options.scripts) args.push(flag("script", script));
  if (options.maxPasses > 0) args.push(flag("max-passes", options.maxPasses));

  // CSS
  for (const sheet of options.styleSheets) args.push(flag("style", sheet));
  if (options.media) args.push(flag("media", options.media));
  if (options.pageSize) args.push(flag("page-size", options.pageSize));
  if (options.pageMargin) args.push(flag("page-margin", options.pageMargin));
  if (options.noAuthorStyle) args.push(flag("no-author-style"));
  if (options.noDefaultStyle) args.push(flag("no-default-style"));

  // PDF 出力
  if (options.pdfId) args.push(flag("pdf-id", options.pdfId));
  if (options.pdfScript) args.push(flag("pdf-script", options.pdfScript));
  for (const { event, script } of options.pdfEventScripts) {
    args.push(flag("pdf-event-script", `${event}:${script}`));
  }
  if (options.pdfLang) args.push(flag("pdf-lang", options.pdfLang));
  if (options.pdfProfile) args.push(flag("pdf-profile", options.pdfProfile));
  if (options.pdfOutputIntent) {
    args.push(flag("pdf-output-intent", options.pdfOutputIntent));
    // 出力インテントなしの --convert-colors は出さない
    if (options.convertColors) args.push(flag("convert-colors"));
  }
  for (const attachment of options.fileAttachments) args.push(flag("attach", attachment));
  if (options.noArtificialFonts) args.push(flag("no-artificial-fonts"));
  if (!options.embedFonts) args.push(flag("no-embed-fonts"));
  if (!options.subsetFonts) args.push(flag("no-subset-fonts"));
  if (!options.systemFonts) args.push(flag("no-system-fonts"));
  if (options.forceIdentityEncoding) args.push(flag("force-identity-encoding"));
  if (!options.compress) args.push(flag("no-compress"));
  if (options.noObjectStreams) args.push(flag("no-object-streams"));
  if (options.fallbackCmykProfile) args.push(flag("fallback-cmyk-profile", options.fallbackCmykProfile));
  if (options.taggedPdf) args.push(flag("tagged-pdf"));
  if (options.pdfForms) args.push(flag("pdf-forms"));
  if (options.cssDpi > 0) args.push(flag("css-dpi", options.cssDpi));

  // PDF メタデータ
  if (options.pdfTitle) args.push(flag("pdf-title", options.pdfTitle));
  if (options.pdfSubject) args.push(flag("pdf-subject", options.pdfSubject));
  if (options.pdfAuthor) args.push(flag("pdf-author", options.pdfAuthor));
  if (options.pdfKeywords) args.push(flag("pdf-keywords", options.pdfKeywords));
  if (options.pdfCreator) args.push(flag("pdf-creator", options.pdfCreator));
  if (options.pdfXmp) args.push(flag("pdf-xmp", options.pdfXmp));

  // PDF 暗号化
  if (options.encrypt) {
    args.push(flag("encrypt"));
    args.push(...getEncryptArgs(options));
  }

  // ラスター
  if (options.rasterFormat !== "auto") args.push(flag("raster-format", options.rasterFormat));
  if (options.rasterJpegQuality > -1) args.push(flag("raster-jpeg-quality", options.rasterJpegQuality));
  if (options.rasterPage > 0) args.push(flag("raster-pages", options.rasterPage));
  if (options.rasterDpi > 0) args.push(flag("raster-dpi", options.rasterDpi));
  if (options.rasterThreads > -1) args.push(flag("raster-threads", options.rasterThreads));
  if (options.rasterBackground) args.push(flag("raster-background", options.rasterBackground));

  // ライセンス
  if (options.licenseFile) args.push(flag("license-file", options.licenseFile));
  if (options.licenseKey) args.push(flag("license-key", options.licenseKey));

  // 失敗条件
  if (options.failDroppedContent) args.push(flag("fail-dropped-content"));
  if (options.failMissingResources) args.push(flag("fail-missing-resources"));
  if (options.failStrippedTransparency) args.push(flag("fail-stripped-transparency"));
  if (options.failMissingGlyphs) args.push(flag("fail-missing-glyphs"));
  if (options.failPdfProfileError) args.push(flag("fail-pdf-profile-error"));
  if (options.failPdfTagError) args.push(flag("fail-pdf-tag-error"));
  if (options.failInvalidLicense) args.push(flag("fail-invalid-license"));

  if (options.extraOptions) args.push(options.extraOptions);

  args.push(...positionalArgs);

  return { command: options.exePath, args };
}

// 空のパスワードは空値として渡さず省略する
export function getEncryptArgs(options: ConversionOptions): string[] {
  const info = options.encryptInfo;
  if (!info) return [];

  const args = [flag("key-bits", info.keyBits)];
  if (info.userPassword) args.push(flag("user-password", info.userPassword));
  if (info.ownerPassword) args.push(flag("owner-password", info.ownerPassword));
  if (info.disallowPrint) args.push(flag("disallow-print"));
  if (info.disallowModify) args.push(flag("disallow-modify"));
  if (info.disallowCopy) args.push(flag("disallow-copy"));
  if (info.disallowAnnotate) args.push(flag("disallow-annotate"));
  if (info.allowCopyForAccessibility) args.push(flag("allow-copy-for-accessibility"));
  if (info.allowAssembly) args.push(flag("allow-assembly"));
  return args;
}

// ---- 位置引数 ----

export function outputArg(outputPath: string): string {
  return flag("output", outputPath);
}

export function rasterOutputArg(rasterPath: string): string {
  return flag("raster-output", rasterPath);
}

export function inputListArg(listPath: string): string {
  return flag("input-list", listPath);
}

/** 標準入出力を表す位置引数 */
export const STDIO_ARG = "-";

// ---- 表示用 ----

const SECRET_FLAGS = [
  "auth-password",
  "ssl-key-password",
  "license-key",
  "user-password",
  "owner-password",
];

/** ログ出力用にパスワードとライセンスキーの値を伏せたコピーを返す。 */
export function redactInvocation(invocation: CommandInvocation): CommandInvocation {
  return {
    command: invocation.command,
    args: invocation.args.map((arg) => {
      const secret = SECRET_FLAGS.find((name) => arg.startsWith(`--${name}=`));
      return secret ? `--${secret}=***` : arg;
    }),
  };
}

/**
 * コマンドを 1 行の文字列として描画する。実行ファイルは isExecutableName 付きでエスケープする。
 */
export function formatCommandLine(
  invocation: CommandInvocation,
  platform: NodeJS.Platform = process.platform
): string {
  return [
    escapeArg(invocation.command, true, true, platform),
    ...invocation.args.map((arg) => escapeArg(arg, true, false, platform)),
  ].join(" ");
}
