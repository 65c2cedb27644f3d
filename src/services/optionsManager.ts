// File: src/services/optionsManager.ts
// Purpose: ConversionOptions の生成・更新ロジックを純粋関数として集約する。
// Reason: 列挙値のフォールバックと数値の厳格チェックを一箇所にまとめ、テストしやすくするため。
// Related: src/PrinceOptions.ts, src/services/princeCommandBuilder.ts, src/services/convertService.ts, src/errors.ts

import {
  AUTH_METHODS,
  AUTH_SCHEMES,
  BOOLEAN_KEYS,
  ConversionOptions,
  DEFAULT_OPTIONS,
  ENCRYPTION_KEY_BITS,
  EncryptInfo,
  EncryptionKeyBits,
  FAIL_SAFE_KEYS,
  FREE_FORM_STRING_KEYS,
  FreeFormStringKey,
  BooleanOptionKey,
  INPUT_TYPES,
  KEY_TYPES,
  PDF_EVENTS,
  PDF_PROFILES,
  RASTER_BACKGROUNDS,
  RASTER_FORMATS,
  Remap,
  SSL_VERSIONS,
} from "../PrinceOptions";
import { ConfigurationError } from "../errors";

export function createDefaultOptions(exePath: string): ConversionOptions {
  return cloneOptions({ ...DEFAULT_OPTIONS, exePath });
}

/** 配列と暗号化情報まで複製し、元オブジェクトと状態を共有しないコピーを返す。 */
export function cloneOptions(options: ConversionOptions): ConversionOptions {
  return {
    ...options,
    remaps: options.remaps.map((remap) => ({ ...remap })),
    authMethods: [...options.authMethods],
    cookies: [...options.cookies],
    scripts: [...options.scripts],
    styleSheets: [...options.styleSheets],
    pdfEventScripts: options.pdfEventScripts.map((entry) => ({ ...entry })),
    fileAttachments: [...options.fileAttachments],
    encryptInfo: options.encryptInfo ? { ...options.encryptInfo } : null,
  };
}

// 大文字小文字を無視して列挙値に一致すればその値、しなければ undefined
function matchEnum<T extends string>(allowed: readonly T[], value: string): T | undefined {
  const lower = value.toLowerCase();
  return allowed.find((candidate) => candidate === lower);
}

function requireInteger(option: string, value: number): void {
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(option, `invalid ${option} value (must be an integer)`);
  }
}

function requirePositive(option: string, value: number): void {
  requireInteger(option, value);
  if (value < 1) {
    throw new ConfigurationError(option, `invalid ${option} value (must be > 0)`);
  }
}

// ---- ログ ----

export function setNoWarnCss(options: ConversionOptions, noWarnCss: boolean): void {
  options.noWarnCssUnknown = noWarnCss;
  options.noWarnCssUnsupported = noWarnCss;
}

// ---- 入力 ----

/** 不明な値は "auto" に戻す（エラーにはしない）。 */
export function setInputType(options: ConversionOptions, inputType: string): void {
  options.inputType = matchEnum(INPUT_TYPES, inputType) ?? "auto";
}

export function setHtml(options: ConversionOptions, html: boolean): void {
  options.inputType = html ? "html" : "xml";
}

export function addRemap(options: ConversionOptions, url: string, dir: string): void {
  options.remaps.push({ url, dir });
}

export function clearRemaps(options: ConversionOptions): void {
  options.remaps = [];
}

// ---- ネットワーク ----

export function setAuthScheme(options: ConversionOptions, authScheme: string): void {
  options.authScheme = matchEnum(AUTH_SCHEMES, authScheme) ?? "";
}

/** 無効な認証方式は無視する。 */
export function addAuthMethod(options: ConversionOptions, authMethod: string): void {
  const method = matchEnum(AUTH_METHODS, authMethod);
  if (method) options.authMethods.push(method);
}

export function clearAuthMethods(options: ConversionOptions): void {
  options.authMethods = [];
}

/** 単一の認証方式に置き換える。無効な値なら空になる。 */
export function setAuthMethod(options: ConversionOptions, authMethod: string): void {
  const method = matchEnum(AUTH_METHODS, authMethod);
  options.authMethods = method ? [method] : [];
}

export function setHttpTimeout(options: ConversionOptions, httpTimeout: number): void {
  requirePositive("httpTimeout", httpTimeout);
  options.httpTimeout = httpTimeout;
}

export function addCookie(options: ConversionOptions, cookie: string): void {
  options.cookies.push(cookie);
}

export function clearCookies(options: ConversionOptions): void {
  options.cookies = [];
}

export function setSslCertType(options: ConversionOptions, sslCertType: string): void {
  options.sslCertType = matchEnum(KEY_TYPES, sslCertType) ?? "";
}

export function setSslKeyType(options: ConversionOptions, sslKeyType: string): void {
  options.sslKeyType = matchEnum(KEY_TYPES, sslKeyType) ?? "";
}

export function setSslVersion(options: ConversionOptions, sslVersion: string): void {
  options.sslVersion = matchEnum(SSL_VERSIONS, sslVersion) ?? "";
}

// ---- JavaScript ----

export function addScript(options: ConversionOptions, jsPath: string): void {
  options.scripts.push(jsPath);
}

export function clearScripts(options: ConversionOptions): void {
  options.scripts = [];
}

export function setMaxPasses(options: ConversionOptions, maxPasses: number): void {
  requirePositive("maxPasses", maxPasses);
  options.maxPasses = maxPasses;
}

// ---- CSS ----

export function addStyleSheet(options: ConversionOptions, cssPath: string): void {
  options.styleSheets.push(cssPath);
}

export function clearStyleSheets(options: ConversionOptions): void {
  options.styleSheets = [];
}

// ---- PDF 出力 ----

/**
 * イベントごとに 1 スクリプト。既存イベントへの再登録は位置を保ったまま置き換える。
 * イベント名が不正な場合は ConfigurationError。
 */
export function addPdfEventScript(options: ConversionOptions, event: string, script: string): void {
  const matched = matchEnum(PDF_EVENTS, event);
  if (!matched) {
    throw new ConfigurationError("pdfEventScripts", `invalid event value: ${event}`);
  }

  const existing = options.pdfEventScripts.find((entry) => entry.event === matched);
  if (existing) {
    existing.script = script;
  } else {
    options.pdfEventScripts.push({ event: matched, script });
  }
}

export function clearPdfEventScripts(options: ConversionOptions): void {
  options.pdfEventScripts = [];
}

export function setPdfProfile(options: ConversionOptions, pdfProfile: string): void {
  options.pdfProfile = matchEnum(PDF_PROFILES, pdfProfile) ?? "";
}

export function setPdfOutputIntent(options: ConversionOptions, pdfOutputIntent: string, convertColors = false): void {
  options.pdfOutputIntent = pdfOutputIntent;
  options.convertColors = convertColors;
}

export function addFileAttachment(options: ConversionOptions, filePath: string): void {
  options.fileAttachments.push(filePath);
}

export function clearFileAttachments(options: ConversionOptions): void {
  options.fileAttachments = [];
}

export function setCssDpi(options: ConversionOptions, cssDpi: number): void {
  requirePositive("cssDpi", cssDpi);
  options.cssDpi = cssDpi;
}

// ---- PDF 暗号化 ----

export interface EncryptInfoInput extends Partial<Omit<EncryptInfo, "keyBits">> {
  keyBits: number;
}

function isKeyBits(value: number): value is EncryptionKeyBits {
  return ENCRYPTION_KEY_BITS.some((bits) => bits === value);
}

/**
 * 暗号化パラメータを設定し、暗号化を有効にする。
 * keyBits が 40/128 以外なら既存設定を変えずに ConfigurationError。
 */
export function setEncryptInfo(options: ConversionOptions, input: EncryptInfoInput): void {
  const { keyBits } = input;
  if (!isKeyBits(keyBits)) {
    throw new ConfigurationError("encryptInfo", `Invalid value for keyBits: ${keyBits} (must be 40 or 128)`);
  }

  options.encrypt = true;
  options.encryptInfo = {
    keyBits,
    userPassword: input.userPassword ?? "",
    ownerPassword: input.ownerPassword ?? "",
    disallowPrint: input.disallowPrint ?? false,
    disallowModify: input.disallowModify ?? false,
    disallowCopy: input.disallowCopy ?? false,
    disallowAnnotate: input.disallowAnnotate ?? false,
    allowCopyForAccessibility: input.allowCopyForAccessibility ?? false,
    allowAssembly: input.allowAssembly ?? false,
  };
}

// ---- ラスター ----

export function setRasterFormat(options: ConversionOptions, rasterFormat: string): void {
  options.rasterFormat = matchEnum(RASTER_FORMATS, rasterFormat) ?? "auto";
}

export function setRasterJpegQuality(options: ConversionOptions, quality: number): void {
  requireInteger("rasterJpegQuality", quality);
  if (quality < 0 || quality > 100) {
    throw new ConfigurationError("rasterJpegQuality", "invalid rasterJpegQuality value (must be [0, 100])");
  }
  options.rasterJpegQuality = quality;
}

export function setRasterPage(options: ConversionOptions, rasterPage: number): void {
  requirePositive("rasterPage", rasterPage);
  options.rasterPage = rasterPage;
}

export function setRasterDpi(options: ConversionOptions, rasterDpi: number): void {
  requirePositive("rasterDpi", rasterDpi);
  options.rasterDpi = rasterDpi;
}

export function setRasterThreads(options: ConversionOptions, rasterThreads: number): void {
  requireInteger("rasterThreads", rasterThreads);
  options.rasterThreads = rasterThreads;
}

export function setRasterBackground(options: ConversionOptions, rasterBackground: string): void {
  options.rasterBackground = matchEnum(RASTER_BACKGROUNDS, rasterBackground) ?? "";
}

// ---- 失敗条件 ----

export function setFailSafe(options: ConversionOptions, failSafe: boolean): void {
  for (const key of FAIL_SAFE_KEYS) {
    options[key] = failSafe;
  }
}

// ---- 検証 ----

/**
 * 直接代入された値もセッターと同じ規則で検証する。未設定値（0 / -1）はそのまま通す。
 */
export function validateOptions(options: ConversionOptions): void {
  if (options.httpTimeout !== 0) setHttpTimeout(options, options.httpTimeout);
  if (options.maxPasses !== 0) setMaxPasses(options, options.maxPasses);
  if (options.cssDpi !== 0) setCssDpi(options, options.cssDpi);
  if (options.rasterJpegQuality !== -1) setRasterJpegQuality(options, options.rasterJpegQuality);
  if (options.rasterPage !== 0) setRasterPage(options, options.rasterPage);
  if (options.rasterDpi !== 0) setRasterDpi(options, options.rasterDpi);
  if (options.rasterThreads !== -1) setRasterThreads(options, options.rasterThreads);
  if (options.encryptInfo && !isKeyBits(options.encryptInfo.keyBits)) {
    throw new ConfigurationError(
      "encryptInfo",
      `Invalid value for keyBits: ${options.encryptInfo.keyBits} (must be 40 or 128)`
    );
  }
}

// ---- 一括適用 ----

/**
 * 呼び出し側の設定レコード。列挙値は文字列で受け取り、各セッターと同じ規則で正規化する。
 */
export interface OptionRecord extends Partial<Pick<ConversionOptions, BooleanOptionKey | FreeFormStringKey>> {
  inputType?: string;
  remaps?: Remap[];
  authScheme?: string;
  authMethods?: string[];
  httpTimeout?: number;
  cookies?: string[];
  sslCertType?: string;
  sslKeyType?: string;
  sslVersion?: string;
  scripts?: string[];
  maxPasses?: number;
  styleSheets?: string[];
  pdfEventScripts?: Array<{ event: string; script: string }>;
  pdfProfile?: string;
  fileAttachments?: string[];
  cssDpi?: number;
  encryptInfo?: EncryptInfoInput;
  rasterFormat?: string;
  rasterJpegQuality?: number;
  rasterPage?: number;
  rasterDpi?: number;
  rasterThreads?: number;
  rasterBackground?: string;
}

/**
 * レコードをセッター経由で適用する。途中で ConfigurationError が出た場合は何も変更しない。
 * 配列フィールドは置き換え（clear してから順に add）になる。
 */
export function applyOptions(options: ConversionOptions, record: OptionRecord): void {
  const next = cloneOptions(options);

  for (const key of BOOLEAN_KEYS) {
    const value = record[key];
    if (value !== undefined) next[key] = value;
  }
  for (const key of FREE_FORM_STRING_KEYS) {
    const value = record[key];
    if (value !== undefined) next[key] = value;
  }

  if (record.inputType !== undefined) setInputType(next, record.inputType);
  if (record.remaps !== undefined) {
    clearRemaps(next);
    for (const remap of record.remaps) addRemap(next, remap.url, remap.dir);
  }
  if (record.authScheme !== undefined) setAuthScheme(next, record.authScheme);
  if (record.authMethods !== undefined) {
    clearAuthMethods(next);
    for (const method of record.authMethods) addAuthMethod(next, method);
  }
  if (record.httpTimeout !== undefined) setHttpTimeout(next, record.httpTimeout);
  if (record.cookies !== undefined) {
    clearCookies(next);
    for (const cookie of record.cookies) addCookie(next, cookie);
  }
  if (record.sslCertType !== undefined) setSslCertType(next, record.sslCertType);
  if (record.sslKeyType !== undefined) setSslKeyType(next, record.sslKeyType);
  if (record.sslVersion !== undefined) setSslVersion(next, record.sslVersion);
  if (record.scripts !== undefined) {
    clearScripts(next);
    for (const script of record.scripts) addScript(next, script);
  }
  if (record.maxPasses !== undefined) setMaxPasses(next, record.maxPasses);
  if (record.styleSheets !== undefined) {
    clearStyleSheets(next);
    for (const sheet of record.styleSheets) addStyleSheet(next, sheet);
  }
  if (record.pdfEventScripts !== undefined) {
    clearPdfEventScripts(next);
    for (const entry of record.pdfEventScripts) addPdfEventScript(next, entry.event, entry.script);
  }
  if (record.pdfProfile !== undefined) setPdfProfile(next, record.pdfProfile);
  if (record.fileAttachments !== undefined) {
    clearFileAttachments(next);
    for (const attachment of record.fileAttachments) addFileAttachment(next, attachment);
  }
  if (record.cssDpi !== undefined) setCssDpi(next, record.cssDpi);
  // encryptInfo は encrypt を true にするので、明示された encrypt より後に適用する
  if (record.encryptInfo !== undefined) setEncryptInfo(next, record.encryptInfo);
  if (record.rasterFormat !== undefined) setRasterFormat(next, record.rasterFormat);
  if (record.rasterJpegQuality !== undefined) setRasterJpegQuality(next, record.rasterJpegQuality);
  if (record.rasterPage !== undefined) setRasterPage(next, record.rasterPage);
  if (record.rasterDpi !== undefined) setRasterDpi(next, record.rasterDpi);
  if (record.rasterThreads !== undefined) setRasterThreads(next, record.rasterThreads);
  if (record.rasterBackground !== undefined) setRasterBackground(next, record.rasterBackground);

  Object.assign(options, next);
}
