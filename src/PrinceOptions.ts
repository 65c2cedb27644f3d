// File: src/PrinceOptions.ts
// Purpose: Prince 実行オプションの型定義・列挙値・デフォルト値を管理する。
// Reason: オプションを型安全なプレーンオブジェクトとして扱い、コマンド生成とセッターから共有するため。
// Related: src/services/optionsManager.ts, src/services/princeCommandBuilder.ts, src/services/convertService.ts

export const INPUT_TYPES = ["auto", "html", "xml"] as const;
export type InputType = (typeof INPUT_TYPES)[number];

export const AUTH_SCHEMES = ["http", "https"] as const;
export type AuthScheme = (typeof AUTH_SCHEMES)[number];

export const AUTH_METHODS = ["basic", "digest", "ntlm", "negotiate"] as const;
export type AuthMethod = (typeof AUTH_METHODS)[number];

export const KEY_TYPES = ["pem", "der"] as const;
export type KeyType = (typeof KEY_TYPES)[number];

export const SSL_VERSIONS = ["default", "tlsv1", "tlsv1.0", "tlsv1.1", "tlsv1.2", "tlsv1.3"] as const;
export type SslVersion = (typeof SSL_VERSIONS)[number];

export const PDF_EVENTS = ["will-close", "will-save", "did-save", "will-print", "did-print"] as const;
export type PdfEvent = (typeof PDF_EVENTS)[number];

export const PDF_PROFILES = [
  "pdf/a-1a",
  "pdf/a-1a+pdf/ua-1",
  "pdf/a-1b",
  "pdf/a-2a",
  "pdf/a-2a+pdf/ua-1",
  "pdf/a-2b",
  "pdf/a-3a",
  "pdf/a-3a+pdf/ua-1",
  "pdf/a-3b",
  "pdf/ua-1",
  "pdf/x-1a:2001",
  "pdf/x-1a:2003",
  "pdf/x-3:2002",
  "pdf/x-3:2003",
  "pdf/x-4",
] as const;
export type PdfProfile = (typeof PDF_PROFILES)[number];

export const RASTER_FORMATS = ["auto", "png", "jpeg"] as const;
export type RasterFormat = (typeof RASTER_FORMATS)[number];

export const RASTER_BACKGROUNDS = ["white", "transparent"] as const;
export type RasterBackground = (typeof RASTER_BACKGROUNDS)[number];

export const ENCRYPTION_KEY_BITS = [40, 128] as const;
export type EncryptionKeyBits = (typeof ENCRYPTION_KEY_BITS)[number];

/** URL プレフィックスをローカルディレクトリへ差し替える規則 (`--remap`) */
export interface Remap {
  url: string;
  dir: string;
}

export interface PdfEventScript {
  event: PdfEvent;
  script: string;
}

export interface EncryptInfo {
  keyBits: EncryptionKeyBits;
  userPassword: string;
  ownerPassword: string;
  disallowPrint: boolean;
  disallowModify: boolean;
  disallowCopy: boolean;
  disallowAnnotate: boolean;
  allowCopyForAccessibility: boolean;
  allowAssembly: boolean;
}

/**
 * Prince の 1 回の実行に渡すオプション一式。
 * 空文字・0・-1 などの「未設定値」はコマンドラインに出力されない。
 * 配列フィールドは追加順を保持し、重複も除去しない（エンジンが位置順に解釈するため）。
 */
export interface ConversionOptions {
  exePath: string;

  // ログ
  verbose: boolean;
  debug: boolean;
  logFile: string;
  noWarnCssUnknown: boolean;
  noWarnCssUnsupported: boolean;

  // 入力
  inputType: InputType;
  baseUrl: string;
  remaps: Remap[];
  fileRoot: string;
  xInclude: boolean;
  xmlExternalEntities: boolean;
  iframes: boolean;
  noLocalFiles: boolean;

  // ネットワーク
  noNetwork: boolean;
  noRedirects: boolean;
  authUser: string;
  authPassword: string;
  authServer: string;
  authScheme: AuthScheme | "";
  authMethods: AuthMethod[];
  noAuthPreemptive: boolean;
  httpProxy: string;
  httpTimeout: number; // 0 = 未設定
  cookie: string; // 非推奨。cookies を使う
  cookies: string[];
  cookieJar: string;
  sslCaCert: string;
  sslCaPath: string;
  sslCert: string;
  sslCertType: KeyType | "";
  sslKey: string;
  sslKeyType: KeyType | "";
  sslKeyPassword: string;
  sslVersion: SslVersion | "";
  insecure: boolean;
  noParallelDownloads: boolean;

  // JavaScript
  javascript: boolean;
  scripts: string[];
  maxPasses: number; // 0 = 未設定

  // CSS
  styleSheets: string[];
  media: string;
  pageSize: string;
  pageMargin: string;
  noAuthorStyle: boolean;
  noDefaultStyle: boolean;

  // PDF 出力
  pdfId: string;
  pdfScript: string;
  pdfEventScripts: PdfEventScript[];
  pdfLang: string;
  pdfProfile: PdfProfile | "";
  pdfOutputIntent: string;
  convertColors: boolean; // pdfOutputIntent が空なら無視される
  fileAttachments: string[];
  noArtificialFonts: boolean;
  embedFonts: boolean;
  subsetFonts: boolean;
  systemFonts: boolean;
  forceIdentityEncoding: boolean;
  compress: boolean;
  noObjectStreams: boolean;
  fallbackCmykProfile: string;
  taggedPdf: boolean;
  pdfForms: boolean;
  cssDpi: number; // 0 = 未設定

  // PDF メタデータ
  pdfTitle: string;
  pdfSubject: string;
  pdfAuthor: string;
  pdfKeywords: string;
  pdfCreator: string;
  pdfXmp: string;

  // PDF 暗号化
  encrypt: boolean;
  encryptInfo: EncryptInfo | null;

  // ラスター出力
  rasterFormat: RasterFormat;
  rasterJpegQuality: number; // -1 = 未設定
  rasterPage: number; // 0 = 未設定
  rasterDpi: number; // 0 = 未設定
  rasterThreads: number; // -1 = 未設定
  rasterBackground: RasterBackground | "";

  // ライセンス
  licenseFile: string;
  licenseKey: string;

  // 失敗条件
  failDroppedContent: boolean;
  failMissingResources: boolean;
  failStrippedTransparency: boolean;
  failMissingGlyphs: boolean;
  failPdfProfileError: boolean;
  failPdfTagError: boolean;
  failInvalidLicense: boolean;

  // 追加の生オプション（1 トークンとして渡す）
  extraOptions: string;
}

type KeysOfType<T, V> = { [K in keyof T]-?: T[K] extends V ? (V extends T[K] ? K : never) : never }[keyof T];

export type BooleanOptionKey = KeysOfType<ConversionOptions, boolean>;

/** 値をそのまま受け付ける自由形式の文字列オプション */
export const FREE_FORM_STRING_KEYS = [
  "logFile",
  "baseUrl",
  "fileRoot",
  "authUser",
  "authPassword",
  "authServer",
  "httpProxy",
  "cookie",
  "cookieJar",
  "sslCaCert",
  "sslCaPath",
  "sslCert",
  "sslKey",
  "sslKeyPassword",
  "media",
  "pageSize",
  "pageMargin",
  "pdfId",
  "pdfScript",
  "pdfLang",
  "pdfOutputIntent",
  "fallbackCmykProfile",
  "pdfTitle",
  "pdfSubject",
  "pdfAuthor",
  "pdfKeywords",
  "pdfCreator",
  "pdfXmp",
  "licenseFile",
  "licenseKey",
  "extraOptions",
] as const satisfies readonly KeysOfType<ConversionOptions, string>[];

export type FreeFormStringKey = (typeof FREE_FORM_STRING_KEYS)[number];

export const BOOLEAN_KEYS = [
  "verbose",
  "debug",
  "noWarnCssUnknown",
  "noWarnCssUnsupported",
  "xInclude",
  "xmlExternalEntities",
  "iframes",
  "noLocalFiles",
  "noNetwork",
  "noRedirects",
  "noAuthPreemptive",
  "insecure",
  "noParallelDownloads",
  "javascript",
  "noAuthorStyle",
  "noDefaultStyle",
  "convertColors",
  "noArtificialFonts",
  "embedFonts",
  "subsetFonts",
  "systemFonts",
  "forceIdentityEncoding",
  "compress",
  "noObjectStreams",
  "taggedPdf",
  "pdfForms",
  "encrypt",
  "failDroppedContent",
  "failMissingResources",
  "failStrippedTransparency",
  "failMissingGlyphs",
  "failPdfProfileError",
  "failPdfTagError",
  "failInvalidLicense",
] as const satisfies readonly BooleanOptionKey[];

export const FAIL_SAFE_KEYS = [
  "failDroppedContent",
  "failMissingResources",
  "failStrippedTransparency",
  "failMissingGlyphs",
  "failPdfProfileError",
  "failPdfTagError",
  "failInvalidLicense",
] as const satisfies readonly BooleanOptionKey[];

/**
 * エンジン既定値と一致するデフォルト。exePath 以外は何もフラグを出力しない状態。
 */
export const DEFAULT_OPTIONS: Readonly<Omit<ConversionOptions, "exePath">> = Object.freeze({
  verbose: false,
  debug: false,
  logFile: "",
  noWarnCssUnknown: false,
  noWarnCssUnsupported: false,

  inputType: "auto",
  baseUrl: "",
  remaps: [],
  fileRoot: "",
  xInclude: false,
  xmlExternalEntities: false,
  iframes: false,
  noLocalFiles: false,

  noNetwork: false,
  noRedirects: false,
  authUser: "",
  authPassword: "",
  authServer: "",
  authScheme: "",
  authMethods: [],
  noAuthPreemptive: false,
  httpProxy: "",
  httpTimeout: 0,
  cookie: "",
  cookies: [],
  cookieJar: "",
  sslCaCert: "",
  sslCaPath: "",
  sslCert: "",
  sslCertType: "",
  sslKey: "",
  sslKeyType: "",
  sslKeyPassword: "",
  sslVersion: "",
  insecure: false,
  noParallelDownloads: false,

  javascript: false,
  scripts: [],
  maxPasses: 0,

  styleSheets: [],
  media: "",
  pageSize: "",
  pageMargin: "",
  noAuthorStyle: false,
  noDefaultStyle: false,

  pdfId: "",
  pdfScript: "",
  pdfEventScripts: [],
  pdfLang: "",
  pdfProfile: "",
  pdfOutputIntent: "",
  convertColors: false,
  fileAttachments: [],
  noArtificialFonts: false,
  embedFonts: true,
  subsetFonts: true,
  systemFonts: true,
  forceIdentityEncoding: false,
  compress: true,
  noObjectStreams: false,
  fallbackCmykProfile: "",
  taggedPdf: false,
  pdfForms: false,
  cssDpi: 0,

  pdfTitle: "",
  pdfSubject: "",
  pdfAuthor: "",
  pdfKeywords: "",
  pdfCreator: "",
  pdfXmp: "",

  encrypt: false,
  encryptInfo: null,

  rasterFormat: "auto",
  rasterJpegQuality: -1,
  rasterPage: 0,
  rasterDpi: 0,
  rasterThreads: -1,
  rasterBackground: "",

  licenseFile: "",
  licenseKey: "",

  failDroppedContent: false,
  failMissingResources: false,
  failStrippedTransparency: false,
  failMissingGlyphs: false,
  failPdfProfileError: false,
  failPdfTagError: false,
  failInvalidLicense: false,

  extraOptions: "",
});
