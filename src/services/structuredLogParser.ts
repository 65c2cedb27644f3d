// File: src/services/structuredLogParser.ts
// Purpose: Prince の structured log（stderr の行プロトコル）を解析し、成否とメッセージを集める。
// Reason: 行単位の状態機械として切り出し、プロセス実行と独立にテストできるようにするため。
// Related: src/utils/streamPump.ts, src/services/convertService.ts, src/services/structuredLogParser.test.ts

export type MessageSeverity = "err" | "wrn" | "inf" | "dbg";

export interface EngineMessage {
  severity: MessageSeverity;
  /** ファイル名・行番号など。非構造化メッセージでは空文字 */
  location: string;
  text: string;
}

export interface EngineDataRecord {
  name: string;
  value: string;
}

export interface LogParseResult {
  /** fin| 行の内容。fin| が来ないまま EOF になった場合は空文字 */
  status: string;
  success: boolean;
  messages: EngineMessage[];
  data: EngineDataRecord[];
}

const STRUCTURED_SEVERITIES: readonly MessageSeverity[] = ["err", "wrn", "inf"];

// structured log の初期化に失敗した時などに Prince が直接書く行
const PLAIN_WARNING_PREFIX = "prince: warning: ";
const PLAIN_ERROR_PREFIX = "prince: error: ";

/**
 * 区切り文字で最大 limit 個に分割する。最後の要素には残りの区切り文字がそのまま残る。
 */
export function splitLimited(text: string, separator: string, limit: number): string[] {
  const parts: string[] = [];
  let rest = text;
  while (parts.length < limit - 1) {
    const index = rest.indexOf(separator);
    if (index < 0) break;
    parts.push(rest.slice(0, index));
    rest = rest.slice(index + separator.length);
  }
  parts.push(rest);
  return parts;
}

function isStructuredSeverity(tag: string): tag is MessageSeverity {
  return STRUCTURED_SEVERITIES.some((severity) => severity === tag);
}

/** タグ付きでない行を warning / error / debug に振り分ける。 */
export function parsePlainMessage(line: string): EngineMessage {
  if (line.startsWith(PLAIN_WARNING_PREFIX)) {
    return { severity: "wrn", location: "", text: line.slice(PLAIN_WARNING_PREFIX.length) };
  }
  if (line.startsWith(PLAIN_ERROR_PREFIX)) {
    return { severity: "err", location: "", text: line.slice(PLAIN_ERROR_PREFIX.length) };
  }
  return { severity: "dbg", location: "", text: line };
}

/**
 * 状態は ACCUMULATING と DONE の 2 つ。fin| 行か EOF（finish）で DONE になり、以降の行は無視する。
 */
export class StructuredLogParser {
  private readonly messages: EngineMessage[] = [];
  private readonly data: EngineDataRecord[] = [];
  private status: string | null = null;

  get done(): boolean {
    return this.status !== null;
  }

  /**
   * 1 行を処理する。改行は付いていてもいなくてもよい。
   * @returns まだ行を受け付ける状態なら true
   */
  push(rawLine: string): boolean {
    if (this.done) return false;

    const line = rawLine.replace(/\r?\n$/, "");
    const tag = line.slice(0, 4);
    const body = line.slice(4);

    switch (tag) {
      case "fin|":
        this.status = body.trimEnd();
        return false;
      case "msg|":
        this.messages.push(this.parseTaggedMessage(line, body));
        return true;
      case "dat|": {
        const [name, value = ""] = splitLimited(body.trimEnd(), "|", 2);
        this.data.push({ name, value });
        return true;
      }
      default:
        this.messages.push(parsePlainMessage(line));
        return true;
    }
  }

  /** EOF。fin| が無ければ status は空文字で失敗扱い。 */
  finish(): LogParseResult {
    if (this.status === null) this.status = "";
    return {
      status: this.status,
      success: this.status === "success",
      messages: [...this.messages],
      data: [...this.data],
    };
  }

  private parseTaggedMessage(line: string, body: string): EngineMessage {
    // 本文中の | は保持する
    const [severity, location = "", text = ""] = splitLimited(body.trimEnd(), "|", 3);
    if (!isStructuredSeverity(severity)) {
      return parsePlainMessage(line);
    }
    return { severity, location, text };
  }
}

/** ログ全体が文字列で手元にある場合のヘルパー。 */
export function parseStructuredLog(log: string): LogParseResult {
  const parser = new StructuredLogParser();
  const lines = log.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  for (const line of lines) {
    if (!parser.push(line)) break;
  }
  return parser.finish();
}
