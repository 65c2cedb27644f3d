// File: src/services/structuredLogParser.test.ts
// Purpose: structured log の行解析と状態遷移をユニットテストで検証する。
// Reason: 成否判定とメッセージ抽出の退行を防ぐため。
// Related: src/services/structuredLogParser.ts

import { describe, expect, it } from "vitest";
import {
  parsePlainMessage,
  parseStructuredLog,
  splitLimited,
  StructuredLogParser,
} from "./structuredLogParser";

describe("splitLimited", () => {
  it("上限に達したら残りは最後の要素にまとめる", () => {
    expect(splitLimited("err|a.html|x|y", "|", 3)).toEqual(["err", "a.html", "x|y"]);
  });

  it("区切りが足りなければ要素数は減る", () => {
    expect(splitLimited("total-page-count", "|", 2)).toEqual(["total-page-count"]);
  });
});

describe("parsePlainMessage", () => {
  it("prince: 接頭辞の付いた行を warning / error にする", () => {
    expect(parsePlainMessage("prince: warning: font not found")).toEqual({
      severity: "wrn",
      location: "",
      text: "font not found",
    });
    expect(parsePlainMessage("prince: error: cannot open file")).toEqual({
      severity: "err",
      location: "",
      text: "cannot open file",
    });
  });

  it("それ以外は dbg として行全体を残す", () => {
    expect(parsePlainMessage("loading fonts")).toEqual({ severity: "dbg", location: "", text: "loading fonts" });
  });
});

describe("parseStructuredLog", () => {
  it("本文中の | を保持したままメッセージを取り出す", () => {
    const result = parseStructuredLog("msg|err|file.html|Some error|with|pipes\nfin|success\n");

    expect(result.success).toBe(true);
    expect(result.status).toBe("success");
    expect(result.messages).toEqual([{ severity: "err", location: "file.html", text: "Some error|with|pipes" }]);
  });

  it("fin| が無いまま終わったら失敗", () => {
    const result = parseStructuredLog("msg|inf||loading\n");

    expect(result.success).toBe(false);
    expect(result.status).toBe("");
    expect(result.messages).toEqual([{ severity: "inf", location: "", text: "loading" }]);
  });

  it("success 以外の fin は失敗", () => {
    expect(parseStructuredLog("fin|failure\n").success).toBe(false);
  });

  it("CRLF と末尾の空白を取り除く", () => {
    const result = parseStructuredLog("msg|wrn|a.css:3|unknown property\r\nfin|success\r\n");

    expect(result.success).toBe(true);
    expect(result.messages).toEqual([{ severity: "wrn", location: "a.css:3", text: "unknown property" }]);
  });

  it("dat| は名前と値に分け、値の | は保持する", () => {
    const result = parseStructuredLog("dat|total-page-count|12\ndat|title|A|B\ndat|empty\nfin|success\n");

    expect(result.data).toEqual([
      { name: "total-page-count", value: "12" },
      { name: "title", value: "A|B" },
      { name: "empty", value: "" },
    ]);
  });

  it("fin| 以降の行は無視する", () => {
    const result = parseStructuredLog("fin|success\nmsg|err||late\ntrailing noise\n");

    expect(result.success).toBe(true);
    expect(result.messages).toEqual([]);
  });

  it("不明な重要度の msg| は行全体を dbg として残す", () => {
    const result = parseStructuredLog("msg|xyz|a|b\nfin|success\n");
    expect(result.messages).toEqual([{ severity: "dbg", location: "", text: "msg|xyz|a|b" }]);
  });

  it("タグの無い行は接頭辞に応じて振り分ける", () => {
    const result = parseStructuredLog("prince: error: license invalid\nstarting\n");

    expect(result.success).toBe(false);
    expect(result.messages).toEqual([
      { severity: "err", location: "", text: "license invalid" },
      { severity: "dbg", location: "", text: "starting" },
    ]);
  });
});

describe("StructuredLogParser", () => {
  it("fin| を受けると done になり push は false を返す", () => {
    const parser = new StructuredLogParser();

    expect(parser.push("msg|inf||a\n")).toBe(true);
    expect(parser.done).toBe(false);
    expect(parser.push("fin|success\n")).toBe(false);
    expect(parser.done).toBe(true);
    expect(parser.push("msg|err||b")).toBe(false);

    const result = parser.finish();
    expect(result.messages).toHaveLength(1);
    expect(result.success).toBe(true);
  });

  it("finish は返した配列を内部状態と共有しない", () => {
    const parser = new StructuredLogParser();
    parser.push("msg|inf||a");
    const first = parser.finish();
    first.messages.push({ severity: "err", location: "", text: "x" });

    expect(parser.finish().messages).toHaveLength(1);
  });
});
