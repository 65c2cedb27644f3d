// File: src/utils/streamPump.ts
// Purpose: 子プロセスの stdin 書き込み・stdout 排出・stderr 行読み取りを並行に進める。
// Reason: いずれかのパイプのバッファが詰まると他方の読み取りが止まり、デッドロックするため。
// Related: src/utils/processRunner.ts, src/services/structuredLogParser.ts, src/services/convertService.ts

import * as fs from "fs";
import { once } from "events";
import { createInterface } from "readline";
import { Readable, Writable } from "stream";
import { pipeline } from "stream/promises";
import type { ProcessExit, ProcessHandle } from "./processRunner";
import { readErrorCode } from "../errors";
import type { Logger } from "./logger";

export type PumpInput =
  | { kind: "none" }
  | { kind: "bytes"; data: string | Uint8Array }
  | { kind: "file"; path: string };

export type OutputSink =
  | { kind: "discard" }
  | { kind: "stream"; stream: Writable }
  | { kind: "file"; path: string };

export interface PumpOptions {
  input: PumpInput;
  output: OutputSink;
  onDiagnosticLine: (line: string) => void;
  logger?: Logger;
}

// 子プロセスが stdin を読まずに終了した場合
function isBrokenPipe(error: unknown): boolean {
  const code = readErrorCode(error);
  return code === "EPIPE" || code === "ERR_STREAM_DESTROYED" || code === "ERR_STREAM_PREMATURE_CLOSE";
}

function openInput(input: PumpInput): Readable {
  switch (input.kind) {
    case "none":
      return Readable.from([]);
    case "bytes":
      return Readable.from([typeof input.data === "string" ? Buffer.from(input.data, "utf8") : input.data]);
    case "file":
      return fs.createReadStream(input.path);
  }
}

/** 入力を全て書き込んで stdin を閉じる。入力なしなら即座に閉じる。 */
export async function feedInput(stdin: Writable, input: PumpInput, logger?: Logger): Promise<void> {
  try {
    await pipeline(openInput(input), stdin);
  } catch (error) {
    if (!isBrokenPipe(error)) throw error;
    logger?.debug({ err: error }, "child closed stdin before input was fully written");
  }
}

/**
 * stdout を到着順に出力先へ流す。呼び出し側のストリームは閉じない。
 */
export async function drainOutput(stdout: Readable, output: OutputSink): Promise<void> {
  switch (output.kind) {
    case "discard":
      stdout.resume();
      await once(stdout, "end");
      return;
    case "stream":
      // 出力先のエラーはいつ起きても reject に伝わる
      await pipeline(stdout, output.stream, { end: false });
      return;
    case "file":
      await pipeline(stdout, fs.createWriteStream(output.path));
      return;
  }
}

/** stderr を行ごとに読み、コールバックに渡す。EOF まで読み切る。 */
export async function drainDiagnostics(stderr: Readable, onLine: (line: string) => void): Promise<void> {
  const lines = createInterface({ input: stderr, crlfDelay: Infinity });
  for await (const line of lines) {
    onLine(line);
  }
}

/**
 * 3 本のストリームを並行に処理し、全て閉じた後でプロセス終了を待つ。
 * 途中でストリームエラーが起きたら子プロセスを kill して reject する。
 */
export async function pumpProcess(handle: ProcessHandle, options: PumpOptions): Promise<ProcessExit> {
  try {
    await Promise.all([
      feedInput(handle.stdin, options.input, options.logger),
      drainOutput(handle.stdout, options.output),
      drainDiagnostics(handle.stderr, options.onDiagnosticLine),
    ]);
  } catch (error) {
    handle.kill();
    throw error;
  }

  const exit = await handle.exited;
  if (exit.error) throw exit.error;
  return exit;
}
