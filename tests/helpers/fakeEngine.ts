// File: tests/helpers/fakeEngine.ts
// Purpose: テスト用に Prince の子プロセスを模倣する ProcessHandle を提供する。
// Reason: 実バイナリを起動せずに起動・ストリーム処理・ログ解析の流れを検証するため。
// Related: src/services/convertService.test.ts, src/utils/streamPump.test.ts, src/utils/processRunner.ts

import { PassThrough, Writable } from "stream";
import type { CommandInvocation } from "../../src/services/princeCommandBuilder";
import type { LaunchOptions, ProcessExit, ProcessHandle } from "../../src/utils/processRunner";

export interface FakeEngineScript {
  /** stdout に書くデータ（PDF 本体の代わり） */
  stdout?: string | Buffer;
  /** stderr に書く行。改行は自動で付与する */
  stderr?: string[];
  exitCode?: number;
}

export interface FakeProcess {
  handle: ProcessHandle;
  /** 子プロセス側が受け取った stdin の内容 */
  stdinText: Promise<string>;
  killed: string[];
}

// 書き込み側が pipeline のエラーで破棄された場合も、それまでの内容で解決する
function collect(stream: PassThrough): Promise<string> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    const done = () => resolve(Buffer.concat(chunks).toString("utf8"));
    stream.on("data", (chunk: Buffer) => chunks.push(chunk));
    stream.once("end", done);
    stream.once("close", done);
    stream.once("error", done);
  });
}

/** スクリプトどおりに出力して終了する偽プロセスを作る。 */
export function createFakeProcess(script: FakeEngineScript = {}): FakeProcess {
  const stdin = new PassThrough();
  const stdout = new PassThrough();
  const stderr = new PassThrough();
  const killed: string[] = [];

  const stdinText = collect(stdin);

  const exited = new Promise<ProcessExit>((resolve) => {
    setImmediate(() => {
      stdout.end(script.stdout ?? "");
      stderr.end((script.stderr ?? []).map((line) => `${line}\n`).join(""));
      resolve({ code: script.exitCode ?? 0, signal: null });
    });
  });

  const handle: ProcessHandle = {
    pid: 4242,
    stdin,
    stdout,
    stderr,
    exited,
    kill: (signal) => {
      killed.push(signal ?? "SIGTERM");
      return true;
    },
  };

  return { handle, stdinText, killed };
}

export interface FakeLauncher {
  launch: (invocation: CommandInvocation, options?: LaunchOptions) => Promise<ProcessHandle>;
  invocations: CommandInvocation[];
  launchOptions: Array<LaunchOptions | undefined>;
  processes: FakeProcess[];
}

/** 呼ばれるたびに同じスクリプトの偽プロセスを返す launch 関数。 */
export function createFakeLauncher(script: FakeEngineScript = {}): FakeLauncher {
  const fake: FakeLauncher = {
    invocations: [],
    launchOptions: [],
    processes: [],
    launch: async (invocation, options) => {
      fake.invocations.push(invocation);
      fake.launchOptions.push(options);
      const proc = createFakeProcess(script);
      fake.processes.push(proc);
      return proc.handle;
    },
  };
  return fake;
}

/** 書き込まれたバイト列を溜める Writable（呼び出し側のストリームの代わり） */
export class MemorySink extends Writable {
  readonly chunks: Buffer[] = [];

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk);
    callback();
  }

  text(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}
