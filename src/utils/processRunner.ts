// File: src/utils/processRunner.ts
// Purpose: 外部コマンドを 3 本のパイプ付きで起動し、標準入出力のハンドルを返す。
// Reason: spawn 依存を集約し、モックやスタブで差し替えやすくするため。
// Related: src/utils/streamPump.ts, src/services/convertService.ts, src/utils/argEscaper.ts, src/errors.ts

import { spawn, type ChildProcessWithoutNullStreams } from "child_process";
import type { Readable, Writable } from "stream";
import type { CommandInvocation } from "../services/princeCommandBuilder";
import { escapeArg } from "./argEscaper";
import { LaunchError } from "../errors";

export interface LaunchOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** abort すると子プロセスを kill する */
  signal?: AbortSignal;
  platform?: NodeJS.Platform;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** 起動後に子プロセスで発生したエラー（abort など） */
  error?: Error;
}

export interface ProcessHandle {
  pid: number | undefined;
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  /** 全ストリームが閉じてプロセスが終了したら解決する。reject はしない */
  exited: Promise<ProcessExit>;
  kill(signal?: NodeJS.Signals): boolean;
}

export type LaunchFn = (invocation: CommandInvocation, options?: LaunchOptions) => Promise<ProcessHandle>;

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * シェルを介さず argv 配列で起動する。Windows ではコマンドライン文字列が 1 本しか渡せないため、
 * 各引数をエスケープ済みにして windowsVerbatimArguments で渡す。
 * 起動自体に失敗した場合は LaunchError で reject する。
 */
export function launchProcess(invocation: CommandInvocation, options: LaunchOptions = {}): Promise<ProcessHandle> {
  const platform = options.platform ?? process.platform;
  const isWindows = platform === "win32";
  const args = isWindows
    ? invocation.args.map((arg) => escapeArg(arg, false, false, platform))
    : [...invocation.args];

  return new Promise<ProcessHandle>((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(toError(options.signal.reason));
      return;
    }

    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(invocation.command, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: "pipe",
        shell: false,
        windowsHide: true,
        windowsVerbatimArguments: isWindows,
        argv0: isWindows ? escapeArg(invocation.command, false, true, platform) : undefined,
        signal: options.signal,
      });
    } catch (error) {
      reject(new LaunchError(invocation.command, error));
      return;
    }

    let started = false;
    let lateError: Error | undefined;

    const exited = new Promise<ProcessExit>((resolveExit) => {
      child.once("close", (code, signal) => {
        resolveExit(lateError ? { code, signal, error: lateError } : { code, signal });
      });
    });

    child.on("error", (error) => {
      if (!started) {
        // 起動前の abort は LaunchError ではなく abort 理由で reject する
        reject(options.signal?.aborted ? toError(options.signal.reason) : new LaunchError(invocation.command, error));
        return;
      }
      lateError ??= toError(error);
    });

    child.once("spawn", () => {
      started = true;
      resolve({
        pid: child.pid,
        stdin: child.stdin,
        stdout: child.stdout,
        stderr: child.stderr,
        exited,
        kill: (signal) => child.kill(signal),
      });
    });
  });
}
