// File: src/services/convertService.ts
// Purpose: HTML/XML→PDF・ラスター変換の各操作を提供するサービス。
// Reason: コマンド生成・プロセス起動・ログ解析を 1 回の変換呼び出しとして束ねるため。
// Related: src/services/princeCommandBuilder.ts, src/utils/processRunner.ts, src/utils/streamPump.ts, src/services/structuredLogParser.ts

import type { Writable } from "stream";
import { ConversionOptions } from "../PrinceOptions";
import { ConfigurationError } from "../errors";
import { applyOptions, cloneOptions, createDefaultOptions, OptionRecord, validateOptions } from "./optionsManager";
import {
  buildPrinceCommand,
  formatCommandLine,
  inputListArg,
  LogMode,
  outputArg,
  rasterOutputArg,
  redactInvocation,
  STDIO_ARG,
} from "./princeCommandBuilder";
import { EngineDataRecord, EngineMessage, StructuredLogParser } from "./structuredLogParser";
import { launchProcess, LaunchFn, ProcessExit, ProcessHandle } from "../utils/processRunner";
import { OutputSink, pumpProcess, PumpInput } from "../utils/streamPump";
import { createLogger, Logger, LogLevel } from "../utils/logger";

export interface ConversionOutcome {
  success: boolean;
  messages: EngineMessage[];
  data: EngineDataRecord[];
}

export interface ConverterSettings {
  /** 子プロセスの作業ディレクトリ */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logLevel?: LogLevel;
}

export interface ConverterDeps {
  launch: LaunchFn;
  logger: Logger;
}

export interface CallOptions {
  /** abort で子プロセスを kill し、呼び出しは abort 理由で reject する */
  signal?: AbortSignal;
}

interface RunRequest {
  logMode: LogMode;
  positionalArgs: string[];
  input: PumpInput;
  output: OutputSink;
  callOptions: CallOptions;
}

const NO_INPUT: PumpInput = { kind: "none" };
const DISCARD: OutputSink = { kind: "discard" };

function stringInput(inputString: string): PumpInput {
  return { kind: "bytes", data: inputString };
}

function streamOutput(stream: Writable): OutputSink {
  return { kind: "stream", stream };
}

/**
 * Prince を 1 変換ごとに 1 プロセス起動して使うクライアント。
 * options は configure / update でのみ変更でき、各変換の開始時に一度だけ読まれる。
 */
export class PrinceConverter {
  private readonly options: ConversionOptions;
  private readonly settings: ConverterSettings;
  private readonly deps: ConverterDeps;

  constructor(exePath: string, settings: ConverterSettings = {}, deps: Partial<ConverterDeps> = {}) {
    this.options = createDefaultOptions(exePath);
    this.settings = settings;
    this.deps = {
      launch: deps.launch ?? launchProcess,
      logger: deps.logger ?? createLogger("converter", settings.logLevel),
    };
  }

  /** レコードをまとめて適用する。ConfigurationError の場合は何も変わらない。 */
  configure(record: OptionRecord): this {
    applyOptions(this.options, record);
    return this;
  }

  /** コピーに対して fn を実行し、例外が出ず検証も通れば結果を反映する。 */
  update(fn: (options: ConversionOptions) => void): this {
    const next = cloneOptions(this.options);
    fn(next);
    validateOptions(next);
    Object.assign(this.options, next);
    return this;
  }

  /** 現在のオプションの独立したコピー */
  getOptions(): ConversionOptions {
    return cloneOptions(this.options);
  }

  // ---- PDF 変換 ----

  /** 出力名は入力名の拡張子を .pdf にしたもの（Prince 側の命名規則）。 */
  convertFile(inputPath: string, callOptions: CallOptions = {}): Promise<ConversionOutcome> {
    return this.toFile([inputPath], callOptions);
  }

  convertFileToFile(inputPath: string, pdfPath: string, callOptions: CallOptions = {}): Promise<ConversionOutcome> {
    return this.toFile([inputPath, outputArg(pdfPath)], callOptions);
  }

  convertMultipleFiles(
    inputPaths: readonly string[],
    pdfPath: string,
    callOptions: CallOptions = {}
  ): Promise<ConversionOutcome> {
    return this.toFile([...inputPaths, outputArg(pdfPath)], callOptions);
  }

  convertFileToStream(inputPath: string, sink: Writable, callOptions: CallOptions = {}): Promise<ConversionOutcome> {
    return this.convertMultipleFilesToStream([inputPath], sink, callOptions);
  }

  convertMultipleFilesToStream(
    inputPaths: readonly string[],
    sink: Writable,
    callOptions: CallOptions = {}
  ): Promise<ConversionOutcome> {
    return this.toStream([...inputPaths, outputArg(STDIO_ARG)], NO_INPUT, sink, callOptions);
  }

  convertStringToFile(inputString: string, pdfPath: string, callOptions: CallOptions = {}): Promise<ConversionOutcome> {
    return this.run({
      logMode: "normal",
      positionalArgs: [outputArg(pdfPath), STDIO_ARG],
      input: stringInput(inputString),
      output: DISCARD,
      callOptions,
    });
  }

  convertStringToStream(inputString: string, sink: Writable, callOptions: CallOptions = {}): Promise<ConversionOutcome> {
    return this.toStream([STDIO_ARG], stringInput(inputString), sink, callOptions);
  }

  /** 1 行 1 パスの入力リストファイル。展開は Prince 側が行う。 */
  convertInputList(listPath: string, pdfPath: string, callOptions: CallOptions = {}): Promise<ConversionOutcome> {
    return this.toFile([inputListArg(listPath), outputArg(pdfPath)], callOptions);
  }

  convertInputListToStream(listPath: string, sink: Writable, callOptions: CallOptions = {}): Promise<ConversionOutcome> {
    return this.toStream([inputListArg(listPath), outputArg(STDIO_ARG)], NO_INPUT, sink, callOptions);
  }

  // ---- ラスター変換 ----

  /**
   * @param rasterPath 出力名のテンプレート（例: "page_%02d.png" → page_01.png, page_02.png, ...）
   */
  rasterizeFile(inputPath: string, rasterPath: string, callOptions: CallOptions = {}): Promise<ConversionOutcome> {
    return this.rasterizeMultipleFiles([inputPath], rasterPath, callOptions);
  }

  rasterizeMultipleFiles(
    inputPaths: readonly string[],
    rasterPath: string,
    callOptions: CallOptions = {}
  ): Promise<ConversionOutcome> {
    return this.toFile([...inputPaths, rasterOutputArg(rasterPath)], callOptions);
  }

  rasterizeFileToStream(inputPath: string, sink: Writable, callOptions: CallOptions = {}): Promise<ConversionOutcome> {
    return this.rasterizeMultipleFilesToStream([inputPath], sink, callOptions);
  }

  async rasterizeMultipleFilesToStream(
    inputPaths: readonly string[],
    sink: Writable,
    callOptions: CallOptions = {}
  ): Promise<ConversionOutcome> {
    this.assertRasterStreamable();
    return this.toStream([...inputPaths, rasterOutputArg(STDIO_ARG)], NO_INPUT, sink, callOptions);
  }

  async rasterizeStringToStream(
    inputString: string,
    sink: Writable,
    callOptions: CallOptions = {}
  ): Promise<ConversionOutcome> {
    this.assertRasterStreamable();
    return this.toStream([rasterOutputArg(STDIO_ARG), STDIO_ARG], stringInput(inputString), sink, callOptions);
  }

  rasterizeStringToFile(
    inputString: string,
    rasterPath: string,
    callOptions: CallOptions = {}
  ): Promise<ConversionOutcome> {
    return this.run({
      logMode: "normal",
      positionalArgs: [rasterOutputArg(rasterPath), STDIO_ARG],
      input: stringInput(inputString),
      output: DISCARD,
      callOptions,
    });
  }

  rasterizeInputList(listPath: string, rasterPath: string, callOptions: CallOptions = {}): Promise<ConversionOutcome> {
    return this.toFile([inputListArg(listPath), rasterOutputArg(rasterPath)], callOptions);
  }

  async rasterizeInputListToStream(
    listPath: string,
    sink: Writable,
    callOptions: CallOptions = {}
  ): Promise<ConversionOutcome> {
    this.assertRasterStreamable();
    return this.toStream([inputListArg(listPath), rasterOutputArg(STDIO_ARG)], NO_INPUT, sink, callOptions);
  }

  // ---- 内部処理 ----

  // stdout に流せるのは 1 ページ・形式指定ありの場合のみ
  private assertRasterStreamable(): void {
    if (this.options.rasterPage < 1) {
      throw new ConfigurationError("rasterPage", "rasterPage has to be set to a value of > 0");
    }
    if (this.options.rasterFormat === "auto") {
      throw new ConfigurationError("rasterFormat", 'rasterFormat has to be set to "jpeg" or "png"');
    }
  }

  private toFile(positionalArgs: string[], callOptions: CallOptions): Promise<ConversionOutcome> {
    return this.run({ logMode: "normal", positionalArgs, input: NO_INPUT, output: DISCARD, callOptions });
  }

  private toStream(
    positionalArgs: string[],
    input: PumpInput,
    sink: Writable,
    callOptions: CallOptions
  ): Promise<ConversionOutcome> {
    return this.run({ logMode: "buffered", positionalArgs, input, output: streamOutput(sink), callOptions });
  }

  private async run(request: RunRequest): Promise<ConversionOutcome> {
    const startedAt = Date.now();
    const logger = this.deps.logger;
    const invocation = buildPrinceCommand(this.options, request.logMode, request.positionalArgs);
    logger.debug({ commandLine: formatCommandLine(redactInvocation(invocation)) }, "launching prince");

    const signal = request.callOptions.signal;
    const parser = new StructuredLogParser();
    let handle: ProcessHandle;
    let exit: ProcessExit;
    try {
      handle = await this.deps.launch(invocation, { cwd: this.settings.cwd, env: this.settings.env, signal });
      logger.debug({ pid: handle.pid }, "prince started");

      exit = await pumpProcess(handle, {
        input: request.input,
        output: request.output,
        logger,
        onDiagnosticLine: (line) => {
          if (parser.done) {
            logger.debug({ line }, "ignoring diagnostic output after fin");
            return;
          }
          parser.push(line);
        },
      });
    } catch (error) {
      // spawn の AbortError ではなく呼び出し側が渡した理由で reject する
      if (signal?.aborted) throw signal.reason;
      throw error;
    }

    const result = parser.finish();
    if (!result.status) {
      logger.warn({ exitCode: exit.code, signal: exit.signal }, "prince exited without reporting a result");
    }
    logger.debug(
      { pid: handle.pid, exitCode: exit.code, status: result.status, elapsedMs: Date.now() - startedAt },
      "prince finished"
    );

    return { success: result.success, messages: result.messages, data: result.data };
  }
}
