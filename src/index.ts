// File: src/index.ts
// Purpose: パッケージの公開 API をまとめて再エクスポートする。
// Reason: 利用側が内部のディレクトリ構成に依存しないようにするため。
// Related: src/services/convertService.ts, src/services/optionsManager.ts, src/PrinceOptions.ts

export * from "./PrinceOptions";
export * from "./errors";
export * from "./services/optionsManager";
export {
  PrinceConverter,
  type CallOptions,
  type ConversionOutcome,
  type ConverterDeps,
  type ConverterSettings,
} from "./services/convertService";
export {
  buildPrinceCommand,
  formatCommandLine,
  redactInvocation,
  type CommandInvocation,
  type LogMode,
} from "./services/princeCommandBuilder";
export {
  StructuredLogParser,
  parseStructuredLog,
  type EngineDataRecord,
  type EngineMessage,
  type LogParseResult,
  type MessageSeverity,
} from "./services/structuredLogParser";
export { escapeArg } from "./utils/argEscaper";
export {
  launchProcess,
  type LaunchFn,
  type LaunchOptions,
  type ProcessExit,
  type ProcessHandle,
} from "./utils/processRunner";
export { pumpProcess, type OutputSink, type PumpInput, type PumpOptions } from "./utils/streamPump";
export { createLogger, LOG_LEVEL_ENV, type LogLevel, type Logger } from "./utils/logger";
