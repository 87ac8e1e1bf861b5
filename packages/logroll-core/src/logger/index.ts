/**
 * logroll Logger 模块
 *
 * 结构化 JSON 日志，支持：
 * - JSON 行输出（RFC 3339 纳秒时间戳）
 * - 按大小轮转、gzip 压缩、按数量与天数清理备份
 * - ERROR 及以上级别分流到 <name>_error<ext>
 * - 幂等、并发安全的具名 Logger 注册表
 */

export {
  Logger,
  NOOP_LOGGER,
  createFileLogger,
  createLogEvent,
  type StructuredLogger,
  type LoggerOptions,
  type FileLoggerOptions,
} from "./logger.js";
export {
  LoggerRegistry,
  type InitResult,
  type LoggerFactory,
  type LoggerOverrides,
  type LoggerRegistryOptions,
  type LoggingFileResult,
} from "./registry.js";
export { JsonLineFormatter, ENCODING_PLACEHOLDER, encodeFieldValue, type LogFormatter } from "./formatter.js";
export { RotatingFileSink, parseSizeToBytes, type BackupFile, type FileSinkOptions } from "./file-sink.js";
export { SeverityRouter, deriveErrorFilename, ERROR_FILE_SUFFIX, type SeverityRouterOptions } from "./router.js";
export {
  DEFAULT_LOG_FILENAME,
  LoggerConfigSchema,
  RotationPolicySchema,
  loadLoggingFile,
  loggerConfigFromEnv,
  resolveLoggerConfig,
  type LoggerConfigInput,
  type LoggingFile,
} from "./config.js";
export {
  LoggingError,
  ConfigurationError,
  EncodingError,
  WriteError,
  NotInitializedError,
  reportToStderr,
} from "./errors.js";
export { Once } from "./once.js";
export { systemClock, createSystemClock, formatRfc3339Nano, nanosFromDate, type Clock } from "./clock.js";
export { isLogLevel, parseLogLevel, meetsThreshold } from "./levels.js";
export type {
  LogLevel,
  LogEvent,
  LogSink,
  FieldMap,
  FieldValue,
  RotationPolicy,
  LoggerConfig,
  ErrorReporter,
} from "./types.js";
export { LOG_LEVEL_WEIGHT, NO_ROTATION } from "./types.js";
