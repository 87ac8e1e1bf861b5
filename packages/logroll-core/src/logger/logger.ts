/**
 * logroll Logger - 核心类
 *
 * 级别过滤、JSON 行渲染、主 Sink 写入、可选的按级别分流，以及带固定字段的子 Logger。
 * 所有便捷方法（info、infof、child.info ...）都只是 record() 的薄包装。
 */

import path from "node:path";
import { format as formatMessage } from "node:util";
import { systemClock, type Clock } from "./clock.js";
import { WriteError, errorMessage, reportToStderr } from "./errors.js";
import { RotatingFileSink } from "./file-sink.js";
import { JsonLineFormatter, type LogFormatter } from "./formatter.js";
import { meetsThreshold } from "./levels.js";
import { SeverityRouter, deriveErrorFilename } from "./router.js";
import type { ErrorReporter, FieldMap, LogEvent, LogLevel, LogSink, LoggerConfig } from "./types.js";

const EMPTY_FIELDS: FieldMap = Object.freeze({});

/** record() 内 new Error().stack 中调用方所在的帧：Error / record / 便捷方法 / 调用方 */
const CALLER_FRAME = 3;

export interface StructuredLogger {
  readonly name?: string;
  readonly level: LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
  /** 返回主 Sink 是否写入成功；被级别过滤或写入失败时为 false */
  emit(level: LogLevel, message: string, fields?: FieldMap): boolean;
  debug(message: string, fields?: FieldMap): void;
  info(message: string, fields?: FieldMap): void;
  warn(message: string, fields?: FieldMap): void;
  error(message: string, fields?: FieldMap): void;
  fatal(message: string, fields?: FieldMap): void;
  debugf(template: string, ...args: unknown[]): void;
  infof(template: string, ...args: unknown[]): void;
  warnf(template: string, ...args: unknown[]): void;
  errorf(template: string, ...args: unknown[]): void;
  fatalf(template: string, ...args: unknown[]): void;
  /** 创建子 Logger，所有日志都会带上这些字段 */
  child(fields: FieldMap): StructuredLogger;
  close(): void;
}

export interface LoggerOptions {
  name?: string;
  /** 最低输出级别（默认 info） */
  level?: LogLevel;
  sink: LogSink;
  formatter?: LogFormatter;
  router?: SeverityRouter;
  reportCaller?: boolean;
  clock?: Clock;
  onError?: ErrorReporter;
}

export function createLogEvent(init: {
  timestamp: bigint;
  level: LogLevel;
  message: string;
  line?: number;
  fields?: FieldMap;
}): LogEvent {
  return Object.freeze({
    timestamp: init.timestamp,
    level: init.level,
    message: init.message,
    line: init.line ?? 0,
    fields: init.fields ? Object.freeze({ ...init.fields }) : EMPTY_FIELDS,
  });
}

function lineFromStack(stack: string | undefined, frame: number): number {
  const text = stack?.split("\n")[frame];
  if (!text) return 0;
  const m = /:(\d+):\d+\)?$/.exec(text.trim());
  return m ? Number(m[1]) : 0;
}

export class Logger implements StructuredLogger {
  readonly name?: string;
  readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly formatter: LogFormatter;
  private readonly router?: SeverityRouter;
  private readonly reportCaller: boolean;
  private readonly clock: Clock;
  private readonly onError: ErrorReporter;

  constructor(options: LoggerOptions) {
    this.name = options.name || undefined;
    this.level = options.level ?? "info";
    this.sink = options.sink;
    this.formatter = options.formatter ?? new JsonLineFormatter({ loggerName: this.name });
    this.router = options.router;
    this.reportCaller = options.reportCaller ?? true;
    this.clock = options.clock ?? systemClock;
    this.onError = options.onError ?? reportToStderr;
  }

  /** 主日志文件路径 */
  get path(): string {
    return this.sink.path;
  }

  /** 错误分流文件路径（未启用时为 undefined） */
  get errorPath(): string | undefined {
    return this.router?.path;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return meetsThreshold(level, this.level);
  }

  emit(level: LogLevel, message: string, fields?: FieldMap): boolean {
    return this.record(level, message, fields);
  }

  debug(message: string, fields?: FieldMap): void {
    this.record("debug", message, fields);
  }

  info(message: string, fields?: FieldMap): void {
    this.record("info", message, fields);
  }

  warn(message: string, fields?: FieldMap): void {
    this.record("warn", message, fields);
  }

  error(message: string, fields?: FieldMap): void {
    this.record("error", message, fields);
  }

  /** 只按 FATAL 级别记录，不会退出进程 */
  fatal(message: string, fields?: FieldMap): void {
    this.record("fatal", message, fields);
  }

  debugf(template: string, ...args: unknown[]): void {
    this.record("debug", formatMessage(template, ...args));
  }

  infof(template: string, ...args: unknown[]): void {
    this.record("info", formatMessage(template, ...args));
  }

  warnf(template: string, ...args: unknown[]): void {
    this.record("warn", formatMessage(template, ...args));
  }

  errorf(template: string, ...args: unknown[]): void {
    this.record("error", formatMessage(template, ...args));
  }

  fatalf(template: string, ...args: unknown[]): void {
    this.record("fatal", formatMessage(template, ...args));
  }

  child(fields: FieldMap): StructuredLogger {
    return new ChildLogger(this, fields);
  }

  /**
   * 唯一的写入路径。
   * 必须由公开方法直接调用（调用方行号按固定帧深度取得）。
   * @internal
   */
  record(level: LogLevel, message: string, fields: FieldMap = EMPTY_FIELDS): boolean {
    if (!this.isLevelEnabled(level)) return false;

    const line = this.reportCaller ? lineFromStack(new Error().stack, CALLER_FRAME) : 0;
    const event = createLogEvent({ timestamp: this.clock(), level, message, line, fields });

    let written = false;
    try {
      this.sink.append(this.formatter.format(event, this.onError));
      written = true;
    } catch (err) {
      this.onError(
        err instanceof WriteError
          ? err
          : new WriteError(this.sink.path, `Failed to write log: ${errorMessage(err)}`, { cause: err }),
      );
    }

    this.router?.offer(event);
    return written;
  }

  close(): void {
    this.sink.close();
    this.router?.close();
  }
}

/** 绑定了固定字段的 Logger 视图，与父 Logger 共用 Sink 和级别 */
class ChildLogger implements StructuredLogger {
  private readonly parent: Logger;
  private readonly bound: FieldMap;

  constructor(parent: Logger, bound: FieldMap) {
    this.parent = parent;
    this.bound = Object.freeze({ ...bound });
  }

  get name(): string | undefined {
    return this.parent.name;
  }

  get level(): LogLevel {
    return this.parent.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.parent.isLevelEnabled(level);
  }

  emit(level: LogLevel, message: string, fields?: FieldMap): boolean {
    return this.parent.record(level, message, this.merge(fields));
  }

  debug(message: string, fields?: FieldMap): void {
    this.parent.record("debug", message, this.merge(fields));
  }

  info(message: string, fields?: FieldMap): void {
    this.parent.record("info", message, this.merge(fields));
  }

  warn(message: string, fields?: FieldMap): void {
    this.parent.record("warn", message, this.merge(fields));
  }

  error(message: string, fields?: FieldMap): void {
    this.parent.record("error", message, this.merge(fields));
  }

  fatal(message: string, fields?: FieldMap): void {
    this.parent.record("fatal", message, this.merge(fields));
  }

  debugf(template: string, ...args: unknown[]): void {
    this.parent.record("debug", formatMessage(template, ...args), this.bound);
  }

  infof(template: string, ...args: unknown[]): void {
    this.parent.record("info", formatMessage(template, ...args), this.bound);
  }

  warnf(template: string, ...args: unknown[]): void {
    this.parent.record("warn", formatMessage(template, ...args), this.bound);
  }

  errorf(template: string, ...args: unknown[]): void {
    this.parent.record("error", formatMessage(template, ...args), this.bound);
  }

  fatalf(template: string, ...args: unknown[]): void {
    this.parent.record("fatal", formatMessage(template, ...args), this.bound);
  }

  child(fields: FieldMap): StructuredLogger {
    return new ChildLogger(this.parent, this.merge(fields));
  }

  /** 子 Logger 不拥有 Sink，关闭由父 Logger 负责 */
  close(): void {}

  private merge(fields: FieldMap | undefined): FieldMap {
    return fields ? { ...this.bound, ...fields } : this.bound;
  }
}

const noop = (): void => {};

/** 丢弃一切的 Logger，用于 lookupOrNoop */
export const NOOP_LOGGER: StructuredLogger = {
  name: undefined,
  level: "fatal",
  isLevelEnabled: () => false,
  emit: () => false,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  fatal: noop,
  debugf: noop,
  infof: noop,
  warnf: noop,
  errorf: noop,
  fatalf: noop,
  child: () => NOOP_LOGGER,
  close: noop,
};

export interface FileLoggerOptions {
  clock?: Clock;
  onError?: ErrorReporter;
}

/**
 * 按配置创建写文件的 Logger：主文件 <dir>/<filename>，
 * 启用 errorSplit 时另开 <dir>/<filename 加 _error 后缀>。
 * 目录或文件不可用时抛出 ConfigurationError。
 */
export function createFileLogger(config: LoggerConfig, options: FileLoggerOptions = {}): Logger {
  const onError = options.onError ?? reportToStderr;
  const formatter = new JsonLineFormatter({ loggerName: config.name });
  const sink = RotatingFileSink.open(path.join(config.dir, config.filename), config.rotation, { onError });

  let router: SeverityRouter | undefined;
  if (config.errorSplit) {
    let errorSink: RotatingFileSink;
    try {
      errorSink = RotatingFileSink.open(
        path.join(config.dir, deriveErrorFilename(config.filename)),
        config.rotation,
        { onError },
      );
    } catch (err) {
      sink.close();
      throw err;
    }
    router = new SeverityRouter({ sink: errorSink, formatter, onError });
  }

  return new Logger({
    name: config.name,
    level: config.level,
    sink,
    formatter,
    router,
    reportCaller: config.reportCaller,
    clock: options.clock,
    onError,
  });
}
