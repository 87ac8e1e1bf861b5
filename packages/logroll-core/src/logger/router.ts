/**
 * logroll Logger - 按级别分流
 *
 * 把达到阈值（默认 ERROR）的日志用同一个 Formatter 重新渲染后复制到第二个 Sink。
 * 主日志是唯一可信来源；分流写入失败只上报，不影响也不回滚主写入。
 */

import path from "node:path";
import type { LogFormatter } from "./formatter.js";
import { WriteError, errorMessage, reportToStderr } from "./errors.js";
import { meetsThreshold } from "./levels.js";
import type { ErrorReporter, LogEvent, LogLevel, LogSink } from "./types.js";

export const ERROR_FILE_SUFFIX = "_error";

/**
 * 在扩展名前插入后缀：service.log → service_error.log，service → service_error
 */
export function deriveErrorFilename(filename: string, suffix: string = ERROR_FILE_SUFFIX): string {
  const ext = path.extname(filename);
  return `${filename.slice(0, filename.length - ext.length)}${suffix}${ext}`;
}

export interface SeverityRouterOptions {
  sink: LogSink;
  formatter: LogFormatter;
  threshold?: LogLevel;
  onError?: ErrorReporter;
}

export class SeverityRouter {
  readonly threshold: LogLevel;
  private readonly sink: LogSink;
  private readonly formatter: LogFormatter;
  private readonly onError: ErrorReporter;

  constructor(options: SeverityRouterOptions) {
    this.sink = options.sink;
    this.formatter = options.formatter;
    this.threshold = options.threshold ?? "error";
    this.onError = options.onError ?? reportToStderr;
  }

  get path(): string {
    return this.sink.path;
  }

  /** 达到阈值则转发，返回是否成功写入第二个 Sink */
  offer(event: LogEvent): boolean {
    if (!meetsThreshold(event.level, this.threshold)) return false;
    try {
      this.sink.append(this.formatter.format(event));
      return true;
    } catch (err) {
      this.onError(
        err instanceof WriteError
          ? err
          : new WriteError(this.sink.path, `Failed to mirror log to ${this.sink.path}: ${errorMessage(err)}`, { cause: err }),
      );
      return false;
    }
  }

  close(): void {
    this.sink.close();
  }
}
