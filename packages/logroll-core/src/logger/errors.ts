/**
 * logroll Logger - 错误类型
 */

/**
 * 所有日志子系统错误的基类
 */
export class LoggingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LoggingError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * 目录无法创建、文件无法打开或配置校验失败（构造期错误）
 */
export class ConfigurationError extends LoggingError {
  readonly path?: string;

  constructor(message: string, options?: { path?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ConfigurationError";
    this.path = options?.path;
  }
}

/**
 * 结构化字段无法序列化
 */
export class EncodingError extends LoggingError {
  readonly field: string;

  constructor(field: string, message?: string, options?: { cause?: unknown }) {
    super(message ?? `Could not encode field '${field}'`, options);
    this.name = "EncodingError";
    this.field = field;
  }
}

/**
 * 追加或轮转时的 I/O 失败
 */
export class WriteError extends LoggingError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WriteError";
    this.path = path;
  }
}

/**
 * 查找的 logger 不存在，且默认 logger 尚未初始化
 */
export class NotInitializedError extends LoggingError {
  readonly loggerName: string;

  constructor(loggerName: string) {
    super(`Logger '${loggerName}' is not initialized and no default logger is configured`);
    this.name = "NotInitializedError";
    this.loggerName = loggerName;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** 默认的错误回调：logger 自身的故障写到 stderr */
export function reportToStderr(err: Error): void {
  process.stderr.write(`[logroll] ${err.message}\n`);
}
