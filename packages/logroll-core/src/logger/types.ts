/**
 * logroll Logger - 类型定义
 *
 * 支持 debug/info/warn/error/fatal 五个级别，JSON 行输出，
 * 按大小轮转、按数量与天数清理备份、ERROR 及以上级别可分流到独立文件。
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

/** 日志级别权重，用于比较 */
export const LOG_LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

/** 结构化字段的取值（按类型决定序列化方式） */
export type FieldValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | Date
  | Error
  | readonly FieldValue[]
  | FieldMap;

export interface FieldMap {
  readonly [key: string]: FieldValue;
}

/** 单条日志记录，构造后不可变 */
export interface LogEvent {
  /** Unix 纪元以来的纳秒数（UTC） */
  readonly timestamp: bigint;
  readonly level: LogLevel;
  readonly message: string;
  /** 调用点行号，0 表示未知 */
  readonly line: number;
  readonly fields: FieldMap;
}

/** 日志输出目标：一个有序、只追加的字节去处 */
export interface LogSink {
  readonly path: string;
  append(chunk: string): void;
  close(): void;
}

/** 轮转策略 */
export interface RotationPolicy {
  /** 单文件最大字节数，超过后轮转；0 表示不轮转 */
  maxSize: number;
  /** 最多保留的备份数；0 表示不限 */
  maxBackups: number;
  /** 备份保留天数；0 表示不按时间清理 */
  maxAgeDays: number;
  /** 是否 gzip 压缩轮转出的备份 */
  compress: boolean;
}

export const NO_ROTATION: RotationPolicy = {
  maxSize: 0,
  maxBackups: 0,
  maxAgeDays: 0,
  compress: false,
};

/** 已解析完成的 Logger 配置，创建后不再修改 */
export interface LoggerConfig {
  /** 具名 logger 的名称；默认 logger 为 undefined（输出中不带 logger 键） */
  name?: string;
  level: LogLevel;
  dir: string;
  filename: string;
  rotation: RotationPolicy;
  /** 是否把 ERROR 及以上级别额外写入 <name>_error<ext> */
  errorSplit: boolean;
  /** 是否记录调用点行号 */
  reportCaller: boolean;
}

/** 逐条日志的错误回调（编码失败、写入失败等） */
export type ErrorReporter = (err: Error) => void;
