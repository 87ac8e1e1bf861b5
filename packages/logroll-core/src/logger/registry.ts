/**
 * logroll Logger - 具名 Logger 注册表
 *
 * 名称 → Logger 的只增映射，外加一个默认 Logger 槽位：
 * - 同名初始化幂等：第一次成功的配置永久生效，之后的调用直接返回成功
 * - 并发初始化同一名称时共用一次构造，构造完成后条目才可见
 * - 默认 Logger 只构造一次，所有调用方看到同一个结果（包括同一个错误）
 * - 条目不会被删除或重新配置
 * - 每个文件路径（主文件与错误分流文件）只属于一个 Logger
 */

const DEFAULT_OWNER = "the default logger";

import path from "node:path";
import type { Clock } from "./clock.js";
import { DEFAULT_LOG_FILENAME, loadLoggingFile, resolveLoggerConfig, type LoggerConfigInput } from "./config.js";
import { ConfigurationError, NotInitializedError, errorMessage } from "./errors.js";
import { NOOP_LOGGER, createFileLogger, type Logger, type StructuredLogger } from "./logger.js";
import { Once } from "./once.js";
import { deriveErrorFilename } from "./router.js";
import type { ErrorReporter, LoggerConfig } from "./types.js";

export type InitResult = { ok: true; logger: Logger } | { ok: false; error: ConfigurationError };

export type LoggerFactory = (config: LoggerConfig) => Logger | Promise<Logger>;

export interface LoggerRegistryOptions {
  /** 构造 Logger 的工厂（默认 createFileLogger） */
  factory?: LoggerFactory;
  /** 传给默认工厂：逐条日志的错误回调 */
  onError?: ErrorReporter;
  /** 传给默认工厂：时间来源 */
  clock?: Clock;
}

/** initializeNamed / initializeDefault 的可选覆盖项 */
export type LoggerOverrides = Omit<LoggerConfigInput, "name" | "level" | "dir">;

export interface LoggingFileResult {
  default?: InitResult;
  loggers: Record<string, InitResult>;
}

function toConfigurationError(err: unknown): ConfigurationError {
  if (err instanceof ConfigurationError) return err;
  return new ConfigurationError(`Failed to create logger: ${errorMessage(err)}`, { cause: err });
}

export class LoggerRegistry {
  private readonly entries = new Map<string, Logger>();
  private readonly pending = new Map<string, Promise<InitResult>>();
  private readonly defaultCell = new Once<Logger>();
  /** 绝对路径 → 占用它的 Logger */
  private readonly owners = new Map<string, string>();
  private readonly factory: LoggerFactory;

  constructor(options: LoggerRegistryOptions = {}) {
    const { onError, clock } = options;
    this.factory = options.factory ?? ((config) => createFileLogger(config, { onError, clock }));
  }

  /** 初始化具名 Logger，文件默认为 <dir>/<name>.log */
  initializeNamed(name: string, level: string, dir: string, overrides: LoggerOverrides = {}): Promise<InitResult> {
    return this.initialize({ ...overrides, name, level, dir });
  }

  initialize(input: LoggerConfigInput): Promise<InitResult> {
    const name = input.name;
    if (!name) {
      return Promise.resolve({ ok: false, error: new ConfigurationError("Logger name must not be empty") });
    }

    const existing = this.entries.get(name);
    if (existing) return Promise.resolve({ ok: true, logger: existing });

    const inflight = this.pending.get(name);
    if (inflight) return inflight;

    const attempt = this.construct(name, input).finally(() => {
      this.pending.delete(name);
    });
    this.pending.set(name, attempt);
    return attempt;
  }

  /** 初始化默认 Logger（匿名，文件默认为 <dir>/app.log），整个注册表生命周期内只构造一次 */
  async initializeDefault(level: string, dir: string, overrides: LoggerOverrides = {}): Promise<InitResult> {
    try {
      const logger = await this.defaultCell.get(async () => {
        const config = resolveLoggerConfig({
          ...overrides,
          name: undefined,
          level,
          dir,
          filename: overrides.filename ?? DEFAULT_LOG_FILENAME,
        });
        const claimed = this.claimPaths(DEFAULT_OWNER, config);
        try {
          return await this.factory(config);
        } catch (err) {
          this.releasePaths(claimed);
          throw err;
        }
      });
      return { ok: true, logger };
    } catch (err) {
      return { ok: false, error: toConfigurationError(err) };
    }
  }

  /** 按 JSON 配置文件初始化默认与全部具名 Logger；文件本身无效时抛出 ConfigurationError */
  async initializeFromFile(filePath: string): Promise<LoggingFileResult> {
    const file = await loadLoggingFile(filePath);
    const result: LoggingFileResult = { loggers: {} };
    if (file.default) {
      result.default = await this.initializeDefault(file.default.level, file.default.dir, file.default);
    }
    for (const config of file.loggers) {
      result.loggers[config.name] = await this.initialize(config);
    }
    return result;
  }

  /** 具名 → 默认 → NotInitializedError */
  lookup(name: string): Logger {
    const logger = this.tryLookup(name);
    if (!logger) throw new NotInitializedError(name);
    return logger;
  }

  tryLookup(name: string): Logger | undefined {
    return this.entries.get(name) ?? this.defaultCell.peek();
  }

  lookupOrNoop(name: string): StructuredLogger {
    return this.tryLookup(name) ?? NOOP_LOGGER;
  }

  get defaultLogger(): Logger | undefined {
    return this.defaultCell.peek();
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /** 关闭所有文件句柄（进程退出时调用）；条目保留 */
  close(): void {
    for (const logger of this.entries.values()) {
      logger.close();
    }
    this.defaultCell.peek()?.close();
  }

  private async construct(name: string, input: LoggerConfigInput): Promise<InitResult> {
    let claimed: string[] = [];
    try {
      const config = resolveLoggerConfig({ ...input, filename: input.filename ?? `${name}.log` });
      claimed = this.claimPaths(`logger '${name}'`, config);
      const logger = await this.factory(config);
      this.entries.set(name, logger);
      return { ok: true, logger };
    } catch (err) {
      this.releasePaths(claimed);
      return { ok: false, error: toConfigurationError(err) };
    }
  }

  /** 在构造前同步占用配置会写入的路径；路径已属于其它 Logger 时抛出 ConfigurationError */
  private claimPaths(owner: string, config: LoggerConfig): string[] {
    const paths = [path.resolve(config.dir, config.filename)];
    if (config.errorSplit) {
      paths.push(path.resolve(config.dir, deriveErrorFilename(config.filename)));
    }
    for (const p of paths) {
      const holder = this.owners.get(p);
      if (holder !== undefined && holder !== owner) {
        throw new ConfigurationError(`Log file ${p} is already used by ${holder}`, { path: p });
      }
    }
    for (const p of paths) this.owners.set(p, owner);
    return paths;
  }

  private releasePaths(paths: string[]): void {
    for (const p of paths) this.owners.delete(p);
  }
}
