/**
 * logroll Logger - 配置解析与校验
 *
 * 支持三种来源：代码传入的对象、环境变量（LOGROLL_LOG_*）、JSON 配置文件。
 * 统一经过 zod 校验，级别字符串无法识别时回退到 info。
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import { parseSizeToBytes } from "./file-sink.js";
import { parseLogLevel } from "./levels.js";
import type { LoggerConfig } from "./types.js";

/** 默认 logger 的文件名；具名 logger 默认为 <name>.log */
export const DEFAULT_LOG_FILENAME = "app.log";

// ============================================================================
// Zod 验证 Schema
// ============================================================================

const SizeSchema = z.union([
  z.number().int().min(0),
  z.string().transform((s) => parseSizeToBytes(s)),
]);

export const RotationPolicySchema = z.object({
  maxSize: SizeSchema.default(0),
  maxBackups: z.number().int().min(0).default(0),
  maxAgeDays: z.number().min(0).default(0),
  compress: z.boolean().default(false),
});

export const LoggerConfigSchema = z.object({
  name: z.string().min(1, "logger name must not be empty").optional(),
  // 无法识别的级别（包括非字符串）一律回退到 info，不报错
  level: z.unknown().transform((value) => parseLogLevel(typeof value === "string" ? value : undefined)),
  dir: z.string().min(1, "log directory must not be empty"),
  filename: z.string().min(1, "log filename must not be empty").default(DEFAULT_LOG_FILENAME),
  rotation: RotationPolicySchema.default({}),
  errorSplit: z.boolean().default(false),
  reportCaller: z.boolean().default(true),
});

export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;

const LoggingFileSchema = z.object({
  default: LoggerConfigSchema.omit({ name: true }).optional(),
  // 具名 logger 不写 filename 时由注册表补成 <name>.log
  loggers: z
    .array(
      LoggerConfigSchema.extend({
        name: z.string().min(1, "logger name must not be empty"),
        filename: z.string().min(1, "log filename must not be empty").optional(),
      }),
    )
    .default([]),
});

export type LoggingFile = z.output<typeof LoggingFileSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/** 校验并补全默认值；失败时抛出 ConfigurationError */
export function resolveLoggerConfig(input: LoggerConfigInput): LoggerConfig {
  const parsed = LoggerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid logger config: ${describeIssues(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
}

function readCount(value: string | undefined): number {
  const n = Math.floor(Number(value ?? "0"));
  return Number.isFinite(n) && n > 0 ? n : 0;
}

/** 从环境变量读取配置（用于服务启动） */
export function loggerConfigFromEnv(
  env: NodeJS.ProcessEnv,
  defaults: { dir: string; name?: string },
): LoggerConfigInput {
  return {
    name: defaults.name,
    level: env.LOGROLL_LOG_LEVEL ?? "info",
    dir: env.LOGROLL_LOG_DIR ?? defaults.dir,
    filename: env.LOGROLL_LOG_FILE ?? (defaults.name ? `${defaults.name}.log` : DEFAULT_LOG_FILENAME),
    rotation: {
      maxSize: parseSizeToBytes(env.LOGROLL_LOG_MAX_SIZE ?? "0"),
      maxBackups: readCount(env.LOGROLL_LOG_MAX_BACKUPS),
      maxAgeDays: readCount(env.LOGROLL_LOG_RETENTION_DAYS),
      compress: env.LOGROLL_LOG_COMPRESS === "true",
    },
    errorSplit: env.LOGROLL_LOG_ERROR_SPLIT === "true",
    reportCaller: (env.LOGROLL_LOG_CALLER ?? "true") !== "false",
  };
}

/**
 * 读取 JSON 配置文件，形如：
 * ```json
 * {
 *   "default": { "level": "info", "dir": "/var/log/svc" },
 *   "loggers": [
 *     { "name": "billing", "level": "debug", "dir": "/var/log/svc", "errorSplit": true,
 *       "rotation": { "maxSize": "50MB", "maxBackups": 5, "compress": true } }
 *   ]
 * }
 * ```
 */
export async function loadLoggingFile(filePath: string): Promise<LoggingFile> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read logging config ${filePath}: ${errorMessage(err)}`, {
      path: filePath,
      cause: err,
    });
  }
  const parsed = LoggingFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid logging config ${filePath}: ${describeIssues(parsed.error)}`, {
      path: filePath,
      cause: parsed.error,
    });
  }
  return parsed.data;
}
