/**
 * logroll Logger - JSON 行格式化
 *
 * 每条日志输出一个 JSON 对象并以 \n 结尾，例如：
 *
 *   {"time":"2025-01-22T12:00:00.000000000Z","level":"INFO","logger":"example_logger","line":34,"msg":"Application started"}
 *
 * 键顺序固定为 time, level, logger（仅具名 logger）, line, msg，其后是按键名排序的结构化字段。
 */

import { formatRfc3339Nano } from "./clock.js";
import { EncodingError, errorMessage } from "./errors.js";
import type { FieldValue, LogEvent } from "./types.js";

/** 无法序列化的字段以此占位 */
export const ENCODING_PLACEHOLDER = "!ENCODING_ERROR";

/** 与固定键冲突的字段会被改写为 fields.<key>（仍冲突则继续加 fields. 前缀） */
const RESERVED_KEYS = new Set(["time", "level", "logger", "line", "msg"]);

export interface LogFormatter {
  /** 渲染一条日志；字段编码错误交给 report，不抛出 */
  format(event: LogEvent, report?: (err: EncodingError) => void): string;
}

export class JsonLineFormatter implements LogFormatter {
  readonly loggerName?: string;

  constructor(options?: { loggerName?: string }) {
    this.loggerName = options?.loggerName || undefined;
  }

  format(event: LogEvent, report?: (err: EncodingError) => void): string {
    const parts: string[] = [
      `"time":${JSON.stringify(formatRfc3339Nano(event.timestamp))}`,
      `"level":${JSON.stringify(event.level.toUpperCase())}`,
    ];
    if (this.loggerName !== undefined) {
      parts.push(`"logger":${JSON.stringify(this.loggerName)}`);
    }
    const line = Number.isInteger(event.line) && event.line > 0 ? event.line : 0;
    parts.push(`"line":${line}`);
    parts.push(`"msg":${JSON.stringify(event.message)}`);

    const used = new Set<string>();
    for (const key of Object.keys(event.fields).sort()) {
      let outputKey = RESERVED_KEYS.has(key) ? `fields.${key}` : key;
      // 改名后与调用方自带的同名键冲突时继续加前缀
      while (used.has(outputKey)) outputKey = `fields.${outputKey}`;
      used.add(outputKey);
      let encoded: string;
      try {
        encoded = encodeFieldValue(key, event.fields[key]);
      } catch (err) {
        report?.(err instanceof EncodingError ? err : new EncodingError(key, undefined, { cause: err }));
        encoded = JSON.stringify(ENCODING_PLACEHOLDER);
      }
      parts.push(`${JSON.stringify(outputKey)}:${encoded}`);
    }

    return `{${parts.join(",")}}\n`;
  }
}

/** 数字输出为 JSON 数字，其余一律输出为其自然文本形式的 JSON 字符串 */
export function encodeFieldValue(key: string, value: FieldValue): string {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new EncodingError(key, `Field '${key}' is not a finite number: ${value}`);
    }
    return JSON.stringify(value);
  }
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "boolean") return JSON.stringify(String(value));
  if (value === null) return JSON.stringify("null");
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new EncodingError(key, `Field '${key}' is an invalid date`);
    }
    return JSON.stringify(value.toISOString());
  }
  if (value instanceof Error) return JSON.stringify(value.message);
  // 经由 any 混进来的 undefined、函数、symbol
  if (typeof value !== "object") {
    throw new EncodingError(key, `Field '${key}' has an unsupported value of type ${typeof value}`);
  }

  // toJSON 返回 undefined 时 JSON.stringify 也返回 undefined
  let text: string | undefined;
  try {
    text = JSON.stringify(value, nestedReplacer);
  } catch (err) {
    throw new EncodingError(key, `Field '${key}' could not be encoded: ${errorMessage(err)}`, { cause: err });
  }
  if (text === undefined) {
    throw new EncodingError(key, `Field '${key}' has no JSON representation`);
  }
  return JSON.stringify(text);
}

function nestedReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Error) return value.message;
  return value;
}
