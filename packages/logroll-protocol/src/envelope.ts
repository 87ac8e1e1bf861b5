/**
 * 消息信封 - 路由前的轻量解析
 *
 * 信封形如 { "head": { "event_type": "...", ... }, "body": { ... } }。
 * getEventType 只取 head.event_type，不校验文档其余部分；
 * convert / decodeEnvelope 按 zod schema 解码成目标类型。
 */

import { z } from "zod";

export class EnvelopeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EnvelopeError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

// ============================================================================
// Zod 验证 Schema
// ============================================================================

export const EnvelopeHeadSchema = z.object({
  destination: z.string(),
  time: z.coerce.date(),
  correlation_id: z.string(),
  event_type: z.string(),
  source: z.string(),
});

/** 面向客户实例的消息体 */
export const WorkerMessageBodySchema = z.object({
  client_id: z.number().int().nonnegative(),
  company_id: z.number().int().nonnegative(),
  instance_id: z.number().int().nonnegative(),
  message: z.string(),
});

export type EnvelopeHead = z.output<typeof EnvelopeHeadSchema>;
export type WorkerMessageBody = z.output<typeof WorkerMessageBodySchema>;

export interface Envelope<T> {
  head: EnvelopeHead;
  body: T;
}

const HeadOnlySchema = z.object({
  head: z.object({ event_type: z.string() }),
});

export type RawMessage = string | Uint8Array;

function parseJson(raw: RawMessage): unknown {
  const text = typeof raw === "string" ? raw : Buffer.from(raw).toString("utf-8");
  try {
    return JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new EnvelopeError(`Malformed JSON message: ${reason}`, { cause: err });
  }
}

/** 只解码 head.event_type，用于在记录日志前路由消息 */
export function getEventType(raw: RawMessage): string {
  const parsed = HeadOnlySchema.safeParse(parseJson(raw));
  if (!parsed.success) {
    throw new EnvelopeError("Message has no string head.event_type", { cause: parsed.error });
  }
  return parsed.data.head.event_type;
}

const EnvelopeShapeSchema = z.object({
  head: EnvelopeHeadSchema,
  body: z.unknown(),
});

function validate<S extends z.ZodTypeAny>(value: unknown, schema: S, what: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new EnvelopeError(`${what} does not match schema: ${issues}`, { cause: parsed.error });
  }
  return parsed.data;
}

/** 按 schema 解码 JSON 到目标类型 */
export function convert<S extends z.ZodTypeAny>(raw: RawMessage, schema: S): z.output<S> {
  return validate(parseJson(raw), schema, "Message");
}

/** 解码完整信封：先校验 head，再按 body schema 校验消息体 */
export function decodeEnvelope<S extends z.ZodTypeAny>(raw: RawMessage, body: S): Envelope<z.output<S>> {
  const envelope = validate(parseJson(raw), EnvelopeShapeSchema, "Envelope");
  return { head: envelope.head, body: validate(envelope.body, body, "Envelope body") };
}
