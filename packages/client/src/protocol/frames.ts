import { z } from "zod";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

// Peers disagree on whether ids are numbers or strings; normalize to strings.
const FrameIdSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value));

const FrameDiscriminatorSchema = z.object({
  type: z.string(),
});

export const RequestFrameSchema = z.object({
  type: z.literal("req"),
  id: FrameIdSchema,
  method: z.string(),
  params: JsonObjectSchema.optional(),
});

export const ResponseErrorSchema = z.object({
  code: z.union([z.number(), z.string()]).nullish(),
  message: z.string().nullish(),
  details: JsonValueSchema.optional(),
});

export const ResponseFrameSchema = z.object({
  type: z.literal("res"),
  id: FrameIdSchema,
  ok: z.boolean(),
  payload: JsonValueSchema.optional(),
  error: ResponseErrorSchema.nullish(),
});

export const EventFrameSchema = z.object({
  type: z.literal("event"),
  event: z.string(),
  payload: JsonValueSchema.optional(),
});

export type RequestFrame = z.infer<typeof RequestFrameSchema>;
export type ResponseError = z.infer<typeof ResponseErrorSchema>;
export type ResponseFrame = z.infer<typeof ResponseFrameSchema>;
export type EventFrame = z.infer<typeof EventFrameSchema>;

export type ServerFrame =
  | { kind: "response"; frame: ResponseFrame }
  | { kind: "event"; frame: EventFrame }
  | { kind: "unknown"; reason: string };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonText(text: string): { ok: true; value: unknown } | { ok: false; reason: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return {
      ok: false,
      reason: error instanceof Error ? error.message : "Invalid JSON",
    };
  }
}

/**
 * Decodes one inbound frame. Only the `type` discriminator is read first; the
 * full shape is validated for `res` and `event` frames. Anything else, and
 * every failure, comes back as `unknown` instead of throwing.
 */
export function decodeServerFrame(text: string): ServerFrame {
  const parsed = parseJsonText(text);
  if (!parsed.ok) {
    return { kind: "unknown", reason: parsed.reason };
  }

  const discriminator = FrameDiscriminatorSchema.safeParse(parsed.value);
  if (!discriminator.success) {
    return { kind: "unknown", reason: "Missing frame type" };
  }

  switch (discriminator.data.type) {
    case "res": {
      const result = ResponseFrameSchema.safeParse(parsed.value);
      return result.success
        ? { kind: "response", frame: result.data }
        : { kind: "unknown", reason: result.error.message };
    }
    case "event": {
      const result = EventFrameSchema.safeParse(parsed.value);
      return result.success
        ? { kind: "event", frame: result.data }
        : { kind: "unknown", reason: result.error.message };
    }
    default:
      return {
        kind: "unknown",
        reason: `Unsupported frame type: ${discriminator.data.type}`,
      };
  }
}

/**
 * Decodes a client request. The gateway side of the protocol needs this; the
 * client only ever writes requests.
 */
export function decodeRequestFrame(text: string): RequestFrame | null {
  const parsed = parseJsonText(text);
  if (!parsed.ok) {
    return null;
  }
  const result = RequestFrameSchema.safeParse(parsed.value);
  return result.success ? result.data : null;
}

export function encodeRequestFrame(input: {
  id: string;
  method: string;
  params?: JsonObject;
}): string {
  const frame: RequestFrame = {
    type: "req",
    id: input.id,
    method: input.method,
  };
  // An empty params object is left off the wire: peers read its presence as overrides.
  if (input.params && Object.keys(input.params).length > 0) {
    frame.params = input.params;
  }
  return JSON.stringify(frame);
}

export function encodeResponseFrame(frame: ResponseFrame): string {
  return JSON.stringify(frame);
}

export function encodeEventFrame(frame: EventFrame): string {
  return JSON.stringify(frame);
}
