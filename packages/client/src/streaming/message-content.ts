import { safeRandomId } from "../gateway-transport.js";
import { isJsonObject, type JsonObject, type JsonValue } from "../protocol/frames.js";

export type MessageRole = "user" | "assistant" | "system";

export type Message = {
  readonly id: string;
  readonly role: MessageRole;
  readonly content: string;
  readonly thinking?: string;
  readonly timestamp?: string;
};

export type ExtractedContent = {
  text: string;
  thinking?: string;
};

function readString(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" ? value : undefined;
}

/** Numeric timestamps are epoch milliseconds. */
function readTimestamp(source: JsonObject, key: string): string | undefined {
  const value = source[key];
  if (typeof value === "number" && Number.isFinite(value)) {
    return new Date(value).toISOString();
  }
  return typeof value === "string" ? value : undefined;
}

function normalizeRole(value: string | undefined): MessageRole {
  return value === "user" || value === "system" ? value : "assistant";
}

/**
 * Content arrives as a bare string, a list of typed blocks (only `text` and
 * `thinking` blocks count) or an object carrying `text` or `content`.
 */
export function extractMessageContent(content: JsonValue | undefined): ExtractedContent {
  if (typeof content === "string") {
    return { text: content };
  }

  if (Array.isArray(content)) {
    let text = "";
    let thinking: string | undefined;
    for (const block of content) {
      if (!isJsonObject(block)) {
        continue;
      }
      const type = readString(block, "type");
      const blockText = readString(block, "text");
      const blockThinking = readString(block, "thinking");
      if (type === "text" && blockText !== undefined) {
        text += blockText;
      } else if (type === "thinking" && blockThinking !== undefined) {
        thinking = (thinking ?? "") + blockThinking;
      }
    }
    return thinking === undefined ? { text } : { text, thinking };
  }

  if (isJsonObject(content)) {
    return {
      text: readString(content, "text") ?? readString(content, "content") ?? JSON.stringify(content),
    };
  }

  return { text: "" };
}

/** Looks for `timestamp`, then `ts`, on the message and on its wrapper. */
export function readMessageTimestamp(raw: JsonObject): string | undefined {
  const nested = raw.message;
  const source = isJsonObject(nested) ? nested : raw;
  return (
    readTimestamp(source, "timestamp") ??
    readTimestamp(raw, "timestamp") ??
    readTimestamp(source, "ts") ??
    readTimestamp(raw, "ts")
  );
}

/**
 * Projects one history item or final-event message into a Message. The item
 * may carry its fields directly or nest them under `message`.
 */
export function messageFromServerPayload(
  raw: JsonObject,
  createId: () => string = safeRandomId
): Message {
  const nested = raw.message;
  const source = isJsonObject(nested) ? nested : raw;

  const id = readString(source, "id") ?? readString(raw, "runId") ?? `history-${createId()}`;
  const extracted = extractMessageContent(source.content);
  const thinking = extracted.thinking ?? readString(source, "thinking");
  const timestamp = readMessageTimestamp(raw);

  return {
    id,
    role: normalizeRole(readString(source, "role")),
    content: extracted.text,
    ...(thinking !== undefined ? { thinking } : {}),
    ...(timestamp !== undefined ? { timestamp } : {}),
  };
}
