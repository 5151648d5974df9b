import { DEFAULT_HEARTBEAT_PATTERNS } from "../config.js";
import type { Message } from "./message-content.js";

/** Case-insensitive substring match against the sentinel patterns. */
export function isHeartbeatText(
  text: string,
  patterns: readonly string[] = DEFAULT_HEARTBEAT_PATTERNS
): boolean {
  if (text.length === 0) {
    return false;
  }
  const upper = text.toUpperCase();
  return patterns.some((pattern) => pattern.length > 0 && upper.includes(pattern.toUpperCase()));
}

/** Heartbeat text becomes empty; anything else passes through unchanged. */
export function filterHeartbeat(
  text: string,
  patterns: readonly string[] = DEFAULT_HEARTBEAT_PATTERNS
): string {
  return isHeartbeatText(text, patterns) ? "" : text;
}

export function isDisplayableMessage(
  message: Message,
  patterns: readonly string[] = DEFAULT_HEARTBEAT_PATTERNS
): boolean {
  if (isHeartbeatText(message.content, patterns)) {
    return false;
  }
  // A thinking field counts even when empty.
  return message.content.length > 0 || message.thinking !== undefined;
}

export function filterTranscript(
  messages: readonly Message[],
  patterns: readonly string[] = DEFAULT_HEARTBEAT_PATTERNS
): Message[] {
  return messages.filter((message) => isDisplayableMessage(message, patterns));
}
