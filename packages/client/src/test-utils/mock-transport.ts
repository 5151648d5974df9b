import { vi } from "vitest";
import type { GatewayTransport } from "../gateway-transport.js";
import { isJsonObject, type JsonObject, type JsonValue } from "../protocol/frames.js";

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function createMockTransport() {
  const sent: string[] = [];
  let closed = false;

  let onMessage: (data: unknown) => void = () => {};
  let onOpen: () => void = () => {};
  let onClose: (_event?: unknown) => void = () => {};
  let onError: (_event?: unknown) => void = () => {};

  const transport: GatewayTransport = {
    send: (data) => {
      sent.push(data);
    },
    close: () => {
      closed = true;
    },
    onMessage: (handler) => {
      onMessage = handler;
      return () => {
        onMessage = () => {};
      };
    },
    onOpen: (handler) => {
      onOpen = handler;
      return () => {
        onOpen = () => {};
      };
    },
    onClose: (handler) => {
      onClose = handler;
      return () => {
        onClose = () => {};
      };
    },
    onError: (handler) => {
      onError = handler;
      return () => {
        onError = () => {};
      };
    },
  };

  const requests = (): JsonObject[] =>
    sent.map((raw): unknown => JSON.parse(raw)).filter(isJsonObject);

  return {
    transport,
    sent,
    requests,
    lastRequest: (): JsonObject | undefined => requests().at(-1),
    isClosed: () => closed,
    triggerOpen: () => onOpen(),
    triggerClose: (event?: unknown) => onClose(event),
    triggerError: (event?: unknown) => onError(event),
    triggerMessage: (data: unknown) => onMessage(data),
    sendEvent: (event: string, payload?: JsonValue) =>
      onMessage(JSON.stringify({ type: "event", event, payload })),
    respond: (id: JsonValue | undefined, ok: boolean, payload?: JsonValue, error?: JsonObject) =>
      onMessage(JSON.stringify({ type: "res", id, ok, payload, error })),
  };
}

export type MockTransport = ReturnType<typeof createMockTransport>;

/** Lets chained promise continuations run without advancing timers. */
export async function flushMicrotasks(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i += 1) {
    await Promise.resolve();
  }
}
