import { randomUUID } from "node:crypto";
import WebSocket from "ws";

export type GatewayTransport = {
  send: (data: string) => void;
  close: (code?: number, reason?: string) => void;
  onMessage: (handler: (data: unknown) => void) => () => void;
  onOpen: (handler: () => void) => () => void;
  onClose: (handler: (event?: unknown) => void) => () => void;
  onError: (handler: (event?: unknown) => void) => () => void;
};

export type GatewayTransportFactory = (options: {
  url: string;
  headers?: Record<string, string>;
}) => GatewayTransport;

export type WebSocketTransportOptions = {
  /** Accept self-signed certificates, as local gateways often use them. */
  allowSelfSignedCertificates?: boolean;
};

export function createWebSocketTransportFactory(
  options: WebSocketTransportOptions = {}
): GatewayTransportFactory {
  return ({ url, headers }) => {
    const ws = new WebSocket(url, {
      headers,
      ...(options.allowSelfSignedCertificates ? { rejectUnauthorized: false } : {}),
    });

    const bind = <TArgs extends unknown[]>(
      event: "open" | "close" | "error" | "message",
      listener: (...args: TArgs) => void
    ): (() => void) => {
      ws.on(event, listener);
      return () => {
        ws.off(event, listener);
      };
    };

    return {
      send: (data) => {
        if (ws.readyState !== WebSocket.OPEN) {
          throw new Error(`WebSocket not open (readyState=${ws.readyState})`);
        }
        ws.send(data);
      },
      close: (code?: number, reason?: string) => ws.close(code, reason),
      onOpen: (handler) => bind("open", () => handler()),
      onClose: (handler) =>
        bind("close", (code: number, reason: Buffer) =>
          handler({ code, reason: reason.toString("utf8") })
        ),
      onError: (handler) => bind("error", (error: Error) => handler(error)),
      onMessage: (handler) => bind("message", (data: WebSocket.RawData) => handler(data)),
    };
  };
}

export function describeTransportClose(event?: unknown): string {
  if (!event) {
    return "Transport closed";
  }
  if (event instanceof Error) {
    return event.message;
  }
  if (typeof event === "string") {
    return event;
  }
  if (typeof event === "object") {
    const record = event as { reason?: unknown; message?: unknown; code?: unknown };
    if (typeof record.reason === "string" && record.reason.trim().length > 0) {
      return record.reason.trim();
    }
    if (typeof record.message === "string" && record.message.trim().length > 0) {
      return record.message.trim();
    }
    if (typeof record.code === "number") {
      return `Transport closed (code ${record.code})`;
    }
  }
  return "Transport closed";
}

export function describeTransportError(event?: unknown): string {
  if (!event) {
    return "Transport error";
  }
  if (event instanceof Error) {
    return event.message;
  }
  if (typeof event === "string") {
    return event;
  }
  if (typeof event === "object") {
    const record = event as { message?: unknown };
    if (typeof record.message === "string" && record.message.trim().length > 0) {
      return record.message.trim();
    }
  }
  return "Transport error";
}

export function safeRandomId(): string {
  try {
    return randomUUID();
  } catch {
    return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2)}`;
  }
}

/**
 * Turns whatever a socket delivered (text, Buffer, fragmented Buffer list,
 * ArrayBuffer, typed array) into UTF-8 text. Returns null when there is
 * nothing to decode.
 */
export function decodeMessageData(data: unknown): string | null {
  if (data === null || data === undefined) {
    return null;
  }
  if (typeof data === "string") {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data) && data.every((part) => Buffer.isBuffer(part))) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString("utf8");
  }
  if (typeof data === "object" && "data" in data) {
    return decodeMessageData(data.data);
  }
  return null;
}
