import { readFileSync } from "node:fs";
import { z } from "zod";
import { PROTOCOL_VERSION } from "../config.js";
import type { GatewayTransport, GatewayTransportFactory } from "../gateway-transport.js";
import { safeRandomId } from "../gateway-transport.js";
import { CHALLENGE_EVENT, CONNECT_METHOD, HELLO_OK } from "../handshake.js";
import { silentLogger, type Logger } from "../logger.js";
import {
  decodeRequestFrame,
  encodeEventFrame,
  encodeResponseFrame,
  JsonObjectSchema,
  JsonValueSchema,
  type JsonObject,
  type JsonValue,
  type RequestFrame,
} from "../protocol/frames.js";

const DemoDataSchema = z.object({
  server: JsonObjectSchema,
  sessions: z.array(JsonObjectSchema),
  history: z.record(z.array(JsonValueSchema)),
  replies: z.array(z.object({ match: z.string(), text: z.string() })),
  defaultReply: z.string(),
});

export type DemoData = z.infer<typeof DemoDataSchema>;

export function loadDemoData(
  fileUrl: URL = new URL("./demo-data.json", import.meta.url)
): DemoData {
  return DemoDataSchema.parse(JSON.parse(readFileSync(fileUrl, "utf8")));
}

export type DemoGatewayOptions = {
  data?: DemoData;
  /** Delay before each response frame. */
  responseDelayMs?: number;
  /** Delay between streamed words. */
  chunkDelayMs?: number;
  logger?: Logger;
  createId?: () => string;
  now?: () => Date;
};

const DEMO_METHODS = ["chat.history", "chat.send", "sessions.list", "health"];

function readStringParam(params: JsonObject | undefined, key: string): string {
  const value = params?.[key];
  return typeof value === "string" ? value : "";
}

/** Words with their leading space, so the chunks concatenate back to the text. */
export function splitIntoChunks(text: string): string[] {
  return text.split(" ").map((word, index) => (index === 0 ? word : ` ${word}`));
}

export function pickDemoReply(data: DemoData, message: string): string {
  const lower = message.toLowerCase();
  return data.replies.find((reply) => lower.includes(reply.match))?.text ?? data.defaultReply;
}

/**
 * An in-process gateway behind the transport interface. It opens, sends the
 * connect challenge, accepts any credentials, answers a handful of methods
 * from canned data and streams replies to `chat.send` on both narration
 * channels, the way a live gateway does.
 */
export function createDemoTransport(options: DemoGatewayOptions = {}): GatewayTransport {
  const data = options.data ?? loadDemoData();
  const responseDelayMs = options.responseDelayMs ?? 80;
  const chunkDelayMs = options.chunkDelayMs ?? 30;
  const logger = options.logger ?? silentLogger;
  const createId = options.createId ?? safeRandomId;
  const now = options.now ?? (() => new Date());

  const messageHandlers = new Set<(data: unknown) => void>();
  const openHandlers = new Set<() => void>();
  const closeHandlers = new Set<(event?: unknown) => void>();
  const errorHandlers = new Set<(event?: unknown) => void>();
  const timers = new Set<ReturnType<typeof setTimeout>>();
  let closed = false;

  const schedule = (delayMs: number, fn: () => void) => {
    const timer = setTimeout(() => {
      timers.delete(timer);
      if (!closed) {
        fn();
      }
    }, delayMs);
    timers.add(timer);
  };

  const deliver = (frame: string) => {
    for (const handler of Array.from(messageHandlers)) {
      handler(frame);
    }
  };

  const emitEvent = (event: string, payload: JsonValue) => {
    deliver(encodeEventFrame({ type: "event", event, payload }));
  };

  const respond = (id: string, result: { ok: true; payload: JsonValue } | { ok: false; message: string }) => {
    schedule(responseDelayMs, () => {
      deliver(
        encodeResponseFrame(
          result.ok
            ? { type: "res", id, ok: true, payload: result.payload }
            : { type: "res", id, ok: false, error: { code: "unknown_method", message: result.message } }
        )
      );
    });
  };

  const streamReply = (sessionKey: string, runId: string, text: string) => {
    const chunks = splitIntoChunks(text);
    chunks.forEach((delta, index) => {
      schedule(responseDelayMs + chunkDelayMs * (index + 1), () => {
        emitEvent("chat", { sessionKey, runId, state: "delta", delta });
        emitEvent("agent", { sessionKey, runId, stream: "assistant", data: { delta } });
      });
    });

    schedule(responseDelayMs + chunkDelayMs * (chunks.length + 1), () => {
      emitEvent("agent", { sessionKey, runId, stream: "lifecycle", data: { phase: "end" } });
      emitEvent("chat", {
        sessionKey,
        runId,
        state: "final",
        message: {
          id: `demo-${createId()}`,
          role: "assistant",
          content: [{ type: "text", text }],
          timestamp: now().toISOString(),
        },
      });
    });
  };

  const handleRequest = (request: RequestFrame) => {
    const params = request.params;
    logger.debug({ method: request.method }, "demo_gateway_request");

    switch (request.method) {
      case CONNECT_METHOD:
        respond(request.id, {
          ok: true,
          payload: {
            type: HELLO_OK,
            protocol: PROTOCOL_VERSION,
            server: data.server,
            features: { methods: DEMO_METHODS },
          },
        });
        return;
      case "health":
        respond(request.id, { ok: true, payload: { ok: true } });
        return;
      case "sessions.list":
        respond(request.id, { ok: true, payload: { sessions: data.sessions } });
        return;
      case "chat.history": {
        const sessionKey = readStringParam(params, "sessionKey");
        respond(request.id, { ok: true, payload: { messages: data.history[sessionKey] ?? [] } });
        return;
      }
      case "chat.send": {
        const sessionKey = readStringParam(params, "sessionKey");
        const runId = `demo-run-${createId()}`;
        respond(request.id, { ok: true, payload: { runId, status: "started" } });
        streamReply(sessionKey, runId, pickDemoReply(data, readStringParam(params, "message")));
        return;
      }
      default:
        respond(request.id, { ok: false, message: `Unknown method: ${request.method}` });
    }
  };

  const subscribe = <THandler>(handlers: Set<THandler>, handler: THandler) => {
    handlers.add(handler);
    return () => {
      handlers.delete(handler);
    };
  };

  schedule(0, () => {
    for (const handler of Array.from(openHandlers)) {
      handler();
    }
    emitEvent(CHALLENGE_EVENT, { nonce: createId(), ts: now().getTime() });
  });

  return {
    send: (raw) => {
      if (closed) {
        throw new Error("Demo gateway is closed");
      }
      const request = decodeRequestFrame(raw);
      if (!request) {
        for (const handler of Array.from(errorHandlers)) {
          handler(new Error("Demo gateway received an invalid request frame"));
        }
        return;
      }
      handleRequest(request);
    },
    close: (code = 1000, reason = "") => {
      if (closed) {
        return;
      }
      closed = true;
      for (const timer of timers) {
        clearTimeout(timer);
      }
      timers.clear();
      for (const handler of Array.from(closeHandlers)) {
        handler({ code, reason });
      }
    },
    onMessage: (handler) => subscribe(messageHandlers, handler),
    onOpen: (handler) => subscribe(openHandlers, handler),
    onClose: (handler) => subscribe(closeHandlers, handler),
    onError: (handler) => subscribe(errorHandlers, handler),
  };
}

export function createDemoTransportFactory(options: DemoGatewayOptions = {}): GatewayTransportFactory {
  return () => createDemoTransport(options);
}
