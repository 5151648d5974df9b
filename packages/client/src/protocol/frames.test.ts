import { describe, expect, test } from "vitest";
import {
  decodeRequestFrame,
  decodeServerFrame,
  encodeRequestFrame,
  isJsonObject,
} from "./frames.js";

describe("decodeServerFrame", () => {
  test("decodes a successful response", () => {
    const result = decodeServerFrame(
      JSON.stringify({ type: "res", id: "7", ok: true, payload: { type: "hello-ok" } })
    );

    expect(result).toEqual({
      kind: "response",
      frame: { type: "res", id: "7", ok: true, payload: { type: "hello-ok" } },
    });
  });

  test("decodes an error response with server details", () => {
    const result = decodeServerFrame(
      JSON.stringify({
        type: "res",
        id: "3",
        ok: false,
        error: { code: 401, message: "bad token", details: "token expired" },
      })
    );

    expect(result.kind).toBe("response");
    if (result.kind !== "response") return;
    expect(result.frame.ok).toBe(false);
    expect(result.frame.error).toEqual({
      code: 401,
      message: "bad token",
      details: "token expired",
    });
  });

  test("normalizes numeric response ids to strings", () => {
    const result = decodeServerFrame(JSON.stringify({ type: "res", id: 12, ok: true }));

    expect(result.kind).toBe("response");
    if (result.kind !== "response") return;
    expect(result.frame.id).toBe("12");
  });

  test("decodes an event with a nested payload", () => {
    const result = decodeServerFrame(
      JSON.stringify({
        type: "event",
        event: "chat",
        payload: { sessionKey: "main", state: "delta", delta: "Hi" },
      })
    );

    expect(result).toEqual({
      kind: "event",
      frame: {
        type: "event",
        event: "chat",
        payload: { sessionKey: "main", state: "delta", delta: "Hi" },
      },
    });
  });

  test("decodes an event without payload", () => {
    const result = decodeServerFrame(JSON.stringify({ type: "event", event: "connect.challenge" }));

    expect(result).toEqual({
      kind: "event",
      frame: { type: "event", event: "connect.challenge" },
    });
  });

  test("returns unknown for malformed JSON", () => {
    expect(decodeServerFrame("{not json").kind).toBe("unknown");
  });

  test("returns unknown when the discriminator is missing", () => {
    expect(decodeServerFrame(JSON.stringify({ id: "1", ok: true }))).toEqual({
      kind: "unknown",
      reason: "Missing frame type",
    });
  });

  test("returns unknown for an unsupported frame type", () => {
    expect(decodeServerFrame(JSON.stringify({ type: "req", id: "1", method: "x" }))).toEqual({
      kind: "unknown",
      reason: "Unsupported frame type: req",
    });
  });

  test("returns unknown when a response fails full decode", () => {
    const result = decodeServerFrame(JSON.stringify({ type: "res", id: "1" }));
    expect(result.kind).toBe("unknown");
  });

  test("returns unknown when an event has no name", () => {
    const result = decodeServerFrame(JSON.stringify({ type: "event", payload: {} }));
    expect(result.kind).toBe("unknown");
  });
});

describe("encodeRequestFrame", () => {
  test("writes the request envelope", () => {
    const encoded = encodeRequestFrame({
      id: "1",
      method: "chat.send",
      params: { sessionKey: "main", message: "hello" },
    });

    expect(JSON.parse(encoded)).toEqual({
      type: "req",
      id: "1",
      method: "chat.send",
      params: { sessionKey: "main", message: "hello" },
    });
  });

  test("omits params entirely when they are empty", () => {
    const encoded = encodeRequestFrame({ id: "4", method: "sessions.list", params: {} });
    const decoded = decodeRequestFrame(encoded);

    expect(encoded).toBe('{"type":"req","id":"4","method":"sessions.list"}');
    expect(decoded).not.toBeNull();
    expect(decoded && "params" in decoded).toBe(false);
  });

  test("omits params when none are given", () => {
    const decoded = JSON.parse(encodeRequestFrame({ id: "5", method: "status" })) as Record<
      string,
      unknown
    >;
    expect(Object.keys(decoded)).toEqual(["type", "id", "method"]);
  });
});

describe("decodeRequestFrame", () => {
  test("rejects frames that are not requests", () => {
    expect(decodeRequestFrame(JSON.stringify({ type: "res", id: "1", ok: true }))).toBeNull();
    expect(decodeRequestFrame("nope")).toBeNull();
  });
});

describe("isJsonObject", () => {
  test("accepts plain objects only", () => {
    expect(isJsonObject({ a: 1 })).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject("x")).toBe(false);
  });
});
