import { describe, expect, test } from "vitest";
import {
  filterHeartbeat,
  filterTranscript,
  isDisplayableMessage,
  isHeartbeatText,
} from "./heartbeat.js";

describe("heartbeat filter", () => {
  test("matches sentinel patterns as case-insensitive substrings", () => {
    expect(isHeartbeatText("HEARTBEAT_OK")).toBe(true);
    expect(isHeartbeatText("please read heartbeat.md first")).toBe(true);
    expect(isHeartbeatText("# Heartbeat - event-driven status\n- all good")).toBe(true);
    expect(isHeartbeatText("my heart beats fast")).toBe(false);
    expect(isHeartbeatText("")).toBe(false);
  });

  test("uses an injected pattern list", () => {
    expect(isHeartbeatText("PING", ["ping"])).toBe(true);
    expect(isHeartbeatText("HEARTBEAT_OK", ["ping"])).toBe(false);
  });

  test("is idempotent", () => {
    for (const text of ["HEARTBEAT_OK", "hello there", "", "x READ HEARTBEAT.MD y"]) {
      const once = filterHeartbeat(text);
      expect(filterHeartbeat(once)).toBe(once);
    }
    expect(filterHeartbeat("hello there")).toBe("hello there");
    expect(filterHeartbeat("HEARTBEAT_OK")).toBe("");
  });

  test("treats a sentinel-only message as empty", () => {
    expect(isDisplayableMessage({ id: "1", role: "assistant", content: "HEARTBEAT_OK" })).toBe(
      false
    );
    expect(isDisplayableMessage({ id: "2", role: "assistant", content: "" })).toBe(false);
    expect(
      isDisplayableMessage({ id: "3", role: "assistant", content: "", thinking: "hmm" })
    ).toBe(true);
    expect(isDisplayableMessage({ id: "4", role: "assistant", content: "", thinking: "" })).toBe(
      true
    );
  });

  test("filters a transcript", () => {
    const kept = filterTranscript([
      { id: "1", role: "user", content: "hi" },
      { id: "2", role: "assistant", content: "heartbeat_ok" },
      { id: "3", role: "assistant", content: "hello" },
    ]);

    expect(kept.map((message) => message.id)).toEqual(["1", "3"]);
  });
});
