import { describe, expect, test } from "vitest";
import { extractMessageContent, messageFromServerPayload } from "./message-content.js";

describe("extractMessageContent", () => {
  test("takes a bare string as the text", () => {
    expect(extractMessageContent("Hello")).toEqual({ text: "Hello" });
  });

  test("joins text blocks and thinking blocks separately", () => {
    expect(
      extractMessageContent([
        { type: "thinking", thinking: "Let me " },
        { type: "text", text: "The answer " },
        { type: "tool_use", text: "ignored" },
        { type: "thinking", thinking: "check." },
        { type: "text", text: "is 4." },
        "stray",
      ])
    ).toEqual({ text: "The answer is 4.", thinking: "Let me check." });
  });

  test("reads text or content from an object", () => {
    expect(extractMessageContent({ text: "from text" })).toEqual({ text: "from text" });
    expect(extractMessageContent({ content: "from content" })).toEqual({ text: "from content" });
    expect(extractMessageContent({ other: 1 })).toEqual({ text: '{"other":1}' });
  });

  test("returns empty text for anything else", () => {
    expect(extractMessageContent(undefined)).toEqual({ text: "" });
    expect(extractMessageContent(42)).toEqual({ text: "" });
  });
});

describe("messageFromServerPayload", () => {
  test("reads a flat history item", () => {
    expect(
      messageFromServerPayload({
        id: "m1",
        role: "user",
        content: "hi",
        timestamp: "2026-03-01T10:00:00Z",
      })
    ).toEqual({ id: "m1", role: "user", content: "hi", timestamp: "2026-03-01T10:00:00Z" });
  });

  test("unwraps items nested under message and falls back to the run id", () => {
    expect(
      messageFromServerPayload({
        runId: "run-7",
        ts: "2026-03-01T10:00:05Z",
        message: {
          role: "assistant",
          content: [
            { type: "thinking", thinking: "short" },
            { type: "text", text: "Done." },
          ],
        },
      })
    ).toEqual({
      id: "run-7",
      role: "assistant",
      content: "Done.",
      thinking: "short",
      timestamp: "2026-03-01T10:00:05Z",
    });
  });

  test("generates an id and defaults the role", () => {
    const message = messageFromServerPayload({ content: "x" }, () => "fixed");

    expect(message).toEqual({ id: "history-fixed", role: "assistant", content: "x" });
  });

  test("uses a top-level thinking field when there are no thinking blocks", () => {
    expect(
      messageFromServerPayload({ id: "m2", role: "assistant", content: "", thinking: "idea" })
    ).toEqual({ id: "m2", role: "assistant", content: "", thinking: "idea" });
  });

  test("converts epoch-millisecond timestamps", () => {
    expect(messageFromServerPayload({ id: "m3", content: "x", timestamp: 0 }).timestamp).toBe(
      "1970-01-01T00:00:00.000Z"
    );
  });
});
