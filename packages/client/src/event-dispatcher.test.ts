import { describe, expect, test, vi } from "vitest";
import { EventDispatcher } from "./event-dispatcher.js";

describe("EventDispatcher", () => {
  test("delivers every event to the primary handler and all listeners", () => {
    const dispatcher = new EventDispatcher();
    const primary = vi.fn();
    const a = vi.fn();
    const b = vi.fn();

    dispatcher.setPrimaryHandler(primary);
    dispatcher.addListener("a", a);
    dispatcher.addListener("b", b);
    dispatcher.dispatch("chat", { state: "delta" });

    expect(primary).toHaveBeenCalledWith("chat", { state: "delta" });
    expect(a).toHaveBeenCalledWith("chat", { state: "delta" });
    expect(b).toHaveBeenCalledWith("chat", { state: "delta" });
  });

  test("runs leading listeners before the primary handler", () => {
    const dispatcher = new EventDispatcher();
    const order: string[] = [];

    dispatcher.addListener("late", () => order.push("listener"));
    dispatcher.setPrimaryHandler(() => order.push("primary"));
    dispatcher.addListener("watch", () => order.push("leading"), { leading: true });
    dispatcher.dispatch("tick", undefined);

    expect(order).toEqual(["leading", "primary", "listener"]);
  });

  test("re-adding an id replaces the previous listener", () => {
    const dispatcher = new EventDispatcher();
    const first = vi.fn();
    const second = vi.fn();

    dispatcher.addListener("chat", first);
    dispatcher.addListener("chat", second);
    dispatcher.dispatch("chat", null);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(dispatcher.listenerCount).toBe(1);
  });

  test("a listener can remove itself and another during dispatch", () => {
    const dispatcher = new EventDispatcher();
    const calls: string[] = [];

    dispatcher.addListener("self", () => {
      calls.push("self");
      dispatcher.removeListener("self");
      dispatcher.removeListener("other");
    });
    dispatcher.addListener("other", () => calls.push("other"));

    dispatcher.dispatch("one", null);
    dispatcher.dispatch("two", null);

    expect(calls).toEqual(["self", "other"]);
    expect(dispatcher.listenerCount).toBe(0);
  });

  test("listeners added during dispatch start with the next event", () => {
    const dispatcher = new EventDispatcher();
    const added = vi.fn();

    dispatcher.addListener("adder", () => {
      dispatcher.addListener("added", added);
    });
    dispatcher.dispatch("one", null);
    expect(added).not.toHaveBeenCalled();

    dispatcher.dispatch("two", null);
    expect(added).toHaveBeenCalledWith("two", null);
  });

  test("a throwing listener does not stop the others", () => {
    const warn = vi.fn();
    const dispatcher = new EventDispatcher({ debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() });
    const after = vi.fn();

    dispatcher.addListener("broken", () => {
      throw new Error("boom");
    });
    dispatcher.addListener("after", after);
    dispatcher.dispatch("chat", null);

    expect(after).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ listenerId: "broken", eventName: "chat" }),
      "event_listener_failed"
    );
  });

  test("the unsubscribe handle only removes its own registration", () => {
    const dispatcher = new EventDispatcher();
    const replacement = vi.fn();

    const unsubscribe = dispatcher.addListener("chat", vi.fn());
    dispatcher.addListener("chat", replacement);
    unsubscribe();
    dispatcher.dispatch("chat", null);

    expect(replacement).toHaveBeenCalledTimes(1);
    expect(dispatcher.hasListener("chat")).toBe(true);
  });
});
