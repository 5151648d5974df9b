import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  ConnectionFailedError,
  NotConnectedError,
  RequestTimeoutError,
} from "./errors.js";
import { RpcCorrelator } from "./rpc-correlator.js";

function createCorrelator(options?: { defaultTimeoutMs?: number }) {
  const written: string[] = [];
  const correlator = new RpcCorrelator({
    write: (data) => written.push(data),
    defaultTimeoutMs: options?.defaultTimeoutMs,
  });
  const sentIds = () => written.map((data) => (JSON.parse(data) as { id: string }).id);
  return { correlator, written, sentIds };
}

describe("RpcCorrelator", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("assigns increasing decimal string ids starting at 1", () => {
    const { correlator, sentIds } = createCorrelator();

    void correlator.send("a").catch(() => undefined);
    void correlator.send("b").catch(() => undefined);
    void correlator.send("c").catch(() => undefined);

    expect(sentIds()).toEqual(["1", "2", "3"]);
    expect(correlator.nextId).toBe("4");
    correlator.cancelAll();
  });

  test("resolves the caller whose id matches, in any order", async () => {
    const { correlator } = createCorrelator();

    const first = correlator.send("first");
    const second = correlator.send("second");

    expect(correlator.resolve({ type: "res", id: "2", ok: true, payload: "two" })).toBe(true);
    expect(correlator.resolve({ type: "res", id: "1", ok: true, payload: "one" })).toBe(true);

    await expect(first).resolves.toMatchObject({ id: "1", payload: "one" });
    await expect(second).resolves.toMatchObject({ id: "2", payload: "two" });
    expect(correlator.pendingCount).toBe(0);
  });

  test("drops responses nobody is waiting for", async () => {
    const { correlator } = createCorrelator();
    const request = correlator.send("ping");

    expect(correlator.resolve({ type: "res", id: "99", ok: true })).toBe(false);
    expect(correlator.resolve({ type: "res", id: "1", ok: true })).toBe(true);
    expect(correlator.resolve({ type: "res", id: "1", ok: true })).toBe(false);

    await expect(request).resolves.toMatchObject({ id: "1", ok: true });
  });

  test("times out with the method name and ignores a late response", async () => {
    const { correlator } = createCorrelator({ defaultTimeoutMs: 1000 });
    const request = correlator.send("sessions.list");
    const assertion = expect(request).rejects.toBeInstanceOf(RequestTimeoutError);

    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
    await expect(request).rejects.toThrow("Request timed out: sessions.list");

    expect(correlator.pendingCount).toBe(0);
    expect(correlator.resolve({ type: "res", id: "1", ok: true })).toBe(false);
  });

  test("per-call timeout overrides the default", async () => {
    const { correlator } = createCorrelator({ defaultTimeoutMs: 30_000 });
    const request = correlator.send("slow", undefined, 50);
    const assertion = expect(request).rejects.toBeInstanceOf(RequestTimeoutError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  test("a response before the deadline wins and the timer stays inert", async () => {
    const { correlator } = createCorrelator({ defaultTimeoutMs: 1000 });
    const request = correlator.send("fast");

    correlator.resolve({ type: "res", id: "1", ok: true });
    await vi.advanceTimersByTimeAsync(5000);

    await expect(request).resolves.toMatchObject({ ok: true });
    expect(vi.getTimerCount()).toBe(0);
  });

  test("cancelAll fails every pending request with NotConnected", async () => {
    const { correlator } = createCorrelator();
    const settled = Promise.allSettled([
      correlator.send("a"),
      correlator.send("b"),
      correlator.send("c"),
    ]);

    expect(correlator.cancelAll()).toBe(3);

    const results = await settled;
    for (const result of results) {
      expect(result.status).toBe("rejected");
      if (result.status === "rejected") {
        expect(result.reason).toBeInstanceOf(NotConnectedError);
      }
    }
    expect(correlator.pendingCount).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });

  test("every concurrent request settles exactly once", async () => {
    const { correlator } = createCorrelator({ defaultTimeoutMs: 100 });
    const outcomes = new Map<number, string[]>();
    const requests = Array.from({ length: 6 }, (_, index) => {
      outcomes.set(index, []);
      return correlator.send(`m${index}`).then(
        () => outcomes.get(index)?.push("ok"),
        (error: Error) => outcomes.get(index)?.push(error.name)
      );
    });

    correlator.resolve({ type: "res", id: "1", ok: true });
    correlator.resolve({ type: "res", id: "3", ok: false, error: { message: "nope" } });
    await vi.advanceTimersByTimeAsync(100);
    correlator.resolve({ type: "res", id: "5", ok: true });
    correlator.cancelAll();
    await Promise.all(requests);

    expect(Array.from(outcomes.values()).map((entries) => entries.length)).toEqual([
      1, 1, 1, 1, 1, 1,
    ]);
    expect(outcomes.get(0)).toEqual(["ok"]);
    expect(outcomes.get(2)).toEqual(["ok"]);
    expect(outcomes.get(1)).toEqual(["RequestTimeoutError"]);
    expect(outcomes.get(4)).toEqual(["RequestTimeoutError"]);
  });

  test("a failed write rejects immediately and leaves nothing pending", async () => {
    const correlator = new RpcCorrelator({
      write: () => {
        throw new Error("WebSocket not open (readyState=3)");
      },
    });

    await expect(correlator.send("x")).rejects.toBeInstanceOf(ConnectionFailedError);
    expect(correlator.pendingCount).toBe(0);
    expect(correlator.nextId).toBe("2");
  });
});
