import { silentLogger, type Logger } from "./logger.js";
import type { JsonValue } from "./protocol/frames.js";

export type GatewayEventListener = (eventName: string, payload: JsonValue | undefined) => void;

/**
 * Fans every inbound event out to a keyed set of listeners. Leading listeners
 * run first (the handshake watches for its challenge there), then the primary
 * handler, then everything else. Each dispatch walks a snapshot, so a listener
 * may add or remove listeners, itself included, while it runs.
 */
export class EventDispatcher {
  private readonly leading = new Map<string, GatewayEventListener>();
  private readonly listeners = new Map<string, GatewayEventListener>();
  private primary: GatewayEventListener | null = null;

  constructor(private readonly logger: Logger = silentLogger) {}

  get listenerCount(): number {
    return this.listeners.size;
  }

  hasListener(id: string): boolean {
    return this.listeners.has(id) || this.leading.has(id);
  }

  setPrimaryHandler(handler: GatewayEventListener | null): void {
    this.primary = handler;
  }

  addListener(
    id: string,
    listener: GatewayEventListener,
    options?: { leading?: boolean }
  ): () => void {
    const target = options?.leading ? this.leading : this.listeners;
    target.set(id, listener);
    return () => {
      if (target.get(id) === listener) {
        target.delete(id);
      }
    };
  }

  removeListener(id: string): void {
    this.listeners.delete(id);
    this.leading.delete(id);
  }

  clear(): void {
    this.listeners.clear();
    this.leading.clear();
    this.primary = null;
  }

  dispatch(eventName: string, payload: JsonValue | undefined): void {
    const snapshot: Array<[string, GatewayEventListener]> = [...this.leading];
    if (this.primary) {
      snapshot.push(["primary", this.primary]);
    }
    snapshot.push(...this.listeners);

    for (const [id, listener] of snapshot) {
      try {
        listener(eventName, payload);
      } catch (error) {
        this.logger.warn({ err: error, listenerId: id, eventName }, "event_listener_failed");
      }
    }
  }
}
