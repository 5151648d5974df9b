import {
  DecodingError,
  isGatewayError,
  RequestTimeoutError,
  ServerError,
  toErrorMessage,
} from "../errors.js";
import type { GatewayClient, RequestOptions } from "../gateway-client.js";
import { safeRandomId } from "../gateway-transport.js";
import { silentLogger, type Logger } from "../logger.js";
import { isJsonObject, type JsonValue } from "../protocol/frames.js";
import { filterTranscript } from "../streaming/heartbeat.js";
import { messageFromServerPayload, type Message } from "../streaming/message-content.js";
import { StreamReconciler } from "../streaming/stream-reconciler.js";

export const CHAT_HISTORY_METHOD = "chat.history";
export const CHAT_SEND_METHOD = "chat.send";

export type ChatGatewayClient = Pick<
  GatewayClient,
  "request" | "addEventListener" | "heartbeatPatterns"
>;

export type ChatSessionOptions = {
  client: ChatGatewayClient;
  sessionKey: string;
  logger?: Logger;
  createId?: () => string;
  now?: () => Date;
};

type ReplyWaiter = {
  resolve: (message: Message | null) => void;
  reject: (error: Error) => void;
  timeout: ReturnType<typeof setTimeout> | null;
};

/** Accepts a bare array or `{ messages: [...] }`; an object without `messages` is an empty history. */
function historyItems(payload: JsonValue): JsonValue[] {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (isJsonObject(payload)) {
    if (payload.messages === undefined) {
      return [];
    }
    if (Array.isArray(payload.messages)) {
      return payload.messages;
    }
  }
  throw new DecodingError(`${CHAT_HISTORY_METHOD} payload is not a message list`);
}

/**
 * One conversation: its transcript, plus the reconciler that turns the
 * gateway's streaming events into assistant messages.
 */
export class ChatSession {
  readonly sessionKey: string;
  private readonly client: ChatGatewayClient;
  private readonly logger: Logger;
  private readonly createId: () => string;
  private readonly now: () => Date;
  private readonly reconciler: StreamReconciler;
  private readonly changeListeners = new Set<(messages: readonly Message[]) => void>();
  private readonly replyWaiters = new Set<ReplyWaiter>();
  private messages: Message[] = [];
  private draftId: string | null = null;
  private detachListener: (() => void) | null = null;
  private lastErrorValue: string | null = null;

  constructor(options: ChatSessionOptions) {
    this.client = options.client;
    this.sessionKey = options.sessionKey;
    this.logger = options.logger ?? silentLogger;
    this.createId = options.createId ?? safeRandomId;
    this.now = options.now ?? (() => new Date());
    this.reconciler = new StreamReconciler({
      sessionKey: options.sessionKey,
      heartbeatPatterns: options.client.heartbeatPatterns,
      logger: this.logger,
      createId: this.createId,
      onDraft: (message) => this.applyDraft(message),
      onFinal: (message) => this.applyFinal(message),
      onError: (message) => this.applyStreamError(message),
      onDiscard: (draftId) => this.removeDraft(draftId),
    });
  }

  get transcript(): readonly Message[] {
    return [...this.messages];
  }

  /** Id of the in-progress assistant message, if a reply is streaming. */
  get streamingMessageId(): string | null {
    return this.draftId;
  }

  get lastError(): string | null {
    return this.lastErrorValue;
  }

  onChange(listener: (messages: readonly Message[]) => void): () => void {
    this.changeListeners.add(listener);
    return () => {
      this.changeListeners.delete(listener);
    };
  }

  async loadHistory(options?: RequestOptions): Promise<readonly Message[]> {
    this.lastErrorValue = null;
    let items: JsonValue[];
    try {
      const payload = await this.client.request(
        CHAT_HISTORY_METHOD,
        { sessionKey: this.sessionKey },
        options
      );
      items = historyItems(payload);
    } catch (error) {
      this.lastErrorValue = toErrorMessage(error);
      throw error;
    }

    const parsed = items
      .filter(isJsonObject)
      .map((item) => messageFromServerPayload(item, this.createId));
    this.messages = filterTranscript(parsed, this.client.heartbeatPatterns);
    this.draftId = null;
    this.notify();
    return this.transcript;
  }

  /**
   * Appends the user's message and asks the gateway to run a turn. The reply
   * arrives through the streaming events; `chat.send` timing out only means
   * the gateway never acknowledged, so it is not an error.
   */
  async sendMessage(text: string, options?: RequestOptions): Promise<void> {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      return;
    }

    this.lastErrorValue = null;
    this.append({
      id: `user-${this.createId()}`,
      role: "user",
      content: trimmed,
      timestamp: this.now().toISOString(),
    });
    this.attach();

    try {
      await this.client.request(
        CHAT_SEND_METHOD,
        { sessionKey: this.sessionKey, message: trimmed, idempotencyKey: this.createId() },
        options
      );
    } catch (error) {
      if (isGatewayError(error, "request_timeout")) {
        this.logger.debug({ sessionKey: this.sessionKey }, "chat_send_unacknowledged");
        return;
      }
      const message = toErrorMessage(error);
      this.logger.warn({ err: error, sessionKey: this.sessionKey }, "chat_send_failed");
      this.appendSystemMessage(message);
      this.settleWaiters({ error: error instanceof Error ? error : new Error(message) });
      this.reconciler.abandon();
      this.draftId = null;
      throw error;
    }
  }

  /**
   * Resolves with the next finalized assistant message, or null if the
   * session is abandoned first. Rejects when the run reports an error.
   */
  waitForReply(options?: { timeoutMs?: number }): Promise<Message | null> {
    return new Promise<Message | null>((resolve, reject) => {
      const waiter: ReplyWaiter = { resolve, reject, timeout: null };
      if (options?.timeoutMs !== undefined) {
        waiter.timeout = setTimeout(() => {
          this.replyWaiters.delete(waiter);
          reject(new RequestTimeoutError("chat reply"));
        }, options.timeoutMs);
      }
      this.replyWaiters.add(waiter);
    });
  }

  /** Stops listening and drops any in-flight turn. The transcript is kept. */
  abandon(): void {
    this.detachListener?.();
    this.detachListener = null;
    this.reconciler.abandon();
    if (this.draftId) {
      this.messages = this.messages.filter((message) => message.id !== this.draftId);
      this.draftId = null;
      this.notify();
    }
    this.settleWaiters({ message: null });
  }

  private attach(): void {
    if (this.detachListener) {
      return;
    }
    this.detachListener = this.client.addEventListener(
      this.reconciler.listenerId,
      this.reconciler.handleEvent
    );
  }

  private applyDraft(draft: Message): void {
    const index = this.draftId ? this.messages.findIndex((m) => m.id === this.draftId) : -1;
    if (index >= 0) {
      this.messages = this.messages.map((message, i) => (i === index ? draft : message));
    } else {
      this.messages = [...this.messages, draft];
    }
    this.draftId = draft.id;
    this.notify();
  }

  private applyFinal(final: Message): void {
    const index = this.draftId ? this.messages.findIndex((m) => m.id === this.draftId) : -1;
    if (index >= 0) {
      this.messages = this.messages.map((message, i) => (i === index ? final : message));
    } else {
      this.messages = [...this.messages, final];
    }
    this.draftId = null;
    this.notify();
    this.settleWaiters({ message: final });
  }

  private removeDraft(draftId: string): void {
    this.messages = this.messages.filter((message) => message.id !== draftId);
    if (this.draftId === draftId) {
      this.draftId = null;
    }
    this.notify();
  }

  private applyStreamError(message: string): void {
    this.lastErrorValue = message;
    this.appendSystemMessage(message);
    this.settleWaiters({ error: new ServerError({ detail: message }) });
  }

  private appendSystemMessage(content: string): void {
    this.append({
      id: `system-${this.createId()}`,
      role: "system",
      content,
      timestamp: this.now().toISOString(),
    });
  }

  private append(message: Message): void {
    this.messages = [...this.messages, message];
    this.notify();
  }

  private settleWaiters(outcome: { message: Message | null } | { error: Error }): void {
    const waiters = Array.from(this.replyWaiters);
    this.replyWaiters.clear();
    for (const waiter of waiters) {
      if (waiter.timeout) {
        clearTimeout(waiter.timeout);
      }
      if ("error" in outcome) {
        waiter.reject(outcome.error);
      } else {
        waiter.resolve(outcome.message);
      }
    }
  }

  private notify(): void {
    const snapshot = this.transcript;
    for (const listener of Array.from(this.changeListeners)) {
      try {
        listener(snapshot);
      } catch (error) {
        this.logger.warn({ err: error }, "chat_change_listener_failed");
      }
    }
  }
}
