import { z } from "zod";
import { DEFAULT_HEARTBEAT_PATTERNS } from "../config.js";
import type { GatewayEventListener } from "../event-dispatcher.js";
import { safeRandomId } from "../gateway-transport.js";
import { silentLogger, type Logger } from "../logger.js";
import { isJsonObject, JsonValueSchema, type JsonValue } from "../protocol/frames.js";
import { filterHeartbeat } from "./heartbeat.js";
import { extractMessageContent, readMessageTimestamp, type Message } from "./message-content.js";

export const PRIMARY_EVENT = "chat";
export const SECONDARY_EVENT = "agent";

export type StreamSource = "none" | "primary" | "secondary";

export type StreamingSessionState = {
  activeSource: StreamSource;
  accumulatedText: string;
  accumulatedReasoning: string;
  isOpen: boolean;
  draftId: string | null;
  runId: string | null;
};

export type StreamReconcilerCallbacks = {
  onDraft?: (message: Message) => void;
  onFinal?: (message: Message) => void;
  onError?: (message: string) => void;
  /** A draft already shown turned out to hold only heartbeat text. */
  onDiscard?: (draftId: string) => void;
};

export type StreamReconcilerOptions = StreamReconcilerCallbacks & {
  sessionKey: string;
  heartbeatPatterns?: readonly string[];
  logger?: Logger;
  createId?: () => string;
};

const ChatEventPayloadSchema = z.object({
  sessionKey: z.string(),
  runId: z.string().optional(),
  state: z.string(),
  delta: z.string().optional(),
  thinking: z.string().optional(),
  message: JsonValueSchema.optional(),
  errorMessage: z.string().optional(),
});

const AgentEventPayloadSchema = z.object({
  sessionKey: z.string(),
  runId: z.string().optional(),
  stream: z.string(),
  data: z
    .object({
      delta: z.string().optional(),
      thinking: z.string().optional(),
      phase: z.string().optional(),
      error: JsonValueSchema.optional(),
    })
    .default({}),
});

type ChatEventPayload = z.infer<typeof ChatEventPayloadSchema>;
type AgentEventPayload = z.infer<typeof AgentEventPayloadSchema>;

type StreamChunk = {
  text: string;
  reasoning: string;
  runId?: string;
};

function describeAgentError(error: JsonValue | undefined): string {
  if (typeof error === "string" && error.length > 0) {
    return error;
  }
  if (isJsonObject(error) && typeof error.message === "string") {
    return error.message;
  }
  return "Agent run failed";
}

function emptyState(): StreamingSessionState {
  return {
    activeSource: "none",
    accumulatedText: "",
    accumulatedReasoning: "",
    isOpen: false,
    draftId: null,
    runId: null,
  };
}

/**
 * Merges the gateway's two narrations of one assistant turn for a single
 * conversation. Whichever channel delivers the first chunk owns the turn;
 * chunks from the other channel are dropped until the turn finalizes. Only
 * the primary channel's final event finalizes, so its message id and
 * timestamp win.
 */
export class StreamReconciler {
  readonly sessionKey: string;
  private readonly heartbeatPatterns: readonly string[];
  private readonly logger: Logger;
  private readonly createId: () => string;
  private readonly callbacks: StreamReconcilerCallbacks;
  private state: StreamingSessionState = emptyState();

  constructor(options: StreamReconcilerOptions) {
    this.sessionKey = options.sessionKey;
    this.heartbeatPatterns = options.heartbeatPatterns ?? DEFAULT_HEARTBEAT_PATTERNS;
    this.logger = options.logger ?? silentLogger;
    this.createId = options.createId ?? safeRandomId;
    this.callbacks = {
      onDraft: options.onDraft,
      onFinal: options.onFinal,
      onError: options.onError,
      onDiscard: options.onDiscard,
    };
  }

  get listenerId(): string {
    return `stream:${this.sessionKey}`;
  }

  get snapshot(): StreamingSessionState {
    return { ...this.state };
  }

  /** Suitable for `GatewayClient.addEventListener(reconciler.listenerId, reconciler.handleEvent)`. */
  readonly handleEvent: GatewayEventListener = (eventName, payload) => {
    if (eventName === PRIMARY_EVENT) {
      const parsed = ChatEventPayloadSchema.safeParse(payload);
      if (!parsed.success) {
        this.logger.debug({ eventName }, "stream_event_unparseable");
        return;
      }
      if (parsed.data.sessionKey === this.sessionKey) {
        this.handlePrimary(parsed.data);
      }
      return;
    }

    if (eventName === SECONDARY_EVENT) {
      const parsed = AgentEventPayloadSchema.safeParse(payload);
      if (!parsed.success) {
        this.logger.debug({ eventName }, "stream_event_unparseable");
        return;
      }
      if (parsed.data.sessionKey === this.sessionKey) {
        this.handleSecondary(parsed.data);
      }
    }
  };

  /** Drops the in-flight turn without emitting anything. */
  abandon(): void {
    this.reset();
  }

  private handlePrimary(payload: ChatEventPayload): void {
    switch (payload.state) {
      case "delta":
        this.applyChunk("primary", {
          text: payload.delta ?? "",
          reasoning: payload.thinking ?? "",
          runId: payload.runId,
        });
        return;
      case "final":
        this.finalizeFromPrimary(payload);
        return;
      case "error":
        this.callbacks.onError?.(payload.errorMessage ?? "Chat run failed");
        this.promoteDraft();
        this.reset();
        return;
      case "aborted":
        this.promoteDraft();
        this.reset();
        return;
      default:
        this.logger.debug({ state: payload.state }, "stream_primary_state_ignored");
    }
  }

  private handleSecondary(payload: AgentEventPayload): void {
    if (payload.stream === "assistant") {
      this.applyChunk("secondary", {
        text: payload.data.delta ?? "",
        reasoning: payload.data.thinking ?? "",
        runId: payload.runId,
      });
      return;
    }

    if (payload.stream === "lifecycle") {
      // Finalization waits for the primary final event.
      if (payload.data.phase === "error") {
        this.callbacks.onError?.(describeAgentError(payload.data.error));
      }
    }
  }

  private applyChunk(source: "primary" | "secondary", chunk: StreamChunk): void {
    const owner = this.state.activeSource;
    if (owner !== "none" && owner !== source) {
      this.logger.debug({ source, owner }, "stream_chunk_discarded");
      return;
    }
    this.state.activeSource = source;
    this.state.isOpen = true;
    if (chunk.runId && !this.state.runId) {
      this.state.runId = chunk.runId;
    }

    const text = filterHeartbeat(chunk.text, this.heartbeatPatterns);
    if (text.length === 0 && chunk.reasoning.length === 0) {
      return;
    }

    this.state.accumulatedText += text;
    this.state.accumulatedReasoning += chunk.reasoning;
    if (this.hasVisibleContent()) {
      this.callbacks.onDraft?.(this.buildDraft());
    } else {
      this.discardDraft();
    }
  }

  private finalizeFromPrimary(payload: ChatEventPayload): void {
    if (this.state.activeSource === "secondary") {
      this.promoteDraft();
      this.reset();
      return;
    }

    const message = isJsonObject(payload.message) ? payload.message : null;
    const extracted = message
      ? extractMessageContent(message.content)
      : extractMessageContent(payload.message);
    const text = filterHeartbeat(extracted.text, this.heartbeatPatterns);
    const thinking = extracted.thinking ?? this.state.accumulatedReasoning;

    if (text.length === 0 && thinking.length === 0) {
      this.promoteDraft();
      this.reset();
      return;
    }

    const serverId = typeof message?.id === "string" ? message.id : undefined;
    const timestamp = message ? readMessageTimestamp(message) : undefined;

    this.callbacks.onFinal?.({
      id: serverId ?? this.fallbackMessageId(payload.runId),
      role: "assistant",
      content: text.length > 0 ? text : this.visibleText(),
      ...(thinking.length > 0 ? { thinking } : {}),
      ...(timestamp !== undefined ? { timestamp } : {}),
    });
    this.reset();
  }

  /** Emits the accumulated draft as final, if there is anything to keep. */
  private promoteDraft(): void {
    if (!this.hasVisibleContent()) {
      this.discardDraft();
      return;
    }
    const draft = this.buildDraft();
    this.callbacks.onFinal?.({ ...draft, id: this.fallbackMessageId(undefined) });
  }

  private fallbackMessageId(runId: string | undefined): string {
    return runId ?? this.state.runId ?? `assistant-${this.createId()}`;
  }

  // A sentinel can arrive split across chunks, so the whole text is checked too.
  private visibleText(): string {
    return filterHeartbeat(this.state.accumulatedText, this.heartbeatPatterns);
  }

  private hasVisibleContent(): boolean {
    return this.visibleText().length > 0 || this.state.accumulatedReasoning.length > 0;
  }

  private discardDraft(): void {
    const draftId = this.state.draftId;
    if (draftId) {
      this.state.draftId = null;
      this.callbacks.onDiscard?.(draftId);
    }
  }

  private buildDraft(): Message {
    if (!this.state.draftId) {
      this.state.draftId = `streaming-${this.createId()}`;
    }
    return {
      id: this.state.draftId,
      role: "assistant",
      content: this.visibleText(),
      ...(this.state.accumulatedReasoning.length > 0
        ? { thinking: this.state.accumulatedReasoning }
        : {}),
    };
  }

  private reset(): void {
    this.state = emptyState();
  }
}
