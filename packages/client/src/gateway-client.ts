import {
  parseGatewayConfig,
  type GatewayConfig,
  type GatewayConfigInput,
} from "./config.js";
import {
  AuthenticationFailedError,
  ConnectionFailedError,
  GatewayError,
  NotConnectedError,
  ServerError,
  toErrorMessage,
} from "./errors.js";
import { EventDispatcher, type GatewayEventListener } from "./event-dispatcher.js";
import {
  createWebSocketTransportFactory,
  decodeMessageData,
  describeTransportClose,
  describeTransportError,
  type GatewayTransport,
  type GatewayTransportFactory,
} from "./gateway-transport.js";
import {
  buildConnectParams,
  CONNECT_METHOD,
  validateHelloResponse,
  waitForChallenge,
} from "./handshake.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  decodeServerFrame,
  isJsonObject,
  type JsonObject,
  type JsonValue,
  type ResponseFrame,
} from "./protocol/frames.js";
import { RpcCorrelator } from "./rpc-correlator.js";

export type ConnectionState =
  | { status: "disconnected" }
  | { status: "connecting"; attempt: number }
  | { status: "connected" }
  | { status: "error"; reason: string };

export type GatewayClientOptions = {
  config: GatewayConfigInput | GatewayConfig;
  transportFactory?: GatewayTransportFactory;
  logger?: Logger;
};

export type RequestOptions = {
  timeoutMs?: number;
};

type ActiveConnection = {
  transport: GatewayTransport;
  correlator: RpcCorrelator;
  cleanup: Array<() => void>;
  /** Set once the socket closed or errored underneath us. */
  closedReason: string | null;
  handshakeComplete: boolean;
  disposed: boolean;
};

const NO_CHALLENGE_REASON = "No challenge received";
const CONNECTION_LOST_REASON = "Connection lost";

export function describeConnectionState(state: ConnectionState): string {
  switch (state.status) {
    case "disconnected":
      return "Disconnected";
    case "connecting":
      return "Connecting...";
    case "connected":
      return "Connected";
    case "error":
      return `Error: ${state.reason}`;
  }
}

function stateReasonFor(error: unknown): string {
  if (error instanceof AuthenticationFailedError || error instanceof ConnectionFailedError) {
    return error.detail;
  }
  return toErrorMessage(error);
}

/**
 * Client for one gateway. Each connect() builds a fresh connection (socket,
 * pending-request table, id counter) and authenticates it; event listeners
 * belong to the client and survive reconnects.
 */
export class GatewayClient {
  private readonly config: GatewayConfig;
  private readonly transportFactory: GatewayTransportFactory;
  private readonly logger: Logger;
  private readonly dispatcher: EventDispatcher;
  private connection: ActiveConnection | null = null;
  private connectionState: ConnectionState = { status: "disconnected" };
  private connectionListeners: Set<(state: ConnectionState) => void> = new Set();
  private connectPromise: Promise<void> | null = null;
  private reconnectTimeout: ReturnType<typeof setTimeout> | null = null;
  private reconnectAttempt = 0;
  private shouldReconnect = false;
  private lastErrorValue: string | null = null;
  private hello: JsonObject | null = null;

  constructor(options: GatewayClientOptions) {
    this.config = parseGatewayConfig(options.config);
    this.logger = options.logger ?? silentLogger;
    this.transportFactory =
      options.transportFactory ??
      createWebSocketTransportFactory({
        allowSelfSignedCertificates: this.config.allowSelfSignedCertificates,
      });
    this.dispatcher = new EventDispatcher(this.logger);
  }

  // ============================================================================
  // Connection
  // ============================================================================

  async connect(): Promise<void> {
    if (this.connectionState.status === "connected") {
      return;
    }
    if (this.connectPromise) {
      return this.connectPromise;
    }

    this.shouldReconnect = true;
    const promise = this.openConnection().finally(() => {
      if (this.connectPromise === promise) {
        this.connectPromise = null;
      }
    });
    this.connectPromise = promise;
    return promise;
  }

  disconnect(): void {
    this.shouldReconnect = false;
    this.connectPromise = null;
    this.clearReconnectTimer();
    this.reconnectAttempt = 0;

    const connection = this.connection;
    this.connection = null;
    if (connection) {
      this.disposeConnection(connection, new NotConnectedError(), "Client disconnected");
    }
    this.hello = null;
    this.updateConnectionState({ status: "disconnected" });
  }

  /** Connects unless a connection is already up or being set up. */
  async reconnectIfNeeded(): Promise<void> {
    const status = this.connectionState.status;
    if (status === "connected" || status === "connecting") {
      return;
    }
    await this.connect();
  }

  getConnectionState(): ConnectionState {
    return this.connectionState;
  }

  subscribeConnectionState(listener: (state: ConnectionState) => void): () => void {
    this.connectionListeners.add(listener);
    listener(this.connectionState);
    return () => {
      this.connectionListeners.delete(listener);
    };
  }

  get isConnected(): boolean {
    return this.connectionState.status === "connected";
  }

  get lastError(): string | null {
    return this.lastErrorValue;
  }

  /** The gateway's hello-ok payload from the current connection. */
  get serverHello(): JsonObject | null {
    return this.hello;
  }

  get heartbeatPatterns(): readonly string[] {
    return this.config.heartbeatPatterns;
  }

  get pendingRequestCount(): number {
    return this.connection?.correlator.pendingCount ?? 0;
  }

  // ============================================================================
  // Events
  // ============================================================================

  setEventHandler(handler: GatewayEventListener | null): void {
    this.dispatcher.setPrimaryHandler(handler);
  }

  addEventListener(id: string, listener: GatewayEventListener): () => void {
    return this.dispatcher.addListener(id, listener);
  }

  removeEventListener(id: string): void {
    this.dispatcher.removeListener(id);
  }

  // ============================================================================
  // Requests
  // ============================================================================

  sendRequest(
    method: string,
    params?: JsonObject,
    options?: RequestOptions
  ): Promise<ResponseFrame> {
    const connection = this.connection;
    if (!connection || !connection.handshakeComplete || this.connectionState.status !== "connected") {
      return Promise.reject(new NotConnectedError());
    }
    return connection.correlator.send(method, params, options?.timeoutMs);
  }

  /** Sends a request and returns its payload, throwing ServerError on `ok: false`. */
  async request(method: string, params?: JsonObject, options?: RequestOptions): Promise<JsonValue> {
    const response = await this.sendRequest(method, params, options);
    if (!response.ok) {
      throw new ServerError({
        detail: response.error?.message ?? "Unknown error",
        serverCode: response.error?.code ?? undefined,
        details: response.error?.details,
      });
    }
    return response.payload ?? {};
  }

  async requestPayload(
    method: string,
    params?: JsonObject,
    options?: RequestOptions
  ): Promise<JsonObject> {
    const payload = await this.request(method, params, options);
    return isJsonObject(payload) ? payload : {};
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async openConnection(): Promise<void> {
    this.clearReconnectTimer();
    if (this.connection) {
      const stale = this.connection;
      this.connection = null;
      this.disposeConnection(stale, new NotConnectedError(), "Reconnecting");
    }

    this.updateConnectionState({ status: "connecting", attempt: this.reconnectAttempt });

    let transport: GatewayTransport;
    try {
      transport = this.transportFactory({ url: this.config.url });
    } catch (error) {
      const failure = new ConnectionFailedError(toErrorMessage(error));
      this.lastErrorValue = failure.detail;
      this.updateConnectionState({ status: "error", reason: failure.detail });
      throw failure;
    }

    const connection: ActiveConnection = {
      transport,
      correlator: new RpcCorrelator({
        write: (data) => transport.send(data),
        defaultTimeoutMs: this.config.requestTimeoutMs,
        logger: this.logger,
      }),
      cleanup: [],
      closedReason: null,
      handshakeComplete: false,
      disposed: false,
    };
    this.connection = connection;
    connection.cleanup = [
      transport.onOpen(() => {
        this.logger.debug({ url: this.config.url }, "gateway_transport_open");
      }),
      transport.onMessage((data) => this.handleTransportMessage(connection, data)),
      transport.onClose((event) => this.handleTransportClose(connection, describeTransportClose(event))),
      transport.onError((event) => this.handleTransportError(connection, describeTransportError(event))),
    ];

    try {
      await this.authenticate(connection);
    } catch (error) {
      const failure =
        error instanceof GatewayError ? error : new ConnectionFailedError(toErrorMessage(error));
      if (this.connection === connection) {
        this.failConnection(connection, stateReasonFor(failure));
      }
      this.logger.warn({ err: failure, url: this.config.url }, "gateway_handshake_failed");
      throw failure;
    }
  }

  private async authenticate(connection: ActiveConnection): Promise<void> {
    const received = await waitForChallenge({
      dispatcher: this.dispatcher,
      timeoutMs: this.config.challengeTimeoutMs,
      pollIntervalMs: this.config.challengePollIntervalMs,
      abortReason: () => (connection.disposed ? "Connection closed" : connection.closedReason),
    });

    if (this.connection !== connection) {
      throw new NotConnectedError();
    }
    if (!received) {
      this.failConnection(connection, NO_CHALLENGE_REASON);
      throw new ConnectionFailedError("Server did not send challenge");
    }

    const response = await connection.correlator.send(
      CONNECT_METHOD,
      buildConnectParams(this.config),
      this.config.requestTimeoutMs
    );
    const hello = validateHelloResponse(response);

    if (this.connection !== connection) {
      throw new NotConnectedError();
    }
    connection.handshakeComplete = true;
    this.hello = hello;
    this.reconnectAttempt = 0;
    this.lastErrorValue = null;
    this.updateConnectionState({ status: "connected" });
    this.logger.info({ url: this.config.url, server: hello.server ?? null }, "gateway_connected");
  }

  private handleTransportMessage(connection: ActiveConnection, data: unknown): void {
    if (connection.disposed) {
      return;
    }
    try {
      const text = decodeMessageData(data);
      if (text === null) {
        this.logger.debug({}, "gateway_frame_empty");
        return;
      }
      const frame = decodeServerFrame(text);
      switch (frame.kind) {
        case "response":
          connection.correlator.resolve(frame.frame);
          return;
        case "event":
          this.dispatcher.dispatch(frame.frame.event, frame.frame.payload);
          return;
        case "unknown":
          this.logger.debug({ reason: frame.reason }, "gateway_frame_ignored");
          return;
      }
    } catch (error) {
      this.logger.error({ err: error }, "gateway_frame_handling_failed");
    }
  }

  private handleTransportClose(connection: ActiveConnection, reason: string): void {
    if (connection.disposed) {
      return;
    }
    connection.closedReason = reason;

    if (!connection.handshakeComplete) {
      // The handshake is still running; failing its requests lets it unwind.
      connection.correlator.cancelAll(new ConnectionFailedError(reason));
      return;
    }

    this.logger.warn({ reason }, "gateway_connection_lost");
    this.failConnection(connection, CONNECTION_LOST_REASON);
    this.scheduleReconnect();
  }

  private handleTransportError(connection: ActiveConnection, reason: string): void {
    if (connection.disposed) {
      return;
    }
    this.logger.warn({ reason }, "gateway_transport_error");
    this.lastErrorValue = reason;
    if (!connection.handshakeComplete) {
      connection.closedReason = reason;
      connection.correlator.cancelAll(new ConnectionFailedError(reason));
    }
    // Once connected, the socket follows an error with a close; that path fails the connection.
  }

  private failConnection(connection: ActiveConnection, reason: string): void {
    if (this.connection === connection) {
      this.connection = null;
    }
    this.disposeConnection(connection, new NotConnectedError(), reason);
    this.hello = null;
    this.lastErrorValue = reason;
    this.updateConnectionState({ status: "error", reason });
  }

  private disposeConnection(connection: ActiveConnection, error: Error, reason: string): void {
    if (connection.disposed) {
      return;
    }
    connection.disposed = true;
    for (const cleanup of connection.cleanup) {
      cleanup();
    }
    connection.cleanup = [];
    try {
      connection.transport.close(1000, reason);
    } catch (closeError) {
      this.logger.debug({ err: closeError }, "gateway_transport_close_failed");
    }
    connection.correlator.cancelAll(error);
  }

  private scheduleReconnect(): void {
    const policy = this.config.reconnect;
    if (!policy.enabled || !this.shouldReconnect || this.reconnectTimeout) {
      return;
    }
    if (this.reconnectAttempt >= policy.maxAttempts) {
      this.logger.warn({ attempts: this.reconnectAttempt }, "gateway_reconnect_gave_up");
      return;
    }

    const delay = Math.min(policy.baseDelayMs * 2 ** this.reconnectAttempt, policy.maxDelayMs);
    this.reconnectAttempt += 1;
    this.logger.info({ delayMs: delay, attempt: this.reconnectAttempt }, "gateway_reconnect_scheduled");

    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      this.connect().catch((error: unknown) => {
        this.logger.warn({ err: error }, "gateway_reconnect_failed");
        this.scheduleReconnect();
      });
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
  }

  private updateConnectionState(next: ConnectionState): void {
    this.connectionState = next;
    this.logger.debug({ state: next }, "gateway_connection_state");
    for (const listener of Array.from(this.connectionListeners)) {
      try {
        listener(next);
      } catch (error) {
        this.logger.warn({ err: error }, "connection_state_listener_failed");
      }
    }
  }
}
