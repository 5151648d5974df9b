export { GatewayClient, describeConnectionState } from "./gateway-client.js";
export type { ConnectionState, GatewayClientOptions, RequestOptions } from "./gateway-client.js";

export {
  CLIENT_VERSION,
  DEFAULT_HEARTBEAT_PATTERNS,
  GatewayConfigError,
  GatewayConfigSchema,
  PROTOCOL_VERSION,
  loadGatewayConfig,
  parseGatewayConfig,
  resolveConfigPath,
  resolveTidewireHome,
  selectAuthCredentials,
} from "./config.js";
export type {
  AuthCredentials,
  ClientDescriptor,
  GatewayConfig,
  GatewayConfigInput,
  ReconnectConfig,
} from "./config.js";

export {
  AuthenticationFailedError,
  ConnectionFailedError,
  DecodingError,
  GatewayError,
  NotConnectedError,
  RequestTimeoutError,
  ServerError,
  isGatewayError,
  toErrorMessage,
} from "./errors.js";
export type { GatewayErrorCode } from "./errors.js";

export {
  createChildLogger,
  createRootLogger,
  resolveLogConfig,
  silentLogger,
} from "./logger.js";
export type { LogFormat, LogLevel, Logger, ResolvedLogConfig } from "./logger.js";

export {
  decodeRequestFrame,
  decodeServerFrame,
  encodeEventFrame,
  encodeRequestFrame,
  encodeResponseFrame,
  isJsonObject,
} from "./protocol/frames.js";
export type {
  EventFrame,
  JsonObject,
  JsonValue,
  RequestFrame,
  ResponseFrame,
  ServerFrame,
} from "./protocol/frames.js";

export { RpcCorrelator, DEFAULT_REQUEST_TIMEOUT_MS } from "./rpc-correlator.js";
export { EventDispatcher } from "./event-dispatcher.js";
export type { GatewayEventListener } from "./event-dispatcher.js";

export {
  createWebSocketTransportFactory,
  decodeMessageData,
  describeTransportClose,
  describeTransportError,
} from "./gateway-transport.js";
export type { GatewayTransport, GatewayTransportFactory } from "./gateway-transport.js";

export { StreamReconciler, PRIMARY_EVENT, SECONDARY_EVENT } from "./streaming/stream-reconciler.js";
export type {
  StreamReconcilerOptions,
  StreamSource,
  StreamingSessionState,
} from "./streaming/stream-reconciler.js";
export { filterHeartbeat, filterTranscript, isHeartbeatText } from "./streaming/heartbeat.js";
export { extractMessageContent, messageFromServerPayload } from "./streaming/message-content.js";
export type { Message, MessageRole } from "./streaming/message-content.js";

export { ChatSession, CHAT_HISTORY_METHOD, CHAT_SEND_METHOD } from "./chat/chat-session.js";
export type { ChatGatewayClient, ChatSessionOptions } from "./chat/chat-session.js";

export { createDemoTransport, createDemoTransportFactory, loadDemoData } from "./demo/demo-gateway.js";
export type { DemoGatewayOptions } from "./demo/demo-gateway.js";
