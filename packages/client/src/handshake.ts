import {
  PROTOCOL_VERSION,
  selectAuthCredentials,
  type ClientDescriptor,
} from "./config.js";
import { AuthenticationFailedError, ConnectionFailedError } from "./errors.js";
import type { EventDispatcher } from "./event-dispatcher.js";
import { isJsonObject, type JsonObject, type ResponseFrame } from "./protocol/frames.js";

export const CHALLENGE_EVENT = "connect.challenge";
export const CONNECT_METHOD = "connect";
export const HELLO_OK = "hello-ok";

const CHALLENGE_LISTENER_ID = "handshake:challenge";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Polls for the gateway's `connect.challenge` event. The watcher is installed
 * ahead of every other listener and removed again however the wait ends.
 * Resolves false when the window closes without a challenge.
 */
export async function waitForChallenge(params: {
  dispatcher: EventDispatcher;
  timeoutMs: number;
  pollIntervalMs: number;
  /** Returns a reason when the wait should stop early, e.g. the socket closed. */
  abortReason?: () => string | null;
}): Promise<boolean> {
  let received = false;
  const removeWatcher = params.dispatcher.addListener(
    CHALLENGE_LISTENER_ID,
    (eventName) => {
      if (eventName === CHALLENGE_EVENT) {
        received = true;
      }
    },
    { leading: true }
  );

  try {
    let waited = 0;
    while (!received && waited < params.timeoutMs) {
      const reason = params.abortReason?.();
      if (reason) {
        throw new ConnectionFailedError(reason);
      }
      await sleep(params.pollIntervalMs);
      waited += params.pollIntervalMs;
    }
    return received;
  } finally {
    removeWatcher();
  }
}

export function buildConnectParams(config: {
  role: string;
  client: ClientDescriptor;
  token?: string;
  password?: string;
}): JsonObject {
  return {
    minProtocol: PROTOCOL_VERSION,
    maxProtocol: PROTOCOL_VERSION,
    role: config.role,
    client: {
      id: config.client.id,
      displayName: config.client.displayName,
      version: config.client.version,
      platform: config.client.platform,
      mode: config.client.mode,
    },
    auth: selectAuthCredentials(config),
  };
}

/** Returns the hello payload, or throws when the gateway did not accept us. */
export function validateHelloResponse(response: ResponseFrame): JsonObject {
  if (!response.ok) {
    throw new AuthenticationFailedError(response.error?.message ?? "Authentication failed");
  }
  const payload = isJsonObject(response.payload) ? response.payload : null;
  const payloadType = payload?.type;
  if (!payload || payloadType !== HELLO_OK) {
    const described = typeof payloadType === "string" ? payloadType : "nil";
    throw new AuthenticationFailedError(`Unexpected response type: ${described}`);
  }
  return payload;
}
