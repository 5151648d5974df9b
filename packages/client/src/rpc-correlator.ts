import {
  ConnectionFailedError,
  GatewayError,
  NotConnectedError,
  RequestTimeoutError,
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  encodeRequestFrame,
  type JsonObject,
  type ResponseFrame,
} from "./protocol/frames.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

type PendingRequest = {
  method: string;
  resolve: (response: ResponseFrame) => void;
  reject: (error: Error) => void;
  timeout: ReturnType<typeof setTimeout>;
};

export type RpcCorrelatorConfig = {
  /** Writes one encoded frame. Throwing fails the request immediately. */
  write: (data: string) => void;
  defaultTimeoutMs?: number;
  logger?: Logger;
};

/**
 * Matches response frames to the requests that caused them. Ids are decimal
 * strings counting up from 1 and are never handed out twice by one
 * correlator. Every request settles exactly once: by its response, by its
 * timeout, or by cancelAll.
 */
export class RpcCorrelator {
  private readonly pending = new Map<string, PendingRequest>();
  private nextRequestId = 1;
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly config: RpcCorrelatorConfig) {
    this.defaultTimeoutMs = config.defaultTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = config.logger ?? silentLogger;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get nextId(): string {
    return String(this.nextRequestId);
  }

  send(method: string, params?: JsonObject, timeoutMs?: number): Promise<ResponseFrame> {
    const id = String(this.nextRequestId);
    this.nextRequestId += 1;

    return new Promise<ResponseFrame>((resolve, reject) => {
      const timeout = setTimeout(() => {
        if (!this.pending.delete(id)) {
          return;
        }
        this.logger.warn({ id, method }, "rpc_request_timed_out");
        reject(new RequestTimeoutError(method));
      }, timeoutMs ?? this.defaultTimeoutMs);

      this.pending.set(id, { method, resolve, reject, timeout });

      try {
        this.config.write(encodeRequestFrame({ id, method, params }));
      } catch (error) {
        clearTimeout(timeout);
        this.pending.delete(id);
        reject(
          error instanceof GatewayError
            ? error
            : new ConnectionFailedError(error instanceof Error ? error.message : String(error))
        );
      }
    });
  }

  /** Returns false when nothing was waiting for this id (late or duplicate response). */
  resolve(response: ResponseFrame): boolean {
    const pending = this.pending.get(response.id);
    if (!pending) {
      this.logger.debug({ id: response.id }, "rpc_response_without_pending_request");
      return false;
    }
    clearTimeout(pending.timeout);
    this.pending.delete(response.id);
    pending.resolve(response);
    return true;
  }

  cancelAll(error: Error = new NotConnectedError()): number {
    const entries = Array.from(this.pending.values());
    this.pending.clear();
    for (const pending of entries) {
      clearTimeout(pending.timeout);
      pending.reject(error);
    }
    return entries.length;
  }
}
