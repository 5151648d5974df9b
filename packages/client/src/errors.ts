export type GatewayErrorCode =
  | "not_connected"
  | "authentication_failed"
  | "request_timeout"
  | "server_error"
  | "decoding_error"
  | "connection_failed";

export abstract class GatewayError extends Error {
  abstract readonly code: GatewayErrorCode;
}

export class NotConnectedError extends GatewayError {
  readonly code = "not_connected";

  constructor() {
    super("Not connected to server");
    this.name = "NotConnectedError";
  }
}

export class AuthenticationFailedError extends GatewayError {
  readonly code = "authentication_failed";
  readonly detail: string;

  constructor(detail: string) {
    super(`Authentication failed: ${detail}`);
    this.name = "AuthenticationFailedError";
    this.detail = detail;
  }
}

export class RequestTimeoutError extends GatewayError {
  readonly code = "request_timeout";
  readonly method: string;

  constructor(method: string) {
    super(`Request timed out: ${method}`);
    this.name = "RequestTimeoutError";
    this.method = method;
  }
}

export class ServerError extends GatewayError {
  readonly code = "server_error";
  readonly detail: string;
  readonly serverCode?: number | string;
  readonly details?: unknown;

  constructor(params: { detail: string; serverCode?: number | string; details?: unknown }) {
    super(`Server error: ${params.detail}`);
    this.name = "ServerError";
    this.detail = params.detail;
    this.serverCode = params.serverCode;
    this.details = params.details;
  }
}

export class DecodingError extends GatewayError {
  readonly code = "decoding_error";
  readonly detail: string;

  constructor(detail: string) {
    super(`Decoding error: ${detail}`);
    this.name = "DecodingError";
    this.detail = detail;
  }
}

export class ConnectionFailedError extends GatewayError {
  readonly code = "connection_failed";
  readonly detail: string;

  constructor(detail: string) {
    super(`Connection failed: ${detail}`);
    this.name = "ConnectionFailedError";
    this.detail = detail;
  }
}

type GatewayErrorByCode = {
  not_connected: NotConnectedError;
  authentication_failed: AuthenticationFailedError;
  request_timeout: RequestTimeoutError;
  server_error: ServerError;
  decoding_error: DecodingError;
  connection_failed: ConnectionFailedError;
};

export function isGatewayError(value: unknown): value is GatewayError;
export function isGatewayError<TCode extends GatewayErrorCode>(
  value: unknown,
  code: TCode
): value is GatewayErrorByCode[TCode];
export function isGatewayError(value: unknown, code?: GatewayErrorCode): boolean {
  if (!(value instanceof GatewayError)) {
    return false;
  }
  return code === undefined || value.code === code;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    if (typeof error.message === "string" && error.message.trim().length > 0) {
      return error.message.trim();
    }
  }
  return String(error);
}
