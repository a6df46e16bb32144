export type DariErrorKind = "configuration" | "transport" | "api" | "decode" | "closed";

export interface DariErrorOptions {
  message: string;
  httpStatus?: number;
  response?: Response;
  details?: unknown;
  cause?: unknown;
}

export class DariError extends Error {
  public readonly kind: DariErrorKind;
  public readonly httpStatus?: number;
  /** Raw response; its body has already been read by the client. */
  public readonly response?: Response;
  public readonly details?: unknown;

  constructor(kind: DariErrorKind, options: DariErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DariError";
    this.kind = kind;
    this.httpStatus = options.httpStatus;
    this.response = options.response;
    this.details = options.details;
  }
}

export class ConfigurationError extends DariError {
  constructor(message: string, cause?: unknown) {
    super("configuration", { message, cause });
    this.name = "ConfigurationError";
  }
}

export class TransportError extends DariError {
  constructor(message: string, cause?: unknown) {
    super("transport", { message, cause });
    this.name = "TransportError";
  }
}

export class ApiError extends DariError {
  declare readonly httpStatus: number;

  constructor(options: { httpStatus: number; message: string; response?: Response; details?: unknown }) {
    super("api", options);
    this.name = "ApiError";
  }
}

export class DecodeError extends DariError {
  declare readonly httpStatus: number;

  constructor(options: { httpStatus: number; message: string; response?: Response; cause?: unknown }) {
    super("decode", options);
    this.name = "DecodeError";
  }
}

export class ClientClosedError extends DariError {
  constructor() {
    super("closed", { message: "Dari client has been closed" });
    this.name = "ClientClosedError";
  }
}

export function isDariError(error: unknown): error is DariError {
  return error instanceof DariError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}

export function isClientClosed(error: unknown): error is ClientClosedError {
  return error instanceof ClientClosedError;
}
