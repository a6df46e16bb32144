export { DariClient } from "./client";
export {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
  clientOptionsFromEnv,
  clientOptionsSchema,
  resolveClientConfig,
} from "./config";
export {
  ApiError,
  ClientClosedError,
  ConfigurationError,
  DariError,
  DecodeError,
  TransportError,
  isApiError,
  isClientClosed,
  isConfigurationError,
  isDariError,
  isDecodeError,
  isTransportError,
} from "./errors";
export type { DariErrorKind } from "./errors";
export { operations } from "./operations";
export type { OperationDescriptor, OperationId } from "./operations";
export type * from "./types";
