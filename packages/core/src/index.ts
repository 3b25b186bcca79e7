export {
  CALL_ERROR,
  ENV_KEYS,
  GRAPH,
  RESERVED_PATHS,
  SESSION_DEFAULTS,
} from "./config/index.ts";

export {
  createGraphSessionSettings,
  graphSessionSettingsSchema,
  resolveEnvValue,
  stringToBoolean,
} from "./runtime/base.ts";
export type { EnvGetter } from "./runtime/base.ts";

export {
  createNodeGraphSession,
  loadGraphSessionSettings,
} from "./runtime/node.ts";
export type { NodeGraphSessionOptions } from "./runtime/node.ts";

export {
  createGraphSession,
  GraphSession,
  isAppIdDefined,
} from "./services/graph-session.ts";
export type {
  GraphSessionDependencies,
  GraphSessionOptions,
} from "./services/graph-session.ts";

export { SimulatorGraphBinding } from "./services/simulator-binding.ts";
export type { SimulatorBindingOptions } from "./services/simulator-binding.ts";

export {
  createStructuredLogger,
  resolveServiceLogger,
} from "./services/logger-service.ts";
export type {
  LoggerOptions,
  ServiceLogger,
  StructuredLogger,
} from "./services/logger-service.ts";

export {
  createCallErrorResponse,
  GraphSessionError,
  isGraphSessionError,
} from "./utils/error-util.ts";
export type { GraphSessionErrorCode } from "./utils/error-util.ts";

export {
  decodeJsonObject,
  graphErrorResponseSchema,
  isGraphErrorResponse,
  normalizeGraphEvent,
} from "./utils/response-normalizer-util.ts";
export type { NormalizedGraphEvent } from "./utils/response-normalizer-util.ts";

export { redactAccessTokens } from "./utils/sanitizer-util.ts";
export { buildGraphUrl } from "./utils/url-builder-util.ts";

export type * from "./types.ts";
