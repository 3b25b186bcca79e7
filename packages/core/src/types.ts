/**
 * Shared TypeScript types for Graph Session.
 * Covers the raw binding events, the normalized listener events and the
 * binding contract the native SDK integration implements.
 */

// ============================================================================
// GRAPH API TYPES
// ============================================================================

export type GraphHttpMethod = "GET" | "POST" | "DELETE";

export type GraphParamValue = string | number | boolean;

export type GraphParams = Record<string, GraphParamValue>;

export interface GraphErrorDetails {
  message: string;
  type: string;
  code: number;
  error_subcode?: number;
  fbtrace_id?: string;
}

export interface GraphErrorResponse {
  error: GraphErrorDetails;
}

// ============================================================================
// BINDING EVENT TYPES
// ============================================================================

export type GraphEventType = "session" | "request" | "dialog";

export type SessionPhase =
  | "login"
  | "loginFailed"
  | "loginCancelled"
  | "logout";

/**
 * Event as delivered by a binding, before normalization.
 * `response` is an error message when `isError` is set, otherwise the body.
 */
export interface RawGraphEvent {
  name: "fbconnect";
  type: GraphEventType;
  phase?: SessionPhase;
  token?: string;
  didComplete?: boolean;
  isError?: boolean;
  response?: string;
}

export type RawGraphEventListener = (event: RawGraphEvent) => void;

// ============================================================================
// SESSION TYPES
// ============================================================================

export type PendingRequestParams =
  | readonly string[]
  | GraphParams
  | undefined;

/**
 * Graph path of the call, or one of the reserved paths
 * `"login"`, `"showdialog"` and `"logout"`.
 */
export interface PendingRequest {
  path: string;
  method?: GraphHttpMethod;
  params: PendingRequestParams;
  listener: ResponseEventListener;
}

export type DecodedResponse = Record<string, unknown>;

export type ResponseBody =
  | GraphErrorResponse
  | DecodedResponse
  | string
  | undefined;

export interface ResponseEvent {
  name: "fbconnect";
  type: GraphEventType;
  phase?: SessionPhase;
  token?: string;
  didComplete?: boolean;
  isError: boolean;
  response: ResponseBody;
  response_raw?: string;
  request: PendingRequest;
}

export type ResponseEventListener = (event: ResponseEvent) => void;

/**
 * Contract for the platform SDK. The session registers its completion
 * handler through `login`; every later call reports back through it.
 */
export interface GraphBinding {
  login(
    appId: string,
    listener: RawGraphEventListener,
    permissions: readonly string[],
  ): void | Promise<void>;
  request(
    path: string,
    method: GraphHttpMethod,
    params: GraphParams,
  ): void | Promise<void>;
  showDialog(params: GraphParams): void | Promise<void>;
  logout(): void | Promise<void>;
}

// ============================================================================
// CONFIGURATION & LOGGING TYPES
// ============================================================================

export type GraphEnvironment = "simulator" | "device";

export interface GraphSessionSettings {
  appId: string;
  accessToken?: string;
  isDebug: boolean;
  environment: GraphEnvironment;
  apiVersion?: string;
  timeoutMs: number;
}

export interface LogMetadata {
  [key: string]: unknown;
}
