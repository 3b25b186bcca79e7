import { CALL_ERROR } from "../config/graph-config.ts";
import type { GraphErrorResponse } from "../types.ts";

export type GraphSessionErrorCode =
  | "APP_ID_MISSING"
  | "REQUEST_PENDING"
  | "NOT_LOGGED_IN"
  | "DIALOG_UNSUPPORTED"
  | "ACCESS_TOKEN_MISSING"
  | "LISTENER_MISSING"
  | "BINDING_MISSING"
  | "NO_PENDING_REQUEST"
  | "INVALID_SETTINGS";

/**
 * Usage error raised to the caller of a session operation.
 * Graph and transport failures are never thrown; they arrive as events.
 */
export class GraphSessionError extends Error {
  readonly code: GraphSessionErrorCode;

  constructor(code: GraphSessionErrorCode, message: string) {
    super(message);
    this.name = "GraphSessionError";
    this.code = code;
  }
}

export function isGraphSessionError(
  error: unknown,
): error is GraphSessionError {
  return error instanceof GraphSessionError;
}

/**
 * Wrap a call/connection failure in the same envelope a Graph API error uses.
 */
export function createCallErrorResponse(
  message?: string,
): GraphErrorResponse {
  const errorMessage = message && message.length > 0
    ? message
    : CALL_ERROR.UNKNOWN_MESSAGE;

  return {
    error: {
      message: errorMessage,
      type: CALL_ERROR.TYPE,
      code: CALL_ERROR.CODE,
    },
  };
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
