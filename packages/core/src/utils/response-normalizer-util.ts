import { z } from "zod";
import { createCallErrorResponse, getErrorMessage } from "./error-util.ts";
import type {
  DecodedResponse,
  GraphErrorResponse,
  RawGraphEvent,
  ResponseEvent,
} from "../types.ts";

const decodedObjectSchema = z.record(z.string(), z.unknown());

export const graphErrorResponseSchema = z.object({
  error: z
    .object({
      message: z.string(),
      type: z.string(),
      code: z.number(),
      error_subcode: z.number().optional(),
      fbtrace_id: z.string().optional(),
    })
    .passthrough(),
});

export type NormalizedGraphEvent = Omit<ResponseEvent, "request">;

type DecodeResult =
  | { success: true; data: DecodedResponse }
  | { success: false; message: string };

/**
 * Decode a Graph response body that is expected to hold a JSON object.
 */
export function decodeJsonObject(body: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    return { success: false, message: getErrorMessage(error) };
  }

  const result = decodedObjectSchema.safeParse(parsed);
  if (!result.success) {
    return { success: false, message: "Response body is not a JSON object" };
  }
  return { success: true, data: result.data };
}

export function isGraphErrorResponse(
  value: unknown,
): value is GraphErrorResponse {
  return graphErrorResponseSchema.safeParse(value).success;
}

function hasErrorField(value: DecodedResponse): boolean {
  return value.error !== undefined && value.error !== null &&
    value.error !== false;
}

/**
 * Normalize a binding event into the listener shape.
 * Call/connection errors and Graph API errors both end up as
 * `isError: true` with `response.error.{message,type,code}`.
 */
export function normalizeGraphEvent(
  event: RawGraphEvent,
): NormalizedGraphEvent {
  const { isError, response, ...attributes } = event;

  if (isError) {
    return {
      ...attributes,
      isError: true,
      response: createCallErrorResponse(response),
      response_raw: response,
    };
  }

  if (response === undefined || response.length === 0) {
    return { ...attributes, isError: false, response };
  }

  if (!response.startsWith("{")) {
    return {
      ...attributes,
      isError: false,
      response,
      response_raw: response,
    };
  }

  const decoded = decodeJsonObject(response);
  if (!decoded.success) {
    return {
      ...attributes,
      isError: true,
      response: createCallErrorResponse(
        `Invalid JSON response: ${decoded.message}`,
      ),
      response_raw: response,
    };
  }

  return {
    ...attributes,
    isError: hasErrorField(decoded.data),
    response: decoded.data,
    response_raw: response,
  };
}
