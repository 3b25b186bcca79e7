import { describe, expect, it } from "vitest";
import {
  decodeJsonObject,
  isGraphErrorResponse,
  normalizeGraphEvent,
} from "../../src/utils/response-normalizer-util.ts";

describe("utils/response-normalizer-util", () => {
  it("wraps call errors and keeps the original message", () => {
    const normalized = normalizeGraphEvent({
      name: "fbconnect",
      type: "request",
      isError: true,
      response: "Request timed out",
    });

    expect(normalized).toEqual({
      name: "fbconnect",
      type: "request",
      isError: true,
      response: {
        error: { message: "Request timed out", type: "CallError", code: -1 },
      },
      response_raw: "Request timed out",
    });
  });

  it("falls back to a generic message for empty call errors", () => {
    const normalized = normalizeGraphEvent({
      name: "fbconnect",
      type: "session",
      phase: "login",
      isError: true,
      response: "",
    });

    expect(normalized.response).toEqual({
      error: { message: "Unknown Error", type: "CallError", code: -1 },
    });
    expect(normalized.phase).toBe("login");
  });

  it("leaves empty bodies untouched", () => {
    const normalized = normalizeGraphEvent({
      name: "fbconnect",
      type: "session",
      phase: "logout",
    });

    expect(normalized).toEqual({
      name: "fbconnect",
      type: "session",
      phase: "logout",
      isError: false,
      response: undefined,
    });
    expect("response_raw" in normalized).toBe(false);
  });

  it("decodes object bodies", () => {
    const normalized = normalizeGraphEvent({
      name: "fbconnect",
      type: "request",
      response: '{"id":"7","name":"Page"}',
    });

    expect(normalized.isError).toBe(false);
    expect(normalized.response).toEqual({ id: "7", name: "Page" });
    expect(normalized.response_raw).toBe('{"id":"7","name":"Page"}');
  });

  it("promotes a decoded error field to an error event", () => {
    const normalized = normalizeGraphEvent({
      name: "fbconnect",
      type: "request",
      response: '{"error":{"message":"Unsupported get request.","type":"GraphMethodException","code":100}}',
    });

    expect(normalized.isError).toBe(true);
    expect(isGraphErrorResponse(normalized.response)).toBe(true);
  });

  it("does not promote a false error field", () => {
    const normalized = normalizeGraphEvent({
      name: "fbconnect",
      type: "request",
      response: '{"error":false,"id":"1"}',
    });

    expect(normalized.isError).toBe(false);
    expect(normalized.response).toEqual({ error: false, id: "1" });
  });

  it("reports malformed JSON as a call error", () => {
    const normalized = normalizeGraphEvent({
      name: "fbconnect",
      type: "request",
      response: "{not json",
    });

    expect(normalized.isError).toBe(true);
    expect(normalized.response_raw).toBe("{not json");
    expect(isGraphErrorResponse(normalized.response)).toBe(true);
    expect(normalized.response).toMatchObject({
      error: { type: "CallError", code: -1 },
    });
  });

  it("decodes only JSON objects", () => {
    expect(decodeJsonObject('{"ok":true}')).toEqual({
      success: true,
      data: { ok: true },
    });
    expect(decodeJsonObject("[1,2]")).toEqual({
      success: false,
      message: "Response body is not a JSON object",
    });
    expect(decodeJsonObject("{").success).toBe(false);
  });

  it("recognizes the Graph error envelope", () => {
    expect(
      isGraphErrorResponse({
        error: { message: "Bad", type: "OAuthException", code: 190 },
      }),
    ).toBe(true);
    expect(isGraphErrorResponse({ error: "Bad" })).toBe(false);
    expect(isGraphErrorResponse("Bad")).toBe(false);
  });
});
