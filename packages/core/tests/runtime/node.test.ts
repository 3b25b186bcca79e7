import { afterEach, describe, expect, it, vi } from "vitest";
import process from "node:process";
import type { AxiosInstance } from "axios";

const loadDotenv = vi.hoisted(() => vi.fn());

vi.mock("dotenv", () => ({
  config: loadDotenv,
  default: { config: loadDotenv },
}));

type MutableEnv = NodeJS.ProcessEnv & Record<string, string | undefined>;

const ORIGINAL_ENV = { ...process.env } as MutableEnv;

const resetEnv = () => {
  process.env = { ...ORIGINAL_ENV };
};

const loadNodeRuntime = async () => {
  vi.resetModules();
  return await import("../../src/runtime/node.ts");
};

describe("runtime/node", () => {
  afterEach(() => {
    resetEnv();
    vi.resetModules();
    vi.restoreAllMocks();
  });

  it("leaves process.env alone when the package root is imported", async () => {
    resetEnv();
    loadDotenv.mockClear();
    const before = { ...process.env };

    vi.resetModules();
    await import("../../src/index.ts");

    expect(loadDotenv).not.toHaveBeenCalled();
    expect(process.env).toEqual(before);
  });

  it("loads .env only when settings are read", async () => {
    resetEnv();
    loadDotenv.mockClear();
    process.env.FB_APP_ID = "1234567890";

    const nodeRuntime = await loadNodeRuntime();
    expect(loadDotenv).not.toHaveBeenCalled();

    nodeRuntime.loadGraphSessionSettings();

    expect(loadDotenv).toHaveBeenCalledTimes(1);
  });

  it("derives settings from process.env", async () => {
    resetEnv();
    process.env.FB_APP_ID = "1234567890";
    process.env.FB_ACCESS_TOKEN = "test-token";
    process.env.FB_DEBUG = "0";
    process.env.GRAPH_ENVIRONMENT = "simulator";
    process.env.GRAPH_API_VERSION = "v19.0";
    process.env.GRAPH_TIMEOUT_MS = "3000";

    const nodeRuntime = await loadNodeRuntime();

    expect(nodeRuntime.loadGraphSessionSettings()).toEqual({
      appId: "1234567890",
      accessToken: "test-token",
      isDebug: false,
      environment: "simulator",
      apiVersion: "v19.0",
      timeoutMs: 3000,
    });
  });

  it("creates a simulator session from the environment", async () => {
    resetEnv();
    process.env.FB_APP_ID = "1234567890";
    process.env.FB_ACCESS_TOKEN = "test-token";
    process.env.FB_DEBUG = "false";
    process.env.GRAPH_ENVIRONMENT = "simulator";
    delete process.env.GRAPH_API_VERSION;
    delete process.env.GRAPH_TIMEOUT_MS;

    const request = vi.fn().mockResolvedValue({
      status: 200,
      data: '{"id":"42","name":"Test User"}',
    });
    const nodeRuntime = await loadNodeRuntime();
    const session = nodeRuntime.createNodeGraphSession({
      http: { request } as unknown as AxiosInstance,
    });

    await session.login(["public_profile"], vi.fn());
    const listener = vi.fn();
    await session.request("me", "GET", { fields: "name" }, listener);

    expect(request).toHaveBeenCalledWith(
      expect.objectContaining({
        url:
          "https://graph.facebook.com/me?fields=name&access_token=test-token",
        timeout: 10_000,
      }),
    );
    expect(listener.mock.calls[0][0].response).toEqual({
      id: "42",
      name: "Test User",
    });
  });
});
