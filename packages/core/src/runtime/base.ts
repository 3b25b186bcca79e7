import { z } from "zod";
import { ENV_KEYS, SESSION_DEFAULTS } from "../config/graph-config.ts";
import { GraphSessionError } from "../utils/error-util.ts";
import type { GraphSessionSettings } from "../types.ts";

export type EnvGetter = (key: string) => string | undefined;

const BOOLEAN_TRUE_VALUES = new Set(["true", "1", "yes"]);

export const graphSessionSettingsSchema = z.object({
  appId: z.string(),
  accessToken: z.string().min(1).optional(),
  isDebug: z.boolean(),
  environment: z.enum(["simulator", "device"]),
  apiVersion: z
    .string()
    .regex(/^v\d+\.\d+$/, "Graph API version must look like v19.0")
    .optional(),
  timeoutMs: z.number().int().positive(),
});

export const stringToBoolean = (value: unknown): boolean => {
  if (typeof value === "boolean") {
    return value;
  }

  if (typeof value !== "string") {
    return false;
  }

  return BOOLEAN_TRUE_VALUES.has(value.toLowerCase());
};

/**
 * Read an env value, treating blank strings as unset.
 */
export const resolveEnvValue = (
  getEnv: EnvGetter,
  key: string,
  fallback?: string,
): string | undefined => {
  const value = getEnv(key)?.trim();
  return value ? value : fallback;
};

const resolveDebugFlag = (getEnv: EnvGetter): boolean => {
  const value = resolveEnvValue(getEnv, ENV_KEYS.DEBUG);
  return value === undefined ? SESSION_DEFAULTS.IS_DEBUG : stringToBoolean(value);
};

const resolveTimeout = (getEnv: EnvGetter): number => {
  const value = resolveEnvValue(getEnv, ENV_KEYS.TIMEOUT_MS);
  return value === undefined ? SESSION_DEFAULTS.TIMEOUT_MS : Number(value);
};

/**
 * Resolve session settings from the environment, with explicit overrides
 * taking precedence. Throws `INVALID_SETTINGS` when validation fails.
 */
export const createGraphSessionSettings = (
  getEnv: EnvGetter,
  overrides: Partial<GraphSessionSettings> = {},
): GraphSessionSettings => {
  const candidate = {
    appId: overrides.appId ??
      resolveEnvValue(getEnv, ENV_KEYS.APP_ID, SESSION_DEFAULTS.APP_ID),
    accessToken: overrides.accessToken ??
      resolveEnvValue(getEnv, ENV_KEYS.ACCESS_TOKEN),
    isDebug: overrides.isDebug ?? resolveDebugFlag(getEnv),
    environment: overrides.environment ??
      resolveEnvValue(
        getEnv,
        ENV_KEYS.ENVIRONMENT,
        SESSION_DEFAULTS.ENVIRONMENT,
      ),
    apiVersion: overrides.apiVersion ??
      resolveEnvValue(getEnv, ENV_KEYS.API_VERSION),
    timeoutMs: overrides.timeoutMs ?? resolveTimeout(getEnv),
  };

  const result = graphSessionSettingsSchema.safeParse(candidate);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new GraphSessionError(
      "INVALID_SETTINGS",
      `Invalid Graph session settings (${details})`,
    );
  }

  return result.data;
};
