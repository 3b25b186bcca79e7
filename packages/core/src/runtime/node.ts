import process from "node:process";
import { config as loadDotenv } from "dotenv";
import { createGraphSessionSettings, type EnvGetter } from "./base.ts";
import {
  createGraphSession,
  type GraphSession,
  type GraphSessionOptions,
} from "../services/graph-session.ts";
import type { GraphSessionSettings } from "../types.ts";

const envGetter: EnvGetter = (key) => process.env[key];

/**
 * Reads settings from `process.env`. A local `.env` file is loaded first;
 * variables already set in the environment keep their values.
 */
export const loadGraphSessionSettings = (
  overrides: Partial<GraphSessionSettings> = {},
): GraphSessionSettings => {
  loadDotenv();
  return createGraphSessionSettings(envGetter, overrides);
};

export interface NodeGraphSessionOptions
  extends Omit<GraphSessionOptions, "settings"> {
  settings?: Partial<GraphSessionSettings>;
}

/**
 * Session configured through {@link loadGraphSessionSettings}.
 */
export const createNodeGraphSession = (
  options: NodeGraphSessionOptions = {},
): GraphSession =>
  createGraphSession({
    ...options,
    settings: loadGraphSessionSettings(options.settings),
  });
