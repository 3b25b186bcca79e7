export const GRAPH = {
  BASE_URL: "https://graph.facebook.com",
  EVENT_NAME: "fbconnect",
  ACCESS_TOKEN_PARAM: "access_token",
} as const;

export const SESSION_DEFAULTS = {
  APP_ID: "_UNDEFINED_",
  IS_DEBUG: true,
  ENVIRONMENT: "simulator",
  TIMEOUT_MS: 10_000,
} as const;

export const RESERVED_PATHS = {
  LOGIN: "login",
  SHOW_DIALOG: "showdialog",
  LOGOUT: "logout",
} as const;

export const CALL_ERROR = {
  TYPE: "CallError",
  CODE: -1,
  UNKNOWN_MESSAGE: "Unknown Error",
} as const;

export const ENV_KEYS = {
  APP_ID: "FB_APP_ID",
  ACCESS_TOKEN: "FB_ACCESS_TOKEN",
  DEBUG: "FB_DEBUG",
  ENVIRONMENT: "GRAPH_ENVIRONMENT",
  API_VERSION: "GRAPH_API_VERSION",
  TIMEOUT_MS: "GRAPH_TIMEOUT_MS",
} as const;
