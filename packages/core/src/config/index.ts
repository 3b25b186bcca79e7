export {
  CALL_ERROR,
  ENV_KEYS,
  GRAPH,
  RESERVED_PATHS,
  SESSION_DEFAULTS,
} from "./graph-config.ts";
