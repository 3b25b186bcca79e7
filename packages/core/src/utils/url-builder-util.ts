import { GRAPH } from "../config/graph-config.ts";
import type { GraphParams } from "../types.ts";

export interface GraphUrlOptions {
  baseUrl?: string;
  apiVersion?: string;
}

export function toQueryString(params: GraphParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.append(key, String(value));
  }
  return search.toString();
}

/**
 * Build a Graph API URL such as `https://graph.facebook.com/v19.0/me?fields=name`.
 * The version segment is only added when one is configured.
 */
export function buildGraphUrl(
  path: string,
  params: GraphParams = {},
  options: GraphUrlOptions = {},
): string {
  const { baseUrl = GRAPH.BASE_URL, apiVersion } = options;
  const segments = [baseUrl.replace(/\/+$/, "")];

  if (apiVersion) {
    segments.push(apiVersion);
  }
  segments.push(path.replace(/^\/+/, ""));

  const url = segments.join("/");
  const query = toQueryString(params);
  return query.length > 0 ? `${url}?${query}` : url;
}
