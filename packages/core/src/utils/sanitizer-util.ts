const ACCESS_TOKEN_PATTERN =
  /(access_token\\?"?\s*[=:]\s*\\?"?)[^&\s"'\\,]+/gi;
const BEARER_PATTERN = /(bearer\s+)[\w\-._~]+/gi;

export const REDACTED = "REDACTED";

/**
 * Redact access tokens from a string before it reaches a log line.
 * Covers query strings (`access_token=...`), JSON bodies (escaped or not)
 * and bearer headers.
 */
export function redactAccessTokens(input: string): string {
  return input
    .replace(ACCESS_TOKEN_PATTERN, `$1${REDACTED}`)
    .replace(BEARER_PATTERN, `$1${REDACTED}`);
}

export function redactToken(token: string | undefined): string | undefined {
  if (token === undefined) {
    return undefined;
  }
  return token.length > 0 ? REDACTED : token;
}
