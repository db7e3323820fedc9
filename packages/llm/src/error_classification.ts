const AUTH_ERROR_PATTERNS: RegExp[] = [
  /invalid api key/i,
  /incorrect api key/i,
  /api key.*required/i,
  /missing.*api key/i,
  /authentication failed/i,
  /unauthorized/i,
  /forbidden/i,
];

export const LLM_AUTH_ERROR_CODE = "LLM_AUTH_ERROR";

export function isLlmAuthLikeMessage(message: string): boolean {
  return AUTH_ERROR_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * True for HTTP statuses or provider messages that point at bad credentials,
 * which no amount of retrying will fix.
 */
export function isLlmAuthFailure(status: number | null, detail: string | null): boolean {
  if (status === 401 || status === 403) return true;
  return detail !== null && isLlmAuthLikeMessage(detail);
}
