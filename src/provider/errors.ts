/**
 * Provider Error Classification
 *
 * Design:
 * - Error text from pi-ai (HTTP status, SDK message) is matched against
 *   pattern lists to decide a failure reason
 * - Reasons fold into the three provider error kinds the core surfaces:
 *   ProviderAuth / ProviderTransport / ProviderProtocol
 * - No retry lives here: provider failures end the turn; only the router's
 *   opt-in fallback policy looks at isTransientProviderError()
 */

import { CoreError, describeError, type ErrorKind } from "../errors.js";

// ============== Failure reasons ==============

export type FailureReason =
  | "auth"
  | "billing"
  | "rate_limit"
  | "timeout"
  | "network"
  | "server"
  | "context_overflow"
  | "format"
  | "unknown";

export type ProviderErrorKind = Extract<ErrorKind, "ProviderAuth" | "ProviderTransport" | "ProviderProtocol">;

export class ProviderError extends CoreError {
  readonly reason: FailureReason;
  readonly provider?: string;
  readonly model?: string;

  constructor(
    message: string,
    params: { reason: FailureReason; provider?: string; model?: string; details?: string; cause?: unknown },
  ) {
    super(kindForReason(params.reason), message, { details: params.details ?? message, cause: params.cause });
    this.name = "ProviderError";
    this.reason = params.reason;
    this.provider = params.provider;
    this.model = params.model;
  }
}

export function isProviderError(err: unknown): err is ProviderError {
  return err instanceof ProviderError;
}

// ============== Error Pattern Matching ==============

const RATE_LIMIT_PATTERNS = [
  "rate_limit",
  "rate limit",
  "too many requests",
  "429",
  "resource exhausted",
  "resource_exhausted",
  "overloaded",
];

const TIMEOUT_PATTERNS = ["timeout", "timed out", "deadline exceeded"];

const NETWORK_PATTERNS = [
  "fetch failed",
  "econnrefused",
  "econnreset",
  "enotfound",
  "eai_again",
  "socket hang up",
  "network",
  "connection",
  "could not resolve",
  "dns",
];

const SERVER_PATTERNS = ["500", "502", "503", "504", "internal server error", "bad gateway", "service unavailable"];

const AUTH_PATTERNS = [
  "invalid_api_key",
  "invalid api key",
  "incorrect api key",
  "invalid x-api-key",
  "invalid token",
  "authentication",
  "unauthorized",
  "forbidden",
  "permission_denied",
  "no api key",
  "401",
  "403",
];

const BILLING_PATTERNS = ["402", "payment required", "insufficient credits", "insufficient_quota", "credit balance", "billing", "quota"];

const CONTEXT_OVERFLOW_PATTERNS = [
  "request_too_large",
  "context length exceeded",
  "maximum context length",
  "prompt is too long",
  "exceeds model context window",
];

const FORMAT_PATTERNS = ["invalid request", "malformed", "unexpected token", "json"];

function matchesAny(message: string, patterns: string[]): boolean {
  const lower = message.toLowerCase();
  return patterns.some((p) => lower.includes(p));
}

/**
 * Classify error text into a failure reason
 *
 * Priority: billing > auth > rate_limit > timeout > network > server > context_overflow > format
 */
export function classifyProviderFailure(message: string): FailureReason {
  if (matchesAny(message, BILLING_PATTERNS)) return "billing";
  if (matchesAny(message, AUTH_PATTERNS)) return "auth";
  if (matchesAny(message, RATE_LIMIT_PATTERNS)) return "rate_limit";
  if (matchesAny(message, TIMEOUT_PATTERNS)) return "timeout";
  if (matchesAny(message, NETWORK_PATTERNS)) return "network";
  if (matchesAny(message, SERVER_PATTERNS)) return "server";
  if (matchesAny(message, CONTEXT_OVERFLOW_PATTERNS)) return "context_overflow";
  if (matchesAny(message, FORMAT_PATTERNS)) return "format";
  return "unknown";
}

export function kindForReason(reason: FailureReason): ProviderErrorKind {
  switch (reason) {
    case "auth":
    case "billing":
      return "ProviderAuth";
    case "rate_limit":
    case "timeout":
    case "network":
    case "server":
      return "ProviderTransport";
    case "context_overflow":
    case "format":
    case "unknown":
      return "ProviderProtocol";
  }
}

/**
 * Wrap any thrown value or provider error text as a ProviderError.
 */
export function toProviderError(err: unknown, meta?: { provider?: string; model?: string }): ProviderError {
  if (isProviderError(err)) return err;
  const message = describeError(err);
  return new ProviderError(message, {
    reason: classifyProviderFailure(message),
    provider: meta?.provider,
    model: meta?.model,
    cause: err,
  });
}

export function isTransientProviderError(err: unknown): boolean {
  return isProviderError(err) && err.kind === "ProviderTransport";
}
