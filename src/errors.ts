/**
 * Error taxonomy
 *
 * Kinds, not type names:
 * - Provider* errors terminate a turn and are surfaced once
 * - ToolBlocked / ExecutorFailed are recovered locally and become tool results
 * - Cancelled is user-initiated
 * - Internal is the catch-all produced by the turn's panic boundary
 */

export type ErrorKind =
  | "ProviderAuth"
  | "ProviderTransport"
  | "ProviderProtocol"
  | "ToolBlocked"
  | "ExecutorFailed"
  | "Cancelled"
  | "BudgetExhausted"
  | "Internal";

export class CoreError extends Error {
  readonly kind: ErrorKind;
  /** Raw text for a collapsible "details" field */
  readonly details?: string;

  constructor(kind: ErrorKind, message: string, options?: { details?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CoreError";
    this.kind = kind;
    this.details = options?.details;
  }
}

export function isCoreError(err: unknown): err is CoreError {
  return err instanceof CoreError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Panic boundary conversion: anything that is not already a CoreError becomes Internal.
 */
export function toCoreError(err: unknown): CoreError {
  if (isCoreError(err)) return err;
  return new CoreError("Internal", describeError(err), { details: describeError(err), cause: err });
}

export function cancelledError(): CoreError {
  return new CoreError("Cancelled", "Cancelled");
}

// ============== Friendly copy ==============

export type ErrorSuggestion = "Retry" | "Open Settings" | "Retry/Open Settings";

export interface FriendlyError {
  kind: ErrorKind;
  /** One-line user message */
  message: string;
  /** Raw error text, never a stack trace */
  details: string;
  suggestion?: ErrorSuggestion;
}

const COPY_VARIANTS: Array<{ patterns: string[]; message: string }> = [
  {
    patterns: ["unauthorized", "401", "invalid api key", "invalid x-api-key", "authentication"],
    message: "I couldn't connect to the AI service. Please check your API key in Settings.",
  },
  {
    patterns: ["rate limit", "rate_limit", "429", "too many requests"],
    message: "The AI service is busy right now. Please wait a moment and try again.",
  },
  {
    patterns: ["connection", "network", "timeout", "timed out", "dns", "could not resolve", "fetch failed"],
    message: "I'm having trouble connecting to the internet. Please check your network connection.",
  },
  {
    patterns: ["quota", "billing", "insufficient"],
    message: "The AI service quota may have been exceeded. Please check your account billing.",
  },
];

const GENERIC_COPY = "Sorry, I ran into an issue. Please try again.";

/**
 * Pick a user-facing copy variant by keyword fingerprinting the raw error text.
 */
export function friendlyErrorMessage(err: unknown): FriendlyError {
  const core = toCoreError(err);
  const raw = core.details ?? core.message;
  const lower = raw.toLowerCase();

  if (core.kind === "Cancelled") {
    return { kind: core.kind, message: "Cancelled.", details: raw };
  }

  const variant = COPY_VARIANTS.find((v) => v.patterns.some((p) => lower.includes(p)));
  const message = variant?.message ?? GENERIC_COPY;

  let suggestion: ErrorSuggestion | undefined;
  if (core.kind === "ProviderAuth") suggestion = "Open Settings";
  else if (core.kind === "Internal") suggestion = "Retry/Open Settings";
  else if (core.kind === "ProviderTransport") suggestion = "Retry";

  return { kind: core.kind, message, details: raw, ...(suggestion ? { suggestion } : {}) };
}
