/**
 * Backend error classification.
 *
 * Everything the resilience layer decides hinges on one question: is this a
 * failure of the *endpoint* (bad key, quota, billing) or of the *request*
 * (timeout, anything else)? Only the former moves traffic elsewhere.
 */

export type FailoverReason = "auth" | "rate_limit" | "billing" | "timeout" | "unknown";

export const FAILOVER_REASONS: readonly FailoverReason[] = [
  "auth",
  "rate_limit",
  "billing",
  "timeout",
  "unknown",
];

/**
 * Thrown by a backend that already knows why it failed. The classifier takes
 * `reason` as-is instead of inspecting status codes or message text.
 */
export class FailoverError extends Error {
  readonly reason: FailoverReason;
  readonly providerId?: string;
  readonly status?: number;
  readonly code?: string;

  constructor(
    message: string,
    params: {
      reason: FailoverReason;
      providerId?: string;
      status?: number;
      code?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: params.cause });
    this.name = "FailoverError";
    this.reason = params.reason;
    this.providerId = params.providerId;
    this.status = params.status;
    this.code = params.code;
  }
}

export function isFailoverError(err: unknown): err is FailoverError {
  return err instanceof FailoverError;
}

/**
 * Raised by the rotation layer when every profile is cooling down, or none is
 * registered. Classified as `rate_limit`: the whole rotation is unusable for
 * now, so a fallback in front of it takes over.
 */
export class NoProfileAvailableError extends Error {
  readonly profileCount: number;

  constructor(profileCount: number) {
    super(
      profileCount === 0
        ? "no profile available: no profiles registered"
        : `no profile available: all ${profileCount} profiles are in cooldown`
    );
    this.name = "NoProfileAvailableError";
    this.profileCount = profileCount;
  }
}

/** Reasons that mean "this endpoint is unusable for now", not "this request failed". */
export function isFailoverEligible(reason: FailoverReason): boolean {
  return reason === "auth" || reason === "rate_limit" || reason === "billing";
}

export interface ErrorClassifier {
  classify(err: unknown): FailoverReason;
}

function getStatusCode(err: unknown): number | undefined {
  if (!err || typeof err !== "object") return undefined;
  const candidate =
    ("status" in err ? err.status : undefined) ?? ("statusCode" in err ? err.statusCode : undefined);
  if (typeof candidate === "number") return candidate;
  if (typeof candidate === "string" && /^\d+$/.test(candidate)) {
    return Number(candidate);
  }
  return undefined;
}

function getErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object" || !("code" in err)) return undefined;
  const candidate = err.code;
  if (typeof candidate !== "string") return undefined;
  const trimmed = candidate.trim();
  return trimmed ? trimmed : undefined;
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  if (err && typeof err === "object" && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return "";
}

const TIMEOUT_HINT_RE = /timeout|timed out|deadline exceeded/i;
const TIMEOUT_CODES = ["ETIMEDOUT", "ESOCKETTIMEDOUT", "ECONNRESET", "ECONNABORTED"];

function isTimeoutError(err: unknown): boolean {
  if (!err || typeof err !== "object") return false;
  if ("name" in err && err.name === "TimeoutError") return true;
  const cause = "cause" in err ? err.cause : undefined;
  return Boolean(cause) && TIMEOUT_HINT_RE.test(getErrorMessage(cause));
}

type ErrorPattern = RegExp | string;
const ERROR_PATTERNS = {
  rateLimit: [
    /rate[_ ]limit|too many requests|\b429\b/,
    "quota exceeded",
    "resource has been exhausted",
    "overloaded",
  ],
  timeout: ["timeout", "timed out", "deadline exceeded"],
  billing: ["payment required", "insufficient credits", "insufficient balance", "billing", /\b402\b/],
  auth: [
    /invalid[_ ]?api[_ ]?key/,
    "unauthorized",
    "forbidden",
    "invalid token",
    "no api key",
    "authentication",
    /\b401\b/,
    /\b403\b/,
  ],
} as const;

function matchesErrorPatterns(raw: string, patterns: readonly ErrorPattern[]): boolean {
  if (!raw) return false;
  const value = raw.toLowerCase();
  return patterns.some((pattern) =>
    pattern instanceof RegExp ? pattern.test(value) : value.includes(pattern)
  );
}

/** Classify from message text alone. Order matters: quota text often also says "forbidden". */
export function classifyFailoverReason(raw: string): FailoverReason {
  if (matchesErrorPatterns(raw, ERROR_PATTERNS.rateLimit)) return "rate_limit";
  if (matchesErrorPatterns(raw, ERROR_PATTERNS.timeout)) return "timeout";
  if (matchesErrorPatterns(raw, ERROR_PATTERNS.billing)) return "billing";
  if (matchesErrorPatterns(raw, ERROR_PATTERNS.auth)) return "auth";
  return "unknown";
}

function resolveFailoverReasonFromStatus(status: number): FailoverReason | null {
  if (status === 402) return "billing";
  if (status === 429) return "rate_limit";
  if (status === 401 || status === 403) return "auth";
  if (status === 408 || status === 504) return "timeout";
  return null;
}

export function resolveFailoverReasonFromError(err: unknown): FailoverReason {
  if (isFailoverError(err)) return err.reason;
  if (err instanceof NoProfileAvailableError) return "rate_limit";
  const status = getStatusCode(err);
  if (status) {
    const fromStatus = resolveFailoverReasonFromStatus(status);
    if (fromStatus) return fromStatus;
  }
  const code = (getErrorCode(err) ?? "").toUpperCase();
  if (TIMEOUT_CODES.includes(code)) return "timeout";
  if (isTimeoutError(err)) return "timeout";
  return classifyFailoverReason(getErrorMessage(err));
}

/**
 * Default classifier: HTTP status, then error code, then message text.
 */
export class DefaultErrorClassifier implements ErrorClassifier {
  classify(err: unknown): FailoverReason {
    return resolveFailoverReasonFromError(err);
  }
}
