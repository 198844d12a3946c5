export type ErrorCode = "NOT_FOUND" | "UPSTREAM_ERROR" | "RATE_LIMITED" | "INTERNAL";

export class NotFoundError extends Error {
  readonly code = "NOT_FOUND" as const;
  readonly status = 404;
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

/** A collaborator (GitHub, Gemini) answered with an error or with something we could not use. */
export class UpstreamError extends Error {
  readonly code = "UPSTREAM_ERROR" as const;
  readonly status = 502;
  readonly upstreamStatus: number | null;
  constructor(message: string, options?: ErrorOptions & { upstreamStatus?: number }) {
    super(message, options);
    this.name = "UpstreamError";
    this.upstreamStatus = options?.upstreamStatus ?? null;
  }
}

export class RateLimitedError extends Error {
  readonly code = "RATE_LIMITED" as const;
  readonly status = 429;
  readonly retryAfterSeconds: number;
  constructor(message: string, options?: ErrorOptions & { retryAfterSeconds?: number }) {
    super(message, options);
    this.name = "RateLimitedError";
    this.retryAfterSeconds = options?.retryAfterSeconds ?? 60;
  }
}

export type AppError = NotFoundError | UpstreamError | RateLimitedError;

export function isAppError(err: unknown): err is AppError {
  return (
    err instanceof NotFoundError ||
    err instanceof UpstreamError ||
    err instanceof RateLimitedError
  );
}

export function toMsg(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

export function isQuota(msg: string) {
  const m = msg.toLowerCase();
  return (
    m.includes("resource_exhausted") ||
    m.includes("429") ||
    m.includes("quota exceeded") ||
    m.includes("exceeded your current quota") ||
    m.includes("rate limit")
  );
}
