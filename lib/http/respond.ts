import { ZodError } from "zod";
import { isAppError, toMsg, type ErrorCode } from "@/lib/errors";

type ErrorBody = { errorCode: ErrorCode | "BAD_REQUEST"; error: string };

function fail(body: ErrorBody, init: ResponseInit) {
  return Response.json(body, init);
}

/** Maps anything a route throws to a JSON error response. */
export function errorResponse(err: unknown, tag: string) {
  if (err instanceof ZodError) {
    const detail = err.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; ");
    return fail({ errorCode: "BAD_REQUEST", error: detail }, { status: 400 });
  }

  if (isAppError(err)) {
    if (err.code === "RATE_LIMITED") {
      return fail(
        { errorCode: err.code, error: err.message },
        { status: err.status, headers: { "Retry-After": String(err.retryAfterSeconds) } }
      );
    }
    if (err.status >= 500) console.error(`[${tag}] ${err.code}`, { msg: err.message });
    return fail({ errorCode: err.code, error: err.message }, { status: err.status });
  }

  console.error(`[${tag}] unhandled error`, { msg: toMsg(err) });
  return fail({ errorCode: "INTERNAL", error: "Internal server error" }, { status: 500 });
}
