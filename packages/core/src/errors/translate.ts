import { RetrievalError } from "./index.js";
import { HttpError, isCancelError, isTimeoutError } from "../http/errors.js";

/**
 * Translate a transport failure into a RetrievalError
 *
 * - HttpError with a response: HttpStatusError (status kept)
 * - timeout codes: Timeout
 * - cancellation: Timeout when the strategy timer fired, otherwise Cancelled
 * - anything else that is an Error: NetworkError
 */
export function translateHttpError(
  error: unknown,
  strategyId: string,
  opts: { timedOut?: boolean } = {}
): RetrievalError {
  if (error instanceof RetrievalError) return error;

  if (error instanceof HttpError) {
    if (error.response) {
      return new RetrievalError(
        `HTTP ${error.response.status} ${error.response.statusText}`.trim(),
        "HttpStatusError",
        { strategyId, status: error.response.status, raw: error.response.data }
      );
    }
    if (isTimeoutError(error) || (isCancelError(error) && opts.timedOut)) {
      return new RetrievalError(`Request timed out: ${error.message}`, "Timeout", { strategyId, raw: error.code });
    }
    if (isCancelError(error)) {
      return new RetrievalError("Request cancelled", "Cancelled", { strategyId });
    }
    return new RetrievalError(
      `Connection error: ${error.message}`,
      "NetworkError",
      { strategyId, raw: error.code }
    );
  }

  if (error instanceof Error) {
    if (opts.timedOut) {
      return new RetrievalError(`Request timed out: ${error.message}`, "Timeout", { strategyId });
    }
    return new RetrievalError(`Connection error: ${error.message}`, "NetworkError", { strategyId });
  }

  return new RetrievalError("Unknown transport error", "NetworkError", { strategyId, raw: error });
}
