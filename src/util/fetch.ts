import {SyncEtaError} from "./errors.js";

export enum FetchErrorCode {
  /** Connection refused, host not found, socket closed */
  FAILED = "FETCH_ERROR_FAILED",
  /** Malformed url */
  INPUT = "FETCH_ERROR_INPUT",
  /** Aborted by the caller or by the request timeout */
  ABORTED = "FETCH_ERROR_ABORTED",
  UNKNOWN = "FETCH_ERROR_UNKNOWN",
}

export type FetchErrorType = {code: FetchErrorCode; url: string; reason: string};

/**
 * Native fetch rejects with an opaque `TypeError: fetch failed`, the reason is in its cause:
 * ```
 * TypeError: fetch failed
 *   cause: Error: connect ECONNREFUSED 127.0.0.1:3500
 *     code: 'ECONNREFUSED'
 * ```
 */
export class FetchError extends SyncEtaError<FetchErrorType> {
  constructor(url: string, e: unknown) {
    const type = getFetchErrorType(url, e);
    super(type, `Request to ${url} failed, reason: ${type.reason}`);
  }
}

export function isFetchError(e: unknown): e is FetchError {
  return e instanceof FetchError;
}

/**
 * `fetch` rejecting with a `FetchError` that names the url and the underlying reason
 */
async function wrappedFetch(url: string, init?: RequestInit): Promise<Response> {
  try {
    return await fetch(url, init);
  } catch (e) {
    throw new FetchError(url, e);
  }
}

export {wrappedFetch as fetch};

function getFetchErrorType(url: string, e: unknown): FetchErrorType {
  // AbortSignal.timeout() aborts with a TimeoutError, AbortController.abort() with an AbortError
  if (e instanceof DOMException && (e.name === "AbortError" || e.name === "TimeoutError")) {
    return {code: FetchErrorCode.ABORTED, url, reason: e.name === "TimeoutError" ? "timeout" : "aborted"};
  }

  const cause = e instanceof TypeError ? getCause(e) : undefined;
  if (cause !== undefined) {
    // Invalid urls carry the rejected input, the cause message is the more detailed one
    if ("input" in cause) {
      return {code: FetchErrorCode.INPUT, url, reason: cause.message};
    }
    const code = "code" in cause && typeof cause.code === "string" ? cause.code : undefined;
    return {code: FetchErrorCode.FAILED, url, reason: code ?? cause.message};
  }

  return {code: FetchErrorCode.UNKNOWN, url, reason: e instanceof Error ? e.message : String(e)};
}

function getCause(e: Error): Error | undefined {
  return "cause" in e && e.cause instanceof Error ? e.cause : undefined;
}
