import {FetchError, fetch} from "../util/fetch.js";
import {NodeStatusError, NodeStatusErrorCode} from "./errors.js";

/**
 * Limits the amount of response text kept in errors
 */
const maxStringLengthToPrint = 500;

/**
 * Fetch `url` and parse its JSON body. A non 2xx status or a body that is not JSON, such as the HTML page of a
 * wrong url, throws with the start of the body.
 */
export async function fetchJson(url: string, init: RequestInit): Promise<unknown> {
  const res = await fetch(url, init);
  const body = await res.text().catch((e: unknown) => {
    throw new FetchError(url, e);
  });

  if (!res.ok) {
    throw new NodeStatusError(
      {code: NodeStatusErrorCode.HTTP_STATUS, url, status: res.status, body: body.slice(0, maxStringLengthToPrint)},
      `${url} responded ${res.status} ${res.statusText}`
    );
  }

  try {
    return JSON.parse(body);
  } catch (e) {
    throw new NodeStatusError(
      {code: NodeStatusErrorCode.INVALID_JSON, url, body: body.slice(0, maxStringLengthToPrint)},
      `${url} did not respond with JSON: ${e instanceof Error ? e.message : String(e)}`
    );
  }
}

export function invalidResponse(url: string, field: string): NodeStatusError {
  return new NodeStatusError(
    {code: NodeStatusErrorCode.INVALID_RESPONSE, url, field},
    `Invalid response from ${url}: missing or malformed ${field}`
  );
}
