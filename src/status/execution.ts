import {isRecord} from "../util/index.js";
import {NodeStatusError, NodeStatusErrorCode} from "./errors.js";
import {fetchJson, invalidResponse} from "./http.js";
import {ExecutionSyncProgress, ExecutionSyncStatus} from "./interface.js";

export const DEFAULT_EXECUTION_URL = "http://localhost:8545";
export const EXECUTION_TIMEOUT_MS = 10_000;

/**
 * Sync status of an execution client from its `eth_syncing` JSON-RPC method
 */
export async function getExecutionSyncStatus(
  executionUrl: string,
  timeoutMs = EXECUTION_TIMEOUT_MS
): Promise<ExecutionSyncStatus> {
  const body = await fetchJson(executionUrl, {
    method: "POST",
    headers: {"Content-Type": "application/json"},
    body: JSON.stringify({jsonrpc: "2.0", method: "eth_syncing", params: [], id: 1}),
    signal: AbortSignal.timeout(timeoutMs),
  });
  return parseExecutionSyncStatus(executionUrl, body);
}

/**
 * `{result: false}` once synced, else block numbers as hex quantities. Client specific fields, such as the
 * `stages` of some clients, are dropped.
 */
export function parseExecutionSyncStatus(url: string, body: unknown): ExecutionSyncStatus {
  if (!isRecord(body)) throw invalidResponse(url, "result");

  const {error, result} = body;
  if (error !== undefined) {
    const rpcCode = isRecord(error) && typeof error.code === "number" ? error.code : 0;
    const rpcMessage = isRecord(error) && typeof error.message === "string" ? error.message : parseRpcErrorCode(rpcCode);
    throw new NodeStatusError(
      {code: NodeStatusErrorCode.RPC_ERROR, url, rpcCode, rpcMessage},
      `JSON RPC error from ${url}: ${rpcMessage}`
    );
  }

  // Some clients answer null rather than false once synced
  if (result === false || result === null) {
    return {synced: true};
  }
  if (!isRecord(result)) throw invalidResponse(url, "result");

  const status: ExecutionSyncProgress = {
    synced: false,
    currentBlock: parseQuantity(url, result, "currentBlock"),
    highestBlock: parseQuantity(url, result, "highestBlock"),
  };
  if (result.startingBlock !== undefined) status.startingBlock = parseQuantity(url, result, "startingBlock");
  return status;
}

function parseQuantity(url: string, result: Record<string, unknown>, field: string): number {
  const value = result[field];
  if (typeof value !== "string" || !/^0x[0-9a-f]+$/i.test(value)) throw invalidResponse(url, `result.${field}`);
  return parseInt(value.slice(2), 16);
}

/**
 * JSON RPC spec errors https://www.jsonrpc.org/specification#response_object
 */
function parseRpcErrorCode(code: number): string {
  if (code === -32700) return "Parse request error";
  if (code === -32600) return "Invalid request object";
  if (code === -32601) return "Method not found";
  if (code === -32602) return "Invalid params";
  if (code === -32603) return "Internal error";
  if (code <= -32000 && code >= -32099) return "Server error";
  return `Unknown error code ${code}`;
}
