import {isRecord} from "../util/index.js";
import {fetchJson, invalidResponse} from "./http.js";
import {ConsensusSyncStatus} from "./interface.js";

export const DEFAULT_BEACON_URL = "http://localhost:3500";
/** A beacon node busy syncing can be slow to answer */
export const BEACON_TIMEOUT_MS = 120_000;

/**
 * Sync status of a consensus client from the standard beacon node API
 */
export async function getConsensusSyncStatus(
  beaconUrl: string,
  timeoutMs = BEACON_TIMEOUT_MS
): Promise<ConsensusSyncStatus> {
  const url = `${beaconUrl.replace(/\/+$/, "")}/eth/v1/node/syncing`;
  const body = await fetchJson(url, {
    method: "GET",
    headers: {Accept: "application/json"},
    signal: AbortSignal.timeout(timeoutMs),
  });
  return parseConsensusSyncStatus(url, body);
}

/**
 * `{data: {head_slot: "123", sync_distance: "4", is_syncing: true, ...}}`, slots as decimal strings
 */
export function parseConsensusSyncStatus(url: string, body: unknown): ConsensusSyncStatus {
  const data = isRecord(body) ? body.data : undefined;
  if (!isRecord(data)) throw invalidResponse(url, "data");

  const status: ConsensusSyncStatus = {
    headSlot: parseSlot(url, data, "head_slot"),
    syncDistance: parseSlot(url, data, "sync_distance"),
    isSyncing: parseFlag(url, data, "is_syncing"),
  };
  if (data.is_optimistic !== undefined) status.isOptimistic = parseFlag(url, data, "is_optimistic");
  if (data.el_offline !== undefined) status.elOffline = parseFlag(url, data, "el_offline");
  return status;
}

function parseSlot(url: string, data: Record<string, unknown>, field: string): number {
  const value = data[field];
  if (typeof value !== "string" || !/^\d+$/.test(value)) throw invalidResponse(url, `data.${field}`);
  return Number(value);
}

function parseFlag(url: string, data: Record<string, unknown>, field: string): boolean {
  const value = data[field];
  if (typeof value !== "boolean") throw invalidResponse(url, `data.${field}`);
  return value;
}
