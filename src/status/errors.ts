import {SyncEtaError} from "../util/index.js";

export enum NodeStatusErrorCode {
  HTTP_STATUS = "NODE_STATUS_ERROR_HTTP_STATUS",
  INVALID_JSON = "NODE_STATUS_ERROR_INVALID_JSON",
  INVALID_RESPONSE = "NODE_STATUS_ERROR_INVALID_RESPONSE",
  RPC_ERROR = "NODE_STATUS_ERROR_RPC_ERROR",
}

export type NodeStatusErrorType =
  | {code: NodeStatusErrorCode.HTTP_STATUS; url: string; status: number; body: string}
  | {code: NodeStatusErrorCode.INVALID_JSON; url: string; body: string}
  | {code: NodeStatusErrorCode.INVALID_RESPONSE; url: string; field: string}
  | {code: NodeStatusErrorCode.RPC_ERROR; url: string; rpcCode: number; rpcMessage: string};

export class NodeStatusError extends SyncEtaError<NodeStatusErrorType> {}
