import { ErrorCode } from '../../protocol/error-codes';
import {
  JSONRPC_VERSION,
  JsonRpcErrorResponse,
  JsonRpcResultResponse,
  RequestId,
} from '../../protocol/json-rpc.types';

/**
 * Every error the transport returns over HTTP has the JSON-RPC error shape:
 * {
 *   "jsonrpc": "2.0",
 *   "error": { "code": -32000, "message": "..." },
 *   "id": null
 * }
 */
export class JsonRpcResponseBuilder {
  static result(id: RequestId, result: Record<string, unknown>): JsonRpcResultResponse {
    return { jsonrpc: JSONRPC_VERSION, id, result };
  }

  static error(
    code: ErrorCode | number,
    message: string,
    id: RequestId | null = null,
    data?: unknown,
  ): JsonRpcErrorResponse {
    return {
      jsonrpc: JSONRPC_VERSION,
      id,
      error: data === undefined ? { code, message } : { code, message, data },
    };
  }
}
