/**
 * JSON-RPC 2.0 error codes plus the server-defined range used by the transport.
 */
export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  // Server-defined: connection/transport level rejection
  SERVER_ERROR: -32000,
  REQUEST_TIMEOUT: -32001,
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
