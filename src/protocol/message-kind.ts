import {
  JsonRpcMessage,
  isJsonRpcErrorResponse,
  isJsonRpcNotification,
  isJsonRpcRequest,
} from './json-rpc.types';

/**
 * Classes of outbound (server to client) traffic written to an event stream.
 * `priming` is the empty event that opens a resumable stream and carries the
 * reconnection hint.
 */
export type MessageKind =
  | 'server-request'
  | 'response'
  | 'error'
  | 'notification'
  | 'priming';

export type Retention = 'always' | 'when-stream-open' | 'never';

export function classifyMessage(message: JsonRpcMessage): MessageKind {
  if (isJsonRpcRequest(message)) {
    return 'server-request';
  }
  if (isJsonRpcNotification(message)) {
    return 'notification';
  }
  if (isJsonRpcErrorResponse(message)) {
    return 'error';
  }
  return 'response';
}

/**
 * Replay must rebuild the request/response pairs a disconnected client would
 * lose. Server-initiated requests open that obligation, replies are only worth
 * keeping once something on the stream is being kept, and notifications carry
 * no delivery guarantee.
 */
export function retentionFor(kind: MessageKind): Retention {
  switch (kind) {
    case 'server-request':
    case 'priming':
      return 'always';
    case 'response':
    case 'error':
      return 'when-stream-open';
    case 'notification':
      return 'never';
  }
}
