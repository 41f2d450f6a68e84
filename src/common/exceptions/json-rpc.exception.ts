import { HttpException, HttpStatus } from '@nestjs/common';
import { ErrorCode } from '../../protocol/error-codes';
import { RequestId } from '../../protocol/json-rpc.types';

/**
 * An HTTP-level rejection that renders as a JSON-RPC error body.
 */
export class JsonRpcException extends HttpException {
  constructor(
    readonly rpcCode: ErrorCode,
    message: string,
    status: HttpStatus,
    readonly requestId: RequestId | null = null,
  ) {
    super(message, status);
    this.name = 'JsonRpcException';
  }
}
