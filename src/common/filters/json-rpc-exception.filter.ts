import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorCodes } from '../../protocol/error-codes';
import { JsonRpcResponseBuilder } from '../dto/json-rpc-response.dto';
import { StoreBackendError } from '../errors/store-backend.error';
import { JsonRpcException } from '../exceptions/json-rpc.exception';

/**
 * Renders every uncaught error as a JSON-RPC error response:
 * {
 *   "jsonrpc": "2.0",
 *   "error": { "code": -32603, "message": "..." },
 *   "id": null
 * }
 */
@Catch()
export class JsonRpcExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(JsonRpcExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let code: number = ErrorCodes.INTERNAL_ERROR;
    let message = 'An unexpected error occurred';
    let id: string | number | null = null;

    if (exception instanceof JsonRpcException) {
      status = exception.getStatus();
      code = exception.rpcCode;
      message = exception.message;
      id = exception.requestId;
    } else if (exception instanceof HttpException) {
      status = exception.getStatus();
      code = status < 500 ? ErrorCodes.INVALID_REQUEST : ErrorCodes.INTERNAL_ERROR;
      message = this.messageOf(exception);
    } else if (exception instanceof StoreBackendError) {
      status = HttpStatus.SERVICE_UNAVAILABLE;
      message = exception.message;
      this.logger.error(`Store backend failure: ${exception.message}`);
    } else if (exception instanceof Error) {
      message = exception.message;
      this.logger.error(`Unhandled error: ${message}`, exception.stack);
    }

    const sanitizedMessage = this.sanitizeMessage(message, status);

    this.logger.warn(
      `HTTP ${status} ${request.method} ${request.url} - ${code}: ${sanitizedMessage}`,
    );

    if (response.headersSent) {
      // Mid-stream failure: the status line is gone, so end the stream
      response.end();
      return;
    }

    response.status(status).json(JsonRpcResponseBuilder.error(code, sanitizedMessage, id));
  }

  private messageOf(exception: HttpException): string {
    const body = exception.getResponse();
    if (typeof body === 'string') {
      return body;
    }
    if (typeof body === 'object' && body !== null && 'message' in body) {
      const { message } = body;
      if (Array.isArray(message)) {
        return message.join('; ');
      }
      if (typeof message === 'string') {
        return message;
      }
    }
    return exception.message;
  }

  private sanitizeMessage(message: string, status: number): string {
    if (process.env.NODE_ENV === 'production' && status >= 500) {
      return 'An internal server error occurred. Please try again later.';
    }

    // Remove stack traces and source paths
    return message
      .replace(/at .+\(.+\)/g, '')
      .replace(/\/[a-zA-Z0-9_\-\/]+\.ts:\d+:\d+/g, '')
      .trim();
  }
}
