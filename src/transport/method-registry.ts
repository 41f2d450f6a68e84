import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InvalidCursorError, paginate } from '../boundary/pagination/cursor';
import { JsonRpcResponseBuilder } from '../common/dto/json-rpc-response.dto';
import { ErrorCodes } from '../protocol/error-codes';
import {
  JsonRpcErrorResponse,
  JsonRpcMessage,
  JsonRpcRequest,
  JsonRpcResultResponse,
  RequestId,
} from '../protocol/json-rpc.types';
import {
  LATEST_PROTOCOL_VERSION,
  RequestMethods,
  SUPPORTED_PROTOCOL_VERSIONS,
} from '../protocol/methods';
import { SERVER_INFO, TRANSPORT_DEFAULTS } from './transport.constants';

export interface MethodContext {
  sessionId: string;
  requestId: RequestId;
  /** Fires when the client cancels the request or the session goes away */
  signal: AbortSignal;
  /** Write a message to the stream carrying this request's response (SSE mode only) */
  send?: (message: JsonRpcMessage) => Promise<void>;
  /** Hand the response stream over to client polling (SSE mode only) */
  enablePolling?: () => Promise<number>;
}

export type MethodResult = Record<string, unknown>;

export type MethodHandler = (
  params: Record<string, unknown>,
  context: MethodContext,
) => Promise<MethodResult> | MethodResult;

export type ListSource<T> = (context: MethodContext) => Promise<readonly T[]> | readonly T[];

@Injectable()
export class MethodRegistry {
  private readonly logger = new Logger(MethodRegistry.name);
  private readonly handlers = new Map<string, MethodHandler>();
  private readonly pageSize: number;

  constructor(@Optional() configService?: ConfigService) {
    this.pageSize =
      configService?.get<number>('PAGE_SIZE') ?? TRANSPORT_DEFAULTS.PAGE_SIZE;

    this.register(RequestMethods.PING, () => ({}));
    this.register(RequestMethods.INITIALIZE, (params) => this.initialize(params));
  }

  register(method: string, handler: MethodHandler): void {
    if (this.handlers.has(method)) {
      throw new Error(`Method ${method} is already registered`);
    }
    this.handlers.set(method, handler);
  }

  /**
   * Register a list method served in cursor pages, e.g. `tools/list` with
   * `resultKey` "tools".
   */
  registerList<T>(method: string, resultKey: string, source: ListSource<T>): void {
    this.register(method, async (params, context) => {
      const cursor = params.cursor;
      if (cursor !== undefined && typeof cursor !== 'string') {
        throw new InvalidCursorError(String(cursor));
      }

      const page = paginate(await source(context), cursor, this.pageSize);
      const result: MethodResult = { [resultKey]: page.items };
      if (page.nextCursor !== undefined) {
        result.nextCursor = page.nextCursor;
      }
      return result;
    });
  }

  has(method: string): boolean {
    return this.handlers.has(method);
  }

  /**
   * Run the handler for a request.
   * @returns null when the request was cancelled; no response is sent for it
   */
  async dispatch(
    request: JsonRpcRequest,
    context: MethodContext,
  ): Promise<JsonRpcResultResponse | JsonRpcErrorResponse | null> {
    const handler = this.handlers.get(request.method);
    if (!handler) {
      return JsonRpcResponseBuilder.error(
        ErrorCodes.METHOD_NOT_FOUND,
        `Method not found: ${request.method}`,
        request.id,
      );
    }

    try {
      const result = await handler(request.params ?? {}, context);
      if (context.signal.aborted) {
        return null;
      }
      return JsonRpcResponseBuilder.result(request.id, result);
    } catch (error) {
      if (context.signal.aborted) {
        return null;
      }
      if (error instanceof InvalidCursorError) {
        return JsonRpcResponseBuilder.error(ErrorCodes.INVALID_PARAMS, error.message, request.id);
      }

      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Handler for ${request.method} failed: ${message}`);
      return JsonRpcResponseBuilder.error(ErrorCodes.INTERNAL_ERROR, message, request.id);
    }
  }

  private initialize(params: Record<string, unknown>): MethodResult {
    const requested = params.protocolVersion;
    const protocolVersion =
      SUPPORTED_PROTOCOL_VERSIONS.find((version) => version === requested) ??
      LATEST_PROTOCOL_VERSION;

    return {
      protocolVersion,
      capabilities: {},
      serverInfo: { ...SERVER_INFO },
    };
  }
}
