import {
  Body,
  Controller,
  Delete,
  Get,
  HttpStatus,
  Logger,
  Optional,
  Post,
  Req,
  Res,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { CancellationRegistry } from '../boundary/cancellation/cancellation.registry';
import { JsonRpcException } from '../common/exceptions/json-rpc.exception';
import { parseEventId } from '../event-stream/event-id';
import { ErrorCodes } from '../protocol/error-codes';
import {
  JsonRpcErrorResponse,
  JsonRpcMessage,
  JsonRpcRequest,
  JsonRpcResultResponse,
  isJsonRpcNotification,
  isJsonRpcRequest,
} from '../protocol/json-rpc.types';
import { parseJsonRpcPayload } from '../protocol/message.schema';
import { RequestMethods } from '../protocol/methods';
import { SESSION_ID_HEADER } from '../session/constants/session.constants';
import { SessionService } from '../session/session.service';
import { SseWriter } from './sse-writer';
import {
  LAST_EVENT_ID_HEADER,
  ResponseMode,
  TRANSPORT_DEFAULTS,
} from './transport.constants';
import { TransportService } from './transport.service';

@Controller('mcp')
export class McpController {
  private readonly logger = new Logger(McpController.name);
  private readonly responseMode: ResponseMode;

  constructor(
    private readonly transport: TransportService,
    private readonly sessionService: SessionService,
    private readonly cancellations: CancellationRegistry,
    @Optional() configService?: ConfigService,
  ) {
    this.responseMode =
      configService?.get<ResponseMode>('RESPONSE_MODE') ?? TRANSPORT_DEFAULTS.RESPONSE_MODE;
  }

  @Post()
  async post(@Req() req: Request, @Body() body: unknown, @Res() res: Response): Promise<void> {
    const parsed = parseJsonRpcPayload(body);
    if (!parsed.ok) {
      throw new JsonRpcException(
        ErrorCodes.INVALID_REQUEST,
        `Invalid Request: ${parsed.reason}`,
        HttpStatus.BAD_REQUEST,
      );
    }

    const { messages, batch } = parsed;
    const sessionId = await this.resolvePostSession(req, messages);
    res.setHeader(SESSION_ID_HEADER, sessionId);

    for (const message of messages) {
      if (isJsonRpcNotification(message)) {
        this.cancellations.handleNotification(sessionId, message);
      }
    }

    const requests = messages.filter(isJsonRpcRequest);
    if (requests.length === 0) {
      res.status(HttpStatus.ACCEPTED).end();
      return;
    }

    if (this.responseMode === 'json') {
      await this.respondWithJson(sessionId, requests, batch, res);
    } else {
      await this.respondWithStream(sessionId, requests, res);
    }
  }

  @Get()
  async get(@Req() req: Request, @Res() res: Response): Promise<void> {
    const sessionId = await this.requireSession(req);
    const writer = new SseWriter(res);
    res.setHeader(SESSION_ID_HEADER, sessionId);

    const lastEventId = req.header(LAST_EVENT_ID_HEADER);
    if (lastEventId === undefined) {
      await this.transport.openStandaloneStream(sessionId, writer);
      return;
    }

    const owner = parseEventId(lastEventId);
    if (owner && owner.sessionId !== sessionId) {
      throw new JsonRpcException(
        ErrorCodes.SERVER_ERROR,
        'Not Found: Event stream belongs to another session',
        HttpStatus.NOT_FOUND,
      );
    }
    await this.transport.resume(lastEventId, writer);
  }

  @Delete()
  async delete(@Req() req: Request, @Res() res: Response): Promise<void> {
    const sessionId = await this.requireSession(req);
    await this.transport.terminateSession(sessionId);
    res.status(HttpStatus.OK).end();
  }

  private async respondWithJson(
    sessionId: string,
    requests: JsonRpcRequest[],
    batch: boolean,
    res: Response,
  ): Promise<void> {
    const responses = await Promise.all(
      requests.map((request) => this.transport.dispatch(sessionId, request)),
    );
    const answered = responses.filter(
      (response): response is JsonRpcResultResponse | JsonRpcErrorResponse => response !== null,
    );

    if (answered.length === 0) {
      res.status(HttpStatus.ACCEPTED).end();
      return;
    }
    res.status(HttpStatus.OK).json(batch ? answered : answered[0]);
  }

  private async respondWithStream(
    sessionId: string,
    requests: JsonRpcRequest[],
    res: Response,
  ): Promise<void> {
    const streamId = uuidv4();
    const writer = new SseWriter(res);
    await this.transport.openStream(sessionId, streamId, writer);

    try {
      await Promise.all(
        requests.map(async (request) => {
          const response = await this.transport.dispatch(sessionId, request, {
            send: async (message) => {
              await this.transport.send(sessionId, streamId, message);
            },
            enablePolling: () => this.transport.enablePolling(sessionId, streamId),
          });
          if (response) {
            await this.transport.send(sessionId, streamId, response);
          }
        }),
      );
    } finally {
      await this.transport.closeStream(sessionId, streamId);
    }
  }

  /**
   * A header-less initialize starts a new session; anything else must name
   * a live one.
   */
  private async resolvePostSession(req: Request, messages: JsonRpcMessage[]): Promise<string> {
    const initializing = messages.some(
      (message) => isJsonRpcRequest(message) && message.method === RequestMethods.INITIALIZE,
    );

    if (initializing && req.header(SESSION_ID_HEADER) === undefined) {
      if (messages.length > 1) {
        throw new JsonRpcException(
          ErrorCodes.INVALID_REQUEST,
          'Invalid Request: initialize must not be batched',
          HttpStatus.BAD_REQUEST,
        );
      }
      const session = await this.sessionService.createSession();
      return session.sessionId;
    }

    return this.requireSession(req);
  }

  private async requireSession(req: Request): Promise<string> {
    const sessionId = req.header(SESSION_ID_HEADER);
    if (!sessionId) {
      throw new JsonRpcException(
        ErrorCodes.SERVER_ERROR,
        'Bad Request: Mcp-Session-Id header is required',
        HttpStatus.BAD_REQUEST,
      );
    }

    const session = await this.sessionService.getSession(sessionId);
    if (!session) {
      this.logger.debug(`Request for unknown session ${sessionId}`);
      throw new JsonRpcException(
        ErrorCodes.SERVER_ERROR,
        'Session not found',
        HttpStatus.NOT_FOUND,
      );
    }

    await this.sessionService.touch(sessionId);
    return sessionId;
  }
}
