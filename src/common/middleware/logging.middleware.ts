import { Injectable, NestMiddleware, Logger, Optional } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { ConfigService } from '@nestjs/config';
import { SESSION_ID_HEADER } from '../../session/constants/session.constants';

export type LogFormat = 'json' | 'text';

export interface LogEntry {
  timestamp: string;
  method: string;
  url: string;
  statusCode: number;
  responseTime: number;
  contentType?: string;
  sessionId?: string;
  userAgent?: string;
  ip?: string;
  status: 'success' | 'error';
}

function parseFormat(value: string | undefined): LogFormat {
  return value === 'text' ? 'text' : 'json';
}

/**
 * One log line per finished HTTP exchange. SSE responses are logged when the
 * stream ends, so `responseTime` covers the whole stream.
 */
@Injectable()
export class LoggingMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');
  private readonly enabled: boolean;
  private readonly format: LogFormat;

  constructor(@Optional() configService?: ConfigService) {
    const enabled = configService?.get<boolean | string>('LOG_HTTP_REQUESTS') ?? true;
    this.enabled = enabled === true || enabled === 'true';
    this.format = parseFormat(configService?.get<string>('LOG_FORMAT'));
  }

  use(req: Request, res: Response, next: NextFunction): void {
    if (!this.enabled) {
      next();
      return;
    }

    const startTime = Date.now();
    res.on('finish', () => {
      const sessionId = res.getHeader(SESSION_ID_HEADER) ?? req.get(SESSION_ID_HEADER);
      const contentType = res.getHeader('Content-Type');
      this.logRequest({
        timestamp: new Date().toISOString(),
        method: req.method,
        url: req.originalUrl || req.url,
        statusCode: res.statusCode,
        responseTime: Date.now() - startTime,
        contentType: typeof contentType === 'string' ? contentType : undefined,
        sessionId: typeof sessionId === 'string' ? sessionId : undefined,
        userAgent: req.get('User-Agent'),
        ip: req.ip ?? req.socket?.remoteAddress,
        status: res.statusCode >= 400 ? 'error' : 'success',
      });
    });

    next();
  }

  private logRequest(entry: LogEntry): void {
    if (this.format === 'json') {
      this.logger.log(JSON.stringify(entry));
      return;
    }

    const statusIcon = entry.status === 'success' ? '✓' : '✗';
    const colorCode =
      entry.statusCode >= 400 ? '\x1b[31m' : entry.statusCode >= 300 ? '\x1b[33m' : '\x1b[32m';
    const resetCode = '\x1b[0m';
    const session = entry.sessionId ? ` [${entry.sessionId}]` : '';

    const message = `${statusIcon} ${colorCode}${entry.method} ${entry.url}${resetCode} ${entry.statusCode} ${entry.responseTime}ms${session}`;

    if (entry.status === 'error') {
      this.logger.error(message);
    } else {
      this.logger.log(message);
    }
  }
}
