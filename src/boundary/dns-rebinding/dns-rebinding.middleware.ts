import { HttpStatus, Injectable, Logger, NestMiddleware, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NextFunction, Request, Response } from 'express';
import { JsonRpcResponseBuilder } from '../../common/dto/json-rpc-response.dto';
import { ErrorCodes } from '../../protocol/error-codes';
import { validateHostAndOrigin } from './host-origin.validator';

function parseHostList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((host) => host.trim())
    .filter((host) => host.length > 0);
}

/**
 * Rejects requests whose Host or Origin header does not name this machine,
 * so a page on a rebound domain cannot reach a server bound to localhost.
 */
@Injectable()
export class DnsRebindingMiddleware implements NestMiddleware {
  private readonly logger = new Logger(DnsRebindingMiddleware.name);
  private readonly enabled: boolean;
  private readonly allowedHosts: string[];

  constructor(@Optional() configService?: ConfigService) {
    const enabled = configService?.get<boolean | string>('DNS_REBINDING_PROTECTION') ?? true;
    this.enabled = enabled === true || enabled === 'true';
    this.allowedHosts = parseHostList(configService?.get<string>('ALLOWED_HOSTS'));
  }

  use(req: Request, res: Response, next: NextFunction): void {
    if (!this.enabled) {
      next();
      return;
    }

    const verdict = validateHostAndOrigin(
      req.headers.host,
      req.headers.origin,
      this.allowedHosts,
    );

    if (verdict.allowed) {
      next();
      return;
    }

    const label = verdict.header === 'host' ? 'Host' : 'Origin';
    this.logger.warn(
      `Rejected request with invalid ${label} header '${verdict.value}' for localhost server. This may indicate a DNS rebinding attack.`,
    );

    res
      .status(HttpStatus.FORBIDDEN)
      .json(
        JsonRpcResponseBuilder.error(
          ErrorCodes.SERVER_ERROR,
          `Forbidden: Invalid ${label} header '${verdict.value}' for localhost server`,
        ),
      );
  }
}
