import { Injectable, Logger } from '@nestjs/common';
import {
  JSONRPC_VERSION,
  JsonRpcNotification,
  RequestId,
} from '../../protocol/json-rpc.types';
import { NotificationMethods } from '../../protocol/methods';

interface InFlightRequest {
  controller: AbortController;
}

export interface CancelledParams {
  requestId: RequestId;
  reason?: string;
}

export class RequestCancelledError extends Error {
  constructor(
    readonly requestId: RequestId,
    reason?: string,
  ) {
    super(reason ? `Request ${requestId} cancelled: ${reason}` : `Request ${requestId} cancelled`);
    this.name = 'RequestCancelledError';
  }
}

function keyOf(sessionId: string, requestId: RequestId): string {
  // Type prefix keeps numeric 1 and string "1" apart
  return `${sessionId}\u0000${typeof requestId}:${requestId}`;
}

export function parseCancelledParams(
  params: Record<string, unknown> | undefined,
): CancelledParams | null {
  const requestId = params?.requestId;
  if (typeof requestId !== 'string' && typeof requestId !== 'number') {
    return null;
  }
  const reason = params?.reason;
  return { requestId, reason: typeof reason === 'string' ? reason : undefined };
}

export function createCancelledNotification(
  requestId: RequestId,
  reason?: string,
): JsonRpcNotification {
  return {
    jsonrpc: JSONRPC_VERSION,
    method: NotificationMethods.CANCELLED,
    params: reason === undefined ? { requestId } : { requestId, reason },
  };
}

/**
 * Correlates `notifications/cancelled` with the handler running the
 * referenced request. Each handler receives an AbortSignal that fires at most
 * once; cancelling an unknown or finished request does nothing.
 */
@Injectable()
export class CancellationRegistry {
  private readonly logger = new Logger(CancellationRegistry.name);
  private readonly inFlight = new Map<string, InFlightRequest>();

  register(sessionId: string, requestId: RequestId): AbortSignal {
    const key = keyOf(sessionId, requestId);
    const existing = this.inFlight.get(key);
    if (existing) {
      this.logger.warn(`Request ${requestId} registered twice for session ${sessionId}`);
      return existing.controller.signal;
    }

    const controller = new AbortController();
    this.inFlight.set(key, { controller });
    return controller.signal;
  }

  /** Called when the handler finishes, whatever the outcome */
  complete(sessionId: string, requestId: RequestId): void {
    this.inFlight.delete(keyOf(sessionId, requestId));
  }

  /**
   * @returns true when an in-flight handler was signalled
   */
  cancel(sessionId: string, requestId: RequestId, reason?: string): boolean {
    const key = keyOf(sessionId, requestId);
    const entry = this.inFlight.get(key);
    if (!entry) {
      return false;
    }

    this.inFlight.delete(key);
    entry.controller.abort(new RequestCancelledError(requestId, reason));
    this.logger.debug(`Cancelled request ${requestId} in session ${sessionId}`);
    return true;
  }

  /**
   * Apply a `notifications/cancelled` message. Malformed params are ignored
   * since notifications have no reply channel.
   */
  handleNotification(sessionId: string, notification: JsonRpcNotification): boolean {
    if (notification.method !== NotificationMethods.CANCELLED) {
      return false;
    }
    const params = parseCancelledParams(notification.params);
    if (!params) {
      this.logger.debug(`Ignoring malformed cancellation in session ${sessionId}`);
      return false;
    }
    return this.cancel(sessionId, params.requestId, params.reason);
  }

  /**
   * Abort everything still running for a session.
   * @returns number of handlers signalled
   */
  cancelSession(sessionId: string, reason = 'Session closed'): number {
    const prefix = `${sessionId}\u0000`;
    let cancelled = 0;
    for (const [key, entry] of this.inFlight) {
      if (key.startsWith(prefix)) {
        this.inFlight.delete(key);
        entry.controller.abort(new Error(reason));
        cancelled++;
      }
    }
    return cancelled;
  }

  trackedSessions(): string[] {
    return [...new Set([...this.inFlight.keys()].map((key) => key.split('\u0000')[0]))];
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }
}
