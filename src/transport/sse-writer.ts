import { Response } from 'express';

export interface SseEvent {
  id?: string;
  event?: string;
  retry?: number;
  data: string;
}

export function formatSseEvent(event: SseEvent): string {
  const lines: string[] = [];
  if (event.event) {
    lines.push(`event: ${event.event}`);
  }
  if (event.id) {
    lines.push(`id: ${event.id}`);
  }
  if (event.retry !== undefined) {
    lines.push(`retry: ${event.retry}`);
  }
  for (const line of event.data.split(/\r\n|\r|\n/)) {
    lines.push(`data: ${line}`);
  }
  return `${lines.join('\n')}\n\n`;
}

/**
 * Writes Server-Sent Events to one HTTP response. Headers go out with the
 * first write; everything after the client disconnects is dropped.
 */
export class SseWriter {
  private opened = false;
  private ended = false;
  private readonly closeListeners: Array<() => void> = [];

  constructor(private readonly res: Response) {
    res.on('close', () => {
      this.ended = true;
      for (const listener of this.closeListeners.splice(0)) {
        listener();
      }
    });
  }

  open(): void {
    if (this.opened || this.ended) {
      return;
    }
    this.opened = true;
    this.res.status(200);
    this.res.setHeader('Content-Type', 'text/event-stream');
    this.res.setHeader('Cache-Control', 'no-cache, no-transform');
    this.res.setHeader('Connection', 'keep-alive');
    this.res.flushHeaders();
  }

  /**
   * @returns false when the connection is already gone
   */
  write(event: SseEvent): boolean {
    if (this.ended) {
      return false;
    }
    this.open();
    this.res.write(formatSseEvent(event));
    return true;
  }

  end(): void {
    if (this.ended) {
      return;
    }
    this.open();
    this.ended = true;
    this.res.end();
  }

  isClosed(): boolean {
    return this.ended;
  }

  onClose(listener: () => void): void {
    if (this.ended) {
      listener();
      return;
    }
    this.closeListeners.push(listener);
  }
}
