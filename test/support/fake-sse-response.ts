import { EventEmitter } from 'events';
import { Response } from 'express';
import { SseWriter } from '../../src/transport/sse-writer';

export interface ParsedSseEvent {
  id?: string;
  event?: string;
  retry?: number;
  data: string;
}

/**
 * Minimal stand-in for an express Response that records what an SseWriter
 * writes. `disconnect()` plays the client going away.
 */
export class FakeSseResponse extends EventEmitter {
  statusCode = 0;
  ended = false;
  readonly headers: Record<string, string> = {};
  readonly chunks: string[] = [];

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  setHeader(name: string, value: string): this {
    this.headers[name.toLowerCase()] = value;
    return this;
  }

  flushHeaders(): void {
    // headers are recorded as they are set
  }

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  end(): this {
    this.ended = true;
    this.emit('close');
    return this;
  }

  disconnect(): void {
    this.emit('close');
  }

  asResponse(): Response {
    return this as unknown as Response;
  }

  events(): ParsedSseEvent[] {
    return parseSse(this.chunks.join(''));
  }
}

export function createWriter(): { res: FakeSseResponse; writer: SseWriter } {
  const res = new FakeSseResponse();
  return { res, writer: new SseWriter(res.asResponse()) };
}

export function parseSse(text: string): ParsedSseEvent[] {
  return text
    .split('\n\n')
    .filter((block) => block.length > 0)
    .map((block) => {
      const event: ParsedSseEvent = { data: '' };
      const data: string[] = [];
      for (const line of block.split('\n')) {
        const separator = line.indexOf(': ');
        const field = line.slice(0, separator);
        const value = line.slice(separator + 2);
        if (field === 'id') {
          event.id = value;
        } else if (field === 'event') {
          event.event = value;
        } else if (field === 'retry') {
          event.retry = Number(value);
        } else if (field === 'data') {
          data.push(value);
        }
      }
      event.data = data.join('\n');
      return event;
    });
}
