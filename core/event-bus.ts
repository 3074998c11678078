import { EventEmitter } from 'events';
import type { SessionState } from './types';

export interface PageEventData {
  walk: string;
  page: number;
  items: number;
  total: number;
}

export interface SessionEventData {
  state: SessionState;
  credential?: string;
  reason?: string;
}

export interface LogMessageData {
  message: string;
  level: string;
  timestamp: Date;
}

export class CrawlEventBus extends EventEmitter {
  public readonly events = {
    PAGE: 'crawl:page',
    SESSION: 'crawl:session',
    ERROR: 'crawl:error',
    LOG_MESSAGE: 'log:message',
  } as const;

  emitPage(data: PageEventData): void {
    this.emit(this.events.PAGE, data);
  }

  emitSession(data: SessionEventData): void {
    this.emit(this.events.SESSION, data);
  }

  emitError(error: Error): void {
    this.emit(this.events.ERROR, error);
  }

  emitLog(message: string, level: string = 'info'): void {
    this.emit(this.events.LOG_MESSAGE, { message, level, timestamp: new Date() });
  }
}

export function createEventBus(): CrawlEventBus {
  return new CrawlEventBus();
}
