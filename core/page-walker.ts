import { sleepOrCancel, StopSignal } from '../utils/async';
import { createModuleLogger } from '../utils/logger';
import { handleError, PartialResultError } from './errors';
import type { CrawlEventBus } from './event-bus';
import type { PageProtocol } from './pagination';
import type { ApiResult, JsonObject, PageCursor } from './types';

const log = createModuleLogger('PageWalker');

export type WalkEndReason = 'exhausted' | 'empty-body' | 'no-items' | 'max-items' | 'cancelled' | 'error';

export interface WalkReport<T> {
  items: T[];
  pages: number;
  endReason: WalkEndReason;
  error?: unknown;
}

export type PageSink<T> = (items: T[]) => Promise<void> | void;

export interface WalkOptions<T, C extends PageCursor> {
  /** Label used in logs and page events */
  name: string;
  fetchPage: (cursor: C) => Promise<ApiResult>;
  extract: (page: JsonObject) => T[];
  protocol: PageProtocol<C>;
  initialCursor: C;
  intervalMs?: number;
  /** Awaited for every non-empty page; a failing sink is logged and the walk goes on */
  onPage?: PageSink<T>;
  /** Runs after `onPage`; a failure here ends the walk */
  onAfterPage?: (items: T[]) => Promise<void>;
  /** 0 means no limit; the final page is truncated to fit */
  maxItems?: number;
  /** Consecutive pages without items tolerated before giving up; at least 1 */
  emptyPageTolerance?: number;
  shouldStop?: StopSignal;
  eventBus?: CrawlEventBus;
}

/**
 * Walks pages in cursor order until the protocol reports the end, a page comes
 * back empty, `maxItems` is reached or the caller stops it. Never throws; a
 * failure ends the walk with `endReason: 'error'` and whatever was collected.
 */
export async function walkSettled<T, C extends PageCursor>(options: WalkOptions<T, C>): Promise<WalkReport<T>> {
  const { name, protocol, shouldStop } = options;
  const intervalMs = options.intervalMs ?? 0;
  const maxItems = options.maxItems ?? 0;
  const tolerance = Math.max(1, options.emptyPageTolerance ?? 1);

  const items: T[] = [];
  let pages = 0;
  let consecutiveEmpty = 0;
  let cursor: C | null = options.initialCursor;

  const finish = (endReason: WalkEndReason, error?: unknown): WalkReport<T> => {
    if (endReason === 'error') {
      log.warn(`[${name}] aborted after ${pages} pages with ${items.length} items`, {
        reason: error instanceof Error ? error.message : String(error),
      });
    } else {
      log.info(`[${name}] finished after ${pages} pages with ${items.length} items (${endReason})`);
    }
    return error === undefined ? { items, pages, endReason } : { items, pages, endReason, error };
  };

  try {
    while (cursor) {
      if (shouldStop && (await shouldStop())) {
        return finish('cancelled');
      }

      const result = await options.fetchPage(cursor);
      if (result.kind === 'empty' || Object.keys(result.body).length === 0) {
        return finish('empty-body');
      }

      const page = result.body;
      const extracted = options.extract(page);
      pages++;

      if (extracted.length === 0) {
        consecutiveEmpty++;
        log.debug(`[${name}] page ${pages} had no items (${consecutiveEmpty}/${tolerance})`);
        if (consecutiveEmpty >= tolerance) {
          return finish('no-items');
        }
      } else {
        consecutiveEmpty = 0;
        const remaining = maxItems > 0 ? maxItems - items.length : extracted.length;
        const delivered = extracted.length > remaining ? extracted.slice(0, remaining) : extracted;

        await deliver(name, options, delivered);
        items.push(...delivered);
        options.eventBus?.emitPage({ walk: name, page: pages, items: delivered.length, total: items.length });

        if (options.onAfterPage) {
          await options.onAfterPage(delivered);
        }
        if (maxItems > 0 && items.length >= maxItems) {
          return finish('max-items');
        }
      }

      cursor = protocol.nextCursor(page, cursor);
      if (!cursor) {
        return finish('exhausted');
      }
      if (await sleepOrCancel(intervalMs, shouldStop)) {
        return finish('cancelled');
      }
    }
    return finish('exhausted');
  } catch (error: unknown) {
    return finish('error', error);
  }
}

/**
 * Same walk, but a failure is rethrown as a `PartialResultError` holding the
 * items collected before it.
 */
export async function walk<T, C extends PageCursor>(options: WalkOptions<T, C>): Promise<T[]> {
  const report = await walkSettled(options);
  if (report.endReason === 'error') {
    throw new PartialResultError(handleError(report.error, { walk: options.name }), report.items);
  }
  return report.items;
}

async function deliver<T, C extends PageCursor>(
  name: string,
  options: WalkOptions<T, C>,
  items: T[],
): Promise<void> {
  if (!options.onPage) return;
  try {
    await options.onPage(items);
  } catch (error: unknown) {
    log.error(`[${name}] page sink failed`, error);
    if (error instanceof Error) options.eventBus?.emitError(error);
  }
}
