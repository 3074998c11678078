/**
 * Pagination protocols. Each one knows how to turn its cursor into query
 * parameters and how to read the next cursor (or the end) off a page.
 */

import { CrawlErrors } from './errors';
import {
  CommentCursor,
  isJsonObject,
  JsonObject,
  OffsetCursor,
  PageCursor,
  QueryParams,
  TokenCursor,
} from './types';

export interface PageProtocol<C extends PageCursor> {
  readonly name: string;
  toParams(cursor: C): QueryParams;
  /** `null` once the page says it is the last one */
  nextCursor(page: JsonObject, current: C): C | null;
}

function readPaging(page: JsonObject): JsonObject | null {
  return isJsonObject(page.paging) ? page.paging : null;
}

function requireIsEnd(page: JsonObject, protocol: string): { paging: JsonObject; isEnd: boolean } {
  const paging = readPaging(page);
  if (!paging || typeof paging.is_end !== 'boolean') {
    throw CrawlErrors.protocolError(`${protocol} page has no boolean paging.is_end`, { protocol });
  }
  return { paging, isEnd: paging.is_end };
}

function nextUrlParams(paging: JsonObject): URLSearchParams | null {
  const next = paging.next;
  if (typeof next !== 'string' || next.length === 0) return null;

  try {
    return new URL(next, 'https://placeholder.invalid').searchParams;
  } catch {
    return null;
  }
}

/** Numeric offset/limit pages; the next offset is computed locally */
export const offsetProtocol: PageProtocol<OffsetCursor> = {
  name: 'offset',

  toParams(cursor) {
    return { offset: cursor.offset, limit: cursor.limit };
  },

  nextCursor(page, current) {
    const { isEnd } = requireIsEnd(page, 'offset');
    if (isEnd) return null;
    return { kind: 'offset', offset: current.offset + current.limit, limit: current.limit };
  },
};

/** Comment pages carry an opaque string offset inside `paging.next` */
export const commentProtocol: PageProtocol<CommentCursor> = {
  name: 'comment',

  toParams(cursor) {
    return { offset: cursor.offset, limit: cursor.limit };
  },

  nextCursor(page, current) {
    const { paging, isEnd } = requireIsEnd(page, 'comment');
    if (isEnd) return null;

    const offset = nextUrlParams(paging)?.get('offset');
    if (offset === null || offset === undefined) {
      throw CrawlErrors.protocolError('comment page is not the last one but has no next offset', {
        protocol: 'comment',
      });
    }
    return { kind: 'comment', offset, limit: current.limit };
  },
};

/**
 * Opaque token pages. The next request is rebuilt from `paging.next`, keeping
 * only the whitelisted parameters; `cursor` becomes the token itself.
 */
export function tokenProtocol(whitelist: readonly string[]): PageProtocol<TokenCursor> {
  return {
    name: 'token',

    toParams(cursor) {
      return { ...cursor.extraParams, cursor: cursor.opaque };
    },

    nextCursor(page) {
      const paging = readPaging(page);
      const isEnd = paging && typeof paging.is_end === 'boolean' ? paging.is_end : true;
      if (isEnd || !paging) return null;

      const params = nextUrlParams(paging);
      if (!params) {
        throw CrawlErrors.protocolError('token page is not the last one but has no next URL', {
          protocol: 'token',
        });
      }

      const extraParams: Record<string, string> = {};
      for (const key of whitelist) {
        const value = params.get(key);
        if (key !== 'cursor' && value !== null) extraParams[key] = value;
      }
      return { kind: 'token', opaque: params.get('cursor') ?? '', extraParams };
    },
  };
}
