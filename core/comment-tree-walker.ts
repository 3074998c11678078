import { PAGE_SIZES } from '../config/constants';
import type { StopSignal } from '../utils/async';
import { createModuleLogger } from '../utils/logger';
import { ErrorCode, handleError, isCrawlError, PartialResultError } from './errors';
import type { CrawlEventBus } from './event-bus';
import { extractComments } from './extractor';
import { commentProtocol } from './pagination';
import { PageSink, walkSettled } from './page-walker';
import type { ApiResult, CommentCursor, CommentItem, ContentRef } from './types';

const log = createModuleLogger('CommentTreeWalker');

/** Child-walk failures that end only that root's subtree */
const SUBTREE_LOCAL_ERRORS: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.PROTOCOL_ERROR,
  ErrorCode.DATA_FETCH_FAILED,
]);

export interface CommentTreeOptions {
  content: ContentRef;
  fetchRoots: (content: ContentRef, cursor: CommentCursor) => Promise<ApiResult>;
  fetchChildren: (rootCommentId: string, cursor: CommentCursor) => Promise<ApiResult>;
  enableSubComments: boolean;
  pageSize?: number;
  intervalMs?: number;
  onPage?: PageSink<CommentItem>;
  emptyPageTolerance?: number;
  shouldStop?: StopSignal;
  eventBus?: CrawlEventBus;
}

/**
 * Walks root comments page by page; after each root page, walks the children
 * of every root on it that has any, one root at a time. Returns roots and
 * children in the order they were delivered. A failure that ends the tree is
 * thrown as a `PartialResultError` holding every comment collected so far.
 */
export async function walkCommentTree(options: CommentTreeOptions): Promise<CommentItem[]> {
  const { content, enableSubComments } = options;
  const limit = options.pageSize ?? PAGE_SIZES.comments;
  const initialCursor: CommentCursor = { kind: 'comment', offset: '', limit };
  const collected: CommentItem[] = [];

  const onPage: PageSink<CommentItem> = async (items) => {
    collected.push(...items);
    if (options.onPage) await options.onPage(items);
  };

  const walkChildren = async (roots: CommentItem[]): Promise<void> => {
    if (!enableSubComments) return;

    for (const root of roots) {
      if (root.subCommentCount <= 0) continue;

      const report = await walkSettled<CommentItem, CommentCursor>({
        name: `comments:${content.contentId}:${root.commentId}`,
        fetchPage: (cursor) => options.fetchChildren(root.commentId, cursor),
        extract: (page) => extractComments(page, content, root.commentId),
        protocol: commentProtocol,
        initialCursor,
        intervalMs: options.intervalMs,
        onPage,
        emptyPageTolerance: options.emptyPageTolerance,
        shouldStop: options.shouldStop,
        eventBus: options.eventBus,
      });

      if (report.endReason !== 'error') continue;

      const { error } = report;
      if (isCrawlError(error) && SUBTREE_LOCAL_ERRORS.has(error.code)) {
        log.error(`Child comments of ${root.commentId} abandoned`, error, { collected: report.items.length });
        continue;
      }
      throw error;
    }
  };

  const name = `comments:${content.contentId}`;
  const report = await walkSettled<CommentItem, CommentCursor>({
    name,
    fetchPage: (cursor) => options.fetchRoots(content, cursor),
    extract: (page) => extractComments(page, content, null),
    protocol: commentProtocol,
    initialCursor,
    intervalMs: options.intervalMs,
    onPage,
    onAfterPage: walkChildren,
    emptyPageTolerance: options.emptyPageTolerance,
    shouldStop: options.shouldStop,
    eventBus: options.eventBus,
  });
  if (report.endReason === 'error') {
    throw new PartialResultError(handleError(report.error, { walk: name }), collected);
  }

  log.info(`Collected ${collected.length} comments for ${content.contentType} ${content.contentId}`);
  return collected;
}
