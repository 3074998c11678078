/**
 * CrawlClient - public facade over the session binder, the request executor
 * and the walkers.
 *
 * Every public crawl operation binds a session once at entry; after that the
 * executor keeps it healthy (proxy refresh, rotation) on its own.
 */

import {
  API_PATHS,
  CREATOR_INCLUDES,
  CreatorContentKind,
  DEFAULT_USER_AGENT,
  PAGE_SIZES,
  PLATFORM_BASE_URL,
  PLATFORM_COLUMN_URL,
  QUESTION_FEED_CURSOR_PARAMS,
  QUESTION_FEED_INCLUDE,
  SEARCH_SORT,
  SEARCH_TIME,
  SEARCH_TYPE,
  SearchSort,
  SearchTime,
  SearchType,
} from '../config/constants';
import type { StopSignal } from '../utils/async';
import type { AppConfig } from '../utils/config-manager';
import { configureLogging, createEnhancedLogger } from '../utils/logger';
import { walkCommentTree } from './comment-tree-walker';
import { CredentialPool, LocalCredentialPool } from './credential-pool';
import type { CrawlEventBus } from './event-bus';
import { extractCreatorContents, extractQuestionAnswers, extractSearchContents } from './extractor';
import { AxiosTransport, HttpTransport } from './http-transport';
import { IdentityProbe, SessionProbe } from './identity-probe';
import { offsetProtocol, tokenProtocol } from './pagination';
import { PageSink, walk } from './page-walker';
import { ApiRequest, RequestExecutor } from './request-executor';
import { SessionBinder } from './session-binder';
import { HttpSignClient, SigningDelegate } from './sign-client';
import type {
  ApiResult,
  CommentCursor,
  CommentItem,
  ContentItem,
  ContentRef,
  CurrentIdentity,
  OffsetCursor,
  QueryParams,
  Session,
  SessionState,
  TokenCursor,
} from './types';

export interface CrawlClientDeps {
  pool: CredentialPool;
  signer: SigningDelegate;
  transport?: HttpTransport;
  /** Defaults to an `IdentityProbe` over the same transport */
  probe?: SessionProbe;
}

export interface CrawlClientOptions {
  baseUrl?: string;
  columnUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  intervalMs?: number;
  enableSubComments?: boolean;
  emptyPageTolerance?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  maxBindAttempts?: number;
  /** Invalidate the credential as soon as a request gets 403 */
  invalidateOnForbidden?: boolean;
  shouldStop?: StopSignal;
  eventBus?: CrawlEventBus;
  now?: () => number;
}

export interface SearchOptions {
  page?: number;
  pageSize?: number;
  sort?: SearchSort;
  type?: SearchType;
  timeRange?: SearchTime;
}

interface WalkCallOptions<T> {
  onPage?: PageSink<T>;
  intervalMs?: number;
  shouldStop?: StopSignal;
}

export interface SearchAllOptions extends Omit<SearchOptions, 'page'>, WalkCallOptions<ContentItem> {
  /** 0 means no limit */
  maxItems?: number;
}

export type CommentWalkOptions = WalkCallOptions<CommentItem>;

export interface QuestionAnswersOptions extends WalkCallOptions<ContentItem> {
  /** 0 means no limit */
  maxAnswers?: number;
  order?: 'default' | 'updated';
}

export interface CreatorContentOptions extends WalkCallOptions<ContentItem> {
  maxItems?: number;
}

export interface HomefeedRequest {
  pageNumber: number;
  afterId: number;
  endOffset: number;
  sessionToken?: string;
}

export class CrawlClient {
  private readonly logger = createEnhancedLogger('CrawlClient');
  private readonly binder: SessionBinder;
  private readonly executor: RequestExecutor;
  private readonly intervalMs: number;
  private readonly enableSubComments: boolean;
  private readonly emptyPageTolerance: number;

  constructor(
    deps: CrawlClientDeps,
    private readonly options: CrawlClientOptions = {},
  ) {
    const transport = deps.transport ?? new AxiosTransport();
    const baseUrl = options.baseUrl ?? PLATFORM_BASE_URL;
    const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    const timeoutMs = options.timeoutMs ?? 10000;

    const probe = deps.probe ?? new IdentityProbe(transport, { baseUrl, userAgent, timeoutMs });
    this.binder = new SessionBinder(deps.pool, probe, {
      maxBindAttempts: options.maxBindAttempts,
      shouldStop: options.shouldStop,
      eventBus: options.eventBus,
      now: options.now,
    });
    this.executor = new RequestExecutor(this.binder, deps.signer, transport, {
      baseUrl,
      columnUrl: options.columnUrl ?? PLATFORM_COLUMN_URL,
      userAgent,
      timeoutMs,
      maxAttempts: options.maxAttempts,
      retryDelayMs: options.retryDelayMs,
      invalidateOnForbidden: options.invalidateOnForbidden,
    });

    this.intervalMs = options.intervalMs ?? 1000;
    this.enableSubComments = options.enableSubComments ?? true;
    this.emptyPageTolerance = options.emptyPageTolerance ?? 1;
    this.logger.setContext({ baseUrl });
  }

  /**
   * Builds a client with the file-backed pool and the HTTP signing service
   * unless replacements are given.
   */
  static fromConfig(config: AppConfig, pool?: CredentialPool, signer?: SigningDelegate): CrawlClient {
    configureLogging(config.logging);
    const transport = new AxiosTransport();
    return new CrawlClient(
      {
        pool: pool ?? new LocalCredentialPool(config.pool),
        signer: signer ?? new HttpSignClient({ baseUrl: config.signer.url, timeoutMs: config.signer.timeoutMs }, transport),
        transport,
      },
      {
        baseUrl: config.client.baseUrl,
        columnUrl: config.client.columnUrl,
        userAgent: config.client.userAgent,
        timeoutMs: config.client.timeoutMs,
        intervalMs: config.crawl.intervalMs,
        enableSubComments: config.crawl.enableSubComments,
        emptyPageTolerance: config.crawl.emptyPageTolerance,
        maxAttempts: config.retry.maxAttempts,
        retryDelayMs: config.retry.delayMs,
        maxBindAttempts: config.session.maxBindAttempts,
        invalidateOnForbidden: config.session.invalidateOnForbidden,
      },
    );
  }

  get state(): SessionState {
    return this.binder.state;
  }

  get currentIdentity(): CurrentIdentity | null {
    return this.binder.current()?.identity ?? null;
  }

  async ensureValidSession(): Promise<Session> {
    return this.binder.ensureValid();
  }

  /**
   * Reports the bound credential as unusable (for example after a FORBIDDEN).
   * The pool counts it as a failure and the next call binds another one.
   */
  async invalidateSession(reason: string = 'invalidated by caller'): Promise<void> {
    await this.binder.invalidate(reason);
  }

  /**
   * Releases the session back to the pool. Every later call fails with
   * CLIENT_CLOSED.
   */
  async close(): Promise<void> {
    await this.binder.close();
    this.logger.info('Client closed');
  }

  /** Escape hatch for endpoints without a dedicated method */
  async request(request: ApiRequest): Promise<ApiResult> {
    await this.ensureValidSession();
    return this.executor.execute(request);
  }

  // ==========================================
  // Search
  // ==========================================

  async searchByKeyword(keyword: string, options: SearchOptions = {}): Promise<ContentItem[]> {
    await this.ensureValidSession();
    const pageSize = options.pageSize ?? PAGE_SIZES.search;
    const page = Math.max(1, options.page ?? 1);

    const result = await this.executor.execute({
      path: API_PATHS.search,
      params: this.searchParams(keyword, { kind: 'offset', offset: (page - 1) * pageSize, limit: pageSize }, options),
    });
    if (result.kind === 'empty') return [];

    const items = extractSearchContents(result.body);
    this.logger.info(`Search "${keyword}" page ${page}: ${items.length} items`);
    return items;
  }

  async searchAll(keyword: string, options: SearchAllOptions = {}): Promise<ContentItem[]> {
    await this.ensureValidSession();

    return this.logger.trackAsync(`searchAll:${keyword}`, () =>
      walk<ContentItem, OffsetCursor>({
        name: `search:${keyword}`,
        fetchPage: (cursor) =>
          this.executor.execute({ path: API_PATHS.search, params: this.searchParams(keyword, cursor, options) }),
        extract: extractSearchContents,
        protocol: offsetProtocol,
        initialCursor: { kind: 'offset', offset: 0, limit: options.pageSize ?? PAGE_SIZES.search },
        maxItems: options.maxItems,
        ...this.walkDefaults(options),
      }),
    );
  }

  // ==========================================
  // Comments
  // ==========================================

  async getRootComments(content: ContentRef, offset: string = '', limit: number = PAGE_SIZES.comments): Promise<ApiResult> {
    await this.ensureValidSession();
    return this.fetchRootComments(content, { kind: 'comment', offset, limit });
  }

  async getChildComments(rootCommentId: string, offset: string = '', limit: number = PAGE_SIZES.comments): Promise<ApiResult> {
    await this.ensureValidSession();
    return this.fetchChildComments(rootCommentId, { kind: 'comment', offset, limit });
  }

  async getAllComments(content: ContentRef, options: CommentWalkOptions = {}): Promise<CommentItem[]> {
    await this.ensureValidSession();

    return walkCommentTree({
      content,
      fetchRoots: (ref, cursor) => this.fetchRootComments(ref, cursor),
      fetchChildren: (rootId, cursor) => this.fetchChildComments(rootId, cursor),
      enableSubComments: this.enableSubComments,
      pageSize: PAGE_SIZES.comments,
      ...this.walkDefaults(options),
    });
  }

  // ==========================================
  // Question answers
  // ==========================================

  async getAnswersByQuestion(questionId: string, cursor?: TokenCursor): Promise<ApiResult> {
    await this.ensureValidSession();
    return this.fetchQuestionFeed(questionId, cursor ?? this.initialFeedCursor('default'));
  }

  async getAllAnswersByQuestion(questionId: string, options: QuestionAnswersOptions = {}): Promise<ContentItem[]> {
    await this.ensureValidSession();

    const answers = await walk<ContentItem, TokenCursor>({
      name: `question:${questionId}`,
      fetchPage: (cursor) => this.fetchQuestionFeed(questionId, cursor),
      extract: extractQuestionAnswers,
      protocol: tokenProtocol(QUESTION_FEED_CURSOR_PARAMS),
      initialCursor: this.initialFeedCursor(options.order ?? 'default'),
      maxItems: options.maxAnswers,
      ...this.walkDefaults(options),
    });
    this.logger.info(`Question ${questionId}: ${answers.length} answers`);
    return answers;
  }

  // ==========================================
  // Creators
  // ==========================================

  async getAllContentByCreator(
    urlToken: string,
    kind: CreatorContentKind,
    options: CreatorContentOptions = {},
  ): Promise<ContentItem[]> {
    await this.ensureValidSession();

    return walk<ContentItem, OffsetCursor>({
      name: `creator:${urlToken}:${kind}`,
      fetchPage: (cursor) =>
        this.executor.execute({
          path: API_PATHS.creatorContent(urlToken, kind),
          params: this.creatorParams(kind, cursor),
        }),
      extract: extractCreatorContents,
      protocol: offsetProtocol,
      initialCursor: { kind: 'offset', offset: 0, limit: PAGE_SIZES.creatorContent },
      maxItems: options.maxItems,
      ...this.walkDefaults(options),
    });
  }

  // ==========================================
  // Homefeed
  // ==========================================

  async getHomefeed(request: HomefeedRequest): Promise<ApiResult> {
    await this.ensureValidSession();
    return this.executor.execute({
      path: API_PATHS.homefeed,
      params: {
        action: 'down',
        desktop: 'true',
        after_id: request.afterId,
        end_offset: request.endOffset,
        page_number: request.pageNumber,
        session_token: request.sessionToken ?? '',
      },
    });
  }

  // ==========================================
  // Internals
  // ==========================================

  private fetchRootComments(content: ContentRef, cursor: CommentCursor): Promise<ApiResult> {
    return this.executor.execute({
      path: API_PATHS.rootComments(content.contentType, content.contentId),
      params: { order: 'score', offset: cursor.offset, limit: cursor.limit },
    });
  }

  private fetchChildComments(rootCommentId: string, cursor: CommentCursor): Promise<ApiResult> {
    return this.executor.execute({
      path: API_PATHS.childComments(rootCommentId),
      params: { order: 'sort', offset: cursor.offset, limit: cursor.limit },
    });
  }

  private fetchQuestionFeed(questionId: string, cursor: TokenCursor): Promise<ApiResult> {
    return this.executor.execute({
      path: API_PATHS.questionFeeds(questionId),
      params: {
        ...tokenProtocol(QUESTION_FEED_CURSOR_PARAMS).toParams(cursor),
        ws_qiangzhisafe: '1',
        platform: 'desktop',
        include: QUESTION_FEED_INCLUDE,
      },
    });
  }

  private initialFeedCursor(order: string): TokenCursor {
    return {
      kind: 'token',
      opaque: '',
      extraParams: { session_id: '', offset: '0', limit: String(PAGE_SIZES.questionAnswers), order },
    };
  }

  private searchParams(keyword: string, cursor: OffsetCursor, options: SearchOptions): QueryParams {
    return {
      gk_version: 'gz-gaokao',
      t: 'general',
      q: keyword,
      correction: 1,
      offset: cursor.offset,
      limit: cursor.limit,
      filter_fields: '',
      lc_idx: cursor.offset,
      show_all_topics: 0,
      search_source: 'Filter',
      time_interval: SEARCH_TIME[options.timeRange ?? 'default'],
      sort: SEARCH_SORT[options.sort ?? 'default'],
      vertical: SEARCH_TYPE[options.type ?? 'default'],
    };
  }

  private creatorParams(kind: CreatorContentKind, cursor: OffsetCursor): QueryParams {
    const params: QueryParams = {
      include: CREATOR_INCLUDES[kind],
      ...offsetProtocol.toParams(cursor),
    };
    if (kind === 'zvideos') {
      params.similar_aggregation = 'true';
    } else {
      params.order_by = 'created';
    }
    return params;
  }

  private walkDefaults<T>(options: WalkCallOptions<T>): {
    onPage?: PageSink<T>;
    intervalMs: number;
    emptyPageTolerance: number;
    shouldStop?: StopSignal;
    eventBus?: CrawlEventBus;
  } {
    return {
      onPage: options.onPage,
      intervalMs: options.intervalMs ?? this.intervalMs,
      emptyPageTolerance: this.emptyPageTolerance,
      shouldStop: options.shouldStop ?? this.options.shouldStop,
      eventBus: this.options.eventBus,
    };
  }
}
