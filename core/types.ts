/**
 * Shared crawl types: credentials, proxy bindings, sessions, cursors and decoded items.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ==========================================
// Credentials & sessions
// ==========================================

export interface Credential {
  id: string;
  name: string;
  /** Raw `Cookie` header value */
  cookies: string;
}

export interface ProxyBinding {
  id: string;
  /** `null` means a direct connection */
  url: string | null;
  /** Epoch millis; `Infinity` for bindings that never expire */
  expiresAt: number;
}

export interface CurrentIdentity {
  uid: string;
  name: string;
  urlToken?: string;
}

export interface Session {
  readonly credential: Credential;
  readonly proxy: ProxyBinding;
  readonly identity: CurrentIdentity;
  readonly valid: boolean;
  readonly boundAt: number;
}

export type SessionState = 'unbound' | 'binding' | 'valid' | 'degraded' | 'closed';

export function isProxyExpired(proxy: ProxyBinding, now: number = Date.now()): boolean {
  return proxy.expiresAt <= now;
}

// ==========================================
// Cursors
// ==========================================

export interface OffsetCursor {
  kind: 'offset';
  offset: number;
  limit: number;
}

export interface TokenCursor {
  kind: 'token';
  opaque: string;
  extraParams: Record<string, string>;
}

export interface CommentCursor {
  kind: 'comment';
  /** The platform hands back an opaque string, not a number */
  offset: string;
  limit: number;
}

export type PageCursor = OffsetCursor | TokenCursor | CommentCursor;

export type QueryParams = Record<string, string | number | boolean>;

// ==========================================
// Request results
// ==========================================

export type ApiResult = { kind: 'data'; body: JsonObject } | { kind: 'empty' };

export const EMPTY_RESULT: ApiResult = { kind: 'empty' };

// ==========================================
// Decoded items
// ==========================================

export type ContentType = 'answer' | 'article' | 'zvideo' | 'question';

export interface ContentRef {
  contentId: string;
  contentType: Exclude<ContentType, 'question'>;
}

export interface ContentItem extends ContentRef {
  title: string;
  excerpt: string;
  url: string;
  authorName: string;
  authorUrlToken: string;
  voteupCount: number;
  commentCount: number;
  createdTime: number;
  updatedTime: number;
  questionId?: string;
}

export interface CommentItem {
  commentId: string;
  parentCommentId: string | null;
  contentId: string;
  contentType: ContentRef['contentType'];
  content: string;
  authorName: string;
  authorUrlToken: string;
  likeCount: number;
  subCommentCount: number;
  publishTime: number;
  ipLocation: string;
}
