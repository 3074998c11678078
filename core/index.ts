/**
 * Core Module Exports
 */

export * from './types';

// Errors
export {
  CrawlError,
  CrawlErrors,
  ErrorClassifier,
  ErrorCode,
  type ErrorContext,
  handleError,
  isCrawlError,
  PartialResultError,
} from './errors';

// Collaborators
export { AxiosTransport, type HttpMethod, type HttpRequest, type HttpResponse, type HttpTransport } from './http-transport';
export { type AuthHeaders, HttpSignClient, type SignClientOptions, type SigningDelegate } from './sign-client';
export { IdentityProbe, type IdentityProbeOptions, type SessionProbe } from './identity-probe';
export {
  type CredentialLease,
  type CredentialPool,
  LocalCredentialPool,
  type LocalPoolOptions,
  parseProxyLine,
  type PoolStats,
} from './credential-pool';

// Session & requests
export { SessionBinder, type SessionBinderOptions } from './session-binder';
export { type ApiRequest, buildUri, RequestExecutor, type RequestExecutorOptions } from './request-executor';

// Walks
export { commentProtocol, offsetProtocol, type PageProtocol, tokenProtocol } from './pagination';
export { type PageSink, walk, type WalkEndReason, type WalkOptions, type WalkReport, walkSettled } from './page-walker';
export { type CommentTreeOptions, walkCommentTree } from './comment-tree-walker';
export * from './extractor';

// Facade
export * from './crawl-client';

// Events & config
export { CrawlEventBus, createEventBus, type PageEventData, type SessionEventData } from './event-bus';
export { type Env, parseEnv } from './env';
