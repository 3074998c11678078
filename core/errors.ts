/**
 * Error Handling Module
 * Contains Error Codes, CrawlError, Classifier, Utils and the CrawlErrors factory.
 */

// ==========================================
// Part 1: Error Codes & Types
// ==========================================

export enum ErrorCode {
  // Network Errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  // HTTP / API Errors
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  SERVER_ERROR = 'SERVER_ERROR',
  API_ERROR = 'API_ERROR',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  FORBIDDEN = 'FORBIDDEN',
  DATA_FETCH_FAILED = 'DATA_FETCH_FAILED',
  // Collaborators
  SIGNING_FAILED = 'SIGNING_FAILED',
  POOL_EXHAUSTED = 'POOL_EXHAUSTED',
  // Walks
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',
  CANCELLED = 'CANCELLED',
  // Session lifecycle
  SESSION_UNAVAILABLE = 'SESSION_UNAVAILABLE',
  CLIENT_CLOSED = 'CLIENT_CLOSED',
  // System Errors
  CONFIG_ERROR = 'CONFIG_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export interface ErrorContext {
  url?: string;
  uri?: string;
  credential?: string;
  operation?: string;
  statusCode?: number;
  attempt?: number;
  [key: string]: unknown;
}

const TRANSIENT_NETWORK_CODES = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'EPIPE',
];

// ==========================================
// Part 2: CrawlError Class
// ==========================================

export class CrawlError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly originalError?: Error;
  public readonly statusCode?: number;

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      retryable?: boolean;
      context?: ErrorContext;
      originalError?: Error;
      statusCode?: number;
    } = {},
  ) {
    super(message);
    this.name = 'CrawlError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.context = options.context || {};
    this.timestamp = new Date();
    this.originalError = options.originalError;
    this.statusCode = options.statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CrawlError);
    }
  }

  public getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.FORBIDDEN:
        return 'Account rejected by the platform (403), it is probably banned.';
      case ErrorCode.POOL_EXHAUSTED:
        return 'No usable account is left in the pool.';
      case ErrorCode.SIGNING_FAILED:
        return 'Signing service unreachable.';
      case ErrorCode.NETWORK_ERROR:
        return 'Network error.';
      case ErrorCode.TIMEOUT:
        return 'Operation timed out.';
      case ErrorCode.CLIENT_CLOSED:
        return 'Crawl client is closed.';
      default:
        return this.message;
    }
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      statusCode: this.statusCode,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
          }
        : undefined,
    };
  }

  /**
   * Maps a non-2xx, non-404 status to an error. Only 403 is terminal; everything
   * else is worth another attempt.
   */
  static fromHttpResponse(status: number, bodyText: string, context?: ErrorContext): CrawlError {
    const ctx: ErrorContext = { ...(context || {}), statusCode: status };
    const detail = bodyText.length > 200 ? `${bodyText.slice(0, 200)}...` : bodyText;

    if (status === 403) {
      return new CrawlError(ErrorCode.FORBIDDEN, `Forbidden: ${detail}`, {
        retryable: false,
        statusCode: status,
        context: ctx,
      });
    }
    if (status === 429) {
      return new CrawlError(ErrorCode.RATE_LIMIT_EXCEEDED, `Rate limit exceeded: ${detail}`, {
        retryable: true,
        statusCode: status,
        context: ctx,
      });
    }
    if (status >= 500) {
      return new CrawlError(ErrorCode.SERVER_ERROR, `Server error ${status}: ${detail}`, {
        retryable: true,
        statusCode: status,
        context: ctx,
      });
    }
    return new CrawlError(ErrorCode.API_ERROR, `HTTP ${status}: ${detail}`, {
      retryable: true,
      statusCode: status,
      context: ctx,
    });
  }

  static isForbidden(error: unknown): boolean {
    return error instanceof CrawlError && error.code === ErrorCode.FORBIDDEN;
  }
}

/**
 * A walk that failed part-way. Keeps the code, message and context of the
 * failure, and carries the items collected before it.
 */
export class PartialResultError<T = unknown> extends CrawlError {
  public readonly items: T[];

  constructor(cause: CrawlError, items: T[]) {
    super(cause.code, cause.message, {
      retryable: cause.retryable,
      context: { ...cause.context, collected: items.length },
      originalError: cause,
      statusCode: cause.statusCode,
    });
    this.name = 'PartialResultError';
    this.items = items;
  }
}

export function isCrawlError(value: unknown): value is CrawlError {
  return value instanceof CrawlError;
}

// ==========================================
// Part 3: Error Classifier
// ==========================================

function readErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export class ErrorClassifier {
  /**
   * Classifies an exception thrown by the transport (not an HTTP status).
   */
  static classify(error: unknown, context?: ErrorContext): CrawlError {
    if (error instanceof CrawlError) {
      if (context) Object.assign(error.context, context);
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const originalError = error instanceof Error ? error : undefined;
    const lowerMessage = message.toLowerCase();
    const code = readErrorCode(error);

    if (
      code === 'ECONNABORTED' ||
      code === 'ETIMEDOUT' ||
      lowerMessage.includes('timeout') ||
      lowerMessage.includes('timed out')
    ) {
      return new CrawlError(ErrorCode.TIMEOUT, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    if (
      (code !== undefined && TRANSIENT_NETWORK_CODES.includes(code)) ||
      lowerMessage.includes('network') ||
      lowerMessage.includes('socket hang up') ||
      lowerMessage.includes('proxy')
    ) {
      return new CrawlError(ErrorCode.NETWORK_ERROR, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    return new CrawlError(ErrorCode.UNKNOWN_ERROR, message, {
      retryable: false,
      context,
      originalError,
    });
  }
}

// ==========================================
// Part 4: Error Utilities
// ==========================================

export function handleError(error: unknown, context?: ErrorContext): CrawlError {
  const crawlError = ErrorClassifier.classify(error);
  if (context && Object.keys(context).length > 0) Object.assign(crawlError.context, context);
  return crawlError;
}

// ==========================================
// Part 5: CrawlErrors Factory
// ==========================================

export const CrawlErrors = {
  forbidden: (message: string, context?: ErrorContext) =>
    new CrawlError(ErrorCode.FORBIDDEN, message, {
      retryable: false,
      statusCode: 403,
      context,
    }),

  invalidResponse: (message: string, context?: ErrorContext, originalError?: Error) =>
    new CrawlError(ErrorCode.INVALID_RESPONSE, message, {
      retryable: true,
      context,
      originalError,
    }),

  dataFetchFailed: (message: string, context?: ErrorContext, originalError?: Error) =>
    new CrawlError(ErrorCode.DATA_FETCH_FAILED, message, {
      retryable: false,
      context,
      originalError,
    }),

  signingFailed: (message: string, context?: ErrorContext, originalError?: Error) =>
    new CrawlError(ErrorCode.SIGNING_FAILED, message, {
      retryable: true,
      context,
      originalError,
    }),

  poolExhausted: (message: string = 'Credential pool exhausted', context?: ErrorContext) =>
    new CrawlError(ErrorCode.POOL_EXHAUSTED, message, {
      retryable: false,
      context,
    }),

  protocolError: (message: string, context?: ErrorContext) =>
    new CrawlError(ErrorCode.PROTOCOL_ERROR, message, {
      retryable: false,
      context,
    }),

  sessionUnavailable: (message: string, context?: ErrorContext) =>
    new CrawlError(ErrorCode.SESSION_UNAVAILABLE, message, {
      retryable: false,
      context,
    }),

  clientClosed: () =>
    new CrawlError(ErrorCode.CLIENT_CLOSED, 'Crawl client is closed', {
      retryable: false,
    }),

  cancelled: (message: string = 'Crawl cancelled', context?: ErrorContext) =>
    new CrawlError(ErrorCode.CANCELLED, message, {
      retryable: false,
      context,
    }),

  invalidConfiguration: (message: string, context?: ErrorContext) =>
    new CrawlError(ErrorCode.CONFIG_ERROR, message, {
      retryable: false,
      context,
    }),
};
