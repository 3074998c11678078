/**
 * RequestExecutor - one logical API call.
 *
 * Every attempt refreshes an expired proxy, signs the exact URI, sends it and
 * classifies the outcome:
 * - 2xx with a JSON object and no `error` field: data
 * - 404: empty result
 * - 403: FORBIDDEN, thrown at once (the session is dropped first when
 *   `invalidateOnForbidden` is set)
 * - anything else: retryable
 *
 * Retryable failures get `maxAttempts` tries with a fixed pause. When those run
 * out the session is rotated and the request is sent exactly once more.
 */

import { BASE_HEADERS, COLUMN_PATH_PREFIX } from '../config/constants';
import { retryWithFixedDelay } from '../utils/async';
import { createModuleLogger } from '../utils/logger';
import { safeJsonParse } from '../utils/safe-json';
import {
  CrawlError,
  CrawlErrors,
  ErrorClassifier,
  ErrorCode,
  ErrorContext,
  isCrawlError,
} from './errors';
import type { HttpMethod, HttpResponse, HttpTransport } from './http-transport';
import type { SessionBinder } from './session-binder';
import type { SigningDelegate } from './sign-client';
import { ApiResult, EMPTY_RESULT, isJsonObject, QueryParams } from './types';

const log = createModuleLogger('RequestExecutor');

export interface ApiRequest {
  method?: HttpMethod;
  path: string;
  params?: QueryParams;
  /** Defaults to true */
  signed?: boolean;
}

export interface RequestExecutorOptions {
  baseUrl: string;
  columnUrl: string;
  userAgent: string;
  timeoutMs: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  /** Drop the session after a 403 so the next call binds another credential */
  invalidateOnForbidden?: boolean;
}

export function buildUri(path: string, params?: QueryParams): string {
  if (!params || Object.keys(params).length === 0) return path;

  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    query.append(key, String(value));
  }
  return `${path}?${query.toString()}`;
}

function isRetryable(error: unknown): error is CrawlError {
  return isCrawlError(error) && error.retryable;
}

export class RequestExecutor {
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly binder: SessionBinder,
    private readonly signer: SigningDelegate,
    private readonly transport: HttpTransport,
    private readonly options: RequestExecutorOptions,
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async execute(request: ApiRequest): Promise<ApiResult> {
    try {
      return await this.executeWithRetry(request);
    } catch (error: unknown) {
      if (this.options.invalidateOnForbidden && CrawlError.isForbidden(error)) {
        await this.binder.invalidate(`403 on ${request.path}`);
      }
      throw error;
    }
  }

  private async executeWithRetry(request: ApiRequest): Promise<ApiResult> {
    const uri = buildUri(request.path, request.params);
    const context: ErrorContext = { uri, operation: `${request.method ?? 'GET'} ${request.path}` };

    try {
      return await retryWithFixedDelay((attempt) => this.attempt(request, uri, { ...context, attempt }), {
        maxAttempts: this.maxAttempts,
        delay: this.retryDelayMs,
        shouldRetry: isRetryable,
        onRetry: (error, attempt) => {
          log.warn(`Attempt ${attempt}/${this.maxAttempts} failed for ${request.path}`, {
            uri,
            reason: error instanceof Error ? error.message : String(error),
          });
        },
      });
    } catch (error: unknown) {
      if (!isRetryable(error)) throw error;

      log.warn(`All ${this.maxAttempts} attempts failed for ${request.path}, rotating session`, { uri });
      await this.binder.rotate(`${this.maxAttempts} failed attempts on ${request.path}`);

      try {
        return await this.attempt(request, uri, { ...context, attempt: this.maxAttempts + 1 });
      } catch (finalError: unknown) {
        throw this.toFatal(finalError, context);
      }
    }
  }

  private async attempt(request: ApiRequest, uri: string, context: ErrorContext): Promise<ApiResult> {
    const session = await this.binder.refreshProxyIfExpired();
    const headers: Record<string, string> = {
      ...BASE_HEADERS,
      cookie: session.credential.cookies,
      'user-agent': this.options.userAgent,
    };

    if (request.signed !== false) {
      try {
        Object.assign(headers, await this.signer.sign(uri, session.credential.cookies));
      } catch (error: unknown) {
        if (isCrawlError(error) && error.code === ErrorCode.SIGNING_FAILED) throw error;
        const message = error instanceof Error ? error.message : String(error);
        throw CrawlErrors.signingFailed(`Signing failed: ${message}`, context, error instanceof Error ? error : undefined);
      }
    }

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: request.method ?? 'GET',
        url: `${this.hostFor(request.path)}${uri}`,
        headers,
        proxyUrl: session.proxy.url,
        timeoutMs: this.options.timeoutMs,
      });
    } catch (error: unknown) {
      const classified = ErrorClassifier.classify(error, { ...context, credential: session.credential.name });
      if (classified.retryable) throw classified;
      // Any exception out of the transport is an I/O failure
      throw new CrawlError(ErrorCode.NETWORK_ERROR, classified.message, {
        retryable: true,
        context: classified.context,
        originalError: classified.originalError,
      });
    }

    return this.classify(response, context);
  }

  private classify(response: HttpResponse, context: ErrorContext): ApiResult {
    const { status, body } = response;

    if (status === 404) {
      log.info(`Nothing found at ${context.uri}`);
      return EMPTY_RESULT;
    }
    if (status < 200 || status >= 300) {
      throw CrawlError.fromHttpResponse(status, body, context);
    }

    let parsed: unknown;
    try {
      parsed = safeJsonParse(body);
    } catch (error: unknown) {
      throw CrawlErrors.invalidResponse(
        'Response body is not valid JSON',
        { ...context, statusCode: status },
        error instanceof Error ? error : undefined,
      );
    }

    if (!isJsonObject(parsed)) {
      throw CrawlErrors.invalidResponse('Response body is not a JSON object', { ...context, statusCode: status });
    }
    if (parsed.error) {
      const detail = JSON.stringify(parsed.error).slice(0, 200);
      throw CrawlErrors.invalidResponse(`Platform returned an error: ${detail}`, {
        ...context,
        statusCode: status,
      });
    }

    return { kind: 'data', body: parsed };
  }

  private toFatal(error: unknown, context: ErrorContext): unknown {
    if (!isRetryable(error)) return error;

    if (error.code === ErrorCode.SIGNING_FAILED) {
      return new CrawlError(ErrorCode.SIGNING_FAILED, error.message, {
        retryable: false,
        context: { ...context, ...error.context },
        originalError: error,
      });
    }
    return CrawlErrors.dataFetchFailed(`Request failed after rotation: ${error.message}`, context, error);
  }

  private hostFor(path: string): string {
    return path.startsWith(COLUMN_PATH_PREFIX) ? this.options.columnUrl : this.options.baseUrl;
  }
}
