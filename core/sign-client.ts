/**
 * Request signing.
 *
 * The platform rejects API calls that do not carry `x-zst-81` / `x-zse-96`
 * headers computed from the request URI and the session cookie. The
 * computation lives in a separate signing service; this module only speaks to it.
 */

import { z } from 'zod';
import { CrawlErrors } from './errors';
import { AxiosTransport, HttpTransport } from './http-transport';
import { safeJsonParseSafe } from '../utils/safe-json';

export type AuthHeaders = Record<string, string>;

export interface SigningDelegate {
  /**
   * @param uri - path plus query string, exactly as it will be sent
   * @param cookies - the session's raw cookie header
   * @throws CrawlError with code `SIGNING_FAILED`
   */
  sign(uri: string, cookies: string): Promise<AuthHeaders>;
}

export interface SignClientOptions {
  baseUrl: string;
  timeoutMs?: number;
}

const SIGN_PATH = '/signsrv/v1/zhihu/sign';

const signResponseSchema = z.object({
  isok: z.boolean(),
  msg: z.string().optional(),
  data: z
    .object({
      x_zst_81: z.string(),
      x_zse_96: z.string(),
    })
    .nullish(),
});

export class HttpSignClient implements SigningDelegate {
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(
    options: SignClientOptions,
    private readonly transport: HttpTransport = new AxiosTransport(),
  ) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}${SIGN_PATH}`;
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  async sign(uri: string, cookies: string): Promise<AuthHeaders> {
    let status: number;
    let body: string;
    try {
      ({ status, body } = await this.transport.send({
        method: 'POST',
        url: this.endpoint,
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ uri, cookies }),
        proxyUrl: null,
        timeoutMs: this.timeoutMs,
      }));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw CrawlErrors.signingFailed(
        `Signing service unreachable: ${message}`,
        { uri, url: this.endpoint },
        error instanceof Error ? error : undefined,
      );
    }

    if (status !== 200) {
      throw CrawlErrors.signingFailed(`Signing service returned HTTP ${status}`, {
        uri,
        statusCode: status,
      });
    }

    const parsed = signResponseSchema.safeParse(safeJsonParseSafe(body));
    if (!parsed.success) {
      throw CrawlErrors.signingFailed('Signing service returned an unexpected body', { uri });
    }
    if (!parsed.data.isok || !parsed.data.data) {
      throw CrawlErrors.signingFailed(`Signing refused: ${parsed.data.msg ?? 'no reason given'}`, { uri });
    }

    return {
      'x-zst-81': parsed.data.data.x_zst_81,
      'x-zse-96': parsed.data.data.x_zse_96,
    };
  }
}
