import { z } from 'zod';
import { API_PATHS, BASE_HEADERS, ME_INCLUDE } from '../config/constants';
import { createModuleLogger } from '../utils/logger';
import { safeJsonParseSafe } from '../utils/safe-json';
import type { HttpTransport } from './http-transport';
import type { Credential, CurrentIdentity, ProxyBinding } from './types';

const log = createModuleLogger('IdentityProbe');

/**
 * Lightweight "who am I" check for a candidate session.
 */
export interface SessionProbe {
  /** Resolves to `null` when the credential is not logged in; never rejects */
  check(credential: Credential, proxy: ProxyBinding): Promise<CurrentIdentity | null>;
}

export interface IdentityProbeOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
}

const meSchema = z.object({
  uid: z.union([z.string(), z.number()]).transform((uid) => String(uid)),
  name: z.string().min(1),
  url_token: z.string().optional(),
});

/**
 * Probes `/api/v4/me` with the candidate's cookie through its proxy. The
 * endpoint does not need a signature.
 */
export class IdentityProbe implements SessionProbe {
  constructor(
    private readonly transport: HttpTransport,
    private readonly options: IdentityProbeOptions,
  ) {}

  async check(credential: Credential, proxy: ProxyBinding): Promise<CurrentIdentity | null> {
    const query = new URLSearchParams({ include: ME_INCLUDE }).toString();
    log.info(`Checking login state of account ${credential.name}`, { proxy: proxy.id });

    try {
      const response = await this.transport.send({
        method: 'GET',
        url: `${this.options.baseUrl}${API_PATHS.me}?${query}`,
        headers: {
          ...BASE_HEADERS,
          cookie: credential.cookies,
          'user-agent': this.options.userAgent,
        },
        proxyUrl: proxy.url,
        timeoutMs: this.options.timeoutMs,
      });

      if (response.status !== 200) {
        log.warn(`Probe for ${credential.name} returned HTTP ${response.status}`);
        return null;
      }

      const parsed = meSchema.safeParse(safeJsonParseSafe(response.body));
      if (!parsed.success) {
        log.warn(`Probe for ${credential.name} returned no identity`);
        return null;
      }

      return {
        uid: parsed.data.uid,
        name: parsed.data.name,
        urlToken: parsed.data.url_token,
      };
    } catch (error: unknown) {
      log.error(`Probe for ${credential.name} failed`, error);
      return null;
    }
  }
}
