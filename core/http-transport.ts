/**
 * HttpTransport - one raw HTTP exchange, optionally through an HTTP(S) proxy.
 *
 * Status codes are never turned into exceptions here (`validateStatus` accepts
 * everything) and bodies come back as text, so the executor can classify
 * non-2xx replies and malformed JSON itself. Only transport-level failures
 * (DNS, refused connections, timeouts, proxy errors) reject.
 */

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

export type HttpMethod = 'GET' | 'POST';

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  /** `null` for a direct connection */
  proxyUrl: string | null;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

const MAX_CACHED_PROXY_CLIENTS = 32;

export class AxiosTransport implements HttpTransport {
  private directClient: AxiosInstance;
  private proxiedClients = new Map<string, AxiosInstance>();

  constructor() {
    this.directClient = this.createClient(null);
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const client = this.clientFor(request.proxyUrl);
    const response = await client.request<string>({
      method: request.method,
      url: request.url,
      headers: request.headers,
      data: request.body,
      timeout: request.timeoutMs,
    });

    return {
      status: response.status,
      body: typeof response.data === 'string' ? response.data : '',
    };
  }

  private clientFor(proxyUrl: string | null): AxiosInstance {
    if (!proxyUrl) {
      return this.directClient;
    }

    const cached = this.proxiedClients.get(proxyUrl);
    if (cached) {
      return cached;
    }

    if (this.proxiedClients.size >= MAX_CACHED_PROXY_CLIENTS) {
      this.proxiedClients.clear();
    }
    const client = this.createClient(proxyUrl);
    this.proxiedClients.set(proxyUrl, client);
    return client;
  }

  private createClient(proxyUrl: string | null): AxiosInstance {
    const axiosConfig: AxiosRequestConfig = {
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      proxy: false,
    };

    if (proxyUrl) {
      const agent = new HttpsProxyAgent(proxyUrl);
      axiosConfig.httpsAgent = agent;
      axiosConfig.httpAgent = agent;
    }

    return axios.create(axiosConfig);
  }
}
