import { CredentialLease, CredentialPool } from '../../core/credential-pool';
import { CrawlErrors } from '../../core/errors';
import type { HttpRequest, HttpResponse, HttpTransport } from '../../core/http-transport';
import type { SessionProbe } from '../../core/identity-probe';
import type { AuthHeaders, SigningDelegate } from '../../core/sign-client';
import type { Credential, CurrentIdentity, ProxyBinding } from '../../core/types';

export function credential(id: string): Credential {
  return { id, name: `user-${id}`, cookies: `z_c0=${id}-token` };
}

export function jsonResponse(body: unknown, status: number = 200): HttpResponse {
  return { status, body: JSON.stringify(body) };
}

/**
 * Hands out credentials in order and records every pool call.
 */
export class FakePool implements CredentialPool {
  readonly acquired: string[] = [];
  readonly invalidatedCredentials: string[] = [];
  readonly invalidatedProxies: string[] = [];
  readonly refreshed: string[] = [];
  readonly released: string[] = [];
  private next = 0;
  private proxyCounter = 0;

  constructor(
    private readonly credentials: Credential[],
    private readonly proxyExpiresAt: () => number = () => Number.POSITIVE_INFINITY,
  ) {}

  async acquire(): Promise<CredentialLease> {
    const selected = this.credentials[this.next];
    if (!selected) throw CrawlErrors.poolExhausted();
    this.next++;
    this.acquired.push(selected.id);
    return { credential: selected, proxy: this.newProxy() };
  }

  async invalidateCredential(cred: Credential): Promise<void> {
    this.invalidatedCredentials.push(cred.id);
  }

  async invalidateProxy(proxy: ProxyBinding): Promise<void> {
    this.invalidatedProxies.push(proxy.id);
  }

  async refreshProxy(cred: Credential): Promise<ProxyBinding> {
    this.refreshed.push(cred.id);
    return { ...this.newProxy(), expiresAt: Number.POSITIVE_INFINITY };
  }

  async release(cred: Credential): Promise<void> {
    this.released.push(cred.id);
  }

  private newProxy(): ProxyBinding {
    this.proxyCounter++;
    return {
      id: `proxy-${this.proxyCounter}`,
      url: `http://10.0.0.${this.proxyCounter}:8080`,
      expiresAt: this.proxyExpiresAt(),
    };
  }
}

/**
 * Treats credentials listed in `loggedOut` as failing the probe.
 */
export class FakeProbe implements SessionProbe {
  readonly checked: string[] = [];

  constructor(private readonly loggedOut: string[] = []) {}

  async check(cred: Credential, _proxy: ProxyBinding): Promise<CurrentIdentity | null> {
    this.checked.push(cred.id);
    if (this.loggedOut.includes(cred.id)) return null;
    return { uid: `uid-${cred.id}`, name: cred.name };
  }
}

export class FakeSigner implements SigningDelegate {
  readonly calls: Array<{ uri: string; cookies: string }> = [];
  failuresLeft = 0;

  async sign(uri: string, cookies: string): Promise<AuthHeaders> {
    this.calls.push({ uri, cookies });
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw CrawlErrors.signingFailed('sign service down');
    }
    return { 'x-zst-81': 'zst', 'x-zse-96': `sig:${uri}` };
  }
}

type Reply = HttpResponse | Error | ((request: HttpRequest) => HttpResponse);

/**
 * Replays queued replies in order; the last one repeats once the queue is drained.
 */
export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly replies: Reply[];

  constructor(...replies: Reply[]) {
    this.replies = replies;
  }

  push(...replies: Reply[]): void {
    this.replies.push(...replies);
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) throw new Error('FakeTransport has no reply queued');
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(request);
    return reply;
  }
}

/** Path + query of a recorded request, without the host */
export function pathOf(request: HttpRequest): string {
  const url = new URL(request.url);
  return url.pathname;
}

export function queryOf(request: HttpRequest): URLSearchParams {
  return new URL(request.url).searchParams;
}
