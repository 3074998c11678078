import type { StopSignal } from '../utils/async';
import { createModuleLogger } from '../utils/logger';
import type { CredentialPool } from './credential-pool';
import { CrawlErrors } from './errors';
import type { CrawlEventBus } from './event-bus';
import type { SessionProbe } from './identity-probe';
import { isProxyExpired, Session, SessionState } from './types';

export interface SessionBinderOptions {
  /** Candidates to try per bind; 0 keeps trying until the pool gives up */
  maxBindAttempts?: number;
  shouldStop?: StopSignal;
  eventBus?: CrawlEventBus;
  now?: () => number;
}

/**
 * Sole owner of the crawl session.
 *
 * Lifecycle: unbound → binding → valid → (degraded → binding)* → closed.
 * The session object is replaced wholesale on every change, so a reference
 * handed out earlier never observes a half-updated binding.
 */
export class SessionBinder {
  private readonly log = createModuleLogger('SessionBinder');
  private session: Session | null = null;
  private _state: SessionState = 'unbound';
  private readonly now: () => number;

  constructor(
    private readonly pool: CredentialPool,
    private readonly probe: SessionProbe,
    private readonly options: SessionBinderOptions = {},
  ) {
    this.now = options.now ?? Date.now;
  }

  get state(): SessionState {
    return this._state;
  }

  current(): Session | null {
    return this.session;
  }

  /**
   * Returns the bound session, binding a new one first when needed: acquire a
   * candidate, refresh its proxy if already stale, probe it, and invalidate
   * the credential when the probe says it is logged out.
   */
  async ensureValid(): Promise<Session> {
    this.assertOpen();
    if (this.session && this._state === 'valid') {
      return this.session;
    }

    this.setState('binding');
    const maxAttempts = this.options.maxBindAttempts ?? 0;

    try {
      for (let attempt = 1; ; attempt++) {
        this.assertOpen();
        if (this.options.shouldStop && (await this.options.shouldStop())) {
          throw CrawlErrors.cancelled('Session binding cancelled', { attempt });
        }
        if (maxAttempts > 0 && attempt > maxAttempts) {
          throw CrawlErrors.sessionUnavailable(`No valid session after ${maxAttempts} candidates`, {
            attempt: maxAttempts,
          });
        }

        const lease = await this.pool.acquire();
        const proxy = isProxyExpired(lease.proxy, this.now())
          ? await this.pool.refreshProxy(lease.credential)
          : lease.proxy;

        const identity = await this.probe.check(lease.credential, proxy);
        if (this._state === 'closed') {
          await this.pool.release(lease.credential);
          throw CrawlErrors.clientClosed();
        }

        if (identity) {
          this.session = {
            credential: lease.credential,
            proxy,
            identity,
            valid: true,
            boundAt: this.now(),
          };
          this.log.info(`Bound account ${lease.credential.name} as ${identity.name}`, {
            attempt,
            proxy: proxy.id,
          });
          this.setState('valid');
          return this.session;
        }

        this.log.warn(`Account ${lease.credential.name} failed the login probe`, { attempt });
        await this.pool.invalidateCredential(lease.credential);
      }
    } catch (error: unknown) {
      if (this._state === 'binding') {
        this.setState(this.session ? 'degraded' : 'unbound');
      }
      throw error;
    }
  }

  /**
   * Swaps in a fresh proxy for the same credential when the current binding
   * has expired. Not a failure, so nothing is invalidated.
   */
  async refreshProxyIfExpired(): Promise<Session> {
    const session = this.requireSession();
    if (!isProxyExpired(session.proxy, this.now())) {
      return session;
    }

    const proxy = await this.pool.refreshProxy(session.credential);
    this.assertOpen();
    this.log.info(`Proxy ${session.proxy.id} expired, rebound to ${proxy.id}`);
    this.session = { ...session, proxy };
    return this.session;
  }

  /**
   * Gives up on the current credential and proxy, then binds a new session.
   */
  async rotate(reason: string): Promise<Session> {
    this.assertOpen();
    const old = this.session;
    if (old) {
      this.log.warn(`Rotating away from ${old.credential.name}: ${reason}`);
      await this.pool.invalidateCredential(old.credential);
      await this.pool.invalidateProxy(old.proxy);
    }
    this.session = null;
    this.setState('degraded', reason);
    return this.ensureValid();
  }

  /**
   * Marks the session invalid without rebinding; the next `ensureValid()` binds
   * a new one.
   */
  async invalidate(reason: string): Promise<void> {
    this.assertOpen();
    const old = this.session;
    if (!old) return;

    this.log.warn(`Invalidating ${old.credential.name}: ${reason}`);
    this.session = null;
    this.setState('degraded', reason);
    await this.pool.invalidateCredential(old.credential);
  }

  /**
   * Hands a healthy credential back to the pool.
   */
  async release(): Promise<void> {
    const old = this.session;
    if (!old) return;

    this.session = null;
    if (this._state !== 'closed') this.setState('unbound');
    await this.pool.release(old.credential);
  }

  async close(): Promise<void> {
    if (this._state === 'closed') return;
    const old = this.session;
    this.session = null;
    this.setState('closed');
    if (old) {
      await this.pool.release(old.credential);
    }
  }

  private requireSession(): Session {
    this.assertOpen();
    if (!this.session) {
      throw CrawlErrors.sessionUnavailable('No bound session, call ensureValidSession() first');
    }
    return this.session;
  }

  private assertOpen(): void {
    if (this._state === 'closed') {
      throw CrawlErrors.clientClosed();
    }
  }

  private setState(state: SessionState, reason?: string): void {
    this._state = state;
    this.options.eventBus?.emitSession({
      state,
      credential: this.session?.credential.name,
      reason,
    });
  }
}
