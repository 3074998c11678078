import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { sleep } from '../utils/async';
import { createModuleLogger } from '../utils/logger';
import { safeJsonParse } from '../utils/safe-json';
import { CrawlErrors } from './errors';
import type { CrawlEventBus } from './event-bus';
import type { Credential, ProxyBinding } from './types';

export interface CredentialLease {
  credential: Credential;
  proxy: ProxyBinding;
}

/**
 * Source of `(credential, proxy)` pairs. A credential is leased to at most one
 * session at a time.
 */
export interface CredentialPool {
  /** @throws CrawlError with code `POOL_EXHAUSTED` */
  acquire(): Promise<CredentialLease>;
  invalidateCredential(credential: Credential): Promise<void>;
  invalidateProxy(proxy: ProxyBinding): Promise<void>;
  refreshProxy(credential: Credential): Promise<ProxyBinding>;
  /** Ends a lease without counting it as a failure */
  release(credential: Credential): Promise<void>;
}

interface AccountRecord {
  credential: Credential;
  usageCount: number;
  failureCount: number;
  cooldownUntil: number;
  leased: boolean;
  isRetired: boolean;
}

interface ProxyRecord {
  id: string;
  url: string;
  usageCount: number;
  failureCount: number;
  isRetired: boolean;
}

export interface LocalPoolOptions {
  accountsDir?: string;
  proxyFile?: string;
  enableProxy?: boolean;
  proxyTtlMs?: number;
  cooldownMs?: number;
  maxFailures?: number;
  acquireTimeoutMs?: number;
  pollIntervalMs?: number;
  now?: () => number;
  eventBus?: CrawlEventBus;
}

export interface PoolStats {
  accounts: number;
  leased: number;
  retired: number;
  proxies: number;
  retiredProxies: number;
}

const DIRECT_BINDING_ID = 'direct';

const accountFileSchema = z.object({
  name: z.string().min(1),
  cookies: z.union([
    z.string().min(1),
    z.array(z.object({ name: z.string().min(1), value: z.string() })).min(1),
  ]),
});

export type AccountFile = z.infer<typeof accountFileSchema>;

export function cookieHeaderFrom(cookies: AccountFile['cookies']): string {
  if (typeof cookies === 'string') return cookies.trim();
  return cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ');
}

/**
 * Parses `host:port` or `host:port:username:password`. Returns `null` for
 * anything else.
 */
export function parseProxyLine(line: string): { id: string; url: string } | null {
  const parts = line.trim().split(':').map((part) => part.trim());
  if (parts.length !== 2 && parts.length !== 4) return null;

  const [host, portText, username, password] = parts;
  const port = Number.parseInt(portText, 10);
  if (!host || !Number.isInteger(port) || port <= 0 || port > 65535) return null;

  const id = `${host}:${port}`;
  if (parts.length === 2) {
    return { id, url: `http://${id}` };
  }
  return {
    id,
    url: `http://${encodeURIComponent(username)}:${encodeURIComponent(password)}@${id}`,
  };
}

/**
 * File-backed pool: accounts from `<accountsDir>/*.json`, proxies from a text
 * file. Selection prefers the healthiest account (fewest failures, then least
 * used); proxies are bound per account and rotated when they expire.
 */
export class LocalCredentialPool implements CredentialPool {
  private readonly log = createModuleLogger('CredentialPool');
  private accounts: AccountRecord[] = [];
  private proxies: ProxyRecord[] = [];
  private accountProxyMap = new Map<string, string>(); // credentialId -> proxyId
  private loaded = false;

  private readonly accountsDir: string;
  private readonly proxyFile: string;
  private readonly enableProxy: boolean;
  private readonly proxyTtlMs: number;
  private readonly cooldownMs: number;
  private readonly maxFailures: number;
  private readonly acquireTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;

  constructor(private readonly options: LocalPoolOptions = {}) {
    this.accountsDir = options.accountsDir ?? './accounts';
    this.proxyFile = options.proxyFile ?? './proxy/proxies.txt';
    this.enableProxy = options.enableProxy ?? false;
    this.proxyTtlMs = options.proxyTtlMs ?? 5 * 60 * 1000;
    this.cooldownMs = options.cooldownMs ?? 5 * 60 * 1000;
    this.maxFailures = options.maxFailures ?? 3;
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? 60 * 1000;
    this.pollIntervalMs = options.pollIntervalMs ?? 500;
    this.now = options.now ?? Date.now;
  }

  /**
   * Loads account and proxy files once. Called lazily by `acquire()`; records
   * added by hand before that are kept.
   */
  async init(): Promise<void> {
    if (this.loaded) return;
    this.loaded = true;

    this.loadAccounts();
    if (this.enableProxy) {
      this.loadProxies();
    }
    this._log(`Loaded ${this.accounts.length} accounts and ${this.proxies.length} proxies.`);
  }

  addCredential(credential: Credential): void {
    if (this.accounts.some((a) => a.credential.id === credential.id)) {
      this._log(`Duplicate account ${credential.id} ignored`, 'warn');
      return;
    }
    this.accounts.push({
      credential,
      usageCount: 0,
      failureCount: 0,
      cooldownUntil: 0,
      leased: false,
      isRetired: false,
    });
  }

  addProxy(line: string): boolean {
    const parsed = parseProxyLine(line);
    if (!parsed) {
      this._log(`Skipping invalid proxy format: ${line}`, 'warn');
      return false;
    }
    if (this.proxies.some((p) => p.id === parsed.id)) return false;

    this.proxies.push({ ...parsed, usageCount: 0, failureCount: 0, isRetired: false });
    return true;
  }

  async acquire(): Promise<CredentialLease> {
    await this.init();
    const deadline = this.now() + this.acquireTimeoutMs;

    for (;;) {
      const servable = this.accounts.filter((a) => !a.isRetired);
      if (servable.length === 0) {
        throw CrawlErrors.poolExhausted('No usable account left in the pool', {
          accounts: this.accounts.length,
        });
      }

      const now = this.now();
      const candidates = servable.filter((a) => !a.leased && a.cooldownUntil <= now);
      if (candidates.length > 0) {
        const selected = [...candidates].sort((a, b) => {
          if (a.failureCount !== b.failureCount) {
            return a.failureCount - b.failureCount;
          }
          return a.usageCount - b.usageCount;
        })[0];

        selected.leased = true;
        selected.usageCount++;
        const proxy = this.bindProxy(selected.credential.id, null);
        this._log(
          `Leased account ${selected.credential.name} (failures: ${selected.failureCount}, usage: ${selected.usageCount}) via ${proxy.id}`,
        );
        return { credential: selected.credential, proxy };
      }

      if (now >= deadline) {
        throw CrawlErrors.poolExhausted('Timed out waiting for a free account', {
          waitedMs: this.acquireTimeoutMs,
        });
      }
      await sleep(this.pollIntervalMs);
    }
  }

  async invalidateCredential(credential: Credential): Promise<void> {
    const record = this.findAccount(credential);
    if (!record) return;

    record.leased = false;
    record.failureCount++;
    record.cooldownUntil = this.now() + this.cooldownMs;
    this.accountProxyMap.delete(credential.id);
    this._log(`Account ${credential.name} failure count: ${record.failureCount}`, 'warn');

    if (record.failureCount >= this.maxFailures) {
      record.isRetired = true;
      this._log(`Account ${credential.name} has been RETIRED due to too many failures.`, 'error');
    }
  }

  async invalidateProxy(proxy: ProxyBinding): Promise<void> {
    const record = this.proxies.find((p) => p.id === proxy.id);
    if (!record) return;

    record.failureCount++;
    for (const [credentialId, proxyId] of this.accountProxyMap) {
      if (proxyId === record.id) this.accountProxyMap.delete(credentialId);
    }
    this._log(`Proxy ${record.id} failure count: ${record.failureCount}`, 'warn');

    if (record.failureCount >= this.maxFailures) {
      record.isRetired = true;
      this._log(`Proxy ${record.id} has been RETIRED due to too many failures.`, 'error');
    }
  }

  async refreshProxy(credential: Credential): Promise<ProxyBinding> {
    if (!this.findAccount(credential)) {
      throw CrawlErrors.sessionUnavailable(`Account ${credential.name} does not belong to this pool`, {
        credential: credential.name,
      });
    }
    const previous = this.accountProxyMap.get(credential.id) ?? null;
    this.accountProxyMap.delete(credential.id);
    const proxy = this.bindProxy(credential.id, previous);
    this._log(`Refreshed proxy for ${credential.name}: ${previous ?? 'none'} → ${proxy.id}`);
    return proxy;
  }

  async release(credential: Credential): Promise<void> {
    const record = this.findAccount(credential);
    if (!record) return;

    record.leased = false;
    if (record.failureCount > 0) record.failureCount--;
    this._log(`Released account ${credential.name}`);
  }

  getStats(): PoolStats {
    return {
      accounts: this.accounts.length,
      leased: this.accounts.filter((a) => a.leased).length,
      retired: this.accounts.filter((a) => a.isRetired).length,
      proxies: this.proxies.length,
      retiredProxies: this.proxies.filter((p) => p.isRetired).length,
    };
  }

  private findAccount(credential: Credential): AccountRecord | undefined {
    return this.accounts.find((a) => a.credential.id === credential.id);
  }

  /**
   * Reuses the account's current proxy when it is still healthy; otherwise
   * picks a new one, avoiding `excludeId` when there is any alternative.
   */
  private bindProxy(credentialId: string, excludeId: string | null): ProxyBinding {
    const active = this.proxies.filter((p) => !p.isRetired);
    if (active.length === 0) {
      return { id: DIRECT_BINDING_ID, url: null, expiresAt: Number.POSITIVE_INFINITY };
    }

    const existingId = this.accountProxyMap.get(credentialId);
    let selected = existingId ? active.find((p) => p.id === existingId) : undefined;

    if (!selected) {
      const eligible = active.filter((p) => p.id !== excludeId);
      if (eligible.length === 0) {
        selected = active[0];
      } else if (excludeId === null) {
        // Deterministic first binding keeps an account on the same egress IP across runs
        selected = eligible[Math.abs(this.hashCode(credentialId)) % eligible.length];
      } else {
        selected = [...eligible].sort((a, b) => a.usageCount - b.usageCount)[0];
      }
    }

    selected.usageCount++;
    this.accountProxyMap.set(credentialId, selected.id);
    return { id: selected.id, url: selected.url, expiresAt: this.now() + this.proxyTtlMs };
  }

  private hashCode(str: string): number {
    let hash = 0;
    for (let i = 0; i < str.length; i++) {
      hash = (hash << 5) - hash + str.charCodeAt(i);
      hash |= 0;
    }
    return hash;
  }

  private loadAccounts(): void {
    if (!fs.existsSync(this.accountsDir)) {
      this._log(`Accounts directory not found: ${this.accountsDir}`, 'warn');
      return;
    }

    const files = fs.readdirSync(this.accountsDir).filter((f) => f.endsWith('.json'));
    for (const file of files) {
      const filePath = path.join(this.accountsDir, file);
      try {
        const parsed = accountFileSchema.safeParse(safeJsonParse(fs.readFileSync(filePath, 'utf-8')));
        if (!parsed.success) {
          this._log(`Skipping account file ${file}: ${parsed.error.issues[0]?.message ?? 'invalid'}`, 'warn');
          continue;
        }
        this.addCredential({
          id: path.basename(file, '.json'),
          name: parsed.data.name,
          cookies: cookieHeaderFrom(parsed.data.cookies),
        });
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        this._log(`Failed to load account file ${file}: ${message}`, 'error');
      }
    }
  }

  private loadProxies(): void {
    if (!fs.existsSync(this.proxyFile)) {
      this._log(`Proxy file not found: ${this.proxyFile}. Connecting directly.`, 'warn');
      return;
    }

    const lines = fs
      .readFileSync(this.proxyFile, 'utf-8')
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('#'));

    for (const line of lines) {
      this.addProxy(line);
    }
  }

  private _log(message: string, level: 'info' | 'warn' | 'error' = 'info'): void {
    this.options.eventBus?.emitLog(`[CredentialPool] ${message}`, level);
    if (level === 'error') this.log.error(message);
    else if (level === 'warn') this.log.warn(message);
    else this.log.info(message);
  }
}
