/**
 * Unified configuration manager
 * Environment variables > config file > defaults.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { CrawlErrors } from '../core/errors';
import { type Env, parseEnv } from '../core/env';
import { safeJsonParse } from './safe-json';
import { DEFAULT_USER_AGENT, PLATFORM_BASE_URL, PLATFORM_COLUMN_URL } from '../config/constants';

export interface AppConfig {
  // Platform client
  client: {
    baseUrl: string;
    columnUrl: string;
    timeoutMs: number;
    userAgent: string;
  };

  // Walk behaviour
  crawl: {
    intervalMs: number;
    enableSubComments: boolean;
    emptyPageTolerance: number;
  };

  // Request retry policy
  retry: {
    maxAttempts: number;
    delayMs: number;
  };

  // Session binding
  session: {
    /** 0 = keep trying until the pool yields a working account */
    maxBindAttempts: number;
    invalidateOnForbidden: boolean;
  };

  // Signing service
  signer: {
    url: string;
    timeoutMs: number;
  };

  // Local account & proxy pool
  pool: {
    accountsDir: string;
    proxyFile: string;
    enableProxy: boolean;
    proxyTtlMs: number;
    cooldownMs: number;
    maxFailures: number;
    acquireTimeoutMs: number;
  };

  // Logging
  logging: {
    level: 'debug' | 'info' | 'warn' | 'error';
    enableFileLogging: boolean;
    logDir: string;
  };
}

const DEFAULT_CONFIG: AppConfig = {
  client: {
    baseUrl: PLATFORM_BASE_URL,
    columnUrl: PLATFORM_COLUMN_URL,
    timeoutMs: 10000,
    userAgent: DEFAULT_USER_AGENT,
  },
  crawl: {
    intervalMs: 1000,
    enableSubComments: true,
    emptyPageTolerance: 1,
  },
  retry: {
    maxAttempts: 3,
    delayMs: 1000,
  },
  session: {
    maxBindAttempts: 0,
    invalidateOnForbidden: false,
  },
  signer: {
    url: 'http://localhost:8989',
    timeoutMs: 10000,
  },
  pool: {
    accountsDir: path.resolve(process.cwd(), 'accounts'),
    proxyFile: path.resolve(process.cwd(), 'proxy', 'proxies.txt'),
    enableProxy: false,
    proxyTtlMs: 5 * 60 * 1000,
    cooldownMs: 5 * 60 * 1000,
    maxFailures: 3,
    acquireTimeoutMs: 60 * 1000,
  },
  logging: {
    level: 'info',
    enableFileLogging: false,
    logDir: path.resolve(process.cwd(), 'logs'),
  },
};

// Shape check for the JSON config file; every key is optional
const fileConfigSchema = z
  .object({
    client: z
      .object({
        baseUrl: z.string().url(),
        columnUrl: z.string().url(),
        timeoutMs: z.number().int(),
        userAgent: z.string(),
      })
      .partial(),
    crawl: z
      .object({
        intervalMs: z.number().int(),
        enableSubComments: z.boolean(),
        emptyPageTolerance: z.number().int(),
      })
      .partial(),
    retry: z.object({ maxAttempts: z.number().int(), delayMs: z.number().int() }).partial(),
    session: z.object({ maxBindAttempts: z.number().int(), invalidateOnForbidden: z.boolean() }).partial(),
    signer: z.object({ url: z.string().url(), timeoutMs: z.number().int() }).partial(),
    pool: z
      .object({
        accountsDir: z.string(),
        proxyFile: z.string(),
        enableProxy: z.boolean(),
        proxyTtlMs: z.number().int(),
        cooldownMs: z.number().int(),
        maxFailures: z.number().int(),
        acquireTimeoutMs: z.number().int(),
      })
      .partial(),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']),
        enableFileLogging: z.boolean(),
        logDir: z.string(),
      })
      .partial(),
  })
  .partial();

export type FileConfig = z.infer<typeof fileConfigSchema>;

function cloneConfig(config: AppConfig): AppConfig {
  return {
    client: { ...config.client },
    crawl: { ...config.crawl },
    retry: { ...config.retry },
    session: { ...config.session },
    signer: { ...config.signer },
    pool: { ...config.pool },
    logging: { ...config.logging },
  };
}

function mergeConfig(target: AppConfig, source: FileConfig): AppConfig {
  return {
    client: { ...target.client, ...source.client },
    crawl: { ...target.crawl, ...source.crawl },
    retry: { ...target.retry, ...source.retry },
    session: { ...target.session, ...source.session },
    signer: { ...target.signer, ...source.signer },
    pool: { ...target.pool, ...source.pool },
    logging: { ...target.logging, ...source.logging },
  };
}

export class ConfigManager {
  private config: AppConfig;
  private configFilePath: string;

  constructor(configFilePath?: string, private env: NodeJS.ProcessEnv = process.env) {
    this.configFilePath = configFilePath || path.resolve(process.cwd(), 'crawler.config.json');
    this.config = cloneConfig(DEFAULT_CONFIG);
    this.load();
  }

  private load(): void {
    this.loadFromFile();
    this.loadFromEnv();
    this.validate();
  }

  private loadFromFile(): void {
    if (!fs.existsSync(this.configFilePath)) {
      return;
    }

    const fileContent = fs.readFileSync(this.configFilePath, 'utf-8');
    let raw: unknown;
    try {
      raw = safeJsonParse(fileContent);
    } catch (error: unknown) {
      throw CrawlErrors.invalidConfiguration(
        `Config file ${this.configFilePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        { filePath: this.configFilePath },
      );
    }

    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw CrawlErrors.invalidConfiguration(
        `Config file ${this.configFilePath} is invalid: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`,
        { filePath: this.configFilePath },
      );
    }
    this.config = mergeConfig(this.config, parsed.data);
  }

  private loadFromEnv(): void {
    let env: Env;
    try {
      env = parseEnv(this.env);
    } catch (error: unknown) {
      throw CrawlErrors.invalidConfiguration(
        `Invalid environment: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (env.CRAWL_BASE_URL) this.config.client.baseUrl = env.CRAWL_BASE_URL;
    if (env.CRAWL_COLUMN_URL) this.config.client.columnUrl = env.CRAWL_COLUMN_URL;
    if (env.REQUEST_TIMEOUT_MS !== undefined) this.config.client.timeoutMs = env.REQUEST_TIMEOUT_MS;

    if (env.CRAWL_INTERVAL_MS !== undefined) this.config.crawl.intervalMs = env.CRAWL_INTERVAL_MS;
    if (env.ENABLE_SUB_COMMENTS !== undefined) {
      this.config.crawl.enableSubComments = env.ENABLE_SUB_COMMENTS;
    }

    if (env.SIGN_SERVER_URL) this.config.signer.url = env.SIGN_SERVER_URL;

    if (env.ACCOUNTS_DIR) this.config.pool.accountsDir = path.resolve(env.ACCOUNTS_DIR);
    if (env.PROXY_FILE) this.config.pool.proxyFile = path.resolve(env.PROXY_FILE);
    if (env.ENABLE_IP_PROXY !== undefined) this.config.pool.enableProxy = env.ENABLE_IP_PROXY;
    if (env.PROXY_TTL_MS !== undefined) this.config.pool.proxyTtlMs = env.PROXY_TTL_MS;
    if (env.MAX_BIND_ATTEMPTS !== undefined) {
      this.config.session.maxBindAttempts = env.MAX_BIND_ATTEMPTS;
    }
    if (env.INVALIDATE_ON_FORBIDDEN !== undefined) {
      this.config.session.invalidateOnForbidden = env.INVALIDATE_ON_FORBIDDEN;
    }

    if (env.LOG_LEVEL) this.config.logging.level = env.LOG_LEVEL;
    if (env.LOG_TO_FILE !== undefined) this.config.logging.enableFileLogging = env.LOG_TO_FILE;
    if (env.LOG_DIR) this.config.logging.logDir = path.resolve(env.LOG_DIR);
  }

  private validate(): void {
    if (this.config.client.timeoutMs < 1000) {
      throw CrawlErrors.invalidConfiguration(
        `Request timeout too small: ${this.config.client.timeoutMs}`,
        { timeout: this.config.client.timeoutMs },
      );
    }

    if (this.config.retry.maxAttempts < 1) {
      throw CrawlErrors.invalidConfiguration(
        `retry.maxAttempts must be at least 1, got ${this.config.retry.maxAttempts}`,
      );
    }

    if (this.config.crawl.intervalMs < 0 || this.config.retry.delayMs < 0) {
      throw CrawlErrors.invalidConfiguration('Delays cannot be negative', {
        intervalMs: this.config.crawl.intervalMs,
        delayMs: this.config.retry.delayMs,
      });
    }

    if (this.config.crawl.emptyPageTolerance < 1) {
      throw CrawlErrors.invalidConfiguration(
        `crawl.emptyPageTolerance must be at least 1, got ${this.config.crawl.emptyPageTolerance}`,
      );
    }

    if (this.config.session.maxBindAttempts < 0) {
      throw CrawlErrors.invalidConfiguration(
        `session.maxBindAttempts cannot be negative, got ${this.config.session.maxBindAttempts}`,
      );
    }
  }

  getConfig(): AppConfig {
    return cloneConfig(this.config);
  }

  getClientConfig(): AppConfig['client'] {
    return { ...this.config.client };
  }

  getCrawlConfig(): AppConfig['crawl'] {
    return { ...this.config.crawl };
  }

  getRetryConfig(): AppConfig['retry'] {
    return { ...this.config.retry };
  }

  getPoolConfig(): AppConfig['pool'] {
    return { ...this.config.pool };
  }

  getLoggingConfig(): AppConfig['logging'] {
    return { ...this.config.logging };
  }

  /**
   * Runtime override, validated like the initial load.
   */
  updateConfig(updates: FileConfig): void {
    const previous = this.config;
    this.config = mergeConfig(this.config, updates);
    try {
      this.validate();
    } catch (error: unknown) {
      this.config = previous;
      throw error;
    }
  }
}

let globalConfigManager: ConfigManager | null = null;

export function getConfigManager(configFilePath?: string): ConfigManager {
  if (!globalConfigManager) {
    globalConfigManager = new ConfigManager(configFilePath);
  }
  return globalConfigManager;
}

/**
 * Drops the singleton (mainly for tests).
 */
export function resetConfigManager(): void {
  globalConfigManager = null;
}
