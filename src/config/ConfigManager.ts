/**
 * Configuration Manager
 * Reads the process environment once and validates it
 */
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import type { ZodError } from 'zod';
import { logger, setLogLevel } from '../core/Logger.js';
import { ConfigError } from '../core/errors.js';
import { appConfigSchema, ddnsConfigSchema, fqdn, type AppConfig, type DDNSConfig } from './schema.js';

type Env = Record<string, string | undefined>;

const ENV_NAMES: Record<string, string> = {
  username: 'USERNAME',
  token: 'TOKEN',
  host: 'HOST',
  domain: 'DOMAIN',
  logLevel: 'LOG_LEVEL',
  updateInterval: 'UPDATE_INTERVAL',
  apiUrl: 'NAMECOM_API_URL',
  ipLookupUrl: 'IP_LOOKUP_URL',
  requestTimeout: 'REQUEST_TIMEOUT',
};

export interface ConfigManagerOptions {
  env?: Env;
  /** Directory holding Docker secret files */
  secretsDir?: string;
}

function toIssues(error: ZodError): { variable: string; message: string }[] {
  return error.errors.map((issue) => {
    const field = String(issue.path[0] ?? '');
    return { variable: ENV_NAMES[field] ?? field, message: issue.message };
  });
}

export class ConfigManager {
  private readonly env: Env;
  private readonly secretsDir: string;
  private readonly _ddns: Readonly<DDNSConfig>;
  private readonly _app: Readonly<AppConfig>;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.secretsDir = options.secretsDir ?? '/run/secrets';

    const ddns = ddnsConfigSchema.safeParse({
      username: this.getEnv('USERNAME'),
      token: this.getSecret('TOKEN'),
      host: this.getEnv('HOST'),
      domain: this.getEnv('DOMAIN'),
    });

    const app = appConfigSchema.safeParse({
      logLevel: this.getEnv('LOG_LEVEL', 'info')?.toLowerCase(),
      updateInterval: this.getEnv('UPDATE_INTERVAL'),
      apiUrl: this.getEnv('NAMECOM_API_URL'),
      ipLookupUrl: this.getEnv('IP_LOOKUP_URL'),
      requestTimeout: this.getEnv('REQUEST_TIMEOUT'),
    });

    const issues = [
      ...(ddns.success ? [] : toIssues(ddns.error)),
      ...(app.success ? [] : toIssues(app.error)),
    ];

    if (!ddns.success || !app.success) {
      const summary = issues.map((i) => `${i.variable} ${i.message}`).join(', ');
      throw new ConfigError(`Invalid configuration: ${summary}`, issues);
    }

    this._ddns = Object.freeze(ddns.data);
    this._app = Object.freeze(app.data);

    setLogLevel(this._app.logLevel);

    logger.info(
      {
        hostname: fqdn(this._ddns.host, this._ddns.domain),
        interval: this._app.updateInterval,
        logLevel: this._app.logLevel,
      },
      'Configuration loaded'
    );
  }

  get ddns(): Readonly<DDNSConfig> {
    return this._ddns;
  }

  get app(): Readonly<AppConfig> {
    return this._app;
  }

  /**
   * Read environment variable with optional default
   */
  private getEnv(key: string, defaultValue?: string): string | undefined {
    return this.env[key] ?? defaultValue;
  }

  /**
   * Read secret from file (Docker secrets support) or environment
   */
  private getSecret(key: string): string | undefined {
    const secretPath = join(this.secretsDir, key.toLowerCase());
    if (existsSync(secretPath)) {
      try {
        return readFileSync(secretPath, 'utf-8').trim();
      } catch (error) {
        logger.warn({ key, error }, 'Failed to read Docker secret');
      }
    }

    return this.env[key];
  }
}

let configInstance: ConfigManager | null = null;

export function getConfig(): ConfigManager {
  if (!configInstance) {
    configInstance = new ConfigManager();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
