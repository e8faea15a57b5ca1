/**
 * Zod schemas for configuration validation
 */
import { z } from 'zod';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

// name.com credentials and the record to manage. All four must be set;
// an empty HOST is the zone apex.
export const ddnsConfigSchema = z.object({
  username: z.string({ required_error: 'is undefined' }),
  token: z.string({ required_error: 'is undefined' }),
  host: z.string({ required_error: 'is undefined' }),
  domain: z.string({ required_error: 'is undefined' }),
});

/**
 * Fully-qualified name of the managed record
 */
export function fqdn(host: string, domain: string): string {
  return host === '' ? domain : `${host}.${domain}`;
}

export const appConfigSchema = z.object({
  logLevel: logLevelSchema.default('info'),
  updateInterval: z.coerce.number().int().min(1000).default(10000),
  apiUrl: z.string().url().default('https://api.name.com'),
  ipLookupUrl: z.string().url().default('https://api.ipify.org?format=text'),
  requestTimeout: z.coerce.number().int().min(1).optional(),
});

export type DDNSConfig = z.infer<typeof ddnsConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
