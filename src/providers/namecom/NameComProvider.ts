/**
 * name.com DNS Provider Implementation
 * Core API v4, HTTP basic auth with username and API token
 */
import { z } from 'zod';
import { DNSProvider, type ProviderCredentials, type ProviderInfo, type ProviderOptions } from '../base/DNSProvider.js';
import type { DNSRecord, DNSRecordCreateInput } from '../../types/index.js';
import { ProviderError, errorMessage } from '../../core/errors.js';

export interface NameComProviderCredentials extends ProviderCredentials {
  username: string;
  token: string;
  domain: string;
}

export interface NameComProviderOptions extends ProviderOptions {
  apiUrl?: string;
}

/** Lowest TTL name.com accepts */
export const NAMECOM_MIN_TTL = 300;

// Apex records come back without a host
const nameComRecordSchema = z.object({
  id: z.number().int(),
  host: z.string().default(''),
  type: z.string(),
  answer: z.string(),
  ttl: z.number().int(),
});

const listRecordsReplySchema = z.object({
  records: z.array(nameComRecordSchema).default([]),
  nextPage: z.number().int().optional(),
});

export class NameComProvider extends DNSProvider {
  private readonly authorization: string;
  private readonly domain: string;
  private readonly baseUrl: string;

  constructor(credentials: NameComProviderCredentials, options: NameComProviderOptions = {}) {
    super('name.com', options);

    this.authorization = `Basic ${Buffer.from(`${credentials.username}:${credentials.token}`).toString('base64')}`;
    this.domain = credentials.domain;
    this.baseUrl = (options.apiUrl ?? 'https://api.name.com').replace(/\/+$/, '');
  }

  getInfo(): ProviderInfo {
    return {
      name: this.providerName,
      type: 'namecom',
      features: {
        ttlMin: NAMECOM_MIN_TTL,
      },
    };
  }

  async listRecords(): Promise<DNSRecord[]> {
    const records: DNSRecord[] = [];
    let page = 1;
    let query = '';

    for (;;) {
      const body = await this.makeRequest('listing dns records', `${this.recordsPath()}${query}`);
      const reply = this.decode('listing dns records', listRecordsReplySchema, body);
      records.push(...reply.records);

      // nextPage must move forward or the listing is done
      if (reply.nextPage === undefined || reply.nextPage <= page) break;
      page = reply.nextPage;
      query = `?page=${page}`;
    }

    this.logger.debug({ domain: this.domain, count: records.length }, 'Listed DNS records');
    return records;
  }

  async createRecord(input: DNSRecordCreateInput): Promise<void> {
    const payload = {
      host: input.host,
      type: input.type,
      answer: input.answer,
      ttl: input.ttl,
    };

    this.logger.debug({ record: payload }, 'Creating DNS record');

    await this.makeRequest('creating dns record', this.recordsPath(), {
      method: 'POST',
      body: JSON.stringify(payload),
    });
  }

  async updateRecord(id: number, record: DNSRecord): Promise<void> {
    const payload = {
      id,
      host: record.host,
      type: record.type,
      answer: record.answer,
      ttl: record.ttl,
    };

    this.logger.debug({ id, record: payload }, 'Updating DNS record');

    await this.makeRequest('updating dns record', `${this.recordsPath()}/${id}`, {
      method: 'PUT',
      body: JSON.stringify(payload),
    });
  }

  private recordsPath(): string {
    return `/v4/domains/${encodeURIComponent(this.domain)}/records`;
  }

  /**
   * Make authenticated API request, returning the raw body of a 200 reply.
   * Writes only look at the status; their reply body is not read further.
   */
  private async makeRequest(operation: string, endpoint: string, options: RequestInit = {}): Promise<string> {
    const url = `${this.baseUrl}${endpoint}`;

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        ...options,
        headers: {
          Authorization: this.authorization,
          'Content-Type': 'application/json',
        },
        signal: this.timeoutSignal(),
      });
      text = await response.text();
    } catch (error) {
      throw new ProviderError(`request failed while ${operation}: ${errorMessage(error)}`);
    }

    if (response.status !== 200) {
      this.logger.debug({ status: response.status, endpoint, body: text }, 'name.com API error response');
      throw ProviderError.unexpectedStatus(operation, response.status, text);
    }

    return text;
  }

  private decode<T>(operation: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string): T {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ProviderError(`could not decode the reply while ${operation}: ${errorMessage(error)}`, 200, text);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
      throw new ProviderError(`could not decode the reply while ${operation}: ${issues}`, 200, text);
    }
    return parsed.data;
  }
}
