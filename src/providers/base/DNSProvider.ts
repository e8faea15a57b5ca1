/**
 * Abstract DNS Provider Interface
 * Base class for DNS provider implementations
 */
import type { Logger } from 'pino';
import type { DNSRecord, DNSRecordCreateInput, DNSRecordType } from '../../types/index.js';
import { createChildLogger } from '../../core/Logger.js';

export interface ProviderCredentials {
  [key: string]: string | undefined;
}

export interface ProviderOptions {
  /** Per-request timeout in ms; none when unset */
  requestTimeout?: number;
}

export interface ProviderInfo {
  name: string;
  type: string;
  features: {
    ttlMin: number;
  };
}

export abstract class DNSProvider {
  protected logger: Logger;
  protected readonly requestTimeout: number | undefined;

  constructor(
    protected readonly providerName: string,
    options: ProviderOptions = {}
  ) {
    this.logger = createChildLogger({ service: providerName });
    this.requestTimeout = options.requestTimeout;
  }

  abstract getInfo(): ProviderInfo;

  /**
   * List every record in the zone, in provider order
   */
  abstract listRecords(): Promise<DNSRecord[]>;

  /**
   * Create a record. Resolves once the provider accepted the write.
   */
  abstract createRecord(record: DNSRecordCreateInput): Promise<void>;

  /**
   * Replace an existing record
   */
  abstract updateRecord(id: number, record: DNSRecord): Promise<void>;

  /**
   * First record matching type and host; providers do not guarantee uniqueness
   */
  findRecord(records: DNSRecord[], type: DNSRecordType, host: string): DNSRecord | undefined {
    return records.find((record) => record.type === type && record.host === host);
  }

  protected timeoutSignal(): AbortSignal | undefined {
    return this.requestTimeout === undefined ? undefined : AbortSignal.timeout(this.requestTimeout);
  }
}
