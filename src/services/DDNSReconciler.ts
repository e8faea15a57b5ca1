/**
 * DDNS Reconciler
 * One tick: find the managed A record, observe the public IP, create or update.
 * Every failure ends the tick with an error log; nothing is thrown to the caller.
 */
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';
import { fqdn } from '../config/schema.js';
import type { DNSProvider } from '../providers/base/DNSProvider.js';
import type { DNSRecord, ReconcileOutcome, ReconcileStage } from '../types/index.js';

export interface ReconcilerConfig {
  host: string;
  domain: string;
}

export interface PublicIPSource {
  lookup(): Promise<string>;
}

export type ReconcilerLogger = Pick<Logger, 'debug' | 'info' | 'error'>;

export class DDNSReconciler {
  private readonly hostname: string;

  constructor(
    private readonly config: Readonly<ReconcilerConfig>,
    private readonly provider: DNSProvider,
    private readonly ipSource: PublicIPSource,
    private readonly logger: ReconcilerLogger = createChildLogger({ service: 'DDNSReconciler' })
  ) {
    this.hostname = fqdn(config.host, config.domain);
  }

  async reconcileOnce(): Promise<ReconcileOutcome> {
    let existing: DNSRecord | undefined;
    try {
      const records = await this.provider.listRecords();
      existing = this.provider.findRecord(records, 'A', this.config.host);
    } catch (error) {
      return this.fail('recordLookup', 'Error while looking for existing record', error);
    }

    let ip: string;
    try {
      ip = await this.ipSource.lookup();
    } catch (error) {
      return this.fail('ipLookup', 'Error while looking up own ip', error);
    }

    if (!existing) {
      return this.create(ip);
    }

    if (existing.answer === ip) {
      this.logger.debug({ hostname: this.hostname, ip }, 'Record up to date');
      return { action: 'unchanged', hostname: this.hostname, ip };
    }

    return this.update(existing, ip);
  }

  private async create(ip: string): Promise<ReconcileOutcome> {
    try {
      await this.provider.createRecord({
        host: this.config.host,
        type: 'A',
        answer: ip,
        ttl: this.provider.getInfo().features.ttlMin,
      });
    } catch (error) {
      return this.fail('create', 'Error while creating dns record', error);
    }

    this.logger.info(
      { hostname: this.hostname, ip },
      `${symbols.success} Created host A record ${this.hostname} with ip ${ip}`
    );
    return { action: 'created', hostname: this.hostname, ip };
  }

  private async update(existing: DNSRecord, ip: string): Promise<ReconcileOutcome> {
    const oldIp = existing.answer;
    const record: DNSRecord = { ...existing, answer: ip };

    try {
      await this.provider.updateRecord(existing.id, record);
    } catch (error) {
      return this.fail('update', 'Error while updating dns record', error);
    }

    this.logger.info(
      { hostname: this.hostname, oldIp, newIp: ip },
      `${symbols.sync} Updated host A record ${this.hostname}, changed ip from ${oldIp} to ${ip}`
    );
    return { action: 'updated', hostname: this.hostname, oldIp, newIp: ip };
  }

  private fail(stage: ReconcileStage, message: string, error: unknown): ReconcileOutcome {
    const reason = errorMessage(error);
    this.logger.error({ hostname: this.hostname, stage, error }, `${message}: ${reason}`);
    return { action: 'failed', hostname: this.hostname, stage, error: reason };
  }
}
