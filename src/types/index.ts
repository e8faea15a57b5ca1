/**
 * Core type definitions
 */

// Only A records are managed; anything else a provider lists is carried as a plain string
export type DNSRecordType = 'A';

export interface DNSRecord {
  id: number;
  host: string;
  type: string;
  answer: string;
  ttl: number;
}

export interface DNSRecordCreateInput {
  host: string;
  type: DNSRecordType;
  answer: string;
  ttl: number;
}

export type ReconcileStage = 'recordLookup' | 'ipLookup' | 'create' | 'update';

export type ReconcileOutcome =
  | { action: 'created'; hostname: string; ip: string }
  | { action: 'updated'; hostname: string; oldIp: string; newIp: string }
  | { action: 'unchanged'; hostname: string; ip: string }
  | { action: 'failed'; hostname: string; stage: ReconcileStage; error: string };
