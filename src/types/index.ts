/**
 * Core type definitions for aliddns
 */

// Only IPv4 A records are managed
export type DNSRecordType = 'A';

export interface DNSRecord {
  id: string;
  type: DNSRecordType;
  subdomain: string;
  rootDomain: string;
  value: string;
  ttl: number;
}

export interface DNSRecordCreateInput {
  type: DNSRecordType;
  subdomain: string;
  rootDomain: string;
  value: string;
  ttl: number;
}

export interface DNSRecordUpdateInput {
  type: DNSRecordType;
  subdomain: string;
  rootDomain: string;
  value: string;
  ttl: number;
}

export interface DomainParts {
  subdomain: string;
  rootDomain: string;
}

// Run outcome of a single reconciliation cycle
export type RunOutcome = 'created' | 'updated' | 'unchanged' | 'failed';

export interface ReconcileResult {
  outcome: Exclude<RunOutcome, 'failed'>;
  record: DNSRecord;
  previousIp?: string;
}

export interface RunReport {
  outcome: RunOutcome;
  domain: string;
  ip?: string;
  ipSource?: string;
  previousIp?: string;
  recordId?: string;
  error?: string;
  startedAt: Date;
  finishedAt: Date;
}

// Persisted summary of the last run
export interface RunState {
  domain: string;
  outcome: RunOutcome;
  ip?: string;
  recordId?: string;
  finishedAt: string;
}

export interface ResolvedIP {
  ip: string;
  source: string;
}

export type IPLookupAttempt =
  | { ok: true; source: string; ip: string }
  | { ok: false; source: string; reason: string };
