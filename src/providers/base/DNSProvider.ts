/**
 * Abstract DNS Provider Interface
 * Base class for DNS provider implementations
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../../core/Logger.js';
import { isValidIPv4 } from '../../services/IPResolver.js';
import type { DNSRecord, DNSRecordCreateInput, DNSRecordUpdateInput, DNSRecordType } from '../../types/index.js';

export interface ProviderInfo {
  name: string;
  type: string;
  features: {
    ttlMin: number;
    ttlMax: number;
    supportedTypes: DNSRecordType[];
  };
}

export interface RecordFilter {
  subdomain: string;
  rootDomain: string;
  type: DNSRecordType;
}

/**
 * Abstract DNS Provider base class
 */
export abstract class DNSProvider {
  protected logger: Logger;

  constructor(
    protected readonly providerName: string,
    logger: Logger
  ) {
    this.logger = createChildLogger(logger, { service: 'DNSProvider', provider: providerName });
  }

  /**
   * Get provider information
   */
  abstract getInfo(): ProviderInfo;

  /**
   * List records of one type at one name, in the provider's order
   */
  abstract listRecords(filter: RecordFilter): Promise<DNSRecord[]>;

  /**
   * Create a new DNS record
   */
  abstract createRecord(record: DNSRecordCreateInput): Promise<DNSRecord>;

  /**
   * Update an existing DNS record by its provider id
   */
  abstract updateRecord(id: string, record: DNSRecordUpdateInput): Promise<DNSRecord>;

  /**
   * Find the A record for a name. When the provider holds several, the first
   * one it returned is used and the rest are reported.
   */
  async describeRecord(subdomain: string, rootDomain: string): Promise<DNSRecord | null> {
    const records = await this.listRecords({ subdomain, rootDomain, type: 'A' });
    const [first, ...ignored] = records;

    if (!first) {
      this.logger.debug({ subdomain, rootDomain }, 'No existing record');
      return null;
    }

    if (ignored.length > 0) {
      this.logger.warn(
        { subdomain, rootDomain, recordId: first.id, count: records.length, ignoredIds: ignored.map((r) => r.id) },
        'Multiple A records found, using the first'
      );
    }

    return first;
  }

  /**
   * Check if a record needs to be updated. Only the value decides; a TTL
   * difference alone does not trigger a write.
   */
  recordNeedsUpdate(existing: DNSRecord, value: string): boolean {
    const needsUpdate = existing.value !== value;
    this.logger.debug(
      { recordId: existing.id, existing: existing.value, value, needsUpdate },
      'Compared record value'
    );
    return needsUpdate;
  }

  /**
   * Validate a record before it is written
   */
  validateRecord(record: { type: DNSRecordType; subdomain: string; value: string; ttl: number }): void {
    const { supportedTypes, ttlMin, ttlMax } = this.getInfo().features;

    if (!supportedTypes.includes(record.type)) {
      throw new Error(`Invalid record type: ${record.type}`);
    }

    if (!record.subdomain) {
      throw new Error('Record subdomain is required');
    }

    if (!isValidIPv4(record.value)) {
      throw new Error(`Invalid IPv4 address: ${record.value}`);
    }

    if (!Number.isInteger(record.ttl) || record.ttl < ttlMin || record.ttl > ttlMax) {
      throw new Error(`TTL must be between ${ttlMin} and ${ttlMax}`);
    }
  }
}
