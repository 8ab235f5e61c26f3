/**
 * DNS Manager
 * Decides between create, update and no-op for the managed A record
 */
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../core/Logger.js';
import { splitDomain } from '../config/ConfigManager.js';
import type { DNSProvider } from '../providers/base/DNSProvider.js';
import type { ReconcileResult } from '../types/index.js';

export class DNSManager {
  private readonly logger: Logger;

  constructor(
    private readonly provider: DNSProvider,
    logger: Logger,
    private readonly rootDomain?: string
  ) {
    this.logger = createChildLogger(logger, { service: 'DNSManager' });
  }

  /**
   * Make the A record for `domain` point at `ip`. The provider is always
   * queried first; provider errors propagate to the caller.
   */
  async reconcile(domain: string, ip: string, ttl: number): Promise<ReconcileResult> {
    const { subdomain, rootDomain } = splitDomain(domain, this.rootDomain);
    this.logger.debug({ domain, subdomain, rootDomain }, 'Looking up existing record');

    const existing = await this.provider.describeRecord(subdomain, rootDomain);

    if (!existing) {
      this.logger.info({ domain, ip }, `${symbols.dns} Record does not exist, creating`);
      const record = await this.provider.createRecord({ type: 'A', subdomain, rootDomain, value: ip, ttl });
      return { outcome: 'created', record };
    }

    if (!this.provider.recordNeedsUpdate(existing, ip)) {
      this.logger.info({ domain, ip, recordId: existing.id }, 'IP unchanged, no update needed');
      return { outcome: 'unchanged', record: existing };
    }

    this.logger.info({ domain, ip, previousIp: existing.value, recordId: existing.id }, `${symbols.dns} IP changed, updating record`);
    const record = await this.provider.updateRecord(existing.id, {
      type: 'A',
      subdomain: existing.subdomain,
      rootDomain,
      value: ip,
      ttl,
    });
    return { outcome: 'updated', record, previousIp: existing.value };
  }
}
