/**
 * In-memory DNS provider for service and orchestrator tests
 */
import { DNSProvider, type ProviderInfo, type RecordFilter } from '../../src/providers/base/DNSProvider.js';
import { ProviderError } from '../../src/core/errors.js';
import { createSilentLogger } from '../../src/core/Logger.js';
import type { DNSRecord, DNSRecordCreateInput, DNSRecordUpdateInput } from '../../src/types/index.js';

type FakeAction = 'list' | 'create' | 'update';

export class FakeDNSProvider extends DNSProvider {
  records: DNSRecord[] = [];
  calls: Record<FakeAction, number> = { list: 0, create: 0, update: 0 };
  created: DNSRecordCreateInput[] = [];
  updated: Array<{ id: string; input: DNSRecordUpdateInput }> = [];
  failOn: FakeAction | null = null;
  private nextId = 1000;

  constructor(records: DNSRecord[] = []) {
    super('fake', createSilentLogger());
    this.records = records.map((r) => ({ ...r }));
  }

  getInfo(): ProviderInfo {
    return {
      name: this.providerName,
      type: 'fake',
      features: { ttlMin: 1, ttlMax: 86400, supportedTypes: ['A'] },
    };
  }

  async listRecords(filter: RecordFilter): Promise<DNSRecord[]> {
    this.calls.list++;
    this.maybeFail('list');
    return this.records
      .filter((r) => r.subdomain === filter.subdomain && r.rootDomain === filter.rootDomain && r.type === filter.type)
      .map((r) => ({ ...r }));
  }

  async createRecord(input: DNSRecordCreateInput): Promise<DNSRecord> {
    this.calls.create++;
    this.maybeFail('create');
    this.validateRecord(input);
    this.created.push(input);
    const record: DNSRecord = { id: String(this.nextId++), ...input };
    this.records.push(record);
    return { ...record };
  }

  async updateRecord(id: string, input: DNSRecordUpdateInput): Promise<DNSRecord> {
    this.calls.update++;
    this.maybeFail('update');
    this.validateRecord(input);
    this.updated.push({ id, input });
    const index = this.records.findIndex((r) => r.id === id);
    if (index === -1) {
      throw new ProviderError(`Record not found: ${id}`, { action: 'update' });
    }
    const record: DNSRecord = { id, ...input };
    this.records[index] = record;
    return { ...record };
  }

  writeCount(): number {
    return this.calls.create + this.calls.update;
  }

  private maybeFail(action: FakeAction): void {
    if (this.failOn === action) {
      throw new ProviderError(`Simulated ${action} failure`, { action, statusCode: 500, providerCode: 'InternalError' });
    }
  }
}

export function aRecord(overrides: Partial<DNSRecord> = {}): DNSRecord {
  return {
    id: 'rec-1',
    type: 'A',
    subdomain: 'home',
    rootDomain: 'example.com',
    value: '1.2.3.4',
    ttl: 600,
    ...overrides,
  };
}
