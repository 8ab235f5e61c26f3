/**
 * Alibaba Cloud DNS (AliDNS) Provider Implementation
 * Signed RPC calls against the 2015-01-09 API
 */
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { Logger } from 'pino';
import { DNSProvider, type ProviderInfo, type RecordFilter } from '../base/DNSProvider.js';
import { ProviderError, errorMessage } from '../../core/errors.js';
import { formatTimestamp, signRequest, type QueryParams } from './signature.js';
import type { DNSRecord, DNSRecordCreateInput, DNSRecordUpdateInput } from '../../types/index.js';

export const ALIDNS_API_VERSION = '2015-01-09';
export const ALIDNS_DEFAULT_ENDPOINT = 'https://alidns.aliyuncs.com';

export interface AliDNSProviderCredentials {
  accessKeyId: string;
  accessKeySecret: string;
  region: string;
  endpoint?: string;
}

export interface AliDNSProviderOptions {
  timeoutMs: number;
}

// Record ids arrive as strings or numbers; a missing id is a malformed response
const recordIdSchema = z.union([z.string().min(1), z.number()]).transform(String);

const aliRecordSchema = z.object({
  RecordId: recordIdSchema,
  RR: z.string(),
  Type: z.string(),
  Value: z.string(),
  TTL: z.coerce.number(),
  DomainName: z.string().optional(),
});

const describeDomainRecordsSchema = z.object({
  RequestId: z.string(),
  TotalCount: z.number().optional(),
  DomainRecords: z.object({
    Record: z.array(aliRecordSchema),
  }),
});

const recordWriteSchema = z.object({
  RequestId: z.string(),
  RecordId: recordIdSchema,
});

const aliErrorSchema = z.object({
  Code: z.string(),
  Message: z.string(),
  RequestId: z.string().optional(),
});

type AliRecord = z.infer<typeof aliRecordSchema>;

/**
 * AliDNS Provider
 */
export class AliDNSProvider extends DNSProvider {
  private readonly accessKeyId: string;
  private readonly accessKeySecret: string;
  private readonly region: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(
    providerName: string,
    credentials: AliDNSProviderCredentials,
    options: AliDNSProviderOptions,
    logger: Logger
  ) {
    super(providerName, logger);

    if (!credentials.accessKeyId) {
      throw new Error('AliDNS: accessKeyId is required');
    }
    if (!credentials.accessKeySecret) {
      throw new Error('AliDNS: accessKeySecret is required');
    }

    this.accessKeyId = credentials.accessKeyId;
    this.accessKeySecret = credentials.accessKeySecret;
    this.region = credentials.region;
    this.endpoint = (credentials.endpoint ?? ALIDNS_DEFAULT_ENDPOINT).replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs;
  }

  getInfo(): ProviderInfo {
    return {
      name: this.providerName,
      type: 'alidns',
      features: {
        ttlMin: 1,
        ttlMax: 86400,
        supportedTypes: ['A'],
      },
    };
  }

  async listRecords(filter: RecordFilter): Promise<DNSRecord[]> {
    const data = await this.makeRequest(
      'DescribeDomainRecords',
      {
        DomainName: filter.rootDomain,
        RRKeyWord: filter.subdomain,
        Type: filter.type,
        PageSize: '100',
      },
      describeDomainRecordsSchema
    );

    // RRKeyWord is a fuzzy match: keep only the exact name
    const subdomain = filter.subdomain.toLowerCase();
    const records = data.DomainRecords.Record
      .filter((record) => record.RR.toLowerCase() === subdomain && record.Type.toUpperCase() === filter.type)
      .map((record) => this.convertFromAliDNS(record, filter.rootDomain));

    this.logger.debug(
      { subdomain: filter.subdomain, rootDomain: filter.rootDomain, total: data.TotalCount, count: records.length },
      'Listed DNS records'
    );
    return records;
  }

  async createRecord(input: DNSRecordCreateInput): Promise<DNSRecord> {
    this.validateRecord(input);

    this.logger.debug({ subdomain: input.subdomain, rootDomain: input.rootDomain, value: input.value }, 'Creating DNS record');

    const data = await this.makeRequest(
      'AddDomainRecord',
      {
        DomainName: input.rootDomain,
        RR: input.subdomain,
        Type: input.type,
        Value: input.value,
        TTL: String(input.ttl),
      },
      recordWriteSchema
    );

    this.logger.info({ recordId: data.RecordId, value: input.value }, 'DNS record created');

    return {
      id: data.RecordId,
      type: input.type,
      subdomain: input.subdomain,
      rootDomain: input.rootDomain,
      value: input.value,
      ttl: input.ttl,
    };
  }

  async updateRecord(id: string, input: DNSRecordUpdateInput): Promise<DNSRecord> {
    this.validateRecord(input);

    this.logger.debug({ recordId: id, value: input.value }, 'Updating DNS record');

    const data = await this.makeRequest(
      'UpdateDomainRecord',
      {
        RecordId: id,
        RR: input.subdomain,
        Type: input.type,
        Value: input.value,
        TTL: String(input.ttl),
      },
      recordWriteSchema
    );

    this.logger.info({ recordId: data.RecordId, value: input.value }, 'DNS record updated');

    return {
      id: data.RecordId,
      type: input.type,
      subdomain: input.subdomain,
      rootDomain: input.rootDomain,
      value: input.value,
      ttl: input.ttl,
    };
  }

  /**
   * Build the signed request URL for an action
   */
  buildRequestUrl(action: string, params: QueryParams): string {
    const query: QueryParams = {
      Format: 'JSON',
      Version: ALIDNS_API_VERSION,
      AccessKeyId: this.accessKeyId,
      SignatureMethod: 'HMAC-SHA1',
      SignatureVersion: '1.0',
      SignatureNonce: uuidv4(),
      Timestamp: formatTimestamp(new Date()),
      RegionId: this.region,
      Action: action,
      ...params,
    };

    const signature = signRequest('GET', query, this.accessKeySecret);
    const search = new URLSearchParams({ ...query, Signature: signature });
    return `${this.endpoint}/?${search.toString()}`;
  }

  /**
   * Make a signed API request and validate the response shape
   */
  private async makeRequest<T>(action: string, params: QueryParams, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = this.buildRequestUrl(action, params);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      this.logger.error({ action, error: errorMessage(error) }, 'AliDNS request failed');
      throw new ProviderError(`${action} request failed: ${errorMessage(error)}`, { action, cause: error });
    }

    const text = await response.text().catch(() => '');
    let body: unknown;
    try {
      body = text ? JSON.parse(text) : undefined;
    } catch {
      body = undefined;
    }

    if (!response.ok) {
      const apiError = aliErrorSchema.safeParse(body);
      const message = apiError.success
        ? `[${apiError.data.Code}] ${apiError.data.Message}`
        : `HTTP ${response.status}${text ? `: ${text.slice(0, 200)}` : ''}`;

      this.logger.debug({ action, status: response.status, body: text.slice(0, 500) }, 'AliDNS API error response');

      throw new ProviderError(`${action} failed: ${message}`, {
        action,
        statusCode: response.status,
        providerCode: apiError.success ? apiError.data.Code : undefined,
        requestId: apiError.success ? apiError.data.RequestId : undefined,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(`${action} returned an unexpected response`, {
        action,
        statusCode: response.status,
        cause: parsed.error,
      });
    }

    return parsed.data;
  }

  /**
   * Convert AliDNS record to internal format
   */
  private convertFromAliDNS(record: AliRecord, rootDomain: string): DNSRecord {
    return {
      id: record.RecordId,
      type: 'A',
      subdomain: record.RR,
      rootDomain: record.DomainName ?? rootDomain,
      value: record.Value,
      ttl: record.TTL,
    };
  }
}
