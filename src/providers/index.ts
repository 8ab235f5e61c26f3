/**
 * Providers module exports
 */
export { DNSProvider, type ProviderInfo, type RecordFilter } from './base/DNSProvider.js';
export { AliDNSProvider, type AliDNSProviderCredentials, type AliDNSProviderOptions } from './alidns/index.js';
