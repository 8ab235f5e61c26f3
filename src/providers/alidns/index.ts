export {
  AliDNSProvider,
  ALIDNS_API_VERSION,
  ALIDNS_DEFAULT_ENDPOINT,
  type AliDNSProviderCredentials,
  type AliDNSProviderOptions,
} from './AliDNSProvider.js';
export { percentEncode, canonicalizeQuery, stringToSign, signRequest, formatTimestamp } from './signature.js';
