/**
 * Alibaba Cloud RPC request signing (signature version 1.0, HMAC-SHA1)
 */
import { createHmac } from 'crypto';

export type QueryParams = Record<string, string>;

/**
 * RFC 3986 percent-encoding: `%20` for space, `%2A` for `*`, `~` left alone
 */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Sorted, encoded `key=value&...` query string
 */
export function canonicalizeQuery(params: QueryParams): string {
  return Object.keys(params)
    .sort()
    .map((key) => `${percentEncode(key)}=${percentEncode(params[key] ?? '')}`)
    .join('&');
}

export function stringToSign(method: string, params: QueryParams): string {
  return `${method}&${percentEncode('/')}&${percentEncode(canonicalizeQuery(params))}`;
}

/**
 * Base64 HMAC-SHA1 of the string to sign, keyed by `secret&`
 */
export function signRequest(method: string, params: QueryParams, accessKeySecret: string): string {
  return createHmac('sha1', `${accessKeySecret}&`)
    .update(stringToSign(method, params))
    .digest('base64');
}

/**
 * ISO-8601 UTC timestamp without milliseconds, e.g. 2024-01-02T03:04:05Z
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
