/**
 * Error type unit tests
 */
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ConfigError,
  DdnsError,
  NotificationError,
  ProviderError,
  ResolutionError,
  errorMessage,
  formatZodError,
} from '../../../src/core/errors.js';

describe('errors', () => {
  const schema = z.object({ ttl: z.number(), nested: z.object({ url: z.string().url() }) });

  it('formats zod issues by path', () => {
    const result = schema.safeParse({ ttl: 'x', nested: { url: 'nope' } });
    if (result.success) throw new Error('expected failure');

    expect(formatZodError(result.error)).toEqual([
      { field: 'ttl', message: 'Expected number, received string' },
      { field: 'nested.url', message: 'Invalid url' },
    ]);
  });

  it('builds a ConfigError from zod issues', () => {
    const result = schema.safeParse({ ttl: 600, nested: {} });
    if (result.success) throw new Error('expected failure');

    const error = ConfigError.fromZod(result.error, 'config.json');

    expect(error).toBeInstanceOf(DdnsError);
    expect(error.name).toBe('ConfigError');
    expect(error.message).toBe('Invalid configuration in config.json: nested.url: Required');
    expect(error.details).toEqual([{ field: 'nested.url', message: 'Required' }]);
    expect(error.cause).toBe(result.error);
  });

  it('carries provider context', () => {
    const error = new ProviderError('UpdateDomainRecord failed: [Forbidden] denied', {
      action: 'UpdateDomainRecord',
      statusCode: 403,
      providerCode: 'Forbidden',
      requestId: 'req-1',
    });

    expect(error.code).toBe('PROVIDER_ERROR');
    expect(error.action).toBe('UpdateDomainRecord');
    expect(error.statusCode).toBe(403);
    expect(error.providerCode).toBe('Forbidden');
    expect(error.requestId).toBe('req-1');
  });

  it('keeps every resolution attempt', () => {
    const error = new ResolutionError([{ ok: false, source: 'https://ip-a.test/', reason: 'HTTP 503' }]);

    expect(error.code).toBe('RESOLUTION_ERROR');
    expect(error.message).toBe('Failed to resolve public IPv4 address from 1 service(s)');
    expect(error.attempts).toHaveLength(1);
  });

  it('records the webhook status', () => {
    expect(new NotificationError('rejected', 400).statusCode).toBe(400);
  });

  it('extracts messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
