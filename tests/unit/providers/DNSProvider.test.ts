/**
 * DNSProvider base class unit tests
 */
import { describe, it, expect } from 'vitest';
import { FakeDNSProvider, aRecord } from '../../helpers/FakeDNSProvider.js';

describe('DNSProvider', () => {
  describe('describeRecord', () => {
    it('returns null when nothing matches', async () => {
      const provider = new FakeDNSProvider([aRecord({ subdomain: 'other' })]);

      expect(await provider.describeRecord('home', 'example.com')).toBeNull();
    });

    it('returns the first matching record', async () => {
      const provider = new FakeDNSProvider([
        aRecord({ id: 'a', value: '1.1.1.1' }),
        aRecord({ id: 'b', value: '2.2.2.2' }),
      ]);

      const record = await provider.describeRecord('home', 'example.com');

      expect(record?.id).toBe('a');
      expect(provider.calls.list).toBe(1);
    });
  });

  describe('recordNeedsUpdate', () => {
    const provider = new FakeDNSProvider();

    it('is false when the value matches', () => {
      expect(provider.recordNeedsUpdate(aRecord({ value: '1.2.3.4' }), '1.2.3.4')).toBe(false);
    });

    it('is true when the value differs', () => {
      expect(provider.recordNeedsUpdate(aRecord({ value: '1.2.3.4' }), '5.6.7.8')).toBe(true);
    });

    it('ignores a TTL difference', () => {
      expect(provider.recordNeedsUpdate(aRecord({ ttl: 60 }), '1.2.3.4')).toBe(false);
    });
  });

  describe('validateRecord', () => {
    const provider = new FakeDNSProvider();
    const valid = { type: 'A' as const, subdomain: 'home', value: '1.2.3.4', ttl: 600 };

    it('accepts a valid record', () => {
      expect(() => provider.validateRecord(valid)).not.toThrow();
    });

    it('requires a subdomain', () => {
      expect(() => provider.validateRecord({ ...valid, subdomain: '' })).toThrow('Record subdomain is required');
    });

    it('rejects a value that is not IPv4', () => {
      expect(() => provider.validateRecord({ ...valid, value: '2001:db8::1' })).toThrow(
        'Invalid IPv4 address: 2001:db8::1'
      );
    });

    it('rejects a TTL outside the provider range', () => {
      expect(() => provider.validateRecord({ ...valid, ttl: 86401 })).toThrow('TTL must be between 1 and 86400');
      expect(() => provider.validateRecord({ ...valid, ttl: 1.5 })).toThrow('TTL must be between 1 and 86400');
    });
  });
});
