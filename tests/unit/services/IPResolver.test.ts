/**
 * IPResolver unit tests
 */
import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import { IPResolver, extractIP, isValidIPv4 } from '../../../src/services/IPResolver.js';
import { ResolutionError } from '../../../src/core/errors.js';
import { createSilentLogger } from '../../../src/core/Logger.js';

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

const SERVICES = ['https://ip-a.test/', 'https://ip-b.test/json', 'https://ip-c.test/'];

function createResolver(services: string[] = SERVICES): IPResolver {
  return new IPResolver({ services, timeoutMs: 1000 }, createSilentLogger());
}

describe('isValidIPv4', () => {
  it.each(['0.0.0.0', '1.2.3.4', '203.0.113.7', '255.255.255.255'])('accepts %s', (value) => {
    expect(isValidIPv4(value)).toBe(true);
  });

  it.each(['', '1.2.3', '1.2.3.4.5', '256.1.1.1', '1.2.3.a', '1..2.3', '2001:db8::1', ' 1.2.3.4', '1234.1.1.1'])(
    'rejects %j',
    (value) => {
      expect(isValidIPv4(value)).toBe(false);
    }
  );
});

describe('extractIP', () => {
  it('trims a plain text body', () => {
    expect(extractIP('203.0.113.7\n')).toBe('203.0.113.7');
  });

  it('reads the ip field of a JSON body', () => {
    expect(extractIP('{"ip":"203.0.113.7"}')).toBe('203.0.113.7');
  });

  it('returns null for an empty body', () => {
    expect(extractIP('  \n')).toBeNull();
  });

  it('returns null for JSON without an ip field', () => {
    expect(extractIP('{"address":"203.0.113.7"}')).toBeNull();
  });

  it('returns null for broken JSON', () => {
    expect(extractIP('{"ip":')).toBeNull();
  });
});

describe('IPResolver', () => {
  it('requires at least one service', () => {
    expect(() => createResolver([])).toThrow('At least one IP lookup service is required');
  });

  it('returns the first service answer', async () => {
    mockFetch.mockResolvedValueOnce(new Response('203.0.113.7\n'));

    const result = await createResolver().resolve();

    expect(result).toEqual({ ip: '203.0.113.7', source: 'https://ip-a.test/' });
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0]?.[0]).toBe('https://ip-a.test/');
  });

  it('falls through failing services to the last one', async () => {
    mockFetch
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('Service Unavailable', { status: 503 }))
      .mockResolvedValueOnce(new Response('{"ip":"198.51.100.20"}'));

    const result = await createResolver().resolve();

    expect(result).toEqual({ ip: '198.51.100.20', source: 'https://ip-c.test/' });
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('skips a service that answers with something other than IPv4', async () => {
    mockFetch
      .mockResolvedValueOnce(new Response('2001:db8::1'))
      .mockResolvedValueOnce(new Response('<html>blocked</html>'))
      .mockResolvedValueOnce(new Response('192.0.2.1'));

    const result = await createResolver().resolve();

    expect(result.ip).toBe('192.0.2.1');
  });

  it('throws ResolutionError with one attempt per service when all fail', async () => {
    mockFetch
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('nope', { status: 500 }))
      .mockResolvedValueOnce(new Response(''));

    const error = await createResolver()
      .resolve()
      .then(
        () => undefined,
        (e: unknown) => e
      );

    expect(error).toBeInstanceOf(ResolutionError);
    if (!(error instanceof ResolutionError)) return;
    expect(error.message).toBe('Failed to resolve public IPv4 address from 3 service(s)');
    expect(error.attempts).toEqual([
      { ok: false, source: 'https://ip-a.test/', reason: 'fetch failed' },
      { ok: false, source: 'https://ip-b.test/json', reason: 'HTTP 500' },
      { ok: false, source: 'https://ip-c.test/', reason: 'Unparseable response body' },
    ]);
  });

  describe('lookup', () => {
    it('reports timeouts', async () => {
      mockFetch.mockRejectedValueOnce(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }));

      const attempt = await createResolver().lookup('https://ip-a.test/');

      expect(attempt).toEqual({ ok: false, source: 'https://ip-a.test/', reason: 'Timed out after 1000ms' });
    });

    it('reports a non-IPv4 body', async () => {
      mockFetch.mockResolvedValueOnce(new Response('not-an-ip'));

      const attempt = await createResolver().lookup('https://ip-a.test/');

      expect(attempt).toEqual({ ok: false, source: 'https://ip-a.test/', reason: 'Not an IPv4 address: not-an-ip' });
    });

    it('sends a GET with a timeout signal', async () => {
      mockFetch.mockResolvedValueOnce(new Response('192.0.2.1'));

      await createResolver().lookup('https://ip-a.test/');

      const init: unknown = mockFetch.mock.calls[0]?.[1];
      expect(init).toMatchObject({ method: 'GET' });
      expect(init).toHaveProperty('signal');
    });
  });
});
