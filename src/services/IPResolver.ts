/**
 * Public IP Resolver
 * Asks each IP echo service in order and returns the first valid IPv4 address
 */
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../core/Logger.js';
import { ResolutionError, errorMessage } from '../core/errors.js';
import type { IPLookupAttempt, ResolvedIP } from '../types/index.js';

export interface IPResolverOptions {
  services: readonly string[];
  timeoutMs: number;
}

/**
 * Dotted-quad IPv4: four decimal octets, each 0-255
 */
export function isValidIPv4(value: string): boolean {
  const parts = value.split('.');
  if (parts.length !== 4) return false;
  return parts.every((part) => /^\d{1,3}$/.test(part) && Number(part) <= 255);
}

/**
 * Pull the candidate address out of a response body.
 * Plain text bodies are the address itself; JSON bodies carry it in `ip`.
 */
export function extractIP(body: string): string | null {
  const text = body.trim();
  if (!text.startsWith('{')) {
    return text || null;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null && 'ip' in parsed && typeof parsed.ip === 'string') {
      return parsed.ip.trim();
    }
  } catch {
    return null;
  }
  return null;
}

export class IPResolver {
  private readonly logger: Logger;
  private readonly services: readonly string[];
  private readonly timeoutMs: number;

  constructor(options: IPResolverOptions, logger: Logger) {
    if (options.services.length === 0) {
      throw new Error('At least one IP lookup service is required');
    }
    this.services = options.services;
    this.timeoutMs = options.timeoutMs;
    this.logger = createChildLogger(logger, { service: 'IPResolver' });
  }

  /**
   * Resolve the public IPv4 address. Throws ResolutionError when every service fails.
   */
  async resolve(): Promise<ResolvedIP> {
    const attempts: IPLookupAttempt[] = [];

    for (const source of this.services) {
      const attempt = await this.lookup(source);
      attempts.push(attempt);

      if (attempt.ok) {
        this.logger.info({ ip: attempt.ip, source }, `${symbols.ip} Public IP resolved`);
        return { ip: attempt.ip, source };
      }

      this.logger.warn({ source, reason: attempt.reason }, 'IP lookup failed, trying next service');
    }

    this.logger.error({ count: attempts.length }, 'All IP lookup services failed');
    throw new ResolutionError(attempts);
  }

  /**
   * Query a single service. Never throws.
   */
  async lookup(source: string): Promise<IPLookupAttempt> {
    let body: string;
    try {
      const response = await fetch(source, {
        method: 'GET',
        headers: { Accept: 'application/json, text/plain' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        return { ok: false, source, reason: `HTTP ${response.status}` };
      }

      body = await response.text();
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return { ok: false, source, reason: `Timed out after ${this.timeoutMs}ms` };
      }
      return { ok: false, source, reason: errorMessage(error) };
    }

    const candidate = extractIP(body);
    if (candidate === null) {
      return { ok: false, source, reason: 'Unparseable response body' };
    }
    if (!isValidIPv4(candidate)) {
      return { ok: false, source, reason: `Not an IPv4 address: ${candidate.slice(0, 64)}` };
    }

    return { ok: true, source, ip: candidate };
  }
}
