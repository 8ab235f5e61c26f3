/**
 * Error types for a reconciliation run
 */
import type { ZodError } from 'zod';
import type { IPLookupAttempt } from '../types/index.js';

export type DdnsErrorCode =
  | 'CONFIG_ERROR'
  | 'RESOLUTION_ERROR'
  | 'PROVIDER_ERROR'
  | 'NOTIFICATION_ERROR';

/**
 * Base class for all errors raised by aliddns
 */
export class DdnsError extends Error {
  constructor(
    message: string,
    public readonly code: DdnsErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DdnsError';
  }
}

/**
 * Format Zod validation errors
 */
export function formatZodError(error: ZodError): { field: string; message: string }[] {
  return error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));
}

/**
 * Missing or invalid configuration. Raised before any network call.
 */
export class ConfigError extends DdnsError {
  constructor(
    message: string,
    public readonly details: { field: string; message: string }[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }

  static fromZod(error: ZodError, source: string): ConfigError {
    const details = formatZodError(error);
    const summary = details
      .map((d) => (d.field ? `${d.field}: ${d.message}` : d.message))
      .join('; ');
    return new ConfigError(`Invalid configuration in ${source}: ${summary}`, details, { cause: error });
  }
}

/**
 * No IP lookup service returned a usable address
 */
export class ResolutionError extends DdnsError {
  constructor(public readonly attempts: IPLookupAttempt[]) {
    super(
      `Failed to resolve public IPv4 address from ${attempts.length} service(s)`,
      'RESOLUTION_ERROR'
    );
    this.name = 'ResolutionError';
  }
}

export interface ProviderErrorContext {
  action: string;
  statusCode?: number;
  providerCode?: string;
  requestId?: string;
  cause?: unknown;
}

/**
 * DNS provider call failed: transport, authentication, API error or response shape
 */
export class ProviderError extends DdnsError {
  public readonly action: string;
  public readonly statusCode?: number;
  public readonly providerCode?: string;
  public readonly requestId?: string;

  constructor(message: string, context: ProviderErrorContext) {
    super(message, 'PROVIDER_ERROR', { cause: context.cause });
    this.name = 'ProviderError';
    this.action = context.action;
    this.statusCode = context.statusCode;
    this.providerCode = context.providerCode;
    this.requestId = context.requestId;
  }
}

/**
 * Webhook delivery failed. Logged only, never fatal.
 */
export class NotificationError extends DdnsError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'NOTIFICATION_ERROR', options);
    this.name = 'NotificationError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
