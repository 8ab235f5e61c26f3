/**
 * Zod schemas for configuration validation
 */
import { z } from 'zod';

export const DEFAULT_IP_SERVICES = [
  'https://api.ipify.org?format=json',
  'https://api64.ipify.org?format=json',
  'https://ifconfig.me/ip',
  'https://icanhazip.com',
] as const;

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

// Config file schema; keys are snake_case on disk
export const configFileSchema = z
  .object({
    access_key_id: z.string().trim().min(1),
    access_key_secret: z.string().trim().min(1),
    domain: z
      .string()
      .trim()
      .min(1)
      .transform((value) => value.toLowerCase().replace(/\.$/, '')),
    root_domain: z
      .string()
      .trim()
      .min(1)
      .transform((value) => value.toLowerCase().replace(/\.$/, ''))
      .optional(),
    feishu_webhook_url: z.string().trim().url().optional(),
    feishu_webhook_secret: z.string().min(1).optional(),
    ttl: z.number().int().min(1).max(86400).default(600),
    region: z.string().min(1).default('cn-hangzhou'),
    endpoint: z.string().url().default('https://alidns.aliyuncs.com'),
    ip_services: z.array(z.string().url()).min(1).default([...DEFAULT_IP_SERVICES]),
    request_timeout_ms: z.number().int().min(100).max(120000).default(10000),
    log_file: z.string().min(1).default('ddns.log'),
    log_level: logLevelSchema.default('info'),
    state_file: z.string().min(1).optional(),
  })
  .transform((raw) => ({
    accessKeyId: raw.access_key_id,
    accessKeySecret: raw.access_key_secret,
    domain: raw.domain,
    rootDomain: raw.root_domain,
    feishuWebhookUrl: raw.feishu_webhook_url,
    feishuWebhookSecret: raw.feishu_webhook_secret,
    ttl: raw.ttl,
    region: raw.region,
    endpoint: raw.endpoint.replace(/\/$/, ''),
    ipServices: raw.ip_services,
    requestTimeoutMs: raw.request_timeout_ms,
    logFile: raw.log_file,
    logLevel: raw.log_level,
    stateFile: raw.state_file,
  }));

export type DdnsConfig = Readonly<z.output<typeof configFileSchema>>;
