/**
 * Reconciliation run orchestrator
 * resolve IP → describe record → create | update | unchanged → notify → save state
 */
import type { Logger } from 'pino';
import { symbols } from './Logger.js';
import { DdnsError, errorMessage } from './errors.js';
import type { DdnsConfig } from '../config/schema.js';
import { AliDNSProvider, type DNSProvider } from '../providers/index.js';
import { DNSManager, IPResolver, Notifier, StateStore } from '../services/index.js';
import type { RunReport } from '../types/index.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CONFIG_ERROR = 2;

export interface ApplicationDependencies {
  resolver: Pick<IPResolver, 'resolve'>;
  provider: DNSProvider;
  notifier: Pick<Notifier, 'notify'>;
  stateStore: Pick<StateStore, 'load' | 'save'>;
}

/**
 * Exit status the scheduler sees for a finished run
 */
export function exitCodeFor(report: RunReport): number {
  return report.outcome === 'failed' ? EXIT_FAILED : EXIT_OK;
}

export class Application {
  private readonly dnsManager: DNSManager;

  constructor(
    private readonly config: DdnsConfig,
    private readonly deps: ApplicationDependencies,
    private readonly logger: Logger
  ) {
    this.dnsManager = new DNSManager(deps.provider, logger, config.rootDomain);
  }

  /**
   * Run one reconciliation cycle. Never rejects: every failure becomes a
   * `failed` report, and the notifier is called exactly once either way.
   */
  async run(): Promise<RunReport> {
    const { domain, ttl } = this.config;
    const startedAt = new Date();
    this.logger.info({ domain }, `${symbols.startup} Starting DDNS update`);

    const previous = await this.deps.stateStore.load();
    if (previous) {
      this.logger.debug({ ip: previous.ip, outcome: previous.outcome, at: previous.finishedAt }, 'Last run');
    }

    let report: RunReport;
    let ip: string | undefined;
    let ipSource: string | undefined;

    try {
      const resolved = await this.deps.resolver.resolve();
      ip = resolved.ip;
      ipSource = resolved.source;

      const result = await this.dnsManager.reconcile(domain, ip, ttl);
      report = {
        outcome: result.outcome,
        domain,
        ip,
        ipSource,
        previousIp: result.previousIp,
        recordId: result.record.id,
        startedAt,
        finishedAt: new Date(),
      };
    } catch (error) {
      this.logger.error(
        {
          domain,
          ip,
          code: error instanceof DdnsError ? error.code : undefined,
          err: error,
        },
        `${symbols.error} DDNS update failed: ${errorMessage(error)}`
      );
      report = {
        outcome: 'failed',
        domain,
        ip,
        ipSource,
        error: errorMessage(error),
        startedAt,
        finishedAt: new Date(),
      };
    }

    await this.deps.notifier.notify(report);
    await this.deps.stateStore.save(report);

    if (report.outcome === 'failed') {
      this.logger.error({ domain, outcome: report.outcome }, 'DDNS update finished with errors');
    } else {
      this.logger.info(
        { domain, ip: report.ip, previousIp: report.previousIp, outcome: report.outcome, recordId: report.recordId },
        `${symbols.success} DDNS update finished`
      );
    }

    return report;
  }
}

/**
 * Wire the production components from a loaded config
 */
export function createApplication(config: DdnsConfig, logger: Logger): Application {
  const resolver = new IPResolver({ services: config.ipServices, timeoutMs: config.requestTimeoutMs }, logger);

  const provider = new AliDNSProvider(
    'alidns',
    {
      accessKeyId: config.accessKeyId,
      accessKeySecret: config.accessKeySecret,
      region: config.region,
      endpoint: config.endpoint,
    },
    { timeoutMs: config.requestTimeoutMs },
    logger
  );

  const notifier = new Notifier(
    {
      webhookUrl: config.feishuWebhookUrl,
      secret: config.feishuWebhookSecret,
      timeoutMs: config.requestTimeoutMs,
    },
    logger
  );

  const stateStore = new StateStore(config.stateFile, logger);

  return new Application(config, { resolver, provider, notifier, stateStore }, logger);
}
