/**
 * Feishu webhook notifier
 * Posts one interactive card per run; delivery failures are logged, never thrown
 */
import { createHmac } from 'crypto';
import type { Logger } from 'pino';
import { createChildLogger, symbols } from '../core/Logger.js';
import { NotificationError, errorMessage } from '../core/errors.js';
import type { RunOutcome, RunReport } from '../types/index.js';

export interface NotifierOptions {
  webhookUrl?: string;
  secret?: string;
  timeoutMs: number;
}

type CardTemplate = 'green' | 'blue' | 'grey' | 'red';

interface CardField {
  is_short: boolean;
  text: { tag: 'lark_md'; content: string };
}

export interface FeishuCardMessage {
  timestamp?: string;
  sign?: string;
  msg_type: 'interactive';
  card: {
    config: { wide_screen_mode: boolean };
    header: { title: { tag: 'plain_text'; content: string }; template: CardTemplate };
    elements: Array<
      | { tag: 'div'; fields: CardField[] }
      | { tag: 'hr' }
      | { tag: 'note'; elements: Array<{ tag: 'plain_text'; content: string }> }
    >;
  };
}

const OUTCOME_DISPLAY: Record<RunOutcome, { title: string; label: string; template: CardTemplate }> = {
  created: { title: 'DDNS record created', label: 'Created', template: 'green' },
  updated: { title: 'DDNS record updated', label: 'Updated', template: 'blue' },
  unchanged: { title: 'DDNS record unchanged', label: 'Unchanged', template: 'grey' },
  failed: { title: 'DDNS update failed', label: 'Failed', template: 'red' },
};

/**
 * Feishu custom bot signature: base64 HMAC-SHA256 keyed by
 * "timestamp\nsecret" over an empty message
 */
export function signFeishu(timestamp: string, secret: string): string {
  return createHmac('sha256', `${timestamp}\n${secret}`).update('').digest('base64');
}

function field(name: string, value: string, isShort: boolean = true): CardField {
  return { is_short: isShort, text: { tag: 'lark_md', content: `**${name}**\n${value}` } };
}

/**
 * Build the card message for a run report
 */
export function buildCardMessage(report: RunReport): FeishuCardMessage {
  const display = OUTCOME_DISPLAY[report.outcome];

  const fields: CardField[] = [
    field('Domain', report.domain),
    field('Outcome', display.label),
    field('Current IP', report.ip ?? 'unknown'),
  ];

  if (report.outcome === 'updated' && report.previousIp) {
    fields.push(field('Previous IP', report.previousIp));
  }

  if (report.outcome === 'failed' && report.error) {
    fields.push(field('Error', report.error, false));
  }

  return {
    msg_type: 'interactive',
    card: {
      config: { wide_screen_mode: true },
      header: {
        title: { tag: 'plain_text', content: display.title },
        template: display.template,
      },
      elements: [
        { tag: 'div', fields },
        { tag: 'hr' },
        { tag: 'note', elements: [{ tag: 'plain_text', content: report.finishedAt.toISOString() }] },
      ],
    },
  };
}

export class Notifier {
  private readonly logger: Logger;

  constructor(
    private readonly options: NotifierOptions,
    logger: Logger
  ) {
    this.logger = createChildLogger(logger, { service: 'Notifier' });
  }

  /**
   * Send the run report. Resolves true when delivered or when no webhook is
   * configured, false when delivery failed.
   */
  async notify(report: RunReport): Promise<boolean> {
    const { webhookUrl } = this.options;
    if (!webhookUrl) {
      this.logger.debug('No webhook configured, skipping notification');
      return true;
    }

    const message = buildCardMessage(report);
    if (this.options.secret) {
      const timestamp = String(Math.floor(Date.now() / 1000));
      message.timestamp = timestamp;
      message.sign = signFeishu(timestamp, this.options.secret);
    }

    try {
      await this.deliver(webhookUrl, message);
      this.logger.info({ outcome: report.outcome }, `${symbols.notify} Notification sent`);
      return true;
    } catch (error) {
      const statusCode = error instanceof NotificationError ? error.statusCode : undefined;
      this.logger.warn({ outcome: report.outcome, statusCode, error: errorMessage(error) }, 'Notification failed');
      return false;
    }
  }

  private async deliver(webhookUrl: string, message: FeishuCardMessage): Promise<void> {
    let response: Response;
    try {
      response = await fetch(webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(message),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new NotificationError(`Webhook request failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    const responseText = await response.text().catch(() => '');

    if (!response.ok) {
      throw new NotificationError(`Webhook returned HTTP ${response.status}: ${responseText.slice(0, 200)}`, response.status);
    }

    // Feishu answers 200 with a non-zero code for rejected messages
    const code = parseFeishuCode(responseText);
    if (code !== undefined && code !== 0) {
      throw new NotificationError(`Webhook rejected message: ${responseText.slice(0, 200)}`, response.status);
    }
  }
}

function parseFeishuCode(text: string): number | undefined {
  try {
    const body: unknown = JSON.parse(text);
    if (typeof body !== 'object' || body === null) return undefined;
    if ('code' in body && typeof body.code === 'number') return body.code;
    if ('StatusCode' in body && typeof body.StatusCode === 'number') return body.StatusCode;
  } catch {
    return undefined;
  }
  return undefined;
}
