/**
 * Last-run state file
 * Informational only: the provider stays authoritative for the record value
 */
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { errorMessage } from '../core/errors.js';
import type { RunReport, RunState } from '../types/index.js';

const runStateSchema = z.object({
  domain: z.string(),
  outcome: z.enum(['created', 'updated', 'unchanged', 'failed']),
  ip: z.string().optional(),
  recordId: z.string().optional(),
  finishedAt: z.string(),
});

export class StateStore {
  private readonly logger: Logger;

  constructor(
    private readonly path: string | undefined,
    logger: Logger
  ) {
    this.logger = createChildLogger(logger, { service: 'StateStore' });
  }

  /**
   * Read the previous run. Missing, unreadable or malformed files yield null.
   */
  async load(): Promise<RunState | null> {
    if (!this.path) return null;

    let text: string;
    try {
      text = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug({ path: this.path }, 'No previous state');
      } else {
        this.logger.warn({ path: this.path, error: errorMessage(error) }, 'Failed to read state file');
      }
      return null;
    }

    try {
      const parsed = runStateSchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        return parsed.data;
      }
      this.logger.warn({ path: this.path }, 'Ignoring malformed state file');
    } catch (error) {
      this.logger.warn({ path: this.path, error: errorMessage(error) }, 'Ignoring malformed state file');
    }
    return null;
  }

  /**
   * Persist the run. Failures are logged and reported as false.
   */
  async save(report: RunReport): Promise<boolean> {
    if (!this.path) return true;

    const state: RunState = {
      domain: report.domain,
      outcome: report.outcome,
      ip: report.ip,
      recordId: report.recordId,
      finishedAt: report.finishedAt.toISOString(),
    };

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, `${JSON.stringify(state, null, 2)}\n`, 'utf-8');
      return true;
    } catch (error) {
      this.logger.warn({ path: this.path, error: errorMessage(error) }, 'Failed to write state file');
      return false;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
