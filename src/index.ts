#!/usr/bin/env node
/**
 * aliddns - Entry Point
 *
 * One reconciliation cycle per invocation: keep an AliDNS A record on this
 * host's public IPv4 address. Scheduling is left to cron or the container
 * orchestrator; the exit code is the result.
 */
import { parseArgs } from 'util';
import { ConfigError, createApplication, createLogger, createRunLogger, exitCodeFor, EXIT_CONFIG_ERROR, EXIT_FAILED } from './core/index.js';
import { errorMessage } from './core/errors.js';
import { loadConfig, resolveConfigPath, resolveLogSettings } from './config/ConfigManager.js';
import type { DdnsConfig } from './config/schema.js';

const USAGE = `Usage: aliddns [--config <path>]

Options:
  -c, --config <path>  Config file (default: $DDNS_CONFIG or ./config.json)
  -h, --help           Show this help message`;

async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  // Console-only logger until the config says where the log file lives
  const bootstrapLogger = createLogger(resolveLogSettings());

  let configPath: string;
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        config: { type: 'string', short: 'c' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: false,
    });

    if (values.help) {
      process.stdout.write(`${USAGE}\n`);
      return 0;
    }
    configPath = resolveConfigPath(values.config);
  } catch (error) {
    bootstrapLogger.error(`Invalid arguments: ${errorMessage(error)}`);
    process.stderr.write(`${USAGE}\n`);
    return EXIT_CONFIG_ERROR;
  }

  let config: DdnsConfig;
  try {
    config = loadConfig(configPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      bootstrapLogger.error({ details: error.details }, error.message);
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  }

  const logger = createRunLogger({ ...resolveLogSettings(config), file: config.logFile });
  logger.debug({ path: configPath }, 'Configuration loaded');

  const app = createApplication(config, logger);
  const report = await app.run();
  return exitCodeFor(report);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = EXIT_FAILED;
  });
