/**
 * Core module exports
 */
export { createLogger, createRunLogger, createSilentLogger, createChildLogger, symbols, type LogLevel, type Logger } from './Logger.js';
export {
  DdnsError,
  ConfigError,
  ResolutionError,
  ProviderError,
  NotificationError,
  type DdnsErrorCode,
} from './errors.js';
export {
  Application,
  createApplication,
  exitCodeFor,
  EXIT_OK,
  EXIT_FAILED,
  EXIT_CONFIG_ERROR,
  type ApplicationDependencies,
} from './Application.js';
