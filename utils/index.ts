/**
 * Utils Module Exports
 */

export * from './async';
export {
  type AppConfig,
  ConfigManager,
  type FileConfig,
  getConfigManager,
  resetConfigManager,
} from './config-manager';
export {
  closeLogger,
  configureLogging,
  createEnhancedLogger,
  createModuleLogger,
  enableFileLogging,
  EnhancedLogger,
  LOG_LEVELS,
  type LogContext,
  type LoggingSettings,
  logger,
  type ModuleLogger,
  setLogLevel,
} from './logger';
export { safeJsonParse, safeJsonParseSafe, type SafeParseOptions } from './safe-json';
