/**
 * Configuration module exports
 */

export { applyEnvironmentOverrides, getConfig, loadConfig, parseConfig, resetConfig } from './loader.js';
export { AppConfigSchema, DEFAULT_CONFIG } from './schema.js';
export type {
  AppConfig,
  AppConfigInput,
  BrowserConfig,
  ExtractionConfig,
  LoggingConfig,
  ServerConfig,
  StorageConfig,
} from './schema.js';
