/**
 * Configuration loader that handles multiple sources with priority order:
 * 1. Environment variables (highest priority)
 * 2. JSON file named by EXTRACTION_CONFIG_PATH
 * 3. Default values (lowest priority)
 */

import { promises as fs } from 'node:fs';
import { resolve } from 'node:path';
import { config as loadEnv } from 'dotenv';
import { ConfigurationError, errorMessage } from '../exceptions.js';
import { AppConfigSchema, type AppConfig } from './schema.js';

// Load environment variables
loadEnv();

type SectionName = keyof AppConfig;
type RawSection = Record<string, unknown>;
type RawConfig = Partial<Record<SectionName, RawSection>>;

const SECTIONS: SectionName[] = ['server', 'storage', 'extraction', 'browser', 'logging'];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (raw: string): unknown => raw;

const asNumber = (raw: string): unknown => Number(raw.trim());

const asBoolean = (raw: string): unknown => {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no'].includes(normalized)) {
    return false;
  }
  return raw;
};

const asList = (raw: string): unknown =>
  raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

const asLogLevel = (raw: string): unknown => {
  const normalized = raw.trim().toLowerCase();
  return normalized === 'warn' ? 'warning' : normalized;
};

interface EnvOverride {
  env: string;
  section: SectionName;
  key: string;
  parse: (raw: string) => unknown;
}

const ENV_OVERRIDES: EnvOverride[] = [
  { env: 'API_HOST', section: 'server', key: 'host', parse: asString },
  { env: 'API_PORT', section: 'server', key: 'port', parse: asNumber },
  { env: 'AWS_REGION', section: 'storage', key: 'region', parse: asString },
  { env: 'AWS_ACCESS_KEY_ID', section: 'storage', key: 'accessKeyId', parse: asString },
  { env: 'AWS_SECRET_ACCESS_KEY', section: 'storage', key: 'secretAccessKey', parse: asString },
  { env: 'S3_ENDPOINT', section: 'storage', key: 'endpoint', parse: asString },
  { env: 'SCRATCH_ROOT', section: 'extraction', key: 'scratchRoot', parse: asString },
  { env: 'AGENT_TIMEOUT_MS', section: 'extraction', key: 'agentTimeoutMs', parse: asNumber },
  { env: 'AGENT_ABORT_GRACE_MS', section: 'extraction', key: 'agentAbortGraceMs', parse: asNumber },
  { env: 'ALLOWED_EXTENSIONS', section: 'extraction', key: 'allowedExtensions', parse: asList },
  { env: 'BROWSER_HEADLESS', section: 'browser', key: 'headless', parse: asBoolean },
  { env: 'BROWSER_EXECUTABLE_PATH', section: 'browser', key: 'executablePath', parse: asString },
  { env: 'BROWSER_NAVIGATION_TIMEOUT_MS', section: 'browser', key: 'navigationTimeoutMs', parse: asNumber },
  { env: 'DOCUMENT_EXTENSIONS', section: 'browser', key: 'documentExtensions', parse: asList },
  { env: 'LOG_LEVEL', section: 'logging', key: 'level', parse: asLogLevel },
  { env: 'LOG_JSON', section: 'logging', key: 'json', parse: asBoolean },
];

/**
 * Read the optional JSON configuration file
 */
async function loadConfigFromFile(configPath: string): Promise<RawConfig> {
  const absolutePath = resolve(configPath);
  let content: string;
  try {
    content = await fs.readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Config file not readable: ${absolutePath} (${errorMessage(error)})`, 'invalid_config', {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid JSON: ${absolutePath}`, 'invalid_config', { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file must contain a JSON object: ${absolutePath}`);
  }

  const raw: RawConfig = {};
  for (const section of SECTIONS) {
    const value = parsed[section];
    if (value === undefined) {
      continue;
    }
    if (!isRecord(value)) {
      throw new ConfigurationError(`Config section "${section}" must be an object`);
    }
    raw[section] = value;
  }
  return raw;
}

/**
 * Apply environment variable overrides on top of file configuration
 */
export function applyEnvironmentOverrides(config: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const merged: RawConfig = {};
  for (const section of SECTIONS) {
    merged[section] = { ...(config[section] ?? {}) };
  }

  for (const override of ENV_OVERRIDES) {
    const raw = env[override.env];
    if (raw === undefined || raw === '') {
      continue;
    }
    merged[override.section] = {
      ...merged[override.section],
      [override.key]: override.parse(raw),
    };
  }

  return merged;
}

/**
 * Validate a raw configuration object, reporting every issue at once
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${details.join('; ')}`);
  }
  return result.data;
}

/**
 * Main configuration loader function
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const configPath = env.EXTRACTION_CONFIG_PATH;
  const fileConfig = configPath ? await loadConfigFromFile(configPath) : {};
  return parseConfig(applyEnvironmentOverrides(fileConfig, env));
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get the global configuration instance
 */
export async function getConfig(): Promise<AppConfig> {
  if (!configInstance) {
    configInstance = await loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
