/**
 * Configuration schema validation using Zod
 */

import { z } from 'zod';

const extensionSchema = z
  .string()
  .trim()
  .min(1)
  .transform((value) => (value.startsWith('.') ? value : `.${value}`).toLowerCase());

// HTTP server configuration schema
export const ServerConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(8000),
});

// Object storage configuration schema
export const StorageConfigSchema = z
  .object({
    region: z.string().min(1).default('us-east-1'),
    accessKeyId: z.string().min(1).optional(),
    secretAccessKey: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
  })
  .refine(
    (storage) => Boolean(storage.accessKeyId) === Boolean(storage.secretAccessKey),
    {
      message: 'Both accessKeyId and secretAccessKey must be provided together',
      path: ['accessKeyId'],
    }
  );

// Extraction pipeline configuration schema
export const ExtractionConfigSchema = z.object({
  scratchRoot: z.string().min(1).default('./downloads'),
  agentTimeoutMs: z.number().int().min(1).default(120_000),
  agentAbortGraceMs: z.number().int().min(0).default(2_000),
  allowedExtensions: z.array(extensionSchema).default([]),
});

// Document harvester browser configuration schema
export const BrowserConfigSchema = z.object({
  headless: z.boolean().default(true),
  executablePath: z.string().optional(),
  args: z.array(z.string()).default([]),
  navigationTimeoutMs: z.number().int().min(1000).default(30_000),
  documentExtensions: z.array(extensionSchema).min(1).default(['.pdf']),
});

// Logging configuration schema
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
  json: z.boolean().default(false),
});

// Main application configuration schema
export const AppConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  extraction: ExtractionConfigSchema.default({}),
  browser: BrowserConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type BrowserConfig = z.infer<typeof BrowserConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// Input configuration types (fields optional for user input)
export type AppConfigInput = z.input<typeof AppConfigSchema>;

export const DEFAULT_CONFIG: AppConfig = AppConfigSchema.parse({});
