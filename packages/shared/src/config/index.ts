/**
 * Environment configuration for SchemaSmith
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { ValidationError } from '../errors/index.js';

// Load environment variables from the working directory
dotenvConfig({ path: resolve(process.cwd(), '.env') });

// Configuration schema
const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  generator: z.object({
    /** Generator configuration file (YAML or JSON) */
    configPath: z.string().optional(),
    outputDir: z.string().default('./generated'),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    generator: {
      configPath: process.env.SCHEMASMITH_CONFIG,
      outputDir: process.env.SCHEMASMITH_OUTPUT_DIR,
    },
  };

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ValidationError(
      'Invalid environment configuration',
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }
  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}
