/**
 * @fileoverview App configuration loading from YAML.
 * Validates and caches configuration for the connect-four client.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// Schema for app configuration
const AppConfigSchema = z.object({
  appDomain: z.string().min(1),
  eventKind: z.number().int().min(0).max(65535),
  backlogTimeoutMs: z.number().int().positive(),
  channelCapacity: z.number().int().positive(),
  tickIntervalMs: z.number().int().positive(),
  dropMsPerRow: z.number().int().min(0),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  defaultRelays: z.array(z.string().url()),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

let cachedConfig: AppConfig | null = null;

/**
 * Validate a parsed configuration document.
 * @throws Error describing the first invalid keys
 */
export function parseAppConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid app configuration: ${details}`);
  }
  return result.data;
}

/**
 * Load and validate app configuration from YAML file.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - CONFIG_PATH environment variable if set
 * - Otherwise from ./config/connect-four.yaml relative to cwd (project root)
 */
export function loadAppConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const configPath = process.env['CONFIG_PATH'] ?? join(process.cwd(), 'config/connect-four.yaml');

  const fileContents = readFileSync(configPath, 'utf8');
  const validatedConfig = parseAppConfig(parseYaml(fileContents));
  cachedConfig = validatedConfig;
  return validatedConfig;
}

/**
 * Clear the cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
