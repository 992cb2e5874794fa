/**
 * @fileoverview Server configuration loading from YAML.
 * Validates and caches configuration for the card duel server.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { HandSchema } from '@card-duel/protocol';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// Schema for server configuration
const ServerConfigSchema = z.object({
  server: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1),
  }),
  match: z.object({
    startingHealth: z.number().int().positive(),
    startingHand: HandSchema,
    forfeitOnDisconnect: z.boolean(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Error thrown when the configuration file is missing required values.
 */
export class InvalidConfigError extends Error {
  constructor(
    message: string,
    readonly issues: z.ZodIssue[]
  ) {
    super(`Invalid server configuration: ${message}`);
    this.name = 'InvalidConfigError';
  }
}

const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../config/server.yaml', import.meta.url));

let cachedConfig: ServerConfig | null = null;

/**
 * Read and validate a configuration file.
 * @throws {InvalidConfigError} if the file does not match the schema
 */
export function readServerConfig(configPath: string): ServerConfig {
  const fileContents = readFileSync(configPath, 'utf8');
  const rawConfig = parseYaml(fileContents) as unknown;
  const result = ServerConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      result.error.issues
    );
  }
  return result.data;
}

/**
 * Load server configuration, caching the result for subsequent calls.
 *
 * Config file is loaded from:
 * - CONFIG_PATH environment variable if set
 * - Otherwise from config/server.yaml in the server package
 */
export function loadServerConfig(): ServerConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const configPath = process.env['CONFIG_PATH'] ?? DEFAULT_CONFIG_PATH;
  cachedConfig = readServerConfig(configPath);
  return cachedConfig;
}

/**
 * Clear the cached config (useful for testing or hot-reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
