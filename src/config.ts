/**
 * Configuration with Zod validation.
 *
 * Priority: CLI options > config file > defaults.
 *
 * @module config
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS } from './logger.js';

export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS),
});

export const CrateBridgeConfigSchema = z.object({
  /** Directory holding the `.crate` files */
  crateRoot: z.string().min(1),
  /** Destination XML file */
  output: z.string().min(1),
  /** `PRODUCT` name written into the XML */
  productName: z.string().min(1),
  /** `PRODUCT` version written into the XML */
  productVersion: z.string().min(1),
  /** Poll interval for watch mode */
  intervalSeconds: z.number().positive(),
  logging: LoggingConfigSchema,
});

// Partial schema for config files (top-level AND nested properties optional)
export const PartialCrateBridgeConfigSchema = CrateBridgeConfigSchema.partial().extend({
  logging: LoggingConfigSchema.partial().optional(),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type CrateBridgeConfig = z.infer<typeof CrateBridgeConfigSchema>;
export type PartialCrateBridgeConfig = z.infer<typeof PartialCrateBridgeConfigSchema>;

/**
 * Get the path to the _Serato_ folder in the user's music directory.
 */
export function getDefaultSeratoPath(): string {
  return join(homedir(), 'Music', '_Serato_');
}

/**
 * Defaults: crates from `_Serato_/Subcrates`, XML written next to them.
 */
export function getDefaultConfig(): CrateBridgeConfig {
  const seratoPath = getDefaultSeratoPath();
  return {
    crateRoot: join(seratoPath, 'Subcrates'),
    output: join(seratoPath, 'rekordbox-export.xml'),
    productName: 'crate-bridge',
    productVersion: '0.1.0',
    intervalSeconds: 30,
    logging: { level: 'info' },
  };
}

/**
 * Overlay a partial config on a complete one.
 */
export function mergeConfig(
  base: CrateBridgeConfig,
  override: PartialCrateBridgeConfig
): CrateBridgeConfig {
  return {
    crateRoot: override.crateRoot ?? base.crateRoot,
    output: override.output ?? base.output,
    productName: override.productName ?? base.productName,
    productVersion: override.productVersion ?? base.productVersion,
    intervalSeconds: override.intervalSeconds ?? base.intervalSeconds,
    logging: {
      level: override.logging?.level ?? base.logging.level,
    },
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Read and validate a JSON config file.
 *
 * @throws {ConfigError} When the file is unreadable, not JSON or invalid
 */
export async function loadConfigFile(configPath: string): Promise<PartialCrateBridgeConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(configPath, 'file could not be read', err);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(configPath, 'not valid JSON', err);
  }

  const result = PartialCrateBridgeConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(configPath, describeIssues(result.error), result.error);
  }
  return result.data;
}

/**
 * Load the configuration.
 *
 * @param configPath - Optional JSON config file
 * @param overrides - Values taking precedence over the file (CLI options)
 */
export async function loadConfig(
  configPath?: string,
  overrides: PartialCrateBridgeConfig = {}
): Promise<CrateBridgeConfig> {
  let config = getDefaultConfig();

  if (configPath) {
    config = mergeConfig(config, await loadConfigFile(configPath));
  }

  return mergeConfig(config, overrides);
}
