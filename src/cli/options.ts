/**
 * Options shared by every command and their mapping onto the config.
 */

import { z } from 'zod';
import { loadConfig, type CrateBridgeConfig, type PartialCrateBridgeConfig } from '../config.js';

export const CommonOptionsSchema = z.object({
  crateRoot: z.string().optional(),
  output: z.string().optional(),
  productName: z.string().optional(),
  productVersion: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type CommonOptions = z.infer<typeof CommonOptionsSchema>;

/**
 * Load the config file (if any) and apply CLI options on top.
 */
export async function resolveConfig(
  options: CommonOptions,
  extra: PartialCrateBridgeConfig = {}
): Promise<CrateBridgeConfig> {
  return loadConfig(options.config, {
    crateRoot: options.crateRoot,
    output: options.output,
    productName: options.productName,
    productVersion: options.productVersion,
    logging: options.verbose ? { level: 'debug' } : undefined,
    ...extra,
  });
}
