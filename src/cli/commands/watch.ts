/**
 * Watch command - Regenerates the XML whenever the crates change
 */

import { z } from 'zod';
import { Converter } from '../../converter.js';
import { CrateWatcher } from '../../crateWatcher.js';
import { createLogger } from '../../logger.js';
import { CommonOptionsSchema, resolveConfig } from '../options.js';

const WatchOptionsSchema = CommonOptionsSchema.extend({
  interval: z.coerce.number().positive().optional(),
});

type Options = z.input<typeof WatchOptionsSchema>;

export async function watchCommand(opts: Options): Promise<void> {
  try {
    const options = WatchOptionsSchema.parse(opts);
    const config = await resolveConfig(options, { intervalSeconds: options.interval });
    const logger = createLogger(config.logging.level);

    const converter = new Converter({ ...config, logger });
    const watcher = new CrateWatcher(converter, {
      pollIntervalMs: config.intervalSeconds * 1000,
      logger,
    });

    watcher.on('ready', ({ crateRoot }) => {
      logger.info(`Watching ${crateRoot} for changes (interval ${config.intervalSeconds}s)`);
    });
    watcher.on('unchanged', () => logger.debug('No crate changes'));
    watcher.on('error', err => logger.error(err.message));

    process.once('SIGINT', () => {
      watcher.stop();
      logger.info('Stopped by user');
    });

    await watcher.start();
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
