/**
 * Convert command - Loads config and runs a single conversion
 */

import ora from 'ora';
import { z } from 'zod';
import { Converter, logSummary } from '../../converter.js';
import { createLogger } from '../../logger.js';
import { CommonOptionsSchema, resolveConfig } from '../options.js';

const ConvertOptionsSchema = CommonOptionsSchema.extend({
  dryRun: z.boolean().optional(),
});

type Options = z.infer<typeof ConvertOptionsSchema>;

export async function convertCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: 'Loading configuration...', indent: 2 }).start();

  try {
    const options = ConvertOptionsSchema.parse(opts);
    const config = await resolveConfig(options);
    const logger = createLogger(config.logging.level);

    const converter = new Converter({ ...config, logger });

    spinner.text = `Converting crates from ${converter.crateRoot}...`;
    const summary = await converter.runOnce({ write: !options.dryRun });

    if (summary.written) {
      spinner.succeed(`Finished writing ${summary.output}`);
    } else {
      spinner.info('Dry run complete - XML was not written');
    }

    logSummary(summary, logger);
  } catch (error) {
    spinner.fail('Conversion failed');
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
