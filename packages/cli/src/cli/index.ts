#!/usr/bin/env node

/**
 * @file packages/cli/src/cli/index.ts
 * @description Command-line entrypoint: list or watch BMC sensors.
 */

import 'reflect-metadata';
import { Command } from 'commander';
import chalk from 'chalk';
import { LSENSORS_VERSION, type LayoutName } from '@lsensors/shared';
import { AppError, ConfigurationError, errorMessage } from '../domain/errors/app-error.js';
import type { ListingResult } from '../application/services/sensor-listing-service.js';
import { collectSensorNames, parseInterval, parseLayout, validateSensorType } from './options.js';

interface CliOptions {
  watch?: boolean;
  sensor: string[];
  interval?: number;
  layout?: LayoutName;
  busAddress?: string;
  color: boolean;
}

const program = new Command();

program
  .name('lsensors')
  .description(
    'Shows all sensors of the specified type.\nIf the type is not specified shows all found sensors.',
  )
  .version(LSENSORS_VERSION)
  .argument('[sensors-type]', 'sensor type to list, e.g. temperature or fan_tach')
  .option('-w, --watch', 'poll the sensors repeatedly')
  .option(
    '-s, --sensor <names>',
    'sensor name(s) to show, comma-separated or repeated',
    collectSensorNames,
    [],
  )
  .option('-n, --interval <seconds>', 'watch interval in seconds', parseInterval)
  .option('-l, --layout <name>', 'table layout: basic | thresholds | full', parseLayout)
  .option('-a, --bus-address <address>', 'D-Bus address to use instead of the system bus')
  .option('--no-color', 'disable coloured status')
  .showHelpAfterError()
  .action(async (sensorsType: string | undefined, options: CliOptions) => {
    const type = validateSensorType(sensorsType);

    // Everything above is checked before the bus is touched.
    const { setupContainer, container } = await import('../container.js');
    const { ConfigService } = await import('../infrastructure/config/config-service.js');
    const { SensorListingService } = await import(
      '../application/services/sensor-listing-service.js'
    );
    setupContainer();

    const configService = container.resolve(ConfigService);
    const config = configService.load();
    configService.override({
      intervalSeconds: options.interval,
      layout: options.layout,
      busAddress: options.busAddress,
      color: config.color && options.color && Boolean(process.stdout.isTTY),
    });

    const service = container.resolve(SensorListingService);
    const output = {
      out: (line: string) => process.stdout.write(`${line}\n`),
      err: (line: string) => process.stderr.write(`${line}\n`),
    };

    let result: ListingResult;
    try {
      result = await service.run({ type, sensors: options.sensor, watch: options.watch }, output);
    } catch (err) {
      service.shutdown();
      throw err;
    }

    if (result.mode === 'once') {
      service.shutdown();
      return;
    }

    const stop = () => {
      service.shutdown();
      process.exit(0);
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
  });

/**
 * Reports a failed run and exits with its code.
 */
function fail(err: unknown): never {
  if (err instanceof ConfigurationError) {
    console.error(chalk.red(`✗  ${err.message}`));
    program.outputHelp({ error: true });
  } else if (err instanceof AppError) {
    console.error(chalk.red(`✗  ${err.message}`));
  } else {
    console.error(chalk.red(`\n  ❌ Unexpected failure: ${errorMessage(err)}`));
  }
  if (process.env.DEBUG) console.error(err);
  process.exit(err instanceof AppError ? err.exitCode : 1);
}

// Catch unhandled rejections so errors are never swallowed
process.on('unhandledRejection', (err: unknown) => {
  fail(err);
});

program.parseAsync().catch(fail);
