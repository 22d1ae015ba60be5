/**
 * @file packages/cli/src/container.ts
 * @description Dependency registrations for the CLI.
 */

import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { Logger } from './logger.js';
import { ConfigService } from './infrastructure/config/config-service.js';
import { DbusSensorSource, openBus } from './infrastructure/dbus/dbus-sensor-source.js';
import type { SensorSource } from './domain/interfaces/sensor-source.interface.js';
import { WatchService } from './application/services/watch-service.js';
import {
  SENSOR_SOURCE,
  SensorListingService,
} from './application/services/sensor-listing-service.js';

/**
 * Executes setup container.
 */
export function setupContainer() {
  container.register(Logger, { useValue: new Logger() });
  container.registerSingleton(ConfigService);

  // The bus is opened on first resolve, after configuration has been validated.
  container.register<SensorSource>(SENSOR_SOURCE, {
    useFactory: instanceCachingFactory<SensorSource>(
      (c) =>
        new DbusSensorSource(
          openBus(c.resolve(ConfigService).get('busAddress')),
          c.resolve(Logger),
        ),
    ),
  });

  container.registerSingleton(WatchService);
  container.registerSingleton(SensorListingService);

  return container;
}

export { container };
