/**
 * @file packages/cli/src/application/services/sensor-listing-service.ts
 * @description Coordinates enumeration, rendering and watch mode for one CLI run.
 */

import { inject, injectable } from 'tsyringe';
import { TABLE_LAYOUTS, scopeFor, type SensorTree } from '@lsensors/shared';
import type { SensorSource } from '../../domain/interfaces/sensor-source.interface.js';
import {
  SensorPresenter,
  type LineWriter,
  type RenderSummary,
} from '../../domain/logic/sensor-presenter.js';
import { TableRenderer } from '../../domain/logic/table-layout.js';
import { resolveWatchList } from '../../domain/logic/watch-list.js';
import { ConfigService } from '../../infrastructure/config/config-service.js';
import { Logger, type LoggerLike } from '../../logger.js';
import { WatchService } from './watch-service.js';

export const SENSOR_SOURCE = 'SensorSource';

export interface ListingRequest {
  /** Sensor type filter, already validated. */
  type?: string;
  /** Names to show, in display order. */
  sensors?: readonly string[];
  watch?: boolean;
}

export interface ListingOutput {
  out: LineWriter;
  err: LineWriter;
}

export type ListingResult =
  | { mode: 'once'; summary: RenderSummary }
  | { mode: 'watch'; sensors: number };

/**
 * Encapsulates one listing run.
 */
@injectable()
export class SensorListingService {
  constructor(
    @inject(SENSOR_SOURCE) private source: SensorSource,
    @inject(ConfigService) private config: ConfigService,
    @inject(WatchService) private watcher: WatchService,
    @inject(Logger) private logger: LoggerLike,
  ) {}

  /**
   * Enumerates sensors and prints them once, or starts the watch loop.
   * Enumeration and name-resolution failures reject before anything is printed.
   */
  async run(request: ListingRequest, output: ListingOutput): Promise<ListingResult> {
    const { sensorsRoot, layout, color, intervalSeconds } = this.config.getFullConfig();
    const scope = scopeFor(sensorsRoot, request.type);

    this.logger.debug({ scope }, 'Enumerating sensors');
    const tree = await this.source.enumerate(scope);
    const named = (request.sensors?.length ?? 0) > 0;
    const selected: SensorTree = named ? resolveWatchList(request.sensors ?? [], tree) : tree;

    const presenter = new SensorPresenter(
      this.source,
      new TableRenderer(TABLE_LAYOUTS[layout], { color }),
      output.out,
      output.err,
      this.logger,
    );
    const cycle = (): Promise<RenderSummary> =>
      presenter.render(selected, { preserveOrder: named });

    if (!request.watch) {
      return { mode: 'once', summary: await cycle() };
    }

    this.watcher.start(intervalSeconds, cycle);
    return { mode: 'watch', sensors: selected.size };
  }

  /**
   * Stops polling and releases the bus.
   */
  shutdown(): void {
    this.watcher.stop();
    this.source.close();
  }
}
