/**
 * @file packages/cli/src/domain/logic/sensor-presenter.ts
 * @description Fetches, interprets and prints sensors grouped by type.
 */

import { sensorName, sensorType, type PropertyBag, type SensorTree } from '@lsensors/shared';
import type { SensorSource } from '../interfaces/sensor-source.interface.js';
import type { LoggerLike } from '../../logger.js';
import { errorMessage } from '../errors/app-error.js';
import { sortedEntries } from './path-comparator.js';
import { deriveSensorView } from './property-interpreter.js';
import type { TableRenderer } from './table-layout.js';

export type LineWriter = (line: string) => void;

export interface RenderOptions {
  /** Keep the tree's own iteration order instead of natural path order. */
  preserveOrder?: boolean;
}

export interface RenderSummary {
  printed: number;
  failed: number;
}

/**
 * Drives one or more render passes over an enumeration snapshot.
 *
 * The last printed group survives across passes, so a watch loop only
 * repeats a header when the sensor type changes.
 */
export class SensorPresenter {
  private lastGroup: string | undefined;

  constructor(
    private readonly source: SensorSource,
    private readonly renderer: TableRenderer,
    private readonly out: LineWriter,
    private readonly err: LineWriter,
    private readonly logger: LoggerLike,
  ) {}

  async render(tree: SensorTree, options: RenderOptions = {}): Promise<RenderSummary> {
    const entries = options.preserveOrder ? [...tree.entries()] : sortedEntries(tree);
    const summary: RenderSummary = { printed: 0, failed: 0 };

    for (const [path, providers] of entries) {
      const services = [...providers.keys()].sort();
      for (const service of services) {
        const printed = await this.renderOne(service, path, providers.get(service) ?? []);
        if (printed) summary.printed++;
        else summary.failed++;
      }
    }

    this.logger.debug(summary, 'Render pass finished');
    return summary;
  }

  private async renderOne(
    service: string,
    path: string,
    interfaces: readonly string[],
  ): Promise<boolean> {
    let bag: PropertyBag;
    try {
      bag = await this.source.fetchProperties(service, path, interfaces);
    } catch (err) {
      this.logger.debug({ err, service, path }, 'Failed to fetch sensor properties');
      this.err(`Get properties for ${path} failed: ${errorMessage(err)}`);
      return false;
    }

    const { layout } = this.renderer;
    const view = deriveSensorView(bag, {
      width: layout.numberWidth,
      thresholds: layout.thresholds,
    });

    const group = sensorType(path);
    if (group !== this.lastGroup) {
      if (this.lastGroup !== undefined) this.out('');
      for (const line of this.renderer.header(group)) this.out(line);
      this.lastGroup = group;
    }

    this.out(this.renderer.row(sensorName(path), view));
    return true;
  }
}
