/**
 * @file packages/cli/src/domain/logic/table-layout.ts
 * @description Plain-text rendering of group headers and sensor rows.
 */

import { Chalk, type ChalkInstance } from 'chalk';
import {
  THRESHOLD_TITLES,
  type DerivedSensorView,
  type SensorStatus,
  type TableLayout,
} from '@lsensors/shared';
import { fitWidth } from './property-interpreter.js';

const NAME_WIDTH = 16;
const STATUS_WIDTH = 8;
const UNIT_WIDTH = 4;

export interface TableRendererOptions {
  color?: boolean;
}

/**
 * Encapsulates table rendering for one layout.
 */
export class TableRenderer {
  private readonly chalk: ChalkInstance;

  constructor(
    public readonly layout: TableLayout,
    options: TableRendererOptions = {},
  ) {
    this.chalk = new Chalk({ level: options.color ? 1 : 0 });
  }

  /**
   * Lines introducing a sensor-type group: the type name and column titles.
   */
  header(type: string): string[] {
    const { numberWidth, thresholds } = this.layout;
    const titles = [
      'Name'.padEnd(NAME_WIDTH),
      'Status'.padEnd(STATUS_WIDTH),
      fitWidth('Value', numberWidth),
      'Unit'.padEnd(UNIT_WIDTH),
      ...thresholds.map((key) => fitWidth(THRESHOLD_TITLES[key], numberWidth)),
    ];
    return [this.chalk.bold(type || '(none)'), this.chalk.dim(titles.join(' ').trimEnd())];
  }

  /**
   * One sensor row. The view's numeric fields are expected to be fitted to
   * the layout width already.
   */
  row(name: string, view: DerivedSensorView): string {
    const cells = [
      name.padEnd(NAME_WIDTH),
      this.paintStatus(view.status, view.status.padEnd(STATUS_WIDTH)),
      view.value,
      view.unit.padEnd(UNIT_WIDTH),
      ...this.layout.thresholds.map((key) => view.thresholds[key] ?? ''),
    ];
    return cells.join(' ').trimEnd();
  }

  private paintStatus(status: SensorStatus, text: string): string {
    switch (status) {
      case 'OK':
        return this.chalk.green(text);
      case 'Warning':
        return this.chalk.yellow(text);
      case 'Critical':
        return this.chalk.red(text);
      case 'Fatal':
        return this.chalk.bgRed.white(text);
      case 'FAIL':
        return this.chalk.magenta(text);
      case 'N/A':
        return this.chalk.gray(text);
      default: {
        const unreachable: never = status;
        return unreachable;
      }
    }
  }
}
